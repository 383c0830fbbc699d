import { describe, expect, it } from "vitest";
import {
  NUMBERED_OUTLINE_PATTERN,
  SECTION_PATTERN_PROFILE,
  isExcluded,
  isProse,
  matchExplicitLevel,
  patternScore,
} from "./heading-patterns.ts";

describe("matchExplicitLevel", () => {
  it("scans H1 rules before H2 and H3 rules", () => {
    expect(matchExplicitLevel("Chapter 2")).toBe("H1");
    expect(matchExplicitLevel("INTRODUCTION")).toBe("H1");
    expect(matchExplicitLevel("1.1 Scope")).toBe("H2");
    expect(matchExplicitLevel("Market Outlook Today")).toBe("H2");
    expect(matchExplicitLevel("1.1.1 Details")).toBe("H3");
    expect(matchExplicitLevel("Round 2")).toBe("H3");
  });

  it("matches chapter and phase keywords in any case", () => {
    expect(matchExplicitLevel("chapter 3")).toBe("H1");
    expect(matchExplicitLevel("CHAPTER 4 Results")).toBe("H1");
    expect(matchExplicitLevel("step 2")).toBe("H3");
  });

  it("does not treat lowercase running text as an uppercase shape", () => {
    expect(matchExplicitLevel("Quarterly results were strong")).toBeUndefined();
    expect(matchExplicitLevel("pg 4")).toBeUndefined();
  });

  it("uses the rules of the selected profile", () => {
    expect(matchExplicitLevel("Guide", SECTION_PATTERN_PROFILE)).toBe("H1");
    expect(matchExplicitLevel("Local History", SECTION_PATTERN_PROFILE)).toBe("H2");
    expect(matchExplicitLevel("Local History")).toBeUndefined();
  });
});

describe("patternScore", () => {
  it("returns 1 for an explicit level match", () => {
    expect(patternScore("Chapter 2")).toBe(1);
  });

  it("grades partial heading shapes", () => {
    expect(patternScore("1. Overview")).toBe(0.9);
    expect(patternScore("Next Steps 2025:")).toBe(0.7);
    expect(patternScore("ANNUAL REPORT", SECTION_PATTERN_PROFILE)).toBe(0.8);
    expect(patternScore("Market Outlook")).toBe(0.6);
    expect(patternScore("• Budget: approved")).toBe(0.5);
    expect(patternScore("quarterly results were strong")).toBe(0);
  });

  it("recognizes dotted outline numbering", () => {
    expect(NUMBERED_OUTLINE_PATTERN.test("1.2.3 Something")).toBe(true);
    expect(NUMBERED_OUTLINE_PATTERN.test("1.2.3. Something")).toBe(true);
    expect(NUMBERED_OUTLINE_PATTERN.test("12 Angry Men")).toBe(false);
  });
});

describe("isExcluded", () => {
  it("flags boilerplate and prose-shaped lines", () => {
    expect(isExcluded("pg 4")).toBe(true);
    expect(isExcluded("Page 12")).toBe(true);
    expect(isExcluded("© 2024 Example Corp")).toBe(true);
    expect(isExcluded("Contact us at team@example.com")).toBe(true);
    expect(isExcluded("The market grew")).toBe(true);
    expect(isExcluded("User Experience")).toBe(true);
    expect(isExcluded("Ok")).toBe(true);
  });

  it("keeps ordinary heading text", () => {
    expect(isExcluded("Key Findings")).toBe(false);
    expect(isExcluded("1.1 Scope")).toBe(false);
  });
});

describe("isProse", () => {
  it("matches pronouns, modal verbs and questions as whole words", () => {
    expect(isProse("What should we do next")).toBe(true);
    expect(isProse("Is this working?")).toBe(true);
    expect(isProse("Sales and marketing and support")).toBe(true);
    expect(isProse("Digital Transformation")).toBe(false);
  });

  it("treats long lines with an article and a conjunction as sentences", () => {
    expect(isProse("The plan covers sales so margins improve quickly")).toBe(true);
    expect(isProse("The plan and goals")).toBe(false);
  });
});
