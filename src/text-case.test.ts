import { describe, expect, it } from "vitest";
import {
  countWords,
  isTitleCase,
  isUpperCase,
  normalizeSpacing,
  splitWords,
  startsWithUppercase,
  stripBulletMarker,
} from "./text-case.ts";

describe("text case helpers", () => {
  it("treats every cased run starting uppercase as title case", () => {
    expect(isTitleCase("Key Findings:")).toBe(true);
    expect(isTitleCase("1.2 Scope")).toBe(true);
    expect(isTitleCase("Don't Panic")).toBe(false);
    expect(isTitleCase("iPhone Launch")).toBe(false);
    expect(isTitleCase("ALL CAPS")).toBe(false);
    expect(isTitleCase("123")).toBe(false);
    expect(isTitleCase("")).toBe(false);
  });

  it("requires at least one cased character for uppercase", () => {
    expect(isUpperCase("EXECUTIVE SUMMARY")).toBe(true);
    expect(isUpperCase("R2-D2")).toBe(true);
    expect(isUpperCase("Mixed")).toBe(false);
    expect(isUpperCase("2024")).toBe(false);
  });

  it("checks only the first character for a capital", () => {
    expect(startsWithUppercase("Overview")).toBe(true);
    expect(startsWithUppercase("overview")).toBe(false);
    expect(startsWithUppercase("1 Intro")).toBe(false);
    expect(startsWithUppercase("")).toBe(false);
  });

  it("splits on any whitespace and drops empty words", () => {
    expect(splitWords("  a  b\tc ")).toEqual(["a", "b", "c"]);
    expect(countWords("")).toBe(0);
    expect(normalizeSpacing("  Key \n Findings ")).toBe("Key Findings");
  });

  it("strips a single leading bullet marker", () => {
    expect(stripBulletMarker("• Key Findings")).toBe("Key Findings");
    expect(stripBulletMarker("- action item")).toBe("action item");
    expect(stripBulletMarker("•Tight")).toBe("Tight");
    expect(stripBulletMarker("Plain")).toBe("Plain");
  });
});
