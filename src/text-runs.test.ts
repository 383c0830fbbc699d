import { describe, expect, it } from "vitest";
import { extractOutline } from "./outline-extract.ts";
import type { ExtractedFragment, ExtractedPage } from "./outline-types.ts";
import { collectTextRuns } from "./text-runs.ts";

describe("collectTextRuns", () => {
  it("merges fragments sharing a baseline bucket into one run per line", () => {
    const runs = collectTextRuns({
      pages: [
        page(2, [
          fragment({ text: "Appendix", x: 80, y: 720, fontSize: 16, height: 0, fontName: "Inter-Italic", isItalic: true }),
        ]),
        page(1, [
          fragment({ text: "Overview", x: 72, y: 700, fontSize: 18, height: 18, fontName: "Inter-Bold", isBold: true }),
          fragment({ text: "continues here", x: 200, y: 660.6 }),
          fragment({ text: "Body text", x: 72, y: 660 }),
          fragment({ text: "7", x: 300, y: 40, fontSize: 10, height: 10 }),
        ]),
      ],
    });

    expect(runs.map((run) => run.text)).toEqual(["Overview", "Body text continues here", "Appendix"]);
    expect(runs[0]).toEqual({
      text: "Overview",
      fontSize: 18,
      isBold: true,
      isItalic: false,
      leftMargin: 72,
      topPosition: 82,
      pageNumber: 1,
      lineHeight: 18,
      fontName: "Inter-Bold",
    });
    expect(runs[1].leftMargin).toBe(72);
    expect(runs[1].topPosition).toBeCloseTo(127.4);
    expect(runs[1].fontName).toBe("Inter");
    expect(runs[2]).toMatchObject({ pageNumber: 2, isItalic: true, lineHeight: 16, topPosition: 64 });
  });

  it("splits a numbered section title from body text in the next column", () => {
    const runs = collectTextRuns({
      pages: [
        page(1, [
          fragment({ text: "the results show that our approach outperforms the baseline", x: 320, y: 600 }),
          fragment({ text: "2 Related Work", x: 72, y: 600, fontSize: 14, height: 14, isBold: true }),
        ]),
      ],
    });

    expect(runs.map((run) => run.text)).toEqual([
      "2 Related Work",
      "the results show that our approach outperforms the baseline",
    ]);
    expect(runs.map((run) => run.leftMargin)).toEqual([72, 320]);
    expect(extractOutline(runs)).toEqual([{ level: "H1", text: "2 Related Work", page: 1 }]);
  });

  it("splits every row of a page laid out in two columns", () => {
    const rows = [700, 686, 672];
    const runs = collectTextRuns({
      pages: [
        page(
          1,
          rows.flatMap((y) => [
            fragment({ text: "alpha column text", x: 72, y }),
            fragment({ text: "beta column text", x: 320, y }),
          ]),
        ),
      ],
    });

    expect(runs.map((run) => `${run.leftMargin} ${run.text}`)).toEqual([
      "72 alpha column text",
      "320 beta column text",
      "72 alpha column text",
      "320 beta column text",
      "72 alpha column text",
      "320 beta column text",
    ]);
  });

  it("returns no runs for a document without text", () => {
    expect(collectTextRuns({ pages: [page(1, [])] })).toEqual([]);
  });
});

function page(pageNumber: number, fragments: ExtractedFragment[]): ExtractedPage {
  return { pageNumber, width: 600, height: 800, fragments };
}

function fragment(overrides: Partial<ExtractedFragment> = {}): ExtractedFragment {
  return {
    text: "text",
    x: 72,
    y: 600,
    fontSize: 12,
    height: 12,
    fontName: "Inter",
    isBold: false,
    isItalic: false,
    ...overrides,
  };
}
