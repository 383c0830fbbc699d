import {
  ISOLATION_LINE_HEIGHT_MULTIPLIER,
  MAX_COMMON_FONT_SIZES,
} from "./outline-types.ts";
import type { DocumentContext, TextRun } from "./outline-types.ts";

export const EMPTY_DOCUMENT_CONTEXT: DocumentContext = {
  runCount: 0,
  avgFontSize: 0,
  maxFontSize: 0,
  minFontSize: 0,
  minLeftMargin: 0,
  maxLeftMargin: 0,
  commonFontSizes: [],
};

export function analyzeDocument(runs: readonly TextRun[] | null | undefined): DocumentContext {
  if (!runs || runs.length === 0) return { ...EMPTY_DOCUMENT_CONTEXT, commonFontSizes: [] };

  let fontSizeSum = 0;
  let maxFontSize = -Infinity;
  let minFontSize = Infinity;
  let minLeftMargin = Infinity;
  let maxLeftMargin = -Infinity;
  const fontSizeCounts = new Map<number, number>();

  for (const run of runs) {
    fontSizeSum += run.fontSize;
    maxFontSize = Math.max(maxFontSize, run.fontSize);
    minFontSize = Math.min(minFontSize, run.fontSize);
    minLeftMargin = Math.min(minLeftMargin, run.leftMargin);
    maxLeftMargin = Math.max(maxLeftMargin, run.leftMargin);
    fontSizeCounts.set(run.fontSize, (fontSizeCounts.get(run.fontSize) ?? 0) + 1);
  }

  return {
    runCount: runs.length,
    avgFontSize: fontSizeSum / runs.length,
    maxFontSize,
    minFontSize,
    minLeftMargin,
    maxLeftMargin,
    commonFontSizes: rankFontSizes(fontSizeCounts),
  };
}

// Map iteration follows first encounter and the sort is stable, so ties keep encounter order.
function rankFontSizes(fontSizeCounts: Map<number, number>): number[] {
  return [...fontSizeCounts.entries()]
    .sort((left, right) => right[1] - left[1])
    .slice(0, MAX_COMMON_FONT_SIZES)
    .map(([fontSize]) => fontSize);
}

/**
 * A run is isolated when it has generous whitespace above or below it, or when it
 * sits on a page edge. Requires runs in page, then top-to-bottom, order.
 */
export function isIsolated(runs: readonly TextRun[], index: number): boolean {
  if (!Number.isInteger(index) || index < 0 || index >= runs.length) return false;

  const current = runs[index];
  const previous = index > 0 ? runs[index - 1] : undefined;
  const next = index < runs.length - 1 ? runs[index + 1] : undefined;
  const threshold = current.lineHeight * ISOLATION_LINE_HEIGHT_MULTIPLIER;

  const samePagePrevious = previous?.pageNumber === current.pageNumber ? previous : undefined;
  const samePageNext = next?.pageNumber === current.pageNumber ? next : undefined;

  const hasSpaceAbove =
    samePagePrevious === undefined ||
    verticalGap(samePagePrevious, current) >= threshold;
  const hasSpaceBelow =
    samePageNext === undefined || verticalGap(current, samePageNext) >= threshold;

  return hasSpaceAbove || hasSpaceBelow;
}

function verticalGap(upper: TextRun, lower: TextRun): number {
  return lower.topPosition - (upper.topPosition + upper.lineHeight);
}
