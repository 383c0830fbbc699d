import {
  COLUMN_BREAK_LEFT_MAX_RATIO,
  COLUMN_BREAK_RIGHT_MIN_RATIO,
  LINE_Y_BUCKET_SIZE,
  MIN_COLUMN_BREAK_GAP,
  MIN_COLUMN_BREAK_GAP_RATIO,
  MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT,
  MIN_MULTI_COLUMN_BREAK_ROWS,
  MIN_MULTI_COLUMN_BREAK_ROW_RATIO,
  MIN_RUN_TEXT_LENGTH,
} from "./outline-types.ts";
import type { ExtractedDocument, ExtractedFragment, ExtractedPage, TextRun } from "./outline-types.ts";
import { normalizeSpacing, splitWords } from "./text-case.ts";

const NUMBERED_SECTION_MARKER_PATTERN = /^\d+(?:\.\d+){0,4}\.?$/;
const MAX_NUMBERED_SECTION_PREFIX_WORDS = 8;

/** Pages in ascending order, each page's lines top to bottom. */
export function collectTextRuns(document: ExtractedDocument): TextRun[] {
  return [...document.pages]
    .sort((left, right) => left.pageNumber - right.pageNumber)
    .flatMap((page) => collectPageRuns(page));
}

function collectPageRuns(page: ExtractedPage): TextRun[] {
  const buckets = bucketFragments(page.fragments);
  const splitByColumn = isLikelyMultiColumnPage(buckets, page.width);
  // PDF baselines grow upwards, so the highest bucket is the top line.
  const bucketKeys = [...buckets.keys()].sort((left, right) => right - left);
  const runs: TextRun[] = [];

  for (const bucket of bucketKeys) {
    const fragments = [...(buckets.get(bucket) ?? [])].sort((left, right) => left.x - right.x);
    const breakIndexes = findColumnBreakIndexes(fragments, page.width);
    const groups =
      splitByColumn || isHeadingPrefixedRow(fragments, breakIndexes)
        ? splitAtColumnBreaks(fragments, breakIndexes)
        : [fragments];

    for (const group of groups) {
      const run = mergeLineFragments(group, page);
      if (run) runs.push(run);
    }
  }

  return runs;
}

/** Several rows with a wide gap between two text blocks mark a page laid out in columns. */
function isLikelyMultiColumnPage(
  buckets: Map<number, ExtractedFragment[]>,
  pageWidth: number,
): boolean {
  let multiFragmentRows = 0;
  let rowsWithColumnBreak = 0;
  for (const fragments of buckets.values()) {
    if (fragments.length < 2) continue;
    multiFragmentRows += 1;
    const sorted = [...fragments].sort((left, right) => left.x - right.x);
    if (findColumnBreakIndexes(sorted, pageWidth).length > 0) rowsWithColumnBreak += 1;
  }
  if (rowsWithColumnBreak < MIN_MULTI_COLUMN_BREAK_ROWS) return false;
  return rowsWithColumnBreak / Math.max(multiFragmentRows, 1) >= MIN_MULTI_COLUMN_BREAK_ROW_RATIO;
}

// A numbered section title in the left column always stands apart from the text beside it.
function isHeadingPrefixedRow(fragments: ExtractedFragment[], breakIndexes: number[]): boolean {
  if (breakIndexes.length === 0) return false;
  const firstColumn = fragments.slice(0, breakIndexes[0] + 1);
  const tokens = splitWords(firstColumn.map((fragment) => fragment.text).join(" "));
  if (tokens.length < 2 || tokens.length > MAX_NUMBERED_SECTION_PREFIX_WORDS) return false;
  if (!NUMBERED_SECTION_MARKER_PATTERN.test(tokens[0])) return false;
  return tokens.slice(1).every((token) => /^[A-Za-z][A-Za-z-]*$/.test(token));
}

function splitAtColumnBreaks(
  fragments: ExtractedFragment[],
  breakIndexes: number[],
): ExtractedFragment[][] {
  const groups: ExtractedFragment[][] = [];
  let start = 0;
  for (const breakIndex of breakIndexes) {
    groups.push(fragments.slice(start, breakIndex + 1));
    start = breakIndex + 1;
  }
  groups.push(fragments.slice(start));
  return groups.filter((group) => group.length > 0);
}

function findColumnBreakIndexes(fragments: ExtractedFragment[], pageWidth: number): number[] {
  const indexes: number[] = [];
  for (let i = 0; i < fragments.length - 1; i += 1) {
    if (isLikelyColumnBreak(fragments[i], fragments[i + 1], pageWidth)) indexes.push(i);
  }
  return indexes;
}

function isLikelyColumnBreak(
  left: ExtractedFragment,
  right: ExtractedFragment,
  pageWidth: number,
): boolean {
  const minimumGap = Math.max(MIN_COLUMN_BREAK_GAP, pageWidth * MIN_COLUMN_BREAK_GAP_RATIO);
  if (right.x - left.x < minimumGap) return false;
  if (left.x > pageWidth * COLUMN_BREAK_LEFT_MAX_RATIO) return false;
  if (right.x < pageWidth * COLUMN_BREAK_RIGHT_MIN_RATIO) return false;
  return (
    countSubstantiveChars(left.text) >= MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT &&
    countSubstantiveChars(right.text) >= MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT
  );
}

function countSubstantiveChars(text: string): number {
  return text.replace(/[^\p{L}\p{N}]+/gu, "").length;
}

function bucketFragments(fragments: ExtractedFragment[]): Map<number, ExtractedFragment[]> {
  const buckets = new Map<number, ExtractedFragment[]>();
  for (const fragment of fragments) {
    const bucket = Math.round(fragment.y / LINE_Y_BUCKET_SIZE) * LINE_Y_BUCKET_SIZE;
    const existing = buckets.get(bucket);
    if (existing) {
      existing.push(fragment);
    } else {
      buckets.set(bucket, [fragment]);
    }
  }
  return buckets;
}

function mergeLineFragments(
  fragments: ExtractedFragment[],
  page: ExtractedPage,
): TextRun | undefined {
  const text = normalizeSpacing(fragments.map((fragment) => fragment.text).join(" "));
  if (fragments.length === 0 || text.length < MIN_RUN_TEXT_LENGTH) return undefined;

  return {
    text,
    fontSize: Math.max(...fragments.map((fragment) => fragment.fontSize)),
    isBold: fragments.some((fragment) => fragment.isBold),
    isItalic: fragments.some((fragment) => fragment.isItalic),
    leftMargin: Math.min(...fragments.map((fragment) => fragment.x)),
    topPosition: Math.min(
      ...fragments.map((fragment) => page.height - (fragment.y + fragmentHeight(fragment))),
    ),
    pageNumber: page.pageNumber,
    lineHeight: Math.max(...fragments.map(fragmentHeight)),
    fontName: dominantFontName(fragments),
  };
}

function fragmentHeight(fragment: ExtractedFragment): number {
  return fragment.height !== undefined && fragment.height > 0 ? fragment.height : fragment.fontSize;
}

function dominantFontName(fragments: ExtractedFragment[]): string {
  const counts = new Map<string, number>();
  for (const fragment of fragments) {
    counts.set(fragment.fontName, (counts.get(fragment.fontName) ?? 0) + 1);
  }
  let dominant = "";
  let dominantCount = 0;
  for (const [fontName, count] of counts) {
    if (count > dominantCount) {
      dominant = fontName;
      dominantCount = count;
    }
  }
  return dominant;
}
