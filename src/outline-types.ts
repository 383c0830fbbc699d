export type HeadingLevel = "H1" | "H2" | "H3";

export const HEADING_LEVELS: readonly HeadingLevel[] = ["H1", "H2", "H3"];

export const LEVEL_RANKS: Readonly<Record<HeadingLevel, number>> = {
  H1: 1,
  H2: 2,
  H3: 3,
};

/** One visual line of text as delivered by the extraction layer. */
export interface TextRun {
  text: string;
  fontSize: number;
  isBold: boolean;
  isItalic: boolean;
  leftMargin: number;
  /** Grows downwards within a page. */
  topPosition: number;
  /** 1-based. */
  pageNumber: number;
  lineHeight: number;
  fontName: string;
}

export interface DocumentContext {
  runCount: number;
  avgFontSize: number;
  maxFontSize: number;
  minFontSize: number;
  minLeftMargin: number;
  maxLeftMargin: number;
  commonFontSizes: number[];
}

export interface RunContext extends DocumentContext {
  isIsolated: boolean;
}

export interface Heading {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface ScoredHeading extends Heading {
  score: number;
}

export interface DocumentOutline {
  title: string;
  outline: Heading[];
}

export interface ExtractedDocument {
  pages: ExtractedPage[];
}

export interface ExtractedPage {
  pageNumber: number;
  width: number;
  height: number;
  fragments: ExtractedFragment[];
}

export interface ExtractedFragment {
  text: string;
  x: number;
  /** Baseline, measured from the bottom of the page. */
  y: number;
  fontSize: number;
  height?: number;
  fontName: string;
  isBold: boolean;
  isItalic: boolean;
}

export const ISOLATION_LINE_HEIGHT_MULTIPLIER = 1.2;
export const MIN_CANDIDATE_TEXT_LENGTH = 3;
export const LEFT_ALIGNMENT_TOLERANCE = 10;
export const MAX_COMMON_FONT_SIZES = 3;
export const LINE_Y_BUCKET_SIZE = 2;
export const MIN_RUN_TEXT_LENGTH = 3;
export const MIN_COLUMN_BREAK_GAP = 120;
export const MIN_COLUMN_BREAK_GAP_RATIO = 0.18;
export const COLUMN_BREAK_LEFT_MAX_RATIO = 0.55;
export const COLUMN_BREAK_RIGHT_MIN_RATIO = 0.33;
export const MIN_COLUMN_BREAK_TEXT_CHARACTER_COUNT = 6;
export const MIN_MULTI_COLUMN_BREAK_ROWS = 3;
export const MIN_MULTI_COLUMN_BREAK_ROW_RATIO = 0.12;
export const MIN_HEADING_WORDS = 2;
export const MAX_SHORT_HEADING_WORDS = 6;
export const MAX_HEADING_WORDS = 12;
export const MAX_NON_PROSE_WORDS = 15;
export const MIN_HEADING_TEXT_LENGTH = 5;
