export { analyzeDocument, EMPTY_DOCUMENT_CONTEXT, isIsolated } from "./document-context.ts";
export {
  DEFAULT_PATTERN_PROFILE,
  PATTERN_PROFILES,
  SECTION_PATTERN_PROFILE,
  isExcluded,
  isProse,
  matchExplicitLevel,
  patternScore,
} from "./heading-patterns.ts";
export type { PatternProfile, PatternProfileName } from "./heading-patterns.ts";
export {
  DEFAULT_HEADING_MODEL,
  DEFAULT_SCORING_WEIGHTS,
  classifyHeadingLevel,
  scoreHeading,
} from "./heading-score.ts";
export type { HeadingModel, ScoringWeights } from "./heading-score.ts";
export { repairHierarchy, sortHeadingsByPage } from "./hierarchy-repair.ts";
export { loadOutlineConfig, parseOutlineConfig, resolveHeadingModel } from "./outline-config.ts";
export type { OutlineConfig } from "./outline-config.ts";
export {
  buildDocumentOutline,
  convertPdfDirectory,
  convertPdfToOutline,
  renderOutlineJson,
} from "./outline-document.ts";
export { extractOutline } from "./outline-extract.ts";
export { formatHeadingPreview, formatLevelDistribution } from "./outline-summary.ts";
export type { ExtractOutlineOptions } from "./outline-extract.ts";
export { HEADING_LEVELS, LEVEL_RANKS } from "./outline-types.ts";
export type {
  DocumentContext,
  DocumentOutline,
  ExtractedDocument,
  ExtractedFragment,
  ExtractedPage,
  Heading,
  HeadingLevel,
  RunContext,
  ScoredHeading,
  TextRun,
} from "./outline-types.ts";
export { extractDocument, extractDocumentFromBuffer } from "./pdf-extract.ts";
export { collectTextRuns } from "./text-runs.ts";
