import { analyzeDocument, isIsolated } from "./document-context.ts";
import { DEFAULT_HEADING_MODEL, classifyHeadingLevel, scoreHeading } from "./heading-score.ts";
import type { HeadingModel } from "./heading-score.ts";
import { repairHierarchy, sortHeadingsByPage } from "./hierarchy-repair.ts";
import { MIN_CANDIDATE_TEXT_LENGTH } from "./outline-types.ts";
import type { Heading, ScoredHeading, TextRun } from "./outline-types.ts";
import { stripBulletMarker } from "./text-case.ts";

export interface ExtractOutlineOptions {
  model?: HeadingModel;
  /** Called in reading order for every accepted run, before sorting and repair. */
  onHeadingAccepted?: (heading: ScoredHeading) => void;
}

export function extractOutline(
  runs: readonly TextRun[] | null | undefined,
  options: ExtractOutlineOptions = {},
): Heading[] {
  if (!runs || runs.length === 0) return [];

  const model = options.model ?? DEFAULT_HEADING_MODEL;
  const context = analyzeDocument(runs);
  const seenTexts = new Set<string>();
  const accepted: ScoredHeading[] = [];

  runs.forEach((run, index) => {
    const text = run.text.trim();
    const bulletFreeText = stripBulletMarker(text);
    if (seenTexts.has(text.toLowerCase()) || seenTexts.has(bulletFreeText.toLowerCase())) return;
    if (text.length < MIN_CANDIDATE_TEXT_LENGTH) return;

    const score = scoreHeading(run, { ...context, isIsolated: isIsolated(runs, index) }, model);
    if (score < model.weights.acceptanceThreshold) return;

    const level = classifyHeadingLevel(text, score, run, model);
    if (level === undefined) return;

    seenTexts.add(text.toLowerCase());
    seenTexts.add(bulletFreeText.toLowerCase());
    const heading: ScoredHeading = { level, text, page: run.pageNumber, score };
    accepted.push(heading);
    options.onHeadingAccepted?.({ ...heading });
  });

  return repairHierarchy(sortHeadingsByPage(accepted)).map(({ level, text, page }) => ({
    level,
    text,
    page,
  }));
}
