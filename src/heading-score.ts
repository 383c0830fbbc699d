import {
  DEFAULT_PATTERN_PROFILE,
  NUMBERED_OUTLINE_PATTERN,
  containsThematicMarker,
  isColonTitle,
  isExcluded,
  isProse,
  matchExplicitLevel,
  patternScore,
} from "./heading-patterns.ts";
import type { PatternProfile } from "./heading-patterns.ts";
import {
  LEFT_ALIGNMENT_TOLERANCE,
  MAX_HEADING_WORDS,
  MAX_NON_PROSE_WORDS,
  MAX_SHORT_HEADING_WORDS,
  MIN_HEADING_TEXT_LENGTH,
  MIN_HEADING_WORDS,
} from "./outline-types.ts";
import type { HeadingLevel, RunContext, TextRun } from "./outline-types.ts";
import { isTitleCase, isUpperCase, splitWords, startsWithUppercase } from "./text-case.ts";

export interface ScoringWeights {
  bold: number;
  italic: number;
  maxFontSizeBonus: number;
  fontSizeRatioFactor: number;
  shortLength: number;
  mediumLength: number;
  uppercase: number;
  titleCase: number;
  capitalized: number;
  leftAligned: number;
  isolated: number;
  pattern: number;
  colonTitle: number;
  numberedOutline: number;
  thematicMarker: number;
  longTextPenalty: number;
  exclusionPenalty: number;
  prosePenalty: number;
  shortTextPenalty: number;
  /** Scores below this are never headings unless an explicit level pattern matches. */
  acceptanceThreshold: number;
}

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  bold: 0.2,
  italic: 0.05,
  maxFontSizeBonus: 0.15,
  fontSizeRatioFactor: 0.1,
  shortLength: 0.15,
  mediumLength: 0.1,
  uppercase: 0.1,
  titleCase: 0.08,
  capitalized: 0.05,
  leftAligned: 0.1,
  isolated: 0.1,
  pattern: 0.15,
  colonTitle: 0.1,
  numberedOutline: 0.15,
  thematicMarker: 0.1,
  longTextPenalty: 0.3,
  exclusionPenalty: 0.4,
  prosePenalty: 0.3,
  shortTextPenalty: 0.2,
  acceptanceThreshold: 0.35,
};

export interface HeadingModel {
  profile: PatternProfile;
  weights: Readonly<ScoringWeights>;
}

export const DEFAULT_HEADING_MODEL: HeadingModel = {
  profile: DEFAULT_PATTERN_PROFILE,
  weights: DEFAULT_SCORING_WEIGHTS,
};

const UPPERCASE_BONUS_MIN_LENGTH = 9;
const STRONG_H1_UPPERCASE_MIN_LENGTH = 16;
const STRONG_H2_UPPERCASE_MIN_LENGTH = 8;
const STRONG_H1_SCORE = 0.7;
const STRONG_H2_SCORE = 0.6;
const STRONG_H2_MIN_WORDS = 3;
const BOLD_FALLBACK_SCORE = 0.6;
const BOLD_H1_MAX_WORDS = 4;
const BOLD_H2_MAX_WORDS = 8;
const H2_FALLBACK_SCORE = 0.5;
const CHAPTER_PREFIX_PATTERN = /^chapter\s+\d+/i;
const SINGLE_NUMBER_PREFIX_PATTERN = /^\d+\.\s+[A-Z]/;
const TWO_LEVEL_NUMBER_PREFIX_PATTERN = /^\d+\.\d+/;
const PHASE_MARKER_PATTERN = /^(?:phase|round|step)\s+\d+/i;

/** Additive confidence that a run is a heading, clamped to [0, 1]. */
export function scoreHeading(
  run: TextRun,
  context: RunContext,
  model: HeadingModel = DEFAULT_HEADING_MODEL,
): number {
  const { profile, weights } = model;
  const text = run.text.trim();
  const wordCount = splitWords(text).length;

  const score =
    scoreStyle(run, weights) +
    scoreFontSize(run.fontSize, context.avgFontSize, weights) +
    scoreShape(text, wordCount, weights) +
    scorePosition(run, context, weights) +
    patternScore(text, profile) * weights.pattern +
    scoreBonuses(text, profile, weights) -
    scorePenalties(text, wordCount, profile, weights);

  return clampScore(score);
}

function scoreStyle(run: TextRun, weights: ScoringWeights): number {
  if (run.isBold) return weights.bold;
  return run.isItalic ? weights.italic : 0;
}

function scoreFontSize(fontSize: number, avgFontSize: number, weights: ScoringWeights): number {
  if (!(avgFontSize > 0) || !(fontSize > avgFontSize)) return 0;
  const ratio = fontSize / avgFontSize;
  return Math.min(weights.maxFontSizeBonus, (ratio - 1) * weights.fontSizeRatioFactor);
}

function scoreShape(text: string, wordCount: number, weights: ScoringWeights): number {
  let score = 0;
  if (wordCount >= MIN_HEADING_WORDS && wordCount <= MAX_HEADING_WORDS) {
    score += wordCount <= MAX_SHORT_HEADING_WORDS ? weights.shortLength : weights.mediumLength;
  }

  if (isUpperCase(text) && text.length >= UPPERCASE_BONUS_MIN_LENGTH) {
    score += weights.uppercase;
  } else if (isTitleCase(text) && wordCount >= MIN_HEADING_WORDS) {
    score += weights.titleCase;
  } else if (startsWithUppercase(text) && wordCount >= MIN_HEADING_WORDS) {
    score += weights.capitalized;
  }
  return score;
}

function scorePosition(run: TextRun, context: RunContext, weights: ScoringWeights): number {
  let score = 0;
  if (run.leftMargin <= context.minLeftMargin + LEFT_ALIGNMENT_TOLERANCE) score += weights.leftAligned;
  if (context.isIsolated) score += weights.isolated;
  return score;
}

function scoreBonuses(text: string, profile: PatternProfile, weights: ScoringWeights): number {
  let score = 0;
  if (isColonTitle(text)) score += weights.colonTitle;
  if (NUMBERED_OUTLINE_PATTERN.test(text)) score += weights.numberedOutline;
  if (containsThematicMarker(text, profile)) score += weights.thematicMarker;
  return score;
}

function scorePenalties(
  text: string,
  wordCount: number,
  profile: PatternProfile,
  weights: ScoringWeights,
): number {
  let penalty = 0;
  if (wordCount > MAX_NON_PROSE_WORDS) penalty += weights.longTextPenalty;
  if (isExcluded(text, profile)) penalty += weights.exclusionPenalty;
  if (isProse(text, profile)) penalty += weights.prosePenalty;
  if (text.length < MIN_HEADING_TEXT_LENGTH) penalty += weights.shortTextPenalty;
  return penalty;
}

function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(1, score));
}

/**
 * Maps a scored run to a heading level. An explicit level pattern decides on its
 * own; otherwise the score has to clear the acceptance threshold first.
 */
export function classifyHeadingLevel(
  text: string,
  score: number,
  run: TextRun,
  model: HeadingModel = DEFAULT_HEADING_MODEL,
): HeadingLevel | undefined {
  const explicitLevel = matchExplicitLevel(text, model.profile);
  if (explicitLevel !== undefined) return explicitLevel;
  if (score < model.weights.acceptanceThreshold) return undefined;

  const wordCount = splitWords(text).length;
  if (hasStrongH1Cue(text, score, wordCount, model.profile)) return "H1";
  if (hasStrongH2Cue(text, score, wordCount)) return "H2";
  if (hasStrongH3Cue(text)) return "H3";

  if (run.isBold && score >= BOLD_FALLBACK_SCORE) {
    if (wordCount <= BOLD_H1_MAX_WORDS) return "H1";
    return wordCount <= BOLD_H2_MAX_WORDS ? "H2" : "H3";
  }
  return score >= H2_FALLBACK_SCORE ? "H2" : "H3";
}

function hasStrongH1Cue(
  text: string,
  score: number,
  wordCount: number,
  profile: PatternProfile,
): boolean {
  return (
    (isUpperCase(text) && text.length >= STRONG_H1_UPPERCASE_MIN_LENGTH) ||
    CHAPTER_PREFIX_PATTERN.test(text) ||
    containsThematicMarker(text, profile) ||
    (score >= STRONG_H1_SCORE && wordCount <= MAX_SHORT_HEADING_WORDS)
  );
}

function hasStrongH2Cue(text: string, score: number, wordCount: number): boolean {
  const uppercaseMediumLength =
    isUpperCase(text) &&
    text.length >= STRONG_H2_UPPERCASE_MIN_LENGTH &&
    text.length < STRONG_H1_UPPERCASE_MIN_LENGTH;
  return (
    SINGLE_NUMBER_PREFIX_PATTERN.test(text) ||
    uppercaseMediumLength ||
    (isTitleCase(text) && wordCount >= STRONG_H2_MIN_WORDS && score >= STRONG_H2_SCORE)
  );
}

function hasStrongH3Cue(text: string): boolean {
  return (
    isColonTitle(text) ||
    TWO_LEVEL_NUMBER_PREFIX_PATTERN.test(text) ||
    text.startsWith("•") ||
    PHASE_MARKER_PATTERN.test(text)
  );
}
