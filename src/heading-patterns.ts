import { HEADING_LEVELS } from "./outline-types.ts";
import type { HeadingLevel } from "./outline-types.ts";
import { countWords, isTitleCase, splitWords } from "./text-case.ts";

export interface PatternProfile {
  name: string;
  /**
   * Scanned H1 → H2 → H3, first match wins. Keyword rules (chapter, phase and
   * section names) ignore case, shape rules (uppercase, title case, numbering) do not.
   */
  levelPatterns: Readonly<Record<HeadingLevel, readonly RegExp[]>>;
  /** Tested against the lowercased text. */
  exclusionPatterns: readonly RegExp[];
  /** Tested against the lowercased text. */
  proseIndicators: readonly RegExp[];
  /** Case-sensitive substrings that mark a thematic heading. */
  thematicMarkers: readonly string[];
}

interface PartialPatternRule {
  score: number;
  matches: (text: string) => boolean;
}

export const NUMBERED_OUTLINE_PATTERN = /^\d+\.(?:\d+\.?)*\s+[A-Z]/;
const UPPERCASE_LINE_PATTERN = /^[A-Z][A-Z\s]+$/;
const TITLE_PHRASE_PATTERN = /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,3}$/;
const MIN_UPPERCASE_LINE_LENGTH = 9;
const MIN_PROSE_SENTENCE_WORDS = 7;
const ARTICLES = new Set(["the", "a", "an"]);
const CONJUNCTIONS = new Set(["and", "or", "but", "so"]);

const PARTIAL_PATTERN_RULES: readonly PartialPatternRule[] = [
  { score: 0.9, matches: (text) => NUMBERED_OUTLINE_PATTERN.test(text) },
  { score: 0.7, matches: (text) => isColonTitle(text) && countWords(text) >= 2 },
  {
    score: 0.8,
    matches: (text) =>
      UPPERCASE_LINE_PATTERN.test(text) && text.length >= MIN_UPPERCASE_LINE_LENGTH,
  },
  { score: 0.6, matches: (text) => TITLE_PHRASE_PATTERN.test(text) },
  { score: 0.5, matches: (text) => text.startsWith("•") && text.includes(":") },
];

const DEFAULT_PROSE_INDICATORS: readonly RegExp[] = [
  /\b(?:experience|like|feels|seems|appears)\b/,
  /\b(?:building|creating|using|making|developing)\b/,
  /\b(?:you|your|we|our|they|their)\b/,
  /\b(?:will|would|could|should|must|can)\b/,
  /\b(?:this|that|these|those|it)\b/,
  /\?/,
  /\b(?:and|or|but)\s+\w+\s+(?:and|or|but)\b/,
];

export const DEFAULT_PATTERN_PROFILE: PatternProfile = {
  name: "default",
  levelPatterns: {
    H1: [
      /^chapter\s+\d+/i,
      /^(?:Abstract|Introduction|Conclusion|Summary|References|Bibliography)$/i,
      /^[A-Z\s]{15,}$/,
      /^(?:Executive\s+Summary|Table\s+of\s+Contents)$/i,
      /^\d+\.\s+[A-Z][A-Za-z\s]{10,}$/,
      /^(?:Welcome\s+to|The\s+Journey|Your\s+Mission|Why\s+This\s+Matters)$/i,
      /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\s+(?:Challenge|Mission|Journey|Matters)$/,
    ],
    H2: [
      /^\d+\.\d+\s+[A-Z]/,
      /^[A-Z][A-Z\s]{8,20}$/,
      /^(?:Background|Methodology|Results|Discussion|Analysis|Implementation|Evaluation)$/i,
      /^(?:Problem\s+Statement|Related\s+Work|Future\s+Work)$/i,
      /^(?:What\s+You\s+Need|You\s+Will\s+Be|The\s+Journey\s+Ahead)$/i,
      /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+){2,4}$/,
    ],
    H3: [
      /^\d+\.\d+\.\d+\s+[A-Z]/,
      /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*:$/,
      /^(?:Phase|Step|Stage|Round)\s+\d+/i,
      /^[a-z]+\)\s+[A-Z]/,
      /^•\s+[A-Z][a-z]+.*:$/,
    ],
  },
  exclusionPatterns: [
    /^\d+$/,
    /^(?:page|pg\.?|p\.)\s*\d+/,
    /copyright|©|confidential/,
    /^(?:see|refer|figure|table|note)\s+/,
    /\.com|\.org|\.net|@/,
    /^\w{1,2}$/,
    /^(?:and|or|but|the|a|an|in|on|at|by|for|with|from|to|of|is|are|was|were)\s+/,
    /\b(?:experience|like|feels|seems|appears|building|creating|using|making)\b/,
    /up\s+to\s+\d+|more\s+than|less\s+than/,
    /you're|we're|it's|that's|don't|won't/,
  ],
  proseIndicators: DEFAULT_PROSE_INDICATORS,
  thematicMarkers: ["Mission", "Journey", "Challenge", "Matters", "Welcome"],
};

/** Stricter rules for guide-style documents: short named sections only. */
export const SECTION_PATTERN_PROFILE: PatternProfile = {
  name: "section",
  levelPatterns: {
    H1: [/^(?:Introduction|Conclusion|Guide)$/i],
    H2: [
      /^(?:Summary|Tips)$/i,
      /^[A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,3}$/,
      /^(?:Activities|Things|Places|Hotels|Restaurants|History|Culture)$/i,
    ],
    H3: [],
  },
  exclusionPatterns: [
    /^(?:and|or|but|the|a|an|in|on|at|by|for|with|from|to|of)\s+/,
    /^(?:this|that|these|those|it|they|we|you|are|is|was|were)\s+/,
    /[.!?]$/,
    /visit|explore|discover|enjoy|experience|located|situated|offers|provides|features|includes/,
    /^(?:one|some|many|several|various|day|night|morning|afternoon|evening)\s+/,
    /(?:market|museum|restaurant|hotel|city|region)\s+(?:explores|showcases|features)/,
    /perfect|ideal|best|great|wonderful|beautiful|stunning/,
    /^\d+$/,
    /^(?:page|pg\.?|p\.)\s*\d+/,
  ],
  proseIndicators: DEFAULT_PROSE_INDICATORS,
  thematicMarkers: [],
};

export const PATTERN_PROFILES = {
  default: DEFAULT_PATTERN_PROFILE,
  section: SECTION_PATTERN_PROFILE,
} as const satisfies Record<string, PatternProfile>;

export type PatternProfileName = keyof typeof PATTERN_PROFILES;

export function isPatternProfileName(name: string): name is PatternProfileName {
  return Object.hasOwn(PATTERN_PROFILES, name);
}

export function matchExplicitLevel(
  text: string,
  profile: PatternProfile = DEFAULT_PATTERN_PROFILE,
): HeadingLevel | undefined {
  for (const level of HEADING_LEVELS) {
    if (profile.levelPatterns[level].some((pattern) => pattern.test(text))) return level;
  }
  return undefined;
}

export function patternScore(
  text: string,
  profile: PatternProfile = DEFAULT_PATTERN_PROFILE,
): number {
  if (matchExplicitLevel(text, profile) !== undefined) return 1;
  const rule = PARTIAL_PATTERN_RULES.find((candidate) => candidate.matches(text));
  return rule?.score ?? 0;
}

export function isExcluded(
  text: string,
  profile: PatternProfile = DEFAULT_PATTERN_PROFILE,
): boolean {
  const lower = text.toLowerCase();
  return profile.exclusionPatterns.some((pattern) => pattern.test(lower));
}

export function isProse(text: string, profile: PatternProfile = DEFAULT_PATTERN_PROFILE): boolean {
  const lower = text.toLowerCase();
  if (profile.proseIndicators.some((pattern) => pattern.test(lower))) return true;
  const words = splitWords(lower);
  const hasArticle = words.some((word) => ARTICLES.has(word));
  const hasConjunction = words.some((word) => CONJUNCTIONS.has(word));
  return hasArticle && hasConjunction && words.length >= MIN_PROSE_SENTENCE_WORDS;
}

export function isColonTitle(text: string): boolean {
  return text.endsWith(":") && isTitleCase(text);
}

export function containsThematicMarker(text: string, profile: PatternProfile): boolean {
  return profile.thematicMarkers.some((marker) => text.includes(marker));
}
