import { readFile } from "node:fs/promises";
import { z } from "zod";
import { PATTERN_PROFILES, isPatternProfileName } from "./heading-patterns.ts";
import type { PatternProfile } from "./heading-patterns.ts";
import { DEFAULT_SCORING_WEIGHTS } from "./heading-score.ts";
import type { HeadingModel, ScoringWeights } from "./heading-score.ts";

const PatternSourceSchema = z.string().min(1).refine(isValidPatternSource, {
  message: "Must be a valid regular expression",
});

const WeightSchema = z.number().finite();

const ScoringWeightsSchema = z
  .object({
    bold: WeightSchema,
    italic: WeightSchema,
    maxFontSizeBonus: WeightSchema,
    fontSizeRatioFactor: WeightSchema,
    shortLength: WeightSchema,
    mediumLength: WeightSchema,
    uppercase: WeightSchema,
    titleCase: WeightSchema,
    capitalized: WeightSchema,
    leftAligned: WeightSchema,
    isolated: WeightSchema,
    pattern: WeightSchema,
    colonTitle: WeightSchema,
    numberedOutline: WeightSchema,
    thematicMarker: WeightSchema,
    longTextPenalty: WeightSchema,
    exclusionPenalty: WeightSchema,
    prosePenalty: WeightSchema,
    shortTextPenalty: WeightSchema,
    acceptanceThreshold: WeightSchema.min(0).max(1),
  } satisfies Record<keyof ScoringWeights, z.ZodNumber>)
  .partial()
  .strict();

const OutlineConfigSchema = z
  .object({
    profile: z.enum(["default", "section"]).optional(),
    thematicMarkers: z.array(z.string().min(1)).optional(),
    extraExclusionPatterns: z.array(PatternSourceSchema).optional(),
    extraProseIndicators: z.array(PatternSourceSchema).optional(),
    weights: ScoringWeightsSchema.optional(),
  })
  .strict();

export type OutlineConfig = z.infer<typeof OutlineConfigSchema>;

function isValidPatternSource(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export function resolveHeadingModel(profileName: string = "default"): HeadingModel {
  if (!isPatternProfileName(profileName)) {
    const known = Object.keys(PATTERN_PROFILES).join(", ");
    throw new Error(`Unknown pattern profile "${profileName}" (expected one of: ${known})`);
  }
  return { profile: PATTERN_PROFILES[profileName], weights: DEFAULT_SCORING_WEIGHTS };
}

/** `profileOverride` (the CLI's `--profile`) wins over the file's `profile`. */
export function parseOutlineConfig(raw: unknown, profileOverride?: string): HeadingModel {
  const parsed = OutlineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid outline config: ${issues}`);
  }
  return buildHeadingModel(parsed.data, profileOverride);
}

export async function loadOutlineConfig(
  configPath: string,
  profileOverride?: string,
): Promise<HeadingModel> {
  const source = await readFile(configPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Invalid outline config: ${configPath} is not valid JSON (${message})`);
  }
  return parseOutlineConfig(raw, profileOverride);
}

function buildHeadingModel(config: OutlineConfig, profileOverride?: string): HeadingModel {
  const base = resolveHeadingModel(profileOverride ?? config.profile);
  const profile: PatternProfile = {
    ...base.profile,
    exclusionPatterns: [
      ...base.profile.exclusionPatterns,
      ...(config.extraExclusionPatterns ?? []).map((source) => new RegExp(source)),
    ],
    proseIndicators: [
      ...base.profile.proseIndicators,
      ...(config.extraProseIndicators ?? []).map((source) => new RegExp(source)),
    ],
    thematicMarkers: config.thematicMarkers ?? base.profile.thematicMarkers,
  };
  return { profile, weights: { ...base.weights, ...config.weights } };
}
