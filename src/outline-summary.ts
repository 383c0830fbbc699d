import { HEADING_LEVELS, LEVEL_RANKS } from "./outline-types.ts";
import type { Heading } from "./outline-types.ts";

const DEFAULT_PREVIEW_SIZE = 5;

/** e.g. `Levels: H1=2 H3=1`; undefined for an empty outline. */
export function formatLevelDistribution(headings: readonly Heading[]): string | undefined {
  if (headings.length === 0) return undefined;
  const distribution = HEADING_LEVELS.map(
    (level) => [level, headings.filter((heading) => heading.level === level).length] as const,
  )
    .filter(([, count]) => count > 0)
    .map(([level, count]) => `${level}=${count}`)
    .join(" ");
  return `Levels: ${distribution}`;
}

/** The first headings indented by level, plus a count of the rest. */
export function formatHeadingPreview(
  headings: readonly Heading[],
  limit: number = DEFAULT_PREVIEW_SIZE,
): string[] {
  const lines = headings
    .slice(0, limit)
    .map(
      (heading) =>
        `${"  ".repeat(LEVEL_RANKS[heading.level] - 1)}${heading.level}: ${heading.text} (page ${heading.page})`,
    );
  if (headings.length > limit) lines.push(`... and ${headings.length - limit} more`);
  return lines;
}
