import { HEADING_LEVELS, LEVEL_RANKS } from "./outline-types.ts";
import type { Heading, HeadingLevel } from "./outline-types.ts";

/** Stable: headings of equal page and level keep their reading order. */
export function sortHeadingsByPage<T extends Heading>(headings: readonly T[]): T[] {
  return [...headings].sort((left, right) => {
    if (left.page !== right.page) return left.page - right.page;
    return LEVEL_RANKS[left.level] - LEVEL_RANKS[right.level];
  });
}

/**
 * Demotes any heading that sits more than one level below its predecessor.
 * Headings are never dropped or reordered.
 */
export function repairHierarchy<T extends Heading>(headings: readonly T[]): T[] {
  let lastRank = 0;
  return headings.map((heading) => {
    const rank = LEVEL_RANKS[heading.level];
    if (rank <= lastRank + 1) {
      lastRank = rank;
      return { ...heading };
    }
    lastRank += 1;
    return { ...heading, level: levelForRank(lastRank) };
  });
}

function levelForRank(rank: number): HeadingLevel {
  const index = Math.min(Math.max(rank, 1), HEADING_LEVELS.length) - 1;
  return HEADING_LEVELS[index];
}
