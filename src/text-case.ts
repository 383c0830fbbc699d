const BULLET_MARKER_PATTERN = /^[•·▪▫◦‣⁃*-]\s*/u;

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

function isCased(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

function isUpperChar(char: string): boolean {
  return isCased(char) && char === char.toUpperCase();
}

export function isUpperCase(text: string): boolean {
  let hasCased = false;
  for (const char of text) {
    if (!isCased(char)) continue;
    if (!isUpperChar(char)) return false;
    hasCased = true;
  }
  return hasCased;
}

/**
 * Every cased run starts with an uppercase letter and continues in lowercase,
 * so "Key Findings:" and "1.2 Scope" pass while "Don't Panic" and "iPhone" do not.
 */
export function isTitleCase(text: string): boolean {
  let previousCased = false;
  let hasCased = false;
  for (const char of text) {
    if (!isCased(char)) {
      previousCased = false;
      continue;
    }
    const upper = isUpperChar(char);
    if (upper && previousCased) return false;
    if (!upper && !previousCased) return false;
    previousCased = true;
    hasCased = true;
  }
  return hasCased;
}

export function startsWithUppercase(text: string): boolean {
  const [first] = text;
  return first !== undefined && isUpperChar(first);
}

export function stripBulletMarker(text: string): string {
  return text.replace(BULLET_MARKER_PATTERN, "").trim();
}
