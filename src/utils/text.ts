/**
 * Small string helpers shared by the processing modules
 */

const INTEGER_PATTERN = /^\d+$/;

/**
 * Key order used for every sorted mapping: integer keys (chapter ids) compare
 * numerically, everything else by code unit.
 */
export function compareKeys(a: string, b: string): number {
  if (INTEGER_PATTERN.test(a) && INTEGER_PATTERN.test(b)) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) return diff;
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * "main CHARACTERS" -> "Main Characters"
 */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[\s-])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word containment on space-separated lower-case text.
 */
export function containsWords(haystack: string, needle: string): boolean {
  if (!needle) return false;
  return ` ${haystack} `.includes(` ${needle} `);
}
