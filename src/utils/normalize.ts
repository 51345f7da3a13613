/**
 * Text normalization and numeric helpers shared by the similarity, relevance
 * and discovery stages.
 */

const ENTITY_REPLACEMENTS: Record<string, string> = {
  '&quot;': '"',
  '&apos;': "'",
  '&#39;': "'",
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&nbsp;': ' ',
};

/**
 * Clamp a numeric value to [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 3 decimal places. Returns a number (not string).
 */
export function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/**
 * Remove HTML-like tags and decode the handful of entities news APIs emit.
 */
export function stripMarkup(text: string): string {
  if (!text) return '';
  let cleaned = text.replace(/<[^>]+>/g, ' ');
  for (const [entity, replacement] of Object.entries(ENTITY_REPLACEMENTS)) {
    cleaned = cleaned.split(entity).join(replacement);
  }
  return cleaned.replace(/\s+/g, ' ').trim();
}

/**
 * Lowercased text with only letters, digits, underscores and single spaces.
 * Letters of any script survive, so Hangul and Latin text normalize alike.
 */
export function normalizeText(text: string): string {
  return stripMarkup(text)
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function tokenize(text: string): string[] {
  const normalized = normalizeText(text);
  return normalized ? normalized.split(' ') : [];
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Count non-overlapping occurrences of needle in haystack.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

export function mean(values: readonly number[]): number {
  if (!values.length) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}
