/**
 * Text helpers for user-facing names and descriptions.
 *
 * Length limits count grapheme clusters (what a user sees as one
 * character), so an accented letter written with a combining mark counts as 1.
 */

export const MAX_NAME_LENGTH = 50;
export const MAX_DESCRIPTION_LENGTH = 300;
export const MIN_SEARCH_LENGTH = 3;

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

export function graphemeLength(value: string): number {
  return Array.from(segmenter.segment(value)).length;
}

/**
 * Case-insensitive prefix match
 */
export function startsWithIgnoringCase(value: string, prefix: string): boolean {
  return value.toLowerCase().startsWith(prefix.toLowerCase());
}

/**
 * Strip leading and trailing slashes (after trimming whitespace)
 */
export function trimSlashes(value: string): string {
  return value.trim().replace(/^\/+|\/+$/g, '');
}
