const APOSTROPHES = /['’]/g;
const DISALLOWED = /[^A-Za-z0-9\s]+/g;
const SANITIZED = /^[A-Za-z0-9\s]*$/;

/**
 * Keeps ASCII letters, digits and whitespace. Apostrophes are dropped so "Joe's" stays
 * one word; any other punctuation becomes a space. Whitespace runs collapse to one space.
 */
export function sanitizeText(input: string): string {
  return input
    .replace(APOSTROPHES, '')
    .replace(DISALLOWED, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isSanitizedText(input: string): boolean {
  return SANITIZED.test(input);
}
