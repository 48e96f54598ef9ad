/**
 * Recognizers for single field values. None of them throw: every result carries a
 * presence flag and the validator decides how serious an absent value is.
 */

import {
  parseUSDate,
  formatUSDate,
  normalizeLongDate,
  parseAmountCents,
  centsToAmount,
  sanitizeText,
  type ExtractedField,
} from '@ledgerline/types';

export interface FieldRecognizer<T> {
  name: string;
  /** Tried in order; capture group 1 is the value token. Must not carry the `g` flag. */
  patterns: readonly RegExp[];
  parse: (token: string) => ExtractedField<T>;
}

export function present<T>(value: T, rawSpan: string): ExtractedField<T> {
  return { present: true, value, rawSpan };
}

export function absent<T>(rawSpan = ''): ExtractedField<T> {
  return { present: false, rawSpan };
}

/**
 * Accepts MM/DD/YYYY, or a long form such as "January 31, 2023" which is normalized to
 * MM/DD/YYYY. Dates that do not exist are absent, never clamped.
 */
export function extractDate(token: string): ExtractedField<string> {
  const trimmed = token.trim();
  const parsed = parseUSDate(trimmed);
  if (parsed !== null) {
    return present(formatUSDate(parsed), token);
  }
  const longForm = normalizeLongDate(trimmed);
  return longForm === null ? absent(token) : present(longForm, token);
}

/** Non-negative amount with at most two decimals, returned in currency units. */
export function extractAmount(token: string): ExtractedField<number> {
  const cents = parseAmountCents(token);
  return cents === null ? absent(token) : present(centsToAmount(cents), token);
}

/** Free text reduced to letters, digits and single spaces. Always present, possibly empty. */
export function extractText(token: string): ExtractedField<string> {
  return present(sanitizeText(token), token);
}

/** Like `extractText`, but an empty result is absent. */
export function extractDescription(token: string): ExtractedField<string> {
  const text = sanitizeText(token);
  return text === '' ? absent(token) : present(text, token);
}

/**
 * Runs a field recognizer over free text. The first pattern that matches decides the outcome:
 * a value that fails to parse is reported absent with the matched span rather than
 * falling through to later patterns.
 */
export function extractField<T>(text: string, recognizer: FieldRecognizer<T>): ExtractedField<T> {
  for (const pattern of recognizer.patterns) {
    const match = pattern.exec(text);
    if (match === null) continue;

    const token = match[1] ?? match[0];
    const span = match[0].trim();
    const result = recognizer.parse(token);
    return result.present ? present(result.value, span) : absent(span);
  }
  return absent();
}
