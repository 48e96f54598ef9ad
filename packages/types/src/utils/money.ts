const PLAIN_AMOUNT = /^(\d+)(?:\.(\d{1,2}))?$/;
const GROUPED_AMOUNT = /^\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?$/;
const NEGATIVE_MARKERS = /^-|-$|^\(.*\)$/;

/**
 * Parses a statement amount into integer cents.
 *
 * `$`, whitespace and thousands separators are stripped. Negative amounts (leading or
 * trailing minus, parentheses), malformed grouping and more than two fractional digits
 * all return null; nothing is rounded or coerced to zero.
 */
export function parseAmountCents(amountStr: string): number | null {
  const compact = amountStr.replace(/[$\s]/g, '');
  if (compact === '' || NEGATIVE_MARKERS.test(compact)) {
    return null;
  }

  if (compact.includes(',') && !GROUPED_AMOUNT.test(compact)) {
    return null;
  }

  const match = PLAIN_AMOUNT.exec(compact.replace(/,/g, ''));
  if (match === null) return null;
  const [, whole, fraction] = match;
  if (whole === undefined) return null;

  const cents = parseInt(whole, 10) * 100 + parseInt((fraction ?? '').padEnd(2, '0'), 10);
  return Number.isSafeInteger(cents) ? cents : null;
}

export function centsToAmount(cents: number): number {
  return cents / 100;
}

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

const USD = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

/** `$1,428.73`; negatives as `-$20.00`. */
export function formatCurrency(amount: number): string {
  return amount < 0 ? `-${USD.format(-amount)}` : USD.format(amount);
}

/** Sums in cents so that 0.1 + 0.2 style drift never reaches a total. */
export function sumAmounts(amounts: number[]): number {
  return centsToAmount(amounts.reduce((sum, amt) => sum + toCents(amt), 0));
}
