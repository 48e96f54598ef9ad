/**
 * Splits statement text into deposit and withdrawal rows. Section headers open a
 * section, totals and balance tables close it, and wrapped description lines are
 * merged back into the row they belong to.
 */

import type { TransactionKind } from '@ledgerline/types';

const CONTINUED = String.raw`(?:[ \t]*\(continued\))?`;

const SECTION_PATTERNS = {
  deposits: new RegExp(
    String.raw`^(?:deposits?[ \t]*(?:and|&)[ \t]*(?:other[ \t]+)?(?:additions|credits)|deposits?|credits|other[ \t]+credits|electronic[ \t]+deposits)${CONTINUED}$`,
    'i'
  ),
  withdrawals: new RegExp(
    String.raw`^(?:(?:electronic|other|atm[ \t]*(?:and|&)[ \t]*debit[ \t]+card)[ \t]+withdrawals|withdrawals?(?:[ \t]*(?:and|&)[ \t]*(?:other[ \t]+)?(?:subtractions|debits))?|checks[ \t]+paid|debits|other[ \t]+debits|fees|service[ \t]+fees|fees[ \t]*(?:and|&)[ \t]*other[ \t]+withdrawals)${CONTINUED}$`,
    'i'
  ),
  sectionEnd: [
    /^total\b/i,
    /^daily[ \t]+(?:ending[ \t]+)?balance/i,
    /^(?:checking|account)[ \t]+summary\b/i,
    /^service[ \t]+charge[ \t]+summary\b/i,
    /^important[ \t]+(?:notes?|information)\b/i,
  ],
  noise: [
    /^(?:date|description|amount)(?:[ \t]+(?:date|description|amount|posted|transaction))*$/i,
    /^page[ \t]+\d+[ \t]+of[ \t]+\d+$/i,
    /^\(continued\)$/i,
  ],
  rowDate: /^(\d{1,2}\/\d{1,2}(?:\/\d{2,4})?)(?=\s|$)/,
  rowAmount: /(?:^|\s)([-(]?\$?[\d,]*\d\.\d{2}\)?-?)$/,
};

export interface TransactionRow {
  kind: TransactionKind;
  dateToken: string;
  description: string;
  /** Empty when the row never carried an amount. */
  amountToken: string;
  /** Source lines joined with newlines, for diagnostics. */
  originalText: string;
  lineIndex: number;
}

export function detectSectionHeader(line: string): TransactionKind | null {
  const trimmed = line.trim();
  if (SECTION_PATTERNS.deposits.test(trimmed)) return 'deposit';
  if (SECTION_PATTERNS.withdrawals.test(trimmed)) return 'withdrawal';
  return null;
}

export function isSectionBoundary(line: string): boolean {
  const trimmed = line.trim();
  return detectSectionHeader(trimmed) !== null || SECTION_PATTERNS.sectionEnd.some((p) => p.test(trimmed));
}

function isNoise(line: string): boolean {
  return SECTION_PATTERNS.noise.some((p) => p.test(line));
}

function startRow(kind: TransactionKind, text: string, lineIndex: number): TransactionRow {
  const dateMatch = SECTION_PATTERNS.rowDate.exec(text);
  const dateToken = dateMatch?.[1] ?? '';
  let rest = text.slice(dateToken.length).trim();

  const amountMatch = SECTION_PATTERNS.rowAmount.exec(rest);
  const amountToken = amountMatch?.[1] ?? '';
  if (amountMatch !== null) {
    rest = rest.slice(0, amountMatch.index).trim();
  }

  return { kind, dateToken, description: rest, amountToken, originalText: text, lineIndex };
}

function appendContinuation(row: TransactionRow, text: string): void {
  row.originalText = `${row.originalText}\n${text}`;
  const amountMatch = SECTION_PATTERNS.rowAmount.exec(text);

  if (amountMatch !== null) {
    // an amount on a wrapped line only fills a row that has none yet
    if (row.amountToken !== '') return;
    row.amountToken = amountMatch[1] ?? '';
    const descPart = text.slice(0, amountMatch.index).trim();
    if (descPart !== '') row.description = `${row.description} ${descPart}`.trim();
    return;
  }

  row.description = `${row.description} ${text}`.trim();
}

export function splitTransactionRows(text: string): TransactionRow[] {
  const rows: TransactionRow[] = [];
  const lines = text.split(/\r?\n/);
  let kind: TransactionKind | null = null;
  let current: TransactionRow | null = null;

  const flush = (): void => {
    if (current !== null) {
      rows.push(current);
      current = null;
    }
  };

  lines.forEach((line, lineIndex) => {
    const trimmed = line.trim();
    if (trimmed === '') return;

    const header = detectSectionHeader(trimmed);
    if (header !== null) {
      flush();
      kind = header;
      return;
    }

    if (SECTION_PATTERNS.sectionEnd.some((p) => p.test(trimmed))) {
      flush();
      kind = null;
      return;
    }

    if (kind === null || isNoise(trimmed)) return;

    if (SECTION_PATTERNS.rowDate.test(trimmed)) {
      flush();
      current = startRow(kind, trimmed, lineIndex);
      return;
    }

    if (current !== null) {
      appendContinuation(current, trimmed);
    }
  });

  flush();
  return rows;
}
