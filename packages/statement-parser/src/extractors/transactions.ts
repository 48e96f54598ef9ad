import {
  completePartialDate,
  formatUSDate,
  parseUSDate,
  type DateRange,
  type Deposit,
  type Withdrawal,
} from '@ledgerline/types';
import type { TransactionClassifier } from '@ledgerline/categorizer';
import { extractAmount, extractDescription } from './field-extractors.js';
import type { TransactionRow } from './transaction-sections.js';

export interface MalformedRow {
  lineIndex: number;
  line: string;
  reason: string;
}

export interface TransactionExtraction {
  deposits: Deposit[];
  withdrawals: Withdrawal[];
  malformed: MalformedRow[];
}

export interface TransactionContext {
  /** Year used for `MM/DD` rows that the period cannot place. Null when no year is known. */
  fallbackYear: number | null;
  period?: DateRange;
  classifier: TransactionClassifier;
}

const ROW_DATE = /^(\d{1,2})\/(\d{1,2})(?:\/(\d{2}|\d{4}))?$/;

/**
 * Turns a row date token into MM/DD/YYYY. Two-digit years are taken as 20YY;
 * month/day rows borrow their year from the statement period.
 */
export function resolveRowDate(token: string, context: Pick<TransactionContext, 'fallbackYear' | 'period'>): string | null {
  const match = ROW_DATE.exec(token.trim());
  if (match === null) return null;

  const [, month = '', day = '', year] = match;
  const monthDay = `${month.padStart(2, '0')}/${day.padStart(2, '0')}`;

  if (year !== undefined) {
    const fullYear = year.length === 2 ? `20${year}` : year;
    const parsed = parseUSDate(`${monthDay}/${fullYear}`);
    return parsed === null ? null : formatUSDate(parsed);
  }

  if (context.fallbackYear === null) return null;
  return completePartialDate(monthDay, context.fallbackYear, context.period);
}

function describeRow(row: TransactionRow): string {
  return row.originalText.replace(/\s*\n\s*/g, ' ');
}

/**
 * Builds deposits and withdrawals from section rows, in source order. Rows missing a
 * date, description or amount are returned as malformed instead of being guessed at.
 */
export function buildTransactions(rows: readonly TransactionRow[], context: TransactionContext): TransactionExtraction {
  const deposits: Deposit[] = [];
  const withdrawals: Withdrawal[] = [];
  const malformed: MalformedRow[] = [];

  for (const row of rows) {
    const reject = (reason: string): void => {
      malformed.push({ lineIndex: row.lineIndex, line: describeRow(row), reason });
    };

    const date = resolveRowDate(row.dateToken, context);
    if (date === null) {
      reject(`invalid date "${row.dateToken}"`);
      continue;
    }

    const description = extractDescription(row.description);
    if (!description.present) {
      reject('missing description');
      continue;
    }

    if (row.amountToken === '') {
      reject('missing amount');
      continue;
    }
    const amount = extractAmount(row.amountToken);
    if (!amount.present) {
      reject(`invalid amount "${row.amountToken}"`);
      continue;
    }

    if (row.kind === 'deposit') {
      deposits.push({ date, description: description.value, amount: amount.value });
    } else {
      withdrawals.push({
        date,
        description: description.value,
        amount: amount.value,
        tax_category: context.classifier.classify(description.value),
      });
    }
  }

  return { deposits, withdrawals, malformed };
}
