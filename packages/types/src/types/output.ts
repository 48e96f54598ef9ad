/**
 * Wire types for the statement response contract.
 * Property names are snake_case because they are the JSON contract consumed downstream.
 */

/** MM/DD/YYYY, always a real calendar date once it reaches a record. */
export type USDate = string;

export const TAX_CATEGORIES = [
  'Domestic Business Expense',
  'International Subcontractors',
  'Tax Payment',
  'Transfer',
  'Loan Payment',
  'Utility Payment',
  'Professional Services',
] as const;

export type TaxCategory = (typeof TAX_CATEGORIES)[number];

export const ERROR_CODES = [
  'INVALID_ACCOUNT',
  'MISSING_STATEMENT_DATE',
  'MISSING_BALANCE',
  'MISSING_PERIOD_DATES',
  'PARSE_ERROR',
] as const;

export type StatementErrorCode = (typeof ERROR_CODES)[number];

export interface AccountReference {
  readonly canonical_id: string;
  readonly company_name: string;
  readonly bank_name: string;
  readonly digit_length: number;
}

export interface Deposit {
  date: USDate;
  description: string;
  amount: number;
}

export interface Withdrawal {
  date: USDate;
  description: string;
  amount: number;
  tax_category: TaxCategory;
}

export interface StatementRecord {
  statement_filename: string;
  account_number: string;
  statement_date: USDate;
  period_start: USDate;
  period_end: USDate;
  beginning_balance: number;
  ending_balance: number;
  total_fees: number;
  important_notes: string;
  deposits: Deposit[];
  withdrawals: Withdrawal[];
}

export interface ErrorRecord {
  code: StatementErrorCode;
  message: string;
}

export interface SuccessResponse {
  status: 'success';
  data: StatementRecord;
}

export interface ErrorResponse {
  status: 'error';
  error: ErrorRecord;
}

export type StatementResponse = SuccessResponse | ErrorResponse;

/**
 * Result of a single recognizer. Extraction never throws: a value that could not be
 * located or did not validate is `present: false`. `rawSpan` carries the matched source
 * text, so an empty span means nothing was located at all while a non-empty span on an
 * absent field means something was found but rejected.
 */
export type ExtractedField<T> =
  | { present: true; value: T; rawSpan: string }
  | { present: false; rawSpan: string };

export type MalformedRowPolicy = 'skip' | 'reject';

export type TransactionKind = 'deposit' | 'withdrawal';

export interface DocumentWarning {
  kind: 'malformed_row' | 'reconciliation' | 'account_hint';
  message: string;
  line?: string;
}
