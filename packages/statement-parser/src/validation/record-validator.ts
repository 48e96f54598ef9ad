/**
 * Decides between a complete StatementRecord and a single ErrorRecord.
 *
 * Each error code owns one check. Checks run in the configured order and the first
 * failure wins, so when several problems coexist the order alone decides which code
 * is reported.
 */

import {
  compareUSDates,
  DEFAULT_VALIDATION_ORDER,
  StatementParseError,
  type AccountReference,
  type ErrorRecord,
  type ExtractedField,
  type MalformedRowPolicy,
  type StatementErrorCode,
  type StatementRecord,
} from '@ledgerline/types';
import type { AccountRegistry } from '../registry/account-registry.js';
import type { StatementFields } from '../extractors/statement-fields.js';
import type { TransactionExtraction } from '../extractors/transactions.js';

const SOURCE_FILENAME_PATTERN = /^[^/]+\.pdf$/;

export interface RecordValidatorOptions {
  registry: AccountRegistry;
  order?: readonly StatementErrorCode[];
  malformedRowPolicy?: MalformedRowPolicy;
}

export interface ValidationInput {
  sourceFilename: string;
  fields: StatementFields;
  transactions: TransactionExtraction;
}

export type ValidationOutcome =
  | { ok: true; record: StatementRecord; account: AccountReference }
  | { ok: false; error: ErrorRecord };

interface ValidationContext extends ValidationInput {
  filename: string;
  account: ExtractedField<AccountReference>;
}

type Check = (ctx: ValidationContext) => string | null;

/** Keeps the part after the last `/` or `\`. */
export function normalizeSourceFilename(sourceFilename: string): string {
  const trimmed = sourceFilename.trim();
  const cut = Math.max(trimmed.lastIndexOf('/'), trimmed.lastIndexOf('\\'));
  return trimmed.slice(cut + 1);
}

export function isValidSourceFilename(filename: string): boolean {
  return SOURCE_FILENAME_PATTERN.test(filename);
}

function describeSpan(span: string): string {
  return span === '' ? '' : ` ("${span}")`;
}

/** Field checks; PARSE_ERROR depends on validator options and lives on the class. */
const fieldChecks: Record<Exclude<StatementErrorCode, 'PARSE_ERROR'>, Check> = {
  INVALID_ACCOUNT: ({ fields, account }) => {
    if (account.present) return null;
    if (!fields.accountNumber.present) {
      return 'No account number found in statement text';
    }
    const raw = fields.accountNumber.value;
    if (/X{4,}/.test(raw.replace(/[^A-Za-z0-9]/g, ''))) {
      return fields.companyHint === null
        ? `Masked account number ${raw} cannot be resolved without a company name`
        : `Masked account number ${raw} does not resolve to exactly one account for "${fields.companyHint}"`;
    }
    return `Account number ${raw} is not a known account`;
  },

  MISSING_STATEMENT_DATE: ({ fields }) =>
    fields.statementDate.present
      ? null
      : `Statement date missing or invalid${describeSpan(fields.statementDate.rawSpan)}`,

  MISSING_BALANCE: ({ fields }) => {
    const missing = [
      fields.beginningBalance.present ? null : 'beginning',
      fields.endingBalance.present ? null : 'ending',
    ].filter((name): name is string => name !== null);
    return missing.length === 0 ? null : `Missing or invalid ${missing.join(' and ')} balance`;
  },

  MISSING_PERIOD_DATES: ({ fields }) => {
    const { periodStart, periodEnd, statementDate } = fields;
    if (!periodStart.present || !periodEnd.present) {
      return `Statement period dates missing or invalid${describeSpan(periodStart.rawSpan || periodEnd.rawSpan)}`;
    }
    if (compareUSDates(periodEnd.value, periodStart.value) < 0) {
      return `Statement period ends (${periodEnd.value}) before it starts (${periodStart.value})`;
    }
    if (
      statementDate.present &&
      (compareUSDates(statementDate.value, periodStart.value) < 0 ||
        compareUSDates(statementDate.value, periodEnd.value) > 0)
    ) {
      return `Statement date ${statementDate.value} is outside the period ${periodStart.value} - ${periodEnd.value}`;
    }
    return null;
  },
};

/**
 * Validates extracted fields in a fixed, configurable order and assembles the record.
 * Instances hold only immutable configuration and can be shared.
 */
export class RecordValidator {
  readonly order: readonly StatementErrorCode[];
  readonly malformedRowPolicy: MalformedRowPolicy;
  private readonly registry: AccountRegistry;

  constructor(options: RecordValidatorOptions) {
    this.registry = options.registry;
    this.order = Object.freeze([...(options.order ?? DEFAULT_VALIDATION_ORDER)]);
    this.malformedRowPolicy = options.malformedRowPolicy ?? 'skip';
  }

  validate(input: ValidationInput): ValidationOutcome {
    const { fields } = input;
    const ctx: ValidationContext = {
      ...input,
      filename: normalizeSourceFilename(input.sourceFilename),
      account: fields.accountNumber.present
        ? this.registry.normalize(fields.accountNumber.value, fields.companyHint)
        : { present: false, rawSpan: fields.accountNumber.rawSpan },
    };

    for (const code of this.order) {
      const message = code === 'PARSE_ERROR' ? this.checkStructure(ctx) : fieldChecks[code](ctx);
      if (message !== null) {
        return { ok: false, error: { code, message } };
      }
    }

    return this.assemble(ctx);
  }

  private checkStructure(ctx: ValidationContext): string | null {
    if (!isValidSourceFilename(ctx.filename)) {
      return `Source filename "${ctx.filename}" is not a .pdf file name`;
    }
    const fees = ctx.fields.totalFees;
    if (!fees.present && fees.rawSpan !== '') {
      return `Total fees value is not a valid non-negative amount ("${fees.rawSpan}")`;
    }
    const { malformed } = ctx.transactions;
    if (this.malformedRowPolicy === 'reject' && malformed.length > 0) {
      const [first] = malformed;
      const detail = first === undefined ? '' : `; first at line ${first.lineIndex + 1}: ${first.reason}`;
      return `${malformed.length} malformed transaction row(s)${detail}`;
    }
    return null;
  }

  private assemble(ctx: ValidationContext): ValidationOutcome {
    const { fields, account } = ctx;
    const { statementDate, periodStart, periodEnd, beginningBalance, endingBalance, totalFees } = fields;

    if (
      !account.present ||
      !statementDate.present ||
      !periodStart.present ||
      !periodEnd.present ||
      !beginningBalance.present ||
      !endingBalance.present
    ) {
      throw new StatementParseError('Validation order did not cover every required field');
    }

    const record: StatementRecord = {
      statement_filename: ctx.filename,
      account_number: account.value.canonical_id,
      statement_date: statementDate.value,
      period_start: periodStart.value,
      period_end: periodEnd.value,
      beginning_balance: beginningBalance.value,
      ending_balance: endingBalance.value,
      total_fees: totalFees.present ? totalFees.value : 0,
      important_notes: fields.importantNotes,
      deposits: ctx.transactions.deposits,
      withdrawals: ctx.transactions.withdrawals,
    };

    return { ok: true, record, account: account.value };
  }
}
