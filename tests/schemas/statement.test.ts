import { describe, it, expect } from 'vitest';
import {
  StatementRecordSchema,
  StatementResponseSchema,
  EngineSettingsSchema,
  ValidationOrderSchema,
  DEFAULT_VALIDATION_ORDER,
} from '@ledgerline/types';

const record = {
  statement_filename: 'jan.pdf',
  account_number: '000000954291944',
  statement_date: '01/31/2023',
  period_start: '01/01/2023',
  period_end: '01/31/2023',
  beginning_balance: 0,
  ending_balance: 0,
  total_fees: 0,
  important_notes: '',
  deposits: [],
  withdrawals: [],
};

describe('StatementRecordSchema', () => {
  it('should accept a consistent record', () => {
    expect(StatementRecordSchema.safeParse(record).success).toBe(true);
  });

  it('should flag a period that ends before it starts', () => {
    const result = StatementRecordSchema.safeParse({ ...record, period_start: '02/01/2023', statement_date: '02/01/2023' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((issue) => issue.message)).toContain('period_end is before period_start');
  });

  it('should flag a statement date outside the period', () => {
    const result = StatementRecordSchema.safeParse({ ...record, statement_date: '02/15/2023' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.path).toEqual(['statement_date']);
  });

  it('should reject a filename with a directory', () => {
    expect(StatementRecordSchema.safeParse({ ...record, statement_filename: 'in/jan.pdf' }).success).toBe(false);
  });

  it('should reject negative amounts and a third decimal', () => {
    expect(StatementRecordSchema.safeParse({ ...record, total_fees: -1 }).success).toBe(false);
    expect(StatementRecordSchema.safeParse({ ...record, ending_balance: 10.001 }).success).toBe(false);
  });
});

describe('StatementResponseSchema', () => {
  it('should discriminate on status', () => {
    expect(StatementResponseSchema.safeParse({ status: 'success', data: record }).success).toBe(true);
    expect(StatementResponseSchema.safeParse({ status: 'error', error: { code: 'PARSE_ERROR', message: 'bad' } }).success).toBe(
      true
    );
    expect(StatementResponseSchema.safeParse({ status: 'error', data: record }).success).toBe(false);
  });
});

describe('EngineSettingsSchema', () => {
  it('should fill in defaults', () => {
    expect(EngineSettingsSchema.parse({})).toEqual({
      malformedRowPolicy: 'skip',
      validationOrder: [...DEFAULT_VALIDATION_ORDER],
      reconciliationTolerance: 0.01,
    });
  });

  it('should reject an unknown malformed row policy', () => {
    expect(EngineSettingsSchema.safeParse({ malformedRowPolicy: 'ignore' }).success).toBe(false);
  });
});

describe('ValidationOrderSchema', () => {
  it('should require every code exactly once', () => {
    expect(ValidationOrderSchema.safeParse([...DEFAULT_VALIDATION_ORDER].reverse()).success).toBe(true);
    expect(
      ValidationOrderSchema.safeParse(['PARSE_ERROR', 'PARSE_ERROR', 'INVALID_ACCOUNT', 'MISSING_BALANCE', 'MISSING_PERIOD_DATES'])
        .success
    ).toBe(false);
    expect(ValidationOrderSchema.safeParse(['PARSE_ERROR']).success).toBe(false);
  });
});
