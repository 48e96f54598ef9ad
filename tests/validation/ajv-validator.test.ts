import { describe, it, expect } from 'vitest';
import {
  validateResponse,
  assertValidResponse,
  formatContractIssues,
  getResponseSchema,
  ContractViolationError,
  type StatementResponse,
} from '@ledgerline/types';

const success: StatementResponse = {
  status: 'success',
  data: {
    statement_filename: 'jan.pdf',
    account_number: '000000954291944',
    statement_date: '01/31/2023',
    period_start: '01/01/2023',
    period_end: '01/31/2023',
    beginning_balance: 5000,
    ending_balance: 13571.27,
    total_fees: 0,
    important_notes: '',
    deposits: [{ date: '01/05/2023', description: 'Online Transfer', amount: 10000 }],
    withdrawals: [
      {
        date: '01/18/2023',
        description: 'Online International Wire Transfer',
        amount: 1428.73,
        tax_category: 'International Subcontractors',
      },
    ],
  },
};

describe('validateResponse', () => {
  it('should accept a well-formed success payload', () => {
    expect(validateResponse(success)).toEqual({ valid: true, errors: [] });
  });

  it('should accept a well-formed error payload', () => {
    expect(validateResponse({ status: 'error', error: { code: 'MISSING_BALANCE', message: 'x' } }).valid).toBe(true);
  });

  it('should reject a date that does not exist', () => {
    const payload = { ...success, data: { ...success.data, statement_date: '02/30/2023' } };
    const result = validateResponse(payload);
    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.path === '/data/statement_date' && e.keyword === 'format')).toBe(true);
  });

  it('should reject amounts with more than two decimals', () => {
    const payload = { ...success, data: { ...success.data, total_fees: 1.005 } };
    expect(validateResponse(payload).valid).toBe(false);
  });

  it('should reject punctuation in descriptions', () => {
    const payload = {
      ...success,
      data: { ...success.data, deposits: [{ date: '01/05/2023', description: 'Transfer #1', amount: 1 }] },
    };
    expect(validateResponse(payload).valid).toBe(false);
  });

  it('should reject unknown tax categories and error codes', () => {
    const withdrawal = { date: '01/18/2023', description: 'Coffee', amount: 3, tax_category: 'Meals' };
    expect(validateResponse({ ...success, data: { ...success.data, withdrawals: [withdrawal] } }).valid).toBe(false);
    expect(validateResponse({ status: 'error', error: { code: 'TIMEOUT', message: 'x' } }).valid).toBe(false);
  });

  it('should reject payloads carrying both data and error', () => {
    expect(validateResponse({ ...success, error: { code: 'PARSE_ERROR', message: 'x' } }).valid).toBe(false);
  });

  it('should reject extra fields on the record', () => {
    expect(validateResponse({ ...success, data: { ...success.data, bank: 'Chase' } }).valid).toBe(false);
  });
});

describe('assertValidResponse', () => {
  it('should throw ContractViolationError for invalid payloads', () => {
    expect(() => assertValidResponse({ status: 'unknown' })).toThrow(ContractViolationError);
  });

  it('should not throw for valid payloads', () => {
    expect(() => assertValidResponse(success)).not.toThrow();
  });
});

describe('formatContractIssues', () => {
  it('should prefix each issue with its keyword and path', () => {
    expect(formatContractIssues([{ path: '/data', message: 'must be object', keyword: 'type', params: {} }])).toEqual([
      '[type] /data: must be object',
    ]);
  });
});

describe('getResponseSchema', () => {
  it('should load the draft-07 schema', () => {
    expect(getResponseSchema()).toMatchObject({ title: 'Statement Extraction Response' });
  });
});
