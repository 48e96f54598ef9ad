/**
 * Tests for balance reconciliation.
 */
import { describe, it, expect } from 'vitest';
import type { StatementRecord } from '@ledgerline/types';
import { validateReconciliation, reconcileStatement, describeReconciliation } from '@ledgerline/statement-parser';

describe('validateReconciliation', () => {
  it('should pass when balances reconcile exactly', () => {
    const result = validateReconciliation(1000, 1200, 500, 300);

    expect(result.passed).toBe(true);
    expect(result.expectedEndingBalance).toBe(1200);
    expect(result.difference).toBe(0);
  });

  it('should pass at the tolerance boundary', () => {
    const result = validateReconciliation(1000, 1200.01, 500, 300, { tolerance: 0.01 });

    expect(result.passed).toBe(true);
    expect(result.difference).toBe(0.01);
  });

  it('should fail when outside tolerance', () => {
    const result = validateReconciliation(1000, 1250, 500, 300, { tolerance: 0.01 });

    expect(result.passed).toBe(false);
    expect(result.difference).toBe(50);
  });

  it('should not drift on cent arithmetic', () => {
    const result = validateReconciliation(0.1, 0.3, 0.2, 0, { tolerance: 0 });
    expect(result.passed).toBe(true);
  });

  it('should include breakdown in result', () => {
    const result = validateReconciliation(1000, 1200, 500, 300);

    expect(result.breakdown).toEqual({ beginningBalance: 1000, totalDeposits: 500, totalWithdrawals: 300 });
  });
});

describe('reconcileStatement', () => {
  it('should sum deposits and withdrawals of a record', () => {
    const record: StatementRecord = {
      statement_filename: 'jan.pdf',
      account_number: '000000954291944',
      statement_date: '01/31/2023',
      period_start: '01/01/2023',
      period_end: '01/31/2023',
      beginning_balance: 5000,
      ending_balance: 13571.27,
      total_fees: 0,
      important_notes: '',
      deposits: [{ date: '01/05/2023', description: 'Transfer', amount: 10000 }],
      withdrawals: [
        { date: '01/18/2023', description: 'Wire', amount: 1428.73, tax_category: 'International Subcontractors' },
      ],
    };

    const result = reconcileStatement(record);
    expect(result.passed).toBe(true);
    expect(result.expectedEndingBalance).toBe(13571.27);
  });
});

describe('describeReconciliation', () => {
  it('should show the arithmetic when balances reconcile', () => {
    expect(describeReconciliation(validateReconciliation(5000, 13571.27, 10000, 1428.73))).toBe(
      'Balances reconcile: $5,000.00 + $10,000.00 - $1,428.73 = $13,571.27'
    );
  });

  it('should show the statement balance and the gap when they do not', () => {
    expect(describeReconciliation(validateReconciliation(100, 90, 0, 0))).toBe(
      'Balances do not reconcile: $100.00 + $0.00 - $0.00 = $100.00, statement shows $90.00 (off by $10.00, tolerance $0.01)'
    );
  });
});
