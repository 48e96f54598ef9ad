import { describe, it, expect } from 'vitest';
import { createClassifier } from '@ledgerline/categorizer';
import { buildTransactions, resolveRowDate, splitTransactionRows, type TransactionContext } from '@ledgerline/statement-parser';

const context: TransactionContext = {
  fallbackYear: 2023,
  period: { start: '12/15/2022', end: '01/14/2023' },
  classifier: createClassifier(),
};

describe('resolveRowDate', () => {
  it('should place month/day rows inside the statement period', () => {
    expect(resolveRowDate('12/20', context)).toBe('12/20/2022');
    expect(resolveRowDate('1/3', context)).toBe('01/03/2023');
  });

  it('should expand two-digit years', () => {
    expect(resolveRowDate('01/03/23', context)).toBe('01/03/2023');
  });

  it('should keep full dates as they are', () => {
    expect(resolveRowDate('06/30/2021', context)).toBe('06/30/2021');
  });

  it('should reject impossible dates', () => {
    expect(resolveRowDate('02/30/2023', context)).toBeNull();
    expect(resolveRowDate('13/01', context)).toBeNull();
  });

  it('should reject month/day rows when no year is known', () => {
    expect(resolveRowDate('01/03', { fallbackYear: null })).toBeNull();
  });
});

describe('buildTransactions', () => {
  it('should build deposits and classified withdrawals', () => {
    const rows = splitTransactionRows(
      ['DEPOSITS', '12/20 Client Payment #1041 1,200.00', 'WITHDRAWALS', '01/10 PayPal Loan Payment 215.00'].join('\n')
    );

    expect(buildTransactions(rows, context)).toEqual({
      deposits: [{ date: '12/20/2022', description: 'Client Payment 1041', amount: 1200 }],
      withdrawals: [
        { date: '01/10/2023', description: 'PayPal Loan Payment', amount: 215, tax_category: 'International Subcontractors' },
      ],
      malformed: [],
    });
  });

  it('should report rows missing an amount, a description or a valid date', () => {
    const rows = splitTransactionRows(
      ['FEES', '01/02 Wire Fee', '01/03 *** 20.00', '02/30 Late Fee 5.00', '01/04 Returned Item (35.00)'].join('\n')
    );
    const result = buildTransactions(rows, context);

    expect(result.withdrawals).toEqual([]);
    expect(result.malformed).toEqual([
      { lineIndex: 1, line: '01/02 Wire Fee', reason: 'missing amount' },
      { lineIndex: 2, line: '01/03 *** 20.00', reason: 'missing description' },
      { lineIndex: 3, line: '02/30 Late Fee 5.00', reason: 'invalid date "02/30"' },
      { lineIndex: 4, line: '01/04 Returned Item (35.00)', reason: 'invalid amount "(35.00)"' },
    ]);
  });

  it('should use the injected classifier', () => {
    const classifier = createClassifier([{ id: 'all', priority: 1, patterns: [/./], category: 'Transfer' }]);
    const rows = splitTransactionRows('WITHDRAWALS\n01/05 Anything 1.00');
    expect(buildTransactions(rows, { ...context, classifier }).withdrawals[0]?.tax_category).toBe('Transfer');
  });
});
