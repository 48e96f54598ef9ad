/**
 * Balance reconciliation for assembled statements.
 * Verifies that: beginning_balance + deposits - withdrawals ≈ ending_balance
 *
 * A mismatch never changes the response; the engine reports it as a warning.
 */

import {
  centsToAmount,
  DEFAULT_RECONCILIATION_TOLERANCE,
  formatCurrency,
  sumAmounts,
  toCents,
  type StatementRecord,
} from '@ledgerline/types';

export interface ReconciliationResult {
  /** Whether the reconciliation passed within tolerance */
  passed: boolean;
  expectedEndingBalance: number;
  actualEndingBalance: number;
  difference: number;
  tolerance: number;
  breakdown: {
    beginningBalance: number;
    totalDeposits: number;
    totalWithdrawals: number;
  };
}

export interface ReconciliationOptions {
  /** Tolerance for balance comparison (default: 0.01) */
  tolerance?: number;
}

/**
 * Formula: beginning_balance + deposits - withdrawals = ending_balance
 *
 * All arithmetic runs in cents.
 */
export function validateReconciliation(
  beginningBalance: number,
  endingBalance: number,
  totalDeposits: number,
  totalWithdrawals: number,
  options: ReconciliationOptions = {}
): ReconciliationResult {
  const { tolerance = DEFAULT_RECONCILIATION_TOLERANCE } = options;

  const expectedCents = toCents(beginningBalance) + toCents(totalDeposits) - toCents(totalWithdrawals);
  const differenceCents = Math.abs(expectedCents - toCents(endingBalance));

  return {
    passed: differenceCents <= toCents(tolerance),
    expectedEndingBalance: centsToAmount(expectedCents),
    actualEndingBalance: endingBalance,
    difference: centsToAmount(differenceCents),
    tolerance,
    breakdown: {
      beginningBalance,
      totalDeposits,
      totalWithdrawals,
    },
  };
}

export function reconcileStatement(record: StatementRecord, options: ReconciliationOptions = {}): ReconciliationResult {
  return validateReconciliation(
    record.beginning_balance,
    record.ending_balance,
    sumAmounts(record.deposits.map((d) => d.amount)),
    sumAmounts(record.withdrawals.map((w) => w.amount)),
    options
  );
}

/**
 * One-line account of the balance arithmetic, e.g.
 * `Balances reconcile: $5,000.00 + $10,000.00 - $1,428.73 = $13,571.27`.
 */
export function describeReconciliation(result: ReconciliationResult): string {
  const { beginningBalance, totalDeposits, totalWithdrawals } = result.breakdown;
  const arithmetic = `${formatCurrency(beginningBalance)} + ${formatCurrency(totalDeposits)} - ${formatCurrency(totalWithdrawals)} = ${formatCurrency(result.expectedEndingBalance)}`;
  if (result.passed) {
    return `Balances reconcile: ${arithmetic}`;
  }
  return `Balances do not reconcile: ${arithmetic}, statement shows ${formatCurrency(result.actualEndingBalance)} (off by ${formatCurrency(result.difference)}, tolerance ${formatCurrency(result.tolerance)})`;
}
