/**
 * Ordered tax-category rules. Lower priority runs first and the first match wins, so the
 * order encodes business precedence: a "PayPal loan transfer" is an International
 * Subcontractors payment, not a Loan Payment or a Transfer.
 */

import type { TaxCategory } from '@ledgerline/types';

export interface TaxRule {
  id: string;
  priority: number;
  patterns: RegExp[];
  category: TaxCategory;
}

function createRule(id: string, priority: number, patterns: RegExp[], category: TaxCategory): TaxRule {
  return { id, priority, patterns, category };
}

const rules: TaxRule[] = [
  createRule('intl-paypal', 100, [/paypal/i, /\binternational\s+wire\b/i, /\bintl\s+wire\b/i], 'International Subcontractors'),
  // Substring tests: bank descriptors run words together ("SALESTAX", "TAXPAYMENT")
  createRule('tax-payment', 200, [/irs/i, /tax/i, /\beftps\b/i], 'Tax Payment'),
  createRule('loan-payment', 300, [/loan/i], 'Loan Payment'),
  createRule('utility-payment', 400, [/utilit(?:y|ies)/i, /electric/i, /water/i, /gas\s+bill/i], 'Utility Payment'),
  createRule('transfer', 500, [/transfer/i], 'Transfer'),
  createRule(
    'professional-services',
    600,
    [/consult/i, /\blegal\b/i, /accounting/i, /\battorney/i, /\blaw\s+(?:firm|office)/i, /\bcpa\b/i, /bookkeep/i],
    'Professional Services'
  ),
].sort((a, b) => a.priority - b.priority);

export const TAX_RULES: readonly TaxRule[] = rules;

export const DEFAULT_TAX_CATEGORY: TaxCategory = 'Domestic Business Expense';
