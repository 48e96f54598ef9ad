import { sanitizeText, type TaxCategory } from '@ledgerline/types';
import { TAX_RULES, DEFAULT_TAX_CATEGORY, type TaxRule } from './tax-rules.js';

export interface ClassificationResult {
  category: TaxCategory;
  ruleId: string | null;
  rationale: string;
}

export interface TransactionClassifier {
  classify(description: string): TaxCategory;
  classifyWithRule(description: string): ClassificationResult;
}

/**
 * Builds a classifier over an ordered rule list. Rules are re-sorted by priority so a
 * caller-supplied list behaves the same as the built-in one.
 */
export function createClassifier(
  rules: readonly TaxRule[] = TAX_RULES,
  fallback: TaxCategory = DEFAULT_TAX_CATEGORY
): TransactionClassifier {
  const ordered = [...rules].sort((a, b) => a.priority - b.priority);

  const classifyWithRule = (description: string): ClassificationResult => {
    const normalizedDesc = sanitizeText(description).toLowerCase();

    for (const rule of ordered) {
      const matched = rule.patterns.some((p) => p.test(normalizedDesc));
      if (matched) {
        return {
          category: rule.category,
          ruleId: rule.id,
          rationale: `Matched rule: ${rule.id}`,
        };
      }
    }

    return {
      category: fallback,
      ruleId: null,
      rationale: 'No matching rule found',
    };
  };

  return {
    classify: (description) => classifyWithRule(description).category,
    classifyWithRule,
  };
}

const defaultClassifier = createClassifier();

export function classifyTransaction(description: string): TaxCategory {
  return defaultClassifier.classify(description);
}

export function classifyTransactionWithRule(description: string): ClassificationResult {
  return defaultClassifier.classifyWithRule(description);
}
