export { TAX_RULES, DEFAULT_TAX_CATEGORY, type TaxRule } from './tax-rules.js';
export {
  createClassifier,
  classifyTransaction,
  classifyTransactionWithRule,
  type ClassificationResult,
  type TransactionClassifier,
} from './classifier.js';
