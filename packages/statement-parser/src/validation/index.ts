export {
  RecordValidator,
  normalizeSourceFilename,
  isValidSourceFilename,
  type RecordValidatorOptions,
  type ValidationInput,
  type ValidationOutcome,
} from './record-validator.js';
export {
  validateReconciliation,
  reconcileStatement,
  describeReconciliation,
  type ReconciliationResult,
  type ReconciliationOptions,
} from './reconciliation.js';
