export { TAX_CATEGORIES, ERROR_CODES } from './output.js';
export type {
  USDate,
  TaxCategory,
  StatementErrorCode,
  AccountReference,
  Deposit,
  Withdrawal,
  StatementRecord,
  ErrorRecord,
  SuccessResponse,
  ErrorResponse,
  StatementResponse,
  ExtractedField,
  MalformedRowPolicy,
  TransactionKind,
  DocumentWarning,
} from './output.js';
