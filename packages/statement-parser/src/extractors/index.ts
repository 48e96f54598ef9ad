export {
  present,
  absent,
  extractDate,
  extractAmount,
  extractText,
  extractDescription,
  extractField,
  type FieldRecognizer,
} from './field-extractors.js';
export {
  extractStatementFields,
  extractPeriod,
  extractCompanyHint,
  extractImportantNotes,
  type StatementFields,
} from './statement-fields.js';
export {
  splitTransactionRows,
  detectSectionHeader,
  isSectionBoundary,
  type TransactionRow,
} from './transaction-sections.js';
export {
  buildTransactions,
  resolveRowDate,
  type MalformedRow,
  type TransactionExtraction,
  type TransactionContext,
} from './transactions.js';
