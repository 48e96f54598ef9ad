export {
  USDateSchema,
  SanitizedTextSchema,
  AmountSchema,
  TaxCategorySchema,
  StatementErrorCodeSchema,
  AccountReferenceSchema,
  AccountRegistryFileSchema,
  DepositSchema,
  WithdrawalSchema,
  StatementRecordSchema,
  ErrorRecordSchema,
  StatementResponseSchema,
  MalformedRowPolicySchema,
  ValidationOrderSchema,
  EngineSettingsSchema,
  DEFAULT_VALIDATION_ORDER,
} from './statement.js';

export type { AccountRegistryFile, EngineSettings, EngineSettingsInput } from './statement.js';
