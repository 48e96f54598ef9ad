export {
  validateResponse,
  assertValidResponse,
  formatContractIssues,
  getResponseSchema,
  getResponseSchemaPath,
  type ContractValidationResult,
  type ContractValidationIssue,
} from './ajv-validator.js';
