import {
  formatContractIssues,
  validateResponse,
  type ErrorRecord,
  type ErrorResponse,
  type StatementErrorCode,
  type StatementRecord,
  type StatementResponse,
  type SuccessResponse,
} from '@ledgerline/types';
import type { ValidationOutcome } from '../validation/record-validator.js';

export function buildSuccessResponse(data: StatementRecord): SuccessResponse {
  return { status: 'success', data };
}

export function buildErrorResponse(code: StatementErrorCode, message: string): ErrorResponse {
  const error: ErrorRecord = { code, message };
  return { status: 'error', error };
}

/**
 * Wraps a validation outcome in the response envelope and checks it against the JSON
 * Schema. A success payload the schema rejects is replaced by a PARSE_ERROR so that no
 * non-conforming data leaves the engine.
 */
export function buildResponse(outcome: ValidationOutcome): StatementResponse {
  if (!outcome.ok) {
    return buildErrorResponse(outcome.error.code, outcome.error.message);
  }

  const response = buildSuccessResponse(outcome.record);
  const contract = validateResponse(response);
  if (contract.valid) {
    return response;
  }

  const [firstIssue] = formatContractIssues(contract.errors);
  return buildErrorResponse('PARSE_ERROR', `Extracted record violates the response contract: ${firstIssue ?? 'unknown issue'}`);
}

/** Stable JSON text for a response; two-space indentation when `pretty`. */
export function serializeResponse(response: StatementResponse, pretty = true): string {
  return pretty ? JSON.stringify(response, null, 2) : JSON.stringify(response);
}
