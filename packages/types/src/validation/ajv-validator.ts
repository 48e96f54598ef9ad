/**
 * AJV-based JSON Schema validation of the response contract.
 * The schema lives in `schemas/statement-response.schema.json` at the package root.
 */

import Ajv from 'ajv';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { StatementResponse } from '../types/output.js';
import { isValidUSDate } from '../utils/date.js';
import { ContractViolationError } from '../errors/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
  params: Record<string, unknown>;
}

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: AjvErrorObject[] | null;
}

interface AjvInstance {
  addFormat: (name: string, format: (value: string) => boolean) => AjvInstance;
  compile: (schema: object) => AjvValidateFunction;
}

export interface ContractValidationResult {
  valid: boolean;
  errors: ContractValidationIssue[];
}

export interface ContractValidationIssue {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

let compiledValidator: AjvValidateFunction | null = null;
let cachedSchema: object | null = null;

export function getResponseSchemaPath(): string {
  return resolve(__dirname, '../../schemas/statement-response.schema.json');
}

export function getResponseSchema(): object {
  if (cachedSchema === null) {
    const parsed: unknown = JSON.parse(readFileSync(getResponseSchemaPath(), 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null) {
      throw new ContractViolationError(`Response schema at ${getResponseSchemaPath()} is not a JSON object`);
    }
    cachedSchema = parsed;
  }
  return cachedSchema;
}

function getValidator(): AjvValidateFunction {
  if (compiledValidator === null) {
    const ajv = new (Ajv as unknown as new (opts: object) => AjvInstance)({
      allErrors: true,
      multipleOfPrecision: 6,
    });
    ajv.addFormat('us-date', isValidUSDate);
    compiledValidator = ajv.compile(getResponseSchema());
  }
  return compiledValidator;
}

export function validateResponse(output: unknown): ContractValidationResult {
  const validate = getValidator();
  const valid = validate(output);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ContractValidationIssue[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function assertValidResponse(output: unknown): asserts output is StatementResponse {
  const result = validateResponse(output);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message}`)
      .join('\n');
    throw new ContractViolationError(`Response does not match the contract:\n${errorMessages}`, result.errors);
  }
}

export function formatContractIssues(errors: ContractValidationIssue[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
