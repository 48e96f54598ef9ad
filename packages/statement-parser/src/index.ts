/**
 * @ledgerline/statement-parser
 *
 * Turns bank statement text into a validated StatementRecord or a typed error.
 */

export { StatementEngine, type StatementEngineOptions, type ProcessResult } from './engine.js';
export * from './registry/index.js';
export * from './extractors/index.js';
export * from './validation/index.js';
export * from './response/index.js';
export * from './batch/index.js';
