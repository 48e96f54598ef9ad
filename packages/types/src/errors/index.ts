/**
 * Error classes used inside the engine and the CLI.
 *
 * None of these cross the engine boundary: the engine converts anything thrown
 * while processing a document into a PARSE_ERROR payload.
 */

export enum LedgerlineErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  REGISTRY_ERROR = 'REGISTRY_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CONTRACT_VIOLATION = 'CONTRACT_VIOLATION',
}

export class LedgerlineError extends Error {
  constructor(
    message: string,
    public readonly code: LedgerlineErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'LedgerlineError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A document whose structure could not be read. */
export class StatementParseError extends LedgerlineError {
  constructor(message: string, details?: unknown) {
    super(message, LedgerlineErrorCode.PARSE_ERROR, details);
    this.name = 'StatementParseError';
  }
}

/** An account registry that violates its own invariants (duplicate or malformed ids). */
export class RegistryError extends LedgerlineError {
  constructor(message: string, details?: unknown) {
    super(message, LedgerlineErrorCode.REGISTRY_ERROR, details);
    this.name = 'RegistryError';
  }
}

export class ConfigError extends LedgerlineError {
  constructor(message: string, details?: unknown) {
    super(message, LedgerlineErrorCode.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/** A payload that does not satisfy the response JSON Schema. */
export class ContractViolationError extends LedgerlineError {
  constructor(message: string, details?: unknown) {
    super(message, LedgerlineErrorCode.CONTRACT_VIOLATION, details);
    this.name = 'ContractViolationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
