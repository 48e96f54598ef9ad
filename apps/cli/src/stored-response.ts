import { StatementResponseSchema, formatContractIssues, validateResponse } from '@ledgerline/types';
import type { AccountRegistry } from '@ledgerline/statement-parser';

/**
 * Problems with a stored response: JSON Schema issues first, then record invariants,
 * then an account number the registry does not hold. Empty when the payload is valid.
 */
export function checkStoredResponse(json: unknown, registry: AccountRegistry): string[] {
  const contract = validateResponse(json);
  if (!contract.valid) {
    return formatContractIssues(contract.errors);
  }

  const parsed = StatementResponseSchema.safeParse(json);
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  }

  if (parsed.data.status === 'success' && !registry.has(parsed.data.data.account_number)) {
    return [`data.account_number: ${parsed.data.data.account_number} is not a known account`];
  }
  return [];
}
