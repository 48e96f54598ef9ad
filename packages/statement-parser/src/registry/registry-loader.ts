import { readFile } from 'fs/promises';
import { RegistryError, errorMessage } from '@ledgerline/types';
import { AccountRegistry } from './account-registry.js';

/**
 * Reads a JSON registry file of the form `{ "accounts": [AccountReference, ...] }`.
 */
export async function loadRegistryFile(filePath: string): Promise<AccountRegistry> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new RegistryError(`Cannot read registry file ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new RegistryError(`Registry file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return AccountRegistry.fromJSON(json);
}
