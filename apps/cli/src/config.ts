/**
 * CLI configuration: environment defaults and zod validation of option values
 * before they reach the engine.
 */

import { z } from 'zod';
import {
  ConfigError,
  MalformedRowPolicySchema,
  ValidationOrderSchema,
  type EngineSettingsInput,
  type Logger,
} from '@ledgerline/types';
import {
  StatementEngine,
  defaultAccountRegistry,
  loadRegistryFile,
  type AccountRegistry,
} from '@ledgerline/statement-parser';

// Helper to parse boolean env vars
export const envBool = (key: string, defaultVal: boolean, env: NodeJS.ProcessEnv = process.env): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export const envString = (key: string, env: NodeJS.ProcessEnv = process.env): string | undefined => {
  const val = env[key];
  return val === undefined || val === '' ? undefined : val;
};

// A type alias so commander's `optsWithGlobals<T extends OptionValues>()` accepts it
export type GlobalOptions = {
  registry?: string;
  malformedRows?: string;
  validationOrder?: string;
  verbose: boolean;
};

const CliSettingsSchema = z.object({
  malformedRows: MalformedRowPolicySchema.default('skip'),
  validationOrder: z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? undefined
        : value.split(',').map((code) => code.trim().toUpperCase())
    )
    .pipe(ValidationOrderSchema.optional()),
});

/** Turns raw CLI/env option strings into engine settings, or throws ConfigError. */
export function resolveEngineSettings(options: Pick<GlobalOptions, 'malformedRows' | 'validationOrder'>): EngineSettingsInput {
  const parsed = CliSettingsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? `--${String(issue.path[0])}: ` : '';
    throw new ConfigError(`Invalid option ${where}${issue?.message ?? 'unknown issue'}`, parsed.error.issues);
  }

  return { malformedRowPolicy: parsed.data.malformedRows, validationOrder: parsed.data.validationOrder };
}

/** The `--registry` file when one is given, otherwise the built-in accounts. */
export async function loadRegistry(options: Pick<GlobalOptions, 'registry'>): Promise<AccountRegistry> {
  return options.registry !== undefined ? await loadRegistryFile(options.registry) : defaultAccountRegistry;
}

export async function createEngine(options: GlobalOptions, logger: Logger): Promise<StatementEngine> {
  const settings = resolveEngineSettings(options);
  const registry = await loadRegistry(options);

  logger.debug(`Registry: ${options.registry ?? 'built-in'} (${registry.size} accounts)`);
  logger.debug(`Malformed rows: ${settings.malformedRowPolicy ?? 'skip'}`);

  return new StatementEngine({ ...settings, registry, logger });
}
