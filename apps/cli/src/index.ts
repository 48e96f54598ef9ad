#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { basename, dirname, resolve } from 'path';
import {
  ENGINE_VERSION,
  createConsoleLogger,
  errorMessage,
  type Logger,
} from '@ledgerline/types';
import { classifyTransactionWithRule } from '@ledgerline/categorizer';
import {
  describeReconciliation,
  describeSkip,
  loadFilenameMap,
  processBatch,
  reconcileStatement,
  scanStatementInputs,
  serializeResponse,
  sourceFilenameFor,
  type ProcessError,
} from '@ledgerline/statement-parser';
import { createEngine, envBool, envString, loadRegistry, type GlobalOptions } from './config.js';
import { checkStoredResponse } from './stored-response.js';

const EXIT_USAGE = 1;
const EXIT_ERROR_PAYLOAD = 2;

const program = new Command();

program
  .name('ledgerline')
  .description('Extract validated statement records from bank statement text')
  .version(ENGINE_VERSION)
  .option('--registry <file>', 'Account registry JSON file (default: built-in accounts)', envString('LEDGERLINE_REGISTRY_FILE'))
  .option('--malformed-rows <policy>', 'Malformed transaction rows: skip or reject', envString('LEDGERLINE_MALFORMED_ROWS') ?? 'skip')
  .option(
    '--validation-order <codes>',
    'Comma-separated error codes in the order they are checked',
    envString('LEDGERLINE_VALIDATION_ORDER')
  )
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGERLINE_VERBOSE', false));

function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Runs a command body, turning thrown errors into `[ERROR]` output and exit code 1.
 */
async function run(command: Command, body: (logger: Logger, options: GlobalOptions) => Promise<void>): Promise<void> {
  const options = globalOptions(command);
  const logger = createConsoleLogger({ verbose: options.verbose });
  try {
    await body(logger, options);
  } catch (error) {
    logger.error(errorMessage(error));
    if (options.verbose && error instanceof Error && error.stack !== undefined) {
      console.error(error.stack);
    }
    process.exitCode = EXIT_USAGE;
  }
}

program
  .command('parse')
  .description('Parse one statement text file into a JSON response')
  .argument('<text-file>', 'Statement text file')
  .option('--filename <name>', 'Source statement file name (default: <text-file stem>.pdf)')
  .option('-o, --out <file>', 'Output file path (default: stdout)')
  .option('--pretty', 'Pretty-print JSON output', envBool('LEDGERLINE_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .action(async (textFile: string, cmdOptions: { filename?: string; out?: string; pretty: boolean }, command: Command) => {
    await run(command, async (logger, options) => {
      const engine = await createEngine(options, logger);
      const filePath = resolve(textFile);
      const text = await readFile(filePath, 'utf-8');
      const sourceFilename = cmdOptions.filename ?? sourceFilenameFor(basename(filePath));

      logger.debug(`Processing ${filePath} as ${sourceFilename}`);
      const { response } = engine.processWithDiagnostics(text, sourceFilename);
      if (response.status === 'success') {
        logger.debug(
          describeReconciliation(reconcileStatement(response.data, { tolerance: engine.settings.reconciliationTolerance }))
        );
      }
      const json = serializeResponse(response, cmdOptions.pretty);

      if (cmdOptions.out !== undefined) {
        const outPath = resolve(cmdOptions.out);
        await mkdir(dirname(outPath), { recursive: true });
        await writeFile(outPath, `${json}\n`, 'utf-8');
        logger.info(`Output written to: ${outPath}`);
      } else {
        console.log(json);
      }

      if (response.status === 'error') {
        process.exitCode = EXIT_ERROR_PAYLOAD;
      }
    });
  });

program
  .command('batch')
  .description('Parse every statement text file in a directory')
  .requiredOption('-d, --input-dir <directory>', 'Directory containing statement text files', envString('LEDGERLINE_INPUT_DIR'))
  .option('--out-dir <directory>', 'Directory for MM-YYYY.json outputs', envString('LEDGERLINE_OUTPUT_DIR'))
  .option('--name-map <file>', 'JSON object mapping text file names to source .pdf names')
  .option('--test', 'Process only the first file', false)
  .option('--pretty', 'Pretty-print JSON output', envBool('LEDGERLINE_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .action(
    async (
      cmdOptions: { inputDir: string; outDir?: string; nameMap?: string; test: boolean; pretty: boolean },
      command: Command
    ) => {
      await run(command, async (logger, options) => {
        const dirPath = resolve(cmdOptions.inputDir);
        logger.info(`Batch mode: scanning ${dirPath}`);

        const filenameMap = cmdOptions.nameMap !== undefined ? await loadFilenameMap(cmdOptions.nameMap) : {};
        const scan = await scanStatementInputs(dirPath, filenameMap);
        for (const skip of scan.skipped) {
          logger.debug(`Skipped ${describeSkip(skip)}`);
        }
        for (const name of scan.unmatchedMapEntries) {
          logger.warn(`Name map entry ${name} has no statement text file in ${scan.directoryPath}`);
        }
        if (scan.inputs.length === 0) {
          logger.error('No statement text files found in directory');
          process.exitCode = EXIT_USAGE;
          return;
        }

        const engine = await createEngine(options, logger);
        if (cmdOptions.test) {
          logger.info('Test mode: processing only the first file');
        }

        const result = await processBatch(engine, scan.inputs, {
          outputDir: cmdOptions.outDir !== undefined ? resolve(cmdOptions.outDir) : undefined,
          limit: cmdOptions.test ? 1 : undefined,
          pretty: cmdOptions.pretty,
          onProgress: (current, total, filename) => {
            logger.info(`Parsing ${current}/${total}: ${filename}`);
          },
          onError: (error: ProcessError) => {
            logger.error(`Failed to process ${error.filename}: ${error.error}`);
          },
        });

        for (const file of result.results) {
          const detail = file.response.status === 'error' ? ` ${file.response.error.code}` : '';
          const target = file.outputPath !== null ? ` -> ${file.outputPath}` : '';
          console.error(`  ${file.fileName}: ${file.status}${detail}${target}`);
        }

        console.error('');
        console.error('=== Batch Processing Summary ===');
        console.error(`Files found:      ${result.summary.totalFilesFound}`);
        console.error(`Files processed:  ${result.summary.filesProcessed}`);
        console.error(`Succeeded:        ${result.summary.succeeded}`);
        console.error(`Error payloads:   ${result.summary.errorPayloads}`);
        console.error(`Unreadable:       ${result.summary.unreadable}`);
        console.error('================================');

        if (result.summary.unreadable > 0) {
          process.exitCode = EXIT_USAGE;
        } else if (result.summary.errorPayloads > 0) {
          process.exitCode = EXIT_ERROR_PAYLOAD;
        }
      });
    }
  );

program
  .command('accounts')
  .description('List the accounts in the registry')
  .option('--json', 'Print the registry as JSON', false)
  .action(async (cmdOptions: { json: boolean }, command: Command) => {
    await run(command, async (_logger, options) => {
      const registry = await loadRegistry(options);

      if (cmdOptions.json) {
        console.log(JSON.stringify({ accounts: registry.list() }, null, 2));
        return;
      }
      for (const ref of registry.list()) {
        console.log(`${ref.canonical_id.padEnd(16)} ${ref.company_name.padEnd(32)} ${ref.bank_name}`);
      }
    });
  });

program
  .command('classify')
  .description('Show the tax category for a withdrawal description')
  .argument('<description...>', 'Withdrawal description')
  .action(async (words: string[], _cmdOptions: Record<string, never>, command: Command) => {
    await run(command, async (_logger, options) => {
      const result = classifyTransactionWithRule(words.join(' '));
      console.log(options.verbose ? `${result.category}\t${result.rationale}` : result.category);
    });
  });

program
  .command('check')
  .description('Validate a stored JSON response against the response contract')
  .argument('<json-file>', 'Response JSON file')
  .action(async (jsonFile: string, _cmdOptions: Record<string, never>, command: Command) => {
    await run(command, async (logger, options) => {
      const content = await readFile(resolve(jsonFile), 'utf-8');
      const json: unknown = JSON.parse(content);

      const issues = checkStoredResponse(json, await loadRegistry(options));
      if (issues.length > 0) {
        for (const issue of issues) {
          logger.error(issue);
        }
        process.exitCode = EXIT_ERROR_PAYLOAD;
        return;
      }

      logger.info(`${jsonFile}: valid response`);
    });
  });

await program.parseAsync(process.argv);
