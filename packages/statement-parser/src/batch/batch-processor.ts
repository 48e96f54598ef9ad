import { mkdir, readFile, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { errorMessage, type DocumentWarning, type StatementResponse } from '@ledgerline/types';
import type { StatementEngine } from '../engine.js';
import { serializeResponse } from '../response/response-builder.js';
import type { StatementInput } from './input-scanner.js';

export interface ProcessError {
  filename: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchFileResult {
  fileName: string;
  sourceFilename: string;
  status: StatementResponse['status'];
  response: StatementResponse;
  warnings: DocumentWarning[];
  /** Null when no output directory was given. */
  outputPath: string | null;
}

export interface BatchProcessResult {
  results: BatchFileResult[];
  processErrors: ProcessError[];
  summary: {
    totalFilesFound: number;
    filesProcessed: number;
    succeeded: number;
    errorPayloads: number;
    unreadable: number;
  };
}

export interface BatchProcessOptions {
  outputDir?: string;
  /** Process only the first `limit` files (test mode uses 1). */
  limit?: number;
  pretty?: boolean;
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ProcessError) => void;
}

/**
 * Output file name for a response: `MM-YYYY.json` from the statement date of a
 * success payload, otherwise the input stem.
 */
export function outputNameFor(fileName: string, response: StatementResponse): string {
  if (response.status === 'success') {
    const [month, , year] = response.data.statement_date.split('/');
    if (month !== undefined && year !== undefined) {
      return `${month}-${year}.json`;
    }
  }
  return `${basename(fileName, extname(fileName))}.json`;
}

function uniqueName(name: string, taken: Set<string>): string {
  if (!taken.has(name)) {
    taken.add(name);
    return name;
  }
  const stem = name.slice(0, -extname(name).length);
  let counter = 2;
  while (taken.has(`${stem}-${counter}.json`)) counter++;
  const unique = `${stem}-${counter}.json`;
  taken.add(unique);
  return unique;
}

/**
 * Runs the engine over each file in order and optionally writes one JSON payload per
 * file. Processing is sequential so output names are assigned deterministically.
 * Files that cannot be read or written are collected as process errors; every file
 * that was read produces a payload.
 */
export async function processBatch(
  engine: StatementEngine,
  files: StatementInput[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const selected = options.limit !== undefined ? files.slice(0, Math.max(0, options.limit)) : files;
  const results: BatchFileResult[] = [];
  const processErrors: ProcessError[] = [];
  const takenNames = new Set<string>();

  if (options.outputDir !== undefined) {
    await mkdir(options.outputDir, { recursive: true });
  }

  for (let i = 0; i < selected.length; i++) {
    const file = selected[i];
    if (file === undefined) continue;

    options.onProgress?.(i + 1, selected.length, file.fileName);

    try {
      const text = await readFile(file.filePath, 'utf-8');
      const { response, warnings } = engine.processWithDiagnostics(text, file.sourceFilename);

      let outputPath: string | null = null;
      if (options.outputDir !== undefined) {
        outputPath = join(options.outputDir, uniqueName(outputNameFor(file.fileName, response), takenNames));
        await writeFile(outputPath, `${serializeResponse(response, options.pretty ?? true)}\n`, 'utf-8');
      }

      results.push({
        fileName: file.fileName,
        sourceFilename: file.sourceFilename,
        status: response.status,
        response,
        warnings,
        outputPath,
      });
    } catch (error) {
      const processError = createProcessError(file, error);
      processErrors.push(processError);
      options.onError?.(processError);
    }
  }

  const succeeded = results.filter((r) => r.status === 'success').length;

  return {
    results,
    processErrors,
    summary: {
      totalFilesFound: files.length,
      filesProcessed: results.length,
      succeeded,
      errorPayloads: results.length - succeeded,
      unreadable: processErrors.length,
    },
  };
}

function createProcessError(file: StatementInput, error: unknown): ProcessError {
  return {
    filename: file.fileName,
    filePath: file.filePath,
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
  };
}
