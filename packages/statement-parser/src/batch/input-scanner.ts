import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { extname, join, resolve } from 'path';
import { ConfigError, errorMessage } from '@ledgerline/types';
import { sourceFilenameFor, type FilenameMap } from './filename-map.js';

export type SkipReason = 'not-statement-text' | 'temporary' | 'empty' | 'directory';

export interface StatementInput {
  filePath: string;
  fileName: string;
  /** The `.pdf` name the statement record reports for this file. */
  sourceFilename: string;
  sizeBytes: number;
}

export interface SkippedEntry {
  fileName: string;
  reason: SkipReason;
}

export interface InputScan {
  directoryPath: string;
  inputs: StatementInput[];
  skipped: SkippedEntry[];
  /** Name map keys with no statement text file in the directory. */
  unmatchedMapEntries: string[];
}

const SKIP_DESCRIPTIONS: Record<SkipReason, string> = {
  'not-statement-text': 'not a .txt statement text file',
  temporary: 'temporary or hidden file',
  empty: 'zero-byte file',
  directory: 'directory',
};

export function describeSkip(entry: SkippedEntry): string {
  return `${entry.fileName}: ${SKIP_DESCRIPTIONS[entry.reason]}`;
}

function isTemporary(fileName: string): boolean {
  return fileName.startsWith('~$') || fileName.startsWith('.');
}

/**
 * Lists the statement text files of a directory in name order, each paired with the
 * source file name it is reported under. Every other entry is returned as skipped with
 * its reason. An unreadable directory is a ConfigError.
 */
export async function scanStatementInputs(directoryPath: string, filenameMap: FilenameMap = {}): Promise<InputScan> {
  const dir = resolve(directoryPath);
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigError(`Cannot read input directory ${dir}: ${errorMessage(error)}`);
  }

  const inputs: StatementInput[] = [];
  const skipped: SkippedEntry[] = [];

  for (const entry of [...entries].sort((a, b) => a.name.localeCompare(b.name))) {
    const fileName = entry.name;
    if (entry.isDirectory()) {
      skipped.push({ fileName, reason: 'directory' });
      continue;
    }
    if (extname(fileName).toLowerCase() !== '.txt') {
      skipped.push({ fileName, reason: 'not-statement-text' });
      continue;
    }
    if (isTemporary(fileName)) {
      skipped.push({ fileName, reason: 'temporary' });
      continue;
    }

    const filePath = join(dir, fileName);
    const { size } = await stat(filePath);
    if (size === 0) {
      skipped.push({ fileName, reason: 'empty' });
      continue;
    }

    inputs.push({ filePath, fileName, sourceFilename: sourceFilenameFor(fileName, filenameMap), sizeBytes: size });
  }

  const found = new Set(inputs.map((input) => input.fileName));
  const unmatchedMapEntries = Object.keys(filenameMap)
    .filter((name) => !found.has(name))
    .sort();

  return { directoryPath: dir, inputs, skipped, unmatchedMapEntries };
}
