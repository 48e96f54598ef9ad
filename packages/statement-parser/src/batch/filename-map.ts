import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '@ledgerline/types';

/**
 * Maps a text file name (`jan.txt`) to the statement file it was extracted from
 * (`Chase-2023-01.pdf`).
 */
export const FilenameMapSchema = z.record(
  z.string().min(1),
  z.string().regex(/^[^/\\]+\.pdf$/, 'Mapped name must be a bare *.pdf file name')
);

export type FilenameMap = z.infer<typeof FilenameMapSchema>;

export function parseFilenameMap(input: unknown): FilenameMap {
  const parsed = FilenameMapSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`Invalid filename map${where}: ${issue?.message ?? 'unknown issue'}`, parsed.error.issues);
  }
  return parsed.data;
}

export async function loadFilenameMap(filePath: string): Promise<FilenameMap> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read filename map ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Filename map ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseFilenameMap(json);
}

/** `jan.txt` becomes `jan.pdf` unless the map names the original statement file. */
export function sourceFilenameFor(fileName: string, filenameMap: FilenameMap = {}): string {
  return filenameMap[fileName] ?? `${basename(fileName, extname(fileName))}.pdf`;
}
