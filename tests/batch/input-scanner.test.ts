import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigError } from '@ledgerline/types';
import { describeSkip, scanStatementInputs } from '@ledgerline/statement-parser';

describe('scanStatementInputs', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `ledgerline-scan-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should list text files and report everything else as skipped', async () => {
    await writeFile(join(testDir, 'statement1.txt'), 'Statement Date: 01/31/2023');
    await writeFile(join(testDir, 'statement2.TXT'), 'Statement Date: 02/28/2023');
    await writeFile(join(testDir, 'scan.pdf'), 'not text');

    const scan = await scanStatementInputs(testDir);

    expect(scan.inputs.map((input) => [input.fileName, input.sourceFilename])).toEqual([
      ['statement1.txt', 'statement1.pdf'],
      ['statement2.TXT', 'statement2.pdf'],
    ]);
    expect(scan.skipped).toEqual([{ fileName: 'scan.pdf', reason: 'not-statement-text' }]);
  });

  it('should sort inputs by file name', async () => {
    await writeFile(join(testDir, 'c-march.txt'), 'content');
    await writeFile(join(testDir, 'a-january.txt'), 'content');
    await writeFile(join(testDir, 'b-february.txt'), 'content');

    const scan = await scanStatementInputs(testDir);

    expect(scan.inputs.map((input) => input.fileName)).toEqual(['a-january.txt', 'b-february.txt', 'c-march.txt']);
  });

  it('should skip temporary, hidden and empty files and directories', async () => {
    await writeFile(join(testDir, '~$temp.txt'), 'temp content');
    await writeFile(join(testDir, '.hidden.txt'), 'hidden content');
    await writeFile(join(testDir, 'empty.txt'), '');
    await mkdir(join(testDir, 'nested.txt'));
    await writeFile(join(testDir, 'normal.txt'), '12345');

    const scan = await scanStatementInputs(testDir);

    expect(scan.inputs).toEqual([
      { filePath: join(testDir, 'normal.txt'), fileName: 'normal.txt', sourceFilename: 'normal.pdf', sizeBytes: 5 },
    ]);
    const reasons = Object.fromEntries(scan.skipped.map((entry) => [entry.fileName, entry.reason]));
    expect(reasons).toEqual({
      '~$temp.txt': 'temporary',
      '.hidden.txt': 'temporary',
      'empty.txt': 'empty',
      'nested.txt': 'directory',
    });
  });

  it('should name sources through the filename map and report unused entries', async () => {
    await writeFile(join(testDir, 'jan.txt'), 'content');

    const scan = await scanStatementInputs(testDir, {
      'jan.txt': 'Chase Statement Jan 2023.pdf',
      'feb.txt': 'Chase Statement Feb 2023.pdf',
    });

    expect(scan.inputs[0]?.sourceFilename).toBe('Chase Statement Jan 2023.pdf');
    expect(scan.unmatchedMapEntries).toEqual(['feb.txt']);
  });

  it('should raise ConfigError for a missing directory', async () => {
    const missing = join(testDir, 'nonexistent');
    await expect(scanStatementInputs(missing)).rejects.toThrow(ConfigError);
    await expect(scanStatementInputs(missing)).rejects.toThrow(`Cannot read input directory ${missing}`);
  });

  it('should raise ConfigError for a file path', async () => {
    const filePath = join(testDir, 'file.txt');
    await writeFile(filePath, 'test');
    await expect(scanStatementInputs(filePath)).rejects.toThrow(ConfigError);
  });
});

describe('describeSkip', () => {
  it('should name the file and the reason', () => {
    expect(describeSkip({ fileName: 'scan.pdf', reason: 'not-statement-text' })).toBe(
      'scan.pdf: not a .txt statement text file'
    );
  });
});
