/**
 * Tests for writing exports to disk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ExportError } from '@congress-roster/contracts';
import { formatMembersCsv } from '../src/export/csv.js';
import { resolveOutputPath, writeMembersCsv } from '../src/export/writer.js';
import { makeTempDir, member, quietLogger, type TempDir } from './helpers.js';

describe('resolveOutputPath', () => {
  it('should place the file under the output directory', () => {
    expect(resolveOutputPath('/srv/out', 'members.csv')).toBe('/srv/out/members.csv');
  });

  it('should keep only the base name', () => {
    expect(resolveOutputPath('/srv/out', 'nested/dir/members.csv')).toBe('/srv/out/members.csv');
    expect(resolveOutputPath('/srv/out', '../escape.csv')).toBe('/srv/out/escape.csv');
  });

  it('should reject absolute paths', () => {
    expect(() => resolveOutputPath('/srv/out', '/etc/members.csv')).toThrow(ExportError);
    expect(() => resolveOutputPath('/srv/out', '/etc/members.csv')).toThrow(
      'Cannot write to absolute path: /etc/members.csv'
    );
  });

  it('should reject names without a file part', () => {
    expect(() => resolveOutputPath('/srv/out', '..')).toThrow('Invalid output file name: ..');
  });
});

describe('writeMembersCsv', () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await makeTempDir();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should create the output directory and write the file', async () => {
    const outputDir = path.join(temp.path, 'results');
    const members = [member('S000001'), member('S000002', { name: 'Doe, John' })];

    const written = await writeMembersCsv(members, 'members_118_All.csv', {
      outputDir,
      logger: quietLogger(),
    });

    expect(written).toBe(path.join(outputDir, 'members_118_All.csv'));
    expect(await readFile(path.join(outputDir, 'members_118_All.csv'), 'utf-8')).toBe(formatMembersCsv(members));
  });

  it('should write nothing for an empty list', async () => {
    const outputDir = path.join(temp.path, 'results');

    const written = await writeMembersCsv([], 'members_118_All.csv', { outputDir });

    expect(written).toBeNull();
    await expect(stat(outputDir)).rejects.toThrow('ENOENT');
  });

  it('should name the target when the write fails', async () => {
    await writeFile(path.join(temp.path, 'blocker'), 'not a directory');
    const outputDir = path.join(temp.path, 'blocker', 'results');
    const target = path.join(outputDir, 'members.csv');

    const promise = writeMembersCsv([member('S000001')], 'members.csv', { outputDir });

    await expect(promise).rejects.toBeInstanceOf(ExportError);
    await expect(promise).rejects.toThrow(`Error writing to ${target}: `);
  });
});
