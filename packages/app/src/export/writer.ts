/**
 * CSV export to the output directory.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ExportError, type MemberRecord } from '@congress-roster/contracts';
import { measureAsync, type Logger } from '@congress-roster/logger';
import { errorMessage } from '../utils/errors.js';
import { formatMembersCsv } from './csv.js';

export interface WriteMembersOptions {
  /** Directory every export is written into */
  outputDir: string;
  logger?: Logger;
}

/**
 * Resolve where an export lands: only the base name of the requested file
 * is kept, placed under the output directory.
 *
 * @throws ExportError for absolute paths or names without a base name
 */
export function resolveOutputPath(outputDir: string, outputFile: string): string {
  if (path.isAbsolute(outputFile)) {
    throw new ExportError(`Cannot write to absolute path: ${outputFile}`, { path: outputFile });
  }

  const name = path.basename(outputFile);
  if (name === '' || name === '.' || name === '..') {
    throw new ExportError(`Invalid output file name: ${outputFile}`, { path: outputFile });
  }

  return path.join(outputDir, name);
}

/**
 * Write members as CSV, creating the output directory when missing.
 *
 * @returns The written path, or null when there was nothing to write
 * @throws ExportError naming the target path on any failure
 */
export async function writeMembersCsv(
  members: readonly MemberRecord[],
  outputFile: string,
  options: WriteMembersOptions
): Promise<string | null> {
  const { outputDir, logger } = options;

  if (members.length === 0) {
    logger?.warn('No members to export', { outputFile });
    return null;
  }

  const target = resolveOutputPath(outputDir, outputFile);

  try {
    const { duration_ms } = await measureAsync(async () => {
      await mkdir(outputDir, { recursive: true });
      await writeFile(target, formatMembersCsv(members), 'utf-8');
    });
    logger?.info('Exported members', { path: target, count: members.length, duration_ms });
  } catch (error) {
    throw new ExportError(`Error writing to ${target}: ${errorMessage(error)}`, { path: target }, { cause: error });
  }

  return target;
}
