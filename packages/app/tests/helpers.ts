/**
 * Shared test utilities for the app package
 */

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { MemberRecord } from '@congress-roster/contracts';
import { createLogger, type Logger } from '@congress-roster/logger';

export function member(bioguideId: string, overrides: Partial<MemberRecord> = {}): MemberRecord {
  return {
    bioguideId,
    name: `Member, ${bioguideId}`,
    party: 'Independent',
    state: 'California',
    chamber: 'Senate',
    url: `https://api.congress.gov/v3/member/${bioguideId}`,
    terms: [],
    ...overrides,
  };
}

/**
 * A logger that accepts every entry and writes nothing.
 */
export function quietLogger(): Logger {
  const logger = createLogger({ level: 'debug', console: false });
  logger.silent = true;
  return logger;
}

export interface TempDir {
  path: string;
  cleanup: () => Promise<void>;
}

export async function makeTempDir(): Promise<TempDir> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'congress-roster-'));
  return {
    path: dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Minimal RFC 4180 reader, used to check exports read back unchanged.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (quoted) {
      if (ch !== '"') {
        field += ch;
      } else if (text.charAt(i + 1) === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}
