/**
 * @fileoverview Shared helpers for logger tests: an in-memory transport.
 */

import { Writable } from 'node:stream';
import winston from 'winston';
import { createLogger } from '../src/createLogger.js';
import type { Logger, LoggerConfig } from '../src/types.js';

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
}

/**
 * Creates a logger whose output is collected line by line.
 */
export function captureLogger(config: Omit<LoggerConfig, 'console'>): CapturedLogger {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(String(chunk).trim());
      callback();
    },
  });

  const logger = createLogger({ ...config, console: false });
  logger.add(new winston.transports.Stream({ stream }));
  return { logger, lines };
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}

export function parseLine(line: string | undefined): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line ?? 'null');
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Not a JSON object: ${line}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
