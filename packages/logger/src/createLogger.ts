/**
 * @fileoverview Logger factory
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and console/file transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

const { format } = winston;

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance with structured logging and secret redaction.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, stderr: true });
 * const fetchLogger = logger.child({ component: 'provider-congress', session: 118 });
 * fetchLogger.debug('Fetched page', { offset: 250, count: 250 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  // Redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: stderr ? ALL_LEVELS : ['error'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON, uncolored
        format: format.combine(format.uncolorize(), format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Crash handling lives in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger that includes the given context in every entry.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'provider-congress' });
 * providerLogger.info('Fetch complete', { count: 541 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
