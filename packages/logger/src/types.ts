/**
 * @fileoverview Type definitions for the roster logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that end a run
 * - 'warn': Conditions worth reviewing (the CLI default)
 * - 'info': Progress of normal operations
 * - 'debug': Per-page request detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'debug',
 *   json: false,
 *   stderr: true,
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Send every console level to stderr, leaving stdout to command output.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Child logger context fields, included in every entry of the child.
 */
export interface ChildLoggerContext {
  component?: string;
  session?: number;
  chamber?: string;
  state?: string;
  operation?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
