/**
 * @fileoverview Error taxonomy for the congress roster tools.
 *
 * Every error raised on purpose extends {@link CongressError}, which carries:
 * - a machine-readable code (string constant)
 * - a structured data payload
 * - an ISO timestamp
 *
 * The CLI maps each class onto a message and a nonzero exit status.
 *
 * @module @congress-roster/contracts/errors
 */

/**
 * Base error class for all congress roster errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CongressError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class CongressError extends Error {
  /**
   * Machine-readable error code (e.g., 'USAGE_ERROR').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CongressError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   *
   * @example
   * ```typescript
   * const err = new CongressError('TEST', 'Test error');
   * JSON.stringify(err.toJSON());
   * ```
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown for invalid command-line or call arguments: unknown state codes,
 * chamber tokens, years outside the supported range, malformed session numbers.
 *
 * @example
 * ```typescript
 * throw new UsageError('Invalid state code: ZZ', { argument: 'state', value: 'ZZ' });
 * ```
 */
export class UsageError extends CongressError {
  constructor(
    message: string,
    data?: {
      argument?: string;
      value?: unknown;
      [key: string]: unknown;
    }
  ) {
    super('USAGE_ERROR', message, data);
    this.name = 'UsageError';
  }
}

/**
 * Thrown when startup configuration is missing or invalid (API key absent,
 * environment values failing validation).
 */
export class ConfigError extends CongressError {
  constructor(
    message: string,
    data?: {
      issues?: string[];
      [key: string]: unknown;
    }
  ) {
    super('CONFIG_ERROR', message, data);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the CSV export cannot be written. The message always names
 * the target path.
 *
 * @example
 * ```typescript
 * throw new ExportError('Error writing to results/x.csv: EACCES', { path: 'results/x.csv' });
 * ```
 */
export class ExportError extends CongressError {
  /**
   * Path that was rejected or could not be written.
   */
  readonly path: string;

  constructor(
    message: string,
    data: {
      path: string;
      [key: string]: unknown;
    },
    options?: { cause?: unknown }
  ) {
    super('EXPORT_ERROR', message, data, options);
    this.name = 'ExportError';
    this.path = data.path;
  }
}

/**
 * Type guard for {@link CongressError}.
 */
export function isCongressError(error: unknown): error is CongressError {
  return error instanceof CongressError;
}

/**
 * Type guard for {@link UsageError}.
 */
export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Type guard for {@link ExportError}.
 */
export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError;
}
