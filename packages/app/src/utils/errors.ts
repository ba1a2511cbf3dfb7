/**
 * Helpers for inspecting caught values.
 */

/**
 * The `code` of a Node system error (ENOENT, EACCES, ...), if any.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * A printable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reduces a thrown value to fields that are safe to log.
 * Stack traces are only included on request.
 */
export function sanitizeError(error: unknown, includeStack = false): Record<string, unknown> {
  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
    };

    const code = errorCode(error);
    if (code !== undefined) {
      sanitized['code'] = code;
    }

    if (includeStack && error.stack) {
      sanitized['stack'] = error.stack;
    }

    return sanitized;
  }

  return {
    message: String(error),
    name: 'Unknown',
  };
}
