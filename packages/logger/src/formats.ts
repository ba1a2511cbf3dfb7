/**
 * @fileoverview Custom Winston formats for the roster logger
 * Includes secret redaction, standard fields and human-readable output.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Field-name patterns whose values never reach a log line.
 * Matching is case-insensitive, so api_key, apiKey and API_KEY are all caught.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /auth/i,
  /private[_-]?key/i,
  /credential/i,
];

const REDACTED = '[REDACTED]';

/** Winston fields that are never redacted */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

/**
 * Whether a field name looks like it carries a secret.
 */
export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of a value with sensitive fields replaced, at any depth.
 * Error instances pass through untouched so format.errors can render them.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ params: { api_key: 'test-secret', offset: 250 } });
 * // { params: { api_key: '[REDACTED]', offset: 250 } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must be first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Request', { api_key: 'test-secret', offset: 0 });
 * // {"level":"info","message":"Request","api_key":"[REDACTED]","offset":0}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }

    if (isSensitiveFieldName(key)) {
      redacted[key] = REDACTED;
    } else if (typeof redacted[key] === 'object') {
      redacted[key] = redactSensitiveFields(redacted[key]);
    }
  }

  return redacted;
});

/**
 * Timestamp and error serialization shared by every output format.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

function renderValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-15T12:34:56.789+00:00] debug: Fetched page component=provider-congress session=118 offset=250
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, session, chamber, state, stack, ...rest } = info;

    const context: string[] = [];
    if (component !== undefined) context.push(`component=${renderValue(component)}`);
    if (session !== undefined) context.push(`session=${renderValue(session)}`);
    if (chamber !== undefined) context.push(`chamber=${renderValue(chamber)}`);
    if (state !== undefined) context.push(`state=${renderValue(state)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${renderValue(timestamp)}] ${level}: ${renderValue(message)}${contextStr}`;

    return stack !== undefined ? `${baseMsg}\n${renderValue(stack)}` : baseMsg;
  })
);
