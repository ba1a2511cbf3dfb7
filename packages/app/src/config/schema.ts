/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { CONGRESS_API_BASE_URL, DEFAULT_TIMEOUT_MS, MAX_PAGE_SIZE } from '@congress-roster/provider-congress';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      // Unset means the CLI decides (warn, or debug with --debug)
      level: z.enum(['error', 'warn', 'info', 'debug']).optional(),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  api: z
    .object({
      baseUrl: z.string().url().default(CONGRESS_API_BASE_URL),
      timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
      pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
    })
    .default({}),

  output: z
    .object({
      dir: z.string().min(1).default('results'),
    })
    .default({}),

  credentials: z
    .object({
      envFile: z.string().min(1).default('.env'),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  CONGRESS_API_BASE_URL: 'api.baseUrl',
  CONGRESS_API_TIMEOUT: 'api.timeout',
  CONGRESS_PAGE_SIZE: 'api.pageSize',
  CONGRESS_OUTPUT_DIR: 'output.dir',
  CONGRESS_ENV_FILE: 'credentials.envFile',
};
