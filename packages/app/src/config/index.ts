/**
 * Configuration loading
 */

import { ConfigError } from '@congress-roster/contracts';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: unknown };

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and defaults.
 *
 * Empty variables count as unset.
 *
 * @throws ConfigError listing every failing variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ CONGRESS_PAGE_SIZE: '100' });
 * config.api.pageSize; // 100
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((e) => {
      const configPath = e.path.join('.');
      return `${envKeyFor(configPath) ?? configPath}: ${e.message}`;
    });
    throw new ConfigError(`Configuration validation failed: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    return;
  }

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

function envKeyFor(configPath: string): string | undefined {
  return Object.entries(envMapping).find(([, mapped]) => mapped === configPath)?.[0];
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    api: {
      baseUrl: config.api.baseUrl,
      timeout: config.api.timeout,
      pageSize: config.api.pageSize,
    },
    outputDir: config.output.dir,
    envFile: config.credentials.envFile,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
