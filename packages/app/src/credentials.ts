/**
 * API key resolution.
 *
 * Order: explicit value, then CONGRESS_API_KEY in the local env file, then
 * CONGRESS_API_KEY in the process environment. The env file is parsed with
 * dotenv and never merged into the process environment.
 */

import { readFile } from 'node:fs/promises';
import dotenv from 'dotenv';
import { ConfigError } from '@congress-roster/contracts';
import { errorCode } from './utils/errors.js';

export const API_KEY_VARIABLE = 'CONGRESS_API_KEY';

export interface CredentialSources {
  /** Value passed on the command line */
  explicit?: string;

  /** Absolute path of the env file */
  envFilePath: string;

  env: NodeJS.ProcessEnv;
}

async function readEnvFile(envFilePath: string): Promise<Record<string, string>> {
  try {
    return dotenv.parse(await readFile(envFilePath, 'utf-8'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Could not read ${envFilePath}`, { path: envFilePath, cause: errorCode(error) });
  }
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve the Congress.gov API key.
 *
 * @throws ConfigError when no source provides a key
 */
export async function resolveApiKey(sources: CredentialSources): Promise<string> {
  const explicit = present(sources.explicit);
  if (explicit) {
    return explicit;
  }

  const fromFile = present((await readEnvFile(sources.envFilePath))[API_KEY_VARIABLE]);
  if (fromFile) {
    return fromFile;
  }

  const fromEnv = present(sources.env[API_KEY_VARIABLE]);
  if (fromEnv) {
    return fromEnv;
  }

  throw new ConfigError(
    `API key must be provided via --api-key argument, .env file, or ${API_KEY_VARIABLE} environment variable`
  );
}
