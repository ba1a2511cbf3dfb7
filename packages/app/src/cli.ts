#!/usr/bin/env -S node --import tsx

/**
 * CLI entry point for the congress-roster command
 *
 * Thin wrapper around run(): crash handlers are attached first, then the
 * exit status is handed back to the process.
 */

import { attachGlobalHandlers, createLogger } from '@congress-roster/logger';
import { run } from './program.js';

const crashLogger = createLogger({ level: 'error', stderr: true });
attachGlobalHandlers(crashLogger);

process.exitCode = await run(process.argv.slice(2));
