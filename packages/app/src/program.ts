/**
 * congress-roster command line program
 *
 * Two modes, mutually exclusive:
 * - `--which <year>` prints the Congress(es) in session during a year
 * - `--congress <number>` (or no mode, meaning the current Congress) fetches
 *   members from Congress.gov and exports them to CSV
 *
 * Results go to stdout. Errors are printed to stderr as `Error: <message>`
 * and yield exit status 1.
 */

import path from 'node:path';
import { Command, CommanderError, Option } from 'commander';
import chalk from 'chalk';
import {
  isCongressError,
  type Chamber,
  type MembersProvider,
} from '@congress-roster/contracts';
import { currentSession } from '@congress-roster/congress-calendar';
import { createLogger, type Logger } from '@congress-roster/logger';
import {
  createCongressProvider,
  resolveState,
  type CongressProviderConfig,
} from '@congress-roster/provider-congress';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';
import { resolveApiKey } from './credentials.js';
import { generateOutputFilename } from './export/filename.js';
import { resolveOutputPath, writeMembersCsv } from './export/writer.js';
import { formatDistributionMessage, formatSessionLookup } from './formatters/summary.js';
import { errorMessage, sanitizeError } from './utils/errors.js';
import { parseChamberOption, parseSessionNumber, parseYear } from './validation.js';

export const PROGRAM_NAME = 'congress-roster';
export const VERSION = '0.1.0';

const HELP_TEXT = `
Examples:
  $ ${PROGRAM_NAME} --congress 118
  $ ${PROGRAM_NAME} --state NY --chamber House
  $ ${PROGRAM_NAME} --which 2023

Note: Congress sessions begin in January of odd-numbered years.
For more information, visit: https://api.congress.gov/`;

/**
 * Raw option values as commander collects them
 */
export type CliOptions = {
  congress?: string;
  which?: string;
  chamber?: string;
  state?: string;
  output?: string;
  apiKey?: string;
  debug: boolean;
};

/**
 * Everything the program touches outside its own arguments.
 */
export interface RunDependencies {
  env?: NodeJS.ProcessEnv;

  /** Directory relative paths (env file, output directory) resolve against */
  cwd?: string;

  now?: () => Date;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  createProvider?: (config: CongressProviderConfig) => MembersProvider;

  /** Used instead of a logger built from configuration */
  logger?: Logger;
}

interface Output {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Build the commander program. Parsing never exits the process: errors and
 * help output surface as CommanderError.
 */
export function createProgram(output: Output): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Fetch members of a U.S. Congress from Congress.gov and export them to CSV.')
    .version(VERSION)
    .addOption(
      new Option('-c, --congress <number>', 'Congress number to fetch (e.g., 118)').conflicts('which')
    )
    .addOption(new Option('-w, --which <year>', 'Show which Congress was in session during a year'))
    .option('--chamber <chamber>', "chamber filter: 'House'/'Senate' or 'H'/'S'")
    .option('-s, --state <code>', 'two-letter state code filter (e.g., CA)')
    .option('-o, --output <file>', 'output file name, written under the output directory')
    .option('--api-key <key>', 'Congress.gov API key (overrides .env and environment)')
    .option('-d, --debug', 'enable debug logging', false)
    .addHelpText('after', HELP_TEXT)
    .exitOverride()
    .configureOutput({
      writeOut: output.stdout,
      writeErr: output.stderr,
      // run() reports parse errors itself
      outputError: () => undefined,
    });
}

function buildLogger(config: Config, debug: boolean): Logger {
  return createLogger({
    level: debug ? 'debug' : config.logging.level ?? 'warn',
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    stderr: true,
  });
}

interface ExportContext {
  options: CliOptions;
  cwd: string;
  env: NodeJS.ProcessEnv;
  now: () => Date;
  output: Output;
  createProvider: (config: CongressProviderConfig) => MembersProvider;
  logger?: Logger;
}

/**
 * Fetch and export mode.
 */
async function exportMembers(context: ExportContext): Promise<number> {
  const { options, cwd, env, now, output } = context;

  // Arguments first, so usage mistakes never cost a request or need a key
  const session =
    options.congress !== undefined ? parseSessionNumber(options.congress) : currentSession(now());
  const chamber: Chamber | undefined =
    options.chamber !== undefined ? parseChamberOption(options.chamber) : undefined;
  const state = options.state !== undefined ? resolveState(options.state) : undefined;

  const config = loadConfig(env);
  const logger = context.logger ?? buildLogger(config, options.debug);
  const cliLogger = logger.child({ component: 'cli' });
  cliLogger.debug('Configuration loaded', getConfigSummary(config));

  const outputDir = path.resolve(cwd, config.output.dir);
  const outputFile = options.output ?? generateOutputFilename(session, chamber, state?.code);
  resolveOutputPath(outputDir, outputFile);

  const apiKey = await resolveApiKey({
    explicit: options.apiKey,
    envFilePath: path.resolve(cwd, config.credentials.envFile),
    env,
  });

  const provider = context.createProvider({
    apiKey,
    baseUrl: config.api.baseUrl,
    timeout: config.api.timeout,
    pageSize: config.api.pageSize,
    logger,
    now,
  });

  cliLogger.info('Fetching members', { session, chamber, state: state?.code });
  const { members, statistics } = await provider.fetchMembers({
    session,
    chamber,
    state: state?.code,
  });

  const written = await writeMembersCsv(members, outputFile, { outputDir, logger: cliLogger });
  if (written === null) {
    output.stderr(`${chalk.yellow('No members found to export')}\n`);
    return 0;
  }

  const shown = path.relative(cwd, written) || written;
  output.stdout(`${chalk.green(`Successfully exported ${statistics.total} members to ${shown}`)}\n`);

  const distribution = formatDistributionMessage(statistics);
  if (distribution) {
    output.stdout(`${distribution}\n`);
  }

  return 0;
}

/**
 * Run the program against user arguments (no node/script prefix).
 *
 * @returns Process exit status
 *
 * @example
 * ```typescript
 * process.exitCode = await run(process.argv.slice(2));
 * ```
 */
export async function run(args: readonly string[], deps: RunDependencies = {}): Promise<number> {
  const output: Output = {
    stdout: deps.stdout ?? ((text) => process.stdout.write(text)),
    stderr: deps.stderr ?? ((text) => process.stderr.write(text)),
  };
  const now = deps.now ?? (() => new Date());
  const reportError = (message: string): number => {
    output.stderr(`${chalk.red(`Error: ${message}`)}\n`);
    return 1;
  };

  const program = createProgram(output);
  try {
    program.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : reportError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  try {
    if (options.which !== undefined) {
      const year = parseYear(options.which, now());
      const [heading, label] = formatSessionLookup(year);
      output.stdout(`\n${heading}\n${chalk.bold(label)}\n`);
      return 0;
    }

    return await exportMembers({
      options,
      cwd: deps.cwd ?? process.cwd(),
      env: deps.env ?? process.env,
      now,
      output,
      createProvider: deps.createProvider ?? createCongressProvider,
      logger: deps.logger,
    });
  } catch (error) {
    if (!isCongressError(error)) {
      deps.logger?.error('Unexpected failure', { error: sanitizeError(error, true) });
    }
    return reportError(errorMessage(error));
  }
}
