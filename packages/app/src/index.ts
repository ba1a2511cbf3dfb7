/**
 * Main exports for @congress-roster/app
 */

// Program
export { PROGRAM_NAME, VERSION, createProgram, run } from './program.js';
export type { CliOptions, RunDependencies } from './program.js';

// Configuration exports
export { loadConfig, getConfigSummary } from './config/index.js';
export type { Config } from './config/schema.js';

// Credentials
export { API_KEY_VARIABLE, resolveApiKey } from './credentials.js';
export type { CredentialSources } from './credentials.js';

// Export
export { MEMBER_CSV_COLUMNS, escapeCsvField, formatMembersCsv } from './export/csv.js';
export type { MemberCsvColumn } from './export/csv.js';
export { generateOutputFilename } from './export/filename.js';
export { resolveOutputPath, writeMembersCsv } from './export/writer.js';
export type { WriteMembersOptions } from './export/writer.js';

// Formatting and validation
export { formatDistributionMessage, formatSessionLookup } from './formatters/summary.js';
export { parseChamberOption, parseSessionNumber, parseYear } from './validation.js';
