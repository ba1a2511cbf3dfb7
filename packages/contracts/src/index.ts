/**
 * @fileoverview Main entry point for @congress-roster/contracts.
 *
 * Exports shared types, the chamber enumeration and the error taxonomy.
 *
 * @module @congress-roster/contracts
 */

// Chambers
export { Chamber, isChamber, parseChamber } from './chambers.js';

// Member types
export type {
  MemberTerm,
  MemberRecord,
  MemberStatistics,
  FetchMembersParams,
  FetchMembersResult,
  MembersProvider,
} from './members.js';

// Error classes and guards
export {
  CongressError,
  UsageError,
  ConfigError,
  ExportError,
  isCongressError,
  isUsageError,
  isConfigError,
  isExportError,
} from './errors.js';
