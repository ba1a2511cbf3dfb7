/**
 * @fileoverview Public API exports for @congress-roster/logger
 * Structured logging and crash handling
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';
export type { GlobalHandlerOptions } from './errorHandler.js';

// Performance timing utilities
export { startTimer, measureAsync } from './perf-timer.js';
export type { PerfTimer } from './perf-timer.js';

// Formats
export { redactPII, redactSensitiveFields, isSensitiveFieldName } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
