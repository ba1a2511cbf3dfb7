/**
 * @fileoverview Tests for logger creation and basic functionality
 */

import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import type { LoggerConfig } from '../src/types.js';
import { captureLogger, flush, parseLine } from './helpers.js';

describe('createLogger', () => {
  it('should create a logger with the configured level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      const logger = createLogger({ level, console: false });
      expect(logger.level).toBe(level);
    }
  });

  it('should attach a console transport by default', () => {
    const logger = createLogger({ level: 'warn', stderr: true });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('should attach no transports when console is disabled and no file is set', () => {
    const logger = createLogger({ level: 'warn', console: false });

    expect(logger.transports).toHaveLength(0);
  });

  it('should emit JSON entries with a timestamp', async () => {
    const { logger, lines } = captureLogger({ level: 'info', json: true });

    logger.info('Fetch complete', { count: 541 });
    await flush();

    expect(lines).toHaveLength(1);
    const entry = parseLine(lines[0]);
    expect(entry['message']).toBe('Fetch complete');
    expect(entry['level']).toBe('info');
    expect(entry['count']).toBe(541);
    expect(typeof entry['timestamp']).toBe('string');
  });

  it('should respect log level filtering', async () => {
    const { logger, lines } = captureLogger({ level: 'warn', json: true });

    logger.debug('Debug message');
    logger.info('Info message');
    logger.warn('Warn message');
    logger.error('Error message');
    await flush();

    expect(lines.map((line) => parseLine(line)['message'])).toEqual([
      'Warn message',
      'Error message',
    ]);
  });

  it('should include child context in every entry', async () => {
    const { logger, lines } = captureLogger({ level: 'debug', json: true });

    const child = createChildLogger(logger, { component: 'provider-congress', session: 118 });
    child.debug('Fetched page', { offset: 250 });
    await flush();

    const entry = parseLine(lines[0]);
    expect(entry['component']).toBe('provider-congress');
    expect(entry['session']).toBe(118);
    expect(entry['offset']).toBe(250);
  });

  it('should redact secrets before output', async () => {
    const { logger, lines } = captureLogger({ level: 'info', json: true });

    logger.info('Request', { params: { api_key: 'test-secret', offset: 0 } });
    await flush();

    expect(parseLine(lines[0])['params']).toEqual({ api_key: '[REDACTED]', offset: 0 });
  });

  it('should render pretty output with context fields first', async () => {
    const { logger, lines } = captureLogger({ level: 'info', json: false });

    logger.info('Fetching members', { component: 'cli', session: 118, chamber: 'House' });
    await flush();

    expect(lines[0]).toContain('Fetching members component=cli session=118 chamber=House');
  });
});
