/**
 * @fileoverview Tests for the Logger class
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  Logger,
  logger,
  createLogger,
  configureLogger,
  getLoggerConfig,
  resetLoggerConfig,
  redact,
  LOG_LEVELS,
  isLogLevel,
  type ILogger,
} from '../src/index.js';

describe('Logger', () => {
  let capturedLogs: Array<{ level: string; args: unknown[] }> = [];

  function lastEntry() {
    const last = capturedLogs[capturedLogs.length - 1];
    return JSON.parse(String(last?.args[0]));
  }

  beforeEach(() => {
    capturedLogs = [];
    vi.spyOn(console, 'log').mockImplementation((...args) => {
      capturedLogs.push({ level: 'log', args });
    });
    vi.spyOn(console, 'warn').mockImplementation((...args) => {
      capturedLogs.push({ level: 'warn', args });
    });
    vi.spyOn(console, 'error').mockImplementation((...args) => {
      capturedLogs.push({ level: 'error', args });
    });

    resetLoggerConfig();
    configureLogger({
      level: 'debug',
      format: 'json',
      service: 'test-service',
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('LOG_LEVELS', () => {
    it('should have correct level hierarchy', () => {
      expect(LOG_LEVELS.debug).toBeLessThan(LOG_LEVELS.info);
      expect(LOG_LEVELS.info).toBeLessThan(LOG_LEVELS.warn);
      expect(LOG_LEVELS.warn).toBeLessThan(LOG_LEVELS.error);
      expect(LOG_LEVELS.error).toBeLessThan(LOG_LEVELS.fatal);
    });

    it('should narrow level names', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('configureLogger', () => {
    it('should redact the configured keys and serve as an injected logger', () => {
      configureLogger({ redactKeys: ['apiSecret'] });
      const injected: ILogger = createLogger({ component: 'sync' });

      injected.child({ apiSecret: 'test-secret' }).warn('Sync slow', { token: 'test-token' });

      expect(capturedLogs[0]?.level).toBe('warn');
      expect(lastEntry().context).toEqual({
        component: 'sync',
        apiSecret: '[REDACTED]',
        token: 'test-token',
      });
    });

    it('should merge with existing configuration', () => {
      configureLogger({ level: 'error' });
      configureLogger({ service: 'another-service' });
      const config = getLoggerConfig();

      expect(config.level).toBe('error');
      expect(config.service).toBe('another-service');
      expect(config.format).toBe('json');
    });

    it('should send entries to a custom output', () => {
      const entries: unknown[] = [];
      configureLogger({ output: (entry) => entries.push(entry) });
      logger.info('routed');

      expect(entries).toHaveLength(1);
      expect(capturedLogs).toHaveLength(0);
    });
  });

  describe('Logger class', () => {
    it('should create child logger with merged context', () => {
      const parent = new Logger({ component: 'parent' });
      const child = parent.child({ subComponent: 'child' });
      child.info('test message');

      const entry = lastEntry();
      expect(entry.context).toEqual({ component: 'parent', subComponent: 'child' });
    });

    it('should inherit the request ID in child loggers', () => {
      const parent = createLogger();
      parent.setRequestId('req-123');
      parent.child({ extra: 'data' }).info('test');

      expect(lastEntry().requestId).toBe('req-123');
    });
  });

  describe('Log levels', () => {
    it('should route warn and above to the matching console method', () => {
      logger.warn('warn message');
      logger.error('error message');
      logger.fatal('fatal message');

      expect(capturedLogs.map((log) => log.level)).toEqual(['warn', 'error', 'error']);
      expect(lastEntry().level).toBe('fatal');
    });

    it('should filter logs below configured level', () => {
      configureLogger({ level: 'warn' });
      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');

      expect(capturedLogs.length).toBe(1);
      expect(lastEntry().level).toBe('warn');
    });
  });

  describe('Log data', () => {
    it('should extract error objects', () => {
      const error = Object.assign(new Error('test error'), { code: 'E_TEST' });
      logger.error('failed', { error });

      const entry = lastEntry();
      expect(entry.error.name).toBe('Error');
      expect(entry.error.message).toBe('test error');
      expect(entry.error.code).toBe('E_TEST');
      expect(entry.context).toBeUndefined();
    });

    it('should extract duration and HTTP info', () => {
      logger.info('request', {
        durationMs: 150,
        http: { method: 'GET', path: '/operations', statusCode: 200 },
      });

      const entry = lastEntry();
      expect(entry.durationMs).toBe(150);
      expect(entry.http).toEqual({ method: 'GET', path: '/operations', statusCode: 200 });
    });

    it('should include service name', () => {
      logger.info('test');
      expect(lastEntry().service).toBe('test-service');
    });
  });

  describe('redaction', () => {
    it('should redact credentials in context at any depth', () => {
      logger.info('calling', {
        operation: 'get-task',
        Token: 'test-secret',
        options: { overrideToken: 'test-override', headers: { Authorization: 'test-secret' } },
      });

      expect(lastEntry().context).toEqual({
        operation: 'get-task',
        Token: '[REDACTED]',
        options: { overrideToken: '[REDACTED]', headers: { Authorization: '[REDACTED]' } },
      });
    });

    it('should redact query parameters of HTTP info', () => {
      logger.info('request', {
        http: { method: 'GET', path: '/additional/user_tasks', query: { token: 'test-secret', team_id: '7' } },
      });

      expect(lastEntry().http.query).toEqual({ token: '[REDACTED]', team_id: '7' });
    });

    it('should honour custom keys and walk arrays', () => {
      expect(redact([{ secret: 'x', keep: 1 }], ['SECRET'])).toEqual([{ secret: '[REDACTED]', keep: 1 }]);
    });
  });

  describe('time()', () => {
    it('should include operation name and additional data', () => {
      const timer = logger.time('user-worktime', { teamId: '7' });
      timer.end();

      const entry = lastEntry();
      expect(entry.message).toBe('user-worktime completed');
      expect(typeof entry.durationMs).toBe('number');
      expect(entry.context.teamId).toBe('7');
    });
  });
});
