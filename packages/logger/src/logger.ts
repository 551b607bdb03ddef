/**
 * @fileoverview Core Logger class for tasklink
 * @module @tasklink/logger/logger
 */

import {
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type ErrorInfo,
  type HttpInfo,
  type ILogger,
  LOG_LEVELS,
  isLogLevel,
} from './types.js';

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Keys that hold ClickUp credentials anywhere in the toolkit.
 */
export const DEFAULT_REDACT_KEYS = [
  'token',
  'authorization',
  'defaultToken',
  'baseToken',
  'overrideToken',
];

export const REDACTED = '[REDACTED]';

function defaultConfig(): LoggerConfig {
  const envLevel = process.env['LOG_LEVEL'];
  return {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    service: process.env['SERVICE_NAME'] ?? 'tasklink',
    format: process.env['NODE_ENV'] === 'production' ? 'json' : 'pretty',
    timestamps: true,
    redactKeys: DEFAULT_REDACT_KEYS,
  };
}

/** Global configuration */
let globalConfig: LoggerConfig = defaultConfig();

/**
 * Configure the global logger settings.
 * @param config - Partial configuration to merge
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

/**
 * Restore the configuration read from the environment.
 */
export function resetLoggerConfig(): void {
  globalConfig = defaultConfig();
}

// ============================================================================
// Redaction
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-copy `value`, replacing the value of every key listed in `keys`
 * (case-insensitive) with `[REDACTED]`.
 */
export function redact(value: unknown, keys: readonly string[] = globalConfig.redactKeys): unknown {
  const lowered = new Set(keys.map((key) => key.toLowerCase()));
  const walk = (node: unknown): unknown => {
    if (Array.isArray(node)) {
      return node.map(walk);
    }
    if (isRecord(node) && !(node instanceof Date) && !(node instanceof Error)) {
      const out: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(node)) {
        out[key] = lowered.has(key.toLowerCase()) ? REDACTED : walk(inner);
      }
      return out;
    }
    return node;
  };
  return walk(value);
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result = redact(record);
  return isRecord(result) ? result : {};
}

// ============================================================================
// Formatting
// ============================================================================

/** ANSI color codes for pretty printing */
const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

function formatEntry(entry: LogEntry): string {
  if (globalConfig.format === 'json') {
    return JSON.stringify(entry);
  }

  const color = LEVEL_COLORS[entry.level];
  const levelPadded = entry.level.toUpperCase().padEnd(5);

  let output = '';

  if (globalConfig.timestamps) {
    const time = new Date(entry.timestamp).toLocaleTimeString();
    output += `${COLORS.gray}${time}${COLORS.reset} `;
  }

  output += `${color}${COLORS.bold}${levelPadded}${COLORS.reset} `;

  if (entry.requestId) {
    output += `${COLORS.cyan}[${entry.requestId.slice(0, 8)}]${COLORS.reset} `;
  }

  output += entry.message;

  if (entry.durationMs !== undefined) {
    output += ` ${COLORS.gray}(${entry.durationMs}ms)${COLORS.reset}`;
  }

  if (entry.http?.statusCode) {
    const statusColor =
      entry.http.statusCode >= 500
        ? COLORS.red
        : entry.http.statusCode >= 400
          ? COLORS.yellow
          : COLORS.green;
    output += ` ${COLORS.blue}${entry.http.method} ${entry.http.path} ${statusColor}${entry.http.statusCode}${COLORS.reset}`;
  }

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += `\n  ${COLORS.gray}context: ${JSON.stringify(entry.context)}${COLORS.reset}`;
  }

  if (entry.error) {
    output += `\n  ${COLORS.red}error: ${entry.error.name}: ${entry.error.message}${COLORS.reset}`;
    if (entry.error.stack) {
      const stackLines = entry.error.stack.split('\n').slice(1, 5);
      output += `\n  ${COLORS.gray}${stackLines.join('\n  ')}${COLORS.reset}`;
    }
  }

  return output;
}

function defaultOutput(entry: LogEntry): void {
  const formatted = formatEntry(entry);

  switch (entry.level) {
    case 'error':
    case 'fatal':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function toErrorInfo(error: unknown): ErrorInfo | undefined {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, stack: error.stack, code };
  }
  if (isRecord(error) && typeof error['message'] === 'string') {
    return {
      name: typeof error['name'] === 'string' ? error['name'] : 'Error',
      message: error['message'],
      code: typeof error['code'] === 'string' ? error['code'] : undefined,
    };
  }
  return undefined;
}

function toHttpInfo(http: unknown): HttpInfo | undefined {
  if (!isRecord(http) || typeof http['method'] !== 'string' || typeof http['path'] !== 'string') {
    return undefined;
  }
  const info: HttpInfo = { method: http['method'], path: http['path'] };
  if (typeof http['statusCode'] === 'number') info.statusCode = http['statusCode'];
  if (typeof http['userAgent'] === 'string') info.userAgent = http['userAgent'];
  if (typeof http['ip'] === 'string') info.ip = http['ip'];
  if (typeof http['durationMs'] === 'number') info.durationMs = http['durationMs'];
  if (isRecord(http['query'])) {
    const query: Record<string, string> = {};
    for (const [key, value] of Object.entries(redactRecord(http['query']))) {
      query[key] = String(value);
    }
    info.query = query;
  }
  return info;
}

// ============================================================================
// Logger Class
// ============================================================================

/**
 * Logger instance for creating structured log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'executor' });
 * logger.info('Request sent', { operation: 'get-task' });
 *
 * const reqLogger = logger.child({ requestId: 'abc-123' });
 * reqLogger.debug('Processing request');
 * ```
 */
export class Logger implements ILogger {
  private context: Record<string, unknown> = {};
  private requestId?: string;

  constructor(context?: Record<string, unknown>) {
    if (context) {
      this.context = { ...context };
    }
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): Logger {
    const child = new Logger({ ...this.context, ...context });
    child.requestId = this.requestId;
    return child;
  }

  /**
   * Set the request ID for correlation.
   * @returns This logger for chaining
   */
  setRequestId(requestId: string): this {
    this.requestId = requestId;
    return this;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[globalConfig.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: globalConfig.service,
      requestId: this.requestId,
    };

    const { error, durationMs, http, ...rest } = {
      ...globalConfig.defaultContext,
      ...this.context,
      ...data,
    };

    entry.error = toErrorInfo(error);

    if (typeof durationMs === 'number') {
      entry.durationMs = durationMs;
    }

    entry.http = toHttpInfo(http);

    if (Object.keys(rest).length > 0) {
      entry.context = redactRecord(rest);
    }

    const outputFn = globalConfig.output ?? defaultOutput;
    outputFn(entry);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  fatal(message: string, data?: Record<string, unknown>): void {
    this.log('fatal', message, data);
  }

  /**
   * Create a timed operation that logs duration on completion.
   *
   * @example
   * ```typescript
   * const timer = logger.time('user-worktime');
   * // ... perform operation ...
   * timer.end(); // Logs: "user-worktime completed (150ms)"
   * ```
   */
  time(operation: string, data?: Record<string, unknown>): { end: () => void } {
    const start = performance.now();
    return {
      end: () => {
        const durationMs = Math.round(performance.now() - start);
        this.info(`${operation} completed`, { ...data, durationMs });
      },
    };
  }
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger instance.
 *
 * @example
 * ```typescript
 * import { logger } from '@tasklink/logger';
 * logger.info('Server started');
 * ```
 */
export const logger = new Logger();

/**
 * Create a new logger with context.
 */
export function createLogger(context?: Record<string, unknown>): Logger {
  return new Logger(context);
}
