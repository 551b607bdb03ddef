/**
 * @fileoverview Shapes shared by the logger and its Hono middleware
 * @module @tasklink/logger/types
 */

/**
 * Severity rank per level; entries below the configured level are dropped.
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Narrow `LOG_LEVEL` (or any string) to a level.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** Structured data attached to one log call */
export type LogData = Record<string, unknown>;

export type LogMethod = (message: string, data?: LogData) => void;

/**
 * Serialisable view of a thrown value. `code` carries the error code of
 * toolkit errors.
 */
export type ErrorInfo = Pick<Error, 'name' | 'message' | 'stack'> & { code?: string };

/**
 * One served request, as the request logger reports it. Query values are
 * redacted before they reach an entry.
 */
export interface HttpInfo {
  method: string;
  path: string;
  statusCode?: number;
  durationMs?: number;
  userAgent?: string;
  ip?: string;
  query?: Record<string, string>;
}

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  requestId?: string;
  /** Remaining call data after redaction */
  context?: LogData;
  error?: ErrorInfo;
  durationMs?: number;
  http?: HttpInfo;
}

export type LogOutput = (entry: LogEntry) => void;

export interface LoggerConfig {
  level: LogLevel;
  service: string;
  format: 'json' | 'pretty';
  /** Prefix pretty lines with the time */
  timestamps: boolean;
  /** Merged under every entry's data */
  defaultContext?: LogData;
  /** Credential keys, matched case-insensitively at any depth */
  redactKeys: readonly string[];
  /** Replaces console output; tests collect entries through it */
  output?: LogOutput;
}

/**
 * What library code needs from a logger: one method per level plus `child`.
 */
export type ILogger = Record<LogLevel, LogMethod> & {
  child(context: LogData): ILogger;
};
