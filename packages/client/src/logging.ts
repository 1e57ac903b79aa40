/**
 * Structured Logging
 *
 * Structured logging with trace IDs, log levels, JSON output and
 * configurable sinks. Session transitions, page requests and pagination
 * statistics are reported through this module.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric log level values for comparison
 */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_VALUES;
}

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

/**
 * Get log level from the LOG_LEVEL environment variable
 */
export function getLogLevelFromEnv(): LogLevel {
  const envLevel = (typeof process !== 'undefined' ? process.env?.LOG_LEVEL : undefined)?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Trace ID for request correlation */
  traceId: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details if logging an error */
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  flush?(): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Whether to include stack traces */
  includeStackTraces?: boolean;
  /** Additional default context */
  defaultContext?: Record<string, unknown>;
  /** Initial trace ID */
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  getTraceId(): string;
  setTraceId(traceId: string): void;
  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;

  /** Flush any buffered log entries */
  flush(): Promise<void>;
}

// =============================================================================
// Utility Functions
// =============================================================================

function generateTraceId(): string {
  return randomUUID();
}

/**
 * Copy a value into plain JSON-friendly data, replacing circular references
 */
function sanitize(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item, seen));
  }
  return sanitizeRecord(Object.entries(value), seen);
}

function sanitizeRecord(entries: [string, unknown][], seen = new WeakSet<object>()): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    result[key] = sanitize(value, seen);
  }
  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string' && error.code.length > 0) {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private sink: LogSink;
  private defaultContext: Record<string, unknown>;
  private includeStackTraces: boolean;
  private _traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this._traceId = config.traceId ?? generateTraceId();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;

    const mergedContext = context
      ? { ...this.defaultContext, ...context }
      : Object.keys(this.defaultContext).length > 0
        ? this.defaultContext
        : undefined;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, mergedContext),
      traceId: this._traceId,
    };

    if (mergedContext && Object.keys(mergedContext).length > 0) {
      entry.context = sanitizeRecord(Object.entries(mergedContext));
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
      };
      const code = errorCode(error);
      if (code) {
        entry.error.code = code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    void this.sink.write(entry);
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this._traceId,
    });
  }

  getTraceId(): string {
    return this._traceId;
  }

  setTraceId(traceId: string): void {
    this._traceId = traceId;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  async flush(): Promise<void> {
    if (this.sink.flush) {
      await this.sink.flush();
    }
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

/**
 * One JSON line per entry on the console method matching its level
 */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const line = JSON.stringify(entry);
    switch (entry.level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

export interface JsonSinkOptions {
  /** Write function for output */
  write: (json: string) => void;
  prettyPrint?: boolean;
}

/**
 * JSON sink for structured output
 */
export class JsonSink implements LogSink {
  private writeFn: (json: string) => void;
  private prettyPrint: boolean;

  constructor(options: JsonSinkOptions) {
    this.writeFn = options.write;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    this.writeFn(this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }
}

/**
 * Discards every entry
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // Intentionally empty
  }
}

/**
 * Keeps entries in memory, for tests and diagnostics
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export interface RedactingSinkOptions {
  /** Context keys whose values are replaced */
  redactFields: string[];
  /** Patterns replaced inside strings */
  redactPatterns?: RegExp[];
}

/**
 * Replaces sensitive context values before handing entries on
 */
export class RedactingSink implements LogSink {
  private baseSink: LogSink;
  private redactFields: Set<string>;
  private redactPatterns: RegExp[];

  constructor(baseSink: LogSink, options: RedactingSinkOptions) {
    this.baseSink = baseSink;
    this.redactFields = new Set(options.redactFields.map((field) => field.toLowerCase()));
    this.redactPatterns = options.redactPatterns ?? [];
  }

  private redactString(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, '[REDACTED]');
    }
    return result;
  }

  private redact(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.redactString(value);
    }
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    return this.redactRecord(Object.entries(value));
  }

  private redactRecord(entries: [string, unknown][]): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of entries) {
      result[key] = this.redactFields.has(key.toLowerCase()) ? '[REDACTED]' : this.redact(value);
    }
    return result;
  }

  write(entry: LogEntry): void | Promise<void> {
    return this.baseSink.write({
      ...entry,
      message: this.redactString(entry.message),
      context: entry.context ? this.redactRecord(Object.entries(entry.context)) : undefined,
    });
  }

  async flush(): Promise<void> {
    if (this.baseSink.flush) {
      await this.baseSink.flush();
    }
  }

  async close(): Promise<void> {
    if (this.baseSink.close) {
      await this.baseSink.close();
    }
  }
}

/**
 * Context keys the client never lets through to a sink
 */
export const SENSITIVE_LOG_FIELDS: readonly string[] = ['token', 'password', 'authorization', 'cookie'];

/**
 * Logger used when the client configuration supplies none
 */
export function createDefaultClientLogger(level?: LogLevel): StructuredLogger {
  return createLogger({
    level,
    sink: new RedactingSink(new ConsoleSink(), { redactFields: [...SENSITIVE_LOG_FIELDS] }),
    defaultContext: { component: 'recordset' },
  });
}
