/**
 * Structured logging
 *
 * Every component of an agent logs through a {@link StructuredLogger}
 * derived from the one handed to the agent. Messages are templates whose
 * `{field}` placeholders are filled from the entry's context; the context
 * itself is kept on the entry.
 *
 * Child loggers share their parent's level and sink: `setLevel` on the root
 * logger applies to every component at once.
 *
 * @packageDocumentation
 */

import type { Writable } from 'node:stream';

// =============================================================================
// Levels
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Environment variable read for the level of loggers created without one.
 */
export const LOG_LEVEL_ENV = 'CLUSTERLINK_LOG_LEVEL';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

function levelFromEnv(): LogLevel {
  const value = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : 'info';
}

// =============================================================================
// Entries & Sinks
// =============================================================================

export interface LogEntry {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  /** The template with its placeholders filled in */
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  /** Defaults to $CLUSTERLINK_LOG_LEVEL, then 'info' */
  level?: LogLevel;
  /** Defaults to JSON lines on stderr */
  sink?: LogSink;
  /** Fields added to every entry */
  context?: Record<string, unknown>;
  includeStackTraces?: boolean;
}

export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;
  /** A logger that adds `context` to every entry */
  child(context: Record<string, unknown>): StructuredLogger;
  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Context values
// =============================================================================

/**
 * Copy a context value into something JSON can carry: bigints become
 * strings, buffers their length, errors their message.
 */
function toLogValue(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Buffer.isBuffer(value)) {
    return `<${value.length} bytes>`;
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (Array.isArray(value)) {
    return value.map(item => toLogValue(item, seen));
  }
  if (value instanceof Map) {
    return toLogValue(Object.fromEntries(value), seen);
  }
  if (value instanceof Set) {
    return toLogValue([...value], seen);
  }
  const copy: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    copy[key] = toLogValue(field, seen);
  }
  return copy;
}

function fillTemplate(template: string, context: Record<string, unknown> | undefined): string {
  if (!context) {
    return template;
  }
  return template.replace(/\{(\w+)\}/g, (placeholder: string, field: string) =>
    Object.hasOwn(context, field) ? String(context[field]) : placeholder
  );
}

function describeError(error: Error, withStack: boolean): NonNullable<LogEntry['error']> {
  const described: NonNullable<LogEntry['error']> = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    described.code = error.code;
  }
  if (withStack && error.stack) {
    described.stack = error.stack;
  }
  return described;
}

// =============================================================================
// Logger
// =============================================================================

/** State shared by a logger and all of its children */
interface LoggerCore {
  level: LogLevel;
  readonly sink: LogSink;
  readonly includeStackTraces: boolean;
}

class Logger implements StructuredLogger {
  constructor(
    private readonly core: LoggerCore,
    private readonly bound: Record<string, unknown>
  ) {}

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger(this.core, { ...this.bound, ...context });
  }

  getLevel(): LogLevel {
    return this.core.level;
  }

  setLevel(level: LogLevel): void {
    this.core.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.core.level];
  }

  private write(
    level: LogLevel,
    message: string | (() => string),
    context: Record<string, unknown> | undefined,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const fields = context ? { ...this.bound, ...context } : this.bound;
    const hasFields = Object.keys(fields).length > 0;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: fillTemplate(typeof message === 'function' ? message() : message, hasFields ? fields : undefined),
    };
    if (hasFields) {
      const seen = new WeakSet<object>();
      entry.context = {};
      for (const [key, value] of Object.entries(fields)) {
        entry.context[key] = toLogValue(value, seen);
      }
    }
    if (error) {
      entry.error = describeError(error, this.core.includeStackTraces);
    }

    try {
      this.core.sink.write(entry);
    } catch (sinkError) {
      process.emitWarning(
        `log sink failed: ${sinkError instanceof Error ? sinkError.message : String(sinkError)}`,
        'LogSinkWarning'
      );
    }
  }
}

export function createLogger(config: LoggerConfig = {}): StructuredLogger {
  return new Logger(
    {
      level: config.level ?? levelFromEnv(),
      sink: config.sink ?? new StreamSink(),
      includeStackTraces: config.includeStackTraces ?? true,
    },
    config.context ?? {}
  );
}

/**
 * A logger that discards everything.
 */
export function createNoopLogger(): StructuredLogger {
  return new Logger({ level: 'error', sink: new NoOpSink(), includeStackTraces: false }, {});
}

// =============================================================================
// Sinks
// =============================================================================

export interface StreamSinkOptions {
  /** Defaults to process.stderr */
  stream?: Writable;
  /** One human-readable line per entry instead of JSON */
  pretty?: boolean;
}

/**
 * Writes one line per entry to a stream.
 */
export class StreamSink implements LogSink {
  private readonly stream: Writable;
  private readonly pretty: boolean;

  constructor(options: StreamSinkOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.pretty = options.pretty ?? false;
  }

  write(entry: LogEntry): void {
    this.stream.write(`${this.pretty ? StreamSink.prettyLine(entry) : JSON.stringify(entry)}\n`);
  }

  /**
   * `<timestamp> <LEVEL> <message>`, followed by the error and the context
   * fields as `key=value`.
   */
  static prettyLine(entry: LogEntry): string {
    let line = `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
    if (entry.error) {
      line += ` error=${JSON.stringify(`${entry.error.name}: ${entry.error.message}`)}`;
    }
    for (const [key, value] of Object.entries(entry.context ?? {})) {
      line += ` ${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`;
    }
    return line;
  }
}

export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {}
}

/**
 * Keeps every entry, for assertions in tests.
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Entries whose (filled in) message matches */
  find(message: string | RegExp): LogEntry[] {
    return this.entries.filter(entry =>
      typeof message === 'string' ? entry.message === message : message.test(entry.message)
    );
  }

  clear(): void {
    this.entries.length = 0;
  }
}
