/**
 * Structured Logger with Trace IDs and Multiple Sinks
 *
 * Leveled, traceable logging shared by every stepwright component.
 * Components receive a logger through their constructor options; the
 * module-level instance only exists so `main.ts` has something to configure.
 *
 * Sinks:
 * - console: Human-readable output for the terminal (stderr)
 * - memory: Ring buffer for tests and programmatic access
 * - file: Append JSON lines to a log file
 *
 * Usage:
 *   const log = createComponentLogger('ActionExecutor');
 *   log.info('Command finished', { exitCode: 0 });
 *   log.withTrace('turn-3').warn('Block skipped');
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

// ─── Level Priority ──────────────────────────────────────────────────

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  silent: (text) => text,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ─── Sinks ───────────────────────────────────────────────────────────

/**
 * Console sink. Writes to stderr so log lines never mix with the
 * assistant text and queue rendering on stdout.
 */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const level = LEVEL_COLOR[entry.level](entry.level.toUpperCase().padEnd(5));
    const component = typeof entry.data?.component === 'string' ? chalk.dim(`[${entry.data.component}] `) : '';
    const traceStr = entry.traceId ? chalk.dim(` (${entry.traceId})`) : '';
    const rest = entry.data ? omitComponent(entry.data) : {};
    const dataStr = Object.keys(rest).length > 0 ? ' ' + chalk.dim(JSON.stringify(rest)) : '';
    process.stderr.write(`${level} ${component}${entry.message}${traceStr}${dataStr}\n`);
  }
}

function omitComponent(data: Record<string, unknown>): Record<string, unknown> {
  const { component: _component, ...rest } = data;
  return rest;
}

/** Memory sink: ring buffer for tests and programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; traceId?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.traceId) {
      entries = entries.filter((e) => e.traceId === filter.traceId);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }

  get size(): number {
    return this.buffer.length;
  }
}

/** File sink: append JSON lines to a log file */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;
  /** Entries that could not be written; there is nowhere else to report them. */
  dropped = 0;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    try {
      if (!this.initialized) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.initialized = true;
      }
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
    } catch {
      this.dropped++;
    }
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private defaultContext: Record<string, unknown>;
  private traceId?: string;
  /** Shared with children so the count covers the whole sink set. */
  private sinkFailures = { count: 0 };

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with a bound trace ID */
  withTrace(traceId: string): StructuredLogger {
    const child = new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: this.defaultContext,
    });
    child.traceId = traceId;
    child.sinkFailures = this.sinkFailures;
    return child;
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
    child.traceId = this.traceId;
    child.sinkFailures = this.sinkFailures;
    return child;
  }

  /** Update the minimum log level at runtime */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /** Writes that a sink threw on. */
  get failedWrites(): number {
    return this.sinkFailures.count;
  }

  /** Add a sink at runtime (e.g., add file sink after config is loaded) */
  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
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

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId && { traceId: this.traceId }),
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.sinks) {
      // A sink failure must never reach the caller.
      try {
        sink.write(entry);
      } catch {
        this.sinkFailures.count++;
      }
    }
  }
}

// ─── Root instance ───────────────────────────────────────────────────

/**
 * Root logger. `main.ts` reconfigures it once settings are known;
 * everything else derives children from it or takes one injected.
 */
export let logger = new StructuredLogger({ level: 'warn' });

/**
 * Reconfigure the root logger.
 *
 * Example:
 *   configureLogger({
 *     level: 'debug',
 *     sinks: [new ConsoleSink(), new FileSink('/tmp/stepwright.log')],
 *   });
 */
export function configureLogger(config: LoggerConfig): StructuredLogger {
  logger = new StructuredLogger(config);
  return logger;
}

/**
 * Create a logger for a specific component (adds component name to context).
 * Pass `parent` to derive from an injected logger instead of the root one.
 */
export function createComponentLogger(component: string, parent?: StructuredLogger): StructuredLogger {
  return (parent ?? logger).withContext({ component });
}

/** A logger that drops everything. */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ level: 'silent', sinks: [] });
}
