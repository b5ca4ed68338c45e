/**
 * Structured Logger
 *
 * Leveled logging with bound context and pluggable sinks. Component loggers
 * are usually created at module load, before the CLI or host application has
 * read its configuration, so every logger shares one root: reconfiguring the
 * root changes level and sinks for all of them.
 *
 * Sinks:
 * - console: human-readable lines
 * - memory: ring buffer, used by tests and hosts that display logs
 * - file: JSON lines appended to a file
 *
 * Usage:
 *   const log = createComponentLogger('GroupChat');
 *   log.info('Conversation terminated', { turns: 4 });
 *   log.withContext({ chat: 'planning' }).warn('Agent not found');
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

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
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

// ─── Sinks ───────────────────────────────────────────────────────────

export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const traceStr = entry.traceId ? ` (${entry.traceId})` : '';
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    const line = `${prefix}${traceStr} ${entry.message}${dataStr}`;

    switch (entry.level) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(line);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
    }
  }
}

/** Ring buffer of recent entries */
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

  getEntries(filter?: { level?: LogLevel; component?: string; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.component) {
      entries = entries.filter((e) => e.data?.component === filter.component);
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

/** Appends one JSON object per line */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

/** Level and sinks shared by a logger and all of its children */
interface LogRoot {
  level: LogLevel;
  sinks: LogSink[];
}

export class StructuredLogger {
  private root: LogRoot;
  private context: Record<string, unknown>;
  private traceId?: string;

  constructor(config: LoggerConfig = {}, root?: LogRoot, context: Record<string, unknown> = {}) {
    this.root = root ?? {
      level: config.level ?? 'info',
      sinks: config.sinks ?? [new ConsoleSink()],
    };
    this.context = context;
  }

  withTrace(traceId: string): StructuredLogger {
    const child = new StructuredLogger({}, this.root, this.context);
    child.traceId = traceId;
    return child;
  }

  withContext(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({}, this.root, { ...this.context, ...context });
    child.traceId = this.traceId;
    return child;
  }

  /** Applies to this logger, its parent and every sibling */
  setLevel(level: LogLevel): void {
    this.root.level = level;
  }

  getLevel(): LogLevel {
    return this.root.level;
  }

  setSinks(sinks: LogSink[]): void {
    this.root.sinks = sinks;
  }

  addSink(sink: LogSink): void {
    this.root.sinks.push(sink);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.root.level] && level !== 'silent';
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
    if (!this.isEnabled(level)) {
      return;
    }

    const merged = { ...this.context, ...data };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId !== undefined && { traceId: this.traceId }),
      ...(Object.keys(merged).length > 0 && { data: merged }),
    };

    for (const sink of this.root.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error(`log sink failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}

// ─── Global root ─────────────────────────────────────────────────────

/**
 * Process-wide logger. Console sink at 'info' until `configureLogger()`.
 */
export const logger = new StructuredLogger();

/**
 * Reconfigure the process-wide logger, and with it every component logger.
 *
 * Example:
 *   configureLogger({
 *     level: 'debug',
 *     sinks: [new ConsoleSink(), new FileSink('.convene/logs/convene.log')],
 *   });
 */
export function configureLogger(config: LoggerConfig): void {
  if (config.level) {
    logger.setLevel(config.level);
  }
  if (config.sinks) {
    logger.setSinks(config.sinks);
  }
}

/**
 * Logger that tags every entry with `component`.
 */
export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
