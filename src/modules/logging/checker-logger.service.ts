import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * Correlation context attached to every log entry within a single check run.
 */
export interface RunContext {
  /** Unique run ID (UUID), one per checkServer() call. */
  runId: string;
  /** Base URL of the server under test */
  baseUrl?: string;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  /** Log severity */
  level: string;
  /** Functional category */
  category: string;
  /** Human-readable message */
  message: string;
  /** Correlation ID linking all logs for a single run */
  runId?: string;
  /** Server under test */
  baseUrl?: string;
  /** Milliseconds since the run started */
  durationMs?: number;
  /** Error information */
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  /** Additional structured data (request bodies, check results, etc.) */
  data?: Record<string, unknown>;
}

// Singleton storage for run-scoped correlation context
const runStorage = new AsyncLocalStorage<RunContext>();

/**
 * CheckerLogger — Structured, leveled, correlation-aware logger for the tester.
 *
 * All output goes to stderr: stdout carries the report.
 *
 * Usage:
 *   this.logger.info(LogCategory.CHECK, 'Check finished', { title, status });
 *   this.logger.trace(LogCategory.HTTP, 'Response body', { body });
 */
@Injectable()
export class CheckerLogger {
  private readonly config: LogConfig;

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  /** Run a function within a correlation context (one per check run). */
  runWithContext<T>(ctx: RunContext, fn: () => T): T {
    return runStorage.run(ctx, fn);
  }

  /** Get the current correlation context (if inside a run). */
  getContext(): RunContext | undefined {
    return runStorage.getStore();
  }

  // ─── Configuration ────────────────────────────────────────────────

  /** Set global log level at runtime (e.g. from --log-level). */
  setGlobalLevel(level: LogLevel | string): void {
    this.config.globalLevel = typeof level === 'string' ? parseLogLevel(level, this.config.globalLevel) : level;
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  /** Check if a log at the given level + category should be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (level === LogLevel.OFF) return false;
    const categoryLevel = category ? this.config.categoryLevels[category] : undefined;
    if (categoryLevel !== undefined) {
      return level >= categoryLevel;
    }
    return level >= this.config.globalLevel;
  }

  // ─── Core logging logic ───────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const ctx = this.getContext();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      runId: ctx?.runId,
      baseUrl: ctx?.baseUrl,
    };

    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = this.config.includeStackTraces ? errorInfo : { message: errorInfo.message, name: errorInfo.name };
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    process.stderr.write(this.format(level, entry) + '\n');
  }

  /** Format an error object for structured output. */
  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Sanitize data: truncate large payloads, redact secrets. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (/secret|password|token|authorization|bearer/i.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (typeof value === 'string' && value.length > this.config.maxPayloadSizeBytes) {
        result[key] = value.slice(0, this.config.maxPayloadSizeBytes) + `...[truncated ${value.length - this.config.maxPayloadSizeBytes}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        if (serialized.length > this.config.maxPayloadSizeBytes) {
          result[key] = serialized.slice(0, this.config.maxPayloadSizeBytes) + `...[truncated]`;
        } else {
          result[key] = value;
        }
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private format(level: LogLevel, entry: StructuredLogEntry): string {
    return this.config.format === 'json' ? JSON.stringify(entry) : this.formatPretty(level, entry);
  }

  /** Pretty human-readable output for terminals. */
  private formatPretty(level: LogLevel, entry: StructuredLogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(10);
    const runId = entry.runId ? ` [${entry.runId.slice(0, 8)}]` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${runId}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      // For TRACE/DEBUG show full data, for higher levels show compact
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }
    return line;
  }

  /** ANSI colorize for terminal output. */
  private colorize(level: LogLevel, text: string): string {
    if (!process.stderr.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;  // gray
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;  // cyan
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;  // green
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;  // yellow
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;  // red
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;  // magenta
      default: return text;
    }
  }
}
