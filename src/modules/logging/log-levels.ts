/**
 * Structured Log Levels — follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  — Full request/response bodies exchanged with the server under test.
 *   DEBUG  — One line per HTTP exchange, payload generation, discovery details.
 *   INFO   — Check results and run boundaries.
 *   WARN   — A check reported ERROR.
 *   ERROR  — The run itself could not proceed (bad configuration, bootstrap failure).
 *   FATAL  — Unrecoverable process-level failure.
 *   OFF    — Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** Level used when LOG_LEVEL is unset: the report on stdout is the primary output. */
export const DEFAULT_LOG_LEVEL = LogLevel.WARN;

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = DEFAULT_LOG_LEVEL): LogLevel {
  if (!value) return fallback;
  const upper = value.toUpperCase().trim();
  // Look up named key; typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped: unknown = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  // Numeric fallback
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) return num;
  return fallback;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** Check execution and results */
  CHECK = 'check',
  /** HTTP exchanges with the server under test */
  HTTP = 'http',
  /** Configuration loading */
  CONFIG = 'config',
  /** General / uncategorized */
  GENERAL = 'general',
}

export interface LogConfig {
  /** Global minimum log level (default: WARN, can be overridden by LOG_LEVEL env var). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'http': LogLevel.TRACE }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Bodies larger are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (CI), 'pretty' for human-readable (terminal). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  return {
    globalLevel: parseLogLevel(env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(env.LOG_CATEGORY_LEVELS),
    includeStackTraces: env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  };
}

const LOG_CATEGORIES: readonly string[] = Object.values(LogCategory);

function isLogCategory(value: string): value is LogCategory {
  return LOG_CATEGORIES.includes(value);
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "http=TRACE,check=INFO"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
