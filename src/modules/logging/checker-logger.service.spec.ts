import { CheckerLogger, StructuredLogEntry } from './checker-logger.service';
import { LogCategory, LogLevel } from './log-levels';

describe('CheckerLogger', () => {
  let logger: CheckerLogger;
  let stderrSpy: jest.SpyInstance;
  let stdoutSpy: jest.SpyInstance;

  const entries = (): StructuredLogEntry[] =>
    stderrSpy.mock.calls.map(([line]) => JSON.parse(String(line)));

  /** A logger configured from LOG_* variables, on top of TRACE + json. */
  const createLogger = (env: Record<string, string> = {}): CheckerLogger => {
    jest.replaceProperty(process, 'env', {
      ...process.env,
      LOG_LEVEL: 'TRACE',
      LOG_FORMAT: 'json',
      LOG_CATEGORY_LEVELS: '',
      LOG_INCLUDE_STACKS: 'true',
      LOG_MAX_PAYLOAD_SIZE: '',
      ...env,
    });
    return new CheckerLogger();
  };

  beforeEach(() => {
    logger = createLogger();

    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ─── Configuration ────────────────────────────────────────────────

  describe('setGlobalLevel', () => {
    it('should accept a string', () => {
      logger.setGlobalLevel('error');
      expect(logger.isEnabled(LogLevel.WARN)).toBe(false);
      expect(logger.isEnabled(LogLevel.ERROR)).toBe(true);
    });

    it('should keep the current level for an unknown string', () => {
      logger.setGlobalLevel('loud');
      expect(logger.isEnabled(LogLevel.TRACE)).toBe(true);
    });
  });

  // ─── isEnabled ────────────────────────────────────────────────────

  describe('isEnabled', () => {
    it('should allow messages at or above global level', () => {
      logger.setGlobalLevel(LogLevel.WARN);
      expect(logger.isEnabled(LogLevel.INFO)).toBe(false);
      expect(logger.isEnabled(LogLevel.WARN)).toBe(true);
      expect(logger.isEnabled(LogLevel.ERROR)).toBe(true);
    });

    it('should use category override over global level', () => {
      logger = createLogger({ LOG_LEVEL: 'WARN', LOG_CATEGORY_LEVELS: 'http=TRACE' });
      expect(logger.isEnabled(LogLevel.TRACE, LogCategory.HTTP)).toBe(true);
      expect(logger.isEnabled(LogLevel.TRACE, LogCategory.CHECK)).toBe(false);
    });

    it('OFF level should suppress all messages', () => {
      logger.setGlobalLevel(LogLevel.OFF);
      expect(logger.isEnabled(LogLevel.FATAL)).toBe(false);
    });
  });

  // ─── Output ───────────────────────────────────────────────────────

  describe('logging methods', () => {
    it('should write one JSON line per entry to stderr', () => {
      logger.info(LogCategory.CHECK, 'Check finished', { title: 'Schemas endpoint' });

      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(entries()).toEqual([
        expect.objectContaining({
          level: 'INFO',
          category: 'check',
          message: 'Check finished',
          data: { title: 'Schemas endpoint' },
        }),
      ]);
    });

    it('should not emit when level is suppressed', () => {
      logger.setGlobalLevel(LogLevel.ERROR);
      logger.warn(LogCategory.CHECK, 'ignored');
      expect(stderrSpy).not.toHaveBeenCalled();
    });

    it('error() should include error info', () => {
      logger.error(LogCategory.GENERAL, 'Run failed', new TypeError('bad'));
      const [entry] = entries();
      expect(entry?.error).toMatchObject({ message: 'bad', name: 'TypeError' });
      expect(entry?.error?.stack).toContain('TypeError: bad');
    });

    it('error() should strip stacks when disabled', () => {
      logger = createLogger({ LOG_INCLUDE_STACKS: 'false' });
      logger.error(LogCategory.GENERAL, 'Run failed', new Error('bad'));
      expect(entries()[0]?.error).toEqual({ message: 'bad', name: 'Error' });
    });

    it('error() should describe non-Error values', () => {
      logger.fatal(LogCategory.GENERAL, 'Crashed', 'plain');
      expect(entries()[0]?.error).toEqual({ message: 'plain' });
    });

    it('should write a readable line in pretty mode', () => {
      logger = createLogger({ LOG_FORMAT: 'pretty' });
      logger.warn(LogCategory.CHECK, 'Object creation (User)', { status: 'ERROR' });

      const [line] = stderrSpy.mock.calls[0] ?? [''];
      // Colour codes are only added on a TTY.
      const plain = String(line).replace(/\x1b\[\d+m/g, '');
      expect(plain).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} WARN  check {6}Object creation \(User\) \| \{"status":"ERROR"\}\n$/);
    });
  });

  // ─── Correlation context ──────────────────────────────────────────

  describe('correlation context', () => {
    it('getContext should return undefined outside of runWithContext', () => {
      expect(logger.getContext()).toBeUndefined();
    });

    it('should attach runId and baseUrl inside a run', async () => {
      await logger.runWithContext({ runId: 'run-1', baseUrl: 'https://scim.test' }, async () => {
        await Promise.resolve();
        logger.debug(LogCategory.HTTP, 'GET /Users');
      });

      expect(entries()[0]).toMatchObject({ runId: 'run-1', baseUrl: 'https://scim.test' });
      expect(logger.getContext()).toBeUndefined();
    });

    it('runWithContext should return the callback result', () => {
      expect(logger.runWithContext({ runId: 'r' }, () => 42)).toBe(42);
    });
  });

  // ─── Sanitization ─────────────────────────────────────────────────

  describe('sanitization', () => {
    it('should redact sensitive fields', () => {
      logger.debug(LogCategory.CONFIG, 'Configuration loaded', { token: 'test-secret', baseUrl: 'https://scim.test' });
      expect(entries()[0]?.data).toEqual({ token: '[REDACTED]', baseUrl: 'https://scim.test' });
    });

    it('should truncate large string values', () => {
      logger = createLogger({ LOG_MAX_PAYLOAD_SIZE: '10' });
      logger.trace(LogCategory.HTTP, 'Response body', { body: 'x'.repeat(25) });
      expect(entries()[0]?.data).toEqual({ body: `${'x'.repeat(10)}...[truncated 15B]` });
    });

    it('should truncate large object values', () => {
      logger = createLogger({ LOG_MAX_PAYLOAD_SIZE: '10' });
      logger.trace(LogCategory.HTTP, 'Request', { body: { userName: 'bjensen' } });
      expect(entries()[0]?.data).toEqual({ body: '{"userName...[truncated]' });
    });
  });
});
