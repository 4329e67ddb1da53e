/**
 * Structured logging for the offline engine.
 *
 * Every component receives a child of the engine logger, so log lines carry
 * a module path such as `sw:fetch` or `sw:sync`.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface EngineLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console) */
  readonly handler?: (entry: LogEntry) => void;
  /** Emit entries as single-line JSON instead of the text format */
  readonly json?: boolean;
}

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all engine loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Format an entry as `2025-08-01T09:00:00.000Z INFO[sw:fetch] message {"url":"/"}`.
 */
export function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `${timestamp} ${entry.level.toUpperCase()}[${entry.module}] ${entry.message}${contextStr}`;
}

function consoleHandler(entry: LogEntry, json: boolean): void {
  const line = json ? JSON.stringify(entry) : formatLogEntry(entry);

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

/**
 * Structured logger for engine modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'sw', level: 'debug' });
 * const fetchLog = log.child('fetch');
 *
 * fetchLog.info('Serving from cache', { url: request.url });
 *
 * const end = log.time('install');
 * await lifecycle.install();
 * end({ entries: 5 }); // logs "install completed" with durationMs
 * ```
 */
export class EngineLogger {
  private readonly config: Required<Omit<EngineLoggerConfig, 'handler'>> &
    Pick<EngineLoggerConfig, 'handler'>;

  constructor(config: EngineLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'sw',
      handler: config.handler,
      json: config.json ?? false,
    };
  }

  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): EngineLogger {
    return new EngineLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error !== undefined ? { error: describeError(error) } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    consoleHandler(entry, this.config.json);
  }
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const described: Record<string, unknown> = { name: error.name, message: error.message };
    if ('code' in error && typeof error.code === 'string') {
      described.code = error.code;
    }
    if (error.stack) {
      described.stack = error.stack;
    }
    return described;
  }
  return { message: String(error) };
}

/** Factory function to create an EngineLogger */
export function createLogger(config?: EngineLoggerConfig): EngineLogger {
  return new EngineLogger(config);
}

/** Logger that drops every entry */
export const silentLogger = new EngineLogger({ handler: () => {} });
