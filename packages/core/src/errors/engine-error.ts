/**
 * EngineError - error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an EngineError
 */
export interface EngineErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of an EngineError
 */
export interface SerializedEngineError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedEngineError | { name: string; message: string; stack?: string };
}

/**
 * Base error for the offline engine.
 *
 * @example
 * ```typescript
 * throw new EngineError({
 *   code: 'OFFLINE_S300',
 *   context: { url: '/static/icon-192.png', status: 404 },
 * });
 *
 * if (EngineError.isCategory(error, 'sync')) {
 *   // leave the action queued for the next sync event
 * }
 * ```
 */
export class EngineError extends Error {
  readonly code: ErrorCode;

  readonly suggestion?: string;

  readonly category: ErrorCategory;

  readonly context: Record<string, unknown>;

  override readonly cause?: Error;

  constructor(options: EngineErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'EngineError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }

  /**
   * Create an EngineError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): EngineError {
    return new EngineError({ code, context });
  }

  /**
   * Wrap an existing error with an EngineError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): EngineError {
    return new EngineError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isEngineError(error: unknown): error is EngineError {
    return error instanceof EngineError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return EngineError.isEngineError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return EngineError.isEngineError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedEngineError {
    const result: SerializedEngineError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (EngineError.isEngineError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * A single invalid configuration field
 */
export interface ConfigIssue {
  /** Dotted path of the field, e.g. `notification.vibrate.1` */
  path: string;
  message: string;
}

/**
 * Configuration rejected by the engine config schema
 */
export class ConfigError extends EngineError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');

    super({
      code: 'OFFLINE_K100',
      message: `Invalid engine configuration: ${summary}`,
      context: { issues },
    });

    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Precache install could not fetch every manifest URL
 */
export class InstallError extends EngineError {
  /** Manifest URLs that could not be fetched */
  readonly failedUrls: string[];

  constructor(namespace: string, failedUrls: string[], cause?: Error) {
    super({
      code: 'OFFLINE_S300',
      message:
        failedUrls.length > 0
          ? `Install of "${namespace}" failed: ${failedUrls.length} manifest URL(s) unreachable`
          : `Install of "${namespace}" failed while writing the shell`,
      context: { namespace, failedUrls },
      cause,
    });

    this.name = 'InstallError';
    this.failedUrls = failedUrls;
  }
}

/**
 * A response snapshot could not be written to the cache store
 */
export class CacheWriteError extends EngineError {
  constructor(namespace: string, key: string, cause?: Error) {
    super({
      code: 'OFFLINE_S301',
      message: `Could not write "${key}" to cache "${namespace}"`,
      context: { namespace, key },
      cause,
    });

    this.name = 'CacheWriteError';
  }
}

/**
 * Background sync replay left actions pending
 */
export class SyncReplayError extends EngineError {
  /** Number of actions still pending after the replay */
  readonly pending: number;

  constructor(tag: string, pending: number, cause?: Error) {
    super({
      code: 'OFFLINE_Y600',
      message: `Sync "${tag}" left ${pending} action(s) pending`,
      context: { tag, pending },
      cause,
    });

    this.name = 'SyncReplayError';
    this.pending = pending;
  }
}

/**
 * Notification surface refused a display or navigation request
 */
export class NotificationError extends EngineError {
  constructor(
    code: 'OFFLINE_P700' | 'OFFLINE_P701',
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'NotificationError';
  }
}

/**
 * Helper function to ensure errors are EngineErrors
 */
export function ensureEngineError(
  error: unknown,
  defaultCode: ErrorCode = 'OFFLINE_X900'
): EngineError {
  if (EngineError.isEngineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return EngineError.wrap(error, defaultCode);
  }

  return new EngineError({
    code: defaultCode,
    message: String(error),
  });
}
