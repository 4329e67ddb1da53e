/**
 * Engine error system
 *
 * @example
 * ```typescript
 * import { EngineError, SyncReplayError } from '@offline-attendance/core';
 *
 * try {
 *   await sync.handleSync('attendance-sync');
 * } catch (error) {
 *   if (EngineError.isCode(error, 'OFFLINE_Y600')) {
 *     // the host reschedules the sync
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CacheWriteError,
  ConfigError,
  EngineError,
  InstallError,
  NotificationError,
  SyncReplayError,
  ensureEngineError,
  type ConfigIssue,
  type EngineErrorOptions,
  type SerializedEngineError,
} from './engine-error.js';
