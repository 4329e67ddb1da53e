/**
 * Offline engine error codes
 *
 * Error codes are structured as OFFLINE_[CATEGORY][NUMBER]:
 * - K: Configuration errors (K100-K199)
 * - S: Cache store errors (S300-S399)
 * - N: Network errors (N500-N599)
 * - Y: Background sync errors (Y600-Y699)
 * - P: Push / notification errors (P700-P799)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Configuration errors (K100-K199)
  OFFLINE_K100: {
    code: 'OFFLINE_K100',
    message: 'Invalid engine configuration',
    suggestion: 'Check the listed configuration paths against the engine config schema.',
  },

  // Cache store errors (S300-S399)
  OFFLINE_S300: {
    code: 'OFFLINE_S300',
    message: 'Precache install failed',
    suggestion:
      'Every manifest URL must be reachable with an OK status. The host retries the whole install.',
  },
  OFFLINE_S301: {
    code: 'OFFLINE_S301',
    message: 'Cache write failed',
    suggestion: 'The storage quota may be exhausted. The response was still served.',
  },
  OFFLINE_S302: {
    code: 'OFFLINE_S302',
    message: 'Cache namespace could not be deleted',
    suggestion: 'Activation is idempotent; the next activation retries the cleanup.',
  },

  // Network errors (N500-N599)
  OFFLINE_N500: {
    code: 'OFFLINE_N500',
    message: 'Network request failed',
    suggestion: 'The device is offline or the origin is unreachable.',
  },
  OFFLINE_N501: {
    code: 'OFFLINE_N501',
    message: 'Origin returned an error status',
    suggestion: 'Inspect the response status returned by the origin.',
  },

  // Background sync errors (Y600-Y699)
  OFFLINE_Y600: {
    code: 'OFFLINE_Y600',
    message: 'Background sync replay failed',
    suggestion: 'Pending actions are kept and replayed on the next sync event.',
  },
  OFFLINE_Y601: {
    code: 'OFFLINE_Y601',
    message: 'Offline action queue is full',
    suggestion: 'Reconnect to flush pending actions or raise maxPendingActions.',
  },
  OFFLINE_Y602: {
    code: 'OFFLINE_Y602',
    message: 'Background sync registration failed',
    suggestion: 'The browser may not support the Background Sync API.',
  },

  // Push / notification errors (P700-P799)
  OFFLINE_P700: {
    code: 'OFFLINE_P700',
    message: 'Notification could not be displayed',
    suggestion: 'Check that notification permission has been granted.',
  },
  OFFLINE_P701: {
    code: 'OFFLINE_P701',
    message: 'Window could not be opened',
    suggestion: 'The host may refuse openWindow outside of a notification click.',
  },

  // Internal errors (X900-X999)
  OFFLINE_X900: {
    code: 'OFFLINE_X900',
    message: 'Unexpected engine error',
    suggestion: 'An unexpected error occurred. Check the logged cause.',
  },
  OFFLINE_X901: {
    code: 'OFFLINE_X901',
    message: 'Unhandled promise rejection',
    suggestion: 'A promise rejected without a handler. Check the logged reason.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'config' | 'cache' | 'network' | 'sync' | 'notification' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt('OFFLINE_'.length);
  switch (letter) {
    case 'K':
      return 'config';
    case 'S':
      return 'cache';
    case 'N':
      return 'network';
    case 'Y':
      return 'sync';
    case 'P':
      return 'notification';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
