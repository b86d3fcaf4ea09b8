/**
 * Error Codes
 *
 * Stable codes and severities attached to structured errors
 */

export enum ErrorCode {
  // Browser / session
  BROWSER_NOT_CONNECTED = 'BROWSER_NOT_CONNECTED',
  BROWSER_LAUNCH_FAILED = 'BROWSER_LAUNCH_FAILED',
  ENVIRONMENT_NOT_READY = 'ENVIRONMENT_NOT_READY',
  TAB_NOT_FOUND = 'TAB_NOT_FOUND',

  // Targeting
  ELEMENT_NOT_FOUND = 'ELEMENT_NOT_FOUND',
  AMBIGUOUS_TARGET = 'AMBIGUOUS_TARGET',

  // Actions
  INVALID_ACTION_JSON = 'INVALID_ACTION_JSON',
  INVALID_ACTION = 'INVALID_ACTION',
  ACTION_FAILED = 'ACTION_FAILED',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
