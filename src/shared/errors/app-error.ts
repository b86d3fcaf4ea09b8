/**
 * Application Error Types
 *
 * Structured error types shared by the environment, the action layer and
 * the tool server
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base error class
 *
 * Extends Error with a code, a severity and optional details
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AppError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Convert to a structured error object for tool responses
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Create from standard Error
   */
  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): AppError {
    return new AppError(error.message, code, severity, undefined, error);
  }
}

/**
 * Domain-specific error classes
 */

export class BrowserError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.BROWSER_NOT_CONNECTED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'BrowserError';
  }
}

export class ElementError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ELEMENT_NOT_FOUND,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.WARNING, details);
    this.name = 'ElementError';
  }
}

export class ActionError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ACTION_FAILED,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.WARNING, details);
    this.name = 'ActionError';
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_CONFIG,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.CRITICAL, details, cause);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a readable message from any thrown value.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown Error';
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
