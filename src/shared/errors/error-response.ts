/**
 * Error Response Utilities
 *
 * Utilities for creating structured tool responses
 */

import { AppError } from './app-error.js';
import { ErrorCode } from './error-codes.js';

/**
 * Tool response type
 */
export interface ToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Create a structured error response for tools
 *
 * @param error - Error to convert to structured response
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 * @returns Structured tool response with isError flag
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): ToolResponse {
  let appError: AppError;
  if (error instanceof AppError) {
    appError = error;
  } else if (error instanceof Error) {
    appError = AppError.fromError(error);
  } else {
    appError = new AppError(String(error), ErrorCode.UNKNOWN_ERROR);
  }

  const structured = appError.toStructured();

  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details, null, 2)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [
      {
        type: 'text',
        text: textParts.join('\n'),
      },
    ],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response carrying JSON output
 *
 * @param output - Output data to return
 * @param text - Text content; defaults to the output as JSON
 * @returns Structured tool response
 */
export function createSuccessResponse(output: Record<string, unknown>, text?: string): ToolResponse {
  return {
    content: [{ type: 'text', text: text ?? JSON.stringify(output, null, 2) }],
    structuredContent: output,
    isError: false,
  };
}
