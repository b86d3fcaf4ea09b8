import { describe, it, expect } from 'vitest';
import {
  ActionError,
  AppError,
  ErrorCode,
  ErrorSeverity,
  createErrorResponse,
  createSuccessResponse,
  extractErrorMessage,
} from '../../../src/shared/errors/index.js';

describe('createErrorResponse', () => {
  it('formats an application error without the stack', () => {
    const response = createErrorResponse(
      new ActionError('Invalid tab ID: 3', ErrorCode.TAB_NOT_FOUND, { tabId: 3 }),
      false
    );

    expect(response.isError).toBe(true);
    expect(response.content[0]?.text).toBe(
      'Error: Invalid tab ID: 3\nCode: TAB_NOT_FOUND\nSeverity: warning\nDetails: {\n  "tabId": 3\n}'
    );
    expect(response.structuredContent).toEqual({
      error: 'Invalid tab ID: 3',
      code: ErrorCode.TAB_NOT_FOUND,
      severity: ErrorSeverity.WARNING,
      details: { tabId: 3 },
    });
  });

  it('wraps plain errors and thrown strings', () => {
    expect(createErrorResponse(new Error('boom'), false).content[0]?.text).toBe(
      'Error: boom\nCode: UNKNOWN_ERROR\nSeverity: error'
    );
    expect(createErrorResponse('bad', false).content[0]?.text).toBe('Error: bad\nCode: UNKNOWN_ERROR\nSeverity: error');
  });

  it('appends the stack when asked', () => {
    const error = new AppError('failed');

    const text = createErrorResponse(error, true).content[0]?.text ?? '';

    expect(text.endsWith(`\n\nStack trace:\n${error.stack ?? ''}`)).toBe(true);
  });
});

describe('createSuccessResponse', () => {
  it('defaults the text to indented JSON', () => {
    expect(createSuccessResponse({ ok: true })).toEqual({
      content: [{ type: 'text', text: '{\n  "ok": true\n}' }],
      structuredContent: { ok: true },
      isError: false,
    });
  });
});

describe('extractErrorMessage', () => {
  it('reads messages from any thrown value', () => {
    expect(extractErrorMessage(new Error('boom'))).toBe('boom');
    expect(extractErrorMessage('plain')).toBe('plain');
    expect(extractErrorMessage({ code: 1 })).toBe('{"code":1}');
    expect(extractErrorMessage(undefined)).toBe('undefined');
  });
});
