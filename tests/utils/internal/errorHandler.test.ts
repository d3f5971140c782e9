/**
 * @fileoverview Unit tests for ErrorHandler.
 * @module tests/utils/internal/errorHandler.test
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { ErrorHandler } from '@/utils/internal/errorHandler.js';
import { logger } from '@/utils/internal/logger.js';

const context = {
  requestId: 'test-req-5',
  timestamp: '2024-01-01T00:00:00.000Z',
};

describe('ErrorHandler', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('determineErrorCode', () => {
    it('keeps the code of an McpError', () => {
      expect(
        ErrorHandler.determineErrorCode(
          new McpError(JsonRpcErrorCode.Timeout, 'slow'),
        ),
      ).toBe(JsonRpcErrorCode.Timeout);
    });

    it('classifies zod, syntax and abort errors', () => {
      const zodError = z.string().safeParse(1).error;
      const abort = new Error('aborted');
      abort.name = 'AbortError';

      expect(ErrorHandler.determineErrorCode(zodError)).toBe(
        JsonRpcErrorCode.ValidationError,
      );
      expect(ErrorHandler.determineErrorCode(new SyntaxError('bad'))).toBe(
        JsonRpcErrorCode.SerializationError,
      );
      expect(ErrorHandler.determineErrorCode(abort)).toBe(
        JsonRpcErrorCode.Timeout,
      );
      expect(ErrorHandler.determineErrorCode('text')).toBe(
        JsonRpcErrorCode.InternalError,
      );
    });
  });

  describe('handleError', () => {
    it('returns McpErrors unchanged and logs them', () => {
      const original = new McpError(JsonRpcErrorCode.NotFound, 'missing');

      const result = ErrorHandler.handleError(original, {
        operation: 'lookup',
        context,
      });

      expect(result).toBe(original);
      expect(logger.error).toHaveBeenCalledWith(
        'Error in lookup: missing',
        expect.objectContaining({
          requestId: 'test-req-5',
          operation: 'lookup',
          errorCode: JsonRpcErrorCode.NotFound,
        }),
      );
    });

    it('joins zod issues into the message', () => {
      const parsed = z
        .object({ species: z.number() })
        .safeParse({ species: 'human' });

      const result = ErrorHandler.handleError(parsed.error, {
        operation: 'parse',
      });

      expect(result.code).toBe(JsonRpcErrorCode.ValidationError);
      expect(result.message).toBe('species: Expected number, received string');
    });

    it('classifies unknown errors as internal errors', () => {
      const result = ErrorHandler.handleError(new Error('odd'), {
        operation: 'op',
        context,
      });

      expect(result).toMatchObject({
        code: JsonRpcErrorCode.InternalError,
        message: 'odd',
        data: { requestId: 'test-req-5', originalErrorName: 'Error' },
      });
      expect(result.cause).toBeInstanceOf(Error);
    });

    it('throws when rethrow is set', () => {
      expect(() =>
        ErrorHandler.handleError(new Error('fatal'), {
          operation: 'op',
          rethrow: true,
        }),
      ).toThrow(McpError);
    });
  });
});
