/**
 * @fileoverview Centralized error normalization and logging.
 * Converts arbitrary thrown values into {@link McpError} instances so callers
 * (tool handlers, the CLI) can report a single consistent shape.
 * @module src/utils/internal/errorHandler
 */
import { ZodError } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from './logger.js';
import type { RequestContext } from './requestContext.js';

export interface ErrorHandlerOptions {
  /** Name of the operation that failed, used in the log line. */
  operation: string;
  context?: RequestContext;
  input?: unknown;
  rethrow?: boolean;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class ErrorHandler {
  /**
   * Maps an unknown error to the closest {@link JsonRpcErrorCode}.
   */
  public static determineErrorCode(error: unknown): JsonRpcErrorCode {
    if (error instanceof McpError) return error.code;
    if (error instanceof ZodError) return JsonRpcErrorCode.ValidationError;
    if (error instanceof SyntaxError) return JsonRpcErrorCode.SerializationError;
    if (error instanceof Error && error.name === 'AbortError') {
      return JsonRpcErrorCode.Timeout;
    }
    return JsonRpcErrorCode.InternalError;
  }

  /**
   * Normalizes and logs an error. Returns the normalized {@link McpError},
   * or throws it when `rethrow` is set.
   */
  public static handleError(
    error: unknown,
    options: ErrorHandlerOptions,
  ): McpError {
    const { operation, context, input, rethrow = false } = options;

    let mcpError: McpError;
    if (error instanceof McpError) {
      mcpError = error;
    } else {
      const code = ErrorHandler.determineErrorCode(error);
      const message =
        error instanceof ZodError
          ? error.issues
              .map((issue) =>
                issue.path.length > 0
                  ? `${issue.path.join('.')}: ${issue.message}`
                  : issue.message,
              )
              .join('; ')
          : getErrorMessage(error);
      mcpError = new McpError(
        code,
        message,
        {
          ...(context && { requestId: context.requestId }),
          originalErrorName: error instanceof Error ? error.name : typeof error,
        },
        { cause: error },
      );
    }

    logger.error(`Error in ${operation}: ${mcpError.message}`, {
      ...context,
      operation,
      errorCode: mcpError.code,
      errorData: mcpError.data,
      input,
      error: error instanceof Error ? error : undefined,
    });

    if (rethrow) {
      throw mcpError;
    }
    return mcpError;
  }
}
