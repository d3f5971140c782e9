/**
 * @fileoverview Creates request contexts used to correlate log lines and
 * errors belonging to one operation (a tool call, a CLI command).
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

/**
 * Context carried through every service call for tracing and logging.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation?: string;
  [key: string]: unknown;
}

export interface CreateRequestContextParams {
  operation?: string;
  parentContext?: Partial<RequestContext>;
  additionalContext?: Record<string, unknown>;
}

export const requestContextService = {
  /**
   * Creates a new context. A parent's `requestId` is inherited so nested
   * operations share one correlation id.
   */
  createRequestContext(
    params: CreateRequestContextParams = {},
  ): RequestContext {
    const { operation, parentContext, additionalContext } = params;
    return {
      ...parentContext,
      ...additionalContext,
      requestId: parentContext?.requestId ?? randomUUID(),
      timestamp: new Date().toISOString(),
      ...(operation !== undefined && { operation }),
    };
  },
};
