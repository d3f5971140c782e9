/**
 * @fileoverview Fetch wrapper that aborts after a timeout and turns transport
 * failures and non-success statuses into {@link McpError}s.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Options for {@link fetchWithTimeout}: standard `RequestInit` minus `signal`,
 * which is owned by the timeout.
 */
export type FetchWithTimeoutOptions = Omit<RequestInit, 'signal'>;

/** Longest error body kept in error data and logs. */
const MAX_ERROR_BODY_LENGTH = 500;

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.length > MAX_ERROR_BODY_LENGTH
      ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}…`
      : text;
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}

/** Reads the body of a successful response. */
export type BodyReader<T> = (response: Response) => Promise<T>;

/**
 * Fetches a resource and reads its body, aborting after `timeoutMs`. The
 * timer covers the body as well as the headers, so a stalled body times out.
 *
 * @returns Whatever `readBody` makes of the 2xx response.
 * @throws {McpError} `Timeout` when aborted, `ServiceUnavailable` for network
 * errors and for non-2xx statuses (the message carries the status code).
 */
export async function fetchWithTimeout<T>(
  url: string | URL,
  timeoutMs: number,
  context: RequestContext,
  readBody: BodyReader<T>,
  options: FetchWithTimeoutOptions = {},
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  const urlString = url.toString();
  const operationDescription = `fetch ${options.method ?? 'GET'} ${urlString}`;

  const timeoutError = (): McpError => {
    logger.error(`${operationDescription} timed out after ${timeoutMs}ms.`, {
      ...context,
      errorSource: 'FetchTimeout',
    });
    return new McpError(
      JsonRpcErrorCode.Timeout,
      `${operationDescription} timed out.`,
      { requestId: context.requestId, errorSource: 'FetchTimeout' },
    );
  };

  logger.debug(`Attempting ${operationDescription} with ${timeoutMs}ms timeout.`, {
    ...context,
  });

  try {
    let response: Response;
    try {
      response = await fetch(url, { ...options, signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw timeoutError();
      }

      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error(`Network error during ${operationDescription}: ${errorMessage}`, {
        ...context,
        originalErrorName: error instanceof Error ? error.name : 'UnknownError',
        errorSource: 'FetchNetworkError',
      });
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        `Network error during ${operationDescription}: ${errorMessage}`,
        {
          requestId: context.requestId,
          originalErrorName: error instanceof Error ? error.name : 'UnknownError',
          errorSource: 'FetchNetworkError',
        },
        { cause: error },
      );
    }

    logger.debug(`Fetched ${urlString}. Status: ${response.status}`, {
      ...context,
    });

    if (!response.ok) {
      const responseBody = await readErrorBody(response);
      const errorData = {
        requestId: context.requestId,
        errorSource: 'FetchHttpError',
        statusCode: response.status,
        statusText: response.statusText,
        responseBody,
      };
      logger.error(
        `Fetch failed for ${urlString} with status ${response.status}.`,
        { ...context, ...errorData },
      );
      throw new McpError(
        JsonRpcErrorCode.ServiceUnavailable,
        `HTTP error! Status: ${response.status} ${response.statusText}`.trimEnd(),
        errorData,
      );
    }

    try {
      return await readBody(response);
    } catch (error) {
      if (controller.signal.aborted && !(error instanceof McpError)) {
        throw timeoutError();
      }
      throw error;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
