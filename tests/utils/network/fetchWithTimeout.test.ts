/**
 * @fileoverview Unit tests for fetchWithTimeout error mapping.
 * @module tests/utils/network/fetchWithTimeout.test
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { fetchWithTimeout } from '@/utils/network/fetchWithTimeout.js';

const context = {
  requestId: 'test-req-4',
  timestamp: '2024-01-01T00:00:00.000Z',
};

const readText = (response: Response) => response.text();

describe('fetchWithTimeout', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns what the reader makes of a successful response', async () => {
    fetchMock.mockResolvedValue(new Response('ok'));

    await expect(
      fetchWithTimeout('https://string.test/a', 1000, context, readText),
    ).resolves.toBe('ok');
  });

  it('passes request options and an abort signal to fetch', async () => {
    fetchMock.mockResolvedValue(new Response('ok'));

    await fetchWithTimeout('https://string.test/a', 1000, context, readText, {
      method: 'POST',
      body: 'x=1',
    });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('x=1');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('maps non-2xx statuses to ServiceUnavailable with the status in the message', async () => {
    fetchMock.mockResolvedValue(
      new Response('not here', { status: 404, statusText: 'Not Found' }),
    );

    const readBody = vi.fn(readText);
    const error = await fetchWithTimeout(
      'https://string.test/a',
      1000,
      context,
      readBody,
    ).catch((e: unknown) => e);

    expect(readBody).not.toHaveBeenCalled();
    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      message: 'HTTP error! Status: 404 Not Found',
      data: {
        requestId: 'test-req-4',
        errorSource: 'FetchHttpError',
        statusCode: 404,
        statusText: 'Not Found',
        responseBody: 'not here',
      },
    });
  });

  it('truncates long error bodies', async () => {
    fetchMock.mockResolvedValue(
      new Response('x'.repeat(600), { status: 502 }),
    );

    const error = await fetchWithTimeout(
      'https://string.test/a',
      1000,
      context,
      readText,
    ).catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: 'HTTP error! Status: 502',
      data: { responseBody: `${'x'.repeat(500)}…` },
    });
  });

  it('maps network failures to ServiceUnavailable', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      fetchWithTimeout('https://string.test/a', 1000, context, readText),
    ).rejects.toMatchObject({
      code: JsonRpcErrorCode.ServiceUnavailable,
      message: 'Network error during fetch GET https://string.test/a: fetch failed',
    });
  });

  it('maps an abort to Timeout', async () => {
    vi.useFakeTimers();
    try {
      fetchMock.mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(new DOMException('The operation was aborted.', 'AbortError'));
            });
          }),
      );

      const pending = fetchWithTimeout(
        'https://string.test/slow',
        50,
        context,
        readText,
      );
      const assertion = expect(pending).rejects.toMatchObject({
        code: JsonRpcErrorCode.Timeout,
        message: 'fetch GET https://string.test/slow timed out.',
      });
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('keeps the timeout running while the body is read', async () => {
    vi.useFakeTimers();
    try {
      fetchMock.mockImplementation(async (_url, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(stream) {
            stream.enqueue(new TextEncoder().encode('partial'));
            init?.signal?.addEventListener('abort', () => {
              stream.error(
                new DOMException('The operation was aborted.', 'AbortError'),
              );
            });
          },
        });
        return new Response(body);
      });

      const pending = fetchWithTimeout(
        'https://string.test/stalled',
        50,
        context,
        readText,
      );
      const assertion = expect(pending).rejects.toMatchObject({
        code: JsonRpcErrorCode.Timeout,
        message: 'fetch GET https://string.test/stalled timed out.',
      });
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('passes reader errors through unchanged', async () => {
    fetchMock.mockResolvedValue(new Response('ok'));
    const failure = new McpError(JsonRpcErrorCode.SerializationError, 'bad body');

    await expect(
      fetchWithTimeout('https://string.test/a', 1000, context, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
  });
});
