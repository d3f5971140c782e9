/**
 * @fileoverview Unit tests for StringApiClient URL building and transport.
 * @module tests/services/string-db/core/StringApiClient.test
 */
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type Mock,
} from 'vitest';

import { createStringConfig } from '@/services/string-db/config.js';
import {
  StringApiClient,
  mimeTypeFor,
} from '@/services/string-db/core/StringApiClient.js';
import { OutputFormat } from '@/services/string-db/types.js';
import type { RequestContext } from '@/utils/index.js';

const context: RequestContext = {
  requestId: 'test-req-2',
  timestamp: '2024-01-01T00:00:00.000Z',
};

describe('StringApiClient', () => {
  let fetchMock: Mock;
  let client: StringApiClient;

  beforeEach(() => {
    fetchMock = vi.fn(async () => new Response('[]'));
    vi.stubGlobal('fetch', fetchMock);
    client = new StringApiClient(
      createStringConfig({
        baseUrl: 'https://string.test/api/',
        callerIdentity: 'test-suite',
        requestDelayMs: 0,
      }),
      async () => {},
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildUrl', () => {
    it('joins root, format and endpoint and appends caller_identity', () => {
      const url = client.buildUrl('network', OutputFormat.TSV, {
        identifiers: 'A\rB',
        species: 9606,
      });

      expect(url.href).toBe(
        'https://string.test/api/tsv/network?identifiers=A%0DB&species=9606&caller_identity=test-suite',
      );
    });

    it('leaves out undefined parameters', () => {
      const url = client.buildUrl('version', OutputFormat.JSON, {
        species: undefined,
      });

      expect(url.href).toBe(
        'https://string.test/api/json/version?caller_identity=test-suite',
      );
    });
  });

  describe('request', () => {
    it('sends short queries as GET with an Accept header', async () => {
      const body = await client.request(
        'network',
        OutputFormat.JSON,
        { identifiers: 'TP53' },
        context,
        (response) => response.text(),
      );

      expect(body).toBe('[]');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(String(url)).toBe(
        'https://string.test/api/json/network?identifiers=TP53&caller_identity=test-suite',
      );
      expect(init).toMatchObject({
        method: 'GET',
        headers: { Accept: 'application/json' },
      });
    });

    it('falls back to a form-encoded POST for long queries', async () => {
      const identifiers = Array.from(
        { length: 600 },
        (_, i) => `GENE${i}`,
      ).join('\r');

      await client.request(
        'network',
        OutputFormat.JSON,
        { identifiers },
        context,
        (response) => response.text(),
      );

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(String(url)).toBe('https://string.test/api/json/network');
      expect(init).toMatchObject({
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      });
      const body = new URLSearchParams(String(init?.body));
      expect(body.get('identifiers')).toBe(identifiers);
      expect(body.get('caller_identity')).toBe('test-suite');
    });
  });

  describe('getTable', () => {
    it('keeps every line as a row for header-less formats', async () => {
      fetchMock.mockImplementation(async () => new Response('a\tb\nc\td\n'));

      const { table } = await client.getTable(
        'network',
        OutputFormat.TSV_NO_HEADER,
        {},
        context,
      );

      expect(table).toEqual({
        rows: [
          ['a', 'b'],
          ['c', 'd'],
        ],
      });
    });
  });

  it('maps formats to MIME types', () => {
    expect(mimeTypeFor(OutputFormat.JSON)).toBe('application/json');
    expect(mimeTypeFor(OutputFormat.PSI_MI)).toBe('application/xml');
    expect(mimeTypeFor(OutputFormat.HIGHRES_IMAGE)).toBe('image/png');
    expect(mimeTypeFor(OutputFormat.SVG)).toBe('image/svg+xml');
  });
});
