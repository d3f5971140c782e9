/**
 * @fileoverview Unit tests for the get_network_image tool.
 * @module tests/mcp-server/tools/definitions/get-network-image.test
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
import { container } from 'tsyringe';

import { StringDbService } from '@/container/tokens.js';
import {
  encodeImageData,
  getNetworkImageTool,
} from '@/mcp-server/tools/definitions/get-network-image.tool.js';
import type { SdkContext } from '@/mcp-server/tools/utils/toolDefinition.js';
import { PNG_SIGNATURE } from '@/services/string-db/core/response-parsers.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import { OutputFormat } from '@/services/string-db/types.js';
import { logger } from '@/utils/index.js';

const decodeImageData = (base64: string): Uint8Array =>
  new Uint8Array(Buffer.from(base64, 'base64'));

describe('get_network_image tool', () => {
  const context = {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
  };
  const sdkContext = {
    signal: new AbortController().signal,
  } as unknown as SdkContext;

  const png = new Uint8Array([...PNG_SIGNATURE, 0, 0, 0, 13, 73, 72, 68, 82]);

  let getNetworkImage: Mock;

  beforeEach(() => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    getNetworkImage = vi.fn();
    const mockService = { getNetworkImage };
    vi.spyOn(container, 'resolve').mockImplementation((token) => {
      if (token === StringDbService) {
        return mockService as unknown as StringDbServiceClass;
      }
      throw new Error(`Unexpected token: ${String(token)}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('base64 encoding', () => {
    it('should round-trip arbitrary bytes', () => {
      const bytes = new Uint8Array(256).map((_, i) => i);

      expect([...decodeImageData(encodeImageData(bytes))]).toEqual([...bytes]);
    });

    it('should encode only the viewed slice of a shared buffer', () => {
      const backing = new Uint8Array([9, 9, 1, 2, 3, 9]);
      const view = backing.subarray(2, 5);

      expect(encodeImageData(view)).toBe(
        Buffer.from([1, 2, 3]).toString('base64'),
      );
    });
  });

  it('should default to a PNG with evidence-colored edges', async () => {
    const parsed = await getNetworkImageTool.inputSchema.parseAsync({
      identifiers: ['TP53'],
    });

    expect(parsed).toEqual({
      identifiers: ['TP53'],
      format: 'image',
      addNodes: 0,
      networkType: 'functional',
      networkFlavor: 'evidence',
    });
  });

  it('should reject an unknown image format', async () => {
    await expect(
      getNetworkImageTool.inputSchema.parseAsync({
        identifiers: ['TP53'],
        format: 'gif',
      }),
    ).rejects.toThrow();
  });

  it('should return the image base64-encoded', async () => {
    getNetworkImage.mockResolvedValue({
      format: OutputFormat.IMAGE,
      mimeType: 'image/png',
      data: png,
    });
    const input = await getNetworkImageTool.inputSchema.parseAsync({
      identifiers: ['TP53', 'MDM2'],
      species: 9606,
    });

    const result = await getNetworkImageTool.logic(input, context, sdkContext);

    expect(result).toEqual({
      format: 'image',
      mimeType: 'image/png',
      byteLength: 16,
      data: Buffer.from(png).toString('base64'),
    });
    expect([...decodeImageData(result.data)]).toEqual([...png]);
    expect(getNetworkImage).toHaveBeenCalledWith(
      ['TP53', 'MDM2'],
      {
        species: 9606,
        format: 'image',
        requiredScore: undefined,
        addNodes: 0,
        networkType: 'functional',
        networkFlavor: 'evidence',
      },
      context,
    );
  });

  it('should emit an image content block', () => {
    const data = Buffer.from(png).toString('base64');

    const content = getNetworkImageTool.responseFormatter?.({
      format: OutputFormat.IMAGE,
      mimeType: 'image/png',
      byteLength: 2048,
      data,
    });

    expect(content).toEqual([
      { type: 'text', text: 'Network image (image, image/png, 2.0 KB)' },
      { type: 'image', data, mimeType: 'image/png' },
    ]);
  });
});
