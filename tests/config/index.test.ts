/**
 * @fileoverview Unit tests for environment configuration parsing.
 * @module tests/config/index.test
 */
import { describe, expect, it } from 'vitest';

import { parseConfig, SERVER_NAME } from '@/config/index.js';
import { createStringConfig } from '@/services/string-db/config.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';

describe('parseConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(parseConfig({})).toEqual({
      mcpServerName: SERVER_NAME,
      mcpServerVersion: '0.1.0',
      logLevel: 'info',
      string: {
        baseUrl: 'https://string-db.org/api',
        versionUrl: 'https://version-12-0.string-db.org/api',
        callerIdentity: 'string-db-mcp-server',
        requestDelayMs: 1000,
        requestTimeoutMs: 30000,
        pinVersion: false,
      },
    });
  });

  it('reads STRING settings from the environment', () => {
    const config = parseConfig({
      MCP_LOG_LEVEL: 'debug',
      STRING_API_URL: 'https://mirror.test/api',
      STRING_CALLER_IDENTITY: 'test-lab',
      STRING_REQUEST_DELAY_MS: '250',
      STRING_REQUEST_TIMEOUT_MS: '5000',
      STRING_PIN_VERSION: '1',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.string).toMatchObject({
      baseUrl: 'https://mirror.test/api',
      callerIdentity: 'test-lab',
      requestDelayMs: 250,
      requestTimeoutMs: 5000,
      pinVersion: true,
    });
  });

  it('rejects invalid values with a configuration error', () => {
    expect(() => parseConfig({ STRING_REQUEST_DELAY_MS: '-5' })).toThrow(
      expect.objectContaining({
        code: JsonRpcErrorCode.ConfigurationError,
        message: expect.stringContaining('STRING_REQUEST_DELAY_MS'),
      }),
    );
  });
});

describe('createStringConfig', () => {
  it('returns a frozen config with trailing slashes removed', () => {
    const config = createStringConfig({
      baseUrl: 'https://mirror.test/api//',
      requestDelayMs: 0,
    });

    expect(config.baseUrl).toBe('https://mirror.test/api');
    expect(config.requestDelayMs).toBe(0);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('rejects a negative delay', () => {
    expect(() => createStringConfig({ requestDelayMs: -1 })).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.ValidationError }),
    );
  });

  it('rejects a base URL that is not a URL', () => {
    expect(() => createStringConfig({ baseUrl: 'string-db' })).toThrow(
      expect.objectContaining({ code: JsonRpcErrorCode.ValidationError }),
    );
  });
});
