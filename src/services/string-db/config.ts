/**
 * @fileoverview STRING API defaults and the immutable client configuration.
 * @module src/services/string-db/config
 */
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import type { StringConfig } from './types.js';

/**
 * Public STRING REST API root
 */
export const STRING_API_URL = 'https://string-db.org/api';

/**
 * Version-pinned API root (STRING v12.0)
 */
export const STRING_VERSION_API_URL = 'https://version-12-0.string-db.org/api';

export const DEFAULT_CALLER_IDENTITY = 'string-db-mcp-server';

/**
 * Delay slept before each request, in milliseconds
 */
export const DEFAULT_REQUEST_DELAY_MS = 1000;

/**
 * Default request timeout in milliseconds
 */
export const REQUEST_TIMEOUT = 30000; // 30 seconds

/**
 * Requests whose URL would exceed this length are sent as form-encoded POSTs.
 */
export const MAX_GET_URL_LENGTH = 4000;

const StringConfigSchema = z.object({
  baseUrl: z.string().url().default(STRING_API_URL),
  versionUrl: z.string().url().default(STRING_VERSION_API_URL),
  callerIdentity: z.string().trim().min(1).default(DEFAULT_CALLER_IDENTITY),
  requestDelayMs: z.number().int().min(0).default(DEFAULT_REQUEST_DELAY_MS),
  requestTimeoutMs: z.number().int().positive().default(REQUEST_TIMEOUT),
  pinVersion: z.boolean().default(false),
});

/**
 * Builds a frozen {@link StringConfig}, filling unset fields with defaults.
 * Trailing slashes are stripped from both API roots.
 * @throws {McpError} `ValidationError` if an override is malformed.
 */
export function createStringConfig(
  overrides: Partial<StringConfig> = {},
): StringConfig {
  const parsed = StringConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new McpError(
      JsonRpcErrorCode.ValidationError,
      `Invalid STRING client configuration: ${issues}`,
    );
  }

  return Object.freeze({
    ...parsed.data,
    baseUrl: parsed.data.baseUrl.replace(/\/+$/, ''),
    versionUrl: parsed.data.versionUrl.replace(/\/+$/, ''),
  });
}
