/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Values are read from environment variables and validated with zod; defaults
 * point at the public STRING API.
 * @module src/config/index
 */
import { z } from 'zod';

import {
  DEFAULT_REQUEST_DELAY_MS,
  REQUEST_TIMEOUT,
  STRING_API_URL,
  STRING_VERSION_API_URL,
} from '@/services/string-db/config.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

export const SERVER_NAME = 'string-db-mcp-server';
export const SERVER_VERSION = '0.1.0';

/**
 * Log levels accepted by the logger, matching the MCP logging specification.
 */
export const McpLogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
  'alert',
  'emerg',
]);
export type McpLogLevel = z.infer<typeof McpLogLevelSchema>;

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  MCP_LOG_LEVEL: McpLogLevelSchema.default('info'),
  STRING_API_URL: z.string().url().default(STRING_API_URL),
  STRING_VERSION_API_URL: z.string().url().default(STRING_VERSION_API_URL),
  STRING_CALLER_IDENTITY: z.string().min(1).default(SERVER_NAME),
  STRING_REQUEST_DELAY_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_REQUEST_DELAY_MS),
  STRING_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(REQUEST_TIMEOUT),
  STRING_PIN_VERSION: booleanFromEnv.default('false'),
});

export interface AppConfig {
  mcpServerName: string;
  mcpServerVersion: string;
  logLevel: McpLogLevel;
  string: {
    baseUrl: string;
    versionUrl: string;
    callerIdentity: string;
    requestDelayMs: number;
    requestTimeoutMs: number;
    pinVersion: boolean;
  };
}

/**
 * Parses the given environment into an {@link AppConfig}.
 * @throws {McpError} `ConfigurationError` listing every invalid variable.
 */
export function parseConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      `Invalid environment configuration: ${issues}`,
      { issues: parsed.error.issues },
    );
  }

  const values = parsed.data;
  return {
    mcpServerName: SERVER_NAME,
    mcpServerVersion: SERVER_VERSION,
    logLevel: values.MCP_LOG_LEVEL,
    string: {
      baseUrl: values.STRING_API_URL,
      versionUrl: values.STRING_VERSION_API_URL,
      callerIdentity: values.STRING_CALLER_IDENTITY,
      requestDelayMs: values.STRING_REQUEST_DELAY_MS,
      requestTimeoutMs: values.STRING_REQUEST_TIMEOUT_MS,
      pinVersion: values.STRING_PIN_VERSION,
    },
  };
}

let cachedConfig: AppConfig | undefined;

/**
 * Configuration parsed from `process.env` on first use, so importing this
 * module never fails.
 * @throws {McpError} `ConfigurationError` when the environment is invalid.
 */
export function getConfig(): AppConfig {
  cachedConfig ??= parseConfig();
  return cachedConfig;
}
