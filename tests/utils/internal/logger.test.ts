/**
 * @fileoverview Tests for the MCP-level logger over pino.
 * @module tests/utils/internal/logger.test
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const pinoMethods = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}));
const pinoFactory = vi.hoisted(() =>
  vi.fn((_options: unknown, _destination: unknown) => pinoMethods),
);

vi.mock('pino', () => ({
  pino: Object.assign(pinoFactory, {
    destination: vi.fn(() => ({})),
    stdTimeFunctions: { isoTime: vi.fn(() => '') },
  }),
}));

const loadLogger = async () => {
  vi.resetModules();
  const { logger } = await import('@/utils/internal/logger.js');
  return logger;
};

describe('logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('configures pino from MCP_LOG_LEVEL', async () => {
    vi.stubEnv('MCP_LOG_LEVEL', 'debug');

    await loadLogger();

    expect(pinoFactory).toHaveBeenCalledTimes(1);
    expect(pinoFactory.mock.lastCall?.[0]).toMatchObject({
      name: 'string-db-mcp-server',
      level: 'debug',
    });
  });

  it('falls back to info for an unknown MCP_LOG_LEVEL', async () => {
    vi.stubEnv('MCP_LOG_LEVEL', 'loud');

    await loadLogger();

    expect(pinoFactory.mock.lastCall?.[0]).toMatchObject({ level: 'info' });
  });

  it('maps MCP levels onto pino levels', async () => {
    const logger = await loadLogger();

    logger.notice('started', { requestId: 'test-req-1' });
    logger.crit('failed');

    expect(pinoMethods.info).toHaveBeenCalledWith(
      { requestId: 'test-req-1', mcpLevel: 'notice' },
      'started',
    );
    expect(pinoMethods.fatal).toHaveBeenCalledWith(
      { mcpLevel: 'crit' },
      'failed',
    );
  });

  it('passes an Error in the context to pino as err', async () => {
    const logger = await loadLogger();
    const error = new Error('boom');

    logger.error('request failed', { requestId: 'test-req-2', error });

    expect(pinoMethods.error).toHaveBeenCalledWith(
      {
        requestId: 'test-req-2',
        mcpLevel: 'error',
        err: error,
        error: undefined,
      },
      'request failed',
    );
  });
});
