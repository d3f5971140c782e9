#!/usr/bin/env node
/**
 * @fileoverview Entry point of the STRING MCP server. Composes the container,
 * builds the server and serves it over stdio until the process is signalled.
 * @module src/index
 */
import 'reflect-metadata';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { container } from 'tsyringe';

import { getConfig } from '@/config/index.js';
import { composeContainer } from '@/container/index.js';
import { CreateMcpServerInstance } from '@/container/tokens.js';
import { startStdioTransport } from '@/mcp-server/transports/stdio/stdioTransport.js';
import { logger, requestContextService } from '@/utils/index.js';

let server: McpServer | undefined;

const shutdown = async (signal: string): Promise<void> => {
  const context = requestContextService.createRequestContext({
    operation: 'ServerShutdown',
    additionalContext: { triggerEvent: signal },
  });
  logger.info(`Received ${signal}. Shutting down...`, context);

  try {
    await server?.close();
    logger.info('Graceful shutdown completed.', context);
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', {
      ...context,
      error: error instanceof Error ? error : new Error(String(error)),
    });
    process.exit(1);
  }
};

const start = async (): Promise<void> => {
  composeContainer();
  const config = getConfig();

  const context = requestContextService.createRequestContext({
    operation: 'ServerStartup',
    additionalContext: {
      serverName: config.mcpServerName,
      serverVersion: config.mcpServerVersion,
    },
  });
  logger.notice(
    `Starting ${config.mcpServerName} v${config.mcpServerVersion}`,
    context,
  );

  const createServer = container.resolve<() => McpServer>(
    CreateMcpServerInstance,
  );
  server = createServer();
  await startStdioTransport(server, context);

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
};

start().catch((error: unknown) => {
  logger.crit('Critical error during startup, exiting.', {
    error: error instanceof Error ? error : new Error(String(error)),
  });
  process.exit(1);
});
