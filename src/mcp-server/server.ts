/**
 * @fileoverview Creates the McpServer instance and registers every tool.
 * Transport concerns live in `transports/`; this module only builds the
 * protocol-level server.
 * @module src/mcp-server/server
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { container } from 'tsyringe';

import { AppConfig } from '@/container/tokens.js';
import type { AppConfig as AppConfigType } from '@/config/index.js';
import { ToolRegistry } from '@/mcp-server/tools/tool-registration.js';
import { logger, requestContextService } from '@/utils/index.js';

export function createMcpServerInstance(): McpServer {
  const config = container.resolve<AppConfigType>(AppConfig);
  const context = requestContextService.createRequestContext({
    operation: 'createMcpServerInstance',
  });
  logger.info('Initializing MCP server instance', context);

  const server = new McpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    {
      capabilities: {
        logging: {},
        tools: { listChanged: true },
      },
    },
  );

  container.resolve(ToolRegistry).registerAll(server);

  logger.info('MCP server instance configured', {
    ...context,
    serverName: config.mcpServerName,
  });
  return server;
}
