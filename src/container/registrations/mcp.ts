/**
 * @fileoverview Registers the MCP server factory and tool definitions.
 * @module src/container/registrations/mcp
 */
import { container } from 'tsyringe';

import { CreateMcpServerInstance, ToolDefinitions } from '@/container/tokens.js';
import { createMcpServerInstance } from '@/mcp-server/server.js';
import { allToolDefinitions } from '@/mcp-server/tools/definitions/index.js';
import type { AnyToolDefinition } from '@/mcp-server/tools/utils/toolDefinition.js';
import { logger } from '@/utils/index.js';

export const registerMcpServices = (): void => {
  container.register<AnyToolDefinition[]>(ToolDefinitions, {
    useValue: allToolDefinitions,
  });
  container.register(CreateMcpServerInstance, {
    useValue: createMcpServerInstance,
  });

  logger.info('MCP services registered with the DI container.');
};
