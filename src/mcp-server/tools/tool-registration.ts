/**
 * @fileoverview Registers every tool definition with an McpServer instance.
 * @module src/mcp-server/tools/tool-registration
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { inject, injectable } from 'tsyringe';

import { ToolDefinitions } from '@/container/tokens.js';
import type { AnyToolDefinition } from '@/mcp-server/tools/utils/toolDefinition.js';
import { createMcpToolHandler } from '@/mcp-server/tools/utils/toolHandlerFactory.js';
import { logger, requestContextService } from '@/utils/index.js';

@injectable()
export class ToolRegistry {
  constructor(
    @inject(ToolDefinitions)
    private readonly toolDefs: AnyToolDefinition[],
  ) {}

  registerAll(server: McpServer): void {
    const context = requestContextService.createRequestContext({
      operation: 'ToolRegistry.registerAll',
    });

    const names = new Set<string>();
    for (const def of this.toolDefs) {
      if (names.has(def.name)) {
        throw new Error(`Duplicate tool name detected: ${def.name}`);
      }
      names.add(def.name);
      this.registerTool(server, def);
    }

    logger.info(`Registered ${this.toolDefs.length} tools.`, {
      ...context,
      tools: [...names],
    });
  }

  private registerTool(server: McpServer, def: AnyToolDefinition): void {
    const handler = createMcpToolHandler({
      toolName: def.name,
      inputSchema: def.inputSchema,
      logic: def.logic.bind(def),
      responseFormatter: def.responseFormatter?.bind(def),
    });

    server.registerTool(
      def.name,
      {
        title: def.title ?? def.name,
        description: def.description,
        inputSchema: def.inputSchema.shape,
        outputSchema: def.outputSchema.shape,
        ...(def.annotations && { annotations: def.annotations }),
      },
      handler,
    );
  }
}
