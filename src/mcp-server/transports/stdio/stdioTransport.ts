/**
 * @fileoverview Connects an McpServer to the process's stdin/stdout.
 * Nothing else may write to stdout while the transport is active.
 * @module src/mcp-server/transports/stdio/stdioTransport
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { ErrorHandler, logger, type RequestContext } from '@/utils/index.js';

export async function startStdioTransport(
  server: McpServer,
  parentContext: RequestContext,
): Promise<StdioServerTransport> {
  const operationContext = {
    ...parentContext,
    operation: 'connectStdioTransport',
    transportType: 'Stdio',
  };
  logger.info('Attempting to connect stdio transport...', operationContext);

  try {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('MCP server connected via stdio transport.', operationContext);
    return transport;
  } catch (error) {
    throw ErrorHandler.handleError(error, {
      operation: 'connectStdioTransport',
      context: operationContext,
      rethrow: true,
    });
  }
}
