/**
 * @fileoverview Wraps a tool's pure logic into an MCP `tools/call` handler:
 * creates the request context, validates the arguments, runs the logic,
 * formats the result, and converts any thrown error into a tool error result.
 * @module src/mcp-server/tools/utils/toolHandlerFactory
 */
import type {
  CallToolResult,
  ContentBlock,
} from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodObject, ZodRawShape } from 'zod';

import {
  ErrorHandler,
  logger,
  requestContextService,
  type RequestContext,
} from '@/utils/index.js';
import type { SdkContext } from './toolDefinition.js';

export interface ToolHandlerFactoryOptions<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutput,
> {
  toolName: string;
  inputSchema: TInputSchema;
  logic: (
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ) => Promise<TOutput>;
  responseFormatter?: ((result: TOutput) => ContentBlock[]) | undefined;
}

const defaultResponseFormatter = (result: unknown): ContentBlock[] => [
  { type: 'text', text: JSON.stringify(result, null, 2) },
];

function toStructuredContent(result: unknown): Record<string, unknown> {
  if (typeof result === 'object' && result !== null && !Array.isArray(result)) {
    return Object.fromEntries(Object.entries(result));
  }
  return { result };
}

/**
 * Builds the MCP-facing handler for one tool. Errors never escape as
 * protocol failures; they come back as `{ isError: true }` results.
 */
export function createMcpToolHandler<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutput,
>({
  toolName,
  inputSchema,
  logic,
  responseFormatter = defaultResponseFormatter,
}: ToolHandlerFactoryOptions<TInputSchema, TOutput>) {
  return async (
    rawInput: unknown,
    sdkContext: SdkContext,
  ): Promise<CallToolResult> => {
    const appContext = requestContextService.createRequestContext({
      operation: 'HandleToolRequest',
      additionalContext: {
        toolName,
        sessionId: sdkContext.sessionId,
      },
    });

    try {
      // McpServer rejects schema-invalid arguments with -32602 before this
      // handler runs; parsing here covers direct callers and applies defaults.
      const input = await inputSchema.parseAsync(rawInput);
      const result = await logic(input, appContext, sdkContext);
      return {
        structuredContent: toStructuredContent(result),
        content: responseFormatter(result),
      };
    } catch (error) {
      const mcpError = ErrorHandler.handleError(error, {
        operation: `tool:${toolName}`,
        context: appContext,
        input: rawInput,
      });

      logger.debug('Returning tool error result', {
        ...appContext,
        errorCode: mcpError.code,
      });

      // No structuredContent: clients check it against the output schema.
      return {
        isError: true,
        content: [{ type: 'text', text: `Error: ${mcpError.message}` }],
      };
    }
  };
}
