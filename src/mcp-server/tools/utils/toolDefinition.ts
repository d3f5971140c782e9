/**
 * @fileoverview Shape shared by every tool definition: metadata, zod schemas,
 * pure business logic and an optional response formatter.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ContentBlock,
  ServerNotification,
  ServerRequest,
  ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodObject, ZodRawShape } from 'zod';

import type { RequestContext } from '@/utils/index.js';

export type { ToolAnnotations };

/**
 * Per-request context handed over by the MCP SDK (abort signal,
 * notification hooks, …).
 */
export type SdkContext = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface ToolDefinition<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
> {
  /** Programmatic name, unique across the server (snake_case). */
  name: string;
  title?: string;
  /** Shown to the model; says what the tool does and when to use it. */
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: ToolAnnotations;
  /**
   * Business logic. Throws {@link McpError} on failure; the handler factory
   * turns the error into a tool error result.
   */
  logic(
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ): Promise<z.infer<TOutputSchema>>;
  /**
   * Builds the content blocks sent alongside `structuredContent`. Defaults to
   * the JSON-serialized result.
   */
  responseFormatter?(result: z.infer<TOutputSchema>): ContentBlock[];
}

/** A definition with its schema types erased, as held by the registry. */
export type AnyToolDefinition = ToolDefinition<
  ZodObject<ZodRawShape>,
  ZodObject<ZodRawShape>
>;
