/**
 * @fileoverview Tool definition for retrieving STRING interaction edges.
 * @module src/mcp-server/tools/definitions/get-network-interactions.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StringDbService } from '@/container/tokens.js';
import {
  IdentifiersSchema,
  NetworkTypeSchema,
  RequiredScoreSchema,
  SpeciesSchema,
} from '@/mcp-server/tools/utils/commonSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import { InteractionSchema } from '@/services/string-db/schemas.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'get_network_interactions';
const TOOL_TITLE = 'Get Network Interactions';
const TOOL_DESCRIPTION =
  'Retrieve the STRING interaction network among a set of proteins: one edge per interacting pair with its combined score and per-channel evidence scores (experiments, databases, text mining, co-expression, …).';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    requiredScore: RequiredScoreSchema,
    addNodes: z
      .number()
      .int()
      .min(0)
      .max(100)
      .default(0)
      .describe('Number of extra interactors to add around the query set.'),
    networkType: NetworkTypeSchema,
  })
  .describe('Parameters for network retrieval.');

const OutputSchema = z
  .object({
    interactions: z
      .array(InteractionSchema)
      .describe('Interaction edges (scores range 0-1).'),
    nodeCount: z.number().describe('Distinct proteins in the network.'),
    edgeCount: z.number().describe('Number of interaction edges.'),
  })
  .describe('STRING interaction network.');

type NetworkInput = z.infer<typeof InputSchema>;
type NetworkOutput = z.infer<typeof OutputSchema>;

async function getNetworkInteractionsLogic(
  input: NetworkInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<NetworkOutput> {
  logger.debug('Fetching network interactions', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const interactions = await stringDbService.getNetworkInteractions(
    input.identifiers,
    {
      species: input.species,
      requiredScore: input.requiredScore,
      addNodes: input.addNodes,
      networkType: input.networkType,
    },
    appContext,
  );

  const nodes = new Set(
    interactions.flatMap((edge) => [edge.stringId_A, edge.stringId_B]),
  );

  logger.info('Network interactions retrieved', {
    ...appContext,
    nodeCount: nodes.size,
    edgeCount: interactions.length,
  });

  return {
    interactions,
    nodeCount: nodes.size,
    edgeCount: interactions.length,
  };
}

function responseFormatter(result: NetworkOutput): ContentBlock[] {
  if (result.edgeCount === 0) {
    return [
      {
        type: 'text',
        text: 'No interactions found at the requested confidence.',
      },
    ];
  }

  const preview = [...result.interactions]
    .sort((a, b) => b.score - a.score)
    .slice(0, 10)
    .map(
      (edge) =>
        `• ${edge.preferredName_A} — ${edge.preferredName_B} (score ${edge.score.toFixed(3)})`,
    )
    .join('\n');

  return [
    {
      type: 'text',
      text: `${result.edgeCount} interaction(s) among ${result.nodeCount} protein(s)\n\n${preview}${result.edgeCount > 10 ? `\n... and ${result.edgeCount - 10} more` : ''}`,
    },
  ];
}

export const getNetworkInteractionsTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getNetworkInteractionsLogic,
  responseFormatter,
};
