/**
 * @fileoverview Tool definition for finding the strongest interaction
 * partners of query proteins.
 * @module src/mcp-server/tools/definitions/get-interaction-partners.tool
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

const TOOL_NAME = 'get_interaction_partners';
const TOOL_TITLE = 'Get Interaction Partners';
const TOOL_DESCRIPTION =
  'List the highest-scoring interaction partners of each query protein across the whole proteome. Unlike get_network_interactions, partners need not be in the query set.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    limit: z
      .number()
      .int()
      .min(1)
      .max(500)
      .default(10)
      .describe('Partners returned per query protein (1-500).'),
    requiredScore: RequiredScoreSchema,
    networkType: NetworkTypeSchema,
  })
  .describe('Parameters for partner retrieval.');

const OutputSchema = z
  .object({
    partners: z
      .array(InteractionSchema)
      .describe('Edges from a query protein (A) to a partner (B).'),
    totalCount: z.number().describe('Number of edges returned.'),
  })
  .describe('Interaction partners.');

type PartnersInput = z.infer<typeof InputSchema>;
type PartnersOutput = z.infer<typeof OutputSchema>;

async function getInteractionPartnersLogic(
  input: PartnersInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<PartnersOutput> {
  logger.debug('Fetching interaction partners', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const partners = await stringDbService.getInteractionPartners(
    input.identifiers,
    {
      species: input.species,
      limit: input.limit,
      requiredScore: input.requiredScore,
      networkType: input.networkType,
    },
    appContext,
  );

  logger.info('Interaction partners retrieved', {
    ...appContext,
    partnerCount: partners.length,
  });

  return { partners, totalCount: partners.length };
}

function responseFormatter(result: PartnersOutput): ContentBlock[] {
  if (result.totalCount === 0) {
    return [{ type: 'text', text: 'No interaction partners found.' }];
  }

  const byQuery = new Map<string, string[]>();
  for (const edge of result.partners) {
    const list = byQuery.get(edge.preferredName_A) ?? [];
    list.push(`${edge.preferredName_B} (${edge.score.toFixed(3)})`);
    byQuery.set(edge.preferredName_A, list);
  }

  const text = [...byQuery.entries()]
    .map(([query, partners]) => `${query}: ${partners.join(', ')}`)
    .join('\n');

  return [
    {
      type: 'text',
      text: `${result.totalCount} partner edge(s)\n\n${text}`,
    },
  ];
}

export const getInteractionPartnersTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getInteractionPartnersLogic,
  responseFormatter,
};
