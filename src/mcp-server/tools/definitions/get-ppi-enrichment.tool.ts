/**
 * @fileoverview Tool definition for the protein-protein interaction
 * enrichment test.
 * @module src/mcp-server/tools/definitions/get-ppi-enrichment.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StringDbService } from '@/container/tokens.js';
import {
  IdentifiersSchema,
  RequiredScoreSchema,
  SpeciesSchema,
} from '@/mcp-server/tools/utils/commonSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import { PpiEnrichmentSchema } from '@/services/string-db/schemas.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'get_ppi_enrichment';
const TOOL_TITLE = 'Get PPI Enrichment';
const TOOL_DESCRIPTION =
  'Test whether a protein set has more interactions among its members than expected for a random set of the same size. A small p-value suggests the proteins are biologically connected.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

/** p-value below which the network is reported as significantly enriched. */
const SIGNIFICANCE_THRESHOLD = 0.05;

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    requiredScore: RequiredScoreSchema,
    backgroundIdentifiers: z
      .array(z.string().trim().min(1))
      .optional()
      .describe('STRING ids forming the statistical background.'),
  })
  .describe('Parameters for PPI enrichment.');

const OutputSchema = z
  .object({
    enrichment: PpiEnrichmentSchema.describe('Raw STRING statistics.'),
    significant: z
      .boolean()
      .describe(`True when p_value < ${SIGNIFICANCE_THRESHOLD}.`),
  })
  .describe('PPI enrichment result.');

type PpiInput = z.infer<typeof InputSchema>;
type PpiOutput = z.infer<typeof OutputSchema>;

async function getPpiEnrichmentLogic(
  input: PpiInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<PpiOutput> {
  logger.debug('Running PPI enrichment', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const enrichment = await stringDbService.getPpiEnrichment(
    input.identifiers,
    {
      species: input.species,
      requiredScore: input.requiredScore,
      backgroundIdentifiers: input.backgroundIdentifiers,
    },
    appContext,
  );

  logger.info('PPI enrichment completed', {
    ...appContext,
    pValue: enrichment.p_value,
  });

  return {
    enrichment,
    significant: enrichment.p_value < SIGNIFICANCE_THRESHOLD,
  };
}

function responseFormatter(result: PpiOutput): ContentBlock[] {
  const e = result.enrichment;
  return [
    {
      type: 'text',
      text: [
        `Nodes: ${e.number_of_nodes} | Edges: ${e.number_of_edges} (expected ${e.expected_number_of_edges})`,
        `Average node degree: ${e.average_node_degree}`,
        `Local clustering coefficient: ${e.local_clustering_coefficient}`,
        `PPI enrichment p-value: ${e.p_value}`,
        result.significant
          ? 'The network has significantly more interactions than expected.'
          : 'No significant interaction enrichment.',
      ].join('\n'),
    },
  ];
}

export const getPpiEnrichmentTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getPpiEnrichmentLogic,
  responseFormatter,
};
