/**
 * @fileoverview Tool definition for GO / pathway enrichment of a protein set.
 * @module src/mcp-server/tools/definitions/get-functional-enrichment.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StringDbService } from '@/container/tokens.js';
import {
  IdentifiersSchema,
  SpeciesSchema,
} from '@/mcp-server/tools/utils/commonSchemas.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import { EnrichmentTermSchema } from '@/services/string-db/schemas.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'get_functional_enrichment';
const TOOL_TITLE = 'Get Functional Enrichment';
const TOOL_DESCRIPTION =
  'Perform GO / pathway enrichment on a protein set: returns over-represented terms (GO processes, KEGG and Reactome pathways, domains, …) with p-values and FDR. Optionally against a custom background of STRING ids.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    backgroundIdentifiers: z
      .array(z.string().trim().min(1))
      .optional()
      .describe(
        'STRING ids forming the statistical background (defaults to the whole genome).',
      ),
  })
  .describe('Parameters for functional enrichment.');

const OutputSchema = z
  .object({
    terms: z
      .array(EnrichmentTermSchema)
      .describe('Enriched terms as reported by STRING.'),
    termCount: z.number().describe('Number of enriched terms.'),
    categoryCounts: z
      .record(z.number())
      .describe('Number of enriched terms per category.'),
  })
  .describe('Functional enrichment results.');

type EnrichmentInput = z.infer<typeof InputSchema>;
type EnrichmentOutput = z.infer<typeof OutputSchema>;

async function getFunctionalEnrichmentLogic(
  input: EnrichmentInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<EnrichmentOutput> {
  logger.debug('Running functional enrichment', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const terms = await stringDbService.getFunctionalEnrichment(
    input.identifiers,
    {
      species: input.species,
      backgroundIdentifiers: input.backgroundIdentifiers,
    },
    appContext,
  );

  const categoryCounts: Record<string, number> = {};
  for (const term of terms) {
    categoryCounts[term.category] = (categoryCounts[term.category] ?? 0) + 1;
  }

  logger.info('Functional enrichment completed', {
    ...appContext,
    termCount: terms.length,
  });

  return { terms, termCount: terms.length, categoryCounts };
}

function responseFormatter(result: EnrichmentOutput): ContentBlock[] {
  if (result.termCount === 0) {
    return [{ type: 'text', text: 'No enriched terms found.' }];
  }

  const categories = Object.entries(result.categoryCounts)
    .map(([category, count]) => `${category}: ${count}`)
    .join(', ');

  const top = [...result.terms]
    .sort((a, b) => a.fdr - b.fdr)
    .slice(0, 10)
    .map(
      (t) =>
        `• [${t.category}] ${t.term} ${t.description} (FDR ${t.fdr.toExponential(2)}, ${t.number_of_genes} genes)`,
    )
    .join('\n');

  return [
    {
      type: 'text',
      text: `${result.termCount} enriched term(s)\n${categories}\n\nTop terms:\n${top}`,
    },
  ];
}

export const getFunctionalEnrichmentTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getFunctionalEnrichmentLogic,
  responseFormatter,
};
