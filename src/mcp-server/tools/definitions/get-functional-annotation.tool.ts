/**
 * @fileoverview Tool definition for listing the annotation terms of proteins.
 * @module src/mcp-server/tools/definitions/get-functional-annotation.tool
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
import { FunctionalAnnotationSchema } from '@/services/string-db/schemas.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'get_functional_annotation';
const TOOL_TITLE = 'Get Functional Annotation';
const TOOL_DESCRIPTION =
  'List every functional annotation term (GO, KEGG, Reactome, domains, keywords, …) assigned to the query proteins. No statistics: use get_functional_enrichment for over-representation.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    allowPubmed: z
      .boolean()
      .default(false)
      .describe('Also return PubMed publications as annotation terms.'),
  })
  .describe('Parameters for functional annotation.');

const OutputSchema = z
  .object({
    annotations: z
      .array(FunctionalAnnotationSchema)
      .describe('Annotation terms as reported by STRING.'),
    totalCount: z.number().describe('Number of annotation terms.'),
  })
  .describe('Functional annotation results.');

type AnnotationInput = z.infer<typeof InputSchema>;
type AnnotationOutput = z.infer<typeof OutputSchema>;

async function getFunctionalAnnotationLogic(
  input: AnnotationInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<AnnotationOutput> {
  logger.debug('Fetching functional annotation', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const annotations = await stringDbService.getFunctionalAnnotation(
    input.identifiers,
    { species: input.species, allowPubmed: input.allowPubmed },
    appContext,
  );

  logger.info('Functional annotation retrieved', {
    ...appContext,
    termCount: annotations.length,
  });

  return { annotations, totalCount: annotations.length };
}

function responseFormatter(result: AnnotationOutput): ContentBlock[] {
  if (result.totalCount === 0) {
    return [{ type: 'text', text: 'No annotation terms found.' }];
  }

  const preview = result.annotations
    .slice(0, 15)
    .map(
      (a) =>
        `• [${a.category}] ${a.term} ${a.description} (${a.preferredNames.join(', ')})`,
    )
    .join('\n');

  return [
    {
      type: 'text',
      text: `${result.totalCount} annotation term(s)\n\n${preview}${result.totalCount > 15 ? `\n... and ${result.totalCount - 15} more` : ''}`,
    },
  ];
}

export const getFunctionalAnnotationTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getFunctionalAnnotationLogic,
  responseFormatter,
};
