/**
 * @fileoverview Tool definition for mapping protein identifiers to STRING ids.
 * @module src/mcp-server/tools/definitions/map-identifiers.tool
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
import { StringIdMappingSchema } from '@/services/string-db/schemas.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'map_identifiers';
const TOOL_TITLE = 'Map Protein Identifiers';
const TOOL_DESCRIPTION =
  'Map gene symbols or protein accessions to STRING identifiers (best match per input). Run this first: STRING ids make every other query unambiguous and faster.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    echoQuery: z
      .boolean()
      .default(false)
      .describe('Ask STRING to echo each query item back in its response.'),
  })
  .describe('Parameters for identifier mapping.');

const OutputSchema = z
  .object({
    mappings: z
      .array(
        StringIdMappingSchema.extend({
          queryItem: z.string().describe('Input token this entry resolves.'),
        }),
      )
      .describe('One entry per resolved input, in input order.'),
    unmapped: z
      .array(z.string())
      .describe('Input identifiers STRING could not resolve.'),
  })
  .describe('Identifier mapping results.');

type MapIdentifiersInput = z.infer<typeof InputSchema>;
type MapIdentifiersOutput = z.infer<typeof OutputSchema>;

async function mapIdentifiersLogic(
  input: MapIdentifiersInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<MapIdentifiersOutput> {
  logger.debug('Mapping identifiers', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const mappings = await stringDbService.mapIdentifiers(
    input.identifiers,
    { species: input.species, echoQuery: input.echoQuery },
    appContext,
  );

  const resolved = new Set(mappings.map((m) => m.queryIndex));
  const unmapped = input.identifiers.filter((_, i) => !resolved.has(i));

  logger.info('Identifiers mapped', {
    ...appContext,
    mappedCount: mappings.length,
    unmappedCount: unmapped.length,
  });

  return { mappings, unmapped };
}

function responseFormatter(result: MapIdentifiersOutput): ContentBlock[] {
  const total = result.mappings.length + result.unmapped.length;
  const lines = result.mappings.map(
    (m) =>
      `• ${m.queryItem} → ${m.stringId} (${m.preferredName}, ${m.taxonName})`,
  );

  const unmapped =
    result.unmapped.length > 0
      ? `\n\nUnmapped: ${result.unmapped.join(', ')}`
      : '';

  return [
    {
      type: 'text',
      text: `Mapped ${result.mappings.length}/${total} identifier(s)\n\n${lines.join('\n')}${unmapped}`,
    },
  ];
}

export const mapIdentifiersTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: mapIdentifiersLogic,
  responseFormatter,
};
