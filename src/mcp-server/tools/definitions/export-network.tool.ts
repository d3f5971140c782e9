/**
 * @fileoverview Tool definition for downloading a STRING network as text
 * (TSV, PSI-MI XML, PSI-MI TAB or STRING XML).
 * @module src/mcp-server/tools/definitions/export-network.tool
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
import { OutputFormat } from '@/services/string-db/types.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'export_network';
const TOOL_TITLE = 'Export Network';
const TOOL_DESCRIPTION =
  'Download the interaction network among a set of proteins as text: tab-separated (tsv, tsv-no-header), PSI-MI XML (psi-mi), PSI-MI TAB (psi-mi-tab) or STRING XML (xml). Use this to hand the network to other tools such as Cytoscape.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const FormatSchema = z.enum([
  OutputFormat.TSV,
  OutputFormat.TSV_NO_HEADER,
  OutputFormat.XML,
  OutputFormat.PSI_MI,
  OutputFormat.PSI_MI_TAB,
]);

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    format: FormatSchema.default(OutputFormat.TSV).describe(
      'Export format.',
    ),
    species: SpeciesSchema,
    requiredScore: RequiredScoreSchema,
    networkType: NetworkTypeSchema,
  })
  .describe('Parameters for network export.');

const OutputSchema = z
  .object({
    format: FormatSchema.describe('Format of `content`.'),
    mimeType: z.string().describe('MIME type of `content`.'),
    content: z.string().describe('Exported network.'),
    columns: z
      .array(z.string())
      .optional()
      .describe('Header columns (tsv only).'),
    rowCount: z
      .number()
      .optional()
      .describe('Number of data rows (tab-separated formats only).'),
  })
  .describe('Exported network.');

type ExportInput = z.infer<typeof InputSchema>;
type ExportOutput = z.infer<typeof OutputSchema>;

async function exportNetworkLogic(
  input: ExportInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ExportOutput> {
  logger.debug('Exporting network', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const exported = await stringDbService.exportNetwork(
    input.identifiers,
    {
      format: input.format,
      species: input.species,
      requiredScore: input.requiredScore,
      networkType: input.networkType,
    },
    appContext,
  );

  logger.info('Network exported', {
    ...appContext,
    format: exported.format,
    length: exported.content.length,
  });

  return {
    format: exported.format,
    mimeType: exported.mimeType,
    content: exported.content,
    ...(exported.table?.columns && { columns: exported.table.columns }),
    ...(exported.table && { rowCount: exported.table.rows.length }),
  };
}

function responseFormatter(result: ExportOutput): ContentBlock[] {
  const summary =
    result.rowCount !== undefined
      ? `Network exported as ${result.format} (${result.rowCount} row(s))`
      : `Network exported as ${result.format}`;

  return [
    { type: 'text', text: summary },
    { type: 'text', text: result.content },
  ];
}

export const exportNetworkTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: exportNetworkLogic,
  responseFormatter,
};
