/**
 * @fileoverview Tool definition for rendering a STRING network image.
 * The binary image travels base64-encoded, both in the structured result and
 * in an MCP image content block.
 * @module src/mcp-server/tools/definitions/get-network-image.tool
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
import { NetworkFlavor, OutputFormat } from '@/services/string-db/types.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'get_network_image';
const TOOL_TITLE = 'Get Network Image';
const TOOL_DESCRIPTION =
  'Render the STRING interaction network of a protein set as an image: PNG (image), high-resolution PNG (highres_image) or SVG (svg). Returned base64-encoded.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const ImageFormatSchema = z.enum([
  OutputFormat.IMAGE,
  OutputFormat.HIGHRES_IMAGE,
  OutputFormat.SVG,
]);

const InputSchema = z
  .object({
    identifiers: IdentifiersSchema,
    species: SpeciesSchema,
    format: ImageFormatSchema.default(OutputFormat.IMAGE).describe(
      'Image format.',
    ),
    requiredScore: RequiredScoreSchema,
    addNodes: z
      .number()
      .int()
      .min(0)
      .max(100)
      .default(0)
      .describe('Number of extra interactors to draw around the query set.'),
    networkType: NetworkTypeSchema,
    networkFlavor: z
      .nativeEnum(NetworkFlavor)
      .default(NetworkFlavor.EVIDENCE)
      .describe(
        'Edge style: evidence (one color per evidence channel), confidence (line thickness) or actions (molecular action).',
      ),
  })
  .describe('Parameters for network image rendering.');

const OutputSchema = z
  .object({
    format: ImageFormatSchema.describe('Image format.'),
    mimeType: z.string().describe('MIME type of the image.'),
    byteLength: z.number().describe('Size of the decoded image in bytes.'),
    data: z.string().describe('Base64-encoded image bytes.'),
  })
  .describe('Rendered network image.');

type ImageInput = z.infer<typeof InputSchema>;
type ImageOutput = z.infer<typeof OutputSchema>;

export function encodeImageData(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    'base64',
  );
}

async function getNetworkImageLogic(
  input: ImageInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ImageOutput> {
  logger.debug('Rendering network image', {
    ...appContext,
    toolInput: input,
  });

  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const image = await stringDbService.getNetworkImage(
    input.identifiers,
    {
      species: input.species,
      format: input.format,
      requiredScore: input.requiredScore,
      addNodes: input.addNodes,
      networkType: input.networkType,
      networkFlavor: input.networkFlavor,
    },
    appContext,
  );

  logger.info('Network image rendered', {
    ...appContext,
    format: image.format,
    byteLength: image.data.byteLength,
  });

  return {
    format: image.format,
    mimeType: image.mimeType,
    byteLength: image.data.byteLength,
    data: encodeImageData(image.data),
  };
}

function responseFormatter(result: ImageOutput): ContentBlock[] {
  return [
    {
      type: 'text',
      text: `Network image (${result.format}, ${result.mimeType}, ${(result.byteLength / 1024).toFixed(1)} KB)`,
    },
    { type: 'image', data: result.data, mimeType: result.mimeType },
  ];
}

export const getNetworkImageTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getNetworkImageLogic,
  responseFormatter,
};
