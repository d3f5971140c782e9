/**
 * @fileoverview Tool definition reporting the STRING database version.
 * @module src/mcp-server/tools/definitions/get-version-info.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StringDbService } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import { VersionInfoSchema } from '@/services/string-db/schemas.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'get_version_info';
const TOOL_TITLE = 'Get STRING Version';
const TOOL_DESCRIPTION =
  'Return the current STRING database version and its stable (version-pinned) address.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z.object({}).describe('No parameters.');

const OutputSchema = z
  .object({
    versions: z
      .array(VersionInfoSchema)
      .describe('Version records reported by STRING.'),
  })
  .describe('STRING version information.');

type VersionInput = z.infer<typeof InputSchema>;
type VersionOutput = z.infer<typeof OutputSchema>;

async function getVersionInfoLogic(
  _input: VersionInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<VersionOutput> {
  const stringDbService =
    container.resolve<StringDbServiceClass>(StringDbService);
  const versions = await stringDbService.getVersionInfo(appContext);

  logger.info('STRING version retrieved', {
    ...appContext,
    versions: versions.map((v) => v.string_version),
  });

  return { versions };
}

function responseFormatter(result: VersionOutput): ContentBlock[] {
  const text = result.versions
    .map((v) => `STRING ${v.string_version} (${v.stable_address})`)
    .join('\n');
  return [{ type: 'text', text: text || 'No version information returned.' }];
}

export const getVersionInfoTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getVersionInfoLogic,
  responseFormatter,
};
