/**
 * @fileoverview Parsers turning STRING response bodies into typed values.
 * Every parser throws `SerializationError` when the body does not match the
 * format that was requested.
 * @module src/services/string-db/core/response-parsers
 */
import { parseStringPromise } from 'xml2js';
import type { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import type { RequestContext } from '@/utils/index.js';
import { OutputFormat, type TabularData } from '../types.js';

/** First eight bytes of every PNG file. */
export const PNG_SIGNATURE: readonly number[] = [
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
];

const BODY_PREVIEW_LENGTH = 200;

function parseFailure(
  message: string,
  context: RequestContext,
  data: Record<string, unknown> = {},
): McpError {
  return new McpError(JsonRpcErrorCode.SerializationError, message, {
    requestId: context.requestId,
    ...data,
  });
}

function preview(body: string): string {
  return body.length > BODY_PREVIEW_LENGTH
    ? `${body.slice(0, BODY_PREVIEW_LENGTH)}…`
    : body;
}

/**
 * Parses a JSON body.
 */
export function parseJsonBody(
  body: string,
  endpoint: string,
  context: RequestContext,
): unknown {
  try {
    const value: unknown = JSON.parse(body);
    return value;
  } catch (error) {
    throw parseFailure(
      `Malformed JSON returned by STRING endpoint '${endpoint}': ${error instanceof Error ? error.message : String(error)}`,
      context,
      { endpoint, bodyPreview: preview(body) },
    );
  }
}

/**
 * Parses a JSON body into a list of records validated by `schema`.
 * With `allowSingleObject`, a top-level object is read as a one-element list.
 */
export function parseJsonRecords<TSchema extends z.ZodTypeAny>(
  body: string,
  schema: TSchema,
  endpoint: string,
  context: RequestContext,
  options: { allowSingleObject?: boolean } = {},
): z.infer<TSchema>[] {
  const json = parseJsonBody(body, endpoint, context);

  let items: unknown[];
  if (Array.isArray(json)) {
    items = json;
  } else if (
    options.allowSingleObject &&
    typeof json === 'object' &&
    json !== null
  ) {
    items = [json];
  } else {
    throw parseFailure(
      `Expected a JSON array from STRING endpoint '${endpoint}', got ${json === null ? 'null' : typeof json}.`,
      context,
      { endpoint, bodyPreview: preview(body) },
    );
  }

  return items.map((item, index) => {
    const result = schema.safeParse(item);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw parseFailure(
        `Unexpected record at index ${index} from STRING endpoint '${endpoint}': ${issues}`,
        context,
        { endpoint, index },
      );
    }
    return result.data;
  });
}

/**
 * Splits tab-separated text into cells. Blank lines are ignored; every row
 * must have as many cells as the first line.
 */
export function parseTsv(
  body: string,
  hasHeader: boolean,
  context: RequestContext,
): TabularData {
  const lines = body
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => line.split('\t'));

  const [first] = lines;
  if (!first) {
    return hasHeader ? { columns: [], rows: [] } : { rows: [] };
  }

  const width = first.length;
  lines.forEach((cells, index) => {
    if (cells.length !== width) {
      throw parseFailure(
        `Malformed TSV: line ${index + 1} has ${cells.length} columns, expected ${width}.`,
        context,
        { line: index + 1 },
      );
    }
  });

  return hasHeader
    ? { columns: first, rows: lines.slice(1) }
    : { rows: lines };
}

/** Root element of every PSI-MI XML document. */
export const PSI_MI_ROOT = 'entrySet';

function localName(tag: string): string {
  const colon = tag.indexOf(':');
  return colon === -1 ? tag : tag.slice(colon + 1);
}

/**
 * Parses an XML body (STRING XML or PSI-MI) and checks its root element.
 * The tree only serves validation; the original text is returned.
 */
export async function parseXml(
  body: string,
  format: OutputFormat.XML | OutputFormat.PSI_MI,
  context: RequestContext,
): Promise<string> {
  const data = { format, bodyPreview: preview(body) };

  let document: unknown;
  try {
    document = await parseStringPromise(body);
  } catch (error) {
    const reason =
      error instanceof Error
        ? (error.message.split('\n')[0] ?? error.message)
        : String(error);
    throw parseFailure(
      `Malformed XML for format '${format}': ${reason}`,
      context,
      data,
    );
  }

  const root =
    typeof document === 'object' && document !== null
      ? Object.keys(document)[0]
      : undefined;
  if (root === undefined) {
    throw parseFailure(
      `Expected an XML document for format '${format}'.`,
      context,
      data,
    );
  }

  const name = localName(root);
  if (name.toLowerCase() === 'html') {
    throw parseFailure(
      `Expected an XML document for format '${format}' but got an HTML page.`,
      context,
      data,
    );
  }
  if (format === OutputFormat.PSI_MI && name !== PSI_MI_ROOT) {
    throw parseFailure(
      `Expected a PSI-MI document with root <${PSI_MI_ROOT}> but got <${root}>.`,
      context,
      data,
    );
  }
  return body;
}

/**
 * Checks that a body is an SVG document.
 */
export function assertSvg(body: string, context: RequestContext): string {
  if (!/<svg[\s>]/i.test(body)) {
    throw parseFailure('Expected an SVG document.', context, {
      format: OutputFormat.SVG,
      bodyPreview: preview(body),
    });
  }
  return body;
}

export function hasPngSignature(bytes: Uint8Array): boolean {
  return (
    bytes.length >= PNG_SIGNATURE.length &&
    PNG_SIGNATURE.every((byte, index) => bytes[index] === byte)
  );
}

/**
 * Checks that a body is a PNG image.
 */
export function assertPng(
  bytes: Uint8Array,
  format: OutputFormat,
  context: RequestContext,
): Uint8Array {
  if (!hasPngSignature(bytes)) {
    throw parseFailure(
      `Expected a PNG image for format '${format}' but the body has no PNG signature.`,
      context,
      { format, byteLength: bytes.length },
    );
  }
  return bytes;
}
