/**
 * @fileoverview Low-level HTTP client for the STRING REST API.
 * Builds request URLs, throttles every call through a single global delay,
 * and parses bodies according to the requested output format.
 * @module src/services/string-db/core/StringApiClient
 */
import { inject, injectable } from 'tsyringe';
import type { z } from 'zod';

import { Sleep, StringClientConfig } from '@/container/tokens.js';
import {
  fetchWithTimeout,
  logger,
  RequestThrottle,
  type BodyReader,
  type RequestContext,
  type SleepFn,
} from '@/utils/index.js';
import { MAX_GET_URL_LENGTH } from '../config.js';
import {
  OutputFormat,
  type StringConfig,
  type TabularData,
} from '../types.js';
import {
  assertPng,
  assertSvg,
  parseJsonRecords,
  parseTsv,
  parseXml,
} from './response-parsers.js';

/** Query parameter values; `undefined` entries are left out of the request. */
export type QueryParams = Record<string, string | number | undefined>;

const MIME_TYPES: Record<OutputFormat, string> = {
  [OutputFormat.JSON]: 'application/json',
  [OutputFormat.TSV]: 'text/tab-separated-values',
  [OutputFormat.TSV_NO_HEADER]: 'text/tab-separated-values',
  [OutputFormat.XML]: 'application/xml',
  [OutputFormat.PSI_MI]: 'application/xml',
  [OutputFormat.PSI_MI_TAB]: 'text/tab-separated-values',
  [OutputFormat.IMAGE]: 'image/png',
  [OutputFormat.HIGHRES_IMAGE]: 'image/png',
  [OutputFormat.SVG]: 'image/svg+xml',
};

export function mimeTypeFor(format: OutputFormat): string {
  return MIME_TYPES[format];
}

const readText: BodyReader<string> = (response) => response.text();

const readBytes: BodyReader<Uint8Array> = async (response) =>
  new Uint8Array(await response.arrayBuffer());

@injectable()
export class StringApiClient {
  private readonly throttle: RequestThrottle;

  constructor(
    @inject(StringClientConfig) private readonly config: StringConfig,
    @inject(Sleep) sleepFn: SleepFn,
  ) {
    this.throttle = new RequestThrottle(config.requestDelayMs, sleepFn);
  }

  /**
   * Builds `<root>/<format>/<endpoint>?…`, always adding `caller_identity`.
   */
  buildUrl(endpoint: string, format: OutputFormat, params: QueryParams): URL {
    const root = this.config.pinVersion
      ? this.config.versionUrl
      : this.config.baseUrl;
    const url = new URL(`${root}/${format}/${endpoint}`);

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    if (!url.searchParams.has('caller_identity')) {
      url.searchParams.set('caller_identity', this.config.callerIdentity);
    }
    return url;
  }

  /**
   * Issues one throttled request and reads its body with `readBody` inside
   * the request timeout. Long queries (many identifiers) go out as a
   * form-encoded POST so they stay under URL length limits.
   */
  async request<T>(
    endpoint: string,
    format: OutputFormat,
    params: QueryParams,
    context: RequestContext,
    readBody: BodyReader<T>,
  ): Promise<T> {
    const url = this.buildUrl(endpoint, format, params);
    const headers = { Accept: MIME_TYPES[format] };

    return this.throttle.schedule(() => {
      if (url.href.length <= MAX_GET_URL_LENGTH) {
        logger.debug('Calling STRING API', {
          ...context,
          endpoint,
          format,
          method: 'GET',
        });
        return fetchWithTimeout(
          url,
          this.config.requestTimeoutMs,
          context,
          readBody,
          { method: 'GET', headers },
        );
      }

      const target = new URL(url.pathname, url.origin);
      logger.debug('Calling STRING API', {
        ...context,
        endpoint,
        format,
        method: 'POST',
        urlLength: url.href.length,
      });
      return fetchWithTimeout(
        target,
        this.config.requestTimeoutMs,
        context,
        readBody,
        {
          method: 'POST',
          headers: {
            ...headers,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: url.searchParams.toString(),
        },
      );
    });
  }

  /**
   * Fetches a JSON endpoint and validates each record against `schema`.
   */
  async getJsonRecords<TSchema extends z.ZodTypeAny>(
    endpoint: string,
    schema: TSchema,
    params: QueryParams,
    context: RequestContext,
    options: { allowSingleObject?: boolean } = {},
  ): Promise<z.infer<TSchema>[]> {
    const body = await this.request(
      endpoint,
      OutputFormat.JSON,
      params,
      context,
      readText,
    );
    return parseJsonRecords(body, schema, endpoint, context, options);
  }

  /**
   * Fetches a tab-separated endpoint, returning the raw text and its cells.
   */
  async getTable(
    endpoint: string,
    format:
      | OutputFormat.TSV
      | OutputFormat.TSV_NO_HEADER
      | OutputFormat.PSI_MI_TAB,
    params: QueryParams,
    context: RequestContext,
  ): Promise<{ content: string; table: TabularData }> {
    const content = await this.request(
      endpoint,
      format,
      params,
      context,
      readText,
    );
    const table = parseTsv(content, format === OutputFormat.TSV, context);
    return { content, table };
  }

  /**
   * Fetches an XML-based endpoint (plain XML or PSI-MI). The body must parse
   * as XML; PSI-MI must have an `entrySet` root.
   */
  async getXml(
    endpoint: string,
    format: OutputFormat.XML | OutputFormat.PSI_MI,
    params: QueryParams,
    context: RequestContext,
  ): Promise<string> {
    const body = await this.request(
      endpoint,
      format,
      params,
      context,
      readText,
    );
    return parseXml(body, format, context);
  }

  /**
   * Fetches an image endpoint. PNG formats are checked for the PNG signature,
   * SVG for an `<svg>` element.
   */
  async getImage(
    endpoint: string,
    format: OutputFormat.IMAGE | OutputFormat.HIGHRES_IMAGE | OutputFormat.SVG,
    params: QueryParams,
    context: RequestContext,
  ): Promise<Uint8Array> {
    const bytes = await this.request(
      endpoint,
      format,
      params,
      context,
      readBytes,
    );

    if (format === OutputFormat.SVG) {
      assertSvg(new TextDecoder().decode(bytes), context);
      return bytes;
    }
    return assertPng(bytes, format, context);
  }
}
