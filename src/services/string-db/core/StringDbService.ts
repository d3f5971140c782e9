/**
 * @fileoverview Public bridge to the STRING database.
 * Validates caller parameters before any network call, delegates the HTTP
 * exchange to {@link StringApiClientClass}, and shapes the parsed results.
 * @module src/services/string-db/core/StringDbService
 */
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';

import { StringApiClient } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import {
  EnrichmentTermSchema,
  FunctionalAnnotationSchema,
  InteractionSchema,
  PpiEnrichmentSchema,
  StringIdMappingSchema,
  VersionInfoSchema,
} from '../schemas.js';
import {
  NetworkFlavor,
  NetworkType,
  OutputFormat,
  type EnrichmentOptions,
  type EnrichmentTerm,
  type ExportNetworkOptions,
  type FunctionalAnnotation,
  type FunctionalAnnotationOptions,
  type Interaction,
  type InteractionPartnersOptions,
  type MapIdentifiersOptions,
  type MappedIdentifier,
  type NetworkExport,
  type NetworkImage,
  type NetworkImageOptions,
  type NetworkOptions,
  type PpiEnrichment,
  type PpiEnrichmentOptions,
  type VersionInfo,
} from '../types.js';
import {
  mimeTypeFor,
  type QueryParams,
  type StringApiClient as StringApiClientClass,
} from './StringApiClient.js';

/** Separator STRING expects between identifiers. */
export const IDENTIFIER_SEPARATOR = '\r';

const IdentifierListSchema = z
  .array(
    z
      .string()
      .trim()
      .min(1, 'identifiers must not contain blank entries'),
    { invalid_type_error: 'identifiers must be a list of strings' },
  )
  .min(1, 'identifiers list cannot be empty');

const SpeciesSchema = z
  .number()
  .int('species must be an integer NCBI taxonomy id')
  .positive('species must be a positive NCBI taxonomy id')
  .optional();

const RequiredScoreSchema = z
  .number()
  .int('requiredScore must be an integer')
  .min(0, 'requiredScore must be between 0 and 1000')
  .max(1000, 'requiredScore must be between 0 and 1000')
  .optional();

const NonNegativeIntSchema = z.number().int().nonnegative().optional();
const PositiveIntSchema = z.number().int().positive().optional();

const NetworkOptionsSchema = z.object({
  species: SpeciesSchema,
  requiredScore: RequiredScoreSchema,
  addNodes: NonNegativeIntSchema,
  networkType: z.nativeEnum(NetworkType).optional(),
});

const ExportFormatSchema = z.enum([
  OutputFormat.TSV,
  OutputFormat.TSV_NO_HEADER,
  OutputFormat.XML,
  OutputFormat.PSI_MI,
  OutputFormat.PSI_MI_TAB,
]);

const ImageFormatSchema = z
  .enum([OutputFormat.IMAGE, OutputFormat.HIGHRES_IMAGE, OutputFormat.SVG])
  .default(OutputFormat.IMAGE);

/**
 * Validates `value`, converting failures into a `ValidationError`.
 */
function validate<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  field: string,
  context: RequestContext,
): z.infer<TSchema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${field}.${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join('; ');
    throw new McpError(JsonRpcErrorCode.ValidationError, detail, {
      requestId: context.requestId,
      field,
    });
  }
  return result.data;
}

function joinIdentifiers(identifiers: string[]): string {
  return identifiers.join(IDENTIFIER_SEPARATOR);
}

function flag(value: boolean | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * The bridge. Every operation performs at most one outbound call and never
 * retries; failures surface immediately as {@link McpError}s.
 */
@injectable()
export class StringDbService {
  constructor(
    @inject(StringApiClient) private readonly client: StringApiClientClass,
  ) {}

  /**
   * Maps gene symbols or accessions to STRING identifiers (best match per
   * input). Each entry carries the input token it was resolved from.
   */
  async mapIdentifiers(
    identifiers: string[],
    options: MapIdentifiersOptions,
    context: RequestContext,
  ): Promise<MappedIdentifier[]> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const species = validate(
      SpeciesSchema,
      options.species,
      'species',
      context,
    );

    logger.debug('StringDbService: Mapping identifiers', {
      ...context,
      identifierCount: ids.length,
      species,
    });

    const records = await this.client.getJsonRecords(
      'get_string_ids',
      StringIdMappingSchema,
      {
        identifiers: joinIdentifiers(ids),
        species,
        echo_query: flag(options.echoQuery),
        limit: 1,
      },
      context,
    );

    return records.map((record, index) => {
      const queryItem = ids[record.queryIndex];
      if (queryItem === undefined) {
        throw new McpError(
          JsonRpcErrorCode.SerializationError,
          `STRING returned queryIndex ${record.queryIndex} for a query of ${ids.length} identifier(s).`,
          { requestId: context.requestId, index },
        );
      }
      return { ...record, queryItem };
    });
  }

  /**
   * Retrieves the interaction edges among the query proteins.
   */
  async getNetworkInteractions(
    identifiers: string[],
    options: NetworkOptions,
    context: RequestContext,
  ): Promise<Interaction[]> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const opts = validate(NetworkOptionsSchema, options, 'options', context);

    logger.debug('StringDbService: Fetching network interactions', {
      ...context,
      identifierCount: ids.length,
      options: opts,
    });

    return this.client.getJsonRecords(
      'network',
      InteractionSchema,
      {
        ...this.networkParams(ids, opts),
        show_query_node_labels: 0,
      },
      context,
    );
  }

  /**
   * Downloads the network in a text format (TSV, PSI-MI, XML).
   */
  async exportNetwork(
    identifiers: string[],
    options: ExportNetworkOptions,
    context: RequestContext,
  ): Promise<NetworkExport> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const format = validate(
      ExportFormatSchema,
      options.format,
      'format',
      context,
    );
    const opts = validate(NetworkOptionsSchema, options, 'options', context);

    logger.debug('StringDbService: Exporting network', {
      ...context,
      identifierCount: ids.length,
      format,
    });

    const params = this.networkParams(ids, opts);
    const mimeType = mimeTypeFor(format);

    if (format === OutputFormat.XML || format === OutputFormat.PSI_MI) {
      const content = await this.client.getXml(
        'network',
        format,
        params,
        context,
      );
      return { format, mimeType, content };
    }

    const { content, table } = await this.client.getTable(
      'network',
      format,
      params,
      context,
    );
    return { format, mimeType, content, table };
  }

  /**
   * Lists the strongest interaction partners of each query protein, drawn
   * from the whole proteome.
   */
  async getInteractionPartners(
    identifiers: string[],
    options: InteractionPartnersOptions,
    context: RequestContext,
  ): Promise<Interaction[]> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const species = validate(
      SpeciesSchema,
      options.species,
      'species',
      context,
    );
    const limit = validate(PositiveIntSchema, options.limit, 'limit', context);
    const requiredScore = validate(
      RequiredScoreSchema,
      options.requiredScore,
      'requiredScore',
      context,
    );
    const networkType = validate(
      z.nativeEnum(NetworkType).optional(),
      options.networkType,
      'networkType',
      context,
    );

    logger.debug('StringDbService: Fetching interaction partners', {
      ...context,
      identifierCount: ids.length,
      limit,
    });

    return this.client.getJsonRecords(
      'interaction_partners',
      InteractionSchema,
      {
        identifiers: joinIdentifiers(ids),
        species,
        limit,
        required_score: requiredScore,
        network_type: networkType,
      },
      context,
    );
  }

  /**
   * Runs functional enrichment (GO, KEGG, Reactome, …) on the protein set.
   */
  async getFunctionalEnrichment(
    identifiers: string[],
    options: EnrichmentOptions,
    context: RequestContext,
  ): Promise<EnrichmentTerm[]> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const species = validate(
      SpeciesSchema,
      options.species,
      'species',
      context,
    );
    const background = this.validateBackground(options, context);

    logger.debug('StringDbService: Running functional enrichment', {
      ...context,
      identifierCount: ids.length,
      backgroundSize: background?.length ?? 0,
    });

    return this.client.getJsonRecords(
      'enrichment',
      EnrichmentTermSchema,
      {
        identifiers: joinIdentifiers(ids),
        species,
        background_string_identifiers: background
          ? joinIdentifiers(background)
          : undefined,
      },
      context,
    );
  }

  /**
   * Tests whether the set has more interactions than expected by chance.
   */
  async getPpiEnrichment(
    identifiers: string[],
    options: PpiEnrichmentOptions,
    context: RequestContext,
  ): Promise<PpiEnrichment> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const species = validate(
      SpeciesSchema,
      options.species,
      'species',
      context,
    );
    const requiredScore = validate(
      RequiredScoreSchema,
      options.requiredScore,
      'requiredScore',
      context,
    );
    const background = this.validateBackground(options, context);

    logger.debug('StringDbService: Running PPI enrichment', {
      ...context,
      identifierCount: ids.length,
    });

    const [result] = await this.client.getJsonRecords(
      'ppi_enrichment',
      PpiEnrichmentSchema,
      {
        identifiers: joinIdentifiers(ids),
        species,
        required_score: requiredScore,
        background_string_identifiers: background
          ? joinIdentifiers(background)
          : undefined,
      },
      context,
      { allowSingleObject: true },
    );

    if (!result) {
      throw new McpError(
        JsonRpcErrorCode.SerializationError,
        'STRING returned no PPI enrichment result.',
        { requestId: context.requestId },
      );
    }
    return result;
  }

  /**
   * Lists every annotation term (GO, pathways, domains, …) of the proteins.
   */
  async getFunctionalAnnotation(
    identifiers: string[],
    options: FunctionalAnnotationOptions,
    context: RequestContext,
  ): Promise<FunctionalAnnotation[]> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const species = validate(
      SpeciesSchema,
      options.species,
      'species',
      context,
    );

    logger.debug('StringDbService: Fetching functional annotation', {
      ...context,
      identifierCount: ids.length,
    });

    return this.client.getJsonRecords(
      'functional_annotation',
      FunctionalAnnotationSchema,
      {
        identifiers: joinIdentifiers(ids),
        species,
        allow_pubmed: flag(options.allowPubmed),
      },
      context,
    );
  }

  /**
   * Renders the network as a PNG (standard or high resolution) or SVG.
   */
  async getNetworkImage(
    identifiers: string[],
    options: NetworkImageOptions,
    context: RequestContext,
  ): Promise<NetworkImage> {
    const ids = validate(
      IdentifierListSchema,
      identifiers,
      'identifiers',
      context,
    );
    const format = validate(
      ImageFormatSchema,
      options.format,
      'format',
      context,
    );
    const opts = validate(NetworkOptionsSchema, options, 'options', context);
    const networkFlavor = validate(
      z.nativeEnum(NetworkFlavor).optional(),
      options.networkFlavor,
      'networkFlavor',
      context,
    );

    logger.debug('StringDbService: Rendering network image', {
      ...context,
      identifierCount: ids.length,
      format,
    });

    const { add_nodes: addColorNodes, ...params } = this.networkParams(
      ids,
      opts,
    );
    const data = await this.client.getImage(
      'network',
      format,
      {
        ...params,
        add_color_nodes: addColorNodes,
        network_flavor: networkFlavor,
      },
      context,
    );

    return { format, mimeType: mimeTypeFor(format), data };
  }

  /**
   * Reports the STRING release served by the configured API root.
   */
  async getVersionInfo(context: RequestContext): Promise<VersionInfo[]> {
    logger.debug('StringDbService: Fetching version info', { ...context });

    return this.client.getJsonRecords(
      'version',
      VersionInfoSchema,
      {},
      context,
      { allowSingleObject: true },
    );
  }

  private networkParams(
    ids: string[],
    opts: z.infer<typeof NetworkOptionsSchema>,
  ): QueryParams {
    return {
      identifiers: joinIdentifiers(ids),
      species: opts.species,
      required_score: opts.requiredScore,
      add_nodes: opts.addNodes ? opts.addNodes : undefined,
      network_type: opts.networkType,
    };
  }

  private validateBackground(
    options: EnrichmentOptions,
    context: RequestContext,
  ): string[] | undefined {
    if (
      options.backgroundIdentifiers === undefined ||
      options.backgroundIdentifiers.length === 0
    ) {
      return undefined;
    }
    return validate(
      IdentifierListSchema,
      options.backgroundIdentifiers,
      'backgroundIdentifiers',
      context,
    );
  }
}
