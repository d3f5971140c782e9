/**
 * @fileoverview Type definitions for the STRING database domain.
 * Record types are inferred from the response schemas; this file adds the
 * enums, configuration and per-operation option types.
 * @module src/services/string-db/types
 */
import type { z } from 'zod';

import type {
  EnrichmentTermSchema,
  FunctionalAnnotationSchema,
  InteractionSchema,
  PpiEnrichmentSchema,
  StringIdMappingSchema,
  VersionInfoSchema,
} from './schemas.js';

/**
 * Output formats understood by the STRING API. The format is the first path
 * segment after the API root and selects how the body is parsed.
 */
export enum OutputFormat {
  JSON = 'json',
  TSV = 'tsv',
  TSV_NO_HEADER = 'tsv-no-header',
  XML = 'xml',
  PSI_MI = 'psi-mi',
  PSI_MI_TAB = 'psi-mi-tab',
  IMAGE = 'image',
  HIGHRES_IMAGE = 'highres_image',
  SVG = 'svg',
}

/** Formats `exportNetwork` can produce. */
export type NetworkExportFormat =
  | OutputFormat.TSV
  | OutputFormat.TSV_NO_HEADER
  | OutputFormat.XML
  | OutputFormat.PSI_MI
  | OutputFormat.PSI_MI_TAB;

/** Formats `getNetworkImage` can produce. */
export type NetworkImageFormat =
  | OutputFormat.IMAGE
  | OutputFormat.HIGHRES_IMAGE
  | OutputFormat.SVG;

/**
 * Which evidence the network is built from.
 */
export enum NetworkType {
  FUNCTIONAL = 'functional',
  PHYSICAL = 'physical',
}

/**
 * Edge styling of rendered network images.
 */
export enum NetworkFlavor {
  EVIDENCE = 'evidence',
  CONFIDENCE = 'confidence',
  ACTIONS = 'actions',
}

/**
 * NCBI taxonomy identifier (e.g. 9606 for Homo sapiens).
 */
export type SpeciesId = number;

/**
 * Immutable client configuration. Built once per client and never mutated.
 */
export interface StringConfig {
  readonly baseUrl: string;
  /** Version-pinned API root, used instead of `baseUrl` when `pinVersion` is set. */
  readonly versionUrl: string;
  readonly callerIdentity: string;
  /** Delay slept before every outbound request. */
  readonly requestDelayMs: number;
  readonly requestTimeoutMs: number;
  readonly pinVersion: boolean;
}

export type StringIdMapping = z.infer<typeof StringIdMappingSchema>;
export type Interaction = z.infer<typeof InteractionSchema>;
export type EnrichmentTerm = z.infer<typeof EnrichmentTermSchema>;
export type PpiEnrichment = z.infer<typeof PpiEnrichmentSchema>;
export type FunctionalAnnotation = z.infer<typeof FunctionalAnnotationSchema>;
export type VersionInfo = z.infer<typeof VersionInfoSchema>;

/**
 * A mapping entry, always tied to the input token it was resolved from.
 */
export type MappedIdentifier = StringIdMapping & {
  queryIndex: number;
  queryItem: string;
};

interface SpeciesOption {
  species?: SpeciesId | undefined;
}

export interface MapIdentifiersOptions extends SpeciesOption {
  echoQuery?: boolean | undefined;
}

export interface NetworkOptions extends SpeciesOption {
  /** Minimum combined score, 0-1000. */
  requiredScore?: number | undefined;
  /** Number of extra interactors added around the query set. */
  addNodes?: number | undefined;
  networkType?: NetworkType | undefined;
}

export interface ExportNetworkOptions extends NetworkOptions {
  format: NetworkExportFormat;
}

export interface InteractionPartnersOptions extends SpeciesOption {
  /** Partners returned per query protein. */
  limit?: number | undefined;
  requiredScore?: number | undefined;
  networkType?: NetworkType | undefined;
}

export interface EnrichmentOptions extends SpeciesOption {
  /** STRING identifiers forming the statistical background. */
  backgroundIdentifiers?: string[] | undefined;
}

export interface PpiEnrichmentOptions extends EnrichmentOptions {
  requiredScore?: number | undefined;
}

export interface FunctionalAnnotationOptions extends SpeciesOption {
  /** Include PubMed publications as annotation terms. */
  allowPubmed?: boolean | undefined;
}

export interface NetworkImageOptions extends NetworkOptions {
  format?: NetworkImageFormat | undefined;
  networkFlavor?: NetworkFlavor | undefined;
}

/**
 * Tab-separated content split into cells.
 */
export interface TabularData {
  /** Header row; absent for header-less formats. */
  columns?: string[] | undefined;
  rows: string[][];
}

export interface NetworkExport {
  format: NetworkExportFormat;
  mimeType: string;
  content: string;
  /** Parsed cells for the tab-separated formats. */
  table?: TabularData | undefined;
}

export interface NetworkImage {
  format: NetworkImageFormat;
  mimeType: string;
  data: Uint8Array;
}
