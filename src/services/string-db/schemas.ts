/**
 * @fileoverview Zod schemas for STRING JSON responses. Unknown fields are kept
 * so newer API releases pass through unchanged.
 * @module src/services/string-db/schemas
 */
import { z } from 'zod';

export const StringIdMappingSchema = z
  .object({
    queryIndex: z.number().int().nonnegative(),
    queryItem: z.string().optional(),
    stringId: z.string(),
    ncbiTaxonId: z.number(),
    taxonName: z.string(),
    preferredName: z.string(),
    annotation: z.string().optional(),
  })
  .passthrough();

export const InteractionSchema = z
  .object({
    stringId_A: z.string(),
    stringId_B: z.string(),
    preferredName_A: z.string(),
    preferredName_B: z.string(),
    ncbiTaxonId: z.number(),
    score: z.number(),
    nscore: z.number().optional(),
    fscore: z.number().optional(),
    pscore: z.number().optional(),
    ascore: z.number().optional(),
    escore: z.number().optional(),
    dscore: z.number().optional(),
    tscore: z.number().optional(),
  })
  .passthrough();

export const EnrichmentTermSchema = z
  .object({
    category: z.string(),
    term: z.string(),
    description: z.string(),
    number_of_genes: z.number(),
    number_of_genes_in_background: z.number(),
    ncbiTaxonId: z.number(),
    inputGenes: z.array(z.string()),
    preferredNames: z.array(z.string()),
    p_value: z.number(),
    fdr: z.number(),
  })
  .passthrough();

export const PpiEnrichmentSchema = z
  .object({
    number_of_nodes: z.number(),
    number_of_edges: z.number(),
    average_node_degree: z.number(),
    local_clustering_coefficient: z.number(),
    expected_number_of_edges: z.number(),
    p_value: z.number(),
  })
  .passthrough();

export const FunctionalAnnotationSchema = z
  .object({
    category: z.string(),
    term: z.string(),
    description: z.string(),
    number_of_genes: z.number(),
    ratio_in_set: z.number(),
    ncbiTaxonId: z.number(),
    inputGenes: z.array(z.string()),
    preferredNames: z.array(z.string()),
  })
  .passthrough();

export const VersionInfoSchema = z
  .object({
    string_version: z.string(),
    stable_address: z.string(),
  })
  .passthrough();
