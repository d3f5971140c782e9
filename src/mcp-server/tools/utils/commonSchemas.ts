/**
 * @fileoverview Input schema fragments shared by the STRING tools.
 * @module src/mcp-server/tools/utils/commonSchemas
 */
import { z } from 'zod';

import { NetworkType } from '@/services/string-db/types.js';

export const IdentifiersSchema = z
  .array(z.string().trim().min(1, 'Identifiers must not be blank.'))
  .min(1, 'At least one identifier is required.')
  .max(2000, 'At most 2000 identifiers can be queried at once.')
  .describe(
    'Protein identifiers: gene symbols (e.g., "TP53"), UniProt accessions, or STRING ids (e.g., "9606.ENSP00000269305").',
  );

export const SpeciesSchema = z
  .number()
  .int()
  .positive()
  .optional()
  .describe(
    'NCBI taxonomy id of the organism (e.g., 9606 for human, 10090 for mouse). Strongly recommended for gene symbols.',
  );

export const RequiredScoreSchema = z
  .number()
  .int()
  .min(0)
  .max(1000)
  .optional()
  .describe(
    'Minimum combined interaction score, 0-1000 (400 = medium, 700 = high, 900 = highest confidence).',
  );

export const NetworkTypeSchema = z
  .nativeEnum(NetworkType)
  .default(NetworkType.FUNCTIONAL)
  .describe(
    'functional (all association evidence) or physical (proteins in the same complex).',
  );
