/**
 * @fileoverview Barrel file for all tool definitions.
 * This file re-exports all tool definitions for easy import and registration.
 * It also exports an array of all definitions for automated registration.
 * @module src/mcp-server/tools/definitions
 */
import type { AnyToolDefinition } from '@/mcp-server/tools/utils/toolDefinition.js';
import { exportNetworkTool } from './export-network.tool.js';
import { getFunctionalAnnotationTool } from './get-functional-annotation.tool.js';
import { getFunctionalEnrichmentTool } from './get-functional-enrichment.tool.js';
import { getInteractionPartnersTool } from './get-interaction-partners.tool.js';
import { getNetworkImageTool } from './get-network-image.tool.js';
import { getNetworkInteractionsTool } from './get-network-interactions.tool.js';
import { getPpiEnrichmentTool } from './get-ppi-enrichment.tool.js';
import { getVersionInfoTool } from './get-version-info.tool.js';
import { mapIdentifiersTool } from './map-identifiers.tool.js';

export {
  exportNetworkTool,
  getFunctionalAnnotationTool,
  getFunctionalEnrichmentTool,
  getInteractionPartnersTool,
  getNetworkImageTool,
  getNetworkInteractionsTool,
  getPpiEnrichmentTool,
  getVersionInfoTool,
  mapIdentifiersTool,
};

/**
 * An array containing all tool definitions for easy iteration.
 */
export const allToolDefinitions: AnyToolDefinition[] = [
  // Identifier resolution
  mapIdentifiersTool,
  // Networks
  getNetworkInteractionsTool,
  getInteractionPartnersTool,
  exportNetworkTool,
  getNetworkImageTool,
  // Functional analysis
  getFunctionalEnrichmentTool,
  getPpiEnrichmentTool,
  getFunctionalAnnotationTool,
  // Database metadata
  getVersionInfoTool,
];
