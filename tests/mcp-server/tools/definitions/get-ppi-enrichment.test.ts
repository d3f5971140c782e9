/**
 * @fileoverview Unit tests for the get_ppi_enrichment tool.
 * @module tests/mcp-server/tools/definitions/get-ppi-enrichment.test
 */
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type Mock,
} from 'vitest';
import { container } from 'tsyringe';

import { StringDbService } from '@/container/tokens.js';
import { getPpiEnrichmentTool } from '@/mcp-server/tools/definitions/get-ppi-enrichment.tool.js';
import type { SdkContext } from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StringDbService as StringDbServiceClass } from '@/services/string-db/core/StringDbService.js';
import type { PpiEnrichment } from '@/services/string-db/types.js';
import { logger } from '@/utils/index.js';

const stats = (pValue: number): PpiEnrichment => ({
  number_of_nodes: 4,
  number_of_edges: 6,
  average_node_degree: 3,
  local_clustering_coefficient: 1,
  expected_number_of_edges: 2,
  p_value: pValue,
});

describe('get_ppi_enrichment tool', () => {
  const context = {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
  };
  const sdkContext = {
    signal: new AbortController().signal,
  } as unknown as SdkContext;

  let getPpiEnrichment: Mock;

  beforeEach(() => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    getPpiEnrichment = vi.fn();
    const mockService = { getPpiEnrichment };
    vi.spyOn(container, 'resolve').mockImplementation((token) => {
      if (token === StringDbService) {
        return mockService as unknown as StringDbServiceClass;
      }
      throw new Error(`Unexpected token: ${String(token)}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should flag a small p-value as significant', async () => {
    getPpiEnrichment.mockResolvedValue(stats(0.001));
    const input = await getPpiEnrichmentTool.inputSchema.parseAsync({
      identifiers: ['TP53', 'MDM2', 'EGFR', 'BRCA1'],
      requiredScore: 700,
    });

    const result = await getPpiEnrichmentTool.logic(input, context, sdkContext);

    expect(result).toEqual({ enrichment: stats(0.001), significant: true });
    expect(getPpiEnrichment).toHaveBeenCalledWith(
      ['TP53', 'MDM2', 'EGFR', 'BRCA1'],
      {
        species: undefined,
        requiredScore: 700,
        backgroundIdentifiers: undefined,
      },
      context,
    );
  });

  it('should not flag p = 0.05', async () => {
    getPpiEnrichment.mockResolvedValue(stats(0.05));
    const input = await getPpiEnrichmentTool.inputSchema.parseAsync({
      identifiers: ['TP53'],
    });

    const result = await getPpiEnrichmentTool.logic(input, context, sdkContext);

    expect(result.significant).toBe(false);
  });

  it('should summarize the statistics', () => {
    const content = getPpiEnrichmentTool.responseFormatter?.({
      enrichment: stats(0.001),
      significant: true,
    });

    expect(content).toEqual([
      {
        type: 'text',
        text: [
          'Nodes: 4 | Edges: 6 (expected 2)',
          'Average node degree: 3',
          'Local clustering coefficient: 1',
          'PPI enrichment p-value: 0.001',
          'The network has significantly more interactions than expected.',
        ].join('\n'),
      },
    ]);
  });
});
