/**
 * MCP metrics tools
 */

import { z } from 'zod';
import { getMetricsRecorder } from '../../core/pipeline/index.js';
import type { AggregateMetrics, QueryMetrics } from '../../core/metrics/recorder.js';
import type { ToolResult } from '../../types/index.js';

export const getMetricsSchema = z.object({
  includeQueries: z.boolean().optional().describe('Include per-query records (default: false)'),
});

export const resetMetricsSchema = z.object({});

export interface MetricsResultData {
  aggregate: AggregateMetrics;
  queries?: QueryMetrics[];
}

export async function getMetrics(
  params: z.infer<typeof getMetricsSchema>
): Promise<ToolResult<MetricsResultData>> {
  const recorder = getMetricsRecorder();

  return {
    success: true,
    data: {
      aggregate: recorder.getAggregate(),
      ...(params.includeQueries ? { queries: recorder.getRecords() } : {}),
    },
  };
}

export async function resetMetrics(): Promise<ToolResult<{ cleared: number }>> {
  const recorder = getMetricsRecorder();
  const cleared = recorder.getAggregate().totalQueries;
  recorder.reset();

  return {
    success: true,
    data: { cleared },
  };
}
