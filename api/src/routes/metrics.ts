/**
 * Metrics routes
 */

import { Hono } from 'hono';
import { getMetricsRecorder } from '../../../src/core/pipeline/index.js';

const metrics = new Hono();

/**
 * Aggregate metrics, optionally with per-query records
 * GET /api/metrics?queries=true
 */
metrics.get('/', (c) => {
  const recorder = getMetricsRecorder();
  const includeQueries = c.req.query('queries') === 'true';

  return c.json({
    success: true,
    data: {
      enabled: recorder.isEnabled(),
      aggregate: recorder.getAggregate(),
      ...(includeQueries ? { queries: recorder.getRecords() } : {}),
    },
  });
});

/**
 * Clear recorded metrics
 * POST /api/metrics/reset
 */
metrics.post('/reset', (c) => {
  const recorder = getMetricsRecorder();
  const cleared = recorder.getAggregate().totalQueries;
  recorder.reset();

  return c.json({ success: true, data: { cleared } });
});

export default metrics;
