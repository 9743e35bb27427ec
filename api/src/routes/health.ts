/**
 * Health check route
 */

import { Hono } from 'hono';
import { getCollectionInfo } from '../../../src/storage/qdrant.js';

const health = new Hono();

health.get('/', (c) => {
  return c.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
    services: {
      api: 'up',
    },
  });
});

health.get('/ready', async (c) => {
  const collection = await getCollectionInfo();
  const checks = {
    api: true,
    vectorStore: collection.status !== 'not_initialized',
  };

  const allReady = Object.values(checks).every(Boolean);

  return c.json(
    {
      ready: allReady,
      checks,
      vectorCount: collection.vectorCount,
      timestamp: new Date().toISOString(),
    },
    allReady ? 200 : 503
  );
});

export default health;
