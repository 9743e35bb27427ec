/**
 * Qdrant vector database client
 *
 * Read-only access: indexing happens outside this service, which only
 * searches an existing collection.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { config } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import type { Passage } from '../types/index.js';

const log = createLogger('qdrant');

let client: QdrantClient | null = null;

export function getQdrantClient(): QdrantClient {
  if (client) return client;

  client = new QdrantClient({
    url: config.qdrant.url,
  });

  return client;
}

/**
 * Payload stored with every chunk vector
 */
export const chunkPayloadSchema = z.object({
  chunk_id: z.string(),
  content: z.string(),
  chunk_index: z.number().int(),
  filename: z.string(),
  page_number: z.number().int().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type ChunkPayload = z.infer<typeof chunkPayloadSchema>;

export interface VectorSearchHit {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

export async function searchVectors(
  queryVector: number[],
  limit: number,
  threshold: number
): Promise<Passage[]> {
  const qdrant = getQdrantClient();

  const results: VectorSearchHit[] = await qdrant.search(config.qdrant.collectionName, {
    vector: queryVector,
    limit,
    score_threshold: threshold,
    with_payload: true,
    with_vector: false,
  });

  return toPassages(results);
}

/**
 * Convert search hits to passages, skipping hits whose payload is malformed
 */
export function toPassages(hits: VectorSearchHit[]): Passage[] {
  const passages: Passage[] = [];

  for (const hit of hits) {
    const parsed = chunkPayloadSchema.safeParse(hit.payload);
    if (!parsed.success) continue;

    const payload = parsed.data;
    passages.push({
      id: payload.chunk_id,
      content: payload.content,
      score: hit.score,
      metadata: {
        ...payload.metadata,
        source: payload.filename,
        chunkIndex: payload.chunk_index,
        page: payload.page_number,
      },
    });
  }

  return passages;
}

export async function getCollectionInfo(): Promise<{
  vectorCount: number;
  status: string;
}> {
  const qdrant = getQdrantClient();

  try {
    const info = await qdrant.getCollection(config.qdrant.collectionName);
    return {
      vectorCount: info.points_count ?? 0,
      status: info.status,
    };
  } catch (error) {
    log.warn({ err: error, collection: config.qdrant.collectionName }, 'Collection info unavailable');
    return {
      vectorCount: 0,
      status: 'not_initialized',
    };
  }
}
