/**
 * Retrieval service - embeds the question and searches Qdrant
 */

import { config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { getEmbeddingService, type EmbeddingService } from '../embedding/service.js';
import { searchVectors } from '../../storage/qdrant.js';
import type { Passage, Retriever } from '../../types/index.js';

const log = createLogger('retrieval');

type VectorSearch = (vector: number[], limit: number, threshold: number) => Promise<Passage[]>;

export class RetrievalService implements Retriever {
  private embeddingService: Pick<EmbeddingService, 'embedQuery'>;
  private search: VectorSearch;
  private threshold: number;

  constructor(
    embeddingService: Pick<EmbeddingService, 'embedQuery'> = getEmbeddingService(),
    search: VectorSearch = searchVectors,
    threshold: number = config.search.threshold
  ) {
    this.embeddingService = embeddingService;
    this.search = search;
    this.threshold = threshold;
  }

  /**
   * Top-k passages for the question, most similar first
   */
  async retrieve(question: string, k: number, signal?: AbortSignal): Promise<Passage[]> {
    if (!question || question.trim().length === 0) {
      return [];
    }

    const vector = await this.embeddingService.embedQuery(question, signal);
    const passages = await this.search(vector, k, this.threshold);

    log.debug({ count: passages.length, k }, 'Retrieved passages');
    return passages.slice(0, k);
  }
}

// Singleton instance
let retrievalService: RetrievalService | null = null;

export function getRetrievalService(): RetrievalService {
  if (!retrievalService) {
    retrievalService = new RetrievalService();
  }
  return retrievalService;
}
