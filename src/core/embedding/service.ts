/**
 * Embedding service using the LiteLLM embeddings API
 */

import { config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { withRetry } from '../../utils/security.js';

const log = createLogger('embedding');

export class EmbeddingService {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private timeout: number;

  constructor() {
    this.apiKey = config.litellm.apiKey;
    this.baseUrl = config.litellm.baseUrl;
    this.model = config.litellm.embeddingModel;
    this.timeout = config.litellm.timeout;
  }

  /**
   * Embed a single query text, retrying transient failures
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    return withRetry(
      async () => {
        const embeddings = await this.request([text], signal);
        const first = embeddings[0];
        if (!first || first.length === 0) {
          throw new Error('Embedding API returned empty embeddings array');
        }
        return first;
      },
      {
        maxRetries: 3,
        initialDelayMs: 1000,
        maxDelayMs: 10000,
        signal,
        onRetry: (attempt, error, delayMs) => {
          log.warn({ attempt, delayMs, err: error.message }, 'Embedding API retry');
        },
      }
    );
  }

  private async request(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (signal?.aborted) {
        controller.abort(signal.reason);
      }

      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          input: texts,
          encoding_format: 'float',
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Embedding API error (${response.status}): ${errorText}`);
      }

      const data = await response.json() as LiteLLMEmbeddingResponse;

      // Sort by index to keep input order
      return [...data.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

// LiteLLM API response types
interface LiteLLMEmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
    object: string;
  }>;
  model: string;
  object: string;
  usage?: {
    prompt_tokens: number;
    total_tokens: number;
  };
}

// Singleton instance
let embeddingService: EmbeddingService | null = null;

export function getEmbeddingService(): EmbeddingService {
  if (!embeddingService) {
    embeddingService = new EmbeddingService();
  }
  return embeddingService;
}
