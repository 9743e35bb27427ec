/**
 * Configuration management for the self-correcting RAG server
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../utils/errors.js';
import type { Config } from '../types/index.js';

// Load .env file from the project root
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenvConfig({ path: resolve(__dirname, '../../.env') });

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number, min?: number, max?: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Invalid number for environment variable ${key}: ${value}`);
  }
  if (min !== undefined && parsed < min) {
    throw new ConfigurationError(`Environment variable ${key} must be at least ${min}, got ${parsed}`);
  }
  if (max !== undefined && parsed > max) {
    throw new ConfigurationError(`Environment variable ${key} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

function getEnvFloat(key: string, defaultValue: number, min: number, max: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < min || parsed > max) {
    throw new ConfigurationError(`Environment variable ${key} must be a number in [${min}, ${max}], got ${value}`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

// Bounds for MAX_ATTEMPTS and MIN_ACCEPTABLE_SCORE are checked again by the
// controller, which rejects out-of-range values from any source.
export const config: Config = {
  litellm: {
    apiKey: getEnv('LITELLM_API_KEY'),
    baseUrl: getEnv('LITELLM_BASE_URL', 'http://localhost:4000/v1'),
    embeddingModel: getEnv('EMBEDDING_MODEL', 'BAAI/bge-m3'),
    timeout: getEnvNumber('LITELLM_TIMEOUT', 30000, 1000, 300000), // 1s to 5min
  },
  qdrant: {
    url: getEnv('QDRANT_URL', 'http://localhost:6333'),
    collectionName: getEnv('QDRANT_COLLECTION', 'rag_documents'),
  },
  search: {
    topK: getEnvNumber('RETRIEVAL_TOP_K', 5, 1, 50),
    threshold: getEnvFloat('SEARCH_THRESHOLD', 0.3, 0, 1),
  },
  models: {
    generation: {
      model: getEnv('GENERATION_MODEL', 'gpt-oss-120b'),
      temperature: getEnvFloat('GENERATION_TEMPERATURE', 0.3, 0, 2),
      maxTokens: getEnvNumber('GENERATION_MAX_TOKENS', 2000, 16, 32000),
    },
    judge: {
      model: getEnv('JUDGE_MODEL', 'gpt-oss-120b'),
      temperature: getEnvFloat('JUDGE_TEMPERATURE', 0, 0, 2),
      maxTokens: getEnvNumber('JUDGE_MAX_TOKENS', 500, 16, 8000),
    },
  },
  pipeline: {
    maxAttempts: getEnvNumber('MAX_ATTEMPTS', 3),
    minAcceptableScore: getEnvNumber('MIN_ACCEPTABLE_SCORE', 3),
    filterEnabled: getEnvBoolean('FILTER_ENABLED', true),
    maxParallelJudgments: getEnvNumber('MAX_PARALLEL_JUDGMENTS', 3, 1, 32),
    maxContextLength: getEnvNumber('MAX_CONTEXT_LENGTH', 8000, 500, 200000),
  },
  security: {
    maxQuestionLength: getEnvNumber('MAX_QUESTION_LENGTH', 1000, 10, 10000),
  },
  metrics: {
    enabled: getEnvBoolean('METRICS_ENABLED', true),
    file: process.env.METRICS_FILE || undefined,
  },
};

export default config;
