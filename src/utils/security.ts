/**
 * Security utilities for the answer pipeline
 * Provides question validation, error sanitization and retry with backoff
 */

import { InvalidQuestionError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('security');

export const DEFAULT_MAX_QUESTION_LENGTH = 1000;

// Logged for monitoring, never rejected
const SUSPICIOUS_PATTERNS: RegExp[] = [
  /ignore\s+(all\s+)?previous\s+instructions/i,
  /disregard\s+previous/i,
  /forget\s+(everything|all|previous)/i,
  /system\s*:\s*you\s+are/i,
  /<\s*script\s*>/i,
  /javascript\s*:/i,
];

/**
 * Validate and normalize a question before it enters the pipeline.
 * Throws InvalidQuestionError for empty or over-long input.
 */
export function validateQuestion(
  question: string,
  maxLength: number = DEFAULT_MAX_QUESTION_LENGTH
): string {
  if (typeof question !== 'string' || question.trim().length === 0) {
    throw new InvalidQuestionError('Question cannot be empty');
  }

  if (question.length > maxLength) {
    throw new InvalidQuestionError(`Question exceeds maximum length of ${maxLength} characters`);
  }

  const matched = findSuspiciousPatterns(question);
  if (matched.length > 0) {
    log.warn({ patterns: matched }, 'Suspicious pattern detected in question');
  }

  const sanitized = sanitizeQuestion(question);
  if (sanitized.length === 0) {
    throw new InvalidQuestionError('Question cannot be empty');
  }
  return sanitized;
}

/**
 * Strip null bytes and control characters, collapse whitespace
 */
export function sanitizeQuestion(text: string): string {
  return text
    .replace(/\0/g, '')
    .replace(/[\u0001-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function findSuspiciousPatterns(text: string): string[] {
  return SUSPICIOUS_PATTERNS.filter((pattern) => pattern.test(text)).map((pattern) => pattern.source);
}

/**
 * Sanitize error messages to prevent information disclosure
 * Removes API keys, bearer tokens, file paths and internal addresses
 */
export function sanitizeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return 'An unexpected error occurred';
  }

  let sanitized = error.message.replace(/sk-[a-zA-Z0-9]{20,}/g, '[REDACTED_API_KEY]');

  sanitized = sanitized.replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]');

  // Unix and Windows absolute paths
  sanitized = sanitized.replace(/\/(?:home|usr|var|tmp|etc|opt|root)\/[^\s:'"]+/g, '[REDACTED_PATH]');
  sanitized = sanitized.replace(/[A-Z]:\\[^\s:'"]+/gi, '[REDACTED_PATH]');

  sanitized = sanitized.replace(/\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}(:\d+)?/g, '[REDACTED_IP]');

  // Stack traces
  sanitized = sanitized.replace(/\n\s+at\s+.+/g, '');

  if (sanitized.length > 500) {
    sanitized = sanitized.substring(0, 497) + '...';
  }

  return sanitized || 'An error occurred while processing your request';
}

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: string[];
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Execute a function with exponential backoff retry logic
 * for transient failures in collaborator API calls
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    retryableErrors = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'fetch failed', 'network', '429', '502', '503', '504'],
    signal,
    onRetry,
  } = options;

  let delay = initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries || signal?.aborted) {
        throw lastError;
      }

      const errorMessage = lastError.message.toLowerCase();
      const isRetryable = retryableErrors.some(
        (pattern) => errorMessage.includes(pattern.toLowerCase())
      );
      if (!isRetryable) {
        throw lastError;
      }

      onRetry?.(attempt + 1, lastError, delay);

      await sleep(delay);

      // Exponential backoff with 0-30% jitter
      const jitter = Math.random() * 0.3 * delay;
      delay = Math.min(delay * backoffMultiplier + jitter, maxDelayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
