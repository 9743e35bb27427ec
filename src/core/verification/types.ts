/**
 * Types and response schemas for relevance filtering and faithfulness evaluation
 */

import { z } from 'zod';
import { ParseError } from '../../utils/errors.js';

/**
 * Configuration for the relevance filter
 */
export interface RelevanceFilterConfig {
  /** Maximum judgments in flight at once */
  maxParallelCalls: number;
}

/**
 * Judge response for a single passage relevance check
 */
export const relevanceJudgmentSchema = z.object({
  isRelevant: z.boolean(),
  justification: z.string().default(''),
});

export type RelevanceJudgment = z.infer<typeof relevanceJudgmentSchema>;

/**
 * Judge response for faithfulness evaluation
 */
export const faithfulnessJudgmentSchema = z.object({
  score: z.number().int().min(1).max(5),
  justification: z.string(),
  supported: z.boolean(),
  unsupportedClaims: z.array(z.string()).default([]),
});

export type FaithfulnessJudgment = z.infer<typeof faithfulnessJudgmentSchema>;

/**
 * Validate a judge payload against a schema, raising ParseError on mismatch
 */
export function parseJudgment<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`Invalid judge response: ${issues}`, { cause: result.error });
  }
  return result.data;
}
