/**
 * Stage interfaces the correction controller depends on
 */

import type {
  AttemptRecord,
  CandidateAnswer,
  Evaluation,
  FilteredContext,
  Passage,
} from '../../types/index.js';

export interface PassageFilter {
  filter(question: string, passages: readonly Passage[], signal?: AbortSignal): Promise<FilteredContext>;
}

export interface AnswerGenerator {
  /**
   * Produce an answer from the context only. `priorAttempts` holds the
   * rejected answers of this query, oldest first.
   */
  generate(
    question: string,
    context: readonly Passage[],
    priorAttempts: readonly AttemptRecord[],
    signal?: AbortSignal
  ): Promise<CandidateAnswer>;
}

export interface AnswerEvaluator {
  evaluate(answer: string, context: readonly Passage[], signal?: AbortSignal): Promise<Evaluation>;
}

export type PipelineState =
  | 'retrieving'
  | 'filtering'
  | 'generating'
  | 'evaluating'
  | 'retry'
  | 'accepted'
  | 'exhausted';
