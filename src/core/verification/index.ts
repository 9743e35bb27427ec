/**
 * Verification module exports
 *
 * - RelevanceFilter: keep passages the judge considers relevant
 * - FaithfulnessEvaluator: score an answer's support in its context
 */

export type {
  RelevanceFilterConfig,
  RelevanceJudgment,
  FaithfulnessJudgment,
} from './types.js';
export {
  relevanceJudgmentSchema,
  faithfulnessJudgmentSchema,
  parseJudgment,
} from './types.js';

export {
  RelevanceFilter,
  DEFAULT_RELEVANCE_FILTER_CONFIG,
  RELEVANCE_SYSTEM_PROMPT,
  buildRelevancePrompt,
} from './relevance-filter.js';
export {
  FaithfulnessEvaluator,
  FAITHFULNESS_SYSTEM_PROMPT,
  buildEvaluationPrompt,
} from './faithfulness-evaluator.js';
