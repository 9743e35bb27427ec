/**
 * RelevanceFilter - LLM-based passage relevance judgments
 *
 * Asks the judge whether each passage helps answer the question and keeps
 * the ones it accepts, in retrieval order. A judgment that fails excludes
 * its passage and is counted instead of raised. Whether filtering runs at
 * all is the controller's `filterEnabled` setting.
 */

import { createLogger } from '../../utils/logger.js';
import { FilterJudgmentError, errorMessage, throwIfAborted } from '../../utils/errors.js';
import type { FilteredContext, JudgingCapability, Passage } from '../../types/index.js';
import type { PassageFilter } from '../pipeline/types.js';
import {
  parseJudgment,
  relevanceJudgmentSchema,
  type RelevanceFilterConfig,
  type RelevanceJudgment,
} from './types.js';

const log = createLogger('relevance-filter');

export const DEFAULT_RELEVANCE_FILTER_CONFIG: RelevanceFilterConfig = {
  maxParallelCalls: 3,
};

export const RELEVANCE_SYSTEM_PROMPT = `You are a relevance filter for a question answering system. Your job is to decide whether a CONTEXT passage is relevant for answering the user's QUESTION.

Guidelines:
- Mark the passage relevant if it contains information that can help answer the question
- Mark it not relevant if it is unrelated to the question
- Be strict but reasonable: partial relevance counts as relevant
- Consider meaning, not just keyword overlap

Respond ONLY with valid JSON in this exact format:
{"isRelevant": true, "justification": "Brief explanation of the decision"}`;

type JudgmentOutcome =
  | { index: number; ok: true; judgment: RelevanceJudgment }
  | { index: number; ok: false; error: FilterJudgmentError };

export class RelevanceFilter implements PassageFilter {
  private judge: JudgingCapability;
  private config: RelevanceFilterConfig;

  constructor(judge: JudgingCapability, config: Partial<RelevanceFilterConfig> = {}) {
    this.judge = judge;
    this.config = { ...DEFAULT_RELEVANCE_FILTER_CONFIG, ...config };
  }

  /**
   * Keep the passages the judge considers relevant to the question
   */
  async filter(
    question: string,
    passages: readonly Passage[],
    signal?: AbortSignal
  ): Promise<FilteredContext> {
    if (passages.length === 0) {
      return { passages: [], judged: 0, rejected: 0, failures: 0 };
    }

    const outcomes = await this.judgeAll(question, passages, signal);

    // Judgments cut short by cancellation are not failures
    throwIfAborted(signal);

    const context: FilteredContext = {
      passages: [],
      judged: passages.length,
      rejected: 0,
      failures: 0,
    };

    for (const outcome of outcomes) {
      const passage = passages[outcome.index];
      if (!outcome.ok) {
        context.failures++;
        log.warn({ passageId: passage.id, err: outcome.error.message }, 'Relevance judgment failed, excluding passage');
      } else if (outcome.judgment.isRelevant) {
        context.passages.push({ passage, justification: outcome.judgment.justification });
        log.debug({ passageId: passage.id, justification: outcome.judgment.justification }, 'Passage relevant');
      } else {
        context.rejected++;
        log.debug({ passageId: passage.id, justification: outcome.judgment.justification }, 'Passage not relevant');
      }
    }

    log.info(
      { kept: context.passages.length, total: passages.length, failures: context.failures },
      'Relevance filtering complete'
    );

    return context;
  }

  /**
   * Judge every passage in batches of maxParallelCalls, returning outcomes
   * in input order
   */
  private async judgeAll(
    question: string,
    passages: readonly Passage[],
    signal?: AbortSignal
  ): Promise<JudgmentOutcome[]> {
    const outcomes: JudgmentOutcome[] = [];
    const maxParallel = Math.max(1, this.config.maxParallelCalls);

    for (let i = 0; i < passages.length; i += maxParallel) {
      throwIfAborted(signal);
      const batch = passages.slice(i, i + maxParallel);
      const batchOutcomes = await Promise.all(
        batch.map((passage, offset) => this.judgeOne(question, passage, i + offset, signal))
      );
      outcomes.push(...batchOutcomes);
    }

    return outcomes;
  }

  private async judgeOne(
    question: string,
    passage: Passage,
    index: number,
    signal?: AbortSignal
  ): Promise<JudgmentOutcome> {
    try {
      const payload = await this.judge.judge({
        systemPrompt: RELEVANCE_SYSTEM_PROMPT,
        prompt: buildRelevancePrompt(question, passage),
        signal,
      });
      return { index, ok: true, judgment: parseJudgment(relevanceJudgmentSchema, payload) };
    } catch (error) {
      return {
        index,
        ok: false,
        error: new FilterJudgmentError(
          `Relevance judgment failed for passage ${passage.id}: ${errorMessage(error)}`,
          { cause: error }
        ),
      };
    }
  }
}

export function buildRelevancePrompt(question: string, passage: Passage): string {
  return `QUESTION:
${question}

SOURCE: ${passage.metadata.source}

CONTEXT:
${passage.content}

Is this context relevant for answering the question? Respond with JSON only.`;
}
