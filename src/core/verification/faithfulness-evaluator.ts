/**
 * FaithfulnessEvaluator - score how well an answer is supported by its context
 *
 * Scores run from 1 (unsupported or contradicted) to 5 (fully supported).
 * Only the supplied context counts; world knowledge is not judged.
 */

import { createLogger } from '../../utils/logger.js';
import { EvaluationError, errorMessage } from '../../utils/errors.js';
import type { Evaluation, JudgingCapability, Passage } from '../../types/index.js';
import type { AnswerEvaluator } from '../pipeline/types.js';
import { formatContext } from '../generation/context.js';
import { faithfulnessJudgmentSchema, parseJudgment } from './types.js';

const log = createLogger('faithfulness-evaluator');

export const FAITHFULNESS_SYSTEM_PROMPT = `You are an evaluator assessing the factual consistency of a generated ANSWER.
Your job is to determine whether the ANSWER is fully supported by the given SOURCE CONTEXT.

Scoring guidelines:
- 5 (Perfect): fully and verifiably supported by the SOURCE CONTEXT, no hallucinations
- 4 (Excellent): mostly supported, only very minor unsupported details
- 3 (Good): partially supported but contains some unsupported information
- 2 (Poor): contains significant information not present in the SOURCE CONTEXT
- 1 (Very Poor): mostly or entirely unsupported by, or contradicting, the SOURCE CONTEXT

Additional considerations:
- An answer that honestly states the information is not available should score high if that is accurate
- Judge only against the SOURCE CONTEXT, not general knowledge
- List every claim that the SOURCE CONTEXT does not support

Respond ONLY with valid JSON in this exact format:
{
  "score": 4,
  "justification": "Brief explanation of the score",
  "supported": true,
  "unsupportedClaims": ["claim with no evidence in the context"]
}`;

export class FaithfulnessEvaluator implements AnswerEvaluator {
  private judge: JudgingCapability;
  private maxContextLength: number;

  constructor(judge: JudgingCapability, options: { maxContextLength?: number } = {}) {
    this.judge = judge;
    this.maxContextLength = options.maxContextLength ?? 8000;
  }

  /**
   * Evaluate the factual consistency of an answer against its context
   */
  async evaluate(answer: string, context: readonly Passage[], signal?: AbortSignal): Promise<Evaluation> {
    try {
      const payload = await this.judge.judge({
        systemPrompt: FAITHFULNESS_SYSTEM_PROMPT,
        prompt: buildEvaluationPrompt(answer, formatContext(context, this.maxContextLength)),
        signal,
      });
      const judgment = parseJudgment(faithfulnessJudgmentSchema, payload);

      log.debug({ score: judgment.score, supported: judgment.supported }, 'Answer evaluated');

      return {
        score: judgment.score,
        justification: judgment.justification,
        supported: judgment.supported,
        unsupportedClaims: judgment.unsupportedClaims,
      };
    } catch (error) {
      throw new EvaluationError(`Evaluation failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function buildEvaluationPrompt(answer: string, formattedContext: string): string {
  return `SOURCE CONTEXT:
${formattedContext || '(no context provided)'}

GENERATED ANSWER:
${answer}

Evaluate the answer. Respond with JSON only.`;
}
