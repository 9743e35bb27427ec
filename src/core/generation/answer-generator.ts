/**
 * Answer generator - grounded answers from filtered context
 */

import { createLogger } from '../../utils/logger.js';
import { GenerationError, errorMessage } from '../../utils/errors.js';
import type {
  AttemptRecord,
  CandidateAnswer,
  GenerationCapability,
  Passage,
} from '../../types/index.js';
import type { AnswerGenerator } from '../pipeline/types.js';
import { formatContext } from './context.js';

const log = createLogger('answer-generator');

export const INSUFFICIENT_INFORMATION_ANSWER =
  'There is insufficient information in the available documents to answer this question.';

export const GENERATION_SYSTEM_PROMPT = `You are a helpful assistant. Answer the user's QUESTION based *only* on the SOURCE CONTEXT.

Guidelines:
- Use ONLY the information provided in the SOURCE CONTEXT
- Do not use any outside information or knowledge
- If the context is not sufficient to answer the question, say so clearly
- Be accurate, concise and well-structured
- Cite the documents you rely on by their number, e.g. [Document 2]`;

export interface AnswerGeneratorOptions {
  /** Context characters sent to the model before truncation */
  maxContextLength?: number;
}

export class LLMAnswerGenerator implements AnswerGenerator {
  private llm: GenerationCapability;
  private maxContextLength: number;

  constructor(llm: GenerationCapability, options: AnswerGeneratorOptions = {}) {
    this.llm = llm;
    this.maxContextLength = options.maxContextLength ?? 8000;
  }

  async generate(
    question: string,
    context: readonly Passage[],
    priorAttempts: readonly AttemptRecord[],
    signal?: AbortSignal
  ): Promise<CandidateAnswer> {
    const attempt = priorAttempts.length + 1;

    // Never let the model answer from nothing
    if (context.length === 0) {
      log.info({ attempt }, 'No relevant context, returning insufficient information answer');
      return { text: INSUFFICIENT_INFORMATION_ANSWER, attempt, context };
    }

    let text: string;
    try {
      text = await this.llm.complete({
        systemPrompt: GENERATION_SYSTEM_PROMPT,
        prompt: buildGenerationPrompt(question, formatContext(context, this.maxContextLength), priorAttempts),
        signal,
      });
    } catch (error) {
      throw new GenerationError(`Answer generation failed: ${errorMessage(error)}`, { cause: error });
    }

    if (text.trim().length === 0) {
      throw new GenerationError('Answer generation returned an empty completion');
    }

    log.debug({ attempt, preview: text.substring(0, 100) }, 'Generated answer');

    return { text: text.trim(), attempt, context };
  }
}

/**
 * Build the user prompt; rejected attempts are listed so the model can
 * take a different approach
 */
export function buildGenerationPrompt(
  question: string,
  formattedContext: string,
  priorAttempts: readonly AttemptRecord[]
): string {
  let prompt = `QUESTION:
${question}

SOURCE CONTEXT:
${formattedContext}`;

  const rejected = priorAttempts.filter((attempt) => attempt.failure !== 'generation');
  if (rejected.length > 0) {
    const feedback = rejected
      .map((attempt) => `Attempt ${attempt.attempt} (score ${attempt.evaluation.score}/5): ${attempt.answer}
Reviewer feedback: ${attempt.evaluation.justification}${formatClaims(attempt.evaluation.unsupportedClaims)}`)
      .join('\n\n');

    prompt += `

PREVIOUS ATTEMPTS:
The answers below were rejected for not being faithful to the SOURCE CONTEXT. Do not repeat their mistakes; stick strictly to what the context states.

${feedback}`;
  }

  return `${prompt}

ANSWER:`;
}

function formatClaims(claims: string[]): string {
  if (claims.length === 0) return '';
  return `\nUnsupported claims: ${claims.map((claim) => `"${claim}"`).join(', ')}`;
}
