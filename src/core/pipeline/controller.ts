/**
 * CorrectionController - self-correcting answer pipeline
 *
 * Drives one question through
 *   retrieving → filtering → generating → evaluating → accepted | retry | exhausted
 * and loops between generation and evaluation until an answer reaches the
 * minimum score or the attempt budget runs out. The best-scoring attempt is
 * returned; ties go to the earliest attempt.
 *
 * Capability failures never escape `run`: retrieval failure ends the query
 * with the no-information answer, a failed judgment drops its passage, and a
 * failed generation or evaluation counts as a score-0 attempt. Only
 * ConfigurationError and PipelineCancelledError are thrown.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger, type Logger } from '../../utils/logger.js';
import {
  ConfigurationError,
  InvalidQuestionError,
  PipelineCancelledError,
  RetrievalUnavailableError,
  errorMessage,
  throwIfAborted,
} from '../../utils/errors.js';
import { DEFAULT_MAX_QUESTION_LENGTH, validateQuestion } from '../../utils/security.js';
import type {
  AttemptRecord,
  Evaluation,
  FailureCounts,
  FilteredContext,
  Passage,
  PipelineOutcome,
  PipelineResult,
  PipelineSettings,
  Retriever,
  RunOptions,
  StageLatencies,
} from '../../types/index.js';
import type { MetricsRecorder } from '../metrics/recorder.js';
import type { AnswerEvaluator, AnswerGenerator, PassageFilter, PipelineState } from './types.js';

const log = createLogger('correction-controller');

export const NO_INFORMATION_ANSWER =
  'I could not find any relevant information to answer this question.';

export const UNABLE_TO_ANSWER =
  'I was unable to produce an answer: there is insufficient information to answer this question.';

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxAttempts: 3,
  minAcceptableScore: 3,
  filterEnabled: true,
  topK: 5,
};

export const pipelineSettingsSchema = z.object({
  maxAttempts: z.number().int().min(1, 'maxAttempts must be at least 1'),
  minAcceptableScore: z.number().int().min(1).max(5, 'minAcceptableScore must be between 1 and 5'),
  filterEnabled: z.boolean(),
  topK: z.number().int().min(1, 'topK must be at least 1'),
});

export interface CorrectionControllerDeps {
  retriever: Retriever;
  filter: PassageFilter;
  generator: AnswerGenerator;
  evaluator: AnswerEvaluator;
  metrics?: MetricsRecorder;
}

export interface CorrectionControllerConfig extends Partial<PipelineSettings> {
  maxQuestionLength?: number;
}

/**
 * Validate pipeline bounds, raising ConfigurationError on the first violation
 */
export function validateSettings(settings: PipelineSettings): PipelineSettings {
  const result = pipelineSettingsSchema.safeParse(settings);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export class CorrectionController {
  private deps: CorrectionControllerDeps;
  private settings: PipelineSettings;
  private maxQuestionLength: number;

  constructor(deps: CorrectionControllerDeps, config: CorrectionControllerConfig = {}) {
    const { maxQuestionLength = DEFAULT_MAX_QUESTION_LENGTH, ...settings } = config;
    this.deps = deps;
    this.settings = validateSettings(mergeSettings(DEFAULT_PIPELINE_SETTINGS, settings));
    this.maxQuestionLength = maxQuestionLength;

    log.info(
      {
        maxAttempts: this.settings.maxAttempts,
        minAcceptableScore: this.settings.minAcceptableScore,
        filterEnabled: this.settings.filterEnabled,
        topK: this.settings.topK,
      },
      'Correction controller initialized'
    );
  }

  getSettings(): PipelineSettings {
    return { ...this.settings };
  }

  /**
   * Answer a question. Resolves with a PipelineResult for every outcome;
   * rejects only with ConfigurationError (invalid overrides) or
   * PipelineCancelledError.
   */
  async run(question: string, options: RunOptions = {}): Promise<PipelineResult> {
    const { signal: callerSignal, timeoutMs, queryId = uuidv4(), ...overrides } = options;
    const settings = validateSettings(mergeSettings(this.settings, overrides));

    const { signal, dispose } = linkSignal(callerSignal, timeoutMs);
    const queryLog = log.child({ queryId });

    try {
      const result = await this.execute(question, queryId, settings, queryLog, signal);
      this.deps.metrics?.record(result, result.latencies);

      queryLog.info(
        { outcome: result.outcome, score: result.evaluation.score, attempts: result.attempts },
        'Pipeline completed'
      );
      return result;
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        queryLog.warn({ reason: error.message }, 'Pipeline cancelled');
      }
      throw error;
    } finally {
      dispose();
    }
  }

  private async execute(
    rawQuestion: string,
    queryId: string,
    settings: PipelineSettings,
    queryLog: Logger,
    signal: AbortSignal | undefined
  ): Promise<PipelineResult> {
    const startTime = Date.now();
    const latencies: StageLatencies = {
      retrievalMs: 0,
      filterMs: 0,
      generationMs: 0,
      evaluationMs: 0,
      totalMs: 0,
    };
    const failures: FailureCounts = { filterJudgments: 0, generation: 0, evaluation: 0 };
    const transition = (state: PipelineState, details: Record<string, unknown> = {}) => {
      queryLog.debug({ state, ...details }, 'Pipeline state');
    };

    let question: string;
    try {
      question = validateQuestion(rawQuestion, this.maxQuestionLength);
    } catch (error) {
      if (!(error instanceof InvalidQuestionError)) throw error;
      queryLog.warn({ reason: error.message }, 'Rejected invalid question');
      latencies.totalMs = Date.now() - startTime;
      return terminalResult({
        queryId,
        question: rawQuestion,
        answer: error.message,
        outcome: 'invalid_question',
        justification: 'Question failed validation',
        documentsRetrieved: 0,
        latencies,
        failures,
        error: error.message,
      });
    }

    // RETRIEVING
    transition('retrieving', { topK: settings.topK });
    throwIfAborted(signal);
    let passages: Passage[] = [];
    let retrievalError: RetrievalUnavailableError | undefined;
    const retrievalStart = Date.now();
    try {
      passages = (await this.deps.retriever.retrieve(question, settings.topK, signal)).slice(0, settings.topK);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      retrievalError = new RetrievalUnavailableError(`Document retrieval failed: ${errorMessage(error)}`, { cause: error });
      queryLog.error({ err: error }, 'Retrieval failed');
    }
    latencies.retrievalMs = Date.now() - retrievalStart;
    // Capabilities may complete without honouring the signal
    throwIfAborted(signal);

    if (passages.length === 0) {
      latencies.totalMs = Date.now() - startTime;
      return terminalResult({
        queryId,
        question,
        answer: NO_INFORMATION_ANSWER,
        outcome: 'no_context',
        justification: retrievalError ? 'Retrieval unavailable' : 'No documents retrieved',
        documentsRetrieved: 0,
        latencies,
        failures,
        error: retrievalError?.message,
      });
    }

    // FILTERING
    transition('filtering', { retrieved: passages.length, enabled: settings.filterEnabled });
    const filterStart = Date.now();
    const filtered = settings.filterEnabled
      ? await this.runFilter(question, passages, queryLog, signal)
      : identityContext(passages);
    latencies.filterMs = Date.now() - filterStart;
    throwIfAborted(signal);
    failures.filterJudgments = filtered.failures;

    const context = filtered.passages.map((relevant) => relevant.passage);
    if (context.length === 0) {
      queryLog.warn('No relevant context after filtering, generating on the no-context branch');
    }

    // GENERATING ⇄ EVALUATING
    const history: AttemptRecord[] = [];
    let best: AttemptRecord | undefined;

    for (let attempt = 1; attempt <= settings.maxAttempts; attempt++) {
      transition('generating', { attempt });
      const record = await this.runAttempt(question, context, history, attempt, latencies, failures, queryLog, signal);
      // An abort during evaluation must not end in ACCEPTED
      throwIfAborted(signal);
      history.push(record);

      // Strictly greater: ties keep the earliest attempt
      if (!best || record.evaluation.score > best.evaluation.score) {
        best = record;
      }

      if (record.evaluation.score >= settings.minAcceptableScore) {
        transition('accepted', { attempt, score: record.evaluation.score });
        break;
      }

      if (attempt < settings.maxAttempts) {
        transition('retry', { attempt, score: record.evaluation.score });
        queryLog.warn(
          { score: record.evaluation.score, threshold: settings.minAcceptableScore, nextAttempt: attempt + 1 },
          'Score below threshold, retrying'
        );
      } else {
        transition('exhausted', { attempt, bestScore: best.evaluation.score });
        queryLog.warn({ bestScore: best.evaluation.score }, 'Attempt budget exhausted');
      }
    }

    // maxAttempts >= 1, so the loop ran at least once
    const final = best ?? history[0];
    const success = final.evaluation.score >= settings.minAcceptableScore;
    latencies.totalMs = Date.now() - startTime;

    return {
      queryId,
      question,
      answer: final.failure === 'generation' ? UNABLE_TO_ANSWER : final.answer,
      evaluation: final.evaluation,
      attempts: history.length,
      documentsRetrieved: passages.length,
      documentsUsed: context.length,
      latencies,
      success,
      outcome: success ? 'accepted' : 'exhausted',
      failures,
      sources: context.map((passage) => ({
        passageId: passage.id,
        source: passage.metadata.source,
        chunkIndex: passage.metadata.chunkIndex,
        page: passage.metadata.page,
      })),
      history,
    };
  }

  private async runFilter(
    question: string,
    passages: Passage[],
    queryLog: Logger,
    signal: AbortSignal | undefined
  ): Promise<FilteredContext> {
    try {
      return await this.deps.filter.filter(question, passages, signal);
    } catch (error) {
      rethrowIfCancelled(error, signal);
      // Judgment failure means "not relevant", for every passage at once
      queryLog.error({ err: error }, 'Relevance filter failed, excluding all passages');
      return { passages: [], judged: passages.length, rejected: 0, failures: passages.length };
    }
  }

  private async runAttempt(
    question: string,
    context: Passage[],
    history: readonly AttemptRecord[],
    attempt: number,
    latencies: StageLatencies,
    failures: FailureCounts,
    queryLog: Logger,
    signal: AbortSignal | undefined
  ): Promise<AttemptRecord> {
    throwIfAborted(signal);

    let answer: string;
    const generationStart = Date.now();
    try {
      const candidate = await this.deps.generator.generate(question, context, history, signal);
      answer = candidate.text;
    } catch (error) {
      rethrowIfCancelled(error, signal);
      failures.generation++;
      queryLog.error({ err: error, attempt }, 'Generation failed, scoring attempt as 0');
      return {
        attempt,
        answer: '',
        evaluation: failedEvaluation(`Generation failed: ${errorMessage(error)}`),
        failure: 'generation',
      };
    } finally {
      latencies.generationMs += Date.now() - generationStart;
    }

    queryLog.debug({ state: 'evaluating', attempt }, 'Pipeline state');
    throwIfAborted(signal);

    const evaluationStart = Date.now();
    try {
      const evaluation = await this.deps.evaluator.evaluate(answer, context, signal);
      queryLog.info({ attempt, score: evaluation.score, justification: evaluation.justification }, 'Answer evaluated');
      return { attempt, answer, evaluation };
    } catch (error) {
      rethrowIfCancelled(error, signal);
      failures.evaluation++;
      queryLog.error({ err: error, attempt }, 'Evaluation failed, scoring attempt as 0');
      return {
        attempt,
        answer,
        evaluation: failedEvaluation(`Evaluation failed: ${errorMessage(error)}`),
        failure: 'evaluation',
      };
    } finally {
      latencies.evaluationMs += Date.now() - evaluationStart;
    }
  }
}

function failedEvaluation(justification: string): Evaluation {
  return { score: 0, justification, supported: false, unsupportedClaims: [] };
}

function identityContext(passages: Passage[]): FilteredContext {
  return {
    passages: passages.map((passage) => ({ passage })),
    judged: 0,
    rejected: 0,
    failures: 0,
  };
}

function terminalResult(input: {
  queryId: string;
  question: string;
  answer: string;
  outcome: PipelineOutcome;
  justification: string;
  documentsRetrieved: number;
  latencies: StageLatencies;
  failures: FailureCounts;
  error?: string;
}): PipelineResult {
  return {
    queryId: input.queryId,
    question: input.question,
    answer: input.answer,
    evaluation: failedEvaluation(input.justification),
    attempts: 0,
    documentsRetrieved: input.documentsRetrieved,
    documentsUsed: 0,
    latencies: input.latencies,
    success: false,
    outcome: input.outcome,
    failures: input.failures,
    sources: [],
    history: [],
    ...(input.error ? { error: input.error } : {}),
  };
}

/**
 * A capability error raised after the run was aborted is a cancellation,
 * not a stage failure
 */
function rethrowIfCancelled(error: unknown, signal: AbortSignal | undefined): void {
  if (error instanceof PipelineCancelledError) throw error;
  throwIfAborted(signal);
}

/**
 * Combine the caller's signal with an optional run timeout
 */
function linkSignal(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal: AbortSignal | undefined; dispose: () => void } {
  if (timeoutMs === undefined) {
    return { signal, dispose: () => {} };
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(
    () => controller.abort(new Error(`Pipeline run timed out after ${timeoutMs}ms`)),
    timeoutMs
  );
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

function mergeSettings(base: PipelineSettings, overrides: Partial<PipelineSettings>): PipelineSettings {
  return {
    maxAttempts: overrides.maxAttempts ?? base.maxAttempts,
    minAcceptableScore: overrides.minAcceptableScore ?? base.minAcceptableScore,
    filterEnabled: overrides.filterEnabled ?? base.filterEnabled,
    topK: overrides.topK ?? base.topK,
  };
}
