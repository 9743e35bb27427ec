/**
 * Tests for CorrectionController - retrieval, filtering, retry loop, failures
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CorrectionController,
  DEFAULT_PIPELINE_SETTINGS,
  NO_INFORMATION_ANSWER,
  UNABLE_TO_ANSWER,
  validateSettings,
} from './controller.js';
import { RelevanceFilter } from '../verification/relevance-filter.js';
import { INSUFFICIENT_INFORMATION_ANSWER, LLMAnswerGenerator } from '../generation/answer-generator.js';
import { MetricsRecorder } from '../metrics/recorder.js';
import { ConfigurationError, PipelineCancelledError } from '../../utils/errors.js';
import type {
  AttemptRecord,
  Evaluation,
  Passage,
  PromptPayload,
} from '../../types/index.js';
import type { AnswerEvaluator, AnswerGenerator } from './types.js';

const QUESTION = 'What is the refund window?';

function passage(id: string, content: string): Passage {
  return { id, content, metadata: { source: `${id}.md`, chunkIndex: 0 } };
}

const PASSAGES = [
  passage('p1', 'Refunds are accepted within 30 days of purchase.'),
  passage('p2', 'Our office is closed on public holidays.'),
  passage('p3', 'Refund requests need the original receipt.'),
  passage('p4', 'Shipping takes 3-5 business days.'),
  passage('p5', 'A refund is paid back to the original card.'),
];

function evaluation(score: number, justification = `scored ${score}`): Evaluation {
  return { score, justification, supported: score >= 3, unsupportedClaims: [] };
}

function retrieverOf(passages: Passage[]) {
  return { retrieve: vi.fn(async (_question: string, k: number) => passages.slice(0, k)) };
}

// Relevant when the passage mentions refunds
function keywordFilter(): RelevanceFilter {
  return new RelevanceFilter({
    judge: async (payload: PromptPayload) => ({
      isRelevant: /CONTEXT:\n.*refund/i.test(payload.prompt),
      justification: 'keyword match',
    }),
  });
}

const identityFilter = () => ({
  filter: vi.fn(async (_question: string, passages: readonly Passage[]) => ({
    passages: passages.map((p) => ({ passage: p })),
    judged: passages.length,
    rejected: 0,
    failures: 0,
  })),
});

/** Generator answering with the scripted text for each attempt */
function scriptedGenerator(answers: string[]) {
  const priorCounts: number[] = [];
  const generator: AnswerGenerator = {
    generate: vi.fn(async (_question: string, context: readonly Passage[], prior: readonly AttemptRecord[]) => {
      priorCounts.push(prior.length);
      const attempt = prior.length + 1;
      return { text: answers[attempt - 1] ?? `answer ${attempt}`, attempt, context };
    }),
  };
  return { generator, priorCounts };
}

/** Evaluator scoring attempts in order */
function scriptedEvaluator(scores: number[]) {
  let call = 0;
  const evaluator: AnswerEvaluator = {
    evaluate: vi.fn(async () => evaluation(scores[call++] ?? 1)),
  };
  return evaluator;
}

describe('CorrectionController', () => {
  describe('refund window scenario', () => {
    it('should retry a weak answer and accept the corrected one', async () => {
      const { generator, priorCounts } = scriptedGenerator([
        'Refunds are accepted within 60 days.',
        'Refunds are accepted within 30 days of purchase.',
      ]);
      const metrics = new MetricsRecorder();
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: keywordFilter(),
        generator,
        evaluator: scriptedEvaluator([2, 4]),
        metrics,
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe('Refunds are accepted within 30 days of purchase.');
      expect(result.evaluation.score).toBe(4);
      expect(result.attempts).toBe(2);
      expect(result.success).toBe(true);
      expect(result.outcome).toBe('accepted');
      expect(result.documentsRetrieved).toBe(5);
      expect(result.documentsUsed).toBe(3);
      expect(result.sources.map((s) => s.passageId)).toEqual(['p1', 'p3', 'p5']);
      expect(result.history.map((h) => h.evaluation.score)).toEqual([2, 4]);
      expect(priorCounts).toEqual([0, 1]);
      expect(metrics.getRecords()).toHaveLength(1);
      expect(metrics.getRecords()[0].queryId).toBe(result.queryId);
    });
  });

  describe('retrieval', () => {
    it('should answer with the no-information message when nothing is retrieved', async () => {
      const { generator } = scriptedGenerator([]);
      const evaluator = scriptedEvaluator([5]);
      const controller = new CorrectionController({
        retriever: retrieverOf([]),
        filter: identityFilter(),
        generator,
        evaluator,
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe(NO_INFORMATION_ANSWER);
      expect(result.attempts).toBe(0);
      expect(result.evaluation.score).toBe(0);
      expect(result.success).toBe(false);
      expect(result.outcome).toBe('no_context');
      expect(generator.generate).not.toHaveBeenCalled();
      expect(evaluator.evaluate).not.toHaveBeenCalled();
    });

    it('should treat retrieval failure like an empty retrieval', async () => {
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController({
        retriever: { retrieve: vi.fn().mockRejectedValue(new Error('vector store down')) },
        filter: identityFilter(),
        generator,
        evaluator: scriptedEvaluator([]),
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe(NO_INFORMATION_ANSWER);
      expect(result.outcome).toBe('no_context');
      expect(result.error).toBe('Document retrieval failed: vector store down');
      expect(result.evaluation.justification).toBe('Retrieval unavailable');
    });

    it('should request and keep at most topK passages', async () => {
      const retriever = { retrieve: vi.fn().mockResolvedValue(PASSAGES) };
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController(
        { retriever, filter: identityFilter(), generator, evaluator: scriptedEvaluator([5]) },
        { topK: 2 }
      );

      const result = await controller.run(QUESTION);

      expect(retriever.retrieve).toHaveBeenCalledWith(QUESTION, 2, undefined);
      expect(result.documentsRetrieved).toBe(2);
    });
  });

  describe('filtering', () => {
    it('should skip the filter when disabled', async () => {
      const filter = identityFilter();
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter,
        generator,
        evaluator: scriptedEvaluator([5]),
      });

      const result = await controller.run(QUESTION, { filterEnabled: false });

      expect(filter.filter).not.toHaveBeenCalled();
      expect(result.documentsUsed).toBe(5);
    });

    it('should still generate and evaluate when the filter keeps nothing', async () => {
      const llm = { complete: vi.fn() };
      const evaluator = scriptedEvaluator([5]);
      const controller = new CorrectionController({
        retriever: retrieverOf([PASSAGES[1], PASSAGES[3]]),
        filter: keywordFilter(),
        generator: new LLMAnswerGenerator(llm),
        evaluator,
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe(INSUFFICIENT_INFORMATION_ANSWER);
      expect(result.documentsRetrieved).toBe(2);
      expect(result.documentsUsed).toBe(0);
      expect(result.sources).toEqual([]);
      expect(llm.complete).not.toHaveBeenCalled();
      expect(evaluator.evaluate).toHaveBeenCalledWith(INSUFFICIENT_INFORMATION_ANSWER, [], undefined);
    });

    it('should exclude every passage when the filter itself fails', async () => {
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: { filter: vi.fn().mockRejectedValue(new Error('judge offline')) },
        generator,
        evaluator: scriptedEvaluator([3]),
      });

      const result = await controller.run(QUESTION);

      expect(result.documentsUsed).toBe(0);
      expect(result.failures.filterJudgments).toBe(5);
    });
  });

  describe('retry loop', () => {
    it('should stop after one attempt when maxAttempts is 1', async () => {
      const { generator } = scriptedGenerator(['Refunds within 60 days.']);
      const controller = new CorrectionController(
        { retriever: retrieverOf(PASSAGES), filter: identityFilter(), generator, evaluator: scriptedEvaluator([2]) },
        { maxAttempts: 1 }
      );

      const result = await controller.run(QUESTION);

      expect(result.attempts).toBe(1);
      expect(result.evaluation.score).toBe(2);
      expect(result.answer).toBe('Refunds within 60 days.');
      expect(result.success).toBe(false);
      expect(result.outcome).toBe('exhausted');
    });

    it('should accept the first answer when the minimum score is 1', async () => {
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController(
        { retriever: retrieverOf(PASSAGES), filter: identityFilter(), generator, evaluator: scriptedEvaluator([1]) },
        { minAcceptableScore: 1 }
      );

      const result = await controller.run(QUESTION);

      expect(result.attempts).toBe(1);
      expect(result.success).toBe(true);
    });

    it('should return the best attempt when none is accepted', async () => {
      const { generator } = scriptedGenerator(['first', 'second', 'third']);
      const controller = new CorrectionController(
        { retriever: retrieverOf(PASSAGES), filter: identityFilter(), generator, evaluator: scriptedEvaluator([2, 4, 3]) },
        { minAcceptableScore: 5 }
      );

      const result = await controller.run(QUESTION);

      expect(result.attempts).toBe(3);
      expect(result.answer).toBe('second');
      expect(result.evaluation.score).toBe(4);
      expect(result.outcome).toBe('exhausted');
    });

    it('should keep the earliest attempt on ties', async () => {
      const { generator } = scriptedGenerator(['first', 'second', 'third']);
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator,
        evaluator: scriptedEvaluator([2, 2, 2]),
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe('first');
      expect(result.attempts).toBe(3);
    });

    it.each([
      [[1, 2, 1]],
      [[3]],
      [[2, 2, 5]],
      [[0, 1, 2]],
    ])('should report the highest attempt score for scores %j', async (scores) => {
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController(
        { retriever: retrieverOf(PASSAGES), filter: keywordFilter(), generator, evaluator: scriptedEvaluator(scores) },
        { maxAttempts: 3, minAcceptableScore: 3 }
      );

      const result = await controller.run(QUESTION);

      expect(result.attempts).toBeGreaterThanOrEqual(1);
      expect(result.attempts).toBeLessThanOrEqual(3);
      expect(result.documentsUsed).toBeLessThanOrEqual(result.documentsRetrieved);
      expect(result.evaluation.score).toBe(Math.max(...result.history.map((h) => h.evaluation.score)));
    });

    it('should never run more generations than maxAttempts', async () => {
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController(
        { retriever: retrieverOf(PASSAGES), filter: identityFilter(), generator, evaluator: scriptedEvaluator([1, 1, 1, 1, 1]) },
        { maxAttempts: 4 }
      );

      await controller.run(QUESTION);

      expect(generator.generate).toHaveBeenCalledTimes(4);
    });
  });

  describe('attempt failures', () => {
    it('should answer that it is unable to answer when every generation fails', async () => {
      const evaluator = scriptedEvaluator([]);
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator: { generate: vi.fn().mockRejectedValue(new Error('model overloaded')) },
        evaluator,
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe(UNABLE_TO_ANSWER);
      expect(result.attempts).toBe(3);
      expect(result.evaluation.score).toBe(0);
      expect(result.success).toBe(false);
      expect(result.failures.generation).toBe(3);
      expect(result.history[0].failure).toBe('generation');
      expect(result.history[0].evaluation.justification).toBe('Generation failed: model overloaded');
      expect(evaluator.evaluate).not.toHaveBeenCalled();
    });

    it('should score a failed evaluation as 0 and keep retrying', async () => {
      const { generator } = scriptedGenerator(['first', 'second']);
      const evaluator: AnswerEvaluator = {
        evaluate: vi.fn()
          .mockRejectedValueOnce(new Error('judge returned prose'))
          .mockResolvedValueOnce(evaluation(4)),
      };
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator,
        evaluator,
      });

      const result = await controller.run(QUESTION);

      expect(result.answer).toBe('second');
      expect(result.attempts).toBe(2);
      expect(result.failures.evaluation).toBe(1);
      expect(result.history[0]).toEqual({
        attempt: 1,
        answer: 'first',
        evaluation: evaluation(0, 'Evaluation failed: judge returned prose'),
        failure: 'evaluation',
      });
    });
  });

  describe('questions', () => {
    it('should reject an empty question without retrieving', async () => {
      const retriever = retrieverOf(PASSAGES);
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController({
        retriever,
        filter: identityFilter(),
        generator,
        evaluator: scriptedEvaluator([]),
      });

      const result = await controller.run('   ');

      expect(result.outcome).toBe('invalid_question');
      expect(result.attempts).toBe(0);
      expect(result.error).toBe('Question cannot be empty');
      expect(retriever.retrieve).not.toHaveBeenCalled();
    });

    it('should reject an over-long question', async () => {
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController(
        { retriever: retrieverOf(PASSAGES), filter: identityFilter(), generator, evaluator: scriptedEvaluator([]) },
        { maxQuestionLength: 10 }
      );

      const result = await controller.run('a question that is too long');

      expect(result.outcome).toBe('invalid_question');
      expect(result.answer).toBe('Question exceeds maximum length of 10 characters');
    });

    it('should pass the normalized question to the retriever', async () => {
      const retriever = retrieverOf(PASSAGES);
      const { generator } = scriptedGenerator([]);
      const controller = new CorrectionController({
        retriever,
        filter: identityFilter(),
        generator,
        evaluator: scriptedEvaluator([5]),
      });

      const result = await controller.run('  What is   the refund window?  ');

      expect(result.question).toBe(QUESTION);
      expect(retriever.retrieve).toHaveBeenCalledWith(QUESTION, 5, undefined);
    });
  });

  describe('configuration', () => {
    const deps = () => ({
      retriever: retrieverOf(PASSAGES),
      filter: identityFilter(),
      generator: scriptedGenerator([]).generator,
      evaluator: scriptedEvaluator([5]),
    });

    it('should use default settings', () => {
      expect(new CorrectionController(deps()).getSettings()).toEqual(DEFAULT_PIPELINE_SETTINGS);
    });

    it('should reject invalid settings at construction', () => {
      expect(() => new CorrectionController(deps(), { maxAttempts: 0 })).toThrow(ConfigurationError);
      expect(() => new CorrectionController(deps(), { minAcceptableScore: 6 })).toThrow(ConfigurationError);
      expect(() => new CorrectionController(deps(), { topK: 0 })).toThrow(ConfigurationError);
    });

    it('should reject invalid per-run overrides', async () => {
      const controller = new CorrectionController(deps());

      await expect(controller.run(QUESTION, { minAcceptableScore: 0 })).rejects.toBeInstanceOf(ConfigurationError);
      await expect(controller.run(QUESTION, { maxAttempts: 1.5 })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should describe the violated bound', () => {
      expect(() => validateSettings({ ...DEFAULT_PIPELINE_SETTINGS, maxAttempts: 0 })).toThrow(
        'Invalid pipeline configuration: maxAttempts: maxAttempts must be at least 1'
      );
    });
  });

  describe('cancellation', () => {
    it('should reject with PipelineCancelledError when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const metrics = new MetricsRecorder();
      const { generator } = scriptedGenerator([]);
      const pipeline = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator,
        evaluator: scriptedEvaluator([5]),
        metrics,
      });

      await expect(pipeline.run(QUESTION, { signal: controller.signal })).rejects.toBeInstanceOf(PipelineCancelledError);
      expect(metrics.getRecords()).toEqual([]);
    });

    it('should cancel the run when the timeout elapses', async () => {
      const evaluator = scriptedEvaluator([5]);
      const pipeline = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator: {
          generate: async (_question, context, prior) => {
            await new Promise((resolve) => setTimeout(resolve, 50));
            return { text: 'late answer', attempt: prior.length + 1, context };
          },
        },
        evaluator,
      });

      await expect(pipeline.run(QUESTION, { timeoutMs: 10 })).rejects.toThrow(
        'Pipeline run was cancelled: Pipeline run timed out after 10ms'
      );
      expect(evaluator.evaluate).not.toHaveBeenCalled();
    });

    it('should raise cancellation instead of a stage failure when a capability aborts', async () => {
      const controller = new AbortController();
      const pipeline = new CorrectionController({
        retriever: {
          retrieve: async () => {
            controller.abort();
            throw new Error('request aborted');
          },
        },
        filter: identityFilter(),
        generator: scriptedGenerator([]).generator,
        evaluator: scriptedEvaluator([]),
      });

      await expect(pipeline.run(QUESTION, { signal: controller.signal })).rejects.toBeInstanceOf(PipelineCancelledError);
    });

    it('should not accept an answer whose evaluation finished after the abort', async () => {
      const controller = new AbortController();
      const metrics = new MetricsRecorder();
      const pipeline = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator: scriptedGenerator([]).generator,
        evaluator: {
          evaluate: async () => {
            controller.abort();
            return evaluation(5);
          },
        },
        metrics,
      });

      await expect(pipeline.run(QUESTION, { signal: controller.signal })).rejects.toBeInstanceOf(PipelineCancelledError);
      expect(metrics.getRecords()).toEqual([]);
    });

    it('should stop after a retriever that ignores the signal', async () => {
      const controller = new AbortController();
      const filter = identityFilter();
      const pipeline = new CorrectionController({
        retriever: {
          retrieve: async () => {
            controller.abort();
            return PASSAGES;
          },
        },
        filter,
        generator: scriptedGenerator([]).generator,
        evaluator: scriptedEvaluator([5]),
      });

      await expect(pipeline.run(QUESTION, { signal: controller.signal })).rejects.toBeInstanceOf(PipelineCancelledError);
      expect(filter.filter).not.toHaveBeenCalled();
    });
  });

  describe('metrics', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'controller-metrics-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should resolve when the metrics file cannot be written', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'not a directory', 'utf-8');
      const metrics = new MetricsRecorder({ file: join(blocker, 'metrics.json') });
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator: scriptedGenerator([]).generator,
        evaluator: scriptedEvaluator([4]),
        metrics,
      });

      const result = await controller.run(QUESTION);

      expect(result.outcome).toBe('accepted');
      await expect(metrics.flush()).resolves.toBeUndefined();
      expect(metrics.getRecords()).toHaveLength(1);
    });
  });

  describe('concurrency', () => {
    it('should keep concurrent runs independent', async () => {
      const metrics = new MetricsRecorder();
      const generator: AnswerGenerator = {
        generate: async (question, context, prior) => ({ text: `answer to ${question}`, attempt: prior.length + 1, context }),
      };
      const controller = new CorrectionController({
        retriever: retrieverOf(PASSAGES),
        filter: identityFilter(),
        generator,
        evaluator: { evaluate: async (answer) => evaluation(answer.includes('refund') ? 5 : 1) },
        metrics,
      });

      const [first, second] = await Promise.all([
        controller.run(QUESTION, { queryId: 'a' }),
        controller.run('Where is the office?', { queryId: 'b', maxAttempts: 2 }),
      ]);

      expect(first.attempts).toBe(1);
      expect(first.success).toBe(true);
      expect(second.attempts).toBe(2);
      expect(second.success).toBe(false);
      expect(metrics.getRecords().map((r) => r.queryId).sort()).toEqual(['a', 'b']);
    });
  });
});
