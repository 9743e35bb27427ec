/**
 * Pipeline factory - wires the controller to the configured collaborators
 */

import { config } from '../../config/index.js';
import { getGenerationLLM, getJudgeLLM } from '../llm/service.js';
import { getRetrievalService } from '../retrieval/service.js';
import { RelevanceFilter } from '../verification/relevance-filter.js';
import { FaithfulnessEvaluator } from '../verification/faithfulness-evaluator.js';
import { LLMAnswerGenerator } from '../generation/answer-generator.js';
import { MetricsRecorder } from '../metrics/recorder.js';
import { CorrectionController } from './controller.js';

export {
  CorrectionController,
  DEFAULT_PIPELINE_SETTINGS,
  NO_INFORMATION_ANSWER,
  UNABLE_TO_ANSWER,
  validateSettings,
  type CorrectionControllerConfig,
  type CorrectionControllerDeps,
} from './controller.js';
export type { AnswerEvaluator, AnswerGenerator, PassageFilter, PipelineState } from './types.js';

/**
 * Build a controller from environment configuration.
 * Throws ConfigurationError when the pipeline bounds are invalid.
 */
export function createPipeline(metrics: MetricsRecorder = getMetricsRecorder()): CorrectionController {
  const judge = getJudgeLLM();
  const { pipeline } = config;

  return new CorrectionController(
    {
      retriever: getRetrievalService(),
      filter: new RelevanceFilter(judge, {
        maxParallelCalls: pipeline.maxParallelJudgments,
      }),
      generator: new LLMAnswerGenerator(getGenerationLLM(), {
        maxContextLength: pipeline.maxContextLength,
      }),
      evaluator: new FaithfulnessEvaluator(judge, {
        maxContextLength: pipeline.maxContextLength,
      }),
      metrics,
    },
    {
      maxAttempts: pipeline.maxAttempts,
      minAcceptableScore: pipeline.minAcceptableScore,
      filterEnabled: pipeline.filterEnabled,
      topK: config.search.topK,
      maxQuestionLength: config.security.maxQuestionLength,
    }
  );
}

// Process-wide instances for the CLI, MCP server and REST API
let metricsRecorder: MetricsRecorder | null = null;
let pipelineInstance: CorrectionController | null = null;

export function getMetricsRecorder(): MetricsRecorder {
  if (!metricsRecorder) {
    metricsRecorder = new MetricsRecorder({
      enabled: config.metrics.enabled,
      file: config.metrics.file,
    });
  }
  return metricsRecorder;
}

export function getPipeline(): CorrectionController {
  if (!pipelineInstance) {
    pipelineInstance = createPipeline(getMetricsRecorder());
  }
  return pipelineInstance;
}
