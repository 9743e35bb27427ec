#!/usr/bin/env node
/**
 * Self-correcting RAG - Main Entry Point
 *
 * This module provides both programmatic API and CLI interface.
 *
 * Usage:
 *   - MCP Server: node dist/src/mcp/server.js
 *   - REST API:   node dist/api/src/index.js
 *   - CLI:        node dist/src/index.js <command>
 */

import { getMetricsRecorder, getPipeline } from './core/pipeline/index.js';
import { ConfigurationError, PipelineCancelledError } from './utils/errors.js';
import type { PipelineResult, RunOptions } from './types/index.js';

// Re-export for programmatic use
export * from './core/pipeline/index.js';
export { RelevanceFilter, FaithfulnessEvaluator } from './core/verification/index.js';
export { LLMAnswerGenerator, INSUFFICIENT_INFORMATION_ANSWER } from './core/generation/answer-generator.js';
export { MetricsRecorder, type AggregateMetrics, type QueryMetrics } from './core/metrics/recorder.js';
export { RetrievalService, getRetrievalService } from './core/retrieval/service.js';
export { LLMService, getGenerationLLM, getJudgeLLM } from './core/llm/service.js';
export * from './utils/errors.js';
export * from './types/index.js';

export interface AskCommand {
  question: string;
  options: Pick<RunOptions, 'maxAttempts' | 'minAcceptableScore' | 'filterEnabled' | 'topK' | 'timeoutMs'>;
}

const NUMERIC_FLAGS = {
  '--max-attempts': 'maxAttempts',
  '--min-score': 'minAcceptableScore',
  '--top-k': 'topK',
  '--timeout': 'timeoutMs',
} as const;

function isNumericFlag(arg: string): arg is keyof typeof NUMERIC_FLAGS {
  return Object.prototype.hasOwnProperty.call(NUMERIC_FLAGS, arg);
}

/**
 * Parse `ask` arguments: question words plus pipeline flags
 */
export function parseAskArgs(args: string[]): AskCommand {
  const words: string[] = [];
  const options: AskCommand['options'] = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--no-filter') {
      options.filterEnabled = false;
    } else if (arg === '--filter') {
      options.filterEnabled = true;
    } else if (isNumericFlag(arg)) {
      const raw = args[i + 1];
      const value = raw === undefined ? NaN : Number(raw);
      if (!Number.isInteger(value)) {
        throw new ConfigurationError(`${arg} expects an integer, got ${raw ?? 'nothing'}`);
      }
      options[NUMERIC_FLAGS[arg]] = value;
      i++;
    } else {
      words.push(arg);
    }
  }

  return { question: words.join(' '), options };
}

export function formatResult(result: PipelineResult): string {
  const lines = [
    'Answer:',
    result.answer,
    '',
    `Score: ${result.evaluation.score}/5 (${result.success ? 'accepted' : 'below threshold'})`,
    `Justification: ${result.evaluation.justification}`,
    `Attempts: ${result.attempts}`,
    `Documents: ${result.documentsUsed}/${result.documentsRetrieved} used`,
    `Latency: ${result.latencies.totalMs}ms`,
  ];

  if (result.sources.length > 0) {
    lines.push('', 'Sources:');
    for (const source of result.sources) {
      const page = source.page !== undefined ? `, page ${source.page}` : '';
      lines.push(`  ${source.source} (chunk ${source.chunkIndex}${page})`);
    }
  }

  return lines.join('\n');
}

/**
 * CLI interface
 */
async function cli(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'ask': {
      const { question, options } = parseAskArgs(args.slice(1));
      if (!question) {
        console.error('Usage: ask <question> [--max-attempts N] [--min-score N] [--top-k N] [--timeout MS] [--no-filter]');
        process.exit(1);
      }
      console.log(`Question: "${question}"\n`);
      const result = await getPipeline().run(question, options);
      console.log(formatResult(result));
      await getMetricsRecorder().flush();
      break;
    }

    case 'metrics': {
      const recorder = getMetricsRecorder();
      await recorder.load();
      console.log(JSON.stringify(recorder.getAggregate(), null, 2));
      break;
    }

    case 'help':
    default: {
      console.log(`
Self-correcting RAG CLI

Commands:
  ask <question>       Answer a question with retrieval, filtering and self-correction
    --max-attempts N   Generation attempts before giving up (default: 3)
    --min-score N      Minimum faithfulness score to accept, 1-5 (default: 3)
    --top-k N          Passages to retrieve (default: 5)
    --timeout MS       Abort the run after MS milliseconds
    --no-filter        Skip relevance filtering
  metrics              Show aggregate metrics from METRICS_FILE
  help                 Show this help message

MCP Server:
  node dist/src/mcp/server.js
      `);
      break;
    }
  }
}

// Run CLI if this is the main module
const entry = process.argv[1] ?? '';
const isMain = entry.endsWith('src/index.js') || entry.endsWith('src/index.ts') || entry.endsWith('self-correcting-rag');
if (isMain) {
  cli().catch((error: unknown) => {
    if (error instanceof ConfigurationError || error instanceof PipelineCancelledError) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error('Error:', error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
  });
}
