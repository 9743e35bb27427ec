/**
 * Metrics recorder - append-only per-query metrics with on-demand aggregates
 *
 * Recording never throws into the pipeline: failures are logged and dropped.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import type { PipelineOutcome, PipelineResult, StageLatencies } from '../../types/index.js';

const log = createLogger('metrics');

const latenciesSchema = z.object({
  retrievalMs: z.number(),
  filterMs: z.number(),
  generationMs: z.number(),
  evaluationMs: z.number(),
  totalMs: z.number(),
});

const queryMetricsSchema = z.object({
  queryId: z.string(),
  timestamp: z.string(),
  question: z.string(),
  outcome: z.enum(['accepted', 'exhausted', 'no_context', 'invalid_question']),
  success: z.boolean(),
  finalScore: z.number(),
  attempts: z.number(),
  documentsRetrieved: z.number(),
  documentsUsed: z.number(),
  filterRejectionRate: z.number(),
  latencies: latenciesSchema,
});

const metricsFileSchema = z.object({
  lastUpdated: z.string(),
  queries: z.array(queryMetricsSchema),
});

export interface QueryMetrics {
  queryId: string;
  timestamp: string;
  question: string;
  outcome: PipelineOutcome;
  success: boolean;
  finalScore: number;
  attempts: number;
  documentsRetrieved: number;
  documentsUsed: number;
  /** Share of retrieved passages the filter dropped (0-1) */
  filterRejectionRate: number;
  latencies: StageLatencies;
}

export interface AggregateMetrics {
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  /** 0-1 */
  successRate: number;
  avgLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  avgScore: number;
  scoreDistribution: Record<number, number>;
  avgAttempts: number;
  avgFilterRejectionRate: number;
}

export interface MetricsRecorderOptions {
  enabled?: boolean;
  /**
   * JSON file holding the query history. Records saved there by earlier
   * processes are merged in before the first write, so appends accumulate.
   */
  file?: string;
}

export class MetricsRecorder {
  private records: QueryMetrics[] = [];
  private enabled: boolean;
  private file?: string;
  /** True once the saved history is in memory (or deliberately discarded) */
  private loaded = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: MetricsRecorderOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.file = options.file;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Append the metrics of a finished query
   */
  record(result: PipelineResult, latencies: StageLatencies = result.latencies): void {
    if (!this.enabled) return;

    try {
      const entry: QueryMetrics = {
        queryId: result.queryId,
        timestamp: new Date().toISOString(),
        question: result.question,
        outcome: result.outcome,
        success: result.success,
        finalScore: result.evaluation.score,
        attempts: result.attempts,
        documentsRetrieved: result.documentsRetrieved,
        documentsUsed: result.documentsUsed,
        filterRejectionRate: result.documentsRetrieved > 0
          ? 1 - result.documentsUsed / result.documentsRetrieved
          : 0,
        latencies: { ...latencies },
      };

      // Synchronous push: appends from concurrent queries cannot interleave
      this.records.push(entry);
      log.debug({ queryId: entry.queryId }, 'Recorded query metrics');

      if (this.file) {
        this.schedulePersist(this.file);
      }
    } catch (error) {
      log.error({ err: error }, 'Failed to record query metrics');
    }
  }

  /**
   * Snapshot of the recorded queries
   */
  getRecords(): QueryMetrics[] {
    return this.records.map((entry) => ({ ...entry, latencies: { ...entry.latencies } }));
  }

  /**
   * Aggregate metrics over all recorded queries, computed on each call
   */
  getAggregate(): AggregateMetrics {
    const records = this.records;
    const total = records.length;

    if (total === 0) {
      return {
        totalQueries: 0,
        successfulQueries: 0,
        failedQueries: 0,
        successRate: 0,
        avgLatencyMs: 0,
        minLatencyMs: 0,
        maxLatencyMs: 0,
        avgScore: 0,
        scoreDistribution: {},
        avgAttempts: 0,
        avgFilterRejectionRate: 0,
      };
    }

    const successful = records.filter((entry) => entry.success).length;
    const latencies = records.map((entry) => entry.latencies.totalMs);
    const scoreDistribution: Record<number, number> = {};
    for (const entry of records) {
      scoreDistribution[entry.finalScore] = (scoreDistribution[entry.finalScore] ?? 0) + 1;
    }

    // Queries that never reached the filter do not count toward rejection
    const filtered = records.filter((entry) => entry.documentsRetrieved > 0);

    return {
      totalQueries: total,
      successfulQueries: successful,
      failedQueries: total - successful,
      successRate: successful / total,
      avgLatencyMs: average(latencies),
      minLatencyMs: Math.min(...latencies),
      maxLatencyMs: Math.max(...latencies),
      avgScore: average(records.map((entry) => entry.finalScore)),
      scoreDistribution,
      avgAttempts: average(records.map((entry) => entry.attempts)),
      avgFilterRejectionRate: average(filtered.map((entry) => entry.filterRejectionRate)),
    };
  }

  /**
   * Clear all recorded metrics, including the saved history
   */
  reset(): void {
    this.records = [];
    this.loaded = true;
    log.info('Metrics cleared');

    if (this.file) {
      this.schedulePersist(this.file);
    }
  }

  /**
   * Replace the records with those saved in the metrics file.
   * A missing file loads nothing; a malformed one is rejected.
   */
  async load(): Promise<number> {
    if (!this.file) return 0;

    const saved = await readSavedQueries(this.file);
    this.records = saved;
    this.loaded = true;
    log.debug({ file: this.file, count: saved.length }, 'Loaded query metrics');
    return saved.length;
  }

  /**
   * Wait for pending file writes
   */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private schedulePersist(file: string): void {
    this.writeChain = this.writeChain
      .then(async () => {
        // A file that cannot be read is left untouched until it can
        if (!this.loaded) {
          const saved = await readSavedQueries(file);
          this.records = [...saved, ...this.records];
          this.loaded = true;
        }

        const snapshot = JSON.stringify({
          lastUpdated: new Date().toISOString(),
          queries: this.records,
        }, null, 2);
        await mkdir(dirname(file), { recursive: true });
        await writeFile(file, snapshot, 'utf-8');
      })
      .catch((error: unknown) => {
        log.error({ err: error, file }, 'Failed to persist metrics');
      });
  }
}

/**
 * Queries saved in a metrics file; a missing file holds none
 */
async function readSavedQueries(file: string): Promise<QueryMetrics[]> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
  return metricsFileSchema.parse(JSON.parse(raw)).queries;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
