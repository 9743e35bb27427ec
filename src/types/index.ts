/**
 * Core type definitions for the self-correcting RAG pipeline
 */

// Passage types
export interface PassageMetadata {
  /** Source identifier, usually the originating file name */
  source: string;
  chunkIndex: number;
  page?: number;
  [key: string]: unknown;
}

export interface Passage {
  id: string;
  content: string;
  metadata: PassageMetadata;
  /** Similarity score from the retriever, if it provides one */
  score?: number;
}

export interface RelevantPassage {
  passage: Passage;
  /** Why the judge considered the passage relevant */
  justification?: string;
}

export interface FilteredContext {
  /** Relevant passages, in retrieval order */
  passages: RelevantPassage[];
  /** Number of passages sent to the judge */
  judged: number;
  /** Number of passages judged not relevant */
  rejected: number;
  /** Number of judgments that failed and were excluded */
  failures: number;
}

// Answer & evaluation types
export interface CandidateAnswer {
  text: string;
  attempt: number;
  context: readonly Passage[];
}

export interface Evaluation {
  /** 1-5 from the evaluator, 0 for a failed attempt */
  score: number;
  justification: string;
  supported: boolean;
  unsupportedClaims: string[];
}

export type AttemptFailure = 'generation' | 'evaluation';

export interface AttemptRecord {
  attempt: number;
  answer: string;
  evaluation: Evaluation;
  failure?: AttemptFailure;
}

// Pipeline result types
export type PipelineOutcome = 'accepted' | 'exhausted' | 'no_context' | 'invalid_question';

export interface StageLatencies {
  retrievalMs: number;
  filterMs: number;
  generationMs: number;
  evaluationMs: number;
  totalMs: number;
}

export interface FailureCounts {
  filterJudgments: number;
  generation: number;
  evaluation: number;
}

export interface SourceReference {
  passageId: string;
  source: string;
  chunkIndex: number;
  page?: number;
}

export interface PipelineResult {
  queryId: string;
  question: string;
  answer: string;
  evaluation: Evaluation;
  attempts: number;
  documentsRetrieved: number;
  documentsUsed: number;
  latencies: StageLatencies;
  /** Whether the accepted answer met the minimum score */
  success: boolean;
  outcome: PipelineOutcome;
  failures: FailureCounts;
  /** Passages the answer was generated from */
  sources: SourceReference[];
  history: AttemptRecord[];
  error?: string;
}

export interface PipelineSettings {
  maxAttempts: number;
  minAcceptableScore: number;
  filterEnabled: boolean;
  topK: number;
}

export interface RunOptions extends Partial<PipelineSettings> {
  signal?: AbortSignal;
  /** Abort the whole run after this many milliseconds */
  timeoutMs?: number;
  queryId?: string;
}

// Capability types
export interface Retriever {
  /** Top-k passages for the question; empty when nothing matches */
  retrieve(question: string, k: number, signal?: AbortSignal): Promise<Passage[]>;
}

export interface PromptPayload {
  systemPrompt: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface JudgingCapability {
  /** Returns the judge's structured (JSON) response, unvalidated */
  judge(payload: PromptPayload): Promise<unknown>;
}

export interface GenerationCapability {
  complete(payload: PromptPayload): Promise<string>;
}

// Outer surface types
export interface ToolResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Config types
export interface Config {
  litellm: {
    apiKey: string;
    baseUrl: string;
    embeddingModel: string;
    timeout: number;
  };
  qdrant: {
    url: string;
    collectionName: string;
  };
  search: {
    topK: number;
    threshold: number;
  };
  models: {
    generation: ModelConfig;
    judge: ModelConfig;
  };
  pipeline: {
    maxAttempts: number;
    minAcceptableScore: number;
    filterEnabled: boolean;
    maxParallelJudgments: number;
    maxContextLength: number;
  };
  security: {
    maxQuestionLength: number;
  };
  metrics: {
    enabled: boolean;
    file?: string;
  };
}

export interface ModelConfig {
  model: string;
  temperature: number;
  maxTokens: number;
}
