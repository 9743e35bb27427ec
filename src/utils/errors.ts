/**
 * Error taxonomy for the answer pipeline
 *
 * Capability failures are caught by the controller and folded into
 * score-0 attempts or empty results. Only ConfigurationError and
 * PipelineCancelledError reach the caller of `run`.
 */

export type PipelineErrorCode =
  | 'RETRIEVAL_UNAVAILABLE'
  | 'FILTER_JUDGMENT_FAILED'
  | 'GENERATION_FAILED'
  | 'EVALUATION_FAILED'
  | 'PARSE_FAILED'
  | 'INVALID_QUESTION'
  | 'CONFIGURATION_INVALID'
  | 'PIPELINE_CANCELLED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class RetrievalUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RETRIEVAL_UNAVAILABLE', message, options);
  }
}

export class FilterJudgmentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FILTER_JUDGMENT_FAILED', message, options);
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILED', message, options);
  }
}

export class EvaluationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EVALUATION_FAILED', message, options);
  }
}

/**
 * A capability returned a payload that does not match the expected shape
 */
export class ParseError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PARSE_FAILED', message, options);
  }
}

export class InvalidQuestionError extends PipelineError {
  constructor(message: string) {
    super('INVALID_QUESTION', message);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_INVALID', message, options);
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(message = 'Pipeline run was cancelled', options?: { cause?: unknown }) {
    super('PIPELINE_CANCELLED', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Throw PipelineCancelledError if the signal has been aborted
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(
      signal.reason instanceof Error ? `Pipeline run was cancelled: ${signal.reason.message}` : undefined,
      { cause: signal.reason }
    );
  }
}
