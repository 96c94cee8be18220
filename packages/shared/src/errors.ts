/**
 * Pipeline Error Classes
 *
 * Only AuthError and ConfigError end a run. ExtractionFailedError and
 * ChunkOverflowError are collected into the run summary; parse problems and
 * dedup conflicts are data, not exceptions.
 */

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'PipelineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends PipelineError {
  constructor(
    message: string,
    public readonly violations: string[] = [],
  ) {
    super(message, 'CONFIG_INVALID', false);
    this.name = 'ConfigError';
  }
}

/**
 * A single semantic unit (e.g. one table row) that does not fit the token
 * budget on its own. The unit is left out of every chunk.
 */
export class ChunkOverflowError extends PipelineError {
  constructor(
    public readonly lineNumber: number,
    public readonly estimatedTokens: number,
    public readonly tokenBudget: number,
    public readonly preview: string,
  ) {
    super(
      `Line ${lineNumber} needs ~${estimatedTokens} tokens, over the budget of ${tokenBudget}`,
      'CHUNK_OVERFLOW',
      false,
    );
    this.name = 'ChunkOverflowError';
  }
}

/**
 * Credential rejected or missing. Never retried; aborts the whole run.
 */
export class AuthError extends PipelineError {
  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message, 'MODEL_AUTH_FAILED', false);
    this.name = 'AuthError';
  }
}

/**
 * Retries exhausted (or a non-retryable failure) for one chunk's model call.
 */
export class ExtractionFailedError extends PipelineError {
  constructor(
    public readonly chunkIndex: number,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      `Extraction failed for chunk ${chunkIndex} after ${attempts} attempt(s): ${errorMessage(lastError)}`,
      'EXTRACTION_FAILED',
      false,
    );
    this.name = 'ExtractionFailedError';
  }
}

export class RunCancelledError extends PipelineError {
  constructor(message: string = 'Extraction run was cancelled') {
    super(message, 'RUN_CANCELLED', false);
    this.name = 'RunCancelledError';
  }
}

export class PdfTextError extends PipelineError {
  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message, 'PDF_TEXT_UNAVAILABLE', false);
    this.name = 'PdfTextError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
