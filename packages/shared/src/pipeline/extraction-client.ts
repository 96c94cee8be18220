/**
 * Extraction Client
 *
 * Sends one ExtractionRequest through a ModelTransport with a local retry
 * policy. Transient failures (rate limits, 5xx, timeouts, dropped
 * connections) are retried with exponential backoff until the attempt limit
 * or the time ceiling is reached. Rejected credentials fail fast.
 */

import OpenAI from 'openai';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ExtractionRequest, RawModelResponse } from '../types';
import { AuthError, ExtractionFailedError, RunCancelledError, errorMessage } from '../errors';
import { logger } from '../logger';
import { getCorrelationId } from '../context';
import { llmRequestsCounter, llmRequestDurationHistogram, llmRetriesCounter } from '../metrics';
import type { ModelTransport } from './openai-transport';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ExtractionClientOptions {
  /** Total attempts per request, first call included */
  maxAttempts: number;
  backoffBaseMs: number;
  /** Elapsed time plus the next delay may not exceed this */
  retryTimeCeilingMs: number;
  maxResponseTokens: number;
  sleep?: Sleep;
  now?: () => number;
}

export type FailureKind = 'auth' | 'transient' | 'permanent' | 'cancelled';

const TRANSIENT_STATUSES = new Set([408, 409, 429]);
const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE']);

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function networkCodeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return networkCodeOf(error.cause);
  return undefined;
}

export function classifyError(error: unknown, signal?: AbortSignal): FailureKind {
  if (signal?.aborted || error instanceof RunCancelledError || error instanceof OpenAI.APIUserAbortError) {
    return 'cancelled';
  }
  if (error instanceof AuthError) return 'auth';

  const status = statusOf(error);
  if (status === 401 || status === 403) return 'auth';
  if (status !== undefined && (TRANSIENT_STATUSES.has(status) || status >= 500)) return 'transient';

  if (error instanceof OpenAI.APIConnectionError) return 'transient';

  const code = networkCodeOf(error);
  if (code && TRANSIENT_NETWORK_CODES.has(code)) return 'transient';

  return 'permanent';
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Debug: write prompt and response to disk for inspection
 */
function debugWriteExchange(chunkIndex: number, prompt: string, response: string): void {
  if (!process.env.DEBUG_LLM_PROMPTS) return;

  const debugDir = process.env.DEBUG_LLM_PROMPTS_DIR || '/tmp/llm-debug';

  try {
    if (!fs.existsSync(debugDir)) {
      fs.mkdirSync(debugDir, { recursive: true });
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const baseFilename = `${timestamp}_${getCorrelationId()}_chunk-${chunkIndex}`;

    fs.writeFileSync(path.join(debugDir, `${baseFilename}_prompt.txt`), prompt);
    fs.writeFileSync(path.join(debugDir, `${baseFilename}_response.txt`), response);

    logger.info('Debug: wrote LLM exchange to disk', {
      debug_dir: debugDir,
      chunk_index: chunkIndex,
      files: [`${baseFilename}_prompt.txt`, `${baseFilename}_response.txt`],
    });
  } catch (err) {
    logger.warn('Debug: failed to write LLM exchange', { error: String(err) });
  }
}

export class ExtractionClient {
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly transport: ModelTransport,
    private readonly options: ExtractionClientOptions
  ) {
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? Date.now;
  }

  get model(): string {
    return this.transport.model;
  }

  async extract(request: ExtractionRequest, signal?: AbortSignal): Promise<RawModelResponse> {
    const chunkIndex = request.chunk.index;
    const { maxAttempts, backoffBaseMs, retryTimeCeilingMs, maxResponseTokens } = this.options;
    const model = this.transport.model;
    const startedAt = this.now();
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) throw new RunCancelledError();

      logger.debug('Model request attempt', { chunk_index: chunkIndex, attempt, model });
      const attemptStart = this.now();

      try {
        const text = await this.transport.complete({
          prompt: request.promptText,
          maxTokens: maxResponseTokens,
          signal,
        });

        llmRequestsCounter.inc({ model, status: 'success' });
        llmRequestDurationHistogram.observe({ model }, (this.now() - attemptStart) / 1000);
        logger.info('Model request complete', {
          chunk_index: chunkIndex,
          attempt,
          model,
          duration_ms: this.now() - attemptStart,
          response_length: text.length,
        });
        debugWriteExchange(chunkIndex, request.promptText, text);

        return { chunkIndex, text, receivedAt: new Date(this.now()) };
      } catch (error) {
        llmRequestsCounter.inc({ model, status: 'error' });
        llmRequestDurationHistogram.observe({ model }, (this.now() - attemptStart) / 1000);

        const kind = classifyError(error, signal);
        if (kind === 'cancelled') {
          throw error instanceof RunCancelledError ? error : new RunCancelledError();
        }
        if (kind === 'auth') {
          logger.error('Model rejected credentials', error, { chunk_index: chunkIndex, attempt, model });
          throw error instanceof AuthError
            ? error
            : new AuthError(`Model rejected credentials: ${errorMessage(error)}`, error);
        }

        lastError = error;
        if (kind === 'permanent') {
          logger.error('Model request failed permanently', error, { chunk_index: chunkIndex, attempt, model });
          throw new ExtractionFailedError(chunkIndex, attempt, error);
        }
        if (attempt === maxAttempts) break;

        const delayMs = backoffBaseMs * 2 ** (attempt - 1);
        const elapsedMs = this.now() - startedAt;
        if (elapsedMs + delayMs > retryTimeCeilingMs) {
          logger.warn('Retry time ceiling reached, giving up', {
            chunk_index: chunkIndex,
            attempt,
            elapsed_ms: elapsedMs,
            next_delay_ms: delayMs,
            ceiling_ms: retryTimeCeilingMs,
          });
          throw new ExtractionFailedError(chunkIndex, attempt, error);
        }

        llmRetriesCounter.inc({ model });
        logger.warn('Transient model failure, retrying', {
          chunk_index: chunkIndex,
          attempt,
          next_attempt: attempt + 1,
          delay_ms: delayMs,
          error: errorMessage(error),
        });
        await this.sleep(delayMs, signal);
      }
    }

    logger.error('Model request retries exhausted', lastError, { chunk_index: chunkIndex, attempts: maxAttempts, model });
    throw new ExtractionFailedError(chunkIndex, maxAttempts, lastError);
  }
}
