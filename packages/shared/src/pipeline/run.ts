/**
 * Extraction Run
 *
 * Plans chunks, sends them to the model through a pool of workers and folds
 * the parsed records into one table. Workers may finish out of order; their
 * results are buffered and applied to the Deduplicator strictly by chunk
 * index, so the output never depends on timing.
 *
 * Failure handling:
 * - a chunk whose model call fails is recorded in the summary and the run
 *   moves on, until maxConsecutiveFailures chunks in a row have failed
 *   (counted over settled chunks, applied or still buffered); then nothing
 *   new is dispatched and the rows gathered so far are returned
 * - AuthError aborts every in-flight request and rejects the run
 * - an external AbortSignal rejects the run with RunCancelledError
 */

import { ulid } from 'ulid';
import type {
  ChunkFailure,
  Document,
  ExtractionRun,
  ParseWarning,
  RunSummary,
  TextChunk,
} from '../types';
import { AuthError, ExtractionFailedError, RunCancelledError } from '../errors';
import { logger } from '../logger';
import { getContext, runWithContextAsync } from '../context';
import { chunksProcessedCounter, recordsExtractedCounter, rowsProducedCounter, runDurationHistogram } from '../metrics';
import type { PipelineOptions } from '../schemas';
import type { ExtractionTemplate } from '../templates/types';
import { RECORD_EXTRACTION_TEMPLATE } from '../templates';
import { resolvePipelineOptions } from './options';
import { defaultTokenEstimator, type TokenEstimator } from './token-estimator';
import { planChunks, toOverflowReport } from './chunk-planner';
import { buildExtractionRequest } from './prompt-builder';
import { ExtractionClient, type Sleep } from './extraction-client';
import type { ModelTransport } from './openai-transport';
import { parseModelResponse, type ParseResult } from './response-parser';
import { Deduplicator } from './deduplicator';
import { sequenceRecords } from './record-sequencer';

export interface RunDependencies {
  transport: ModelTransport;
  /** Overrides merged onto the environment defaults */
  options?: Partial<PipelineOptions>;
  estimator?: TokenEstimator;
  template?: ExtractionTemplate;
  /** Cancels the whole run */
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => number;
}

type ChunkOutcome =
  | { kind: 'parsed'; chunkIndex: number; result: ParseResult }
  | { kind: 'failed'; chunkIndex: number; error: ExtractionFailedError };

function isRejected(result: PromiseSettledResult<void>): result is PromiseRejectedResult {
  return result.status === 'rejected';
}

export async function runExtraction(document: Document, deps: RunDependencies): Promise<ExtractionRun> {
  const runId = getContext()?.correlationId ?? ulid();
  return runWithContextAsync({ correlationId: runId, documentId: document.id }, () =>
    executeRun(runId, document, deps)
  );
}

async function executeRun(runId: string, document: Document, deps: RunDependencies): Promise<ExtractionRun> {
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const template = deps.template ?? RECORD_EXTRACTION_TEMPLATE;

  const options = resolvePipelineOptions(deps.options);
  const estimator = deps.estimator ?? defaultTokenEstimator();
  const plan = await planChunks(document.text, {
    tokenBudget: options.tokenBudget,
    chunkOverlap: options.chunkOverlap,
    estimator,
  });
  const chunks = plan.chunks;

  logger.info('Extraction run started', {
    run_id: runId,
    prompt_version: template.version,
    model: deps.transport.model,
    text_length: document.text.length,
    chunk_count: chunks.length,
    overflow_count: plan.overflows.length,
    token_budget: options.tokenBudget,
    concurrency: options.concurrency,
  });

  const client = new ExtractionClient(deps.transport, {
    maxAttempts: options.maxRetries,
    backoffBaseMs: options.backoffBaseSeconds * 1000,
    retryTimeCeilingMs: options.retryTimeCeilingSeconds * 1000,
    maxResponseTokens: options.maxResponseTokens,
    sleep: deps.sleep,
    now: deps.now,
  });

  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  if (deps.signal?.aborted) {
    controller.abort();
  } else {
    deps.signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const deduplicator = new Deduplicator();
  const settled = new Map<number, ChunkOutcome>();
  const failedChunks: ChunkFailure[] = [];
  const parseWarnings: ParseWarning[] = [];
  let nextToDispatch = 0;
  let nextToApply = 0;
  let processedChunks = 0;
  let extractedRecordCount = 0;
  let consecutiveFailures = 0;
  let stopped = false;
  let abortReason: string | undefined;

  // Single writer: only this function touches the Deduplicator
  const applyInOrder = () => {
    for (let outcome = settled.get(nextToApply); outcome; outcome = settled.get(nextToApply)) {
      settled.delete(nextToApply);
      nextToApply++;

      if (outcome.kind === 'parsed') {
        processedChunks++;
        consecutiveFailures = 0;
        parseWarnings.push(...outcome.result.warnings);
        extractedRecordCount += outcome.result.records.length;
        recordsExtractedCounter.inc(outcome.result.records.length);
        deduplicator.addAll(outcome.result.records);
        chunksProcessedCounter.inc({ status: 'success' });
        continue;
      }

      failedChunks.push({
        chunkIndex: outcome.chunkIndex,
        attempts: outcome.error.attempts,
        error: outcome.error.message,
      });
      consecutiveFailures++;
      chunksProcessedCounter.inc({ status: 'failed' });

      if (consecutiveFailures >= options.maxConsecutiveFailures) {
        stopDispatch(consecutiveFailures, outcome);
      }
    }
  };

  const stopDispatch = (failures: number, outcome: Extract<ChunkOutcome, { kind: 'failed' }>) => {
    if (stopped) return;
    stopped = true;
    abortReason = `${failures} consecutive chunk failures`;
    logger.error('Too many consecutive chunk failures, stopping dispatch', outcome.error, {
      consecutive_failures: failures,
      last_chunk_index: outcome.chunkIndex,
    });
  };

  // Failures buffered behind a slow earlier chunk still count as consecutive
  const checkBufferedFailures = () => {
    let run = 0;
    for (let index = nextToApply; index < nextToDispatch; index++) {
      const outcome = settled.get(index);
      if (outcome?.kind !== 'failed') {
        run = 0;
        continue;
      }
      run++;
      if (run >= options.maxConsecutiveFailures) {
        stopDispatch(run, outcome);
        return;
      }
    }
  };

  const processChunk = async (chunk: TextChunk): Promise<ChunkOutcome> => {
    const request = buildExtractionRequest(chunk, { template, chunkCount: chunks.length });
    try {
      const response = await client.extract(request, controller.signal);
      return { kind: 'parsed', chunkIndex: chunk.index, result: parseModelResponse(response) };
    } catch (error) {
      if (error instanceof ExtractionFailedError) {
        return { kind: 'failed', chunkIndex: chunk.index, error };
      }
      if (error instanceof AuthError) {
        controller.abort();
      }
      throw error;
    }
  };

  const worker = async (): Promise<void> => {
    while (!stopped && !controller.signal.aborted && nextToDispatch < chunks.length) {
      const chunk = chunks[nextToDispatch++];
      const outcome = await processChunk(chunk);
      settled.set(chunk.index, outcome);
      applyInOrder();
      checkBufferedFailures();
    }
  };

  try {
    const workerCount = Math.min(options.concurrency, chunks.length);
    const results = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    const errors = results.filter(isRejected).map((r): unknown => r.reason);

    if (errors.length > 0) {
      throw errors.find((e) => e instanceof AuthError) ?? errors[0];
    }
    if (controller.signal.aborted) {
      throw new RunCancelledError();
    }

    const rows = sequenceRecords(deduplicator.records(), {
      dedupeCommentsAcrossKeys: options.dedupeCommentsAcrossKeys,
    });
    const skippedChunks = chunks.slice(nextToDispatch).map((chunk) => chunk.index);

    const summary: RunSummary = {
      runId,
      documentId: document.id,
      promptVersion: template.version,
      totalChunks: chunks.length,
      processedChunks,
      failedChunks,
      skippedChunks,
      overflows: plan.overflows.map(toOverflowReport),
      parseWarnings,
      extractedRecordCount,
      canonicalRecordCount: deduplicator.size,
      conflictCount: deduplicator.conflictCount,
      rowCount: rows.length,
      aborted: stopped,
      ...(abortReason !== undefined ? { abortReason } : {}),
      durationMs: now() - startedAt,
    };

    rowsProducedCounter.inc(rows.length);
    runDurationHistogram.observe({ status: stopped ? 'aborted' : 'success' }, summary.durationMs / 1000);
    logger.info('Extraction run complete', {
      run_id: runId,
      prompt_version: template.version,
      total_chunks: summary.totalChunks,
      processed_chunks: summary.processedChunks,
      failed_chunks: failedChunks.length,
      skipped_chunks: skippedChunks.length,
      parse_warnings: parseWarnings.length,
      extracted_records: extractedRecordCount,
      rows: rows.length,
      conflicts: summary.conflictCount,
      aborted: stopped,
      duration_ms: summary.durationMs,
    });

    return { rows, summary };
  } catch (error) {
    runDurationHistogram.observe({ status: 'error' }, (now() - startedAt) / 1000);
    logger.error('Extraction run failed', error, { run_id: runId });
    throw error;
  } finally {
    deps.signal?.removeEventListener('abort', forwardAbort);
  }
}
