/**
 * Prometheus Metrics
 *
 * Metrics for model calls, chunk outcomes and the HTTP surface.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

export const register = new promClient.Registry();

/**
 * Register default process metrics (CPU, memory, event loop).
 * Called by long-running services only.
 */
export function enableDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Model Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'formtable_llm_requests_total',
  help: 'Total number of model requests, one per attempt',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'formtable_llm_request_duration_seconds',
  help: 'Duration of model requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const llmRetriesCounter = new promClient.Counter({
  name: 'formtable_llm_retries_total',
  help: 'Total number of model request retries after transient failures',
  labelNames: ['model'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const chunksProcessedCounter = new promClient.Counter({
  name: 'formtable_chunks_processed_total',
  help: 'Chunks by outcome',
  labelNames: ['status'],
  registers: [register],
});

export const recordsExtractedCounter = new promClient.Counter({
  name: 'formtable_records_extracted_total',
  help: 'Records recovered from model responses before deduplication',
  registers: [register],
});

export const rowsProducedCounter = new promClient.Counter({
  name: 'formtable_rows_produced_total',
  help: 'Output rows after deduplication',
  registers: [register],
});

export const runDurationHistogram = new promClient.Histogram({
  name: 'formtable_run_duration_seconds',
  help: 'Duration of a full extraction run',
  labelNames: ['status'],
  buckets: [1, 5, 10, 30, 60, 120, 300],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'formtable_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 120],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'formtable_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}
