/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * Pipeline values here are defaults; per-run overrides go through
 * resolvePipelineOptions(), which validates the merged result.
 */

export interface Config {
  // LLM
  llmApiKey: string;
  llmBaseUrl: string;
  llmModel: string;
  llmRequestTimeoutMs: number;
  llmTemperature: number;
  llmMaxResponseTokens: number;

  // Chunking
  tokenBudget: number;
  chunkOverlap: number;

  // Retry & concurrency
  maxRetries: number;
  backoffBaseSeconds: number;
  retryTimeCeilingSeconds: number;
  concurrency: number;
  maxConsecutiveFailures: number;

  // Output
  dedupeCommentsAcrossKeys: boolean;

  // HTTP service
  port: number;
  maxUploadBytes: number;
}

/** Largest request the remote model accepts; budgets above it are rejected. */
export const TOKEN_BUDGET_CEILING = 7000;

export const config: Config = {
  // LLM
  llmApiKey: process.env.LLM_API_KEY || process.env.GROQ_API_KEY || '',
  llmBaseUrl: process.env.LLM_BASE_URL || 'https://api.groq.com/openai/v1',
  llmModel: process.env.LLM_MODEL || 'llama-3.3-70b-versatile',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  llmTemperature: parseFloat(process.env.LLM_TEMPERATURE || '0.1'),
  llmMaxResponseTokens: parseInt(process.env.LLM_MAX_RESPONSE_TOKENS || '3000', 10),

  // Chunking
  tokenBudget: parseInt(process.env.TOKEN_BUDGET || '3000', 10),
  chunkOverlap: parseInt(process.env.CHUNK_OVERLAP || '0', 10),

  // Retry & concurrency
  maxRetries: parseInt(process.env.MAX_RETRIES || '3', 10),
  backoffBaseSeconds: parseFloat(process.env.BACKOFF_BASE_SECONDS || '1'),
  retryTimeCeilingSeconds: parseFloat(process.env.RETRY_TIME_CEILING_SECONDS || '30'),
  concurrency: parseInt(process.env.CONCURRENCY || '1', 10),
  maxConsecutiveFailures: parseInt(process.env.MAX_CONSECUTIVE_FAILURES || '3', 10),

  // Output
  dedupeCommentsAcrossKeys: process.env.DEDUPE_COMMENTS_ACROSS_KEYS === 'true',

  // HTTP service
  port: parseInt(process.env.PORT || '8080', 10),
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(25 * 1024 * 1024), 10),
};
