/**
 * Pipeline option resolution: environment defaults, per-run overrides,
 * then schema validation.
 */

import { config } from '../config';
import { ConfigError } from '../errors';
import { describePipelineOptionsErrors, isPipelineOptions, type PipelineOptions } from '../schemas';

export function defaultPipelineOptions(): PipelineOptions {
  return {
    tokenBudget: config.tokenBudget,
    chunkOverlap: config.chunkOverlap,
    maxRetries: config.maxRetries,
    backoffBaseSeconds: config.backoffBaseSeconds,
    retryTimeCeilingSeconds: config.retryTimeCeilingSeconds,
    concurrency: config.concurrency,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
    maxResponseTokens: config.llmMaxResponseTokens,
    dedupeCommentsAcrossKeys: config.dedupeCommentsAcrossKeys,
  };
}

/**
 * Merge overrides onto the defaults and validate.
 *
 * @throws ConfigError listing every violation
 */
export function resolvePipelineOptions(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const merged: unknown = { ...defaultPipelineOptions(), ...defined };

  if (!isPipelineOptions(merged)) {
    const violations = describePipelineOptionsErrors();
    throw new ConfigError(`Invalid pipeline options: ${violations.join('; ')}`, violations);
  }

  if (merged.chunkOverlap >= merged.tokenBudget) {
    throw new ConfigError('chunkOverlap must be smaller than tokenBudget', [
      `/chunkOverlap must be < ${merged.tokenBudget}`,
    ]);
  }

  return merged;
}
