/**
 * Pipeline Option Tests
 */

import { ConfigError, defaultPipelineOptions, resolvePipelineOptions } from '@formtable/shared';

function violationsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.violations;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('resolvePipelineOptions', () => {
  it('returns the environment defaults without overrides', () => {
    expect(resolvePipelineOptions()).toEqual(defaultPipelineOptions());
  });

  it('applies overrides and ignores undefined ones', () => {
    const options = resolvePipelineOptions({ tokenBudget: 1500, concurrency: undefined });

    expect(options.tokenBudget).toBe(1500);
    expect(options.concurrency).toBe(defaultPipelineOptions().concurrency);
  });

  it('lists every violated bound', () => {
    expect(violationsOf(() => resolvePipelineOptions({ tokenBudget: 9000, concurrency: 0 }))).toEqual([
      '/tokenBudget must be <= 7000',
      '/concurrency must be >= 1',
    ]);
  });

  it('rejects a fractional token budget', () => {
    expect(violationsOf(() => resolvePipelineOptions({ tokenBudget: 1000.5 }))).toEqual([
      '/tokenBudget must be integer',
    ]);
  });

  it('rejects an overlap as large as the budget', () => {
    expect(() => resolvePipelineOptions({ tokenBudget: 500, chunkOverlap: 500 })).toThrow(
      'chunkOverlap must be smaller than tokenBudget'
    );
  });
});
