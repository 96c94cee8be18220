/**
 * Token estimation for chunk sizing.
 *
 * cl100k_base is not the tokenizer of every hosted model, so counts are an
 * estimate; the chunk budget keeps headroom below the model's real limit.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';

export interface TokenEstimator {
  readonly name: string;
  estimate(text: string): number;
}

/**
 * js-tiktoken estimator. The encoding is loaded on first use.
 */
export class TiktokenEstimator implements TokenEstimator {
  readonly name = 'cl100k_base';
  private encoding: Tiktoken | null = null;

  estimate(text: string): number {
    if (!text) return 0;
    if (!this.encoding) {
      this.encoding = getEncoding('cl100k_base');
    }
    return this.encoding.encode(text, 'all').length;
  }
}

/**
 * Characters-per-token heuristic (default 4 chars per token).
 */
export class CharTokenEstimator implements TokenEstimator {
  readonly name: string;

  constructor(private readonly charsPerToken: number = 4) {
    this.name = `chars/${charsPerToken}`;
  }

  estimate(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }
}

let sharedEstimator: TokenEstimator | null = null;

export function defaultTokenEstimator(): TokenEstimator {
  if (!sharedEstimator) {
    sharedEstimator = new TiktokenEstimator();
  }
  return sharedEstimator;
}
