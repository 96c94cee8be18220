/**
 * Chunk Planner
 *
 * Splits document text into ordered chunks under a token budget. Paragraphs
 * (blank-line separated) are kept whole when they fit; oversized paragraphs
 * are packed line by line so a `Key: value` line or table row is never cut
 * across chunks. A line that alone exceeds the budget is split at a sentence
 * or word boundary by RecursiveCharacterTextSplitter when it is prose, and
 * reported as a ChunkOverflowError when it is a structured row.
 */

import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import type { TextChunk, ChunkOverflowReport } from '../types';
import { ChunkOverflowError, ConfigError } from '../errors';
import { TOKEN_BUDGET_CEILING } from '../config';
import { logger } from '../logger';
import type { TokenEstimator } from './token-estimator';

export interface ChunkPlannerOptions {
  tokenBudget: number;
  /** Tokens of trailing lines from the previous chunk to repeat; 0 = disjoint */
  chunkOverlap?: number;
  estimator: TokenEstimator;
}

export interface ChunkPlan {
  chunks: TextChunk[];
  overflows: ChunkOverflowError[];
}

interface TextUnit {
  text: string;
  /** First line of a paragraph; joined with a blank line instead of a newline */
  paragraphStart: boolean;
  lineNumber: number;
  tokens: number;
  /** Tokens when appended after another unit, separator included */
  joinedTokens: number;
}

/** Sentence ends first, then clause breaks, words and finally characters */
const PROSE_SEPARATORS = ['. ', '? ', '! ', '; ', ', ', ' ', ''];

function separator(unit: TextUnit): string {
  return unit.paragraphStart ? '\n\n' : '\n';
}

function render(units: TextUnit[]): string {
  return units.map((u, i) => (i === 0 ? u.text : separator(u) + u.text)).join('');
}

/**
 * Table rows and column-aligned lines: tab separated, pipe separated, or
 * at least two runs of 2+ spaces between cells.
 */
export function isStructuredRow(line: string): boolean {
  if (line.includes('\t')) return true;
  if (line.split('|').length >= 3) return true;
  return (line.trim().match(/ {2,}/g) ?? []).length >= 2;
}

/**
 * The splitter keeps each separator at the start of the following piece;
 * move leading punctuation back onto the piece it ends.
 */
function reattachPunctuation(pieces: string[], budget: number, estimator: TokenEstimator): string[] {
  const result: string[] = [];
  for (const piece of pieces) {
    const lead = piece.match(/^[.?!;,]+/)?.[0];
    const previous = result[result.length - 1];
    if (lead && previous !== undefined && estimator.estimate(previous + lead) <= budget) {
      result[result.length - 1] = previous + lead;
      const rest = piece.slice(lead.length).trimStart();
      if (rest) result.push(rest);
      continue;
    }
    result.push(piece);
  }
  return result;
}

export async function splitOversizedLine(line: string, budget: number, estimator: TokenEstimator): Promise<string[]> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: budget,
    chunkOverlap: 0,
    keepSeparator: true,
    separators: PROSE_SEPARATORS,
    lengthFunction: (text: string) => estimator.estimate(text),
  });
  const pieces = reattachPunctuation(await splitter.splitText(line.trim()), budget, estimator);

  // Per-piece estimates are summed while merging; re-split what came out long
  const fitted: string[] = [];
  for (const piece of pieces) {
    if (budget <= 1 || estimator.estimate(piece) <= budget) {
      fitted.push(piece);
    } else {
      fitted.push(...(await splitOversizedLine(piece, budget - 1, estimator)));
    }
  }
  return fitted;
}

export async function planChunks(text: string, options: ChunkPlannerOptions): Promise<ChunkPlan> {
  const { tokenBudget, estimator } = options;
  const chunkOverlap = options.chunkOverlap ?? 0;

  if (!Number.isInteger(tokenBudget) || tokenBudget < 1 || tokenBudget > TOKEN_BUDGET_CEILING) {
    throw new ConfigError(`tokenBudget must be an integer between 1 and ${TOKEN_BUDGET_CEILING}`);
  }
  if (chunkOverlap < 0 || chunkOverlap >= tokenBudget) {
    throw new ConfigError('chunkOverlap must be between 0 and tokenBudget - 1');
  }

  const overflows: ChunkOverflowError[] = [];
  const paragraphs = await toParagraphs(text, tokenBudget, estimator, overflows);

  const packed: TextUnit[][] = [];
  let current: TextUnit[] = [];
  let currentTokens = 0;

  const costOf = (unit: TextUnit, isFirst: boolean) => (isFirst ? unit.tokens : unit.joinedTokens);

  const startChunk = () => {
    const previous = current;
    if (previous.length > 0) packed.push(previous);
    current = [];
    currentTokens = 0;

    if (chunkOverlap > 0 && previous.length > 0) {
      const carried: TextUnit[] = [];
      let carriedTokens = 0;
      for (let i = previous.length - 1; i >= 0; i--) {
        const unit = previous[i];
        const cost = unit.joinedTokens;
        if (carriedTokens + cost > chunkOverlap) break;
        carried.unshift(unit);
        carriedTokens += cost;
      }
      current = carried;
      currentTokens = carried.reduce((sum, u, i) => sum + costOf(u, i === 0), 0);
    }
  };

  const append = (unit: TextUnit) => {
    currentTokens += costOf(unit, current.length === 0);
    current.push(unit);
  };

  const fits = (cost: (isFirst: boolean) => number): boolean =>
    currentTokens + cost(current.length === 0) <= tokenBudget;

  const ensureRoom = (cost: (isFirst: boolean) => number) => {
    if (fits(cost)) return;
    startChunk();
    // Overlap is only carried when the next unit still fits after it
    if (!fits(cost)) {
      current = [];
      currentTokens = 0;
    }
  };

  for (const paragraph of paragraphs) {
    const paragraphCost = (isFirst: boolean) =>
      paragraph.reduce((sum, u, i) => sum + costOf(u, isFirst && i === 0), 0);

    if (paragraphCost(true) <= tokenBudget) {
      ensureRoom(paragraphCost);
      paragraph.forEach(append);
      continue;
    }

    for (const unit of paragraph) {
      ensureRoom((isFirst) => costOf(unit, isFirst));
      append(unit);
    }
  }
  if (current.length > 0) packed.push(current);

  const chunks: TextChunk[] = [];
  for (const units of packed.flatMap((group) => fitToBudget(group, tokenBudget, estimator))) {
    const chunkText = render(units);
    chunks.push({
      index: chunks.length,
      text: chunkText,
      estimatedTokens: estimator.estimate(chunkText),
    });
  }

  logger.debug('Chunk plan ready', {
    token_budget: tokenBudget,
    chunk_overlap: chunkOverlap,
    estimator: estimator.name,
    chunk_count: chunks.length,
    overflow_count: overflows.length,
  });

  return { chunks, overflows };
}

async function toParagraphs(
  text: string,
  tokenBudget: number,
  estimator: TokenEstimator,
  overflows: ChunkOverflowError[]
): Promise<TextUnit[][]> {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const paragraphs: TextUnit[][] = [];
  let paragraph: TextUnit[] = [];

  const makeUnit = (unitText: string, paragraphStart: boolean, lineNumber: number): TextUnit => {
    const unit = { text: unitText, paragraphStart, lineNumber, tokens: 0, joinedTokens: 0 };
    unit.tokens = estimator.estimate(unitText);
    unit.joinedTokens = estimator.estimate(separator(unit) + unitText);
    return unit;
  };

  for (const [i, rawLine] of lines.entries()) {
    const line = rawLine.trimEnd();
    const lineNumber = i + 1;

    if (!line.trim()) {
      if (paragraph.length > 0) paragraphs.push(paragraph);
      paragraph = [];
      continue;
    }

    const tokens = estimator.estimate(line);
    if (tokens <= tokenBudget) {
      paragraph.push(makeUnit(line, paragraph.length === 0, lineNumber));
      continue;
    }

    if (isStructuredRow(line)) {
      const overflow = new ChunkOverflowError(lineNumber, tokens, tokenBudget, line.slice(0, 120));
      overflows.push(overflow);
      logger.warn('Structured row exceeds token budget, skipping', {
        line_number: lineNumber,
        estimated_tokens: tokens,
        token_budget: tokenBudget,
      });
      continue;
    }

    for (const piece of await splitOversizedLine(line, tokenBudget, estimator)) {
      paragraph.push(makeUnit(piece, paragraph.length === 0, lineNumber));
    }
  }
  if (paragraph.length > 0) paragraphs.push(paragraph);

  return paragraphs;
}

/**
 * Re-measure a packed chunk and halve it until every part fits. Packing
 * sums per-line estimates, which a BPE tokenizer does not guarantee.
 */
function fitToBudget(units: TextUnit[], tokenBudget: number, estimator: TokenEstimator): TextUnit[][] {
  if (units.length <= 1 || estimator.estimate(render(units)) <= tokenBudget) {
    return [units];
  }
  const mid = Math.ceil(units.length / 2);
  return [
    ...fitToBudget(units.slice(0, mid), tokenBudget, estimator),
    ...fitToBudget(units.slice(mid), tokenBudget, estimator),
  ];
}

export function toOverflowReport(error: ChunkOverflowError): ChunkOverflowReport {
  return {
    lineNumber: error.lineNumber,
    estimatedTokens: error.estimatedTokens,
    tokenBudget: error.tokenBudget,
    preview: error.preview,
  };
}
