/**
 * Chunk Planner Tests
 *
 * Uses a one-character-per-token estimator so budgets map to exact lengths.
 */

import {
  planChunks,
  splitOversizedLine,
  isStructuredRow,
  CharTokenEstimator,
  TiktokenEstimator,
  ConfigError,
  ChunkOverflowError,
} from '@formtable/shared';

const chars = new CharTokenEstimator(1);

describe('planChunks', () => {
  it('returns no chunks for empty text', async () => {
    await expect(planChunks('', { tokenBudget: 100, estimator: chars })).resolves.toEqual({ chunks: [], overflows: [] });
    expect((await planChunks('\n\n  \n', { tokenBudget: 100, estimator: chars })).chunks).toEqual([]);
  });

  it('keeps small text in a single chunk with paragraph breaks preserved', async () => {
    const plan = await planChunks('Name: Ada\nAge: 36\n\nCity: Paris', { tokenBudget: 100, estimator: chars });

    expect(plan.chunks).toEqual([{ index: 0, text: 'Name: Ada\nAge: 36\n\nCity: Paris', estimatedTokens: 30 }]);
  });

  it('starts a new chunk when the next paragraph does not fit', async () => {
    const text = 'aaaa aaaa\nbbbb bbbb\n\ncccc cccc\ndddd dddd';
    const plan = await planChunks(text, { tokenBudget: 20, estimator: chars });

    expect(plan.chunks.map((c) => c.text)).toEqual(['aaaa aaaa\nbbbb bbbb', 'cccc cccc\ndddd dddd']);
    expect(plan.chunks.map((c) => c.index)).toEqual([0, 1]);
  });

  it('packs an oversized paragraph line by line without cutting lines', async () => {
    const text = 'Key: one 111\nKey: two 222\nKey: thr 333';
    const plan = await planChunks(text, { tokenBudget: 20, estimator: chars });

    expect(plan.chunks.map((c) => c.text)).toEqual(['Key: one 111', 'Key: two 222', 'Key: thr 333']);
  });

  it('never exceeds the budget and keeps every line in order', async () => {
    const lines = Array.from({ length: 40 }, (_, i) => `Field ${i}: value number ${i * 7}`);
    const text = lines.map((line, i) => (i % 5 === 4 ? `${line}\n` : line)).join('\n');
    const plan = await planChunks(text, { tokenBudget: 120, estimator: chars });

    expect(plan.chunks.length).toBeGreaterThan(1);
    for (const chunk of plan.chunks) {
      expect(chunk.estimatedTokens).toBeLessThanOrEqual(120);
      expect(chunk.estimatedTokens).toBe(chunk.text.length);
    }
    const recovered = plan.chunks.flatMap((c) => c.text.split('\n')).filter((line) => line !== '');
    expect(recovered).toEqual(lines);
  });

  it('holds the budget with the tiktoken estimator', async () => {
    const estimator = new TiktokenEstimator();
    const text = Array.from({ length: 60 }, (_, i) => `Line item ${i}: Widget model ${i} at 12.50 each`).join('\n');
    const plan = await planChunks(text, { tokenBudget: 100, estimator });

    expect(plan.chunks.length).toBeGreaterThan(1);
    for (const chunk of plan.chunks) {
      expect(estimator.estimate(chunk.text)).toBeLessThanOrEqual(100);
    }
  });

  it('reports an oversized structured row and keeps going', async () => {
    const row = 'Item | Qty | Price | Description of a very long product line';
    const plan = await planChunks(`${row}\nok line`, { tokenBudget: 20, estimator: chars });

    expect(plan.chunks.map((c) => c.text)).toEqual(['ok line']);
    expect(plan.overflows).toHaveLength(1);
    expect(plan.overflows[0]).toBeInstanceOf(ChunkOverflowError);
    expect(plan.overflows[0]).toMatchObject({
      lineNumber: 1,
      estimatedTokens: row.length,
      tokenBudget: 20,
      preview: row,
      code: 'CHUNK_OVERFLOW',
    });
  });

  it('splits an oversized prose line at a sentence boundary', async () => {
    const plan = await planChunks('First part ok. Second part here', { tokenBudget: 20, estimator: chars });

    expect(plan.chunks.map((c) => c.text)).toEqual(['First part ok.', 'Second part here']);
    expect(plan.overflows).toEqual([]);
  });

  it('repeats trailing lines as overlap when they fit', async () => {
    const text = 'line one aa\nline two bb\nline three\nline four x';
    const plan = await planChunks(text, { tokenBudget: 30, chunkOverlap: 12, estimator: chars });

    expect(plan.chunks.map((c) => c.text)).toEqual([
      'line one aa\nline two bb',
      'line two bb\nline three',
      'line three\nline four x',
    ]);
  });

  it('produces disjoint chunks when overlap is zero', async () => {
    const text = 'line one aa\nline two bb\nline three\nline four x';
    const plan = await planChunks(text, { tokenBudget: 30, estimator: chars });

    expect(plan.chunks.map((c) => c.text)).toEqual(['line one aa\nline two bb', 'line three\nline four x']);
  });

  it('rejects budgets outside 1..7000 and overlap not below the budget', async () => {
    await expect(planChunks('x', { tokenBudget: 0, estimator: chars })).rejects.toThrow(ConfigError);
    await expect(planChunks('x', { tokenBudget: 7001, estimator: chars })).rejects.toThrow(ConfigError);
    await expect(planChunks('x', { tokenBudget: 50, chunkOverlap: 50, estimator: chars })).rejects.toThrow(
      ConfigError
    );
  });
});

describe('splitOversizedLine', () => {
  it('splits at the last word boundary that fits', async () => {
    await expect(splitOversizedLine('alpha beta gamma delta', 20, chars)).resolves.toEqual(['alpha beta gamma', 'delta']);
  });

  it('keeps sentence punctuation with the sentence it ends', async () => {
    await expect(splitOversizedLine('Is it paid? Yes, in full.', 15, chars)).resolves.toEqual([
      'Is it paid?',
      'Yes, in full.',
    ]);
  });

  it('falls back to a hard cut when there is no boundary', async () => {
    await expect(splitOversizedLine('abcdefghijklmnopqrstuvwxyz', 10, chars)).resolves.toEqual([
      'abcdefghij',
      'klmnopqrst',
      'uvwxyz',
    ]);
  });

  it('returns a fitting line unchanged', async () => {
    await expect(splitOversizedLine('short', 10, chars)).resolves.toEqual(['short']);
  });

  it('keeps every word in order and every piece within the budget', async () => {
    const line = Array.from({ length: 12 }, (_, i) => `Clause ${i} holds, mostly.`).join(' ');

    const pieces = await splitOversizedLine(line, 30, chars);

    expect(pieces.length).toBeGreaterThan(1);
    for (const piece of pieces) {
      expect(piece.length).toBeLessThanOrEqual(30);
    }
    expect(pieces.join(' ').split(/\s+/)).toEqual(line.split(/\s+/));
  });

  it('holds the budget for prose with the tiktoken estimator', async () => {
    const estimator = new TiktokenEstimator();
    const line = Array.from({ length: 40 }, (_, i) => `The tenant paid installment ${i} on time.`).join(' ');

    const pieces = await splitOversizedLine(line, 25, estimator);

    expect(pieces.length).toBeGreaterThan(1);
    for (const piece of pieces) {
      expect(estimator.estimate(piece)).toBeLessThanOrEqual(25);
    }
  });
});

describe('isStructuredRow', () => {
  it('recognizes tab, pipe and column-aligned rows', () => {
    expect(isStructuredRow('Qty\tPrice')).toBe(true);
    expect(isStructuredRow('a | b | c')).toBe(true);
    expect(isStructuredRow('Widget   4   12.50')).toBe(true);
  });

  it('treats sentences as prose', () => {
    expect(isStructuredRow('The invoice was paid on time. Thanks | regards')).toBe(false);
    expect(isStructuredRow('Plain sentence with  one double space')).toBe(false);
  });
});
