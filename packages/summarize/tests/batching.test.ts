import { describe, it, expect } from 'vitest';
import { DEFAULT_BATCH_TOKENS, splitIntoBatchesByTokens } from '../src/batching.js';
import { estimateMessageTokens } from '../src/tokens.js';
import { msg, TEN_TOKENS } from './helpers.js';

const tenTokenMessages = (n: number) => Array.from({ length: n }, (_, i) => msg(i + 1, TEN_TOKENS));
const ids = (batches: ReadonlyArray<ReadonlyArray<{ id: number }>>) => batches.map(b => b.map(m => m.id));

describe('splitIntoBatchesByTokens', () => {
  it('prices the fixture messages at ten tokens', () => {
    expect(estimateMessageTokens(msg(1, TEN_TOKENS))).toBe(10);
  });

  it('gives every message its own batch when each one fills the budget', () => {
    expect(ids(splitIntoBatchesByTokens(tenTokenMessages(5), 10))).toEqual([[1], [2], [3], [4], [5]]);
  });

  it('keeps everything in one batch when the total fits', () => {
    expect(ids(splitIntoBatchesByTokens(tenTokenMessages(5), 50))).toEqual([[1, 2, 3, 4, 5]]);
  });

  it('fills greedily and preserves order', () => {
    expect(ids(splitIntoBatchesByTokens(tenTokenMessages(5), 30))).toEqual([
      [1, 2, 3],
      [4, 5],
    ]);
  });

  it('puts an oversized message in a batch of its own', () => {
    const messages = [msg(1, 'hi'), msg(2, 'y'.repeat(400)), msg(3, 'hi')];
    expect(ids(splitIntoBatchesByTokens(messages, 20))).toEqual([[1], [2], [3]]);
  });

  it('falls back to the default budget for a non-positive one', () => {
    expect(DEFAULT_BATCH_TOKENS).toBe(8000);
    expect(ids(splitIntoBatchesByTokens(tenTokenMessages(5), 0))).toEqual([[1, 2, 3, 4, 5]]);
    expect(ids(splitIntoBatchesByTokens(tenTokenMessages(5), -1))).toEqual([[1, 2, 3, 4, 5]]);
  });

  it('never produces an empty batch', () => {
    expect(splitIntoBatchesByTokens([], 10)).toEqual([]);
    for (const budget of [1, 5, 10, 25, 1000]) {
      for (const batch of splitIntoBatchesByTokens(tenTokenMessages(7), budget)) {
        expect(batch.length).toBeGreaterThan(0);
      }
    }
  });
});
