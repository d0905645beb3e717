import type { Message } from '@chat-digest/history';

import { estimateMessageTokens } from './tokens.js';
import type { Batch } from './types.js';

export const DEFAULT_BATCH_TOKENS = 8000;

/**
 * Greedy, order-preserving split. A new batch starts only when the next
 * message would push the current one over budget; a message larger than the
 * whole budget travels alone. `maxTokens <= 0` means the default budget.
 */
export function splitIntoBatchesByTokens(messages: readonly Message[], maxTokens: number): Batch[] {
  const budget = maxTokens > 0 ? maxTokens : DEFAULT_BATCH_TOKENS;
  const batches: Batch[] = [];

  let current: Message[] = [];
  let used = 0;

  for (const msg of messages) {
    const cost = estimateMessageTokens(msg);
    if (used + cost > budget && current.length > 0) {
      batches.push(current);
      current = [];
      used = 0;
    }
    current.push(msg);
    used += cost;
  }

  if (current.length > 0) batches.push(current);
  return batches;
}
