import { formatForSummary, type Message } from '@chat-digest/history';

/**
 * Rough token count. About four bytes per token for mostly single-byte
 * text; when the text is dominated by multi-byte characters (Cyrillic, CJK)
 * about two characters per token instead.
 */
export function estimateTokens(text: string): number {
  const bytes = Buffer.byteLength(text, 'utf8');
  let points = 0;
  for (const _ of text) points++;

  if (bytes > points * 2) return Math.floor(points / 2);
  return Math.floor(bytes / 4);
}

/** Cost of a message as it appears in a prompt, trailing newline included. */
export function estimateMessageTokens(msg: Message): number {
  return estimateTokens(`${formatForSummary(msg)}\n`);
}
