import { vi } from 'vitest';
import type { Message } from '@chat-digest/history';

export function msg(id: number, text: string, overrides: Partial<Message> = {}): Message {
  return {
    id,
    date: new Date(Date.UTC(2024, 0, 15, 10, 30)),
    senderId: 1,
    senderName: 'Ada',
    text,
    replyToId: 0,
    entities: [],
    ...overrides,
  };
}

/** `[2024-01-15 10:30] 1: <17 chars>\n` is 40 bytes, i.e. 10 tokens. */
export const TEN_TOKENS = 'x'.repeat(17);

export function silentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
