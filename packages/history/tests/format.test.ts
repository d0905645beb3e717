import { describe, it, expect } from 'vitest';
import {
  filterTextOnly,
  formatBatchForBackup,
  formatBatchForSummary,
  formatForSummary,
  toChronological,
} from '../src/format.js';
import type { Message } from '../src/types.js';

function msg(overrides: Partial<Message> & { id: number }): Message {
  return {
    date: new Date(Date.UTC(2024, 0, 15, 10, 30, 5)),
    senderId: 5,
    senderName: 'Alice',
    text: `text ${overrides.id}`,
    replyToId: 0,
    entities: [],
    ...overrides,
  };
}

describe('formatForSummary', () => {
  it('renders timestamp, sender id and text on one line', () => {
    expect(formatForSummary(msg({ id: 1, text: 'hello' }))).toBe('[2024-01-15 10:30] 5: hello');
  });
});

describe('formatBatchForSummary', () => {
  it('writes one line per text message and skips empty ones', () => {
    const out = formatBatchForSummary([msg({ id: 1, text: 'a' }), msg({ id: 2, text: '' }), msg({ id: 3, text: 'b' })]);
    expect(out).toBe('[2024-01-15 10:30] 5: a\n[2024-01-15 10:30] 5: b\n');
  });
});

describe('formatBatchForBackup', () => {
  it('returns empty for no messages', () => {
    expect(formatBatchForBackup([])).toBe('');
  });

  it('returns empty when no message has text', () => {
    expect(formatBatchForBackup([msg({ id: 1, text: '' })])).toBe('');
  });

  it('writes delimited blocks with reply info and one closing delimiter', () => {
    const out = formatBatchForBackup([
      msg({ id: 41, text: 'first' }),
      msg({ id: 42, text: 'second', senderName: 'Bob', replyToId: 41 }),
    ]);
    expect(out).toBe(
      '-----\n[2024-01-15 10:30:05] [Alice] [id=41]\nfirst\n' +
        '-----\n[2024-01-15 10:30:05] [Bob] [id=42] [reply_to=41]\nsecond\n' +
        '-----',
    );
  });
});

describe('filterTextOnly', () => {
  it('drops media-only messages', () => {
    const kept = filterTextOnly([msg({ id: 1, text: '', media: { type: 'photo' } }), msg({ id: 2 })]);
    expect(kept.map(m => m.id)).toEqual([2]);
  });
});

describe('toChronological', () => {
  it('returns a reversed copy', () => {
    const input = [msg({ id: 3 }), msg({ id: 2 }), msg({ id: 1 })];
    const out = toChronological(input);
    expect(out.map(m => m.id)).toEqual([1, 2, 3]);
    expect(input.map(m => m.id)).toEqual([3, 2, 1]);
  });
});
