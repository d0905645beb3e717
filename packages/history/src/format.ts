import type { Message } from './types.js';

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:mm`, local time. */
export function formatShortDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** `YYYY-MM-DD HH:mm:ss`, local time. */
export function formatDate(date: Date): string {
  return `${formatShortDate(date)}:${pad(date.getSeconds())}`;
}

/** Compact prompt form: `[timestamp] sender_id: text`. */
export function formatForSummary(msg: Message): string {
  return `[${formatShortDate(msg.date)}] ${msg.senderId}: ${msg.text}`;
}

/** One compact line per text message, each terminated by a newline. */
export function formatBatchForSummary(messages: readonly Message[]): string {
  let out = '';
  for (const msg of messages) {
    if (!msg.text) continue;
    out += formatForSummary(msg) + '\n';
  }
  return out;
}

/**
 * Export form:
 *
 *   -----
 *   [2024-01-15 10:30:00] [Alice] [id=42] [reply_to=41]
 *   text
 *   -----
 *
 * Messages without text are skipped; the closing delimiter is written once.
 */
export function formatBatchForBackup(messages: readonly Message[]): string {
  const parts: string[] = [];

  for (const msg of messages) {
    if (!msg.text) continue;

    let header = `[${formatDate(msg.date)}] [${msg.senderName}] [id=${msg.id}]`;
    if (msg.replyToId !== 0) header += ` [reply_to=${msg.replyToId}]`;
    parts.push(`-----\n${header}\n${msg.text}\n`);
  }

  return parts.length > 0 ? parts.join('') + '-----' : '';
}

export function filterTextOnly(messages: readonly Message[]): Message[] {
  return messages.filter(m => m.text !== '');
}

/** Platform order is newest first; returns a new array oldest first. */
export function toChronological(messages: readonly Message[]): Message[] {
  return messages.slice().reverse();
}
