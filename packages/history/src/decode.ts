import { extractSubstring } from './entities.js';
import type { MediaInfo, Message, PeerRef, RawHistoryPage, RawMedia, RawMessage, RawUser } from './types.js';

export const UNKNOWN_SENDER = 'Unknown';

export type DecodedPage = {
  messages: Message[];
  users: Map<number, string>;
  chats: Map<number, string>;
  count: number;
  total: number;
  hasMore: boolean;
  nextId: number;
};

export function userDisplayName(user: RawUser): string {
  const full = [user.firstName, user.lastName].filter(Boolean).join(' ').trim();
  if (full) return full;
  if (user.username) return `@${user.username}`;
  return `User ${user.id}`;
}

function senderOf(peer: PeerRef | undefined, users: Map<number, string>, chats: Map<number, string>): [number, string] {
  if (!peer) return [0, UNKNOWN_SENDER];
  const name = peer.kind === 'user' ? users.get(peer.id) : chats.get(peer.id);
  return [peer.id, name || UNKNOWN_SENDER];
}

export function decodeMedia(media: RawMedia): MediaInfo {
  switch (media.kind) {
    case 'photo': {
      const info: MediaInfo = { type: 'photo' };
      for (const size of media.sizes) {
        if (size.width > (info.width ?? 0)) {
          info.width = size.width;
          info.height = size.height;
        }
      }
      return info;
    }
    case 'document':
      return media.fileName ? { type: 'document', fileName: media.fileName } : { type: 'document' };
    case 'webpage':
      return media.url ? { type: 'webpage', url: media.url } : { type: 'webpage' };
    default:
      return { type: media.kind };
  }
}

function decodeEntities(raw: RawMessage): string[] {
  const out: string[] = [];
  for (const entity of raw.entities ?? []) {
    if (entity.kind === 'url') {
      const url = extractSubstring(raw.text, entity.offset, entity.length);
      if (url) out.push(url);
    } else if (entity.kind === 'text_url') {
      out.push(entity.url);
    }
  }
  return out;
}

/**
 * Decodes one page of platform history. `partner` is the resolved chat: in a
 * two-party conversation, incoming messages carry no sender and are
 * attributed to it.
 */
export function decodeMessages(
  raw: readonly RawMessage[],
  users: Map<number, string>,
  chats: Map<number, string>,
  partner: PeerRef,
): Message[] {
  const out: Message[] = [];

  for (const r of raw) {
    if (r.kind !== 'message') continue;

    const [senderId, senderName] = senderOf(r.from ?? partner, users, chats);
    const msg: Message = {
      id: r.id,
      date: new Date(r.date * 1000),
      senderId,
      senderName,
      text: r.text,
      replyToId: r.replyToId ?? 0,
      ...(r.media ? { media: decodeMedia(r.media) } : {}),
      entities: decodeEntities(r),
    };
    out.push(Object.freeze(msg));
  }

  return out;
}

/** Returns undefined for page shapes that carry no history. */
export function decodePage(page: RawHistoryPage, partner: PeerRef): DecodedPage | undefined {
  if (page.kind === 'not_modified') return undefined;

  const users = new Map<number, string>();
  for (const u of page.users) users.set(u.id, userDisplayName(u));
  const chats = new Map<number, string>();
  for (const c of page.chats) chats.set(c.id, c.title);

  const messages = decodeMessages(page.messages, users, chats, partner);
  const total = page.kind === 'messages' ? page.messages.length : page.count;

  // The cursor follows the raw records, so a page of service messages still advances it.
  let nextId = 0;
  for (let i = page.messages.length - 1; i >= 0 && nextId === 0; i--) nextId = page.messages[i].id;

  return {
    messages,
    users,
    chats,
    count: messages.length,
    total,
    hasMore: nextId > 0 && page.messages.length < total,
    nextId,
  };
}
