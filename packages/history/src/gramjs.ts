import bigInt from 'big-integer';
import { Api, type TelegramClient } from 'telegram';

import { userDisplayName } from './decode.js';
import type {
  ChatDirectory,
  HistoryClient,
  HistoryRequest,
  PeerRef,
  PeerResolver,
  RawChat,
  RawEntity,
  RawHistoryPage,
  RawMedia,
  RawMessage,
  RawPhotoSize,
  RawUser,
  ResolvedPeer,
} from './types.js';

// =============================================================================
// MTPROTO ADAPTER: maps gramjs objects onto the raw history records
// =============================================================================

type InputPeer = Api.TypeInputPeer;

function peerRefOf(peer: Api.TypePeer): PeerRef | undefined {
  if (peer instanceof Api.PeerUser) return { kind: 'user', id: peer.userId.toJSNumber() };
  if (peer instanceof Api.PeerChat) return { kind: 'chat', id: peer.chatId.toJSNumber() };
  if (peer instanceof Api.PeerChannel) return { kind: 'channel', id: peer.channelId.toJSNumber() };
  return undefined;
}

function inputPeerRef(peer: InputPeer, chatId: number): PeerRef {
  if (peer instanceof Api.InputPeerUser) return { kind: 'user', id: peer.userId.toJSNumber() };
  if (peer instanceof Api.InputPeerChat) return { kind: 'chat', id: peer.chatId.toJSNumber() };
  if (peer instanceof Api.InputPeerChannel) return { kind: 'channel', id: peer.channelId.toJSNumber() };
  return { kind: 'user', id: chatId };
}

function photoSize(size: Api.TypePhotoSize): RawPhotoSize[] {
  if (size instanceof Api.PhotoSize || size instanceof Api.PhotoSizeProgressive || size instanceof Api.PhotoCachedSize) {
    return [{ width: size.w, height: size.h }];
  }
  return [];
}

function toRawMedia(media: Api.TypeMessageMedia): RawMedia {
  if (media instanceof Api.MessageMediaPhoto) {
    const photo = media.photo;
    return { kind: 'photo', sizes: photo instanceof Api.Photo ? photo.sizes.flatMap(photoSize) : [] };
  }
  if (media instanceof Api.MessageMediaDocument) {
    const doc = media.document;
    if (!(doc instanceof Api.Document)) return { kind: 'document' };
    for (const attr of doc.attributes) {
      if (attr instanceof Api.DocumentAttributeFilename) return { kind: 'document', fileName: attr.fileName };
    }
    return { kind: 'document' };
  }
  if (media instanceof Api.MessageMediaWebPage) {
    const page = media.webpage;
    return page instanceof Api.WebPage ? { kind: 'webpage', url: page.url } : { kind: 'webpage' };
  }
  if (media instanceof Api.MessageMediaGeo) return { kind: 'geo' };
  if (media instanceof Api.MessageMediaContact) return { kind: 'contact' };
  if (media instanceof Api.MessageMediaVenue) return { kind: 'venue' };
  if (media instanceof Api.MessageMediaPoll) return { kind: 'poll' };
  if (media instanceof Api.MessageMediaDice) return { kind: 'dice' };
  return { kind: 'other' };
}

function toRawEntity(entity: Api.TypeMessageEntity): RawEntity {
  if (entity instanceof Api.MessageEntityUrl) return { kind: 'url', offset: entity.offset, length: entity.length };
  if (entity instanceof Api.MessageEntityTextUrl) {
    return { kind: 'text_url', offset: entity.offset, length: entity.length, url: entity.url };
  }
  return { kind: 'other' };
}

function toRawMessage(msg: Api.TypeMessage): RawMessage {
  if (msg instanceof Api.Message) {
    const reply = msg.replyTo instanceof Api.MessageReplyHeader ? msg.replyTo.replyToMsgId : undefined;
    return {
      kind: 'message',
      id: msg.id,
      date: msg.date,
      text: msg.message ?? '',
      from: msg.fromId ? peerRefOf(msg.fromId) : undefined,
      replyToId: reply,
      media: msg.media ? toRawMedia(msg.media) : undefined,
      entities: msg.entities?.map(toRawEntity),
    };
  }
  if (msg instanceof Api.MessageService) return { kind: 'service', id: msg.id, date: msg.date, text: '' };
  return { kind: 'empty', id: 0, date: 0, text: '' };
}

function toRawUser(user: Api.TypeUser): RawUser[] {
  if (!(user instanceof Api.User)) return [];
  return [{ id: user.id.toJSNumber(), firstName: user.firstName, lastName: user.lastName, username: user.username }];
}

function toRawChat(chat: Api.TypeChat): RawChat[] {
  if (chat instanceof Api.Chat || chat instanceof Api.Channel) return [{ id: chat.id.toJSNumber(), title: chat.title }];
  return [];
}

function contents(res: { messages: Api.TypeMessage[]; users: Api.TypeUser[]; chats: Api.TypeChat[] }) {
  return {
    messages: res.messages.map(toRawMessage),
    users: res.users.flatMap(toRawUser),
    chats: res.chats.flatMap(toRawChat),
  };
}

export function toRawPage(res: Api.messages.TypeMessages): RawHistoryPage {
  if (res instanceof Api.messages.ChannelMessages) return { kind: 'channel', count: res.count, ...contents(res) };
  if (res instanceof Api.messages.MessagesSlice) return { kind: 'slice', count: res.count, ...contents(res) };
  if (res instanceof Api.messages.Messages) return { kind: 'messages', ...contents(res) };
  return { kind: 'not_modified' };
}

/**
 * Resolves chat ids through the client's entity cache. Marked ids
 * (`-100…` for channels) are accepted as-is.
 */
export class GramPeerResolver implements PeerResolver<InputPeer> {
  constructor(private readonly client: TelegramClient) {}

  async resolve(chatId: number, signal?: AbortSignal): Promise<ResolvedPeer<InputPeer>> {
    signal?.throwIfAborted();
    const handle = await this.client.getInputEntity(bigInt(chatId));
    return { handle, ref: inputPeerRef(handle, chatId) };
  }
}

/** MTProto requests cannot be withdrawn once sent; the signal is honoured before sending. */
export class GramHistoryClient implements HistoryClient<InputPeer> {
  constructor(private readonly client: TelegramClient) {}

  async getHistory(peer: InputPeer, request: HistoryRequest, signal?: AbortSignal): Promise<RawHistoryPage> {
    signal?.throwIfAborted();
    const res = await this.client.invoke(
      new Api.messages.GetHistory({
        peer,
        offsetId: request.offsetId,
        offsetDate: request.offsetDate,
        addOffset: 0,
        limit: request.limit,
        maxId: 0,
        minId: request.minId,
        hash: bigInt.zero,
      }),
    );
    return toRawPage(res);
  }

  async getReadInboxMaxId(peer: InputPeer, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const res = await this.client.invoke(
      new Api.messages.GetPeerDialogs({ peers: [new Api.InputDialogPeer({ peer })] }),
    );
    const dialog = res.dialogs[0];
    return dialog instanceof Api.Dialog ? dialog.readInboxMaxId : 0;
  }
}

export class GramChatDirectory implements ChatDirectory {
  constructor(private readonly client: TelegramClient) {}

  async chatTitle(chatId: number, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const entity = await this.client.getEntity(bigInt(chatId));
    const [user] = entity instanceof Api.User ? toRawUser(entity) : [];
    if (user) return userDisplayName(user);
    const [chat] = entity instanceof Api.Chat || entity instanceof Api.Channel ? toRawChat(entity) : [];
    return chat ? chat.title : `chat_${chatId}`;
  }
}
