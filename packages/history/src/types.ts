// =============================================================================
// NORMALIZED MESSAGE MODEL
// =============================================================================

export type MediaType = 'photo' | 'document' | 'geo' | 'contact' | 'webpage' | 'venue' | 'poll' | 'dice' | 'other';

export type MediaInfo = {
  type: MediaType;
  /** Largest available photo width. Photos only. */
  width?: number;
  height?: number;
  /** Documents only, when the platform reports one. */
  fileName?: string;
  /** Web page previews only. */
  url?: string;
};

export type Message = {
  readonly id: number;
  readonly date: Date;
  /** 0 when the sender is unknown. */
  readonly senderId: number;
  readonly senderName: string;
  readonly text: string;
  /** 0 when the message is not a reply. */
  readonly replyToId: number;
  readonly media?: MediaInfo;
  /** URLs found in the message, in entity order. */
  readonly entities: readonly string[];
};

export type FetchOptions = {
  /** Page size. Default 50 for single pages, 100 for fetchAll; capped at 100. */
  limit?: number;
  offsetId?: number;
  /** The platform returns messages strictly older than this. */
  offsetDate?: Date;
  /** Inclusive lower bound, applied by fetchAll. */
  minDate?: Date;
  /** Inclusive upper bound, applied by fetchAll. */
  maxDate?: Date;
  unreadOnly?: boolean;
  /** Stop after collecting this many messages. 0 = no limit. */
  maxCount?: number;
};

export type FetchResult = {
  chatId: number;
  /** Newest first, as the platform returns them. */
  messages: Message[];
  /** User id -> display name. */
  users: Map<number, string>;
  /** Chat/channel id -> title. */
  chats: Map<number, string>;
  count: number;
  hasMore: boolean;
  /** Offset id for the next page; 0 when there is none. */
  nextId: number;
  /** Total messages reported by the platform (fetchAll: the collected count). */
  total: number;
};

/**
 * Called once per fetched page with the page number (1-based), the number of
 * messages collected so far and the earliest timestamp seen in that page
 * (undefined when the page decoded to no messages).
 */
export type BatchCallback = (page: number, collected: number, earliest: Date | undefined) => void;

// =============================================================================
// PLATFORM SEAMS
// =============================================================================

export type PeerKind = 'user' | 'chat' | 'channel';

export type PeerRef = { kind: PeerKind; id: number };

export type ResolvedPeer<P> = {
  /** Platform-addressable handle, passed back to the HistoryClient untouched. */
  handle: P;
  ref: PeerRef;
};

export type PeerResolver<P> = {
  resolve(chatId: number, signal?: AbortSignal): Promise<ResolvedPeer<P>>;
};

export type HistoryRequest = {
  limit: number;
  offsetId: number;
  /** Unix seconds; 0 = unset. */
  offsetDate: number;
  /** Only messages with a greater id. 0 = unset. */
  minId: number;
};

export type RawPhotoSize = { width: number; height: number };

export type RawMedia =
  | { kind: 'photo'; sizes: RawPhotoSize[] }
  | { kind: 'document'; fileName?: string }
  | { kind: 'webpage'; url?: string }
  | { kind: 'geo' | 'contact' | 'venue' | 'poll' | 'dice' | 'other' };

export type RawEntity =
  | { kind: 'url'; offset: number; length: number }
  | { kind: 'text_url'; offset: number; length: number; url: string }
  | { kind: 'other' };

export type RawMessage = {
  kind: 'message' | 'service' | 'empty';
  id: number;
  /** Unix seconds. */
  date: number;
  text: string;
  /** Absent for incoming messages in two-party conversations. */
  from?: PeerRef;
  replyToId?: number;
  media?: RawMedia;
  entities?: RawEntity[];
};

export type RawUser = {
  id: number;
  firstName?: string;
  lastName?: string;
  username?: string;
};

export type RawChat = { id: number; title: string };

export type RawHistoryPage =
  | { kind: 'messages'; messages: RawMessage[]; users: RawUser[]; chats: RawChat[] }
  | { kind: 'slice' | 'channel'; count: number; messages: RawMessage[]; users: RawUser[]; chats: RawChat[] }
  | { kind: 'not_modified' };

export type HistoryClient<P> = {
  getHistory(peer: P, request: HistoryRequest, signal?: AbortSignal): Promise<RawHistoryPage>;
  /** Id of the last message the caller has read in this chat; 0 when unknown. */
  getReadInboxMaxId(peer: P, signal?: AbortSignal): Promise<number>;
};

/** Human-readable chat names, used for export file names. */
export type ChatDirectory = {
  chatTitle(chatId: number, signal?: AbortSignal): Promise<string>;
};

// =============================================================================
// PROGRESS
// =============================================================================

export type ProgressNotification = {
  progress: number;
  total: number;
  message: string;
  progressToken?: string | number;
};

/** Receives progress notifications. Delivery is best-effort; zero or many calls are valid. */
export type ProgressSink = (notification: ProgressNotification) => void;

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
