import { decodePage } from './decode.js';
import { PeerResolutionError, UpstreamError } from './errors.js';
import { fetchAllPages } from './paginator.js';
import { RateLimiter, sharedRateLimiter } from './rate-limiter.js';
import type {
  BatchCallback,
  FetchOptions,
  FetchResult,
  HistoryClient,
  HistoryRequest,
  Logger,
  PeerResolver,
  RawHistoryPage,
  ResolvedPeer,
} from './types.js';

export type HistoryTuning = {
  /** Page size for single-page fetches. */
  pageSize: number;
  /** Page size used by fetchAll when the caller does not set one. */
  fetchAllPageSize: number;
  /** Hard cap the platform enforces on one page. */
  maxPageSize: number;
};

export const DEFAULT_HISTORY_TUNING: HistoryTuning = {
  pageSize: 50,
  fetchAllPageSize: 100,
  maxPageSize: 100,
};

/** Cursor and filters for one page request. */
export type PageRequest = Pick<FetchOptions, 'limit' | 'offsetId' | 'offsetDate'> & {
  /** Read marker from `readMarker`; only newer messages are returned. 0 = unset. */
  minId?: number;
};

export type MessageFetcherOptions<P> = {
  client: HistoryClient<P>;
  resolver: PeerResolver<P>;
  /** Defaults to the process-wide limiter. */
  limiter?: RateLimiter;
  tuning?: Partial<HistoryTuning>;
  logger?: Logger;
};

/**
 * Reads chat history one page at a time. Every page request waits for a
 * permit from the rate limiter first.
 */
export class MessageFetcher<P> {
  readonly tuning: HistoryTuning;
  readonly logger: Logger;
  private readonly client: HistoryClient<P>;
  private readonly resolver: PeerResolver<P>;
  private readonly limiter: RateLimiter;

  constructor(options: MessageFetcherOptions<P>) {
    this.client = options.client;
    this.resolver = options.resolver;
    this.limiter = options.limiter ?? sharedRateLimiter;
    this.tuning = { ...DEFAULT_HISTORY_TUNING, ...options.tuning };
    this.logger = options.logger ?? console;
  }

  async fetch(chatId: number, opts: FetchOptions = {}, signal?: AbortSignal): Promise<FetchResult> {
    const peer = await this.resolve('fetch', chatId, signal);
    const minId = opts.unreadOnly ? await this.readMarker('fetch', peer, signal) : 0;
    const page = await this.fetchPage('fetch', peer, { ...opts, minId }, signal);
    return { ...page, chatId };
  }

  /** Follows the page cursor until a stop condition holds. See `fetchAllPages`. */
  async fetchAll(chatId: number, opts: FetchOptions = {}, onBatch?: BatchCallback, signal?: AbortSignal): Promise<FetchResult> {
    const peer = await this.resolve('fetchAll', chatId, signal);
    return fetchAllPages(this, peer, chatId, opts, onBatch, signal);
  }

  async resolve(op: string, chatId: number, signal?: AbortSignal): Promise<ResolvedPeer<P>> {
    try {
      return await this.resolver.resolve(chatId, signal);
    } catch (cause) {
      throw new PeerResolutionError({ op, chatId, cause });
    }
  }

  /** Id of the last message read in the chat, 0 when unknown. Costs one rate-limit permit. */
  async readMarker(op: string, peer: ResolvedPeer<P>, signal?: AbortSignal): Promise<number> {
    await this.limiter.take(signal);
    let readInboxMaxId: number;
    try {
      readInboxMaxId = await this.client.getReadInboxMaxId(peer.handle, signal);
    } catch (cause) {
      throw new UpstreamError({ op, message: 'getting read inbox max id', cause });
    }
    return readInboxMaxId > 0 ? readInboxMaxId : 0;
  }

  /** One rate-limited page request against an already resolved peer. `chatId` is left 0. */
  async fetchPage(op: string, peer: ResolvedPeer<P>, page: PageRequest, signal?: AbortSignal): Promise<FetchResult> {
    const requested = page.limit && page.limit > 0 ? page.limit : this.tuning.pageSize;
    const request: HistoryRequest = {
      limit: Math.min(requested, this.tuning.maxPageSize),
      offsetId: page.offsetId ?? 0,
      offsetDate: page.offsetDate ? Math.floor(page.offsetDate.getTime() / 1000) : 0,
      minId: page.minId ?? 0,
    };

    await this.limiter.take(signal);

    let raw: RawHistoryPage;
    try {
      raw = await this.client.getHistory(peer.handle, request, signal);
    } catch (cause) {
      throw new UpstreamError({ op, message: 'getting messages', cause });
    }

    const decoded = decodePage(raw, peer.ref);
    if (!decoded) {
      throw new UpstreamError({ op, message: `unexpected response type: ${raw.kind}` });
    }

    return { chatId: 0, ...decoded };
  }
}
