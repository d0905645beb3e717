import { RateLimiter } from '../src/rate-limiter.js';
import type {
  HistoryClient,
  HistoryRequest,
  PeerRef,
  PeerResolver,
  RawHistoryPage,
  RawMessage,
  RawUser,
} from '../src/types.js';

export const partner: PeerRef = { kind: 'user', id: 7 };

export const resolver: PeerResolver<PeerRef> = {
  resolve: async () => ({ handle: partner, ref: partner }),
};

/** Unix seconds for midnight UTC of a January 2024 day. */
export function jan(day: number, hour = 0): number {
  return Date.UTC(2024, 0, day, hour) / 1000;
}

export function raw(id: number, date: number, overrides: Partial<RawMessage> = {}): RawMessage {
  return { kind: 'message', id, date, text: `message ${id}`, from: { kind: 'user', id: 1 }, ...overrides };
}

export function slice(messages: RawMessage[], count: number, users: RawUser[] = []): RawHistoryPage {
  return { kind: 'slice', count, messages, users, chats: [] };
}

/** Newest-first page of ids `from` down to `to`, one per day starting at `day(from)`. */
export function descending(from: number, to: number, day: (id: number) => number = id => jan(id)): RawMessage[] {
  const out: RawMessage[] = [];
  for (let id = from; id >= to; id--) out.push(raw(id, day(id)));
  return out;
}

/** Serves queued pages in order; an Error in the queue is thrown instead. */
export class FakeHistoryClient implements HistoryClient<PeerRef> {
  readonly requests: HistoryRequest[] = [];
  readInboxMaxId = 0;
  private readonly queue: Array<RawHistoryPage | Error>;

  constructor(pages: Array<RawHistoryPage | Error>) {
    this.queue = pages.slice();
  }

  async getHistory(_peer: PeerRef, request: HistoryRequest): Promise<RawHistoryPage> {
    this.requests.push({ ...request });
    const next = this.queue.shift() ?? slice([], 0);
    if (next instanceof Error) throw next;
    return next;
  }

  async getReadInboxMaxId(): Promise<number> {
    return this.readInboxMaxId;
  }
}

export function instantLimiter(): RateLimiter {
  return new RateLimiter({ perSecond: 1000, sleep: async () => {} });
}

export const silentLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Awaits a rejection and narrows it to the expected error class. */
export async function rejectionOf<E extends Error>(
  promise: Promise<unknown>,
  type: abstract new (...args: never[]) => E,
): Promise<E> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof type)) throw new Error(`expected ${type.name}, got ${String(err)}`);
  return err;
}
