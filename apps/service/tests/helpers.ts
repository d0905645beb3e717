import { MessageFetcher, RateLimiter } from '@chat-digest/history';
import type { HistoryClient, HistoryRequest, PeerRef, RawHistoryPage, RawMessage, RawUser } from '@chat-digest/history';
import { vi } from 'vitest';

const partner: PeerRef = { kind: 'user', id: 7 };

/** Unix seconds for a January 2024 day, UTC. */
export function jan(day: number, hour = 0): number {
    return Date.UTC(2024, 0, day, hour) / 1000;
}

export function raw(id: number, date: number, overrides: Partial<RawMessage> = {}): RawMessage {
    return { kind: 'message', id, date, text: `message ${id}`, from: { kind: 'user', id: 1 }, ...overrides };
}

export class ScriptedHistory implements HistoryClient<PeerRef> {
    readonly requests: HistoryRequest[] = [];

    constructor(private readonly pages: RawHistoryPage[]) {}

    async getHistory(_peer: PeerRef, request: HistoryRequest): Promise<RawHistoryPage> {
        this.requests.push({ ...request });
        return this.pages.shift() ?? { kind: 'messages', messages: [], users: [], chats: [] };
    }

    async getReadInboxMaxId(): Promise<number> {
        return 0;
    }
}

export function page(messages: RawMessage[], users: RawUser[] = [{ id: 1, firstName: 'Ada' }]): RawHistoryPage {
    return { kind: 'slice', count: 1000, messages, users, chats: [] };
}

export function fetcherFor(history: ScriptedHistory): MessageFetcher<PeerRef> {
    return new MessageFetcher({
        client: history,
        resolver: { resolve: async () => ({ handle: partner, ref: partner }) },
        limiter: new RateLimiter({ perSecond: 1000, sleep: async () => {} }),
        logger: silentLogger(),
    });
}

export function silentLogger() {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
