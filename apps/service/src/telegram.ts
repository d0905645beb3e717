import { MessageFetcher, type HistoryTuning, type Logger } from '@chat-digest/history';
import { GramChatDirectory, GramHistoryClient, GramPeerResolver } from '@chat-digest/history/gramjs';
import type { TelegramClient } from 'telegram';

import { getServiceConfig } from './config.js';
import { createChatDigest, type ChatDigest, type ChatDigestOptions } from './service.js';

/** History access over an already connected and authorized gramjs client. */
export function createTelegramHistory(
    client: TelegramClient,
    options: { tuning?: Partial<HistoryTuning>; logger?: Logger } = {},
) {
    const fetcher = new MessageFetcher({
        client: new GramHistoryClient(client),
        resolver: new GramPeerResolver(client),
        tuning: options.tuning,
        logger: options.logger,
    });
    return { fetcher, directory: new GramChatDirectory(client) };
}

/** `createChatDigest` over a connected gramjs client. */
export function createTelegramChatDigest(
    client: TelegramClient,
    options: Omit<ChatDigestOptions<unknown>, 'fetcher' | 'directory'> = {},
): ChatDigest {
    const config = options.config ?? getServiceConfig();
    const history = createTelegramHistory(client, { tuning: config.history, logger: options.logger });
    return createChatDigest({ ...options, config, ...history });
}
