import type { ChatDirectory, Logger, MessageFetcher, ProgressSink } from '@chat-digest/history';
import { createProvider, RollingSummarizer, type SamplingChannel } from '@chat-digest/summarize';

import { getServiceConfig, type ServiceConfig } from './config.js';
import { exportChat, type ExportChatInput, type ExportChatResult } from './operations/export-chat.js';
import { summarizeChat, type SummarizeChatInput } from './operations/summarize-chat.js';

export type ChatDigest = {
    summarizeChat(input: SummarizeChatInput, signal?: AbortSignal): Promise<string>;
    exportChat(input: ExportChatInput, signal?: AbortSignal): Promise<ExportChatResult>;
};

export type ChatDigestOptions<P> = {
    fetcher: MessageFetcher<P>;
    directory?: ChatDirectory;
    /** Host model channel for the sampling provider. */
    channel?: SamplingChannel;
    sink?: ProgressSink;
    logger?: Logger;
    /** Defaults to the environment configuration. */
    config?: ServiceConfig;
    fetch?: typeof fetch;
};

/**
 * Wires both operations to one fetcher and the configured provider. The
 * provider is built on first use, so a host without a model channel can
 * still export.
 */
export function createChatDigest<P>(options: ChatDigestOptions<P>): ChatDigest {
    const config = options.config ?? getServiceConfig();
    const logger = options.logger ?? console;
    const { fetcher, sink } = options;

    let summarizer: RollingSummarizer | undefined;
    const getSummarizer = () => {
        summarizer ??= new RollingSummarizer({
            provider: createProvider(config.provider, { channel: options.channel, fetch: options.fetch, logger }),
            batchTokens: config.batchTokens,
            heartbeatMs: config.heartbeatMs,
            logger,
        });
        return summarizer;
    };

    return {
        summarizeChat: async (input, signal) =>
            summarizeChat(
                { fetcher, summarizer: getSummarizer(), sink, heartbeatMs: config.heartbeatMs, logger },
                input,
                signal,
            ),
        exportChat: (input, signal) =>
            exportChat(
                {
                    fetcher,
                    directory: options.directory,
                    allowedPaths: config.exportAllowedPaths,
                    sink,
                    heartbeatMs: config.heartbeatMs,
                    logger,
                },
                input,
                signal,
            ),
    };
}
