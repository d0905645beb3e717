import {
    ProgressEstimator,
    toChronological,
    type Logger,
    type MessageFetcher,
    type ProgressSink,
} from '@chat-digest/history';
import type { RollingSummarizer } from '@chat-digest/summarize';

import { resolveSince } from '../dates.js';
import { InvalidInputError } from '../errors.js';

export type SummarizeChatDeps<P> = {
    fetcher: MessageFetcher<P>;
    summarizer: RollingSummarizer;
    sink?: ProgressSink;
    heartbeatMs?: number;
    logger?: Logger;
    now?: () => Date;
};

export type SummarizeChatInput = {
    chatId: number;
    /** What the reader wants out of the summary. */
    goal: string;
    /** `day`, `week` or `month` (default). Ignored when `since` is set. */
    period?: string;
    /** `YYYY-MM-DD` or an ISO 8601 date-time. */
    since?: string;
    progressToken?: string | number;
};

/** Fetches the chat back to the start of the window and folds it into one summary. */
export async function summarizeChat<P>(
    deps: SummarizeChatDeps<P>,
    input: SummarizeChatInput,
    signal?: AbortSignal,
): Promise<string> {
    const logger = deps.logger ?? console;
    const now = deps.now ?? (() => new Date());

    const goal = input.goal.trim();
    if (!goal) throw new InvalidInputError('goal', 'goal is required');

    const since = resolveSince(input, now());
    logger.debug(`summarizeChat: chat ${input.chatId} since ${since.toISOString()}`);

    const estimator = new ProgressEstimator({
        from: since,
        sink: deps.sink,
        progressToken: input.progressToken,
        heartbeatMs: deps.heartbeatMs,
        logger,
        now,
    });

    estimator.start();
    const fetched = await deps.fetcher
        .fetchAll(input.chatId, { minDate: since }, estimator.trackFetch(), signal)
        .finally(() => estimator.stop());

    const messages = toChronological(fetched.messages);
    const { sink } = deps;
    const { progressToken } = input;

    const summary = await deps.summarizer.summarize(goal, messages, {
        signal,
        onProgress: sink
            ? (current, total, message) =>
                  sink({ progress: current, total, message, ...(progressToken === undefined ? {} : { progressToken }) })
            : undefined,
    });

    logger.debug(`summarizeChat: chat ${input.chatId} done, ${messages.length} messages`);
    return summary;
}
