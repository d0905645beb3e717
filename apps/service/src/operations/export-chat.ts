import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
    formatBatchForBackup,
    ProgressEstimator,
    toChronological,
    type ChatDirectory,
    type Logger,
    type MessageFetcher,
    type ProgressSink,
} from '@chat-digest/history';

import { fileTimestamp, parseLocalDate } from '../dates.js';
import { ExportPathError, InvalidInputError } from '../errors.js';
import { assertPathAllowed, sanitizeFilename } from '../paths.js';

/** Message cap when the caller sets neither a count nor a date range. */
export const DEFAULT_EXPORT_COUNT = 1000;
const EXPORT_PAGE_SIZE = 100;

export type ExportChatDeps<P> = {
    fetcher: MessageFetcher<P>;
    allowedPaths: readonly string[];
    /** Names auto-generated files; `chat_<id>` without it. */
    directory?: ChatDirectory;
    sink?: ProgressSink;
    heartbeatMs?: number;
    logger?: Logger;
    now?: () => Date;
};

export type ExportChatInput = {
    chatId: number;
    /** Defaults to `<chat name>-<timestamp>.txt` in the first allowed directory. */
    filePath?: string;
    /** 0 or absent = no cap, unless no date is set either. */
    count?: number;
    /** `YYYY-MM-DD` or `YYYY-MM-DD HH:mm:ss`, local time. */
    from?: string;
    to?: string;
    progressToken?: string | number;
};

export type ExportChatResult = {
    /** Absolute path of the written file. */
    path: string;
    messages: number;
};

async function chatName<P>(deps: ExportChatDeps<P>, chatId: number, logger: Logger, signal?: AbortSignal) {
    if (!deps.directory) return `chat_${chatId}`;
    try {
        return await deps.directory.chatTitle(chatId, signal);
    } catch (err) {
        signal?.throwIfAborted();
        const reason = err instanceof Error ? err.message : String(err);
        logger.warn(`exportChat: could not look up the name of chat ${chatId}: ${reason}`);
        return `chat_${chatId}`;
    }
}

/** Writes a chat's history, oldest first, in the delimited export form. */
export async function exportChat<P>(
    deps: ExportChatDeps<P>,
    input: ExportChatInput,
    signal?: AbortSignal,
): Promise<ExportChatResult> {
    const logger = deps.logger ?? console;
    const now = deps.now ?? (() => new Date());

    const from = parseLocalDate('from', input.from);
    const to = parseLocalDate('to', input.to, { endOfDay: true });

    let count = input.count ?? 0;
    if (!Number.isInteger(count) || count < 0) {
        throw new InvalidInputError('count', `count must be a non-negative integer, got ${count}`);
    }
    if (count === 0 && !from && !to) count = DEFAULT_EXPORT_COUNT;

    let target = input.filePath?.trim();
    if (!target) {
        const [dir] = deps.allowedPaths;
        if (!dir) throw new ExportPathError('', 'no allowed paths configured for export');
        const name = await chatName(deps, input.chatId, logger, signal);
        target = path.join(dir, `${sanitizeFilename(name)}-${fileTimestamp(now())}.txt`);
    }
    const absPath = assertPathAllowed(target, deps.allowedPaths);

    logger.debug(`exportChat: chat ${input.chatId} -> ${absPath}`);

    const estimator = new ProgressEstimator({
        from,
        to,
        countLimit: count,
        sink: deps.sink,
        progressToken: input.progressToken,
        heartbeatMs: deps.heartbeatMs,
        logger,
        now,
    });

    estimator.start();
    const fetched = await deps.fetcher
        .fetchAll(
            input.chatId,
            { limit: EXPORT_PAGE_SIZE, minDate: from, maxDate: to, maxCount: count },
            estimator.trackFetch(),
            signal,
        )
        .finally(() => estimator.stop());

    estimator.send(`Collected ${fetched.messages.length} messages`);

    const content = formatBatchForBackup(toChronological(fetched.messages));
    await mkdir(path.dirname(absPath), { recursive: true, mode: 0o750 });
    await writeFile(absPath, content, { mode: 0o600 });
    logger.debug(`exportChat: chat ${input.chatId} done, ${fetched.messages.length} messages`);

    return { path: absPath, messages: fetched.messages.length };
}
