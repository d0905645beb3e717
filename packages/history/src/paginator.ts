import { FetchCancelledError, PaginationError } from './errors.js';
import type { MessageFetcher, PageRequest } from './fetcher.js';
import type { BatchCallback, FetchOptions, FetchResult, Message, ResolvedPeer } from './types.js';

/**
 * The platform returns messages strictly before `offsetDate`. Starting one
 * day past `maxDate` keeps messages from the `maxDate` day itself.
 */
export const OFFSET_DATE_BUFFER_MS = 24 * 60 * 60 * 1000;

function earliestOf(messages: readonly Message[]): Date | undefined {
  let earliest: Date | undefined;
  for (const m of messages) {
    if (!earliest || m.date < earliest) earliest = m.date;
  }
  return earliest;
}

function snapshot(chatId: number, acc: Omit<FetchResult, 'chatId' | 'count' | 'total'>): FetchResult {
  return { ...acc, chatId, messages: acc.messages.slice(), count: acc.messages.length, total: acc.messages.length };
}

/**
 * Drives `fetchPage` across the history of one chat, newest first.
 *
 * After every page, in order: an empty page ends the run; a message older
 * than `minDate` ends it after keeping the newer ones; reaching `maxCount`
 * ends it with the page truncated; a page without more history ends it.
 * Otherwise the cursor moves to the last id of the page. Messages newer
 * than `maxDate` are skipped. With `unreadOnly`, the read marker is looked
 * up once and applied to every page.
 */
export async function fetchAllPages<P>(
  fetcher: MessageFetcher<P>,
  peer: ResolvedPeer<P>,
  chatId: number,
  opts: FetchOptions,
  onBatch?: BatchCallback,
  signal?: AbortSignal,
): Promise<FetchResult> {
  const acc: Omit<FetchResult, 'chatId' | 'count' | 'total'> & { messages: Message[] } = {
    messages: [],
    users: new Map<number, string>(),
    chats: new Map<number, string>(),
    hasMore: false,
    nextId: 0,
  };

  const pageOpts: PageRequest = {
    limit: opts.limit && opts.limit > 0 ? opts.limit : fetcher.tuning.fetchAllPageSize,
  };
  if (opts.maxDate) {
    pageOpts.offsetDate = new Date(opts.maxDate.getTime() + OFFSET_DATE_BUFFER_MS);
  }

  const maxCount = opts.maxCount ?? 0;

  const notify = (page: number, earliest: Date | undefined) => {
    if (!onBatch) return;
    try {
      onBatch(page, acc.messages.length, earliest);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      fetcher.logger.error(`fetchAll: progress callback failed on page ${page}: ${message}`);
    }
  };

  if (opts.unreadOnly) {
    try {
      pageOpts.minId = await fetcher.readMarker('fetchAll', peer, signal);
    } catch (cause) {
      if (signal?.aborted) {
        throw new FetchCancelledError({ partial: snapshot(chatId, acc), cause: signal.reason });
      }
      throw cause;
    }
  }

  for (let page = 1; ; page++) {
    if (signal?.aborted) {
      throw new FetchCancelledError({ partial: snapshot(chatId, acc), cause: signal.reason });
    }

    let batch: FetchResult;
    try {
      batch = await fetcher.fetchPage('fetchAll', peer, pageOpts, signal);
    } catch (cause) {
      if (signal?.aborted) {
        throw new FetchCancelledError({ partial: snapshot(chatId, acc), cause: signal.reason });
      }
      throw new PaginationError({ page, partial: snapshot(chatId, acc), cause });
    }

    for (const [id, name] of batch.users) acc.users.set(id, name);
    for (const [id, name] of batch.chats) acc.chats.set(id, name);

    if (batch.messages.length === 0 && !batch.hasMore) {
      acc.hasMore = false;
      notify(page, undefined);
      break;
    }

    const earliest = earliestOf(batch.messages);

    let reachedMinDate = false;
    let reachedMaxCount = false;
    for (const msg of batch.messages) {
      if (opts.minDate && msg.date < opts.minDate) {
        reachedMinDate = true;
        break;
      }
      if (opts.maxDate && msg.date > opts.maxDate) continue;
      acc.messages.push(msg);
      if (maxCount > 0 && acc.messages.length >= maxCount) {
        reachedMaxCount = true;
        break;
      }
    }

    notify(page, earliest);

    acc.hasMore = batch.hasMore && !reachedMinDate;
    acc.nextId = batch.nextId;
    if (reachedMinDate || reachedMaxCount || !batch.hasMore) break;

    pageOpts.offsetId = batch.nextId;
    pageOpts.offsetDate = undefined;
  }

  return snapshot(chatId, acc);
}
