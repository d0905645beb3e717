// Primary
export { MessageFetcher, DEFAULT_HISTORY_TUNING } from './fetcher.js';
export type { HistoryTuning, MessageFetcherOptions } from './fetcher.js';
export { fetchAllPages, OFFSET_DATE_BUFFER_MS } from './paginator.js';
export { RateLimiter, sharedRateLimiter } from './rate-limiter.js';
export type { RateLimiterOptions } from './rate-limiter.js';
export { ProgressEstimator, PLATFORM_ORIGIN, DEFAULT_HEARTBEAT_MS } from './progress.js';
export type { ProgressEstimatorOptions, ProgressSnapshot } from './progress.js';

// Decoding & formatting
export { decodePage, decodeMessages, decodeMedia, userDisplayName, UNKNOWN_SENDER } from './decode.js';
export type { DecodedPage } from './decode.js';
export { extractSubstring } from './entities.js';
export {
  filterTextOnly,
  formatBatchForBackup,
  formatBatchForSummary,
  formatDate,
  formatForSummary,
  formatShortDate,
  toChronological,
} from './format.js';

// Errors
export { FetchCancelledError, HistoryError, PaginationError, PeerResolutionError, UpstreamError } from './errors.js';

// Types
export type {
  BatchCallback,
  ChatDirectory,
  FetchOptions,
  FetchResult,
  HistoryClient,
  HistoryRequest,
  Logger,
  MediaInfo,
  MediaType,
  Message,
  PeerKind,
  PeerRef,
  PeerResolver,
  ProgressNotification,
  ProgressSink,
  RawChat,
  RawEntity,
  RawHistoryPage,
  RawMedia,
  RawMessage,
  RawPhotoSize,
  RawUser,
  ResolvedPeer,
} from './types.js';
