// Primary
export { RollingSummarizer, DEFAULT_SUMMARIZE_TUNING, NO_MESSAGES, NO_TEXT_MESSAGES } from './rolling.js';
export type { RollingSummarizerOptions } from './rolling.js';
export { splitIntoBatchesByTokens, DEFAULT_BATCH_TOKENS } from './batching.js';
export { estimateTokens, estimateMessageTokens } from './tokens.js';
export { buildPrompt } from './prompt.js';
export type { PromptParts } from './prompt.js';

// Providers
export * from './providers/index.js';

// Errors
export { ProviderError, ProviderHttpError, SummarizeCancelledError, SummarizeError } from './errors.js';

// Types
export type { Batch, Provider, ProviderName, SummarizeOptions, SummarizeProgress, SummarizeTuning } from './types.js';
