// Primary
export { createChatDigest } from './service.js';
export type { ChatDigest, ChatDigestOptions } from './service.js';
export { summarizeChat } from './operations/summarize-chat.js';
export type { SummarizeChatDeps, SummarizeChatInput } from './operations/summarize-chat.js';
export { exportChat, DEFAULT_EXPORT_COUNT } from './operations/export-chat.js';
export type { ExportChatDeps, ExportChatInput, ExportChatResult } from './operations/export-chat.js';
export { createTelegramChatDigest, createTelegramHistory } from './telegram.js';

// Configuration
export { getServiceConfig, resetConfigCache } from './config.js';
export type { ServiceConfig } from './config.js';
export { assertPathAllowed, defaultBackupDir, sanitizeFilename } from './paths.js';
export { fileTimestamp, parseLocalDate, resolveSince } from './dates.js';
export type { Period } from './dates.js';

// Errors
export { ConfigError, ExportPathError, InvalidInputError } from './errors.js';
