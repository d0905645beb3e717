import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { DEFAULT_HISTORY_TUNING, DEFAULT_HEARTBEAT_MS, type HistoryTuning } from '@chat-digest/history';
import { DEFAULT_SUMMARIZE_TUNING, isProviderName, type ProviderConfig, type ProviderName } from '@chat-digest/summarize';
import dotenv from 'dotenv';

import { ConfigError } from './errors.js';
import { defaultBackupDir } from './paths.js';

export type ServiceConfig = {
    provider: ProviderConfig;
    batchTokens: number;
    heartbeatMs: number;
    history: HistoryTuning;
    /** Directories exports may be written to; the first one receives auto-named files. */
    exportAllowedPaths: string[];
};

let cachedConfig: ServiceConfig | null = null;

const APP_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const REPO_ROOT = path.resolve(APP_ROOT, '..', '..');
const ROOT_ENV_PATH = path.join(REPO_ROOT, '.env');
const APP_LOCAL_ENV_PATH = path.join(APP_ROOT, '.env.local');
const APP_ENV_PATH = path.join(APP_ROOT, '.env');

function loadEnv() {
    const explicitPath = String(process.env.DOTENV_CONFIG_PATH ?? '').trim();
    if (explicitPath) {
        dotenv.config({ path: explicitPath, override: true });
        return;
    }

    const rootResult = dotenv.config({ path: ROOT_ENV_PATH, override: true });
    if (!rootResult.error) return;

    const localResult = dotenv.config({ path: APP_LOCAL_ENV_PATH, override: true });
    if (!localResult.error) return;

    dotenv.config({ path: APP_ENV_PATH, override: true });
}

function readEnv(name: string): string {
    return String(process.env[name] ?? '').trim();
}

function requireEnv(name: string, reason: string): string {
    const value = readEnv(name);
    if (!value) throw new ConfigError(name, `Missing required env var: ${name} (${reason})`);
    return value;
}

function positiveInt(name: string, fallback: number): number {
    const raw = readEnv(name);
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(name, `Invalid env var: ${name} (expected a positive integer, got "${raw}")`);
    }
    return value;
}

function requireProviderName(): ProviderName {
    const value = readEnv('SUMMARIZE_PROVIDER').toLowerCase() || 'sampling';
    if (isProviderName(value)) return value;
    throw new ConfigError(
        'SUMMARIZE_PROVIDER',
        'Missing or invalid env var: SUMMARIZE_PROVIDER (expected "sampling", "ollama", "gemini" or "anthropic")',
    );
}

function providerConfig(): ProviderConfig {
    const provider = requireProviderName();
    const model = readEnv('SUMMARIZE_MODEL') || undefined;
    const timeoutMs = DEFAULT_SUMMARIZE_TUNING.providerTimeoutMs;

    switch (provider) {
        case 'sampling':
            return { provider, model, timeoutMs };
        case 'ollama':
            return {
                provider,
                model: requireEnv('SUMMARIZE_MODEL', 'the ollama provider needs a model'),
                ollamaUrl: readEnv('OLLAMA_URL') || undefined,
                timeoutMs,
            };
        case 'gemini':
            return { provider, model, geminiApiKey: requireEnv('GEMINI_API_KEY', 'required for gemini'), timeoutMs };
        case 'anthropic':
            return {
                provider,
                model,
                anthropicApiKey: requireEnv('ANTHROPIC_API_KEY', 'required for anthropic'),
                timeoutMs,
            };
    }
}

function exportAllowedPaths(): string[] {
    const paths = readEnv('EXPORT_ALLOWED_PATHS')
        .split(path.delimiter)
        .map(p => p.trim())
        .filter(Boolean)
        .map(p => path.resolve(p));
    return paths.length > 0 ? paths : [defaultBackupDir()];
}

export function getServiceConfig(): ServiceConfig {
    if (cachedConfig) return cachedConfig;
    loadEnv();

    cachedConfig = {
        provider: providerConfig(),
        batchTokens: positiveInt('SUMMARIZE_BATCH_TOKENS', DEFAULT_SUMMARIZE_TUNING.batchTokens),
        heartbeatMs: positiveInt('SUMMARIZE_HEARTBEAT_MS', DEFAULT_HEARTBEAT_MS),
        history: { ...DEFAULT_HISTORY_TUNING },
        exportAllowedPaths: exportAllowedPaths(),
    };

    return cachedConfig;
}

export function resetConfigCache(): void {
    cachedConfig = null;
}
