import os from 'node:os';
import path from 'node:path';
import process from 'node:process';

import { ExportPathError } from './errors.js';

const APP_DIR_NAME = 'chat-digest';
const MAX_FILENAME_LENGTH = 100;
const INVALID_FILENAME_CHARS = /[/\\:*?"<>|\n\r\t]/g;

type PlatformEnv = {
    platform?: NodeJS.Platform;
    env?: NodeJS.ProcessEnv;
    home?: string;
};

/** Per-user data directory for exports. */
export function defaultBackupDir(opts: PlatformEnv = {}): string {
    const platform = opts.platform ?? process.platform;
    const env = opts.env ?? process.env;
    const home = opts.home ?? os.homedir();

    // Joined with the target platform's separator, not the host's.
    const p = platform === 'win32' ? path.win32 : path.posix;

    switch (platform) {
        case 'darwin':
            return p.join(home, 'Library', 'Application Support', APP_DIR_NAME, 'backups');
        case 'win32':
            return p.join(env.APPDATA || p.join(home, 'AppData', 'Roaming'), APP_DIR_NAME, 'backups');
        default:
            return p.join(env.XDG_DATA_HOME || p.join(home, '.local', 'share'), APP_DIR_NAME, 'backups');
    }
}

export function sanitizeFilename(name: string): string {
    let result = name.replace(INVALID_FILENAME_CHARS, '_');
    result = result.replace(/^[ .]+|[ .]+$/g, '');
    if (result.length > MAX_FILENAME_LENGTH) result = result.slice(0, MAX_FILENAME_LENGTH);
    return result || 'backup';
}

/** Resolves `targetPath` and returns it when it lies inside one of `allowedPaths`. */
export function assertPathAllowed(targetPath: string, allowedPaths: readonly string[]): string {
    const absTarget = path.resolve(targetPath);

    for (const allowed of allowedPaths) {
        const rel = path.relative(path.resolve(allowed), absTarget);
        if (rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel))) return absTarget;
    }

    throw new ExportPathError(
        targetPath,
        `path "${targetPath}" is not within allowed directories. Configure EXPORT_ALLOWED_PATHS`,
    );
}
