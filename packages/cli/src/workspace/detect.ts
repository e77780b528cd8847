import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

/** Marks a directory as a workspace root. */
export const ALIASES_FILE = join('config', 'aliases.yaml');

/**
 * Nearest directory at or above `startPath` holding config/aliases.yaml,
 * or null when the filesystem root is reached without one.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    for (let dir = resolve(startPath); ; dir = dirname(dir)) {
        if (existsSync(join(dir, ALIASES_FILE))) return dir;
        if (dirname(dir) === dir) return null;
    }
}
