import { createHash } from 'node:crypto';

/**
 * SHA-256 of file content, prefixed with 'sha256:'.
 * Takes the bytes already read so each input is read once.
 */
export function hashContent(content: Buffer | string): string {
    const hash = createHash('sha256').update(content).digest('hex');
    return `sha256:${hash}`;
}
