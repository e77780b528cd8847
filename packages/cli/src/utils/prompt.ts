import { createInterface } from 'node:readline/promises';
import type { ReconcileOptions } from '../types.js';

const YES = new Set(['y', 'yes']);

/**
 * Asks a yes/no question on the terminal; anything but y/yes is a no.
 * `--yes` answers for the user. Without a TTY and without `--yes`
 * nobody can answer, so the answer is no.
 */
export async function promptContinue(message: string, options: Pick<ReconcileOptions, 'yes'>): Promise<boolean> {
    if (options.yes) return true;

    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --yes to continue past rows that could not be read.');
        return false;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        const answer = await rl.question(`${message} [y/N] `);
        return YES.has(answer.trim().toLowerCase());
    } finally {
        rl.close();
    }
}
