/**
 * Transaction ID generation and collision handling.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import type Decimal from 'decimal.js';
import type { SourceKind, Transaction } from '../types/index.js';
import { TXN_ID } from '../types/index.js';
import { formatAmount } from './amount.js';

/**
 * Generate deterministic transaction ID via SHA-256 hash.
 *
 * Payload format: "{source}|{date}|{raw_description}|{amount}"
 *
 *   - date: ISO 8601 YYYY-MM-DD
 *   - raw_description: as read (NO normalization before hash)
 *   - amount: canonical decimal string, as read (before sign normalization)
 *
 * @returns 16-character hex transaction ID
 */
export function generateTxnId(
    source: SourceKind,
    date: string,
    rawDescription: string,
    amount: Decimal
): string {
    const payload = `${source}|${date}|${rawDescription}|${formatAmount(amount)}`;
    return sha256(payload).slice(0, TXN_ID.LENGTH);
}

/**
 * Resolve collisions by adding deterministic suffixes.
 *
 * Same-content duplicates within one source get -02, -03, etc. in input order.
 * Suffixes keep counting past -99 (-100, -101, ...).
 *
 * PURE FUNCTION: Returns new array with updated IDs. Does not mutate input.
 */
export function resolveCollisions(transactions: readonly Transaction[]): Transaction[] {
    const seen: Record<string, number> = {};
    const result: Transaction[] = [];

    for (const txn of transactions) {
        const baseId = txn.txn_id;

        if (seen[baseId]) {
            seen[baseId] += 1;
            const suffix = String(seen[baseId]).padStart(2, '0');
            result.push({
                ...txn,
                txn_id: `${baseId}-${suffix}`,
            });
        } else {
            seen[baseId] = TXN_ID.COLLISION_SUFFIX_START - 1;
            result.push({ ...txn });
        }
    }

    return result;
}
