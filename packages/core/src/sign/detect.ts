/**
 * Sign convention detection.
 *
 * Debits are assumed to outnumber credits in a statement, so the more common
 * sign is taken to be the debit sign. This misreads accounts dominated by
 * deposits; there is no account-type detection.
 */

import Decimal from 'decimal.js';
import type { ColumnMapping, SourceSign, Transaction } from '../types/index.js';

/**
 * Infer one source's debit sign.
 *
 * - split format: debits are negative by construction (credit - debit), basis "columns"
 * - no non-zero amounts: negative, basis "empty"
 * - equal counts: negative, basis "tie"
 * - otherwise the dominant sign, basis "counts"
 *
 * Zero amounts are not counted.
 */
export function detectSourceSign(
    transactions: readonly Transaction[],
    format: ColumnMapping['format'] = 'signed'
): SourceSign {
    let positive = 0;
    let negative = 0;

    for (const txn of transactions) {
        const amount = new Decimal(txn.amount);
        if (amount.isZero()) continue;
        if (amount.isNegative()) {
            negative++;
        } else {
            positive++;
        }
    }

    const counts = { positive_count: positive, negative_count: negative };

    if (format === 'split') {
        return { debit_sign: 'negative', basis: 'columns', ...counts };
    }
    if (positive === 0 && negative === 0) {
        return { debit_sign: 'negative', basis: 'empty', ...counts };
    }
    if (positive === negative) {
        return { debit_sign: 'negative', basis: 'tie', ...counts };
    }
    return {
        debit_sign: positive > negative ? 'positive' : 'negative',
        basis: 'counts',
        ...counts,
    };
}
