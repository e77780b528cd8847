/**
 * Human-readable match explanations.
 */

import Decimal from 'decimal.js';
import type { MatchStrategy, Transaction } from '../types/index.js';
import { REASON_SIMILARITY } from '../types/index.js';
import { daysBetween } from './date-diff.js';
import { descriptionSimilarity } from './similarity.js';

const STRATEGY_PREFIX: Record<MatchStrategy, string | null> = {
    intelligent: 'first two words match',
    fuzzy: null,
    manual: 'manual match',
};

/**
 * e.g. "first two words match, exact amount, 1 day apart, different description"
 */
export function describeMatch(bank: Transaction, personal: Transaction, strategy: MatchStrategy): string {
    const parts: string[] = [];

    const prefix = STRATEGY_PREFIX[strategy];
    if (prefix) parts.push(prefix);

    parts.push(new Decimal(bank.amount).equals(new Decimal(personal.amount)) ? 'exact amount' : 'different amount');

    const days = daysBetween(bank.date, personal.date);
    if (days === 0) {
        parts.push('same date');
    } else {
        parts.push(`${days} ${days === 1 ? 'day' : 'days'} apart`);
    }

    const similarity = descriptionSimilarity(bank.description, personal.description);
    if (similarity >= REASON_SIMILARITY.NEARLY_IDENTICAL) {
        parts.push('nearly identical description');
    } else if (similarity >= REASON_SIMILARITY.SIMILAR) {
        parts.push('similar description');
    } else {
        parts.push('different description');
    }

    return parts.join(', ');
}

export function describeMissing(): string {
    return 'no candidate found';
}
