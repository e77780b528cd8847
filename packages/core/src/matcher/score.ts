/**
 * Pair scoring: intelligent match and weighted fuzzy match.
 *
 * PURE FUNCTIONS. Same inputs, same scores.
 */

import Decimal from 'decimal.js';
import type { Transaction } from '../types/index.js';
import { AMOUNT_EPSILON, INTELLIGENT_MATCH_CONFIDENCE, SCORE_WEIGHTS } from '../types/index.js';
import { formatAmount } from '../utils/amount.js';
import { leadingTokenKey } from '../utils/normalize.js';
import { daysBetween, isWithinDateTolerance } from './date-diff.js';
import { descriptionSimilarity } from './similarity.js';
import type { FuzzyScore, PairScore, ScoringConfig } from './types.js';

/**
 * Key shared by every pair the intelligent strategy accepts:
 * exact amount plus the first two description tokens.
 * Null when the description has fewer than two tokens.
 */
export function intelligentKey(txn: Transaction): string | null {
    const tokens = leadingTokenKey(txn.description);
    if (tokens === null) return null;
    return `${formatAmount(new Decimal(txn.amount))}|${tokens}`;
}

/**
 * True when first two tokens agree (apostrophes ignored, any case) and amounts are exactly equal.
 * Date is not considered.
 */
export function isIntelligentMatch(bank: Transaction, personal: Transaction): boolean {
    const bankTokens = leadingTokenKey(bank.description);
    if (bankTokens === null || bankTokens !== leadingTokenKey(personal.description)) {
        return false;
    }
    return new Decimal(bank.amount).equals(new Decimal(personal.amount));
}

/**
 * 1.0 at equal amounts, falling linearly to 0 at `tolerance` relative difference.
 *
 *   r = |bank - personal| / max(|bank|, 0.01)
 */
export function amountScore(bankAmount: string, personalAmount: string, tolerance: number): number {
    const bank = new Decimal(bankAmount);
    const personal = new Decimal(personalAmount);
    if (bank.equals(personal)) return 1;

    const denominator = Decimal.max(bank.abs(), new Decimal(AMOUNT_EPSILON));
    const relative = bank.minus(personal).abs().dividedBy(denominator);
    const score = new Decimal(1).minus(relative.dividedBy(tolerance));
    return score.isNegative() ? 0 : score.toNumber();
}

/**
 * 1.0 on the same day, falling linearly to 0 at the window edge; 0 outside.
 * A zero-day window scores 1 on the same day only.
 */
export function dateScore(bankDate: string, personalDate: string, windowDays: number): number {
    const days = daysBetween(bankDate, personalDate);
    if (days > windowDays) return 0;
    if (windowDays === 0) return 1;
    return 1 - days / windowDays;
}

/**
 * Weighted composite 0.3 * amount + 0.3 * date + 0.4 * description, clamped to [0, 1].
 */
export function fuzzyScore(bank: Transaction, personal: Transaction, config: ScoringConfig): FuzzyScore {
    const amount = amountScore(bank.amount, personal.amount, config.amount_tolerance);
    const date = dateScore(bank.date, personal.date, config.date_window_days);
    const description = descriptionSimilarity(bank.description, personal.description);

    const weighted =
        SCORE_WEIGHTS.AMOUNT * amount +
        SCORE_WEIGHTS.DATE * date +
        SCORE_WEIGHTS.DESCRIPTION * description;

    // Exact on all three must give exactly 1, whatever the float sum says
    const composite = amount === 1 && date === 1 && description === 1
        ? 1
        : Math.min(1, Math.max(0, weighted));

    return { amount, date, description, composite };
}

/**
 * Best score of a pair across both strategies.
 *
 * The higher confidence wins; on equal confidence the intelligent strategy is
 * reported. Fuzzy scoring only applies inside the date window. Null when
 * neither strategy yields a positive score.
 */
export function scorePair(bank: Transaction, personal: Transaction, config: ScoringConfig): PairScore | null {
    const intelligent = isIntelligentMatch(bank, personal) ? INTELLIGENT_MATCH_CONFIDENCE : 0;

    const inWindow = isWithinDateTolerance(bank.date, personal.date, config.date_window_days);
    const fuzzy = inWindow ? fuzzyScore(bank, personal, config).composite : 0;

    if (intelligent > 0 && intelligent >= fuzzy) {
        return { confidence: intelligent, strategy: 'intelligent' };
    }
    if (fuzzy > 0) {
        return { confidence: fuzzy, strategy: 'fuzzy' };
    }
    return null;
}
