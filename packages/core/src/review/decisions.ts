/**
 * Review decisions on MatchResults.
 *
 * PURE FUNCTIONS: every call returns a new array; the input is left as is.
 * Status is the only field a decision changes.
 */

import type { ConfidenceTier, MatchResult, MatchStatus } from '../types/index.js';
import { ReviewConflictError } from '../errors.js';

export interface MatchSummary {
    total: number;
    tiers: Record<ConfidenceTier, number>;
    statuses: Record<MatchStatus, number>;
}

/**
 * Set the status of one match.
 *
 * @throws RangeError when the index is out of range
 * @throws ReviewConflictError when accepting a match without a personal row,
 *   or whose personal row is already the target of another accepted match
 */
export function setMatchStatus(
    matches: readonly MatchResult[],
    index: number,
    status: MatchStatus
): MatchResult[] {
    if (index < 0 || index >= matches.length) {
        throw new RangeError(`Match index ${index} out of range for ${matches.length} matches`);
    }

    const target = matches[index];

    if (status === 'accepted') {
        if (target.personal_txn_id === null) {
            throw new ReviewConflictError(
                `Bank transaction ${target.bank_txn_id} has no personal counterpart to accept`
            );
        }
        const conflict = matches.find((m, i) =>
            i !== index && m.status === 'accepted' && m.personal_txn_id === target.personal_txn_id
        );
        if (conflict) {
            throw new ReviewConflictError(
                `Personal transaction ${target.personal_txn_id} is already accepted for bank transaction ${conflict.bank_txn_id}`
            );
        }
    }

    return matches.map((m, i) => (i === index ? { ...m, status } : m));
}

/**
 * Replace the match for a bank row, e.g. with a manual match.
 * The replacement starts pending.
 */
export function replaceMatch(matches: readonly MatchResult[], replacement: MatchResult): MatchResult[] {
    const index = matches.findIndex(m => m.bank_txn_id === replacement.bank_txn_id);
    if (index === -1) {
        throw new RangeError(`No match for bank transaction ${replacement.bank_txn_id}`);
    }
    return matches.map((m, i) => (i === index ? { ...replacement, status: 'pending' } : m));
}

/**
 * Accept every pending high-tier match.
 * The classifier never assigns a personal row twice, so these cannot conflict
 * with each other; a conflict with an earlier manual acceptance is skipped.
 */
export function acceptHighTier(matches: readonly MatchResult[]): MatchResult[] {
    let result = [...matches];
    matches.forEach((m, index) => {
        if (m.tier !== 'high' || m.status !== 'pending' || m.personal_txn_id === null) return;
        const taken = result.some((other, i) =>
            i !== index && other.status === 'accepted' && other.personal_txn_id === m.personal_txn_id
        );
        if (!taken) {
            result = setMatchStatus(result, index, 'accepted');
        }
    });
    return result;
}

/**
 * Count matches per tier and per status.
 */
export function summarizeMatches(matches: readonly MatchResult[]): MatchSummary {
    const summary: MatchSummary = {
        total: matches.length,
        tiers: { high: 0, medium: 0, low: 0, none: 0 },
        statuses: { pending: 0, accepted: 0, rejected: 0 },
    };
    for (const m of matches) {
        summary.tiers[m.tier]++;
        summary.statuses[m.status]++;
    }
    return summary;
}
