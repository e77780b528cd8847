/**
 * Classification: tiers and one-to-one assignment.
 *
 * Assignment is greedy over pairs sorted by confidence, which is a known
 * approximation of an optimal assignment, not one.
 */

import type { ConfidenceTier, MatchResult, Transaction } from '../types/index.js';
import { TIER_THRESHOLDS } from '../types/index.js';
import { describeMatch, describeMissing } from './reason.js';
import type { ScoredPair } from './types.js';

export interface ClassifyResult {
    matches: MatchResult[];
    missing: Transaction[];
    unmatched_personal: Transaction[];
}

/**
 * Map a confidence to its tier.
 */
export function tierFor(confidence: number): ConfidenceTier {
    if (confidence >= TIER_THRESHOLDS.HIGH) return 'high';
    if (confidence >= TIER_THRESHOLDS.MEDIUM) return 'medium';
    if (confidence >= TIER_THRESHOLDS.LOW) return 'low';
    return 'none';
}

/**
 * Order: confidence desc, then bank index asc, then personal index asc.
 */
export function comparePairs(a: ScoredPair, b: ScoredPair): number {
    if (a.confidence !== b.confidence) return b.confidence - a.confidence;
    if (a.bankIndex !== b.bankIndex) return a.bankIndex - b.bankIndex;
    return a.personalIndex - b.personalIndex;
}

/**
 * Greedy one-to-one assignment.
 *
 * Pairs below `minConfidence` (or at zero) are dropped. A pair is taken
 * unless its bank or personal side is already assigned, so a bank row that
 * loses its best personal row falls through to its next-best pair.
 *
 * @returns chosen pair per bank index
 */
export function assignPairs(pairs: readonly ScoredPair[], minConfidence: number): Map<number, ScoredPair> {
    const sorted = pairs
        .filter(p => p.confidence > 0 && p.confidence >= minConfidence)
        .sort(comparePairs);

    const byBank = new Map<number, ScoredPair>();
    const usedPersonal = new Set<number>();

    for (const pair of sorted) {
        if (byBank.has(pair.bankIndex) || usedPersonal.has(pair.personalIndex)) continue;
        byBank.set(pair.bankIndex, pair);
        usedPersonal.add(pair.personalIndex);
    }

    return byBank;
}

/**
 * Build the final result set: one MatchResult per bank transaction, in bank order.
 *
 * @param eligible - personal indices that survived the candidate filter;
 *   those left unassigned are reported as unmatched
 */
export function classifyMatches(
    bank: readonly Transaction[],
    personal: readonly Transaction[],
    pairs: readonly ScoredPair[],
    eligible: readonly number[],
    minConfidence: number
): ClassifyResult {
    const assigned = assignPairs(pairs, minConfidence);
    const matches: MatchResult[] = [];
    const missing: Transaction[] = [];

    bank.forEach((bankTxn, bankIndex) => {
        const pair = assigned.get(bankIndex);
        if (!pair) {
            missing.push(bankTxn);
            matches.push({
                bank_txn_id: bankTxn.txn_id,
                bank_index: bankIndex,
                personal_txn_id: null,
                personal_index: null,
                confidence: 0,
                tier: 'none',
                strategy: null,
                status: 'pending',
                reason: describeMissing(),
            });
            return;
        }

        const personalTxn = personal[pair.personalIndex];
        matches.push({
            bank_txn_id: bankTxn.txn_id,
            bank_index: bankIndex,
            personal_txn_id: personalTxn.txn_id,
            personal_index: pair.personalIndex,
            confidence: pair.confidence,
            tier: tierFor(pair.confidence),
            strategy: pair.strategy,
            status: 'pending',
            reason: describeMatch(bankTxn, personalTxn, pair.strategy),
        });
    });

    const assignedPersonal = new Set([...assigned.values()].map(p => p.personalIndex));
    const unmatched_personal = eligible
        .filter(index => !assignedPersonal.has(index))
        .map(index => personal[index]);

    return { matches, missing, unmatched_personal };
}
