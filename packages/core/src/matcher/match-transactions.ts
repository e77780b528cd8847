import type { MatchResult, Transaction } from '../types/index.js';
import { buildCandidateIndex, candidatesFor, filterPersonal } from './candidates.js';
import { classifyMatches } from './classify.js';
import { scorePair } from './score.js';
import type { ScoredPair, ScoringConfig } from './types.js';

export interface MatchTransactionsResult {
    matches: MatchResult[];
    missing: Transaction[];
    unmatched_personal: Transaction[];
    pairs: ScoredPair[];
    stats: {
        reconciled_filtered: number;
        after_cutoff_filtered: number;
        cutoff_date: string | null;
        pairs_scored: number;
    };
}

/**
 * Match bank transactions against sign-normalized personal transactions.
 *
 * PURE FUNCTION: inputs are not mutated. Each bank row is scored only against
 * its candidates (date window plus intelligent-key hits), never against the
 * whole personal set.
 */
export function matchTransactions(
    bank: readonly Transaction[],
    personal: readonly Transaction[],
    config: ScoringConfig & { min_confidence: number }
): MatchTransactionsResult {
    const filtered = filterPersonal(bank, personal);
    const index = buildCandidateIndex(personal, filtered.eligible);

    const pairs: ScoredPair[] = [];
    let pairsScored = 0;

    bank.forEach((bankTxn, bankIndex) => {
        for (const personalIndex of candidatesFor(index, bankTxn, config.date_window_days)) {
            pairsScored++;
            const score = scorePair(bankTxn, personal[personalIndex], config);
            if (score) {
                pairs.push({ bankIndex, personalIndex, ...score });
            }
        }
    });

    const classified = classifyMatches(bank, personal, pairs, filtered.eligible, config.min_confidence);

    return {
        ...classified,
        pairs,
        stats: {
            reconciled_filtered: filtered.reconciledFiltered,
            after_cutoff_filtered: filtered.afterCutoffFiltered,
            cutoff_date: filtered.cutoffDate,
            pairs_scored: pairsScored,
        },
    };
}
