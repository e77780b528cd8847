import type { MatchStrategy, ReconcileConfig, Transaction } from '../types/index.js';

/**
 * Scoring settings shared by the scorer, classifier and manual matches.
 */
export type ScoringConfig = Pick<ReconcileConfig, 'date_window_days' | 'amount_tolerance'>;

/**
 * Breakdown of a fuzzy score.
 */
export interface FuzzyScore {
    amount: number;
    date: number;
    description: number;
    composite: number;
}

/**
 * Best score for one (bank, personal) pair.
 */
export interface PairScore {
    confidence: number;
    strategy: Exclude<MatchStrategy, 'manual'>;
}

/**
 * A scored candidate pair. Indices point into the bank and personal arrays.
 */
export interface ScoredPair extends PairScore {
    bankIndex: number;
    personalIndex: number;
}

/**
 * Result of the candidate filter.
 */
export interface CandidateFilterResult {
    /** Personal indices that survived the reconciled and cutoff rules. */
    eligible: number[];
    reconciledFiltered: number;
    afterCutoffFiltered: number;
    cutoffDate: string | null;
}

/**
 * Lookup structures over eligible personal transactions.
 */
export interface CandidateIndex {
    personal: readonly Transaction[];
    /** Eligible personal indices sorted by (date, index). */
    byDate: number[];
    /** Eligible personal indices keyed by exact amount and first two description tokens. */
    byIntelligentKey: Map<string, number[]>;
}
