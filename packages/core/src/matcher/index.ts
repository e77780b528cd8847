/**
 * Matcher module: candidate filtering, scoring and classification of
 * bank/personal transaction pairs.
 */

export { matchTransactions } from './match-transactions.js';
export type { MatchTransactionsResult } from './match-transactions.js';
export {
    computeCutoffDate,
    filterPersonal,
    buildCandidateIndex,
    windowCandidates,
    intelligentCandidates,
    candidatesFor,
} from './candidates.js';
export {
    intelligentKey,
    isIntelligentMatch,
    amountScore,
    dateScore,
    fuzzyScore,
    scorePair,
} from './score.js';
export { descriptionSimilarity } from './similarity.js';
export { tierFor, comparePairs, assignPairs, classifyMatches } from './classify.js';
export type { ClassifyResult } from './classify.js';
export { describeMatch, describeMissing } from './reason.js';
export { createManualMatch } from './manual.js';
export type { ManualMatchTarget } from './manual.js';
export { daysBetween, addDays, isWithinDateTolerance } from './date-diff.js';
export type {
    ScoringConfig,
    FuzzyScore,
    PairScore,
    ScoredPair,
    CandidateFilterResult,
    CandidateIndex,
} from './types.js';
