/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    SourceKind,
    SourceRow,
    CsvTable,
    ColumnMapping,
    Transaction,
    NormalizationIssue,
    AliasEntry,
    SourceSign,
    SignConvention,
    ReconcileWarning,
    ConfidenceTier,
    MatchStrategy,
    MatchStatus,
    MatchResult,
    ReconcileStats,
    ReconcileConfig,
    ReconcileConfigInput,
    ReconcileOutput,
} from '@tally/shared';

export {
    TransactionSchema,
    MatchResultSchema,
    ReconcileConfigSchema,
    SCORE_WEIGHTS,
    INTELLIGENT_MATCH_CONFIDENCE,
    TIER_THRESHOLDS,
    RECONCILE_DEFAULTS,
    AMOUNT_EPSILON,
    CUTOFF_CUSHION_DAYS,
    TXN_ID,
    REASON_SIMILARITY,
    ALIAS_SUGGESTION_THRESHOLD,
} from '@tally/shared';
