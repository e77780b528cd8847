// Schemas
export {
    SourceKindSchema,
    SourceRowSchema,
    CsvTableSchema,
    ColumnMappingSchema,
    TransactionSchema,
    NormalizationIssueSchema,
    AliasEntrySchema,
    AliasFileSchema,
    SourceSignSchema,
    SignConventionSchema,
    ReconcileWarningSchema,
    ConfidenceTierSchema,
    MatchStrategySchema,
    MatchStatusSchema,
    MatchResultSchema,
    ReconcileStatsSchema,
    ReconcileConfigSchema,
    ReconcileOutputSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
export type {
    SourceKind,
    SourceRow,
    CsvTable,
    ColumnMapping,
    Transaction,
    NormalizationIssue,
    AliasEntry,
    AliasFile,
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
    RunManifest,
} from './schemas.js';

// Constants
export {
    SCORE_WEIGHTS,
    INTELLIGENT_MATCH_CONFIDENCE,
    TIER_THRESHOLDS,
    RECONCILE_DEFAULTS,
    AMOUNT_EPSILON,
    CUTOFF_CUSHION_DAYS,
    TXN_ID,
    REASON_SIMILARITY,
    ALIAS_SUGGESTION_THRESHOLD,
} from './constants.js';
