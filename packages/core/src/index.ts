// Types (re-exported from shared)
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
} from './types/index.js';

export {
    TransactionSchema,
    MatchResultSchema,
    ReconcileConfigSchema,
    SCORE_WEIGHTS,
    INTELLIGENT_MATCH_CONFIDENCE,
    TIER_THRESHOLDS,
    RECONCILE_DEFAULTS,
    TXN_ID,
    ALIAS_SUGGESTION_THRESHOLD,
} from './types/index.js';

// Errors
export {
    TallyError,
    NormalizationError,
    ConfigurationError,
    ColumnMappingError,
    ReviewConflictError,
} from './errors.js';
export type { TallyErrorCode } from './errors.js';

// Utils
export { generateTxnId, resolveCollisions } from './utils/index.js';
export { normalizeDescription, leadingTokenKey } from './utils/index.js';
export { parseAmount, formatAmount, displayAmount } from './utils/index.js';
export { parseDateText, inferDateOrder, formatIsoDate } from './utils/index.js';
export type { DateOrder } from './utils/index.js';
export { parseCsv, toCsv, stripBom } from './utils/index.js';

// Columns
export { resolveColumnMapping, COLUMN_KEYWORDS, HEADER_SIMILARITY_THRESHOLD } from './columns/index.js';

// Normalizer
export {
    createAliasLookup,
    findSimilarAliases,
    parseReconciledFlag,
    normalizeDate,
    normalizeAmount,
    normalizeSplitAmount,
    normalizeRow,
    normalizeSource,
} from './normalizer/index.js';
export type { AliasLookup, AliasSuggestion, NormalizeOptions, NormalizeSourceResult } from './normalizer/index.js';

// Sign
export { detectSourceSign, inferSignConvention, applySignConvention, normalizeSigns } from './sign/index.js';
export type { SignNormalizationOptions, SignNormalizationResult } from './sign/index.js';

// Matcher
export {
    matchTransactions,
    filterPersonal,
    computeCutoffDate,
    scorePair,
    fuzzyScore,
    amountScore,
    dateScore,
    isIntelligentMatch,
    descriptionSimilarity,
    tierFor,
    classifyMatches,
    describeMatch,
    createManualMatch,
    daysBetween,
} from './matcher/index.js';
export type {
    MatchTransactionsResult,
    ScoringConfig,
    ScoredPair,
    PairScore,
    FuzzyScore,
    ManualMatchTarget,
} from './matcher/index.js';

// Review
export { setMatchStatus, replaceMatch, acceptHighTier, summarizeMatches } from './review/index.js';
export type { MatchSummary } from './review/index.js';

// Config and orchestration
export { resolveConfig } from './config.js';
export { reconcile } from './reconcile.js';
export type { ReconcileInput, ReconcileSource } from './reconcile.js';
