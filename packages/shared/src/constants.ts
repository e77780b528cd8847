/**
 * Fixed constants for Tally.
 * Weights and thresholds are inspectable values, never learned or tuned at run time.
 */

/**
 * Weights of the fuzzy composite score.
 * amount + date + description = 1.0
 */
export const SCORE_WEIGHTS = {
    AMOUNT: 0.3,
    DATE: 0.3,
    DESCRIPTION: 0.4,
} as const;

/**
 * Confidence assigned by the intelligent (first two words + exact amount) strategy.
 */
export const INTELLIGENT_MATCH_CONFIDENCE = 0.9;

/**
 * Lower bounds of each confidence tier.
 * Anything below LOW is tier "none".
 */
export const TIER_THRESHOLDS = {
    HIGH: 0.9,
    MEDIUM: 0.5,
    LOW: 0.1,
} as const;

/**
 * Defaults for the caller-facing reconcile configuration.
 */
export const RECONCILE_DEFAULTS = {
    MIN_CONFIDENCE: 0.1,
    DATE_WINDOW_DAYS: 3,
    AMOUNT_TOLERANCE: 0.05,
} as const;

/**
 * Default similarity an existing alias needs to be suggested for a description.
 */
export const ALIAS_SUGGESTION_THRESHOLD = 0.8;

/**
 * Denominator floor for relative amount differences, so a zero bank amount
 * does not divide by zero.
 */
export const AMOUNT_EPSILON = '0.01';

/**
 * Personal rows dated later than the last bank date plus this cushion
 * cannot be confirmed yet.
 */
export const CUTOFF_CUSHION_DAYS = 1;

/**
 * Transaction ID configuration.
 */
export const TXN_ID = {
    LENGTH: 16,
    COLLISION_SUFFIX_START: 2,
} as const;

/**
 * Description similarity bands used in human-readable match reasons.
 */
export const REASON_SIMILARITY = {
    NEARLY_IDENTICAL: 0.95,
    SIMILAR: 0.8,
} as const;
