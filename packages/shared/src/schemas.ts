/**
 * Zod schemas for Tally data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { RECONCILE_DEFAULTS, TXN_ID } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

/**
 * Transaction ID: 16-char hex, optionally with collision suffix.
 */
const txnId = z.string().regex(
    new RegExp(`^[0-9a-f]{${TXN_ID.LENGTH}}(-\\d{2,})?$`),
    `Must be ${TXN_ID.LENGTH}-char hex, optionally with -NN suffix`
);

const confidence = z.number().min(0).max(1);

export const SourceKindSchema = z.enum(['bank', 'personal']);

export type SourceKind = z.infer<typeof SourceKindSchema>;

// ============================================================================
// Raw input
// ============================================================================

/**
 * One data row of a CSV file, keyed by header, with its 1-based line number.
 * `cells` holds the same row by column position, blank headers included.
 */
export const SourceRowSchema = z.object({
    line: z.number().int().min(1),
    values: z.record(z.string(), z.string()),
    cells: z.array(z.string()),
});

export type SourceRow = z.infer<typeof SourceRowSchema>;

/**
 * Result of reading CSV text.
 */
export const CsvTableSchema = z.object({
    headers: z.array(z.string()),
    rows: z.array(SourceRowSchema),
});

export type CsvTable = z.infer<typeof CsvTableSchema>;

/**
 * Which header holds which field.
 * `split` sources carry separate debit and credit columns instead of one signed amount.
 */
export const ColumnMappingSchema = z.object({
    date: z.string(),
    description: z.string(),
    amount: z.string().nullable(),
    debit: z.string().nullable(),
    credit: z.string().nullable(),
    reconciled: z.string().nullable(),
    format: z.enum(['signed', 'split']),
});

export type ColumnMapping = z.infer<typeof ColumnMappingSchema>;

// ============================================================================
// Transaction Schema
// ============================================================================

/**
 * Normalized transaction, one per accepted source row.
 */
export const TransactionSchema = z.object({
    txn_id: txnId,
    source: SourceKindSchema,
    line: z.number().int().min(1),
    date: isoDateString,
    amount: decimalString,
    description: z.string(),
    raw_description: z.string(),
    reconciled: z.boolean(),
});

export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * A row that could not be normalized. The row is excluded from matching
 * and reported to the caller.
 */
export const NormalizationIssueSchema = z.object({
    source: SourceKindSchema,
    line: z.number().int().min(1),
    field: z.enum(['date', 'amount']),
    value: z.string(),
    message: z.string(),
});

export type NormalizationIssue = z.infer<typeof NormalizationIssueSchema>;

// ============================================================================
// Aliases
// ============================================================================

export const AliasEntrySchema = z.object({
    alias: z.string().trim().min(1),
    canonical: z.string().trim().min(1),
    added_date: isoDateString.optional(),
    note: z.string().optional(),
});

export type AliasEntry = z.infer<typeof AliasEntrySchema>;

/**
 * An `aliases:` key with nothing under it is an empty list.
 */
export const AliasFileSchema = z.object({
    aliases: z.array(AliasEntrySchema).nullish().transform(list => list ?? []),
});

export type AliasFile = z.infer<typeof AliasFileSchema>;

// ============================================================================
// Sign Convention
// ============================================================================

/**
 * Inferred polarity of one source.
 * basis:
 * - counts:  dominant sign by count
 * - tie:     equal counts, defaulted to negative debits
 * - empty:   no non-zero amounts, defaulted to negative debits
 * - columns: split debit/credit columns fixed the sign at load time
 */
export const SourceSignSchema = z.object({
    debit_sign: z.enum(['negative', 'positive']),
    basis: z.enum(['counts', 'tie', 'empty', 'columns']),
    positive_count: z.number().int().min(0),
    negative_count: z.number().int().min(0),
});

export type SourceSign = z.infer<typeof SourceSignSchema>;

export const SignConventionSchema = z.object({
    bank: SourceSignSchema,
    personal: SourceSignSchema,
    inverted: z.boolean(),
});

export type SignConvention = z.infer<typeof SignConventionSchema>;

export const ReconcileWarningSchema = z.object({
    kind: z.literal('sign_inference'),
    source: SourceKindSchema,
    message: z.string(),
});

export type ReconcileWarning = z.infer<typeof ReconcileWarningSchema>;

// ============================================================================
// Match Results
// ============================================================================

export const ConfidenceTierSchema = z.enum(['high', 'medium', 'low', 'none']);

export type ConfidenceTier = z.infer<typeof ConfidenceTierSchema>;

export const MatchStrategySchema = z.enum(['intelligent', 'fuzzy', 'manual']);

export type MatchStrategy = z.infer<typeof MatchStrategySchema>;

export const MatchStatusSchema = z.enum(['pending', 'accepted', 'rejected']);

export type MatchStatus = z.infer<typeof MatchStatusSchema>;

/**
 * Pairing of one bank transaction with at most one personal transaction.
 * `status` is only ever changed by an explicit review decision.
 */
export const MatchResultSchema = z.object({
    bank_txn_id: txnId,
    bank_index: z.number().int().min(0),
    personal_txn_id: txnId.nullable(),
    personal_index: z.number().int().min(0).nullable(),
    confidence,
    tier: ConfidenceTierSchema,
    strategy: MatchStrategySchema.nullable(),
    status: MatchStatusSchema,
    reason: z.string(),
});

export type MatchResult = z.infer<typeof MatchResultSchema>;

/**
 * Counters for transparency.
 */
export const ReconcileStatsSchema = z.object({
    bank_rows: z.number().int().min(0),
    personal_rows: z.number().int().min(0),
    normalization_failures: z.number().int().min(0),
    personal_reconciled_filtered: z.number().int().min(0),
    personal_after_cutoff_filtered: z.number().int().min(0),
    cutoff_date: isoDateString.nullable(),
    high: z.number().int().min(0),
    medium: z.number().int().min(0),
    low: z.number().int().min(0),
    none: z.number().int().min(0),
});

export type ReconcileStats = z.infer<typeof ReconcileStatsSchema>;

// ============================================================================
// Configuration
// ============================================================================

/**
 * Caller-facing reconcile options.
 */
export const ReconcileConfigSchema = z.object({
    min_confidence: z.number()
        .min(0, 'min_confidence must be between 0 and 1')
        .max(1, 'min_confidence must be between 0 and 1')
        .default(RECONCILE_DEFAULTS.MIN_CONFIDENCE),
    date_window_days: z.number()
        .int('date_window_days must be a whole number of days')
        .min(0, 'date_window_days must not be negative')
        .default(RECONCILE_DEFAULTS.DATE_WINDOW_DAYS),
    amount_tolerance: z.number()
        .positive('amount_tolerance must be greater than 0')
        .default(RECONCILE_DEFAULTS.AMOUNT_TOLERANCE),
});

export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;

export type ReconcileConfigInput = z.input<typeof ReconcileConfigSchema>;

// ============================================================================
// Reconcile Output
// ============================================================================

/**
 * Everything a run produces.
 * Pure function pattern: results plus warnings as data, no side effects.
 */
export const ReconcileOutputSchema = z.object({
    bank: z.array(TransactionSchema),
    personal: z.array(TransactionSchema),
    matches: z.array(MatchResultSchema),
    missing: z.array(TransactionSchema),
    unmatched_personal: z.array(TransactionSchema),
    sign_convention: SignConventionSchema,
    issues: z.array(NormalizationIssueSchema),
    warnings: z.array(ReconcileWarningSchema),
    stats: ReconcileStatsSchema,
    config: ReconcileConfigSchema,
});

export type ReconcileOutput = z.infer<typeof ReconcileOutputSchema>;

// ============================================================================
// Run Manifest Schema
// ============================================================================

/**
 * Manifest written next to the exported review files.
 */
export const RunManifestSchema = z.object({
    run_id: z.string(),
    run_timestamp: z.string(),
    input_files: z.record(z.string(), z.string()),
    config: ReconcileConfigSchema,
    sign_convention: SignConventionSchema,
    stats: ReconcileStatsSchema,
    accepted: z.array(z.object({
        bank_txn_id: txnId,
        personal_txn_id: txnId,
    })),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
