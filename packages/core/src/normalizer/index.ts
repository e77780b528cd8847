/**
 * Normalizer module: raw CSV rows to comparable Transactions.
 */

export { createAliasLookup, findSimilarAliases } from './aliases.js';
export type { AliasLookup, AliasSuggestion } from './aliases.js';
export {
    parseReconciledFlag,
    normalizeDate,
    normalizeAmount,
    normalizeSplitAmount,
    normalizeRow,
    normalizeSource,
} from './row.js';
export type { NormalizeOptions, NormalizeSourceResult } from './row.js';
