/**
 * Reconcile a bank statement against a personal ledger.
 *
 * PURE FUNCTION: rows in, results plus warnings and issues out. No file
 * system, no console. Configuration is checked before any row is touched.
 */

import type {
    AliasEntry,
    ColumnMapping,
    ReconcileConfigInput,
    ReconcileOutput,
    SourceRow,
} from './types/index.js';
import { resolveConfig } from './config.js';
import { createAliasLookup } from './normalizer/aliases.js';
import type { AliasLookup } from './normalizer/aliases.js';
import { normalizeSource } from './normalizer/row.js';
import { normalizeSigns } from './sign/normalize.js';
import { matchTransactions } from './matcher/match-transactions.js';
import { summarizeMatches } from './review/decisions.js';

export interface ReconcileSource {
    rows: readonly SourceRow[];
    mapping: ColumnMapping;
}

export interface ReconcileInput {
    bank: ReconcileSource;
    personal: ReconcileSource;
    config?: ReconcileConfigInput;
    /** Alias entries, or a ready-made lookup. */
    aliases?: ReadonlyArray<Pick<AliasEntry, 'alias' | 'canonical'>> | AliasLookup;
}

function toLookup(aliases: ReconcileInput['aliases']): AliasLookup | null {
    if (aliases === undefined) return null;
    if (typeof aliases === 'function') return aliases;
    return createAliasLookup(aliases);
}

export function reconcile(input: ReconcileInput): ReconcileOutput {
    const config = resolveConfig(input.config);
    const aliasLookup = toLookup(input.aliases);

    const bankLoad = normalizeSource(input.bank.rows, input.bank.mapping, { source: 'bank', aliasLookup });
    const personalLoad = normalizeSource(input.personal.rows, input.personal.mapping, { source: 'personal', aliasLookup });

    const signs = normalizeSigns(bankLoad.transactions, personalLoad.transactions, {
        bankFormat: input.bank.mapping.format,
        personalFormat: input.personal.mapping.format,
    });

    const bank = bankLoad.transactions;
    const personal = signs.personal;
    const matched = matchTransactions(bank, personal, config);
    const summary = summarizeMatches(matched.matches);

    return {
        bank,
        personal,
        matches: matched.matches,
        missing: matched.missing,
        unmatched_personal: matched.unmatched_personal,
        sign_convention: signs.convention,
        issues: [...bankLoad.issues, ...personalLoad.issues],
        warnings: signs.warnings,
        stats: {
            bank_rows: input.bank.rows.length,
            personal_rows: input.personal.rows.length,
            normalization_failures: bankLoad.issues.length + personalLoad.issues.length,
            personal_reconciled_filtered: matched.stats.reconciled_filtered,
            personal_after_cutoff_filtered: matched.stats.after_cutoff_filtered,
            cutoff_date: matched.stats.cutoff_date,
            ...summary.tiers,
        },
        config,
    };
}
