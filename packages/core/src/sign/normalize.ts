/**
 * Sign normalization: bring personal amounts into the bank's convention.
 *
 * PURE FUNCTION: bank transactions are never touched; personal transactions
 * are returned as new objects when inverted.
 */

import Decimal from 'decimal.js';
import type {
    ColumnMapping,
    ReconcileWarning,
    SignConvention,
    SourceKind,
    SourceSign,
    Transaction,
} from '../types/index.js';
import { formatAmount } from '../utils/amount.js';
import { detectSourceSign } from './detect.js';

export interface SignNormalizationOptions {
    bankFormat?: ColumnMapping['format'];
    personalFormat?: ColumnMapping['format'];
}

export interface SignNormalizationResult {
    personal: Transaction[];
    convention: SignConvention;
    warnings: ReconcileWarning[];
}

function signWarning(source: SourceKind, message: string): ReconcileWarning {
    return { kind: 'sign_inference', source, message };
}

/**
 * Decide whether personal amounts must be negated.
 *
 * One decision for the whole run. No inversion when either source has no
 * non-zero amounts or an even split of signs, or when either was loaded from
 * split debit/credit columns (its polarity is fixed by the layout).
 */
export function inferSignConvention(
    bank: SourceSign,
    personal: SourceSign
): { convention: SignConvention; warnings: ReconcileWarning[] } {
    const warnings: ReconcileWarning[] = [];

    if (bank.basis === 'empty') {
        warnings.push(signWarning('bank', 'No non-zero bank amounts; sign convention cannot be inferred, amounts left as loaded'));
    }
    if (personal.basis === 'empty') {
        warnings.push(signWarning('personal', 'No non-zero personal amounts; sign convention cannot be inferred, amounts left as loaded'));
    }

    // A tie defaults to negative debits but is never strong enough to invert on
    const inferable = bank.basis !== 'empty' && personal.basis !== 'empty' &&
        bank.basis !== 'tie' && personal.basis !== 'tie';
    const fromColumns = bank.basis === 'columns' || personal.basis === 'columns';
    const differs = bank.debit_sign !== personal.debit_sign;

    if (inferable && fromColumns && differs) {
        const source: SourceKind = personal.basis === 'columns' ? 'personal' : 'bank';
        warnings.push(signWarning(
            source,
            `The ${source} file uses separate debit/credit columns while the other file appears to record debits as ${source === 'personal' ? bank.debit_sign : personal.debit_sign}; amounts left as loaded`
        ));
    }

    return {
        convention: {
            bank,
            personal,
            inverted: inferable && !fromColumns && differs,
        },
        warnings,
    };
}

/**
 * Negate every personal amount when the convention says so.
 */
export function applySignConvention(
    personal: readonly Transaction[],
    convention: SignConvention
): Transaction[] {
    if (!convention.inverted) {
        return personal.map(txn => ({ ...txn }));
    }
    return personal.map(txn => ({
        ...txn,
        amount: formatAmount(new Decimal(txn.amount).negated()),
    }));
}

/**
 * Detect both conventions and align the personal side with the bank.
 * Running it again on its own output changes nothing.
 */
export function normalizeSigns(
    bank: readonly Transaction[],
    personal: readonly Transaction[],
    options: SignNormalizationOptions = {}
): SignNormalizationResult {
    const bankSign = detectSourceSign(bank, options.bankFormat);
    const personalSign = detectSourceSign(personal, options.personalFormat);
    const { convention, warnings } = inferSignConvention(bankSign, personalSign);

    return {
        personal: applySignConvention(personal, convention),
        convention,
        warnings,
    };
}
