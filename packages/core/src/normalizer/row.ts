/**
 * Field normalization: raw CSV rows to Transactions.
 *
 * PURE FUNCTIONS. A row that fails is reported as a NormalizationIssue and
 * left out; it never stops the rest of the source from loading.
 */

import Decimal from 'decimal.js';
import type {
    ColumnMapping,
    NormalizationIssue,
    SourceKind,
    SourceRow,
    Transaction,
} from '../types/index.js';
import { NormalizationError } from '../errors.js';
import { parseAmount, formatAmount } from '../utils/amount.js';
import { parseDateText, inferDateOrder, formatIsoDate } from '../utils/date-parse.js';
import type { DateOrder } from '../utils/date-parse.js';
import { normalizeDescription } from '../utils/normalize.js';
import { generateTxnId, resolveCollisions } from '../utils/txn-id.js';
import type { AliasLookup } from './aliases.js';

const FALSE_FLAGS = new Set(['', 'false', '0', 'no', 'n']);

export interface NormalizeOptions {
    source: SourceKind;
    /** Day/month order for numeric dates. Inferred from the date column when omitted. */
    dateOrder?: DateOrder;
    aliasLookup?: AliasLookup | null;
}

export interface NormalizeSourceResult {
    transactions: Transaction[];
    issues: NormalizationIssue[];
    dateOrder: DateOrder;
}

/**
 * Interpret a reconciled/cleared cell.
 * Blank, "false", "0", "no" and "n" (any case) are false; anything else is true.
 */
export function parseReconciledFlag(value: string): boolean {
    return !FALSE_FLAGS.has(value.trim().toLowerCase());
}

/**
 * Parse a date cell to ISO YYYY-MM-DD.
 *
 * @throws NormalizationError when the value is not a recognizable calendar date
 */
export function normalizeDate(value: string, order: DateOrder = 'MDY'): string {
    const date = parseDateText(value, order);
    if (!date) {
        throw new NormalizationError('date', value, `Unrecognized date "${value}"`);
    }
    return formatIsoDate(date);
}

/**
 * Parse a signed amount cell.
 *
 * @throws NormalizationError when the value is blank or not a number
 */
export function normalizeAmount(value: string): Decimal {
    const amount = parseAmount(value);
    if (amount === null) {
        throw new NormalizationError('amount', value, `Unrecognized amount "${value}"`);
    }
    return amount;
}

/**
 * Combine split debit/credit cells into one signed amount: credit minus debit.
 * Either side may be blank (zero); both blank is an error. Magnitudes are
 * used, so a debit column written with minus signs reads the same.
 */
export function normalizeSplitAmount(debit: string, credit: string): Decimal {
    const debitBlank = debit.trim() === '';
    const creditBlank = credit.trim() === '';

    if (debitBlank && creditBlank) {
        throw new NormalizationError('amount', '', 'Both debit and credit are blank');
    }

    const debitAmount = debitBlank ? new Decimal(0) : normalizeAmount(debit).abs();
    const creditAmount = creditBlank ? new Decimal(0) : normalizeAmount(credit).abs();
    return creditAmount.minus(debitAmount);
}

function cell(row: SourceRow, column: string | null): string {
    if (column === null) return '';
    return row.values[column] ?? '';
}

/**
 * Normalize one row.
 *
 * @throws NormalizationError carrying the row's source and line
 */
export function normalizeRow(row: SourceRow, mapping: ColumnMapping, options: NormalizeOptions): Transaction {
    const { source } = options;

    try {
        const date = normalizeDate(cell(row, mapping.date), options.dateOrder ?? 'MDY');

        const amount = mapping.format === 'split'
            ? normalizeSplitAmount(cell(row, mapping.debit), cell(row, mapping.credit))
            : normalizeAmount(cell(row, mapping.amount));

        const rawDescription = cell(row, mapping.description);
        const normalized = normalizeDescription(rawDescription);
        const description = options.aliasLookup?.(normalized) ?? normalized;

        const reconciled = source === 'personal' && mapping.reconciled !== null
            ? parseReconciledFlag(cell(row, mapping.reconciled))
            : false;

        return {
            txn_id: generateTxnId(source, date, rawDescription, amount),
            source,
            line: row.line,
            date,
            amount: formatAmount(amount),
            description,
            raw_description: rawDescription,
            reconciled,
        };
    } catch (err) {
        if (err instanceof NormalizationError) {
            throw err.at(source, row.line);
        }
        throw err;
    }
}

/**
 * Normalize every row of one source.
 *
 * Rows that fail become issues. Same-content duplicates get collision
 * suffixes on their txn_id, in input order.
 */
export function normalizeSource(
    rows: readonly SourceRow[],
    mapping: ColumnMapping,
    options: NormalizeOptions
): NormalizeSourceResult {
    const dateOrder = options.dateOrder ?? inferDateOrder(rows.map(r => cell(r, mapping.date)));
    const transactions: Transaction[] = [];
    const issues: NormalizationIssue[] = [];

    for (const row of rows) {
        try {
            transactions.push(normalizeRow(row, mapping, { ...options, dateOrder }));
        } catch (err) {
            if (!(err instanceof NormalizationError)) throw err;
            issues.push(err.toIssue(options.source, row.line));
        }
    }

    return { transactions: resolveCollisions(transactions), issues, dateOrder };
}
