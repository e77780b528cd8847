import { reconcile, parseCsv, resolveColumnMapping, acceptHighTier } from '@tally/core';
import type { CsvTable, ColumnMapping, ReconcileOutput } from '@tally/shared';

export const BANK_CSV = [
    'Date,Description,Amount',
    '2024-03-15,Coffee House,-4.50',
    '2024-03-20,Gym Membership,-25.00',
].join('\n');

export const PERSONAL_CSV = [
    'Date,Description,Amount',
    '2024-03-15,coffee house,-4.50',
    '2024-03-01,bookstore,-12.00',
    'soon,bad row,-1.00',
].join('\n');

export interface Loaded {
    table: CsvTable;
    mapping: ColumnMapping;
}

export function load(csv: string): Loaded {
    const table = parseCsv(csv);
    return { table, mapping: resolveColumnMapping(table.headers) };
}

/**
 * One high-tier match (coffee), one missing bank row (gym), one leftover
 * personal row (bookstore) and one unreadable personal row.
 */
export function sampleResult(personalCsv: string = PERSONAL_CSV, accept = true): ReconcileOutput {
    const bank = load(BANK_CSV);
    const personal = load(personalCsv);
    const result = reconcile({
        bank: { rows: bank.table.rows, mapping: bank.mapping },
        personal: { rows: personal.table.rows, mapping: personal.mapping },
    });
    return accept ? { ...result, matches: acceptHighTier(result.matches) } : result;
}
