import { toCsv } from '@tally/core';
import type { ColumnMapping, CsvTable, ReconcileOutput } from '@tally/shared';

export const RECONCILED_HEADER = 'Reconciled';

/**
 * The personal file with its reconciled column set to `true` on every row
 * whose match was accepted. The column is appended when the file has none.
 * Other cells, blank-header columns included, are written back by position
 * exactly as read.
 */
export function buildReconciledCsv(table: CsvTable, mapping: ColumnMapping, result: ReconcileOutput): string {
    const existing = mapping.reconciled === null ? -1 : table.headers.indexOf(mapping.reconciled);
    const width = table.rows.reduce((max, row) => Math.max(max, row.cells.length), table.headers.length);
    const column = existing >= 0 ? existing : width;
    const headers = existing >= 0 ? [...table.headers] : [...pad(table.headers, width), RECONCILED_HEADER];

    const acceptedLines = new Set<number>();
    for (const match of result.matches) {
        if (match.status !== 'accepted' || match.personal_index === null) continue;
        const txn = result.personal[match.personal_index];
        if (txn) acceptedLines.add(txn.line);
    }

    const rows = table.rows.map(row => {
        const cells = pad(row.cells, Math.max(headers.length, row.cells.length));
        if (acceptedLines.has(row.line)) {
            cells[column] = 'true';
        }
        return cells;
    });

    return toCsv([headers, ...rows]);
}

function pad(cells: readonly string[], width: number): string[] {
    const out = [...cells];
    while (out.length < width) out.push('');
    return out;
}
