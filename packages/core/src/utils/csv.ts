/**
 * CSV parsing utilities.
 *
 * SheetJS reads CSV text as a one-sheet workbook. Values are read raw so that
 * dates and amounts reach the normalizer exactly as written in the file.
 */

import * as XLSX from 'xlsx';
import type { CsvTable, SourceRow } from '../types/index.js';

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * BOM (\uFEFF) can interfere with column header matching in CSVs.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value);
}

function lineBreaks(cells: readonly string[]): number {
    let count = 0;
    for (const cell of cells) {
        for (const ch of cell) {
            if (ch === '\n') count++;
        }
    }
    return count;
}

/**
 * Parse decoded CSV text into headers and rows.
 *
 * The first record is the header row. Line numbers are 1-based physical
 * lines of the file, so the first data row after a one-line header is line 2
 * and a quoted cell spanning several lines pushes later rows down. Fully
 * blank lines are skipped but still counted.
 *
 * `values` is keyed by header and leaves out columns whose header is blank;
 * `cells` keeps every column by position.
 */
export function parseCsv(text: string): CsvTable {
    const workbook = XLSX.read(stripBom(text), { type: 'string', raw: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        return { headers: [], rows: [] };
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: '',
        blankrows: true,
    });

    if (grid.length === 0) {
        return { headers: [], rows: [] };
    }

    const headerCells = grid[0].map(cellText);
    const headers = headerCells.map(cell => stripBom(cell).trim());
    const rows: SourceRow[] = [];

    // Last physical line consumed so far.
    let line = 1 + lineBreaks(headerCells);

    for (let i = 1; i < grid.length; i++) {
        const cells = grid[i].map(cellText);
        const start = line + 1;
        line = start + lineBreaks(cells);

        if (cells.every(c => c.trim() === '')) {
            continue;
        }

        const values: Record<string, string> = {};
        headers.forEach((header, col) => {
            if (header === '') return;
            values[header] = cells[col] ?? '';
        });
        rows.push({ line: start, values, cells });
    }

    return { headers, rows };
}

/**
 * Write a grid of cells back to CSV text, one record per inner array.
 */
export function toCsv(records: ReadonlyArray<readonly string[]>): string {
    const sheet = XLSX.utils.aoa_to_sheet(records.map(record => [...record]));
    return XLSX.utils.sheet_to_csv(sheet);
}
