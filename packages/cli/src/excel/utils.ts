import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

export interface SheetColumn {
    header: string;
    key: string;
    currency?: boolean;
}

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(now: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Tally';
    workbook.created = now;
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen.
 */
export function formatHeaderRow(worksheet: Worksheet, frozenColumns = 0): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: frozenColumns, ySplit: 1 }
    ];
}

/**
 * Column widths from the longest cell text, between 10 and 100.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

export function formatCurrencyColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00;[Red]-#,##0.00';
    column.alignment = { horizontal: 'right' };
}

/**
 * Adds a formatted sheet with one row per record.
 */
export function addTableSheet(
    workbook: Workbook,
    name: string,
    columns: readonly SheetColumn[],
    rows: ReadonlyArray<Record<string, string | number | null>>,
    frozenColumns = 0
): Worksheet {
    const sheet = workbook.addWorksheet(name);
    sheet.columns = columns.map(c => ({ header: c.header, key: c.key }));

    for (const row of rows) {
        sheet.addRow(row);
    }

    formatHeaderRow(sheet, frozenColumns);
    for (const column of columns) {
        if (column.currency) formatCurrencyColumn(sheet, column.key);
    }
    autoFitColumns(sheet);

    return sheet;
}
