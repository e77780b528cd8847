import type { Workbook } from 'exceljs';
import type { ReconcileOutput, Transaction } from '@tally/shared';
import { createWorkbook, addTableSheet, type SheetColumn } from './utils.js';

export const MATCH_COLUMNS: SheetColumn[] = [
    { header: 'bank_txn_id', key: 'bank_txn_id' },
    { header: 'bank_line', key: 'bank_line' },
    { header: 'bank_date', key: 'bank_date' },
    { header: 'bank_description', key: 'bank_description' },
    { header: 'bank_amount', key: 'bank_amount', currency: true },
    { header: 'personal_txn_id', key: 'personal_txn_id' },
    { header: 'personal_line', key: 'personal_line' },
    { header: 'personal_date', key: 'personal_date' },
    { header: 'personal_description', key: 'personal_description' },
    { header: 'personal_amount', key: 'personal_amount', currency: true },
    { header: 'confidence', key: 'confidence' },
    { header: 'tier', key: 'tier' },
    { header: 'strategy', key: 'strategy' },
    { header: 'status', key: 'status' },
    { header: 'reason', key: 'reason' },
];

const TXN_COLUMNS: SheetColumn[] = [
    { header: 'txn_id', key: 'txn_id' },
    { header: 'line', key: 'line' },
    { header: 'date', key: 'date' },
    { header: 'description', key: 'description' },
    { header: 'amount', key: 'amount', currency: true },
];

const ISSUE_COLUMNS: SheetColumn[] = [
    { header: 'source', key: 'source' },
    { header: 'line', key: 'line' },
    { header: 'field', key: 'field' },
    { header: 'value', key: 'value' },
    { header: 'message', key: 'message' },
];

function txnRow(txn: Transaction): Record<string, string | number> {
    return {
        txn_id: txn.txn_id,
        line: txn.line,
        date: txn.date,
        description: txn.raw_description,
        amount: parseFloat(txn.amount),
    };
}

/**
 * Generates the review workbook: every match (lowest confidence first),
 * bank rows missing from the personal side, personal rows left over and
 * rows that could not be read.
 */
export async function generateReviewExcel(result: ReconcileOutput): Promise<Workbook> {
    const workbook = createWorkbook();

    const matchRows = [...result.matches]
        .sort((a, b) => a.confidence - b.confidence)
        .map(match => {
            const bank = result.bank[match.bank_index];
            const personal = match.personal_index === null ? undefined : result.personal[match.personal_index];
            return {
                bank_txn_id: match.bank_txn_id,
                bank_line: bank ? bank.line : null,
                bank_date: bank ? bank.date : null,
                bank_description: bank ? bank.raw_description : null,
                bank_amount: bank ? parseFloat(bank.amount) : null,
                personal_txn_id: match.personal_txn_id,
                personal_line: personal ? personal.line : null,
                personal_date: personal ? personal.date : null,
                personal_description: personal ? personal.raw_description : null,
                personal_amount: personal ? parseFloat(personal.amount) : null,
                confidence: Math.round(match.confidence * 1000) / 1000,
                tier: match.tier,
                strategy: match.strategy,
                status: match.status,
                reason: match.reason,
            };
        });

    addTableSheet(workbook, 'Matches', MATCH_COLUMNS, matchRows, 1);
    addTableSheet(workbook, 'Missing', TXN_COLUMNS, result.missing.map(txnRow));
    addTableSheet(workbook, 'Unmatched Personal', TXN_COLUMNS, result.unmatched_personal.map(txnRow));
    addTableSheet(workbook, 'Issues', ISSUE_COLUMNS, result.issues.map(issue => ({ ...issue })));

    return workbook;
}
