import { describe, it, expect } from 'vitest';
import type { Workbook, Worksheet } from 'exceljs';
import { generateReviewExcel, MATCH_COLUMNS } from '../src/excel/review.js';
import { sampleResult } from './fixtures.js';

function sheet(workbook: Workbook, name: string): Worksheet {
    const found = workbook.getWorksheet(name);
    if (!found) throw new Error(`Missing sheet ${name}`);
    return found;
}

describe('generateReviewExcel', () => {
    const result = sampleResult();

    it('creates the four review sheets in order', async () => {
        const wb = await generateReviewExcel(result);
        expect(wb.worksheets.map(ws => ws.name)).toEqual(['Matches', 'Missing', 'Unmatched Personal', 'Issues']);
    });

    it('lists matches lowest confidence first with both sides', async () => {
        const wb = await generateReviewExcel(result);
        const matches = sheet(wb, 'Matches');

        const headers = MATCH_COLUMNS.map((_, i) => matches.getRow(1).getCell(i + 1).value);
        expect(headers).toEqual(MATCH_COLUMNS.map(c => c.header));
        expect(matches.actualRowCount).toBe(3);

        const gym = matches.getRow(2);
        expect(gym.getCell('bank_description').value).toBe('Gym Membership');
        expect(gym.getCell('bank_amount').value).toBe(-25);
        expect(gym.getCell('personal_txn_id').value).toBeNull();
        expect(gym.getCell('tier').value).toBe('none');
        expect(gym.getCell('strategy').value).toBeNull();
        expect(gym.getCell('reason').value).toBe('no candidate found');

        const coffee = matches.getRow(3);
        expect(coffee.getCell('bank_txn_id').value).toBe(result.bank[0].txn_id);
        expect(coffee.getCell('personal_description').value).toBe('coffee house');
        expect(coffee.getCell('personal_amount').value).toBe(-4.5);
        expect(coffee.getCell('confidence').value).toBe(1);
        expect(coffee.getCell('tier').value).toBe('high');
        expect(coffee.getCell('status').value).toBe('accepted');
    });

    it('lists missing and leftover rows with their file line', async () => {
        const wb = await generateReviewExcel(result);

        const missing = sheet(wb, 'Missing').getRow(2);
        expect(missing.getCell('line').value).toBe(3);
        expect(missing.getCell('date').value).toBe('2024-03-20');
        expect(missing.getCell('amount').value).toBe(-25);

        const leftover = sheet(wb, 'Unmatched Personal').getRow(2);
        expect(leftover.getCell('description').value).toBe('bookstore');
        expect(leftover.getCell('amount').value).toBe(-12);
    });

    it('lists unreadable rows', async () => {
        const wb = await generateReviewExcel(result);
        const issues = sheet(wb, 'Issues');

        expect(issues.actualRowCount).toBe(2);
        expect(issues.getRow(2).getCell('source').value).toBe('personal');
        expect(issues.getRow(2).getCell('line').value).toBe(4);
        expect(issues.getRow(2).getCell('message').value).toBe('Unrecognized date "soon"');
    });
});
