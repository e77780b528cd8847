import { describe, it, expect } from 'vitest';
import { parseCsv, toCsv, stripBom } from '../../src/utils/csv.js';

describe('stripBom', () => {
    it('removes a leading byte order mark', () => {
        expect(stripBom('\uFEFFDate')).toBe('Date');
        expect(stripBom('Date')).toBe('Date');
    });
});

describe('parseCsv', () => {
    it('reads headers and rows as text', () => {
        const table = parseCsv('\uFEFFDate, Description ,Amount\n03/15/2024,"TRADER JOES, #123",-42.50\n');

        expect(table.headers).toEqual(['Date', 'Description', 'Amount']);
        expect(table.rows).toEqual([
            {
                line: 2,
                values: { Date: '03/15/2024', Description: 'TRADER JOES, #123', Amount: '-42.50' },
                cells: ['03/15/2024', 'TRADER JOES, #123', '-42.50'],
            },
        ]);
    });

    it('keeps amounts exactly as written', () => {
        const table = parseCsv('Amount\n1.10\n0007\n');
        expect(table.rows.map(r => r.values['Amount'])).toEqual(['1.10', '0007']);
    });

    it('numbers rows by physical line when a quoted cell spans lines', () => {
        const table = parseCsv('Date,Description,Amount\n2024-03-15,"Coffee\nShop",-3.50\nbad,X,1');

        expect(table.rows.map(r => r.line)).toEqual([2, 4]);
        expect(table.rows[0].values['Description']).toBe('Coffee\nShop');
    });

    it('counts skipped blank lines', () => {
        const table = parseCsv('Date,Amount\n2024-03-15,1\n\n2024-03-16,2\n');
        expect(table.rows.map(r => r.line)).toEqual([2, 4]);
    });

    it('keeps blank-header columns by position only', () => {
        const table = parseCsv('Date,,Amount\n2024-03-15,memo,-1.00\n');

        expect(table.headers).toEqual(['Date', '', 'Amount']);
        expect(table.rows[0].values).toEqual({ Date: '2024-03-15', Amount: '-1.00' });
        expect(table.rows[0].cells).toEqual(['2024-03-15', 'memo', '-1.00']);
    });

    it('returns no rows for a header-only file', () => {
        expect(parseCsv('Date,Amount\n').rows).toEqual([]);
    });
});

describe('toCsv', () => {
    it('writes one line per record, quoting commas', () => {
        const text = toCsv([['a', 'b'], ['1', 'x,y'], ['2', '']]);
        expect(text.split('\n').slice(0, 3)).toEqual(['a,b', '1,"x,y"', '2,']);
    });
});
