import { describe, it, expect } from 'vitest';
import { reconcile } from '../../src/reconcile.js';
import { ConfigurationError } from '../../src/errors.js';
import { parseCsv } from '../../src/utils/csv.js';
import { resolveColumnMapping } from '../../src/columns/resolve.js';
import type { ReconcileSource } from '../../src/reconcile.js';

function source(csv: string): ReconcileSource {
    const table = parseCsv(csv);
    return { rows: table.rows, mapping: resolveColumnMapping(table.headers) };
}

describe('reconcile', () => {
    it('pairs a bank row with a loosely described personal row by first two words', () => {
        const output = reconcile({
            bank: source('Date,Description,Amount\n2024-03-15,Trader Joes #123,-42.50\n'),
            personal: source("Date,Description,Amount\n2024-03-16,trader joe's grocery,-42.50\n"),
        });

        expect(output.matches).toHaveLength(1);
        expect(output.matches[0]).toMatchObject({
            personal_index: 0,
            confidence: 0.9,
            tier: 'high',
            strategy: 'intelligent',
            status: 'pending',
            reason: 'first two words match, exact amount, 1 day apart, different description',
        });
    });

    it('excludes reconciled rows and rows after the statement cutoff', () => {
        const output = reconcile({
            bank: source([
                'Date,Description,Amount',
                '2024-03-05,Hardware Store,-60.00',
                '2024-03-31,Monthly Fee,-5.00',
            ].join('\n')),
            personal: source([
                'Date,Description,Amount,Reconciled',
                '2024-03-05,hardware store,-60.00,yes',
                '2024-04-02,monthly fee,-5.00,',
            ].join('\n')),
        });

        expect(output.matches.map(m => m.personal_index)).toEqual([null, null]);
        expect(output.missing).toHaveLength(2);
        expect(output.unmatched_personal).toEqual([]);
        expect(output.stats).toMatchObject({
            personal_reconciled_filtered: 1,
            personal_after_cutoff_filtered: 1,
            cutoff_date: '2024-04-01',
            none: 2,
        });
    });

    it('inverts personal signs when the sources disagree', () => {
        const bankLines = ['Date,Description,Amount'];
        const personalLines = ['Date,Description,Amount'];
        for (let i = 1; i <= 10; i++) {
            const day = String(i).padStart(2, '0');
            const debit = i <= 8;
            bankLines.push(`2024-05-${day},Shop ${i} purchase,${debit ? '-' : ''}${i}.00`);
            personalLines.push(`2024-05-${day},shop ${i} purchase,${debit ? '' : '-'}${i}.00`);
        }

        const output = reconcile({ bank: source(bankLines.join('\n')), personal: source(personalLines.join('\n')) });

        expect(output.sign_convention.inverted).toBe(true);
        expect(output.sign_convention.bank.debit_sign).toBe('negative');
        expect(output.sign_convention.personal.debit_sign).toBe('positive');
        expect(output.personal[0].amount).toBe('-1');
        expect(output.personal[9].amount).toBe('10');
        expect(output.matches.every(m => m.tier === 'high')).toBe(true);
        expect(output.matches.map(m => m.personal_index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('reports unparseable rows as issues without stopping', () => {
        const output = reconcile({
            bank: source('Date,Description,Amount\n2024-03-15,Coffee House,-4.50\nsoon,Bad Row,-1.00\n'),
            personal: source('Date,Description,Amount\n2024-03-15,coffee house,-4.50\n'),
        });

        expect(output.issues).toEqual([
            { source: 'bank', line: 3, field: 'date', value: 'soon', message: 'Unrecognized date "soon"' },
        ]);
        expect(output.stats.normalization_failures).toBe(1);
        expect(output.stats.bank_rows).toBe(2);
        expect(output.matches).toHaveLength(1);
        expect(output.matches[0].confidence).toBe(1);
    });

    it('applies aliases to both sides', () => {
        const output = reconcile({
            bank: source('Date,Description,Amount\n2024-03-15,SBUX 0042,-6.00\n'),
            personal: source('Date,Description,Amount\n2024-03-15,starbucks 0042,-6.00\n'),
            aliases: [{ alias: 'sbux', canonical: 'starbucks' }],
        });

        expect(output.bank[0].description).toBe('starbucks 0042');
        expect(output.matches[0].confidence).toBe(1);
    });

    it('returns a sign warning when the personal file is empty', () => {
        const output = reconcile({
            bank: source('Date,Description,Amount\n2024-03-15,Coffee,-4.50\n'),
            personal: source('Date,Description,Amount\n'),
        });

        expect(output.warnings.map(w => w.source)).toEqual(['personal']);
        expect(output.missing).toHaveLength(1);
    });

    it('raises ConfigurationError before touching any row', () => {
        expect(() => reconcile({
            bank: source('Date,Description,Amount\n2024-03-15,Coffee,-4.50\n'),
            personal: source('Date,Description,Amount\n2024-03-15,Coffee,-4.50\n'),
            config: { min_confidence: 3 },
        })).toThrow(ConfigurationError);
    });

    it('honors min_confidence', () => {
        const output = reconcile({
            bank: source('Date,Description,Amount\n2024-03-15,Book Shop,-20.00\n'),
            personal: source('Date,Description,Amount\n2024-03-17,zz,-20.00\n'),
            config: { min_confidence: 0.5 },
        });

        expect(output.matches[0].personal_index).toBeNull();
        expect(output.unmatched_personal.map(t => t.description)).toEqual(['zz']);
        expect(output.config.min_confidence).toBe(0.5);
    });
});
