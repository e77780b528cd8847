import { describe, it, expect } from 'vitest';
import { detectSourceSign } from '../../src/sign/detect.js';
import { normalizeSigns, inferSignConvention } from '../../src/sign/normalize.js';
import { bankTxn, personalTxn } from '../factories.js';
import type { Transaction } from '../../src/types/index.js';

function amounts(make: (o: Partial<Transaction>) => Transaction, values: string[]): Transaction[] {
    return values.map(amount => make({ amount }));
}

const mostlyNegative = ['-1', '-2', '-3', '-4', '-5', '-6', '-7', '-8', '9', '10'];
const mostlyPositive = ['1', '2', '3', '4', '5', '6', '7', '8', '-9', '-10'];

describe('detectSourceSign', () => {
    it('takes the dominant sign as the debit sign', () => {
        expect(detectSourceSign(amounts(bankTxn, mostlyPositive))).toEqual({
            debit_sign: 'positive',
            basis: 'counts',
            positive_count: 8,
            negative_count: 2,
        });
    });

    it('ignores zero amounts', () => {
        expect(detectSourceSign(amounts(bankTxn, ['0', '0', '-1']))).toEqual({
            debit_sign: 'negative',
            basis: 'counts',
            positive_count: 0,
            negative_count: 1,
        });
    });

    it('defaults a tie to negative debits', () => {
        expect(detectSourceSign(amounts(bankTxn, ['1', '-1'])).basis).toBe('tie');
        expect(detectSourceSign(amounts(bankTxn, ['1', '-1'])).debit_sign).toBe('negative');
    });

    it('reports empty sources', () => {
        expect(detectSourceSign([]).basis).toBe('empty');
        expect(detectSourceSign(amounts(bankTxn, ['0'])).basis).toBe('empty');
    });

    it('fixes the sign for split columns', () => {
        expect(detectSourceSign(amounts(bankTxn, mostlyPositive), 'split')).toEqual({
            debit_sign: 'negative',
            basis: 'columns',
            positive_count: 8,
            negative_count: 2,
        });
    });
});

describe('normalizeSigns', () => {
    it('inverts personal amounts when the conventions disagree', () => {
        const bank = amounts(bankTxn, mostlyNegative);
        const personal = amounts(personalTxn, mostlyPositive);

        const result = normalizeSigns(bank, personal);

        expect(result.convention.inverted).toBe(true);
        expect(result.personal.map(t => t.amount)).toEqual(['-1', '-2', '-3', '-4', '-5', '-6', '-7', '-8', '9', '10']);
        expect(bank.map(t => t.amount)).toEqual(mostlyNegative);
        expect(personal.map(t => t.amount)).toEqual(mostlyPositive);
        expect(result.warnings).toEqual([]);
    });

    it('leaves aligned sources alone', () => {
        const result = normalizeSigns(amounts(bankTxn, mostlyNegative), amounts(personalTxn, mostlyNegative));
        expect(result.convention.inverted).toBe(false);
        expect(result.personal.map(t => t.amount)).toEqual(mostlyNegative);
    });

    it('does not invert on a tie', () => {
        const result = normalizeSigns(amounts(bankTxn, mostlyPositive), amounts(personalTxn, ['5', '-5']));
        expect(result.convention.personal.basis).toBe('tie');
        expect(result.convention.inverted).toBe(false);
        expect(result.personal.map(t => t.amount)).toEqual(['5', '-5']);
    });

    it('is idempotent', () => {
        const bank = amounts(bankTxn, mostlyNegative);
        const once = normalizeSigns(bank, amounts(personalTxn, mostlyPositive));
        const twice = normalizeSigns(bank, once.personal);

        expect(twice.convention.inverted).toBe(false);
        expect(twice.personal).toEqual(once.personal);
    });

    it('warns and does not invert when a source is empty', () => {
        const result = normalizeSigns(amounts(bankTxn, mostlyPositive), []);
        expect(result.convention.inverted).toBe(false);
        expect(result.warnings).toEqual([
            {
                kind: 'sign_inference',
                source: 'personal',
                message: 'No non-zero personal amounts; sign convention cannot be inferred, amounts left as loaded',
            },
        ]);
    });

    it('keeps split-column polarity and warns when the other side disagrees', () => {
        const result = normalizeSigns(
            amounts(bankTxn, mostlyPositive),
            amounts(personalTxn, mostlyNegative),
            { personalFormat: 'split' }
        );

        expect(result.convention.inverted).toBe(false);
        expect(result.warnings).toEqual([
            {
                kind: 'sign_inference',
                source: 'personal',
                message: 'The personal file uses separate debit/credit columns while the other file appears to record debits as positive; amounts left as loaded',
            },
        ]);
    });
});

describe('inferSignConvention', () => {
    it('makes one run-level decision', () => {
        const { convention } = inferSignConvention(
            { debit_sign: 'negative', basis: 'counts', positive_count: 1, negative_count: 5 },
            { debit_sign: 'positive', basis: 'counts', positive_count: 5, negative_count: 1 }
        );
        expect(convention.inverted).toBe(true);
    });
});
