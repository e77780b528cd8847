import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { parseAmount, formatAmount, displayAmount } from '../../src/utils/amount.js';

function parsed(value: string): string | null {
    const amount = parseAmount(value);
    return amount === null ? null : formatAmount(amount);
}

describe('parseAmount', () => {
    it('parses plain signed decimals', () => {
        expect(parsed('-42.50')).toBe('-42.5');
        expect(parsed('+42')).toBe('42');
        expect(parsed('.5')).toBe('0.5');
    });

    it('strips currency symbols and thousands separators', () => {
        expect(parsed('$1,234.50')).toBe('1234.5');
        expect(parsed('-$5.00')).toBe('-5');
        expect(parsed('$-5.00')).toBe('-5');
        expect(parsed('€ 1 234.00')).toBe('1234');
    });

    it('strips ISO currency codes', () => {
        expect(parsed('1234.50 USD')).toBe('1234.5');
        expect(parsed('eur 10')).toBe('10');
    });

    it('reads accounting negatives and trailing minus', () => {
        expect(parsed('(42.50)')).toBe('-42.5');
        expect(parsed('42.50-')).toBe('-42.5');
        expect(parsed('($1,000.00)')).toBe('-1000');
    });

    it('reads CR and DR markers', () => {
        expect(parsed('42.50 CR')).toBe('42.5');
        expect(parsed('42.50 DR')).toBe('-42.5');
        expect(parsed('42.50 dr.')).toBe('-42.5');
    });

    it('returns null for non-numbers', () => {
        expect(parseAmount('')).toBeNull();
        expect(parseAmount('   ')).toBeNull();
        expect(parseAmount('abc')).toBeNull();
        expect(parseAmount('1.2.3')).toBeNull();
        expect(parseAmount('--5')).toBeNull();
        expect(parseAmount('$')).toBeNull();
    });

    it('keeps full precision', () => {
        expect(parsed('0.1')).toBe('0.1');
        expect(parsed('1234567890.123456789')).toBe('1234567890.123456789');
    });
});

describe('formatAmount', () => {
    it('drops trailing zeros', () => {
        expect(formatAmount(new Decimal('100.00'))).toBe('100');
    });

    it('never writes an exponent', () => {
        expect(formatAmount(new Decimal('1e-7'))).toBe('0.0000001');
        expect(formatAmount(new Decimal('1e21'))).toBe('1000000000000000000000');
    });

    it('writes negative zero as 0', () => {
        expect(formatAmount(new Decimal('-0'))).toBe('0');
    });

    it('round-trips through parseAmount', () => {
        for (const value of ['0.01', '-42.5', '1234567.891', '1e-7', '-0.0000001', '99999999999999999999.99']) {
            const amount = new Decimal(value);
            const back = parseAmount(formatAmount(amount));
            expect(back?.equals(amount)).toBe(true);
        }
    });
});

describe('displayAmount', () => {
    it('shows two decimals', () => {
        expect(displayAmount('-42.5')).toBe('-42.50');
        expect(displayAmount('7')).toBe('7.00');
    });
});
