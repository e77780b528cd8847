import { describe, it, expect } from 'vitest';
import { parseDateText, inferDateOrder, formatIsoDate, isValidDate, buildUtcDate } from '../../src/utils/date-parse.js';

function iso(value: string, order: 'MDY' | 'DMY' = 'MDY'): string | null {
    const date = parseDateText(value, order);
    return date ? formatIsoDate(date) : null;
}

describe('date-parse utilities', () => {
    describe('parseDateText', () => {
        it('should parse year-first forms', () => {
            expect(iso('2024-03-15')).toBe('2024-03-15');
            expect(iso('2024/3/5')).toBe('2024-03-05');
            expect(iso('2024.03.15')).toBe('2024-03-15');
            expect(iso('20240315')).toBe('2024-03-15');
        });

        it('should parse numeric month-first by default', () => {
            expect(iso('03/15/2024')).toBe('2024-03-15');
            expect(iso('3-5-24')).toBe('2024-03-05');
            expect(iso('03.15.2024')).toBe('2024-03-15');
        });

        it('should parse numeric day-first when asked', () => {
            expect(iso('15/03/2024', 'DMY')).toBe('2024-03-15');
            expect(iso('05/03/24', 'DMY')).toBe('2024-03-05');
        });

        it('should parse month names', () => {
            expect(iso('Mar 15, 2024')).toBe('2024-03-15');
            expect(iso('March 15 2024')).toBe('2024-03-15');
            expect(iso('15 January 2024')).toBe('2024-01-15');
            expect(iso('15-Jan-24')).toBe('2024-01-15');
        });

        it('should drop a time component', () => {
            expect(iso('2024-03-15 14:30:00')).toBe('2024-03-15');
            expect(iso('2024-03-15T09:00:00Z')).toBe('2024-03-15');
            expect(iso('03/15/2024 2:30 PM')).toBe('2024-03-15');
        });

        it('should return null for impossible dates', () => {
            expect(iso('02/30/2024')).toBeNull();
            expect(iso('13/13/2024')).toBeNull();
            expect(iso('2023-02-29')).toBeNull();
        });

        it('should accept leap days', () => {
            expect(iso('2024-02-29')).toBe('2024-02-29');
        });

        it('should return null for unrecognized text', () => {
            expect(iso('')).toBeNull();
            expect(iso('not a date')).toBeNull();
            expect(iso('Foo 15, 2024')).toBeNull();
        });
    });

    describe('inferDateOrder', () => {
        it('should detect day-first from a day above 12', () => {
            expect(inferDateOrder(['01/02/2024', '25/12/2024'])).toBe('DMY');
        });

        it('should detect month-first from a second part above 12', () => {
            expect(inferDateOrder(['12/25/2024', '25/12/2024'])).toBe('MDY');
        });

        it('should default to month-first', () => {
            expect(inferDateOrder([])).toBe('MDY');
            expect(inferDateOrder(['01/02/2024', '2024-03-15'])).toBe('MDY');
        });
    });

    describe('buildUtcDate', () => {
        it('should reject out-of-range parts', () => {
            expect(buildUtcDate(2024, 0, 10)).toBeNull();
            expect(buildUtcDate(2024, 4, 31)).toBeNull();
        });
    });

    describe('formatIsoDate', () => {
        it('should format date to YYYY-MM-DD', () => {
            const date = new Date(Date.UTC(2026, 0, 15));
            expect(formatIsoDate(date)).toBe('2026-01-15');
        });
    });

    describe('isValidDate', () => {
        it('should return false for invalid date', () => {
            expect(isValidDate(new Date('invalid'))).toBe(false);
        });
    });
});
