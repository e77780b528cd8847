/**
 * Date parsing utilities for CSV date columns.
 * All dates returned as UTC (00:00:00Z); time components are dropped.
 */

/**
 * Day/month order for numeric dates such as 03/04/2024.
 */
export type DateOrder = 'MDY' | 'DMY';

const MONTHS = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];

const TIME_SUFFIX = /(?:T|\s+)\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[ap]\.?m\.?)?(?:Z|\s*[+-]\d{2}:?\d{2})?$/i;

const YEAR_FIRST = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const NUMERIC = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{2}|\d{4})$/;
const MONTH_FIRST_NAME = /^([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{2}|\d{4})$/i;
const DAY_FIRST_NAME = /^(\d{1,2})[\s-]([a-z]{3,9})\.?[\s,-]+(\d{2}|\d{4})$/i;

/**
 * Build a UTC date, rejecting impossible ones (02/30, 13/01).
 */
export function buildUtcDate(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

function expandYear(raw: string): number {
    const year = parseInt(raw);
    return raw.length === 2 ? 2000 + year : year;
}

function monthFromName(name: string): number | null {
    const lower = name.toLowerCase();
    const index = MONTHS.findIndex(m => m.startsWith(lower));
    return index === -1 ? null : index + 1;
}

function stripTime(value: string): string {
    return value.trim().replace(TIME_SUFFIX, '').trim();
}

/**
 * Parse any supported textual date.
 *
 * Supported:
 * - YYYY-MM-DD, YYYY/MM/DD, YYYY.MM.DD, YYYYMMDD
 * - MM/DD/YYYY or DD/MM/YYYY (per `order`), with / - . separators and 2-digit years
 * - Jan 15, 2024 / January 15 2024
 * - 15 Jan 2024 / 15-Jan-2024 / 15-Jan-24
 * Any of these may carry a trailing time, which is ignored.
 */
export function parseDateText(value: string, order: DateOrder = 'MDY'): Date | null {
    const text = stripTime(value);
    if (text === '') return null;

    let match = text.match(YEAR_FIRST) ?? text.match(COMPACT);
    if (match) {
        return buildUtcDate(parseInt(match[1]), parseInt(match[2]), parseInt(match[3]));
    }

    match = text.match(NUMERIC);
    if (match) {
        const first = parseInt(match[1]);
        const second = parseInt(match[2]);
        const year = expandYear(match[3]);
        return order === 'DMY'
            ? buildUtcDate(year, second, first)
            : buildUtcDate(year, first, second);
    }

    match = text.match(MONTH_FIRST_NAME);
    if (match) {
        const month = monthFromName(match[1]);
        return month === null ? null : buildUtcDate(expandYear(match[3]), month, parseInt(match[2]));
    }

    match = text.match(DAY_FIRST_NAME);
    if (match) {
        const month = monthFromName(match[2]);
        return month === null ? null : buildUtcDate(expandYear(match[3]), month, parseInt(match[1]));
    }

    return null;
}

/**
 * Infer day/month order from a column of date strings.
 *
 * A value whose first part is > 12 while its second is <= 12 can only be
 * day-first; the reverse can only be month-first. The first conclusive value
 * decides. Without one, month-first is assumed.
 */
export function inferDateOrder(values: readonly string[]): DateOrder {
    for (const raw of values) {
        const match = stripTime(raw).match(NUMERIC);
        if (!match) continue;

        const first = parseInt(match[1]);
        const second = parseInt(match[2]);
        if (first > 12 && second <= 12) return 'DMY';
        if (second > 12 && first <= 12) return 'MDY';
    }
    return 'MDY';
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
