/**
 * Amount parsing for CSV money columns.
 * Amounts are exact decimals (decimal.js), never binary floats.
 */

import Decimal from 'decimal.js';

const CURRENCY_SYMBOLS = /[$€£¥₹]/g;
const CURRENCY_CODES = /\b(USD|EUR|GBP|CAD|AUD|JPY|INR|CHF)\b/gi;
const PLAIN_DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a money string to an exact Decimal, or null when it is not a number.
 *
 * Handles:
 * - currency symbols and ISO codes:   "$1,234.50", "1234.50 USD"
 * - thousands separators and spaces:  "1 234.50", "1,234.50"
 * - accounting negatives:             "(42.50)"
 * - trailing sign:                    "42.50-"
 * - CR / DR markers:                  "42.50 CR" (credit, positive), "42.50 DR" (debit, negative)
 */
export function parseAmount(value: string): Decimal | null {
    let text = value.trim();
    if (text === '') return null;

    let negative = false;

    const marker = text.match(/\s*\b(CR|DR)\.?$/i);
    if (marker) {
        negative = marker[1].toUpperCase() === 'DR';
        text = text.slice(0, marker.index).trim();
    }

    if (text.startsWith('(') && text.endsWith(')')) {
        negative = !negative;
        text = text.slice(1, -1).trim();
    }

    if (text.endsWith('-')) {
        negative = !negative;
        text = text.slice(0, -1).trim();
    }

    text = text
        .replace(CURRENCY_SYMBOLS, '')
        .replace(CURRENCY_CODES, '')
        .replace(/[,\s]/g, '');

    if (!PLAIN_DECIMAL.test(text)) return null;

    const amount = new Decimal(text);
    return negative ? amount.negated() : amount;
}

/**
 * Canonical plain-decimal string: no exponent, no trailing zeros, no negative zero.
 * parseAmount(formatAmount(x)) equals x for every finite Decimal x.
 */
export function formatAmount(amount: Decimal): string {
    if (amount.isZero()) return '0';
    return amount.toFixed();
}

/**
 * Display form with two decimals, e.g. for console output.
 */
export function displayAmount(amount: string): string {
    return new Decimal(amount).toFixed(2);
}
