/**
 * Column resolution: which CSV header carries which field.
 *
 * Exact (case-insensitive) keyword hits win over fuzzy ones. Fuzzy hits use
 * Jaro-Winkler similarity so near-miss headers such as "Descripton" or
 * "Post Dt" still resolve.
 */

import natural from 'natural';
import type { ColumnMapping } from '../types/index.js';
import { ColumnMappingError } from '../errors.js';

/**
 * Minimum Jaro-Winkler similarity for a fuzzy header match.
 */
export const HEADER_SIMILARITY_THRESHOLD = 0.85;

type ColumnField = 'date' | 'description' | 'amount' | 'debit' | 'credit' | 'reconciled';

/**
 * Keywords per field, in preference order. Earlier fields claim headers first.
 */
export const COLUMN_KEYWORDS: ReadonlyArray<readonly [ColumnField, readonly string[]]> = [
    ['date', ['post date', 'posting date', 'transaction date', 'date', 'trans date', 'dt']],
    ['description', ['description', 'desc', 'memo', 'merchant', 'payee', 'details']],
    ['amount', ['amount', 'amt', 'usd']],
    ['debit', ['debit', 'withdrawal']],
    ['credit', ['credit', 'deposit']],
    ['reconciled', ['reconciled', 'cleared']],
];

function headerKey(header: string): string {
    return header.trim().toLowerCase();
}

function findExact(headers: readonly string[], keywords: readonly string[], taken: Set<number>): number | null {
    for (const keyword of keywords) {
        const index = headers.findIndex((h, i) => !taken.has(i) && headerKey(h) === keyword);
        if (index !== -1) return index;
    }
    return null;
}

function findFuzzy(headers: readonly string[], keywords: readonly string[], taken: Set<number>): number | null {
    let bestIndex: number | null = null;
    let bestScore = 0;

    for (let index = 0; index < headers.length; index++) {
        const key = headerKey(headers[index]);
        if (taken.has(index) || key === '') continue;

        for (const keyword of keywords) {
            const score = natural.JaroWinklerDistance(key, keyword, {});
            if (score >= HEADER_SIMILARITY_THRESHOLD && score > bestScore) {
                bestIndex = index;
                bestScore = score;
            }
        }
    }

    return bestIndex;
}

/**
 * Resolve a column mapping from CSV headers.
 *
 * @throws ColumnMappingError when date, description, and an amount source
 *   (a signed amount column, or both debit and credit) are not all present
 */
export function resolveColumnMapping(headers: readonly string[]): ColumnMapping {
    const taken = new Set<number>();
    const resolved: Partial<Record<ColumnField, string>> = {};

    // Exact pass for every field first, so a fuzzy hit never steals an exact one
    for (const [field, keywords] of COLUMN_KEYWORDS) {
        const index = findExact(headers, keywords, taken);
        if (index !== null) {
            taken.add(index);
            resolved[field] = headers[index];
        }
    }

    for (const [field, keywords] of COLUMN_KEYWORDS) {
        if (resolved[field] !== undefined) continue;
        const index = findFuzzy(headers, keywords, taken);
        if (index !== null) {
            taken.add(index);
            resolved[field] = headers[index];
        }
    }

    const split = resolved.debit !== undefined && resolved.credit !== undefined;

    const missing: string[] = [];
    if (resolved.date === undefined) missing.push('date');
    if (resolved.description === undefined) missing.push('description');
    if (resolved.amount === undefined && !split) missing.push('amount');

    if (missing.length > 0 || resolved.date === undefined || resolved.description === undefined) {
        throw new ColumnMappingError(missing, [...headers]);
    }

    return {
        date: resolved.date,
        description: resolved.description,
        amount: resolved.amount ?? null,
        debit: resolved.debit ?? null,
        credit: resolved.credit ?? null,
        reconciled: resolved.reconciled ?? null,
        format: split ? 'split' : 'signed',
    };
}
