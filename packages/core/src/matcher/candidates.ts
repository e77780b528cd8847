/**
 * Candidate filter: which personal transactions a bank transaction may be compared with.
 *
 * Rules, in order:
 * 1. Reconciled personal rows are never candidates.
 * 2. Personal rows dated after the last bank date plus a one-day cushion are
 *    not candidates (the statement cannot confirm them yet).
 * 3. Fuzzy scoring only sees personal rows within the date window of the bank
 *    row. The intelligent strategy ignores this rule, not rules 1 and 2.
 */

import type { Transaction } from '../types/index.js';
import { CUTOFF_CUSHION_DAYS } from '../types/index.js';
import { addDays } from './date-diff.js';
import { intelligentKey } from './score.js';
import type { CandidateFilterResult, CandidateIndex } from './types.js';

/**
 * Latest bank date plus the cushion, or null without bank transactions.
 */
export function computeCutoffDate(bank: readonly Transaction[]): string | null {
    if (bank.length === 0) return null;
    const latest = bank.reduce((max, txn) => (txn.date > max ? txn.date : max), bank[0].date);
    return addDays(latest, CUTOFF_CUSHION_DAYS);
}

/**
 * Apply the reconciled and cutoff rules.
 */
export function filterPersonal(
    bank: readonly Transaction[],
    personal: readonly Transaction[]
): CandidateFilterResult {
    const cutoffDate = computeCutoffDate(bank);
    const eligible: number[] = [];
    let reconciledFiltered = 0;
    let afterCutoffFiltered = 0;

    personal.forEach((txn, index) => {
        if (txn.reconciled) {
            reconciledFiltered++;
            return;
        }
        if (cutoffDate !== null && txn.date > cutoffDate) {
            afterCutoffFiltered++;
            return;
        }
        eligible.push(index);
    });

    return { eligible, reconciledFiltered, afterCutoffFiltered, cutoffDate };
}

/**
 * Index eligible personal transactions by date and by intelligent-match key.
 */
export function buildCandidateIndex(
    personal: readonly Transaction[],
    eligible: readonly number[]
): CandidateIndex {
    const byDate = [...eligible].sort((a, b) => {
        const da = personal[a].date;
        const db = personal[b].date;
        if (da !== db) return da < db ? -1 : 1;
        return a - b;
    });

    const byIntelligentKey = new Map<string, number[]>();
    for (const index of eligible) {
        const key = intelligentKey(personal[index]);
        if (key === null) continue;
        const bucket = byIntelligentKey.get(key);
        if (bucket) {
            bucket.push(index);
        } else {
            byIntelligentKey.set(key, [index]);
        }
    }

    return { personal, byDate, byIntelligentKey };
}

/**
 * First position in byDate whose date is >= the given date.
 */
function lowerBound(index: CandidateIndex, date: string): number {
    let lo = 0;
    let hi = index.byDate.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (index.personal[index.byDate[mid]].date < date) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo;
}

/**
 * Eligible personal indices within `windowDays` (inclusive) of the bank date,
 * ordered by date.
 */
export function windowCandidates(index: CandidateIndex, bankDate: string, windowDays: number): number[] {
    const from = addDays(bankDate, -windowDays);
    const to = addDays(bankDate, windowDays);
    const result: number[] = [];

    for (let i = lowerBound(index, from); i < index.byDate.length; i++) {
        const personalIndex = index.byDate[i];
        if (index.personal[personalIndex].date > to) break;
        result.push(personalIndex);
    }
    return result;
}

/**
 * Eligible personal indices sharing the bank transaction's intelligent-match key.
 */
export function intelligentCandidates(index: CandidateIndex, bank: Transaction): number[] {
    const key = intelligentKey(bank);
    if (key === null) return [];
    return index.byIntelligentKey.get(key) ?? [];
}

/**
 * Every eligible personal index either strategy may score against this bank
 * transaction, ascending.
 */
export function candidatesFor(index: CandidateIndex, bank: Transaction, windowDays: number): number[] {
    const merged = new Set<number>([
        ...windowCandidates(index, bank.date, windowDays),
        ...intelligentCandidates(index, bank),
    ]);
    return [...merged].sort((a, b) => a - b);
}
