/**
 * Calendar-day arithmetic on ISO dates. Everything is computed at UTC
 * midnight so local time zones and DST never shift a day.
 */

import { formatIsoDate } from '../utils/date-parse.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function utcMidnight(isoDate: string): number {
    return Date.parse(`${isoDate}T00:00:00Z`);
}

/**
 * Whole days between two dates, in either order.
 */
export function daysBetween(a: string, b: string): number {
    return Math.round(Math.abs(utcMidnight(a) - utcMidnight(b)) / MS_PER_DAY);
}

/**
 * The date `days` later (or earlier, when negative).
 */
export function addDays(date: string, days: number): string {
    return formatIsoDate(new Date(utcMidnight(date) + days * MS_PER_DAY));
}

/** Inclusive: a pair exactly `windowDays` apart is inside. */
export function isWithinDateTolerance(a: string, b: string, windowDays: number): boolean {
    return daysBetween(a, b) <= windowDays;
}
