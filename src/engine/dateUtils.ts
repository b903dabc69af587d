// src/engine/dateUtils.ts

import { DateTime } from 'luxon';
import { Weekday } from '../models/Calendar';
import type { IsoDate } from '../models/Calendar';
import { SchedulingError } from './errors';

/**
 * Calendar-date helpers. Dates are handled as UTC midnights so that
 * day arithmetic never crosses a DST boundary.
 */

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Luxon weekday is 1 (Monday) .. 7 (Sunday); index by weekday % 7
const WEEKDAYS: readonly Weekday[] = [
    Weekday.SUNDAY,
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.FRIDAY,
    Weekday.SATURDAY
];

export function isValidIsoDate(value: string): boolean {
    return ISO_DATE_PATTERN.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

export function parseIsoDate(value: IsoDate): DateTime {
    const dt = ISO_DATE_PATTERN.test(value) ? DateTime.fromISO(value, { zone: 'utc' }) : null;
    if (!dt || !dt.isValid) {
        throw new SchedulingError('InvalidInput', `Invalid date "${value}", expected YYYY-MM-DD`);
    }
    return dt;
}

export function formatIsoDate(dt: DateTime): IsoDate {
    return dt.toFormat('yyyy-MM-dd');
}

export function addDays(date: IsoDate, days: number): IsoDate {
    return formatIsoDate(parseIsoDate(date).plus({ days }));
}

export function weekdayFromOrdinal(ordinal: number): Weekday {
    return WEEKDAYS[((ordinal % 7) + 7) % 7];
}

export function weekdayOf(date: IsoDate): Weekday {
    return weekdayFromOrdinal(parseIsoDate(date).weekday);
}

export function dayOfMonth(date: IsoDate): number {
    return parseIsoDate(date).day;
}

/**
 * Occurrence of the date's weekday within its month:
 * days 1-7 → 1, 8-14 → 2, 15-21 → 3, 22-28 → 4, 29-31 → 5
 */
export function weekdayOccurrenceInMonth(date: IsoDate): number {
    return Math.floor((dayOfMonth(date) - 1) / 7) + 1;
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
    return Math.round(parseIsoDate(to).diff(parseIsoDate(from), 'days').days);
}

export function compareDates(a: IsoDate, b: IsoDate): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function monthRange(year: number, month: number): { start: IsoDate; days: number } {
    const start = DateTime.fromObject({ year, month, day: 1 }, { zone: 'utc' });
    if (!start.isValid) {
        throw new SchedulingError('InvalidInput', `Invalid month ${year}-${month}`);
    }
    return { start: formatIsoDate(start), days: start.daysInMonth ?? 0 };
}

export function sameMonth(a: IsoDate, b: IsoDate): boolean {
    return a.slice(0, 7) === b.slice(0, 7);
}
