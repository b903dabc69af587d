// src/engine/calendar.ts

import { Weekday } from '../models/Calendar';
import type { ExceptionDate, IsoDate, WorkCalendar } from '../models/Calendar';
import { addDays, weekdayFromOrdinal, weekdayOf } from './dateUtils';
import { SchedulingError } from './errors';

/**
 * Business-day arithmetic over a configured work week and exception dates
 *
 * Pure: built once from a WorkCalendar, never mutated afterwards
 */
export class BusinessCalendar {
    private readonly workWeekdays: ReadonlySet<Weekday>;
    private readonly exceptions: ReadonlyMap<IsoDate, ExceptionDate>;
    readonly weekStartWeekday: Weekday;

    constructor(calendar: WorkCalendar) {
        if (calendar.workWeekdays.length === 0) {
            throw new SchedulingError('EmptyCalendarConfig', 'Work week has no working days');
        }
        for (const day of calendar.workWeekdays) {
            if (!Number.isInteger(day) || day < 0 || day > 6) {
                throw new SchedulingError('InvalidInput', `Invalid weekday ordinal ${day}`);
            }
        }

        const exceptions = new Map<IsoDate, ExceptionDate>();
        for (const exception of calendar.exceptionDates) {
            if (exceptions.has(exception.date)) {
                throw new SchedulingError(
                    'InvalidSnapshot',
                    `Duplicate exception date ${exception.date}`,
                    { date: exception.date }
                );
            }
            exceptions.set(exception.date, exception);
        }

        this.workWeekdays = new Set(calendar.workWeekdays);
        this.exceptions = exceptions;
        this.weekStartWeekday = findWeekStart(this.workWeekdays);
    }

    isWorkWeekday(date: IsoDate): boolean {
        return this.workWeekdays.has(weekdayOf(date));
    }

    getException(date: IsoDate): ExceptionDate | undefined {
        return this.exceptions.get(date);
    }

    isBusinessDay(date: IsoDate): boolean {
        return this.isWorkWeekday(date) && !this.exceptions.has(date);
    }

    /**
     * Move exactly |n| business days forward (n > 0) or backward (n < 0).
     * The start date itself never counts.
     * n = 0 returns the nearest business day at or after date.
     */
    stepBusinessDays(date: IsoDate, n: number): IsoDate {
        if (!Number.isInteger(n)) {
            throw new SchedulingError('InvalidInput', `Business-day step must be an integer, got ${n}`);
        }

        let cursor = date;
        if (n === 0) {
            while (!this.isBusinessDay(cursor)) {
                cursor = addDays(cursor, 1);
            }
            return cursor;
        }

        const direction = n > 0 ? 1 : -1;
        let remaining = Math.abs(n);
        while (remaining > 0) {
            cursor = addDays(cursor, direction);
            if (this.isBusinessDay(cursor)) {
                remaining--;
            }
        }
        return cursor;
    }

    /**
     * The 7-day week containing date, starting on weekStartWeekday
     */
    weekBounds(date: IsoDate): { start: IsoDate; end: IsoDate } {
        const offset = (weekdayOf(date) - this.weekStartWeekday + 7) % 7;
        const start = addDays(date, -offset);
        return { start, end: addDays(start, 6) };
    }
}

/**
 * First work weekday after the longest run of non-work weekdays.
 * Sun-Thu → Sunday, Mon-Fri → Monday, all seven days → Sunday.
 * Ties go to the lowest ordinal.
 */
function findWeekStart(workWeekdays: ReadonlySet<Weekday>): Weekday {
    let best = Weekday.SUNDAY;
    let bestGap = -1;

    for (let day = 0; day < 7; day++) {
        const weekday = weekdayFromOrdinal(day);
        if (!workWeekdays.has(weekday)) {
            continue;
        }
        let gap = 0;
        while (gap < 6 && !workWeekdays.has(weekdayFromOrdinal(day - gap - 1))) {
            gap++;
        }
        if (gap > bestGap) {
            best = weekday;
            bestGap = gap;
        }
    }

    return best;
}
