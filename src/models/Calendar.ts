// src/models/Calendar.ts

/**
 * Calendar date in ISO form: YYYY-MM-DD
 */
export type IsoDate = string;

/**
 * Weekday ordinals, Sunday first
 */
export enum Weekday {
    SUNDAY = 0,
    MONDAY = 1,
    TUESDAY = 2,
    WEDNESDAY = 3,
    THURSDAY = 4,
    FRIDAY = 5,
    SATURDAY = 6
}

export enum ExceptionDateKind {
    HOLIDAY = 'holiday',
    SHABBATON = 'shabbaton',
    CLOSURE = 'closure',
    SPECIAL = 'special'
}

/**
 * A specific date that is non-working regardless of its weekday
 */
export interface ExceptionDate {
    id: string;
    date: IsoDate;
    description: string;
    kind: ExceptionDateKind;
}

/**
 * Work-week configuration
 *
 * Invariant: workWeekdays is non-empty
 * Invariant: exceptionDates are unique by date
 */
export interface WorkCalendar {
    workWeekdays: readonly Weekday[];
    exceptionDates: readonly ExceptionDate[];
}
