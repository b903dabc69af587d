// src/engine/dateSuggester.ts

import type { IsoDate } from '../models/Calendar';
import type { CapacityLimits } from '../models/Capacity';
import type { Candidate } from '../models/Candidate';
import { Frequency } from '../models/CommitteeType';
import type { CommitteeType } from '../models/CommitteeType';
import type { Division } from '../models/Division';
import type { Event } from '../models/Event';
import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import type { BusinessCalendar } from './calendar';
import { checkCapacity } from './capacityValidator';
import { addDays, parseIsoDate, weekdayOccurrenceInMonth, weekdayOf } from './dateUtils';
import { SchedulingError } from './errors';

export interface SuggestionContext {
    calendar: BusinessCalendar;
    events?: readonly Event[];
    division?: Division;          // Supplies allowedWeekdays when present
    proposedRequests?: number;
}

/**
 * @throws SchedulingError InvalidCommitteeTypeConfig
 */
export function validateCommitteeType(committeeType: CommitteeType): void {
    const { id, scheduledWeekday, frequency, weekOfMonth } = committeeType;
    const fail = (reason: string): never => {
        throw new SchedulingError(
            'InvalidCommitteeTypeConfig',
            `Committee type ${id}: ${reason}`,
            { committeeTypeId: id }
        );
    };

    if (!Number.isInteger(scheduledWeekday) || scheduledWeekday < 0 || scheduledWeekday > 6) {
        fail(`scheduledWeekday must be 0-6, got ${scheduledWeekday}`);
    }

    switch (frequency) {
        case Frequency.WEEKLY:
            if (weekOfMonth !== undefined) {
                fail('weekly committees cannot set weekOfMonth');
            }
            break;
        case Frequency.MONTHLY:
            if (weekOfMonth === undefined) {
                fail('monthly committees require weekOfMonth');
            } else if (!Number.isInteger(weekOfMonth) || weekOfMonth < 1 || weekOfMonth > 5) {
                fail(`weekOfMonth must be 1-5, got ${weekOfMonth}`);
            }
            break;
        default:
            fail(`unknown frequency "${String(frequency)}"`);
    }
}

/**
 * Does date match the committee type's weekday (and week of month)?
 */
export function matchesRecurrence(committeeType: CommitteeType, date: IsoDate): boolean {
    if (weekdayOf(date) !== committeeType.scheduledWeekday) {
        return false;
    }
    return committeeType.frequency !== Frequency.MONTHLY
        || weekdayOccurrenceInMonth(date) === committeeType.weekOfMonth;
}

/**
 * Reasons, outside capacity, why a committee cannot meet on date
 */
function calendarReasons(
    committeeType: CommitteeType,
    divisionId: string,
    date: IsoDate,
    existingMeetings: readonly Meeting[],
    context: SuggestionContext
): string[] {
    const reasons: string[] = [];
    const { calendar, division } = context;

    if (!calendar.isWorkWeekday(date)) {
        reasons.push('not a working day');
    }

    const exception = calendar.getException(date);
    if (exception) {
        reasons.push(`falls on exception date: ${exception.description || exception.kind}`);
    }

    const allowed = division?.allowedWeekdays ?? [];
    if (allowed.length > 0 && !allowed.includes(weekdayOf(date))) {
        reasons.push('division does not convene on this weekday');
    }

    const duplicate = existingMeetings.some(m =>
        m.status !== MeetingStatus.CANCELLED
        && m.committeeTypeId === committeeType.id
        && m.divisionId === divisionId
        && m.date === date
    );
    if (duplicate) {
        reasons.push('committee already has a meeting on this date');
    }

    return reasons;
}

/**
 * Enumerate candidate dates for a committee type within a search window
 *
 * Pure function. Exception dates are reported, never shifted, so the
 * committee's fixed weekday is preserved; the caller decides on overrides.
 *
 * @param committeeType Recurrence rule
 * @param divisionId Division the meeting would belong to
 * @param searchFrom First date of the window (inclusive)
 * @param searchWindowDays Window length in calendar days (end exclusive)
 * @param existingMeetings Meetings across all divisions for the period
 * @param limits Capacity ceilings
 * @returns Candidates in chronological order, unavailable ones included
 */
export function suggestDates(
    committeeType: CommitteeType,
    divisionId: string,
    searchFrom: IsoDate,
    searchWindowDays: number,
    existingMeetings: readonly Meeting[],
    limits: CapacityLimits,
    context: SuggestionContext
): Candidate[] {
    validateCommitteeType(committeeType);
    parseIsoDate(searchFrom);

    if (committeeType.divisionId !== divisionId) {
        throw new SchedulingError(
            'InvalidCommitteeTypeConfig',
            `Committee type ${committeeType.id} belongs to division ${committeeType.divisionId}, not ${divisionId}`,
            { committeeTypeId: committeeType.id, divisionId }
        );
    }
    if (!Number.isInteger(searchWindowDays) || searchWindowDays < 0) {
        throw new SchedulingError('InvalidInput', `searchWindowDays must be a non-negative integer, got ${searchWindowDays}`);
    }

    const candidates: Candidate[] = [];

    for (let offset = 0; offset < searchWindowDays; offset++) {
        const date = addDays(searchFrom, offset);
        if (!matchesRecurrence(committeeType, date)) {
            continue;
        }

        const reasons = calendarReasons(committeeType, divisionId, date, existingMeetings, context);

        if (!context.calendar.isBusinessDay(date)) {
            candidates.push({ date, available: false, reasons });
            continue;
        }

        const decision = checkCapacity(
            date,
            existingMeetings,
            context.events ?? [],
            limits,
            context.calendar,
            { proposedRequests: context.proposedRequests }
        );
        reasons.push(...decision.violations.map(v => v.message));

        candidates.push({ date, available: reasons.length === 0, reasons, decision });
    }

    return candidates;
}
