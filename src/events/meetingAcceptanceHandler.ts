// src/events/meetingAcceptanceHandler.ts

import type { IsoDate } from '../models/Calendar';
import type { CapacityLimits, Decision } from '../models/Capacity';
import type { CommitteeType } from '../models/CommitteeType';
import type { Division } from '../models/Division';
import type { Event } from '../models/Event';
import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import type { BusinessCalendar } from '../engine/calendar';
import { checkCapacity } from '../engine/capacityValidator';
import { matchesRecurrence, validateCommitteeType } from '../engine/dateSuggester';
import { parseIsoDate, weekdayOf } from '../engine/dateUtils';
import { SchedulingError } from '../engine/errors';

/**
 * advisory: always create, report problems as warnings
 * enforce: refuse creation when anything is reported
 */
export enum CapacityPolicy {
    ADVISORY = 'advisory',
    ENFORCE = 'enforce'
}

export interface MeetingRequest {
    id: string;                 // Assigned by the caller's data store
    committeeTypeId: string;
    divisionId: string;
    date: IsoDate;
    status?: MeetingStatus.PLANNED | MeetingStatus.SCHEDULED;
    exceptionDateId?: string;
    notes?: string;
}

export interface AcceptanceResult {
    meeting: Meeting | null;
    decision: Decision;
    warnings: string[];
}

/**
 * Handle acceptance of a date into a new meeting
 *
 * Duplicates are always rejected. Everything else is advisory unless
 * the policy is ENFORCE. The caller persists the returned meeting and
 * guards the slot with its own unique constraint.
 *
 * @param division Owning division; its allowedWeekdays are checked when given
 * @throws SchedulingError DuplicateMeeting, InvalidCommitteeTypeConfig, InvalidInput
 */
export function acceptMeeting(
    request: MeetingRequest,
    committeeType: CommitteeType,
    existingMeetings: readonly Meeting[],
    existingEvents: readonly Event[],
    limits: CapacityLimits,
    calendar: BusinessCalendar,
    policy: CapacityPolicy = CapacityPolicy.ADVISORY,
    division?: Division
): AcceptanceResult {
    validateCommitteeType(committeeType);
    parseIsoDate(request.date);

    if (committeeType.id !== request.committeeTypeId || committeeType.divisionId !== request.divisionId) {
        throw new SchedulingError(
            'InvalidCommitteeTypeConfig',
            `Committee type ${committeeType.id} does not match request for ${request.committeeTypeId} in division ${request.divisionId}`,
            { committeeTypeId: committeeType.id, divisionId: request.divisionId }
        );
    }

    if (division && division.id !== request.divisionId) {
        throw new SchedulingError(
            'InvalidInput',
            `Division ${division.id} does not match request for division ${request.divisionId}`,
            { divisionId: division.id }
        );
    }

    const duplicate = existingMeetings.find(m =>
        m.status !== MeetingStatus.CANCELLED
        && m.committeeTypeId === request.committeeTypeId
        && m.divisionId === request.divisionId
        && m.date === request.date
    );
    if (duplicate) {
        throw new SchedulingError(
            'DuplicateMeeting',
            `Meeting ${duplicate.id} already holds ${request.committeeTypeId}/${request.divisionId} on ${request.date}`,
            { existingMeetingId: duplicate.id }
        );
    }

    const warnings: string[] = [];
    if (!matchesRecurrence(committeeType, request.date)) {
        warnings.push('date does not match the committee recurrence');
    }
    if (!calendar.isWorkWeekday(request.date)) {
        warnings.push('not a working day');
    }

    const exception = calendar.getException(request.date);
    if (exception) {
        warnings.push(`falls on exception date: ${exception.description || exception.kind}`);
    }

    const allowed = division?.allowedWeekdays ?? [];
    if (allowed.length > 0 && !allowed.includes(weekdayOf(request.date))) {
        warnings.push('division does not convene on this weekday');
    }

    const decision = checkCapacity(request.date, existingMeetings, existingEvents, limits, calendar);
    warnings.push(...decision.violations.map(v => v.message));

    if (policy === CapacityPolicy.ENFORCE && warnings.length > 0) {
        return { meeting: null, decision, warnings };
    }

    const meeting: Meeting = {
        id: request.id,
        committeeTypeId: request.committeeTypeId,
        divisionId: request.divisionId,
        date: request.date,
        status: request.status ?? MeetingStatus.PLANNED
    };
    const exceptionDateId = request.exceptionDateId ?? exception?.id;
    if (exceptionDateId !== undefined) {
        meeting.exceptionDateId = exceptionDateId;
    }
    if (request.notes !== undefined) {
        meeting.notes = request.notes;
    }

    return { meeting, decision, warnings };
}
