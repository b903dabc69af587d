// src/events/eventDeadlineHandler.ts

import type { IsoDate } from '../models/Calendar';
import { CapacityRule } from '../models/Capacity';
import type { CapacityLimits, Decision } from '../models/Capacity';
import type { Event, StageDeadlines } from '../models/Event';
import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import type { Route } from '../models/Route';
import type { BusinessCalendar } from '../engine/calendar';
import { checkCapacity } from '../engine/capacityValidator';
import { computeStageDeadlines } from '../engine/deadlineCalculator';
import { SchedulingError } from '../engine/errors';

export interface NewEventInput {
    id: string;
    name: string;
    expectedRequests: number;
    callPublicationDate?: IsoDate;
}

export interface ScheduledEvent {
    event: Event;
    decision: Decision;
}

function assertAttachable(meeting: Meeting, route: Route): void {
    if (route.divisionId !== meeting.divisionId) {
        throw new SchedulingError(
            'InvalidRouteConfig',
            `Route ${route.id} belongs to division ${route.divisionId}, meeting ${meeting.id} to ${meeting.divisionId}`,
            { routeId: route.id, meetingId: meeting.id }
        );
    }
    if (meeting.status === MeetingStatus.CANCELLED) {
        throw new SchedulingError('InvalidInput', `Meeting ${meeting.id} is cancelled`, { meetingId: meeting.id });
    }
}

function withDeadlines(event: Event, deadlines: StageDeadlines): Event {
    return {
        ...event,
        callPublicationDate: deadlines.callPublicationDate,
        callDeadlineDate: deadlines.callDeadline,
        intakeDeadlineDate: deadlines.intakeDeadline,
        reviewDeadlineDate: deadlines.reviewDeadline,
        responseDeadlineDate: deadlines.responseDeadline
    };
}

/**
 * Handle creation of a funding-request event on a meeting
 *
 * Side effects: none - returns the event with its deadlines filled in,
 * plus the capacity decision for the meeting date including the new load.
 *
 * @throws SchedulingError InvalidRouteConfig, InvalidInput, DateOrderingViolation
 */
export function scheduleEvent(
    input: NewEventInput,
    meeting: Meeting,
    route: Route,
    existingMeetings: readonly Meeting[],
    existingEvents: readonly Event[],
    limits: CapacityLimits,
    calendar: BusinessCalendar
): ScheduledEvent {
    assertAttachable(meeting, route);
    if (!Number.isInteger(input.expectedRequests) || input.expectedRequests < 0) {
        throw new SchedulingError('InvalidInput', `expectedRequests must be a non-negative integer, got ${input.expectedRequests}`);
    }

    const deadlines = computeStageDeadlines(meeting.date, route, calendar, input.callPublicationDate);
    const event = withDeadlines({
        id: input.id,
        meetingId: meeting.id,
        routeId: route.id,
        name: input.name,
        expectedRequests: input.expectedRequests,
        isCallPublicationManual: input.callPublicationDate !== undefined
    }, deadlines);

    // The meeting already exists, so only the request-load rule is relevant here
    const decision = checkCapacity(meeting.date, existingMeetings, existingEvents, limits, calendar, {
        proposedRequests: input.expectedRequests,
        excludeEventId: input.id
    });
    const loadOnly = decision.violations.filter(v => v.rule === CapacityRule.DAILY_REQUESTS);

    return {
        event,
        decision: { ...decision, ok: loadOnly.length === 0, violations: loadOnly }
    };
}

/**
 * Recompute an event's deadlines after its meeting date, route or call
 * publication date changed. A manual publication date is kept.
 *
 * @throws SchedulingError InvalidRouteConfig, InvalidInput, DateOrderingViolation
 */
export function recalculateEventDeadlines(
    event: Event,
    meeting: Meeting,
    route: Route,
    calendar: BusinessCalendar
): Event {
    assertAttachable(meeting, route);

    const publication = event.isCallPublicationManual ? event.callPublicationDate : undefined;
    const deadlines = computeStageDeadlines(meeting.date, route, calendar, publication);

    return withDeadlines({ ...event, meetingId: meeting.id, routeId: route.id }, deadlines);
}
