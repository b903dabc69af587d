// src/engine/deadlineCalculator.ts

import type { IsoDate } from '../models/Calendar';
import type { StageDeadlines } from '../models/Event';
import type { StageDurations } from '../models/Route';
import type { BusinessCalendar } from './calendar';
import { compareDates, parseIsoDate } from './dateUtils';
import { SchedulingError } from './errors';

const DURATION_FIELDS: readonly (keyof StageDurations)[] = [
    'totalSlaDays',
    'stageADays',
    'stageBDays',
    'stageCDays',
    'stageDDays'
];

/**
 * Reject routes whose durations are missing, fractional or negative
 *
 * @throws SchedulingError InvalidRouteConfig
 */
export function validateStageDurations(route: StageDurations): void {
    const invalid = DURATION_FIELDS.filter(field => {
        const value: unknown = route[field];
        return typeof value !== 'number' || !Number.isInteger(value) || value < 0;
    });

    if (invalid.length > 0) {
        throw new SchedulingError(
            'InvalidRouteConfig',
            `Stage durations must be non-negative integers: ${invalid.join(', ')}`,
            { fields: invalid }
        );
    }
}

/**
 * Compute the SLA stage chain for an event anchored to a meeting
 *
 * Pure function - identical inputs give identical outputs
 *
 * The call window opens at callPublicationDate, or totalSlaDays business
 * days before the meeting when none is given. Stages A, B and C then run
 * forward from there; stage D runs forward from the meeting itself.
 *
 * @param meetingDate Committee meeting date
 * @param route Route carrying the stage durations
 * @param calendar Business calendar
 * @param callPublicationDate Caller-supplied call publication date
 * @throws SchedulingError InvalidRouteConfig, DateOrderingViolation
 */
export function computeStageDeadlines(
    meetingDate: IsoDate,
    route: StageDurations,
    calendar: BusinessCalendar,
    callPublicationDate?: IsoDate
): StageDeadlines {
    validateStageDurations(route);
    parseIsoDate(meetingDate);

    if (callPublicationDate !== undefined) {
        parseIsoDate(callPublicationDate);
        if (compareDates(callPublicationDate, meetingDate) > 0) {
            throw new SchedulingError(
                'DateOrderingViolation',
                `Call publication date ${callPublicationDate} is after meeting date ${meetingDate}`,
                { callPublicationDate, meetingDate }
            );
        }
    }

    const callStart = callPublicationDate ?? calendar.stepBusinessDays(meetingDate, -route.totalSlaDays);
    const callDeadline = calendar.stepBusinessDays(callStart, route.stageADays);
    const intakeDeadline = calendar.stepBusinessDays(callDeadline, route.stageBDays);
    const reviewDeadline = calendar.stepBusinessDays(intakeDeadline, route.stageCDays);

    if (compareDates(reviewDeadline, meetingDate) > 0) {
        throw new SchedulingError(
            'DateOrderingViolation',
            `Review deadline ${reviewDeadline} falls after meeting date ${meetingDate}`,
            { callStart, reviewDeadline, meetingDate }
        );
    }

    const responseDeadline = calendar.stepBusinessDays(meetingDate, route.stageDDays);

    return {
        callPublicationDate: callStart,
        callDeadline,
        intakeDeadline,
        reviewDeadline,
        responseDeadline
    };
}
