// src/engine/capacityValidator.ts

import type { IsoDate } from '../models/Calendar';
import { CapacityRule } from '../models/Capacity';
import type { CapacityLimits, Decision, Violation } from '../models/Capacity';
import type { Event } from '../models/Event';
import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import type { BusinessCalendar } from './calendar';
import { dayOfMonth, parseIsoDate } from './dateUtils';
import { SchedulingError } from './errors';

export interface CapacityOptions {
    proposedRequests?: number;   // New load being added on the candidate date
    excludeMeetingId?: string;   // Meeting being moved; left out of every count
    excludeEventId?: string;     // Event being edited; left out of the request load
}

/**
 * Third 7-day bucket of the month: days 15-21
 */
export function isThirdWeekOfMonth(date: IsoDate): boolean {
    const day = dayOfMonth(date);
    return day >= 15 && day <= 21;
}

function isActive(meeting: Meeting, excludeMeetingId?: string): boolean {
    return meeting.status !== MeetingStatus.CANCELLED && meeting.id !== excludeMeetingId;
}

function assertCount(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new SchedulingError('InvalidInput', `${name} must be a non-negative integer, got ${value}`);
    }
}

/**
 * Sum of expectedRequests over events attached to active meetings on date
 */
export function requestsOnDate(
    date: IsoDate,
    meetings: readonly Meeting[],
    events: readonly Event[],
    options: CapacityOptions = {}
): number {
    const meetingIds = new Set(
        meetings
            .filter(m => m.date === date && isActive(m, options.excludeMeetingId))
            .map(m => m.id)
    );

    return events
        .filter(e => meetingIds.has(e.meetingId) && e.id !== options.excludeEventId)
        .reduce((sum, e) => sum + e.expectedRequests, 0);
}

/**
 * Daily request-load check on its own
 *
 * @returns Violation or null when the load fits
 */
export function checkRequestLoad(
    date: IsoDate,
    meetings: readonly Meeting[],
    events: readonly Event[],
    limits: CapacityLimits,
    options: CapacityOptions = {}
): Violation | null {
    const proposed = options.proposedRequests ?? 0;
    assertCount('proposedRequests', proposed);

    const total = requestsOnDate(date, meetings, events, options) + proposed;
    if (total <= limits.maxRequestsPerDay) {
        return null;
    }

    return {
        rule: CapacityRule.DAILY_REQUESTS,
        message: `daily request cap exceeded: ${total}/${limits.maxRequestsPerDay}`,
        current: total,
        limit: limits.maxRequestsPerDay
    };
}

/**
 * Check a candidate meeting date against every capacity ceiling
 *
 * Pure function - all rules are evaluated, none short-circuits,
 * so the caller sees every violated rule at once.
 *
 * @param candidateDate Proposed meeting date
 * @param existingMeetings Meetings across all divisions for the period
 * @param existingEvents Events attached to those meetings
 * @param limits Capacity ceilings
 * @param calendar Business calendar (defines week boundaries)
 * @returns Advisory decision with current counts
 */
export function checkCapacity(
    candidateDate: IsoDate,
    existingMeetings: readonly Meeting[],
    existingEvents: readonly Event[],
    limits: CapacityLimits,
    calendar: BusinessCalendar,
    options: CapacityOptions = {}
): Decision {
    parseIsoDate(candidateDate);
    assertCount('maxMeetingsPerDay', limits.maxMeetingsPerDay);
    assertCount('maxMeetingsPerStandardWeek', limits.maxMeetingsPerStandardWeek);
    assertCount('maxMeetingsPerThirdWeek', limits.maxMeetingsPerThirdWeek);
    assertCount('maxRequestsPerDay', limits.maxRequestsPerDay);

    const violations: Violation[] = [];
    const active = existingMeetings.filter(m => isActive(m, options.excludeMeetingId));

    // 1. Daily meeting cap
    const meetingsOnDate = active.filter(m => m.date === candidateDate).length;
    if (meetingsOnDate >= limits.maxMeetingsPerDay) {
        violations.push({
            rule: CapacityRule.DAILY_MEETINGS,
            message: `daily meeting cap exceeded: ${meetingsOnDate}/${limits.maxMeetingsPerDay}`,
            current: meetingsOnDate,
            limit: limits.maxMeetingsPerDay
        });
    }

    // 2. Weekly cap, replaced by the third-week cap on days 15-21
    const week = calendar.weekBounds(candidateDate);
    const meetingsInWeek = active.filter(m => m.date >= week.start && m.date <= week.end).length;
    const isThirdWeek = isThirdWeekOfMonth(candidateDate);
    const weeklyLimit = isThirdWeek ? limits.maxMeetingsPerThirdWeek : limits.maxMeetingsPerStandardWeek;
    if (meetingsInWeek >= weeklyLimit) {
        violations.push({
            rule: isThirdWeek ? CapacityRule.THIRD_WEEK_MEETINGS : CapacityRule.WEEKLY_MEETINGS,
            message: `${isThirdWeek ? 'third-week' : 'weekly'} meeting cap exceeded: ${meetingsInWeek}/${weeklyLimit}`,
            current: meetingsInWeek,
            limit: weeklyLimit
        });
    }

    // 3. Daily request load
    const requestViolation = checkRequestLoad(candidateDate, existingMeetings, existingEvents, limits, options);
    if (requestViolation) {
        violations.push(requestViolation);
    }

    return {
        ok: violations.length === 0,
        violations,
        counts: {
            meetingsOnDate,
            meetingsInWeek,
            weekStart: week.start,
            weekEnd: week.end,
            isThirdWeek,
            weeklyLimit,
            requestsOnDate: requestsOnDate(candidateDate, existingMeetings, existingEvents, options),
            proposedRequests: options.proposedRequests ?? 0
        }
    };
}
