// src/engine/committeeRecommender.ts

import type { IsoDate } from '../models/Calendar';
import { MeetingStatus } from '../models/Meeting';
import type { Route } from '../models/Route';
import type { ConfigurationSnapshot } from '../models/Snapshot';
import type { BusinessCalendar } from './calendar';
import { isThirdWeekOfMonth, requestsOnDate } from './capacityValidator';
import { compareDates, daysBetween, parseIsoDate } from './dateUtils';
import { SchedulingError } from './errors';

export interface Recommendation {
    meetingId: string;
    committeeTypeId: string;
    date: IsoDate;
    daysUntilMeeting: number;
    score: number;
    reasons: string[];
    warnings: string[];
    available: boolean;
    currentRequests: number;
    availableSpace: number;
    eventCount: number;
}

const RECOMMENDED = 'recommended';

/**
 * Rank upcoming meetings of a route's division for a new event
 *
 * Scoring criteria, in order:
 * 1. Space: room for expectedRequests under maxRequestsPerDay
 * 2. SLA fit: calendar days until the meeting vs route.totalSlaDays
 * 3. Load: number of events already on the meeting
 * 4. Timing: inside the optimal range after the SLA window, or too far out
 * 5. Week: the meeting's week already at its cap of non-operational meetings
 *
 * A meeting with no warnings and no blocking issue gets the best bonus.
 *
 * @param route Route of the new event
 * @param expectedRequests Requests the event is expected to bring
 * @param snapshot Configuration snapshot
 * @param calendar Business calendar built from the snapshot
 * @param today Reference date; earlier meetings are ignored
 * @param limit Maximum number of recommendations
 * @returns Recommendations, highest score first (earlier date on ties)
 */
export function recommendCommittees(
    route: Route,
    expectedRequests: number,
    snapshot: ConfigurationSnapshot,
    calendar: BusinessCalendar,
    today: IsoDate,
    limit: number = 5
): Recommendation[] {
    parseIsoDate(today);
    if (!Number.isInteger(expectedRequests) || expectedRequests < 0) {
        throw new SchedulingError('InvalidInput', `expectedRequests must be a non-negative integer, got ${expectedRequests}`);
    }

    const w = snapshot.recommendation;
    const limits = snapshot.limits;
    const slaDays = route.totalSlaDays;
    const active = snapshot.meetings.filter(m => m.status !== MeetingStatus.CANCELLED);
    const operational = new Set(
        snapshot.committeeTypes.filter(ct => ct.isOperational).map(ct => ct.id)
    );

    const upcoming = active
        .filter(m => m.divisionId === route.divisionId && compareDates(m.date, today) >= 0)
        .sort((a, b) => compareDates(a.date, b.date));

    const recommendations = upcoming.map((meeting): Recommendation => {
        const daysUntilMeeting = daysBetween(today, meeting.date);
        const reasons: string[] = [];
        const warnings: string[] = [];
        let score = w.baseScore;
        let available = true;

        // 1. Space
        const maxRequests = limits.maxRequestsPerDay;
        const currentRequests = requestsOnDate(meeting.date, snapshot.meetings, snapshot.events);
        const availableSpace = maxRequests - currentRequests;
        const usage = maxRequests > 0 ? Math.round((currentRequests / maxRequests) * 100) : 0;

        if (availableSpace >= expectedRequests) {
            if (currentRequests === 0) {
                reasons.push(`full availability: ${availableSpace}/${maxRequests} places`);
            } else if (expectedRequests > 0) {
                reasons.push(`room for ${expectedRequests} requests (free: ${availableSpace}/${maxRequests}, load: ${usage}%)`);
            } else {
                reasons.push(`${availableSpace} of ${maxRequests} places free (load: ${usage}%)`);
            }
            score += w.spaceBonus;
        } else {
            warnings.push(`not enough room (free: ${availableSpace}, needed: ${expectedRequests})`);
            score -= w.noSpacePenalty;
            available = false;
        }

        // 2. SLA fit
        if (daysUntilMeeting >= slaDays) {
            const buffer = daysUntilMeeting - slaDays;
            reasons.push(`enough time for SLA (${buffer} extra days)`);
            score += Math.min(buffer * 0.5, w.slaBonus);
        } else if (daysUntilMeeting >= slaDays * 0.8) {
            warnings.push(`tight SLA window (${daysUntilMeeting}/${slaDays} days)`);
            score -= w.tightSlaPenalty;
        } else {
            warnings.push(`not enough time for SLA (needed: ${slaDays}, available: ${daysUntilMeeting})`);
            score -= w.noSlaPenalty;
            available = false;
        }

        // 3. Event load
        const eventCount = snapshot.events.filter(e => e.meetingId === meeting.id).length;
        if (eventCount === 0) {
            reasons.push('no existing events');
            score += w.noEventsBonus;
        } else if (eventCount <= 3) {
            reasons.push(`low load (${eventCount} events)`);
        } else if (eventCount <= 6) {
            warnings.push(`medium load (${eventCount} events)`);
            score -= w.mediumLoadPenalty;
        } else {
            warnings.push(`high load (${eventCount} events)`);
            score -= w.highLoadPenalty;
        }

        // 4. Timing
        const optimalStart = slaDays + w.optimalRangeStart;
        const optimalEnd = slaDays + w.optimalRangeEnd;
        if (daysUntilMeeting >= optimalStart && daysUntilMeeting <= optimalEnd) {
            reasons.push('within optimal time range');
            score += w.optimalRangeBonus;
        } else if (daysUntilMeeting > optimalEnd + w.farFutureThreshold) {
            warnings.push(`too far in the future (${daysUntilMeeting} days)`);
            score -= w.farFuturePenalty;
        }

        // 5. Weekly fullness (the meeting itself is counted, operational committees are not)
        const week = calendar.weekBounds(meeting.date);
        const weeklyCount = active.filter(m =>
            m.date >= week.start && m.date <= week.end && !operational.has(m.committeeTypeId)
        ).length;
        const weeklyLimit = isThirdWeekOfMonth(meeting.date)
            ? limits.maxMeetingsPerThirdWeek
            : limits.maxMeetingsPerStandardWeek;
        if (weeklyCount >= weeklyLimit) {
            warnings.push(`week is full (${weeklyCount}/${weeklyLimit} meetings)`);
            score -= w.weekFullPenalty;
            available = false;
        }

        if (available && warnings.length === 0) {
            score += w.bestBonus;
            reasons.unshift(RECOMMENDED);
        }

        return {
            meetingId: meeting.id,
            committeeTypeId: meeting.committeeTypeId,
            date: meeting.date,
            daysUntilMeeting,
            score: Math.max(0, score),
            reasons,
            warnings,
            available,
            currentRequests,
            availableSpace,
            eventCount
        };
    });

    // Array.prototype.sort is stable: equal scores keep date order
    return recommendations
        .sort((a, b) => b.score - a.score)
        .slice(0, limit);
}
