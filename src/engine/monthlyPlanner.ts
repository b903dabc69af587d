// src/engine/monthlyPlanner.ts

import type { IsoDate } from '../models/Calendar';
import { Frequency } from '../models/CommitteeType';
import type { CommitteeType } from '../models/CommitteeType';
import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import type { ConfigurationSnapshot } from '../models/Snapshot';
import type { BusinessCalendar } from './calendar';
import { checkCapacity } from './capacityValidator';
import { suggestDates } from './dateSuggester';
import { monthRange, sameMonth } from './dateUtils';

export interface ProposedMeeting {
    committeeTypeId: string;
    divisionId: string;
    date: IsoDate;
    frequency: Frequency;
    status: MeetingStatus;
}

export interface SkippedCandidate {
    committeeTypeId: string;
    divisionId: string;
    date: IsoDate;
    reasons: string[];
}

export interface MonthlySchedule {
    year: number;
    month: number;
    proposals: ProposedMeeting[];
    skipped: SkippedCandidate[];
}

/**
 * Has this committee already got an active meeting in the same
 * configured week (weekly) or month (monthly) as date?
 */
function alreadyMeetsInPeriod(
    committeeType: CommitteeType,
    date: IsoDate,
    meetings: readonly Meeting[],
    calendar: BusinessCalendar
): boolean {
    const week = calendar.weekBounds(date);
    return meetings.some(m => {
        if (
            m.status === MeetingStatus.CANCELLED
            || m.committeeTypeId !== committeeType.id
            || m.divisionId !== committeeType.divisionId
        ) {
            return false;
        }
        return committeeType.frequency === Frequency.MONTHLY
            ? sameMonth(m.date, date)
            : m.date >= week.start && m.date <= week.end;
    });
}

/**
 * Propose a month of meetings for every active committee type
 *
 * Pure function - proposals are accumulated in a working copy of the
 * meeting list so that each proposal counts against capacity for the
 * ones after it. Nothing is persisted.
 *
 * @param snapshot Configuration snapshot
 * @param calendar Business calendar built from the snapshot
 * @param year Calendar year
 * @param month 1-12
 * @param divisionIds Divisions to plan; all active divisions when omitted
 */
export function generateMonthlySchedule(
    snapshot: ConfigurationSnapshot,
    calendar: BusinessCalendar,
    year: number,
    month: number,
    divisionIds?: readonly string[]
): MonthlySchedule {
    const { start, days } = monthRange(year, month);
    const divisions = snapshot.divisions.filter(d =>
        d.isActive && (divisionIds === undefined || divisionIds.includes(d.id))
    );

    const working: Meeting[] = [...snapshot.meetings];
    const proposals: ProposedMeeting[] = [];
    const skipped: SkippedCandidate[] = [];

    for (const division of divisions) {
        const committeeTypes = snapshot.committeeTypes.filter(ct => ct.isActive && ct.divisionId === division.id);

        for (const committeeType of committeeTypes) {
            const candidates = suggestDates(
                committeeType,
                division.id,
                start,
                days,
                working,
                snapshot.limits,
                { calendar, events: snapshot.events, division }
            );

            for (const candidate of candidates) {
                const skip = (reasons: string[]): void => {
                    skipped.push({ committeeTypeId: committeeType.id, divisionId: division.id, date: candidate.date, reasons });
                };

                if (!candidate.available) {
                    skip(candidate.reasons);
                    continue;
                }
                if (alreadyMeetsInPeriod(committeeType, candidate.date, working, calendar)) {
                    skip([committeeType.frequency === Frequency.MONTHLY
                        ? 'committee already meets this month'
                        : 'committee already meets this week']);
                    continue;
                }

                // Re-check against proposals accepted since the candidates were built
                const decision = checkCapacity(candidate.date, working, snapshot.events, snapshot.limits, calendar);
                if (!decision.ok) {
                    skip(decision.violations.map(v => v.message));
                    continue;
                }

                proposals.push({
                    committeeTypeId: committeeType.id,
                    divisionId: division.id,
                    date: candidate.date,
                    frequency: committeeType.frequency,
                    status: MeetingStatus.PLANNED
                });
                working.push({
                    id: `proposed:${committeeType.id}:${candidate.date}`,
                    committeeTypeId: committeeType.id,
                    divisionId: division.id,
                    date: candidate.date,
                    status: MeetingStatus.PLANNED
                });
            }
        }
    }

    return { year, month, proposals, skipped };
}
