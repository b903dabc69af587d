// src/engine/schedulingEngine.ts

import type { IsoDate } from '../models/Calendar';
import type { Candidate } from '../models/Candidate';
import type { CommitteeType } from '../models/CommitteeType';
import type { Decision } from '../models/Capacity';
import type { Event, StageDeadlines } from '../models/Event';
import type { Meeting, MeetingStatus } from '../models/Meeting';
import type { Route } from '../models/Route';
import type { ConfigurationSnapshot } from '../models/Snapshot';
import { BusinessCalendar } from './calendar';
import { checkCapacity } from './capacityValidator';
import type { CapacityOptions } from './capacityValidator';
import { recommendCommittees } from './committeeRecommender';
import type { Recommendation } from './committeeRecommender';
import { suggestDates } from './dateSuggester';
import { computeStageDeadlines } from './deadlineCalculator';
import { generateMonthlySchedule } from './monthlyPlanner';
import type { MonthlySchedule } from './monthlyPlanner';
import { SchedulingError } from './errors';
import { acceptMeeting, CapacityPolicy } from '../events/meetingAcceptanceHandler';
import type { AcceptanceResult, MeetingRequest } from '../events/meetingAcceptanceHandler';
import { recalculateEventDeadlines, scheduleEvent } from '../events/eventDeadlineHandler';
import type { NewEventInput, ScheduledEvent } from '../events/eventDeadlineHandler';
import { transitionMeeting } from '../events/meetingStatusHandler';

/**
 * Engine facade bound to one configuration snapshot
 *
 * Holds no mutable state: every method reads the snapshot it was built
 * with and returns a fresh value. Safe to share across concurrent callers.
 */
export class SchedulingEngine {
    readonly snapshot: ConfigurationSnapshot;
    readonly calendar: BusinessCalendar;

    constructor(snapshot: ConfigurationSnapshot) {
        this.snapshot = snapshot;
        this.calendar = new BusinessCalendar(snapshot.calendar);
    }

    isBusinessDay(date: IsoDate): boolean {
        return this.calendar.isBusinessDay(date);
    }

    stepBusinessDays(date: IsoDate, n: number): IsoDate {
        return this.calendar.stepBusinessDays(date, n);
    }

    computeStageDeadlines(meetingDate: IsoDate, route: Route, callPublicationDate?: IsoDate): StageDeadlines {
        return computeStageDeadlines(meetingDate, route, this.calendar, callPublicationDate);
    }

    /**
     * Capacity check against the snapshot's meetings and events
     */
    checkCapacity(candidateDate: IsoDate, options: CapacityOptions = {}): Decision {
        return checkCapacity(
            candidateDate,
            this.snapshot.meetings,
            this.snapshot.events,
            this.snapshot.limits,
            this.calendar,
            options
        );
    }

    suggestDates(
        committeeType: CommitteeType,
        divisionId: string,
        searchFrom: IsoDate,
        searchWindowDays: number,
        proposedRequests?: number
    ): Candidate[] {
        return suggestDates(
            committeeType,
            divisionId,
            searchFrom,
            searchWindowDays,
            this.snapshot.meetings,
            this.snapshot.limits,
            {
                calendar: this.calendar,
                events: this.snapshot.events,
                division: this.snapshot.divisions.find(d => d.id === divisionId),
                proposedRequests
            }
        );
    }

    generateMonthlySchedule(year: number, month: number, divisionIds?: readonly string[]): MonthlySchedule {
        return generateMonthlySchedule(this.snapshot, this.calendar, year, month, divisionIds);
    }

    recommendCommittees(routeId: string, expectedRequests: number, today: IsoDate, limit?: number): Recommendation[] {
        return recommendCommittees(this.getRoute(routeId), expectedRequests, this.snapshot, this.calendar, today, limit);
    }

    /**
     * Accept a date into a new meeting against the snapshot's meetings,
     * events, limits and the requesting division
     */
    acceptMeeting(request: MeetingRequest, policy: CapacityPolicy = CapacityPolicy.ADVISORY): AcceptanceResult {
        return acceptMeeting(
            request,
            this.getCommitteeType(request.committeeTypeId),
            this.snapshot.meetings,
            this.snapshot.events,
            this.snapshot.limits,
            this.calendar,
            policy,
            this.snapshot.divisions.find(d => d.id === request.divisionId)
        );
    }

    transitionMeeting(meetingId: string, to: MeetingStatus): Meeting {
        return transitionMeeting(this.getMeeting(meetingId), to);
    }

    scheduleEvent(input: NewEventInput, meetingId: string, routeId: string): ScheduledEvent {
        return scheduleEvent(
            input,
            this.getMeeting(meetingId),
            this.getRoute(routeId),
            this.snapshot.meetings,
            this.snapshot.events,
            this.snapshot.limits,
            this.calendar
        );
    }

    /**
     * Recompute an event's deadlines, by default against its own meeting and route
     */
    recalculateEventDeadlines(event: Event, meetingId: string = event.meetingId, routeId: string = event.routeId): Event {
        return recalculateEventDeadlines(event, this.getMeeting(meetingId), this.getRoute(routeId), this.calendar);
    }

    getMeeting(meetingId: string): Meeting {
        const meeting = this.snapshot.meetings.find(m => m.id === meetingId);
        if (!meeting) {
            throw new SchedulingError('InvalidInput', `Meeting ${meetingId} not found`, { meetingId });
        }
        return meeting;
    }

    getRoute(routeId: string): Route {
        const route = this.snapshot.routes.find(r => r.id === routeId);
        if (!route) {
            throw new SchedulingError('InvalidRouteConfig', `Route ${routeId} not found`, { routeId });
        }
        return route;
    }

    getCommitteeType(committeeTypeId: string): CommitteeType {
        const committeeType = this.snapshot.committeeTypes.find(ct => ct.id === committeeTypeId);
        if (!committeeType) {
            throw new SchedulingError('InvalidCommitteeTypeConfig', `Committee type ${committeeTypeId} not found`, { committeeTypeId });
        }
        return committeeType;
    }

    meetingsOn(date: IsoDate): Meeting[] {
        return this.snapshot.meetings.filter(m => m.date === date);
    }

    eventsFor(meetingId: string): Event[] {
        return this.snapshot.events.filter(e => e.meetingId === meetingId);
    }
}
