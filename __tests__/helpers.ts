// __tests__/helpers.ts

import { ExceptionDateKind, Weekday } from '../src/models/Calendar';
import type { ExceptionDate, WorkCalendar } from '../src/models/Calendar';
import type { CapacityLimits } from '../src/models/Capacity';
import { Frequency } from '../src/models/CommitteeType';
import type { CommitteeType } from '../src/models/CommitteeType';
import type { Event } from '../src/models/Event';
import { MeetingStatus } from '../src/models/Meeting';
import type { Meeting } from '../src/models/Meeting';
import type { Route } from '../src/models/Route';
import { BusinessCalendar } from '../src/engine/calendar';

export const SUN_THU = [Weekday.SUNDAY, Weekday.MONDAY, Weekday.TUESDAY, Weekday.WEDNESDAY, Weekday.THURSDAY];

export const LIMITS: CapacityLimits = {
    maxMeetingsPerDay: 1,
    maxMeetingsPerStandardWeek: 3,
    maxMeetingsPerThirdWeek: 4,
    maxRequestsPerDay: 100
};

export function exceptionDate(id: string, date: string, description = ''): ExceptionDate {
    return { id, date, description, kind: ExceptionDateKind.HOLIDAY };
}

export function makeCalendar(exceptionDates: ExceptionDate[] = [], workWeekdays: Weekday[] = SUN_THU): BusinessCalendar {
    const calendar: WorkCalendar = { workWeekdays, exceptionDates };
    return new BusinessCalendar(calendar);
}

export function makeRoute(overrides: Partial<Route> = {}): Route {
    return {
        id: 'R1',
        divisionId: 'D1',
        name: 'Standard track',
        isActive: true,
        totalSlaDays: 45,
        stageADays: 10,
        stageBDays: 15,
        stageCDays: 10,
        stageDDays: 10,
        ...overrides
    };
}

export function weeklyType(id: string, scheduledWeekday: Weekday, divisionId = 'D1'): CommitteeType {
    return {
        id,
        divisionId,
        name: `Committee ${id}`,
        scheduledWeekday,
        frequency: Frequency.WEEKLY,
        isOperational: false,
        isActive: true
    };
}

export function monthlyType(id: string, scheduledWeekday: Weekday, weekOfMonth: number, divisionId = 'D1'): CommitteeType {
    return { ...weeklyType(id, scheduledWeekday, divisionId), frequency: Frequency.MONTHLY, weekOfMonth };
}

export function meeting(id: string, date: string, overrides: Partial<Meeting> = {}): Meeting {
    return {
        id,
        committeeTypeId: 'CT1',
        divisionId: 'D1',
        date,
        status: MeetingStatus.SCHEDULED,
        ...overrides
    };
}

export function event(id: string, meetingId: string, expectedRequests: number): Event {
    return {
        id,
        meetingId,
        routeId: 'R1',
        name: `Event ${id}`,
        expectedRequests,
        isCallPublicationManual: false
    };
}
