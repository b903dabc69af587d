// src/models/Capacity.ts

import type { IsoDate } from './Calendar';

/**
 * Capacity ceilings. 0 means nothing is permitted, not unlimited.
 */
export interface CapacityLimits {
    maxMeetingsPerDay: number;
    maxMeetingsPerStandardWeek: number;
    maxMeetingsPerThirdWeek: number;
    maxRequestsPerDay: number;
}

export enum CapacityRule {
    DAILY_MEETINGS = 'DAILY_MEETINGS',
    WEEKLY_MEETINGS = 'WEEKLY_MEETINGS',
    THIRD_WEEK_MEETINGS = 'THIRD_WEEK_MEETINGS',
    DAILY_REQUESTS = 'DAILY_REQUESTS'
}

export interface Violation {
    rule: CapacityRule;
    message: string;
    current: number;
    limit: number;
}

export interface CapacityCounts {
    meetingsOnDate: number;
    meetingsInWeek: number;
    weekStart: IsoDate;
    weekEnd: IsoDate;
    isThirdWeek: boolean;
    weeklyLimit: number;
    requestsOnDate: number;
    proposedRequests: number;
}

/**
 * Advisory capacity result. Callers that hard-enforce reject any
 * decision with violations.
 */
export interface Decision {
    ok: boolean;
    violations: Violation[];
    counts: CapacityCounts;
}
