// src/config/defaults.ts

import { Weekday } from '../models/Calendar';
import type { CapacityLimits } from '../models/Capacity';
import type { RecommendationWeights, SlaDefaults } from '../models/Snapshot';

/**
 * Sunday-Thursday work week
 */
export const DEFAULT_WORK_WEEKDAYS: readonly Weekday[] = [
    Weekday.SUNDAY,
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY
];

export const DEFAULT_LIMITS: CapacityLimits = {
    maxMeetingsPerDay: 1,
    maxMeetingsPerStandardWeek: 3,
    maxMeetingsPerThirdWeek: 4,
    maxRequestsPerDay: 100
};

export const DEFAULT_SLA: SlaDefaults = {
    totalSlaDays: 45,
    stageADays: 10,
    stageBDays: 15,
    stageCDays: 10,
    stageDDays: 10
};

export const DEFAULT_RECOMMENDATION_WEIGHTS: RecommendationWeights = {
    baseScore: 100,
    bestBonus: 25,
    spaceBonus: 10,
    slaBonus: 20,
    optimalRangeBonus: 15,
    noEventsBonus: 5,
    highLoadPenalty: 15,
    mediumLoadPenalty: 5,
    noSpacePenalty: 50,
    noSlaPenalty: 30,
    tightSlaPenalty: 10,
    farFuturePenalty: 10,
    weekFullPenalty: 20,
    optimalRangeStart: 0,
    optimalRangeEnd: 30,
    farFutureThreshold: 60
};
