// src/config/settings.ts

import { z } from 'zod';
import type { Weekday } from '../models/Calendar';
import type { ConfigurationSnapshot, RecommendationWeights } from '../models/Snapshot';
import { weekdayFromOrdinal } from '../engine/dateUtils';
import { DEFAULT_LIMITS, DEFAULT_RECOMMENDATION_WEIGHTS, DEFAULT_WORK_WEEKDAYS } from './defaults';
import { loadSnapshot, recommendationWeightsSchema } from './snapshot';
import type { SnapshotInput } from './snapshot';

/**
 * Raw key/value rows of the settings table, e.g. { max_meetings_per_day: '1' }
 */
export type SettingsTable = Readonly<Record<string, string | undefined>>;

export type ReferenceData = Omit<SnapshotInput, 'calendar' | 'limits' | 'recommendation'> & {
    exceptionDates?: SnapshotInput['calendar']['exceptionDates'];
};

const intSetting = z.string().trim().regex(/^-?\d+$/).transform(Number);

// Stored with Monday = 0 ... Sunday = 6
const workDaysSetting = z
    .string()
    .transform(value => value.split(',').map(part => part.trim()))
    .pipe(z.array(z.string().regex(/^[0-6]$/).transform(Number)).min(1));

/**
 * Comma-separated weekday numbers as the settings table stores them
 * (Monday = 0, Sunday = 6), converted to Sunday-first ordinals
 */
export function readWorkDays(settings: SettingsTable): Weekday[] {
    const parsed = workDaysSetting.safeParse(settings.work_days);
    return parsed.success
        ? parsed.data.map(day => weekdayFromOrdinal(day + 1))
        : [...DEFAULT_WORK_WEEKDAYS];
}

const RECOMMENDATION_KEYS: Readonly<Record<keyof RecommendationWeights, string>> = {
    baseScore: 'rec_base_score',
    bestBonus: 'rec_best_bonus',
    spaceBonus: 'rec_space_bonus',
    slaBonus: 'rec_sla_bonus',
    optimalRangeBonus: 'rec_optimal_range_bonus',
    noEventsBonus: 'rec_no_events_bonus',
    highLoadPenalty: 'rec_high_load_penalty',
    mediumLoadPenalty: 'rec_medium_load_penalty',
    noSpacePenalty: 'rec_no_space_penalty',
    noSlaPenalty: 'rec_no_sla_penalty',
    tightSlaPenalty: 'rec_tight_sla_penalty',
    farFuturePenalty: 'rec_far_future_penalty',
    weekFullPenalty: 'rec_week_full_penalty',
    optimalRangeStart: 'rec_optimal_range_start',
    optimalRangeEnd: 'rec_optimal_range_end',
    farFutureThreshold: 'rec_far_future_threshold'
};

function readRecommendationWeights(settings: SettingsTable): RecommendationWeights {
    const weights: RecommendationWeights = { ...DEFAULT_RECOMMENDATION_WEIGHTS };
    for (const field of recommendationWeightsSchema.keyof().options) {
        weights[field] = readIntSetting(settings, RECOMMENDATION_KEYS[field], weights[field]);
    }
    return weights;
}

/**
 * Build a snapshot from the settings table plus reference data read in
 * the same transaction
 *
 * @throws SchedulingError InvalidSnapshot
 */
export function snapshotFromSettings(settings: SettingsTable, reference: ReferenceData): ConfigurationSnapshot {
    const { exceptionDates, ...rest } = reference;
    const maxRequests = readIntSetting(
        settings,
        'max_requests_per_day',
        readIntSetting(settings, 'max_requests_committee_date', DEFAULT_LIMITS.maxRequestsPerDay)
    );

    return loadSnapshot({
        ...rest,
        calendar: {
            workWeekdays: readWorkDays(settings),
            exceptionDates: exceptionDates ?? []
        },
        limits: {
            maxMeetingsPerDay: readIntSetting(settings, 'max_meetings_per_day', DEFAULT_LIMITS.maxMeetingsPerDay),
            maxMeetingsPerStandardWeek: readIntSetting(settings, 'max_weekly_meetings', DEFAULT_LIMITS.maxMeetingsPerStandardWeek),
            maxMeetingsPerThirdWeek: readIntSetting(settings, 'max_third_week_meetings', DEFAULT_LIMITS.maxMeetingsPerThirdWeek),
            maxRequestsPerDay: maxRequests
        },
        recommendation: readRecommendationWeights(settings)
    });
}
