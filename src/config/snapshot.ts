// src/config/snapshot.ts

/**
 * Zod schemas for the configuration snapshot handed to the engine.
 * Validates shape and invariants once, at the boundary, then freezes.
 */

import { z } from 'zod';
import { ExceptionDateKind, Weekday } from '../models/Calendar';
import { Frequency } from '../models/CommitteeType';
import { MeetingStatus } from '../models/Meeting';
import type { ConfigurationSnapshot } from '../models/Snapshot';
import { isValidIsoDate } from '../engine/dateUtils';
import { SchedulingError } from '../engine/errors';
import { DEFAULT_LIMITS, DEFAULT_RECOMMENDATION_WEIGHTS, DEFAULT_SLA } from './defaults';

const isoDate = z.string().refine(isValidIsoDate, { message: 'Expected a YYYY-MM-DD date' });
const count = z.number().int().min(0);
const weekday = z.nativeEnum(Weekday);

export const exceptionDateSchema = z.object({
    id: z.string().min(1),
    date: isoDate,
    description: z.string().default(''),
    kind: z.nativeEnum(ExceptionDateKind).default(ExceptionDateKind.HOLIDAY)
});

export const workCalendarSchema = z.object({
    workWeekdays: z.array(weekday),
    exceptionDates: z.array(exceptionDateSchema).default([])
}).superRefine((calendar, ctx) => {
    const seen = new Set<string>();
    calendar.exceptionDates.forEach((exception, index) => {
        if (seen.has(exception.date)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['exceptionDates', index, 'date'],
                message: `Duplicate exception date ${exception.date}`
            });
        }
        seen.add(exception.date);
    });
});

export const capacityLimitsSchema = z.object({
    maxMeetingsPerDay: count,
    maxMeetingsPerStandardWeek: count,
    maxMeetingsPerThirdWeek: count,
    maxRequestsPerDay: count
});

export const stageDurationsSchema = z.object({
    totalSlaDays: count,
    stageADays: count,
    stageBDays: count,
    stageCDays: count,
    stageDDays: count
});

export const recommendationWeightsSchema = z.object({
    baseScore: z.number(),
    bestBonus: z.number(),
    spaceBonus: z.number(),
    slaBonus: z.number(),
    optimalRangeBonus: z.number(),
    noEventsBonus: z.number(),
    highLoadPenalty: z.number(),
    mediumLoadPenalty: z.number(),
    noSpacePenalty: z.number(),
    noSlaPenalty: z.number(),
    tightSlaPenalty: z.number(),
    farFuturePenalty: z.number(),
    weekFullPenalty: z.number(),
    optimalRangeStart: z.number(),
    optimalRangeEnd: z.number(),
    farFutureThreshold: z.number()
});

export const divisionSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    isActive: z.boolean().default(true),
    color: z.string().optional(),
    allowedWeekdays: z.array(weekday).optional()
});

/** Route SLA fields are optional here; gaps are filled from slaDefaults. */
export const routeSchema = stageDurationsSchema.partial().extend({
    id: z.string().min(1),
    divisionId: z.string().min(1),
    name: z.string().min(1),
    isActive: z.boolean().default(true)
});

export const committeeTypeSchema = z.object({
    id: z.string().min(1),
    divisionId: z.string().min(1),
    name: z.string().min(1),
    scheduledWeekday: weekday,
    frequency: z.nativeEnum(Frequency),
    weekOfMonth: z.number().int().min(1).max(5).optional(),
    isOperational: z.boolean().default(false),
    isActive: z.boolean().default(true)
}).refine(ct => (ct.frequency === Frequency.MONTHLY) === (ct.weekOfMonth !== undefined), {
    message: 'weekOfMonth is required for monthly committees and forbidden for weekly ones',
    path: ['weekOfMonth']
});

export const meetingSchema = z.object({
    id: z.string().min(1),
    committeeTypeId: z.string().min(1),
    divisionId: z.string().min(1),
    date: isoDate,
    status: z.nativeEnum(MeetingStatus),
    exceptionDateId: z.string().optional(),
    notes: z.string().optional()
});

export const eventSchema = z.object({
    id: z.string().min(1),
    meetingId: z.string().min(1),
    routeId: z.string().min(1),
    name: z.string().min(1),
    expectedRequests: count.default(0),
    callPublicationDate: isoDate.optional(),
    isCallPublicationManual: z.boolean().default(false),
    callDeadlineDate: isoDate.optional(),
    intakeDeadlineDate: isoDate.optional(),
    reviewDeadlineDate: isoDate.optional(),
    responseDeadlineDate: isoDate.optional()
});

export const snapshotSchema = z.object({
    calendar: workCalendarSchema,
    limits: capacityLimitsSchema.default(() => ({ ...DEFAULT_LIMITS })),
    slaDefaults: stageDurationsSchema.default(() => ({ ...DEFAULT_SLA })),
    recommendation: recommendationWeightsSchema.default(() => ({ ...DEFAULT_RECOMMENDATION_WEIGHTS })),
    divisions: z.array(divisionSchema).default([]),
    routes: z.array(routeSchema).default([]),
    committeeTypes: z.array(committeeTypeSchema).default([]),
    meetings: z.array(meetingSchema).default([]),
    events: z.array(eventSchema).default([])
});

export type SnapshotInput = z.input<typeof snapshotSchema>;

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validate raw reference data and settings into an immutable snapshot
 *
 * @throws SchedulingError InvalidSnapshot
 */
export function loadSnapshot(raw: unknown): ConfigurationSnapshot {
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
        throw new SchedulingError(
            'InvalidSnapshot',
            `Invalid configuration snapshot: ${formatIssues(parsed.error)}`,
            { issues: parsed.error.issues }
        );
    }

    const data = parsed.data;
    const sla = data.slaDefaults;
    const snapshot: ConfigurationSnapshot = {
        ...data,
        routes: data.routes.map(route => ({
            ...route,
            totalSlaDays: route.totalSlaDays ?? sla.totalSlaDays,
            stageADays: route.stageADays ?? sla.stageADays,
            stageBDays: route.stageBDays ?? sla.stageBDays,
            stageCDays: route.stageCDays ?? sla.stageCDays,
            stageDDays: route.stageDDays ?? sla.stageDDays
        }))
    };

    return deepFreeze(snapshot);
}
