// src/models/Snapshot.ts

import type { WorkCalendar } from './Calendar';
import type { CapacityLimits } from './Capacity';
import type { CommitteeType } from './CommitteeType';
import type { Division } from './Division';
import type { Event } from './Event';
import type { Meeting } from './Meeting';
import type { Route, StageDurations } from './Route';

/**
 * Fallback durations for routes stored without SLA configuration
 */
export type SlaDefaults = StageDurations;

/**
 * Scoring weights for committee recommendations
 */
export interface RecommendationWeights {
    baseScore: number;
    bestBonus: number;
    spaceBonus: number;
    slaBonus: number;
    optimalRangeBonus: number;
    noEventsBonus: number;
    highLoadPenalty: number;
    mediumLoadPenalty: number;
    noSpacePenalty: number;
    noSlaPenalty: number;
    tightSlaPenalty: number;
    farFuturePenalty: number;
    weekFullPenalty: number;
    optimalRangeStart: number;
    optimalRangeEnd: number;
    farFutureThreshold: number;
}

/**
 * Read-only view of settings and reference data, produced by the
 * data store in one consistent read. Never mutated by the engine.
 */
export interface ConfigurationSnapshot {
    calendar: WorkCalendar;
    limits: CapacityLimits;
    slaDefaults: SlaDefaults;
    recommendation: RecommendationWeights;
    divisions: readonly Division[];
    routes: readonly Route[];
    committeeTypes: readonly CommitteeType[];
    meetings: readonly Meeting[];
    events: readonly Event[];
}
