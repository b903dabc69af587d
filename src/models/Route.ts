// src/models/Route.ts

/**
 * Stage durations, in business days, in lifecycle order:
 * A = call publication window, B = intake, C = review, D = response
 */
export interface StageDurations {
    totalSlaDays: number;
    stageADays: number;
    stageBDays: number;
    stageCDays: number;
    stageDDays: number;
}

/**
 * Funding track with its own SLA configuration
 *
 * Invariant: all durations are non-negative integers
 */
export interface Route extends StageDurations {
    id: string;
    divisionId: string;
    name: string;
    isActive: boolean;
}
