// src/models/CommitteeType.ts

import type { Weekday } from './Calendar';

export enum Frequency {
    WEEKLY = 'weekly',
    MONTHLY = 'monthly'
}

/**
 * Recurrence rule for a committee
 *
 * Invariant: weekOfMonth is set iff frequency is MONTHLY
 * weekOfMonth counts occurrences of scheduledWeekday within the month (1-5)
 */
export interface CommitteeType {
    id: string;
    divisionId: string;
    name: string;
    scheduledWeekday: Weekday;
    frequency: Frequency;
    weekOfMonth?: number;
    isOperational: boolean;
    isActive: boolean;
}
