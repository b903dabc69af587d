// src/models/Division.ts

import type { Weekday } from './Calendar';

/**
 * Organizational unit owning routes and committee types
 *
 * Invariant: name unique among active divisions
 */
export interface Division {
    id: string;
    name: string;
    isActive: boolean;
    color?: string;
    allowedWeekdays?: readonly Weekday[];  // Empty or absent: no restriction
}
