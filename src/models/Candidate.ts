// src/models/Candidate.ts

import type { IsoDate } from './Calendar';
import type { Decision } from './Capacity';

/**
 * Suggested meeting date. Unavailable dates are returned too,
 * with the reasons, so the caller can pick another date or override.
 */
export interface Candidate {
    date: IsoDate;
    available: boolean;
    reasons: string[];
    decision?: Decision;  // Absent for non-business dates
}
