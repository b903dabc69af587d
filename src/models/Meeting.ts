// src/models/Meeting.ts

import type { IsoDate } from './Calendar';

/**
 * Meeting lifecycle states
 *
 * Valid transitions:
 * - PLANNED → SCHEDULED (approved)
 * - PLANNED → CANCELLED
 * - SCHEDULED → COMPLETED (meeting held)
 * - SCHEDULED → CANCELLED
 *
 * COMPLETED and CANCELLED are terminal. Meetings are never deleted.
 */
export enum MeetingStatus {
    PLANNED = 'planned',
    SCHEDULED = 'scheduled',
    COMPLETED = 'completed',
    CANCELLED = 'cancelled'
}

/**
 * Concrete occurrence of a committee type
 *
 * Invariant: at most one non-cancelled meeting per (committeeTypeId, divisionId, date)
 */
export interface Meeting {
    id: string;
    committeeTypeId: string;
    divisionId: string;
    date: IsoDate;
    status: MeetingStatus;
    exceptionDateId?: string;  // Explains a deviation from the regular calendar
    notes?: string;
}
