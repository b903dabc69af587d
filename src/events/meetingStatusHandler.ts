// src/events/meetingStatusHandler.ts

import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import { SchedulingError } from '../engine/errors';

const TRANSITIONS: Readonly<Record<MeetingStatus, readonly MeetingStatus[]>> = {
    [MeetingStatus.PLANNED]: [MeetingStatus.SCHEDULED, MeetingStatus.CANCELLED],
    [MeetingStatus.SCHEDULED]: [MeetingStatus.COMPLETED, MeetingStatus.CANCELLED],
    [MeetingStatus.COMPLETED]: [],
    [MeetingStatus.CANCELLED]: []
};

export function canTransition(from: MeetingStatus, to: MeetingStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

/**
 * Handle a meeting status change
 *
 * State transitions: PLANNED → SCHEDULED | CANCELLED,
 *                    SCHEDULED → COMPLETED | CANCELLED
 *
 * Cancelling frees the (committee type, division, date) slot for a new meeting.
 *
 * @returns Updated copy; the input meeting is left untouched
 * @throws SchedulingError InvalidStatusTransition
 */
export function transitionMeeting(meeting: Meeting, to: MeetingStatus): Meeting {
    if (!canTransition(meeting.status, to)) {
        throw new SchedulingError(
            'InvalidStatusTransition',
            `Cannot move meeting ${meeting.id} from ${meeting.status} to ${to}`,
            { meetingId: meeting.id, from: meeting.status, to }
        );
    }

    return { ...meeting, status: to };
}
