import { describe, expect, it } from 'vitest';
import { MeetingStatus } from '../../src/models/Meeting';
import { isSchedulingError } from '../../src/engine/errors';
import { canTransition, transitionMeeting } from '../../src/events/meetingStatusHandler';
import { meeting } from '../helpers';

describe('meeting status transitions', () => {
    it('moves a planned meeting to scheduled without touching the input', () => {
        const planned = meeting('M1', '2026-04-01', { status: MeetingStatus.PLANNED });
        const scheduled = transitionMeeting(planned, MeetingStatus.SCHEDULED);

        expect(scheduled.status).toBe(MeetingStatus.SCHEDULED);
        expect(planned.status).toBe(MeetingStatus.PLANNED);
    });

    it('allows cancelling from planned and scheduled', () => {
        expect(canTransition(MeetingStatus.PLANNED, MeetingStatus.CANCELLED)).toBe(true);
        expect(canTransition(MeetingStatus.SCHEDULED, MeetingStatus.CANCELLED)).toBe(true);
        expect(canTransition(MeetingStatus.SCHEDULED, MeetingStatus.COMPLETED)).toBe(true);
    });

    it('treats completed and cancelled as terminal', () => {
        for (const to of Object.values(MeetingStatus)) {
            expect(canTransition(MeetingStatus.COMPLETED, to)).toBe(false);
            expect(canTransition(MeetingStatus.CANCELLED, to)).toBe(false);
        }
    });

    it('rejects skipping straight to completed', () => {
        const planned = meeting('M1', '2026-04-01', { status: MeetingStatus.PLANNED });

        try {
            transitionMeeting(planned, MeetingStatus.COMPLETED);
            expect.unreachable();
        } catch (err) {
            expect(isSchedulingError(err, 'InvalidStatusTransition')).toBe(true);
            expect(err).toHaveProperty('message', 'Cannot move meeting M1 from planned to completed');
        }
    });
});
