import { describe, expect, it } from 'vitest';
import { CapacityRule } from '../../src/models/Capacity';
import { MeetingStatus } from '../../src/models/Meeting';
import { isSchedulingError } from '../../src/engine/errors';
import { recalculateEventDeadlines, scheduleEvent } from '../../src/events/eventDeadlineHandler';
import { event, LIMITS, makeCalendar, makeRoute, meeting } from '../helpers';

function kindOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (err) {
        return isSchedulingError(err) ? err.kind : 'unexpected';
    }
    return undefined;
}

describe('scheduleEvent', () => {
    const calendar = makeCalendar();
    const route = makeRoute();
    const target = meeting('M1', '2026-03-19');
    const input = { id: 'E-NEW', name: 'Spring call', expectedRequests: 30 };

    it('fills in the stage deadlines', () => {
        const { event: scheduled, decision } = scheduleEvent(input, target, route, [target], [], LIMITS, calendar);

        expect(scheduled).toEqual({
            id: 'E-NEW',
            meetingId: 'M1',
            routeId: 'R1',
            name: 'Spring call',
            expectedRequests: 30,
            isCallPublicationManual: false,
            callPublicationDate: '2026-01-15',
            callDeadlineDate: '2026-01-29',
            intakeDeadlineDate: '2026-02-19',
            reviewDeadlineDate: '2026-03-05',
            responseDeadlineDate: '2026-04-02'
        });
        expect(decision.ok).toBe(true);
        expect(decision.violations).toEqual([]);
    });

    it('reports only the request load of the meeting date', () => {
        const { decision } = scheduleEvent(input, target, route, [target], [event('E1', 'M1', 80)], LIMITS, calendar);

        expect(decision.ok).toBe(false);
        expect(decision.violations).toEqual([{
            rule: CapacityRule.DAILY_REQUESTS,
            message: 'daily request cap exceeded: 110/100',
            current: 110,
            limit: 100
        }]);
    });

    it('does not count the event twice when it is rescheduled', () => {
        const { decision } = scheduleEvent(
            { ...input, id: 'E1', expectedRequests: 90 }, target, route, [target], [event('E1', 'M1', 80)], LIMITS, calendar
        );

        expect(decision.ok).toBe(true);
    });

    it('marks a caller-supplied publication date as manual', () => {
        const { event: scheduled } = scheduleEvent(
            { ...input, callPublicationDate: '2026-01-20' }, target, route, [target], [], LIMITS, calendar
        );

        expect(scheduled.isCallPublicationManual).toBe(true);
        expect(scheduled.reviewDeadlineDate).toBe('2026-03-10');
    });

    it('rejects a route of another division', () => {
        expect(kindOf(() => scheduleEvent(input, target, makeRoute({ divisionId: 'D2' }), [target], [], LIMITS, calendar)))
            .toBe('InvalidRouteConfig');
    });

    it('rejects a cancelled meeting', () => {
        const cancelled = { ...target, status: MeetingStatus.CANCELLED };
        expect(kindOf(() => scheduleEvent(input, cancelled, route, [cancelled], [], LIMITS, calendar))).toBe('InvalidInput');
    });

    it('rejects a publication date too late for the stages', () => {
        expect(kindOf(() => scheduleEvent(
            { ...input, callPublicationDate: '2026-02-01' }, target, route, [target], [], LIMITS, calendar
        ))).toBe('DateOrderingViolation');
    });
});

describe('recalculateEventDeadlines', () => {
    const calendar = makeCalendar();
    const route = makeRoute();

    it('keeps a manual publication date when the meeting moves', () => {
        const { event: scheduled } = scheduleEvent(
            { id: 'E1', name: 'Spring call', expectedRequests: 10, callPublicationDate: '2026-01-20' },
            meeting('M1', '2026-03-19'), route, [], [], LIMITS, calendar
        );
        const moved = recalculateEventDeadlines(scheduled, meeting('M2', '2026-03-26'), route, calendar);

        expect(moved.meetingId).toBe('M2');
        expect(moved.callPublicationDate).toBe('2026-01-20');
        expect(moved.reviewDeadlineDate).toBe('2026-03-10');
        expect(moved.responseDeadlineDate).toBe('2026-04-09');
    });

    it('recomputes a derived publication date', () => {
        const original = { ...event('E1', 'M1', 10), callPublicationDate: '2026-01-15' };
        const moved = recalculateEventDeadlines(original, meeting('M1', '2026-03-19'), makeRoute({ totalSlaDays: 40 }), calendar);

        expect(moved.callPublicationDate).toBe(calendar.stepBusinessDays('2026-03-19', -40));
        expect(moved.isCallPublicationManual).toBe(false);
    });
});
