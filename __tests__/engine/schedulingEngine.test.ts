import { describe, expect, it } from 'vitest';
import { loadSnapshot } from '../../src/config/snapshot';
import { MeetingStatus } from '../../src/models/Meeting';
import { CapacityPolicy } from '../../src/events/meetingAcceptanceHandler';
import { SchedulingEngine } from '../../src/engine/schedulingEngine';
import sampleSnapshot from '../../src/simulation/sampleSnapshot.json';

describe('SchedulingEngine', () => {
    const engine = new SchedulingEngine(loadSnapshot(sampleSnapshot));

    it('answers calendar questions from the snapshot', () => {
        expect(engine.isBusinessDay('2026-05-21')).toBe(false);
        expect(engine.stepBusinessDays('2026-05-20', 1)).toBe('2026-05-24');
    });

    it('computes deadlines for a route with its own SLA', () => {
        expect(engine.computeStageDeadlines('2026-05-06', engine.getRoute('R-IND'))).toEqual({
            callPublicationDate: '2026-03-24',
            callDeadline: '2026-03-31',
            intakeDeadline: '2026-04-15',
            reviewDeadline: '2026-04-22',
            responseDeadline: '2026-05-13'
        });
    });

    it('fills route SLA gaps from the defaults', () => {
        expect(engine.computeStageDeadlines('2026-05-11', engine.getRoute('R-RES'))).toEqual({
            callPublicationDate: '2026-03-08',
            callDeadline: '2026-03-22',
            intakeDeadline: '2026-04-13',
            reviewDeadline: '2026-04-27',
            responseDeadline: '2026-05-26'
        });
    });

    it('checks capacity against the snapshot meetings and events', () => {
        const decision = engine.checkCapacity('2026-05-04', { proposedRequests: 10 });

        expect(decision.violations.map(v => v.message)).toEqual(['daily meeting cap exceeded: 1/1']);
        expect(decision.counts.requestsOnDate).toBe(40);
    });

    it('suggests dates with the division looked up', () => {
        const candidates = engine.suggestDates(engine.getCommitteeType('CT-IND-W'), 'D-IND', '2026-05-01', 14);

        expect(candidates.map(c => [c.date, c.available])).toEqual([
            ['2026-05-06', true],
            ['2026-05-13', true]
        ]);
    });

    it('looks up meetings by date and events by meeting', () => {
        expect(engine.meetingsOn('2026-05-04').map(m => m.id)).toEqual(['M-0']);
        expect(engine.eventsFor('M-0').map(e => e.id)).toEqual(['E-0']);
    });

    it('rejects unknown committee types', () => {
        expect(() => engine.getCommitteeType('CT-NONE')).toThrow('Committee type CT-NONE not found');
    });
});

describe('SchedulingEngine lifecycle operations', () => {
    const engine = new SchedulingEngine(loadSnapshot(sampleSnapshot));
    const request = { id: 'M-9', committeeTypeId: 'CT-RES-W', divisionId: 'D-RES', date: '2026-05-11' };

    it('accepts a free date against the snapshot meetings', () => {
        const result = engine.acceptMeeting(request, CapacityPolicy.ENFORCE);

        expect(result.meeting?.status).toBe(MeetingStatus.PLANNED);
        expect(result.warnings).toEqual([]);
    });

    it('rejects a slot the snapshot already holds', () => {
        expect(() => engine.acceptMeeting({ ...request, date: '2026-05-04' }))
            .toThrow('Meeting M-0 already holds CT-RES-W/D-RES on 2026-05-04');
    });

    it('applies the division weekday restriction from the snapshot', () => {
        const restricted = new SchedulingEngine(loadSnapshot({
            ...sampleSnapshot,
            divisions: [{ id: 'D-RES', name: 'Research Grants', allowedWeekdays: [3] }]
        }));
        const result = restricted.acceptMeeting(request, CapacityPolicy.ENFORCE);

        expect(result.meeting).toBeNull();
        expect(result.warnings).toEqual(['division does not convene on this weekday']);
    });

    it('moves a snapshot meeting to another status', () => {
        expect(engine.transitionMeeting('M-0', MeetingStatus.COMPLETED).status).toBe(MeetingStatus.COMPLETED);
    });

    it('schedules an event on a snapshot meeting and reports the load', () => {
        const { event, decision } = engine.scheduleEvent({ id: 'E-1', name: 'Summer call', expectedRequests: 70 }, 'M-0', 'R-RES');

        expect(event.meetingId).toBe('M-0');
        expect(decision.violations.map(v => v.message)).toEqual(['daily request cap exceeded: 110/100']);
        expect(engine.recalculateEventDeadlines(event)).toEqual(event);
    });

    it('rejects an unknown meeting', () => {
        expect(() => engine.transitionMeeting('M-404', MeetingStatus.CANCELLED)).toThrow('Meeting M-404 not found');
    });
});
