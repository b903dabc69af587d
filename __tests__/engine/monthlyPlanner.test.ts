import { describe, expect, it } from 'vitest';
import { loadSnapshot } from '../../src/config/snapshot';
import { MeetingStatus } from '../../src/models/Meeting';
import { SchedulingEngine } from '../../src/engine/schedulingEngine';
import sampleSnapshot from '../../src/simulation/sampleSnapshot.json';

function engineWith(extraMeetings: object[] = []): SchedulingEngine {
    return new SchedulingEngine(loadSnapshot({
        ...sampleSnapshot,
        meetings: [...sampleSnapshot.meetings, ...extraMeetings]
    }));
}

describe('generateMonthlySchedule', () => {
    it('proposes every recurrence that fits and explains the rest', () => {
        const schedule = engineWith().generateMonthlySchedule(2026, 5);

        expect(schedule.proposals.map(p => `${p.committeeTypeId} ${p.date}`)).toEqual([
            'CT-RES-W 2026-05-11',
            'CT-RES-W 2026-05-18',
            'CT-RES-W 2026-05-25',
            'CT-RES-M 2026-05-19',
            'CT-IND-W 2026-05-06',
            'CT-IND-W 2026-05-13',
            'CT-IND-W 2026-05-20',
            'CT-IND-W 2026-05-27'
        ]);
        expect(schedule.proposals.every(p => p.status === MeetingStatus.PLANNED)).toBe(true);
        expect(schedule.skipped).toEqual([
            {
                committeeTypeId: 'CT-RES-W',
                divisionId: 'D-RES',
                date: '2026-05-04',
                reasons: ['committee already has a meeting on this date', 'daily meeting cap exceeded: 1/1']
            },
            {
                committeeTypeId: 'CT-IND-M',
                divisionId: 'D-IND',
                date: '2026-05-21',
                reasons: ['falls on exception date: Shavuot eve closure']
            }
        ]);
    });

    it('plans only the requested divisions', () => {
        const schedule = engineWith().generateMonthlySchedule(2026, 5, ['D-IND']);

        expect(schedule.proposals.map(p => p.date)).toEqual(['2026-05-06', '2026-05-13', '2026-05-20', '2026-05-27']);
        expect(schedule.skipped.map(s => s.date)).toEqual(['2026-05-21']);
    });

    it('skips a monthly committee that already meets that month', () => {
        const schedule = engineWith([
            { id: 'M-X', committeeTypeId: 'CT-RES-M', divisionId: 'D-RES', date: '2026-05-12', status: 'planned' }
        ]).generateMonthlySchedule(2026, 5, ['D-RES']);

        expect(schedule.proposals.some(p => p.committeeTypeId === 'CT-RES-M')).toBe(false);
        expect(schedule.skipped).toContainEqual({
            committeeTypeId: 'CT-RES-M',
            divisionId: 'D-RES',
            date: '2026-05-19',
            reasons: ['committee already meets this month']
        });
    });

    it('skips a weekly committee that already meets that week', () => {
        const schedule = engineWith([
            { id: 'M-X', committeeTypeId: 'CT-IND-W', divisionId: 'D-IND', date: '2026-05-14', status: 'scheduled' }
        ]).generateMonthlySchedule(2026, 5, ['D-IND']);

        expect(schedule.proposals.map(p => p.date)).toEqual(['2026-05-06', '2026-05-20', '2026-05-27']);
        expect(schedule.skipped[0]).toEqual({
            committeeTypeId: 'CT-IND-W',
            divisionId: 'D-IND',
            date: '2026-05-13',
            reasons: ['committee already meets this week']
        });
    });

    it('ignores cancelled meetings when checking the period', () => {
        const schedule = engineWith([
            { id: 'M-X', committeeTypeId: 'CT-RES-M', divisionId: 'D-RES', date: '2026-05-12', status: 'cancelled' }
        ]).generateMonthlySchedule(2026, 5, ['D-RES']);

        expect(schedule.proposals.map(p => p.date)).toContain('2026-05-19');
    });
});
