import { describe, expect, it } from 'vitest';
import { readIntSetting, readWorkDays, snapshotFromSettings } from '../../src/config/settings';
import { Weekday } from '../../src/models/Calendar';
import { BusinessCalendar } from '../../src/engine/calendar';

describe('readIntSetting', () => {
    it('parses integers and falls back on missing or malformed values', () => {
        const settings = { max_meetings_per_day: ' 2 ', max_weekly_meetings: 'three' };

        expect(readIntSetting(settings, 'max_meetings_per_day', 1)).toBe(2);
        expect(readIntSetting(settings, 'max_weekly_meetings', 3)).toBe(3);
        expect(readIntSetting(settings, 'max_third_week_meetings', 4)).toBe(4);
    });
});

describe('readWorkDays', () => {
    it('converts Monday-first stored numbers to Sunday-first weekdays', () => {
        expect(readWorkDays({ work_days: '6, 0,1,2,3' })).toEqual([
            Weekday.SUNDAY, Weekday.MONDAY, Weekday.TUESDAY, Weekday.WEDNESDAY, Weekday.THURSDAY
        ]);
        expect(readWorkDays({ work_days: '0,1,2,3,4' })).toEqual([
            Weekday.MONDAY, Weekday.TUESDAY, Weekday.WEDNESDAY, Weekday.THURSDAY, Weekday.FRIDAY
        ]);
    });

    it('falls back to Sunday-Thursday', () => {
        const sunThu = [Weekday.SUNDAY, Weekday.MONDAY, Weekday.TUESDAY, Weekday.WEDNESDAY, Weekday.THURSDAY];
        expect(readWorkDays({})).toEqual(sunThu);
        expect(readWorkDays({ work_days: '0,7' })).toEqual(sunThu);
        expect(readWorkDays({ work_days: '' })).toEqual(sunThu);
    });
});

describe('snapshotFromSettings', () => {
    it('builds limits, weights and calendar from the settings table', () => {
        const snapshot = snapshotFromSettings(
            {
                max_meetings_per_day: '2',
                max_weekly_meetings: '5',
                max_requests_committee_date: '150',
                work_days: '0,1,2,3,4',
                rec_base_score: '80'
            },
            {
                divisions: [{ id: 'D1', name: 'Research' }],
                exceptionDates: [{ id: 'X1', date: '2026-04-02', description: 'Passover' }]
            }
        );

        expect(snapshot.limits).toEqual({
            maxMeetingsPerDay: 2,
            maxMeetingsPerStandardWeek: 5,
            maxMeetingsPerThirdWeek: 4,
            maxRequestsPerDay: 150
        });
        expect(snapshot.recommendation.baseScore).toBe(80);
        expect(snapshot.recommendation.bestBonus).toBe(25);
        expect(snapshot.calendar.workWeekdays).toEqual([1, 2, 3, 4, 5]);
        expect(snapshot.calendar.exceptionDates.map(x => x.description)).toEqual(['Passover']);
    });

    it('keeps Saturday off a stored Sunday-Friday week', () => {
        const snapshot = snapshotFromSettings({ work_days: '6,0,1,2,3,4' }, {});
        const calendar = new BusinessCalendar(snapshot.calendar);

        expect(snapshot.calendar.workWeekdays).toEqual([0, 1, 2, 3, 4, 5]);
        expect(calendar.isBusinessDay('2026-03-20')).toBe(true);
        expect(calendar.isBusinessDay('2026-03-21')).toBe(false);
        expect(calendar.weekStartWeekday).toBe(Weekday.SUNDAY);
    });

    it('prefers max_requests_per_day over the legacy key', () => {
        const snapshot = snapshotFromSettings({ max_requests_per_day: '60', max_requests_committee_date: '150' }, {});

        expect(snapshot.limits.maxRequestsPerDay).toBe(60);
    });
});
