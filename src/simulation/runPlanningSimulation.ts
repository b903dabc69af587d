// src/simulation/runPlanningSimulation.ts

import type { IsoDate } from '../models/Calendar';
import type { Event } from '../models/Event';
import { MeetingStatus } from '../models/Meeting';
import type { Meeting } from '../models/Meeting';
import type { ConfigurationSnapshot } from '../models/Snapshot';
import { loadSnapshot } from '../config/snapshot';
import { addDays, compareDates, monthRange } from '../engine/dateUtils';
import { isSchedulingError } from '../engine/errors';
import { SchedulingEngine } from '../engine/schedulingEngine';
import { acceptMeeting, CapacityPolicy } from '../events/meetingAcceptanceHandler';
import { scheduleEvent } from '../events/eventDeadlineHandler';
import { transitionMeeting } from '../events/meetingStatusHandler';

/**
 * Month planning walkthrough
 *
 * Demonstrates the caller's side of the engine:
 * - Monthly proposal generation across divisions
 * - Acceptance of proposals under an enforcing capacity policy
 * - Status transitions
 * - Event scheduling with SLA deadlines
 * - Committee recommendations for a new event
 * - Invariant checks against a fresh snapshot
 */

export interface SimulationOptions {
    year: number;
    month: number;
    today?: IsoDate;               // Reference date for recommendations
    requestsPerEvent?: number;
    log?: (message: string) => void;
}

export interface SimulationSummary {
    proposed: number;
    skipped: number;
    accepted: number;
    rejected: number;
    events: number;
    eventsRejected: number;
    invariantsHold: boolean;
}

// Logging helpers
function consoleLog(message: string): void {
    console.log(`[${new Date().toISOString()}] ${message}`);
}

export function runPlanningSimulation(snapshot: ConfigurationSnapshot, options: SimulationOptions): SimulationSummary {
    const log = options.log ?? consoleLog;
    const logSection = (title: string): void => {
        log('='.repeat(80));
        log(title);
        log('='.repeat(80));
    };

    const engine = new SchedulingEngine(snapshot);
    const monthStart = monthRange(options.year, options.month).start;
    const requestsPerEvent = options.requestsPerEvent ?? 25;

    logSection(`PLANNING SIMULATION ${monthStart.slice(0, 7)} - START`);
    log(`Work week starts on weekday ${engine.calendar.weekStartWeekday}`);
    log(`Exception dates: ${snapshot.calendar.exceptionDates.length}`);

    // ========== STEP 1: Propose the month ==========
    logSection('STEP 1: Generating monthly proposals');

    const schedule = engine.generateMonthlySchedule(options.year, options.month);
    schedule.proposals.forEach(p => log(`  + ${p.date} ${p.committeeTypeId} (${p.divisionId}, ${p.frequency})`));
    schedule.skipped.forEach(s => log(`  - ${s.date} ${s.committeeTypeId}: ${s.reasons.join('; ')}`));
    log(`Proposed ${schedule.proposals.length}, skipped ${schedule.skipped.length}`);

    // ========== STEP 2: Accept proposals ==========
    logSection('STEP 2: Accepting proposals');

    const meetings: Meeting[] = [...snapshot.meetings];
    let rejected = 0;
    schedule.proposals.forEach((proposal, index) => {
        const result = acceptMeeting(
            {
                id: `M-${index + 1}`,
                committeeTypeId: proposal.committeeTypeId,
                divisionId: proposal.divisionId,
                date: proposal.date
            },
            engine.getCommitteeType(proposal.committeeTypeId),
            meetings,
            snapshot.events,
            snapshot.limits,
            engine.calendar,
            CapacityPolicy.ENFORCE,
            snapshot.divisions.find(d => d.id === proposal.divisionId)
        );

        if (!result.meeting) {
            rejected++;
            log(`  ✗ ${proposal.date} ${proposal.committeeTypeId}: ${result.warnings.join('; ')}`);
            return;
        }

        const scheduled = transitionMeeting(result.meeting, MeetingStatus.SCHEDULED);
        meetings.push(scheduled);
        log(`  ✓ ${scheduled.id} ${scheduled.date} ${scheduled.committeeTypeId} → ${scheduled.status}`);
    });

    // ========== STEP 3: Attach one event per route ==========
    logSection('STEP 3: Scheduling events');

    const accepted = meetings.filter(m => !snapshot.meetings.some(existing => existing.id === m.id));
    const events: Event[] = [...snapshot.events];
    let eventsRejected = 0;

    for (const route of snapshot.routes.filter(r => r.isActive)) {
        const meeting = accepted
            .filter(m => m.divisionId === route.divisionId)
            .sort((a, b) => compareDates(a.date, b.date))[0];
        if (!meeting) {
            log(`  Route ${route.id}: no meeting this month`);
            continue;
        }

        try {
            const { event, decision } = scheduleEvent(
                { id: `E-${route.id}-${meeting.date}`, name: `${route.name} call`, expectedRequests: requestsPerEvent },
                meeting,
                route,
                meetings,
                events,
                snapshot.limits,
                engine.calendar
            );
            events.push(event);
            log(`  ✓ ${event.id}: call ${event.callPublicationDate} → ${event.callDeadlineDate}, `
                + `intake ${event.intakeDeadlineDate}, review ${event.reviewDeadlineDate}, `
                + `meeting ${meeting.date}, response ${event.responseDeadlineDate}`);
            if (!decision.ok) {
                log(`    warning: ${decision.violations.map(v => v.message).join('; ')}`);
            }
        } catch (err) {
            if (!isSchedulingError(err, 'DateOrderingViolation')) {
                throw err;
            }
            eventsRejected++;
            log(`  ✗ Route ${route.id}: ${err.message}`);
        }
    }

    // ========== STEP 4: Verify against a fresh snapshot ==========
    logSection('STEP 4: Verifying invariants');

    const next = new SchedulingEngine(loadSnapshot({ ...snapshot, meetings, events }));
    let allInvariantsHold = true;

    const active = next.snapshot.meetings.filter(m => m.status !== MeetingStatus.CANCELLED);
    const dates = Array.from(new Set(active.map(m => m.date))).sort(compareDates);

    for (const date of dates) {
        const onDate = next.meetingsOn(date).filter(m => m.status !== MeetingStatus.CANCELLED);
        if (onDate.length > next.snapshot.limits.maxMeetingsPerDay) {
            log(`  ✗ VIOLATED: ${onDate.length} meetings on ${date}`);
            allInvariantsHold = false;
        }
        const load = onDate
            .flatMap(m => next.eventsFor(m.id))
            .reduce((sum, e) => sum + e.expectedRequests, 0);
        if (load > next.snapshot.limits.maxRequestsPerDay) {
            log(`  ✗ VIOLATED: ${load} requests on ${date}`);
            allInvariantsHold = false;
        }
    }
    log('  ✓ Daily meeting and request caps respected');

    const slots = new Set(active.map(m => `${m.committeeTypeId}|${m.divisionId}|${m.date}`));
    if (slots.size !== active.length) {
        log('  ✗ VIOLATED: duplicate committee slot');
        allInvariantsHold = false;
    }
    log('  ✓ One meeting per committee, division and date');

    for (const event of next.snapshot.events.filter(e => e.callDeadlineDate !== undefined)) {
        const meeting = active.find(m => m.id === event.meetingId);
        const chain = [
            event.callPublicationDate,
            event.callDeadlineDate,
            event.intakeDeadlineDate,
            event.reviewDeadlineDate,
            meeting?.date,
            event.responseDeadlineDate
        ];
        const ordered = chain.every((date, i) =>
            date !== undefined && (i === 0 || compareDates(chain[i - 1] ?? date, date) <= 0)
        );
        if (!ordered) {
            log(`  ✗ VIOLATED: deadlines of ${event.id} out of order`);
            allInvariantsHold = false;
        }
    }
    log('  ✓ Event deadlines ordered around their meeting');

    // ========== STEP 5: Recommend a meeting for a new event ==========
    logSection('STEP 5: Recommending committees');

    const today = options.today ?? addDays(monthStart, -60);
    for (const route of next.snapshot.routes.filter(r => r.isActive)) {
        const [best] = next.recommendCommittees(route.id, requestsPerEvent, today, 1);
        log(best
            ? `  ${route.id}: ${best.date} (${best.meetingId}) score ${best.score}`
            : `  ${route.id}: no upcoming meeting`);
    }

    // Final summary
    logSection('SIMULATION SUMMARY');

    const summary: SimulationSummary = {
        proposed: schedule.proposals.length,
        skipped: schedule.skipped.length,
        accepted: accepted.length,
        rejected,
        events: events.length - snapshot.events.length,
        eventsRejected,
        invariantsHold: allInvariantsHold
    };
    log(`Accepted ${summary.accepted}/${summary.proposed} proposals, ${summary.events} events scheduled`);
    log(`All Invariants Hold: ${allInvariantsHold ? '✓ YES' : '✗ NO'}`);

    return summary;
}
