// src/index.ts

export * from './models/Calendar';
export * from './models/Capacity';
export type { Candidate } from './models/Candidate';
export * from './models/CommitteeType';
export type { Division } from './models/Division';
export type { Event, StageDeadlines } from './models/Event';
export * from './models/Meeting';
export type { Route, StageDurations } from './models/Route';
export type { ConfigurationSnapshot, RecommendationWeights, SlaDefaults } from './models/Snapshot';

export { SchedulingError, isSchedulingError } from './engine/errors';
export type { SchedulingErrorKind } from './engine/errors';
export { BusinessCalendar } from './engine/calendar';
export { computeStageDeadlines, validateStageDurations } from './engine/deadlineCalculator';
export { checkCapacity, checkRequestLoad, isThirdWeekOfMonth, requestsOnDate } from './engine/capacityValidator';
export type { CapacityOptions } from './engine/capacityValidator';
export { matchesRecurrence, suggestDates, validateCommitteeType } from './engine/dateSuggester';
export type { SuggestionContext } from './engine/dateSuggester';
export { generateMonthlySchedule } from './engine/monthlyPlanner';
export type { MonthlySchedule, ProposedMeeting, SkippedCandidate } from './engine/monthlyPlanner';
export { recommendCommittees } from './engine/committeeRecommender';
export type { Recommendation } from './engine/committeeRecommender';
export { SchedulingEngine } from './engine/schedulingEngine';

export { acceptMeeting, CapacityPolicy } from './events/meetingAcceptanceHandler';
export type { AcceptanceResult, MeetingRequest } from './events/meetingAcceptanceHandler';
export { canTransition, transitionMeeting } from './events/meetingStatusHandler';
export { recalculateEventDeadlines, scheduleEvent } from './events/eventDeadlineHandler';
export type { NewEventInput, ScheduledEvent } from './events/eventDeadlineHandler';

export { DEFAULT_LIMITS, DEFAULT_RECOMMENDATION_WEIGHTS, DEFAULT_SLA, DEFAULT_WORK_WEEKDAYS } from './config/defaults';
export { loadSnapshot, snapshotSchema } from './config/snapshot';
export type { SnapshotInput } from './config/snapshot';
export { readIntSetting, readWorkDays, snapshotFromSettings } from './config/settings';
export type { ReferenceData, SettingsTable } from './config/settings';

export { runPlanningSimulation } from './simulation/runPlanningSimulation';
export type { SimulationOptions, SimulationSummary } from './simulation/runPlanningSimulation';
