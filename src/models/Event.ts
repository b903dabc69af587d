// src/models/Event.ts

import type { IsoDate } from './Calendar';

/**
 * Stage boundaries of a funding-request event, earliest first
 *
 * Invariant: callPublicationDate <= callDeadline <= intakeDeadline
 *            <= reviewDeadline <= meeting date <= responseDeadline
 */
export interface StageDeadlines {
    callPublicationDate: IsoDate;
    callDeadline: IsoDate;
    intakeDeadline: IsoDate;
    reviewDeadline: IsoDate;
    responseDeadline: IsoDate;
}

/**
 * Funding-request item attached to one meeting and one route
 *
 * Data only. Deadlines are filled by the deadline calculator.
 */
export interface Event {
    id: string;
    meetingId: string;
    routeId: string;
    name: string;
    expectedRequests: number;

    callPublicationDate?: IsoDate;
    isCallPublicationManual: boolean;  // Caller-supplied publication date survives recalculation

    callDeadlineDate?: IsoDate;
    intakeDeadlineDate?: IsoDate;
    reviewDeadlineDate?: IsoDate;
    responseDeadlineDate?: IsoDate;
}
