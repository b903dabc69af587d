// src/engine/errors.ts

export type SchedulingErrorKind =
    | 'InvalidRouteConfig'
    | 'InvalidCommitteeTypeConfig'
    | 'DateOrderingViolation'
    | 'EmptyCalendarConfig'
    | 'InvalidSnapshot'
    | 'InvalidInput'
    | 'DuplicateMeeting'
    | 'InvalidStatusTransition';

/**
 * Typed failure raised when an operation's input is malformed.
 * Capacity violations are never raised; they are reported in a Decision.
 */
export class SchedulingError extends Error {
    readonly kind: SchedulingErrorKind;
    readonly details?: Record<string, unknown>;

    constructor(kind: SchedulingErrorKind, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'SchedulingError';
        this.kind = kind;
        this.details = details;
    }
}

export function isSchedulingError(err: unknown, kind?: SchedulingErrorKind): err is SchedulingError {
    return err instanceof SchedulingError && (kind === undefined || err.kind === kind);
}
