import type { ReservationStatus } from "../types";
import { InvalidTransitionError } from "./errors";

export const RESERVATION_STATUSES = [
    'pending',
    'confirmed',
    'seated',
    'completed',
    'cancelled',
    'no_show'
] as const satisfies readonly ReservationStatus[];

export const INITIAL_STATUS: ReservationStatus = 'pending';

/**
 * Allowed status transitions
 *
 * Terminal states (completed, cancelled, no_show) have no outgoing edges.
 */
const TRANSITIONS: Record<ReservationStatus, readonly ReservationStatus[]> = {
    pending: ['confirmed', 'cancelled'],
    confirmed: ['seated', 'cancelled', 'no_show'],
    seated: ['completed', 'no_show'],
    completed: [],
    cancelled: [],
    no_show: []
};

/** Statuses whose assignments hold their tables */
const OCCUPYING: ReadonlySet<ReservationStatus> = new Set<ReservationStatus>(['pending', 'confirmed', 'seated']);

export const isOccupying = (status: ReservationStatus): boolean => OCCUPYING.has(status);

export const isTerminal = (status: ReservationStatus): boolean => TRANSITIONS[status].length === 0;

export const canTransition = (from: ReservationStatus, to: ReservationStatus): boolean => {
    return TRANSITIONS[from].includes(to);
}

/**
 * @throws {InvalidTransitionError} when the edge is not in the transition table
 */
export const assertTransition = (from: ReservationStatus, to: ReservationStatus): void => {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(from, to);
    }
}

/**
 * Whether entering this status frees the reservation's tables
 *
 * True for completed, cancelled and no_show.
 */
export const releasesTables = (status: ReservationStatus): boolean => !isOccupying(status);

/** Only reservations that have not been seated yet may be moved to another slot */
export const isReschedulable = (status: ReservationStatus): boolean => {
    return status === 'pending' || status === 'confirmed';
}
