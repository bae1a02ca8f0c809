import type { AssignmentResult, SeatingCandidate, TimeWindow } from "../types";
import type { SeatingRepository } from "../store/repository";
import type { TableLocks } from "../store/locks";
import type { Logger } from "../logger";
import type { CapacityMatcher } from "./capacity";
import type { ConflictChecker } from "./conflicts";
import { ensureWithinHours, type HoursResolver } from "./hours";
import { isCalendarDate, isClockTime, occupancyWindow } from "./clock";
import { INITIAL_STATUS, isReschedulable } from "./status";
import { InvalidTransitionError, LockTimeoutError, NoAvailabilityError, NotFoundError, ValidationError } from "./errors";

export interface AllocationRequest {
    customerId: string;
    partySize: number;
    /** YYYY-MM-DD */
    date: string;
    /** HH:mm */
    startTime: string;
    durationMinutes: number;
    notes?: string;
}

export interface AllocationOptions {
    /** Aborting before the commit leaves no trace */
    signal?: AbortSignal;
    /** Rebook this existing reservation instead of creating a new one */
    reservationId?: string;
}

export interface AllocatorDeps {
    store: SeatingRepository;
    hours: HoursResolver;
    matcher: CapacityMatcher;
    conflicts: ConflictChecker;
    locks: TableLocks;
    logger: Logger;
}

type Attempt =
    | { committed: true; result: AssignmentResult }
    | { committed: false; conflicting: string[] }
    /** The rebooked reservation's tables changed before the locks were held */
    | { committed: false; moved: string[] };

/**
 * @throws {ValidationError} listing every malformed field
 */
export const validateAllocationRequest = (request: Pick<AllocationRequest, 'partySize' | 'durationMinutes' | 'date' | 'startTime'>): void => {
    const details: Array<{ field: string; message: string }> = [];
    if (!Number.isInteger(request.partySize) || request.partySize <= 0) {
        details.push({ field: 'partySize', message: 'must be a positive integer' });
    }
    if (!Number.isInteger(request.durationMinutes) || request.durationMinutes <= 0) {
        details.push({ field: 'durationMinutes', message: 'must be a positive integer' });
    }
    if (!isCalendarDate(request.date)) {
        details.push({ field: 'date', message: 'Expected YYYY-MM-DD' });
    }
    if (!isClockTime(request.startTime)) {
        details.push({ field: 'startTime', message: 'Expected HH:mm' });
    }
    if (details.length > 0) {
        throw new ValidationError('Invalid reservation request', details);
    }
}

/**
 * Commits a table assignment for a reservation request
 *
 * For each ranked candidate: lock its tables (ascending id), check every
 * table for a conflicting occupancy, and only when all are free write the
 * reservation and all of its assignment rows in one transaction. A
 * conflicting candidate, or one whose lock wait times out, is skipped and
 * never retried; the offending tables are left out of every later
 * candidate. Only running out of candidates is reported.
 */
export class Allocator {
    private log: Logger;

    constructor(private deps: AllocatorDeps) {
        this.log = deps.logger.child({ component: 'allocator' });
    }

    async assign(request: AllocationRequest, options: AllocationOptions = {}): Promise<AssignmentResult> {
        validateAllocationRequest(request);
        options.signal?.throwIfAborted();

        const window = occupancyWindow(request.startTime, request.durationMinutes);
        const hours = await this.deps.hours.resolve(request.date);
        ensureWithinHours(request.date, hours, window);

        let heldTableIds = options.reservationId
            ? (await this.deps.store.listAssignments(options.reservationId)).map(a => a.tableId)
            : [];

        const exclude = new Set<string>();
        let attempts = 0;
        for await (const candidate of this.deps.matcher.candidates(request.partySize, exclude)) {
            options.signal?.throwIfAborted();
            attempts++;

            let attempt = await this.attempt(candidate, request, window, options, heldTableIds);
            while ('moved' in attempt) {
                this.log.debug({ reservationId: options.reservationId, from: heldTableIds, to: attempt.moved }, 'assignments moved, retrying candidate');
                heldTableIds = attempt.moved;
                attempt = await this.attempt(candidate, request, window, options, heldTableIds);
            }

            if (attempt.committed) {
                this.log.info({
                    reservationId: attempt.result.reservationId,
                    tableIds: candidate.tableIds,
                    kind: candidate.kind,
                    excess: candidate.excess,
                    attempts
                }, options.reservationId ? 'reservation rebooked' : 'reservation assigned');
                return attempt.result;
            }

            for (const tableId of attempt.conflicting) {
                exclude.add(tableId);
            }
            this.log.debug({ tableIds: candidate.tableIds, conflicting: attempt.conflicting }, 'candidate unavailable');
        }

        this.log.info({ date: request.date, startTime: request.startTime, partySize: request.partySize, attempts }, 'no availability');
        throw new NoAvailabilityError(
            `No table or combination can seat ${request.partySize} on ${request.date} at ${request.startTime} for ${request.durationMinutes} minutes`
        );
    }

    /**
     * The atomic allocation step for one candidate
     */
    private async attempt(
        candidate: SeatingCandidate,
        request: AllocationRequest,
        window: TimeWindow,
        options: AllocationOptions,
        heldTableIds: string[]
    ): Promise<Attempt> {
        const { store, conflicts, locks } = this.deps;

        try {
            const locked = new Set([...candidate.tableIds, ...heldTableIds]);
            return await locks.withTables([...locked], async (): Promise<Attempt> => {
                if (options.reservationId) {
                    const current = (await store.listAssignments(options.reservationId)).map(a => a.tableId);
                    if (current.some(id => !locked.has(id))) {
                        return { committed: false, moved: current };
                    }
                }

                const conflicting = await conflicts.conflictingTables(candidate.tableIds, request.date, window, options.reservationId);
                if (conflicting.length > 0) {
                    return { committed: false, conflicting };
                }

                if (options.reservationId) {
                    const current = await store.getReservation(options.reservationId);
                    if (!current) throw new NotFoundError('Reservation', options.reservationId);
                    if (!isReschedulable(current.status)) throw new InvalidTransitionError(current.status, 'rescheduled');
                }

                options.signal?.throwIfAborted();

                const reservationId = await store.transaction(uow => {
                    if (options.reservationId) {
                        uow.updateReservation(options.reservationId, {
                            partySize: request.partySize,
                            reservationDate: request.date,
                            startTime: request.startTime,
                            durationMinutes: request.durationMinutes,
                            notes: request.notes
                        });
                        uow.replaceAssignments(options.reservationId, candidate.tableIds);
                        return options.reservationId;
                    }

                    const id = uow.insertReservation({
                        customerId: request.customerId,
                        partySize: request.partySize,
                        reservationDate: request.date,
                        startTime: request.startTime,
                        durationMinutes: request.durationMinutes,
                        notes: request.notes,
                        status: INITIAL_STATUS
                    });
                    uow.insertAssignments(id, candidate.tableIds);
                    return id;
                });

                const reservation = await store.getReservation(reservationId);
                if (!reservation) throw new NotFoundError('Reservation', reservationId);

                return { committed: true, result: { reservationId, tableIds: [...candidate.tableIds], reservation } };
            }, options.signal);
        } catch (error) {
            if (error instanceof LockTimeoutError) {
                this.log.warn({ tableId: error.tableId, tableIds: candidate.tableIds }, 'lock wait timed out, skipping candidate');
                // a held table of the rebooked reservation is not a candidate table
                return { committed: false, conflicting: candidate.tableIds.includes(error.tableId) ? [error.tableId] : [] };
            }
            throw error;
        }
    }
}
