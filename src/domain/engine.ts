import type * as types from "../types";
import type { ReservationFilter, SeatingRepository } from "../store/repository";
import type { EngineConfig } from "../config";
import type { Logger } from "../logger";
import { TableLocks } from "../store/locks";
import { HoursResolver } from "./hours";
import { CapacityMatcher } from "./capacity";
import { ConflictChecker } from "./conflicts";
import { Allocator, validateAllocationRequest } from "./allocator";
import { occupancyWindow } from "./clock";
import { fitsOperatingWindow } from "./hours";
import { AvailabilitySlotGenerator } from "./slots";
import { assertTransition, isReschedulable, releasesTables } from "./status";
import { InvalidTransitionError, NotFoundError } from "./errors";

export interface CreateReservationInput {
    customerId: string;
    partySize: number;
    date: string;
    startTime: string;
    /** Falls back to the configured default duration */
    durationMinutes?: number;
    notes?: string;
}

export type RescheduleInput = Partial<Omit<CreateReservationInput, 'customerId'>>;

type LockedOutcome<T> = { value: T } | { moved: string[] };

export interface EngineDeps {
    store: SeatingRepository;
    config: EngineConfig;
    logger: Logger;
    /** Share locks with another engine over the same store */
    locks?: TableLocks;
}

/**
 * Reservation workflows on top of the allocation core
 *
 * Every mutation that touches tables runs under the locks of those tables,
 * so it serializes with concurrent allocations for the same tables.
 */
export class ReservationEngine {
    readonly locks: TableLocks;
    readonly hours: HoursResolver;
    readonly matcher: CapacityMatcher;
    readonly conflicts: ConflictChecker;
    readonly allocator: Allocator;
    readonly slotGenerator: AvailabilitySlotGenerator;

    private store: SeatingRepository;
    private config: EngineConfig;
    private log: Logger;

    constructor({ store, config, logger, locks }: EngineDeps) {
        this.store = store;
        this.config = config;
        this.log = logger.child({ component: 'engine' });

        this.locks = locks ?? new TableLocks(config.lockTimeoutMs);
        this.hours = new HoursResolver(store);
        this.matcher = new CapacityMatcher(store, {
            maxCombinationSize: config.maxCombinationSize,
            maxExcessSeats: config.maxExcessSeats,
            capacitySource: config.capacitySource
        });
        this.conflicts = new ConflictChecker(store);
        this.allocator = new Allocator({
            store,
            hours: this.hours,
            matcher: this.matcher,
            conflicts: this.conflicts,
            locks: this.locks,
            logger
        });
        this.slotGenerator = new AvailabilitySlotGenerator({
            hours: this.hours,
            matcher: this.matcher,
            conflicts: this.conflicts
        });
    }

    get defaultDurationMinutes(): number {
        return this.config.defaultDurationMinutes;
    }

    /**
     * Bookable start times for a party on a date, in "HH:mm"
     */
    async checkAvailability(
        date: string,
        partySize: number,
        durationMinutes: number = this.config.defaultDurationMinutes,
        granularity: number = this.config.slotGranularityMinutes
    ): Promise<string[]> {
        const slots: string[] = [];
        for await (const slot of this.slotGenerator.slots(date, partySize, { granularity, durationMinutes })) {
            slots.push(slot);
        }
        return slots;
    }

    /**
     * Seating free for a party at one date and start time
     *
     * Algorithm:
     * 1. Resolve the operating window and check the occupancy window fits it
     * 2. Read the occupancies of the whole floor once
     * 3. Walk the ranked candidates, dropping every table that conflicts
     *    from the rest of the walk, and keep the candidates left free
     *
     * Read-only like checkAvailability: no locks, and a listed candidate can
     * be taken before it is booked.
     */
    async findAvailableTables(
        date: string,
        startTime: string,
        partySize: number,
        durationMinutes: number = this.config.defaultDurationMinutes
    ): Promise<types.TableAvailability> {
        validateAllocationRequest({ date, startTime, partySize, durationMinutes });

        const result: types.TableAvailability = { date, startTime, partySize, durationMinutes, isValidTime: false, candidates: [] };
        const window = occupancyWindow(startTime, durationMinutes);
        if (!fitsOperatingWindow(await this.hours.resolve(date), window)) {
            return result;
        }

        const floor = await this.matcher.floor();
        const snapshot = await this.conflicts.snapshot(floor.map(t => t.id), date);
        const exclude = new Set<string>();
        for (const candidate of this.matcher.rank(floor, partySize, exclude)) {
            const conflicting = snapshot.conflictingTables(candidate.tableIds, window);
            if (conflicting.length === 0) {
                result.candidates.push(candidate);
            } else {
                conflicting.forEach(id => exclude.add(id));
            }
        }

        return { ...result, isValidTime: true };
    }

    /**
     * Create a pending reservation and assign its tables in one step
     *
     * @throws {NotFoundError} for an unknown customer
     */
    async createAndAssign(input: CreateReservationInput, options: { signal?: AbortSignal } = {}): Promise<types.AssignmentResult> {
        const request = {
            ...input,
            durationMinutes: input.durationMinutes ?? this.config.defaultDurationMinutes
        };
        validateAllocationRequest(request);

        if (!(await this.store.getCustomer(input.customerId))) {
            throw new NotFoundError('Customer', input.customerId);
        }

        return this.allocator.assign(request, { signal: options.signal });
    }

    /**
     * Move a reservation along the status table
     *
     * Entering completed, cancelled or no_show releases its tables in the
     * same transaction as the status write.
     */
    async changeStatus(reservationId: string, status: types.ReservationStatus): Promise<types.Reservation> {
        const current = await this.store.getReservation(reservationId);
        if (!current) throw new NotFoundError('Reservation', reservationId);
        assertTransition(current.status, status);

        const updated = await this.withReservationTables(reservationId, async () => {
            // re-read under lock, a concurrent request may have moved it already
            const fresh = await this.store.getReservation(reservationId);
            if (!fresh) throw new NotFoundError('Reservation', reservationId);
            assertTransition(fresh.status, status);

            await this.store.transaction(uow => {
                uow.updateReservation(reservationId, { status });
                if (releasesTables(status)) {
                    uow.releaseAssignments(reservationId);
                }
            });

            const after = await this.store.getReservation(reservationId);
            if (!after) throw new NotFoundError('Reservation', reservationId);
            return after;
        });

        this.log.info({ reservationId, from: current.status, to: status, released: releasesTables(status) }, 'reservation status changed');
        return updated;
    }

    async cancelReservation(reservationId: string): Promise<types.Reservation> {
        return this.changeStatus(reservationId, 'cancelled');
    }

    /**
     * Rebook a pending or confirmed reservation
     *
     * Unchanged fields keep their current values. The reservation's own
     * assignments do not count as conflicts, and the new set replaces them
     * atomically; if no candidate fits the booking is left as it was.
     */
    async reschedule(reservationId: string, changes: RescheduleInput, options: { signal?: AbortSignal } = {}): Promise<types.AssignmentResult> {
        const current = await this.store.getReservation(reservationId);
        if (!current) throw new NotFoundError('Reservation', reservationId);
        if (!isReschedulable(current.status)) {
            throw new InvalidTransitionError(current.status, 'rescheduled');
        }

        return this.allocator.assign({
            customerId: current.customerId,
            partySize: changes.partySize ?? current.partySize,
            date: changes.date ?? current.reservationDate,
            startTime: changes.startTime ?? current.startTime,
            durationMinutes: changes.durationMinutes ?? current.durationMinutes,
            notes: changes.notes ?? current.notes
        }, { signal: options.signal, reservationId });
    }

    async getReservation(reservationId: string): Promise<types.ReservationDetails> {
        const reservation = await this.store.getReservation(reservationId);
        if (!reservation) throw new NotFoundError('Reservation', reservationId);

        const tables: types.Table[] = [];
        for (const assignment of await this.store.listAssignments(reservationId)) {
            const table = await this.store.getTable(assignment.tableId);
            if (table) tables.push(table);
        }
        return { ...reservation, tables };
    }

    async listReservations(filter: ReservationFilter = {}): Promise<types.Reservation[]> {
        return this.store.listReservations(filter);
    }

    /**
     * Remove a reservation and every assignment row it owns
     */
    async deleteReservation(reservationId: string): Promise<void> {
        const current = await this.store.getReservation(reservationId);
        if (!current) throw new NotFoundError('Reservation', reservationId);

        await this.withReservationTables(reservationId, () => this.store.transaction(uow => uow.deleteReservation(reservationId)));

        this.log.info({ reservationId }, 'reservation deleted');
    }

    /**
     * Run work holding the locks of every table the reservation is assigned
     *
     * The assignment set is read again once the locks are held; if a
     * concurrent rebooking moved it meanwhile, the locks are retaken on the
     * new set.
     */
    private async withReservationTables<T>(reservationId: string, work: () => Promise<T>): Promise<T> {
        let tableIds = await this.assignedTableIds(reservationId);
        while (true) {
            const locked = new Set(tableIds);
            const outcome = await this.locks.withTables(tableIds, async (): Promise<LockedOutcome<T>> => {
                const current = await this.assignedTableIds(reservationId);
                if (current.some(id => !locked.has(id))) {
                    return { moved: current };
                }
                return { value: await work() };
            });
            if ('value' in outcome) return outcome.value;

            this.log.debug({ reservationId, from: tableIds, to: outcome.moved }, 'assignments moved, relocking');
            tableIds = outcome.moved;
        }
    }

    private async assignedTableIds(reservationId: string): Promise<string[]> {
        return (await this.store.listAssignments(reservationId)).map(a => a.tableId);
    }
}
