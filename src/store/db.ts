import { v4 as uuidv4 } from "uuid";
import type * as types from "../types";
import type {
    NewReservation,
    ReservationChanges,
    ReservationFilter,
    SeatingRepository,
    SeatingUnitOfWork
} from "./repository";
import { isCalendarDate, isClockTime, occupancyWindow, parseClock } from "../domain/clock";
import { compareTableNumbers } from "../domain/capacity";
import { isOccupying } from "../domain/status";
import { NotFoundError, ValidationError } from "../domain/errors";

type Row = { id: string; createdAt: string; updatedAt: string };
type Mutable<T extends Row> = Partial<Omit<T, 'id' | 'createdAt' | 'updatedAt'>>;

export type TableInput = Pick<types.Table, 'number' | 'minCapacity' | 'maxCapacity' | 'isShared' | 'location'>;
export type WeeklyHoursInput = Pick<types.WeeklyHours, 'dayOfWeek' | 'openTime' | 'closeTime' | 'lastReservationTime'>;
export type SpecialHoursInput = types.SeedData['specialHours'][number];
export type CustomerInput = Pick<types.Customer, 'name' | 'email' | 'phone' | 'notes'>;

const timestamp = (): string => new Date().toISOString();

const freshRow = (): Row => {
    const now = timestamp();
    return { id: uuidv4(), createdAt: now, updatedAt: now };
}

/**
 * Keyed rows of one entity
 *
 * update() is the only write path for existing rows and always refreshes
 * updatedAt, whichever field changed.
 */
class Collection<T extends Row> {
    private rows: Map<string, T> = new Map();

    get(id: string): T | undefined {
        return this.rows.get(id);
    }

    all(): T[] {
        return Array.from(this.rows.values());
    }

    insert(row: T): T {
        this.rows.set(row.id, row);
        return row;
    }

    update(id: string, changes: Mutable<T>): T | undefined {
        const existing = this.rows.get(id);
        if (!existing) return undefined;

        const updated: T = { ...existing, ...changes, id: existing.id, createdAt: existing.createdAt, updatedAt: timestamp() };
        this.rows.set(id, updated);
        return updated;
    }

    delete(id: string): boolean {
        return this.rows.delete(id);
    }
}

const validateTable = (input: TableInput) => {
    const details: Array<{ field: string; message: string }> = [];
    if (input.number.trim().length === 0 || input.number.length > 10) {
        details.push({ field: 'number', message: 'must be 1-10 characters' });
    }
    if (!Number.isInteger(input.minCapacity) || input.minCapacity <= 0) {
        details.push({ field: 'minCapacity', message: 'must be a positive integer' });
    }
    if (!Number.isInteger(input.maxCapacity) || input.maxCapacity < input.minCapacity) {
        details.push({ field: 'maxCapacity', message: 'must be an integer >= minCapacity' });
    }
    if (details.length > 0) {
        throw new ValidationError('Invalid table', details);
    }
}

const validateWindow = (openTime: string, closeTime: string, lastReservationTime: string) => {
    for (const [field, value] of [['openTime', openTime], ['closeTime', closeTime], ['lastReservationTime', lastReservationTime]] as const) {
        if (!isClockTime(value)) {
            throw new ValidationError(`Invalid ${field}: ${value}`, [{ field, message: 'Expected HH:mm' }]);
        }
    }
    const open = parseClock(openTime);
    const close = parseClock(closeTime);
    const last = parseClock(lastReservationTime);
    if (close <= open) {
        throw new ValidationError('closeTime must be after openTime', [{ field: 'closeTime', message: 'must be after openTime' }]);
    }
    if (last <= open || last >= close) {
        throw new ValidationError('lastReservationTime must be after openTime and before closeTime', [
            { field: 'lastReservationTime', message: 'must be after openTime and before closeTime' }
        ]);
    }
}

/**
 * Writes staged against a MemoryStore
 *
 * Checks run when a write is staged; commit() applies every staged write in
 * one synchronous pass, so readers never see half of a transaction.
 */
class MemoryUnitOfWork implements SeatingUnitOfWork {
    private ops: Array<() => void> = [];
    private insertedReservations: Set<string> = new Set();
    private deletedReservations: Set<string> = new Set();

    constructor(private store: MemoryStore) { }

    private reservationExists(id: string): boolean {
        if (this.deletedReservations.has(id)) return false;
        return this.insertedReservations.has(id) || this.store.reservations.get(id) !== undefined;
    }

    private requireReservation(id: string) {
        if (!this.reservationExists(id)) {
            throw new NotFoundError('Reservation', id);
        }
    }

    insertReservation(data: NewReservation): string {
        if (!this.store.customers.get(data.customerId)) {
            throw new NotFoundError('Customer', data.customerId);
        }
        if (!Number.isInteger(data.partySize) || data.partySize <= 0) {
            throw new ValidationError('partySize must be a positive integer');
        }
        if (!Number.isInteger(data.durationMinutes) || data.durationMinutes <= 0) {
            throw new ValidationError('durationMinutes must be a positive integer');
        }
        if (!isCalendarDate(data.reservationDate) || !isClockTime(data.startTime)) {
            throw new ValidationError('Invalid reservation date or start time');
        }

        const row: types.Reservation = { ...data, ...freshRow() };
        this.insertedReservations.add(row.id);
        this.ops.push(() => this.store.reservations.insert(row));
        return row.id;
    }

    updateReservation(id: string, changes: ReservationChanges) {
        this.requireReservation(id);
        this.ops.push(() => this.store.reservations.update(id, changes));
    }

    deleteReservation(id: string) {
        this.requireReservation(id);
        this.deletedReservations.add(id);
        this.ops.push(() => {
            for (const assignment of this.store.assignments.all()) {
                if (assignment.reservationId === id) {
                    this.store.assignments.delete(assignment.id);
                }
            }
            this.store.reservations.delete(id);
        });
    }

    insertAssignments(reservationId: string, tableIds: readonly string[]) {
        this.requireReservation(reservationId);
        if (new Set(tableIds).size !== tableIds.length) {
            throw new ValidationError('A table can be assigned to a reservation only once');
        }
        for (const tableId of tableIds) {
            if (!this.store.tables.get(tableId)) {
                throw new NotFoundError('Table', tableId);
            }
        }

        this.ops.push(() => {
            for (const tableId of tableIds) {
                this.store.assignments.insert({ ...freshRow(), reservationId, tableId, releasedAt: null });
            }
        });
    }

    releaseAssignments(reservationId: string) {
        this.requireReservation(reservationId);
        this.ops.push(() => {
            const releasedAt = timestamp();
            for (const assignment of this.store.assignments.all()) {
                if (assignment.reservationId === reservationId && assignment.releasedAt === null) {
                    this.store.assignments.update(assignment.id, { releasedAt });
                }
            }
        });
    }

    replaceAssignments(reservationId: string, tableIds: readonly string[]) {
        this.requireReservation(reservationId);
        this.ops.push(() => {
            for (const assignment of this.store.assignments.all()) {
                if (assignment.reservationId === reservationId && assignment.releasedAt === null) {
                    this.store.assignments.delete(assignment.id);
                }
            }
        });
        this.insertAssignments(reservationId, tableIds);
    }

    commit() {
        for (const op of this.ops) {
            op();
        }
        this.ops = [];
    }
}

/**
 * In-memory storage for the seating engine
 *
 * Features:
 * - Structural constraints of the schema (positive capacities, unique table
 *   numbers, one weekly row per weekday, one override per date, customer
 *   contact required, unique reservation/table pairs)
 * - Cascading cleanup done explicitly (chairs and assignments with their
 *   table, assignments with their reservation)
 * - Transactions that apply all staged writes or none
 * - Idempotency key support with automatic expiration (24hr TTL)
 *
 * Note: a database-backed adapter implements the same SeatingRepository.
 */
export class MemoryStore implements SeatingRepository {
    readonly tables = new Collection<types.Table>();
    readonly chairs = new Collection<types.Chair>();
    readonly weeklyHours = new Collection<types.WeeklyHours>();
    readonly specialHours = new Collection<types.SpecialHours>();
    readonly customers = new Collection<types.Customer>();
    readonly reservations = new Collection<types.Reservation>();
    readonly assignments = new Collection<types.TableAssignment>();

    private _idempotency: Map<string, { result: types.AssignmentResult; expiresAt: number }> = new Map();
    private _cleanup: NodeJS.Timeout;

    /**
     * Sets up automatic cleanup of expired idempotency keys (runs every minute).
     */
    constructor() {
        this._cleanup = setInterval(() => {
            const now = Date.now();
            for (const [key, value] of this._idempotency.entries()) {
                if (value.expiresAt <= now) {
                    this._idempotency.delete(key);
                }
            }
        }, 60000).unref(); // don't hold process open
    }

    // ===== Reads =====

    async listTables(): Promise<types.Table[]> {
        return this.tables.all().sort((a, b) => compareTableNumbers(a.number, b.number));
    }

    async getTable(id: string): Promise<types.Table | undefined> {
        return this.tables.get(id);
    }

    async listChairs(tableId?: string): Promise<types.Chair[]> {
        const chairs = this.chairs.all();
        return tableId === undefined ? chairs : chairs.filter(c => c.tableId === tableId);
    }

    async listWeeklyHours(): Promise<types.WeeklyHours[]> {
        return this.weeklyHours.all().sort((a, b) => a.dayOfWeek - b.dayOfWeek);
    }

    async getWeeklyHours(dayOfWeek: number): Promise<types.WeeklyHours | undefined> {
        return this.weeklyHours.all().find(h => h.dayOfWeek === dayOfWeek);
    }

    async listSpecialHours(dateFrom?: string, dateTo?: string): Promise<types.SpecialHours[]> {
        return this.specialHours.all()
            .filter(h => (dateFrom === undefined || h.date >= dateFrom) && (dateTo === undefined || h.date <= dateTo))
            .sort((a, b) => a.date.localeCompare(b.date));
    }

    async getSpecialHours(date: string): Promise<types.SpecialHours | undefined> {
        return this.specialHours.all().find(h => h.date === date);
    }

    async getCustomer(id: string): Promise<types.Customer | undefined> {
        return this.customers.get(id);
    }

    async getReservation(id: string): Promise<types.Reservation | undefined> {
        return this.reservations.get(id);
    }

    async listReservations(filter: ReservationFilter = {}): Promise<types.Reservation[]> {
        const { dateFrom, dateTo, status, tableId, customerId, limit = 100, offset = 0 } = filter;

        let reservationIds: Set<string> | undefined;
        if (tableId !== undefined) {
            reservationIds = new Set(this.assignments.all().filter(a => a.tableId === tableId).map(a => a.reservationId));
        }

        return this.reservations.all()
            .filter(r =>
                (dateFrom === undefined || r.reservationDate >= dateFrom) &&
                (dateTo === undefined || r.reservationDate <= dateTo) &&
                (status === undefined || r.status === status) &&
                (customerId === undefined || r.customerId === customerId) &&
                (reservationIds === undefined || reservationIds.has(r.id))
            )
            .sort((a, b) => a.reservationDate.localeCompare(b.reservationDate) || a.startTime.localeCompare(b.startTime))
            .slice(offset, offset + limit);
    }

    async listAssignments(reservationId: string, options: { includeReleased?: boolean } = {}): Promise<types.TableAssignment[]> {
        return this.assignments.all().filter(a =>
            a.reservationId === reservationId && (options.includeReleased === true || a.releasedAt === null)
        );
    }

    async findOccupancies(tableId: string, date: string): Promise<types.Occupancy[]> {
        const occupancies: types.Occupancy[] = [];
        for (const assignment of this.assignments.all()) {
            if (assignment.tableId !== tableId || assignment.releasedAt !== null) continue;

            const reservation = this.reservations.get(assignment.reservationId);
            if (!reservation || reservation.reservationDate !== date || !isOccupying(reservation.status)) continue;

            occupancies.push({
                reservationId: reservation.id,
                tableId,
                window: occupancyWindow(reservation.startTime, reservation.durationMinutes)
            });
        }
        return occupancies;
    }

    /**
     * Run work against a unit of work and commit its staged writes
     *
     * If work throws (or its promise rejects) nothing is applied.
     */
    async transaction<T>(work: (uow: SeatingUnitOfWork) => T | Promise<T>): Promise<T> {
        const uow = new MemoryUnitOfWork(this);
        const result = await work(uow);
        uow.commit();
        return result;
    }

    // ===== Floor plan =====

    /**
     * Create a table and one assigned chair per seat of maxCapacity
     */
    async createTable(input: TableInput): Promise<types.Table> {
        validateTable(input);
        if (this.tables.all().some(t => t.number === input.number)) {
            throw new ValidationError(`Table number ${input.number} already exists`, [{ field: 'number', message: 'must be unique' }]);
        }

        const table = this.tables.insert({ ...input, ...freshRow() });
        this.syncChairs(table.id, table.maxCapacity);
        return table;
    }

    async updateTable(id: string, changes: Partial<TableInput>): Promise<types.Table> {
        const existing = this.tables.get(id);
        if (!existing) throw new NotFoundError('Table', id);

        const merged: TableInput = {
            number: changes.number ?? existing.number,
            minCapacity: changes.minCapacity ?? existing.minCapacity,
            maxCapacity: changes.maxCapacity ?? existing.maxCapacity,
            isShared: changes.isShared ?? existing.isShared,
            location: changes.location ?? existing.location
        };
        validateTable(merged);
        if (this.tables.all().some(t => t.id !== id && t.number === merged.number)) {
            throw new ValidationError(`Table number ${merged.number} already exists`, [{ field: 'number', message: 'must be unique' }]);
        }

        const updated = this.tables.update(id, merged);
        if (!updated) throw new NotFoundError('Table', id);
        if (merged.maxCapacity !== existing.maxCapacity) {
            this.syncChairs(id, merged.maxCapacity);
        }
        return updated;
    }

    /**
     * Delete a table with its chairs and every assignment that references it
     */
    async deleteTable(id: string): Promise<boolean> {
        if (!this.tables.get(id)) return false;

        for (const chair of this.chairs.all()) {
            if (chair.tableId === id) this.chairs.delete(chair.id);
        }
        for (const assignment of this.assignments.all()) {
            if (assignment.tableId === id) this.assignments.delete(assignment.id);
        }
        return this.tables.delete(id);
    }

    async setChairAssigned(id: string, isAssigned: boolean): Promise<types.Chair> {
        const updated = this.chairs.update(id, { isAssigned });
        if (!updated) throw new NotFoundError('Chair', id);
        return updated;
    }

    /**
     * Add or remove chairs so the table has exactly `count`; the oldest are kept
     */
    private syncChairs(tableId: string, count: number) {
        const current = this.chairs.all().filter(c => c.tableId === tableId);
        for (let i = current.length; i < count; i++) {
            this.chairs.insert({ ...freshRow(), tableId, isAssigned: true });
        }
        for (const chair of current.slice(count)) {
            this.chairs.delete(chair.id);
        }
    }

    // ===== Operating hours =====

    /**
     * Set or update the regular hours for one weekday
     */
    async setWeeklyHours(input: WeeklyHoursInput): Promise<types.WeeklyHours> {
        if (!Number.isInteger(input.dayOfWeek) || input.dayOfWeek < 0 || input.dayOfWeek > 6) {
            throw new ValidationError('dayOfWeek must be between 0 and 6 (Monday=0, Sunday=6)', [{ field: 'dayOfWeek', message: 'must be 0-6' }]);
        }
        validateWindow(input.openTime, input.closeTime, input.lastReservationTime);

        const existing = await this.getWeeklyHours(input.dayOfWeek);
        if (existing) {
            const updated = this.weeklyHours.update(existing.id, input);
            if (updated) return updated;
        }
        return this.weeklyHours.insert({ ...input, ...freshRow() });
    }

    /**
     * Set or update the override for one date
     *
     * A closed override drops any hour fields; an open one needs all three.
     */
    async setSpecialHours(input: SpecialHoursInput): Promise<types.SpecialHours> {
        if (!isCalendarDate(input.date)) {
            throw new ValidationError(`Invalid date: ${input.date}`, [{ field: 'date', message: 'Expected YYYY-MM-DD' }]);
        }
        if (input.name.trim().length === 0) {
            throw new ValidationError('name is required', [{ field: 'name', message: 'required' }]);
        }

        let fields: SpecialHoursInput;
        if (input.isClosed) {
            fields = { date: input.date, name: input.name, description: input.description, isClosed: true, openTime: undefined, closeTime: undefined, lastReservationTime: undefined };
        } else {
            const { openTime, closeTime, lastReservationTime } = input;
            if (openTime === undefined || closeTime === undefined || lastReservationTime === undefined) {
                throw new ValidationError('openTime, closeTime and lastReservationTime are required when the restaurant is open');
            }
            validateWindow(openTime, closeTime, lastReservationTime);
            fields = { ...input, isClosed: false };
        }

        const existing = await this.getSpecialHours(input.date);
        if (existing) {
            const updated = this.specialHours.update(existing.id, fields);
            if (updated) return updated;
        }
        return this.specialHours.insert({ ...fields, ...freshRow() });
    }

    async deleteSpecialHours(id: string): Promise<boolean> {
        return this.specialHours.delete(id);
    }

    // ===== Customers =====

    /**
     * Return the customer with the same email (then phone), or create one
     *
     * @throws {ValidationError} when neither email nor phone is given
     */
    async findOrCreateCustomer(input: CustomerInput): Promise<types.Customer> {
        if (input.name.trim().length === 0) {
            throw new ValidationError('name is required', [{ field: 'name', message: 'required' }]);
        }
        if (!input.email && !input.phone) {
            throw new ValidationError('Either email or phone must be provided', [{ field: 'email', message: 'email or phone required' }]);
        }

        const customers = this.customers.all();
        const existing = (input.email ? customers.find(c => c.email === input.email) : undefined)
            ?? (input.phone ? customers.find(c => c.phone === input.phone) : undefined);
        if (existing) return existing;

        return this.customers.insert({ ...input, ...freshRow() });
    }

    // ===== Idempotency =====

    /**
     * Retrieve the result stored under an idempotency key
     *
     * Automatically cleans up expired entries.
     */
    getIdempotency(key: string): types.AssignmentResult | undefined {
        const entry = this._idempotency.get(key);
        if (!entry) return undefined;

        if (entry.expiresAt <= Date.now()) {
            this._idempotency.delete(key);
            return undefined;
        }

        return entry.result;
    }

    /**
     * Store a result under an idempotency key
     *
     * @param ttlMs - Time-to-live in milliseconds (default: 24 hours)
     */
    setIdempotency(key: string, result: types.AssignmentResult, ttlMs: number = 24 * 60 * 60 * 1000) {
        this._idempotency.set(key, {
            result,
            expiresAt: Date.now() + ttlMs
        });
    }

    // ===== Lifecycle =====

    /**
     * Load seed data into the store
     */
    async loadSeed(seed: types.SeedData) {
        for (const table of seed.tables) await this.createTable(table);
        for (const hours of seed.weeklyHours) await this.setWeeklyHours(hours);
        for (const special of seed.specialHours) await this.setSpecialHours(special);
        for (const customer of seed.customers) await this.findOrCreateCustomer(customer);
    }

    dispose() {
        clearInterval(this._cleanup);
    }
}
