import type {
    Chair,
    Customer,
    Occupancy,
    Reservation,
    ReservationStatus,
    SpecialHours,
    Table,
    TableAssignment,
    WeeklyHours
} from "../types";

export interface ReservationFilter {
    /** Inclusive lower bound, YYYY-MM-DD */
    dateFrom?: string;
    /** Inclusive upper bound, YYYY-MM-DD */
    dateTo?: string;
    status?: ReservationStatus;
    tableId?: string;
    customerId?: string;
    limit?: number;
    offset?: number;
}

export type NewReservation = Pick<
    Reservation,
    'customerId' | 'partySize' | 'reservationDate' | 'startTime' | 'durationMinutes' | 'notes' | 'status'
>;

export type ReservationChanges = Partial<
    Pick<Reservation, 'partySize' | 'reservationDate' | 'startTime' | 'durationMinutes' | 'notes' | 'status'>
>;

/**
 * Read access the engine needs from storage
 *
 * Reads take no locks and return a snapshot.
 */
export interface SeatingReader {
    listTables(): Promise<Table[]>;
    getTable(id: string): Promise<Table | undefined>;
    listChairs(tableId?: string): Promise<Chair[]>;
    getWeeklyHours(dayOfWeek: number): Promise<WeeklyHours | undefined>;
    getSpecialHours(date: string): Promise<SpecialHours | undefined>;
    getCustomer(id: string): Promise<Customer | undefined>;
    getReservation(id: string): Promise<Reservation | undefined>;
    listReservations(filter?: ReservationFilter): Promise<Reservation[]>;
    /** Assignments of a reservation; released rows only when includeReleased is set */
    listAssignments(reservationId: string, options?: { includeReleased?: boolean }): Promise<TableAssignment[]>;
    /**
     * Unreleased assignments on a table for a date whose reservation is
     * pending, confirmed or seated
     */
    findOccupancies(tableId: string, date: string): Promise<Occupancy[]>;
}

/**
 * Writes staged inside one transaction
 *
 * Nothing is visible to readers until the transaction commits; if the work
 * throws, nothing is applied.
 */
export interface SeatingUnitOfWork {
    /** Stage a new reservation row and return its id */
    insertReservation(data: NewReservation): string;
    updateReservation(id: string, changes: ReservationChanges): void;
    /** Remove a reservation together with all of its assignment rows */
    deleteReservation(id: string): void;
    insertAssignments(reservationId: string, tableIds: readonly string[]): void;
    /** Mark every unreleased assignment of the reservation as released */
    releaseAssignments(reservationId: string): void;
    /** Drop the unreleased assignments of the reservation and insert a new set */
    replaceAssignments(reservationId: string, tableIds: readonly string[]): void;
}

export interface SeatingRepository extends SeatingReader {
    transaction<T>(work: (uow: SeatingUnitOfWork) => T | Promise<T>): Promise<T>;
}
