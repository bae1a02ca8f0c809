/**
 * Table on the floor plan with a flexible capacity range
 *
 * Tables flagged as shared may be combined with other shared tables to seat
 * one larger party.
 */
export interface Table {
    id: string;
    /** Unique display number (e.g. "12", "P3") */
    number: string;
    /** Smallest party this table is offered to */
    minCapacity: number;
    /** Largest party this table can seat */
    maxCapacity: number;
    isShared: boolean;
    location?: string;
    createdAt: string;
    updatedAt: string;
}

/**
 * Chair belonging to a table
 *
 * Only chairs with isAssigned count toward usable capacity when the
 * "chairs" capacity source is configured.
 */
export interface Chair {
    id: string;
    tableId: string;
    isAssigned: boolean;
    createdAt: string;
    updatedAt: string;
}

/**
 * Regular operating hours for one weekday
 *
 * dayOfWeek: 0 = Monday ... 6 = Sunday. Times are "HH:mm" wall-clock strings.
 */
export interface WeeklyHours {
    id: string;
    dayOfWeek: number;
    openTime: string;
    closeTime: string;
    lastReservationTime: string;
    createdAt: string;
    updatedAt: string;
}

/**
 * Date-specific override (holiday, private event)
 *
 * When present it fully replaces the weekly pattern for that date.
 */
export interface SpecialHours {
    id: string;
    /** Calendar date in YYYY-MM-DD format */
    date: string;
    name: string;
    description?: string;
    isClosed: boolean;
    openTime?: string;
    closeTime?: string;
    lastReservationTime?: string;
    createdAt: string;
    updatedAt: string;
}

export interface Customer {
    id: string;
    name: string;
    email?: string;
    phone?: string;
    notes?: string;
    createdAt: string;
    updatedAt: string;
}

export type ReservationStatus =
    | 'pending'
    | 'confirmed'
    | 'seated'
    | 'completed'
    | 'cancelled'
    | 'no_show';

/**
 * Reservation for a party
 *
 * The occupancy window is half-open: [startTime, startTime + durationMinutes).
 */
export interface Reservation {
    id: string;
    customerId: string;
    partySize: number;
    /** Calendar date in YYYY-MM-DD format */
    reservationDate: string;
    /** Wall-clock start in HH:mm format */
    startTime: string;
    durationMinutes: number;
    notes?: string;
    status: ReservationStatus;
    createdAt: string;
    updatedAt: string;
}

/**
 * Link between a reservation and one of its tables
 *
 * A combined seating holds one row per table. releasedAt is set when the
 * reservation stops occupying its tables; the row is kept as history.
 */
export interface TableAssignment {
    id: string;
    reservationId: string;
    tableId: string;
    releasedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

/**
 * Minute-of-day interval, start inclusive, end exclusive
 */
export interface TimeWindow {
    start: number;
    end: number;
}

/**
 * Effective operating window of a date after override precedence
 */
export type OperatingWindow =
    | { closed: true }
    | {
        closed: false;
        /** Minutes since midnight */
        open: number;
        close: number;
        lastReservation: number;
    };

/**
 * Table with the capacity actually used for matching
 */
export interface SeatableTable extends Table {
    /** maxCapacity, or the assigned chair count under the "chairs" source */
    effectiveMaxCapacity: number;
}

/**
 * Seating candidate for a party
 *
 * Either one table, or a combination of shared tables.
 */
export interface SeatingCandidate {
    kind: 'single' | 'combo';
    tableIds: string[];
    tableNumbers: string[];
    minCapacity: number;
    maxCapacity: number;
    /** Unused seats (maxCapacity - partySize), lower is better */
    excess: number;
}

/**
 * Occupying assignment as seen by the conflict check
 */
export interface Occupancy {
    reservationId: string;
    tableId: string;
    window: TimeWindow;
}

/**
 * Reservation together with the tables it currently holds
 */
export interface ReservationDetails extends Reservation {
    tables: Table[];
}

/**
 * Outcome of a successful allocation
 */
export interface AssignmentResult {
    reservationId: string;
    tableIds: string[];
    reservation: Reservation;
}

/**
 * Seating free for a party at one start time
 *
 * When the window falls outside operating hours, isValidTime is false and
 * no candidates are listed.
 */
export interface TableAvailability {
    date: string;
    startTime: string;
    partySize: number;
    durationMinutes: number;
    isValidTime: boolean;
    /** Free candidates in allocation order */
    candidates: SeatingCandidate[];
}

/**
 * Seed data structure for initializing the system
 */
export interface SeedData {
    tables: Array<Pick<Table, 'number' | 'minCapacity' | 'maxCapacity' | 'isShared' | 'location'>>;
    weeklyHours: Array<Pick<WeeklyHours, 'dayOfWeek' | 'openTime' | 'closeTime' | 'lastReservationTime'>>;
    specialHours: Array<Pick<SpecialHours, 'date' | 'name' | 'description' | 'isClosed' | 'openTime' | 'closeTime' | 'lastReservationTime'>>;
    customers: Array<Pick<Customer, 'name' | 'email' | 'phone' | 'notes'>>;
}
