import { z } from 'zod';
import { RESERVATION_STATUSES } from './domain/status';
import { isCalendarDate } from './domain/clock';

const date = z.string().refine(isCalendarDate, { message: 'Expected a real date in YYYY-MM-DD format' });
const clock = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');
const positiveInt = z.number().int().positive();
const queryInt = z.coerce.number().int().positive();

export const IdParamsSchema = z.object({
    id: z.string().min(1),
});

export const DateParamsSchema = z.object({
    date,
});

/**
 * Validation schema for GET /availability query parameters
 */
export const AvailabilityQuerySchema = z.object({
    /** Date in YYYY-MM-DD format */
    date,
    /** Number of people (automatically coerced from string) */
    partySize: queryInt,
    /** Defaults to DEFAULT_DURATION_MINUTES */
    durationMinutes: queryInt.optional(),
    /** Minutes between offered start times, defaults to SLOT_GRANULARITY_MINUTES */
    granularity: queryInt.optional(),
});

/**
 * Validation schema for GET /availability/tables query parameters
 */
export const TableAvailabilityQuerySchema = z.object({
    date,
    startTime: clock,
    partySize: queryInt,
    durationMinutes: queryInt.optional(),
});

export const DeleteReservationQuerySchema = z.object({
    /** Remove the row and its assignment history instead of cancelling */
    purge: z.enum(['true', 'false']).default('false').transform(value => value === 'true'),
});

/**
 * Validation schema for POST /reservations request body
 */
export const CreateReservationSchema = z.object({
    customerId: z.string().min(1),
    partySize: positiveInt,
    date,
    startTime: clock,
    durationMinutes: positiveInt.optional(),
    notes: z.string().max(1000).optional(),
});

/**
 * Validation schema for PUT /reservations/:id; every field is optional
 */
export const RescheduleReservationSchema = CreateReservationSchema.omit({ customerId: true }).partial();

export const StatusChangeSchema = z.object({
    status: z.enum(RESERVATION_STATUSES),
});

export const ListReservationsQuerySchema = z.object({
    dateFrom: date.optional(),
    dateTo: date.optional(),
    status: z.enum(RESERVATION_STATUSES).optional(),
    tableId: z.string().optional(),
    customerId: z.string().optional(),
    limit: z.coerce.number().int().min(1).max(1000).default(100),
    offset: z.coerce.number().int().min(0).default(0),
});

export const TableSchema = z.object({
    number: z.string().min(1).max(10),
    minCapacity: positiveInt,
    maxCapacity: positiveInt,
    isShared: z.boolean().default(false),
    location: z.string().max(100).optional(),
}).refine(t => t.maxCapacity >= t.minCapacity, {
    message: 'maxCapacity must be greater than or equal to minCapacity',
    path: ['maxCapacity'],
});

export const TableUpdateSchema = z.object({
    number: z.string().min(1).max(10).optional(),
    minCapacity: positiveInt.optional(),
    maxCapacity: positiveInt.optional(),
    isShared: z.boolean().optional(),
    location: z.string().max(100).optional(),
});

export const ChairUpdateSchema = z.object({
    isAssigned: z.boolean(),
});

/**
 * Validation schema for PUT /hours (0 = Monday ... 6 = Sunday)
 */
export const WeeklyHoursSchema = z.object({
    dayOfWeek: z.number().int().min(0).max(6),
    openTime: clock,
    closeTime: clock,
    lastReservationTime: clock,
});

export const SpecialHoursSchema = z.object({
    date,
    name: z.string().min(1).max(100),
    description: z.string().optional(),
    isClosed: z.boolean().default(false),
    openTime: clock.optional(),
    closeTime: clock.optional(),
    lastReservationTime: clock.optional(),
});

export const SpecialHoursQuerySchema = z.object({
    dateFrom: date.optional(),
    dateTo: date.optional(),
});

export const CustomerSchema = z.object({
    name: z.string().min(1).max(100),
    email: z.string().email().optional(),
    phone: z.string().min(3).max(20).optional(),
    notes: z.string().optional(),
}).refine(c => c.email !== undefined || c.phone !== undefined, {
    message: 'Either email or phone must be provided',
    path: ['email'],
});
