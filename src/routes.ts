import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import {
    AvailabilityQuerySchema,
    ChairUpdateSchema,
    CreateReservationSchema,
    CustomerSchema,
    DateParamsSchema,
    DeleteReservationQuerySchema,
    IdParamsSchema,
    ListReservationsQuerySchema,
    RescheduleReservationSchema,
    SpecialHoursQuerySchema,
    SpecialHoursSchema,
    StatusChangeSchema,
    TableAvailabilityQuerySchema,
    TableSchema,
    TableUpdateSchema,
    WeeklyHoursSchema
} from './schemas';
import type { ReservationEngine } from './domain/engine';
import type { MemoryStore } from './store/db';
import { NotFoundError } from './domain/errors';

export interface RouteDeps {
    engine: ReservationEngine;
    store: MemoryStore;
}

const invalid = (reply: FastifyReply, error: ZodError) => {
    return reply.status(400).send({ error: 'invalid_input', detail: error.format() });
}

/**
 * Reservation routes
 *
 * Domain errors thrown from the engine are turned into responses by the
 * app-level error handler.
 */
export const reservationRoutes = ({ engine, store }: RouteDeps) => async (app: FastifyInstance) => {
    /**
     * Bookable start times for a party on a date
     *
     * @returns Object with date, partySize, durationMinutes and slots ("HH:mm")
     * @throws {400} Invalid input
     */
    app.get('/availability', async (request: FastifyRequest, reply: FastifyReply) => {
        const query = AvailabilityQuerySchema.safeParse(request.query);
        if (!query.success) return invalid(reply, query.error);

        const { date, partySize, durationMinutes, granularity } = query.data;
        const slots = await engine.checkAvailability(date, partySize, durationMinutes, granularity);
        return {
            date,
            partySize,
            durationMinutes: durationMinutes ?? engine.defaultDurationMinutes,
            slots
        };
    });

    /**
     * Tables free for a party at one start time
     *
     * @returns Object with the query, isValidTime and the free candidates in allocation order
     * @throws {400} Invalid input
     */
    app.get('/availability/tables', async (request: FastifyRequest, reply: FastifyReply) => {
        const query = TableAvailabilityQuerySchema.safeParse(request.query);
        if (!query.success) return invalid(reply, query.error);

        const { date, startTime, partySize, durationMinutes } = query.data;
        return engine.findAvailableTables(date, startTime, partySize, durationMinutes);
    });

    /**
     * Create a reservation and assign its tables
     *
     * Supports idempotency through the Idempotency-Key header: a repeated key
     * returns the stored result with 200 instead of booking again.
     *
     * @throws {400} Invalid input
     * @throws {404} Customer not found
     * @throws {409} No table or combination is free
     * @throws {422} Closed or outside operating hours
     */
    app.post('/reservations', async (request: FastifyRequest, reply: FastifyReply) => {
        const header = request.headers['idempotency-key'];
        const idempotencyKey = typeof header === 'string' && header.length > 0 ? header : undefined;
        if (idempotencyKey) {
            const existing = store.getIdempotency(idempotencyKey);
            if (existing) return reply.status(200).send(existing);
        }

        const body = CreateReservationSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        const result = await engine.createAndAssign(body.data);
        if (idempotencyKey) {
            store.setIdempotency(idempotencyKey, result);
        }
        return reply.status(201).send(result);
    });

    app.get('/reservations', async (request: FastifyRequest, reply: FastifyReply) => {
        const query = ListReservationsQuerySchema.safeParse(request.query);
        if (!query.success) return invalid(reply, query.error);

        const items = await engine.listReservations(query.data);
        return { items, limit: query.data.limit, offset: query.data.offset };
    });

    app.get('/reservations/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        return engine.getReservation(params.data.id);
    });

    /**
     * Rebook a pending or confirmed reservation; unchanged fields are kept
     *
     * @throws {409} Not reschedulable, or nothing free at the new time
     */
    app.put('/reservations/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);
        const body = RescheduleReservationSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return engine.reschedule(params.data.id, body.data);
    });

    app.patch('/reservations/:id/status', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);
        const body = StatusChangeSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return engine.changeStatus(params.data.id, body.data.status);
    });

    /**
     * Cancel a reservation
     *
     * The row stays with status cancelled and its tables are released.
     * With ?purge=true the reservation and its assignment rows are removed
     * instead, whatever its status.
     *
     * @returns 204 No Content on success
     */
    app.delete('/reservations/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);
        const query = DeleteReservationQuerySchema.safeParse(request.query);
        if (!query.success) return invalid(reply, query.error);

        if (query.data.purge) {
            await engine.deleteReservation(params.data.id);
        } else {
            await engine.cancelReservation(params.data.id);
        }
        return reply.status(204).send();
    });
}

/**
 * Floor plan, hours and customer management
 */
export const managementRoutes = ({ store }: Pick<RouteDeps, 'store'>) => async (app: FastifyInstance) => {
    // ===== Tables & chairs =====

    app.get('/tables', async () => ({ items: await store.listTables() }));

    app.post('/tables', async (request: FastifyRequest, reply: FastifyReply) => {
        const body = TableSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return reply.status(201).send(await store.createTable(body.data));
    });

    app.get('/tables/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        const table = await store.getTable(params.data.id);
        if (!table) throw new NotFoundError('Table', params.data.id);
        return table;
    });

    app.put('/tables/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);
        const body = TableUpdateSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return store.updateTable(params.data.id, body.data);
    });

    app.delete('/tables/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        if (!(await store.deleteTable(params.data.id))) throw new NotFoundError('Table', params.data.id);
        return reply.status(204).send();
    });

    app.get('/tables/:id/chairs', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        if (!(await store.getTable(params.data.id))) throw new NotFoundError('Table', params.data.id);
        return { items: await store.listChairs(params.data.id) };
    });

    app.patch('/chairs/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);
        const body = ChairUpdateSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return store.setChairAssigned(params.data.id, body.data.isAssigned);
    });

    // ===== Operating hours =====

    app.get('/hours', async () => ({ items: await store.listWeeklyHours() }));

    app.put('/hours', async (request: FastifyRequest, reply: FastifyReply) => {
        const body = WeeklyHoursSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return store.setWeeklyHours(body.data);
    });

    app.get('/special-hours', async (request: FastifyRequest, reply: FastifyReply) => {
        const query = SpecialHoursQuerySchema.safeParse(request.query);
        if (!query.success) return invalid(reply, query.error);

        return { items: await store.listSpecialHours(query.data.dateFrom, query.data.dateTo) };
    });

    app.get('/special-hours/:date', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = DateParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        const special = await store.getSpecialHours(params.data.date);
        if (!special) throw new NotFoundError('Special hours for', params.data.date);
        return special;
    });

    app.put('/special-hours', async (request: FastifyRequest, reply: FastifyReply) => {
        const body = SpecialHoursSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return store.setSpecialHours(body.data);
    });

    app.delete('/special-hours/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        if (!(await store.deleteSpecialHours(params.data.id))) throw new NotFoundError('Special hours', params.data.id);
        return reply.status(204).send();
    });

    // ===== Customers =====

    app.post('/customers', async (request: FastifyRequest, reply: FastifyReply) => {
        const body = CustomerSchema.safeParse(request.body);
        if (!body.success) return invalid(reply, body.error);

        return reply.status(201).send(await store.findOrCreateCustomer(body.data));
    });

    app.get('/customers/:id', async (request: FastifyRequest, reply: FastifyReply) => {
        const params = IdParamsSchema.safeParse(request.params);
        if (!params.success) return invalid(reply, params.error);

        const customer = await store.getCustomer(params.data.id);
        if (!customer) throw new NotFoundError('Customer', params.data.id);
        return customer;
    });
}
