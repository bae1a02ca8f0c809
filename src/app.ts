import fastify, { type FastifyError, type FastifyInstance } from "fastify";
import rateLimit from '@fastify/rate-limit';
import { ZodError } from "zod";
import type { AppConfig } from "./config";
import { createLogger, loggerOptions } from "./logger";
import { MemoryStore } from "./store/db";
import { ReservationEngine } from "./domain/engine";
import { AppError } from "./domain/errors";
import { managementRoutes, reservationRoutes } from "./routes";

export interface BuildOptions {
    config: AppConfig;
    /** Defaults to a fresh, empty MemoryStore */
    store?: MemoryStore;
}

export interface SeatingApp {
    app: FastifyInstance;
    engine: ReservationEngine;
    store: MemoryStore;
}

/**
 * Build the HTTP server without listening
 *
 * Features:
 * - Rate limiting (RATE_LIMIT_MAX requests per RATE_LIMIT_WINDOW)
 * - pino request logging, pretty-printed when PRETTY_LOGS is on
 * - Domain errors mapped to `{ error, detail }` with their status code
 */
export const buildApp = async ({ config, store = new MemoryStore() }: BuildOptions): Promise<SeatingApp> => {
    const app = fastify({ logger: loggerOptions(config) });

    const engine = new ReservationEngine({
        store,
        config: config.engine,
        logger: createLogger(config)
    });

    await app.register(rateLimit, {
        max: config.rateLimit.max,
        timeWindow: config.rateLimit.timeWindow
    });

    app.setErrorHandler((error: FastifyError, request, reply) => {
        if (error instanceof AppError) {
            request.log.info({ code: error.code, detail: error.message }, 'request rejected');
            return reply.status(error.statusCode).send({
                error: error.code,
                detail: error.message,
                ...(error.details ? { fields: error.details } : {})
            });
        }
        if (error instanceof ZodError) {
            return reply.status(400).send({ error: 'invalid_input', detail: error.format() });
        }
        if (error.statusCode !== undefined && error.statusCode < 500) {
            return reply.status(error.statusCode).send({ error: error.code ?? 'bad_request', detail: error.message });
        }

        request.log.error({ err: error }, 'unhandled error');
        return reply.status(500).send({ error: 'internal_error', detail: 'Internal server error' });
    });

    app.get('/health', async () => ({ status: 'ok' }));
    await app.register(reservationRoutes({ engine, store }));
    await app.register(managementRoutes({ store }));

    app.addHook('onClose', async () => {
        store.dispose();
    });

    return { app, engine, store };
}
