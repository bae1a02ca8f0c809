import { z } from 'zod';

const flag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

/**
 * Environment configuration
 *
 * Every variable is optional; defaults suit local development.
 */
const ConfigSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    PRETTY_LOGS: flag.optional(),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW: z.string().default('1 minute'),
    /** Reservation length when a request does not give one */
    DEFAULT_DURATION_MINUTES: z.coerce.number().int().positive().default(90),
    /** Step between offered start times */
    SLOT_GRANULARITY_MINUTES: z.coerce.number().int().positive().default(15),
    /** Largest number of shared tables combined for one party */
    MAX_COMBINATION_SIZE: z.coerce.number().int().min(1).default(3),
    /** Most unused seats a candidate may leave; unset means no bound */
    MAX_EXCESS_SEATS: z.coerce.number().int().min(0).optional(),
    /** "static" uses maxCapacity, "chairs" counts assigned chairs */
    CAPACITY_SOURCE: z.enum(['static', 'chairs']).default('static'),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    SEED: flag.default('true'),
});

export type CapacitySource = z.infer<typeof ConfigSchema>['CAPACITY_SOURCE'];

export interface AppConfig {
    env: 'development' | 'test' | 'production';
    port: number;
    host: string;
    logLevel: string;
    prettyLogs: boolean;
    rateLimit: { max: number; timeWindow: string };
    seed: boolean;
    engine: EngineConfig;
}

export interface EngineConfig {
    defaultDurationMinutes: number;
    slotGranularityMinutes: number;
    maxCombinationSize: number;
    maxExcessSeats?: number;
    capacitySource: CapacitySource;
    lockTimeoutMs: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
    defaultDurationMinutes: 90,
    slotGranularityMinutes: 15,
    maxCombinationSize: 3,
    capacitySource: 'static',
    lockTimeoutMs: 5000
};

/**
 * Parse configuration from an environment map
 *
 * @throws {Error} listing every invalid variable
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const c = parsed.data;

    return {
        env: c.NODE_ENV,
        port: c.PORT,
        host: c.HOST,
        logLevel: c.LOG_LEVEL ?? (c.NODE_ENV === 'test' ? 'silent' : 'info'),
        prettyLogs: c.PRETTY_LOGS ?? c.NODE_ENV === 'development',
        rateLimit: { max: c.RATE_LIMIT_MAX, timeWindow: c.RATE_LIMIT_WINDOW },
        seed: c.SEED,
        engine: {
            defaultDurationMinutes: c.DEFAULT_DURATION_MINUTES,
            slotGranularityMinutes: c.SLOT_GRANULARITY_MINUTES,
            maxCombinationSize: c.MAX_COMBINATION_SIZE,
            maxExcessSeats: c.MAX_EXCESS_SEATS,
            capacitySource: c.CAPACITY_SOURCE,
            lockTimeoutMs: c.LOCK_TIMEOUT_MS
        }
    };
}
