/**
 * Error taxonomy of the seating engine
 *
 * Every caller-visible operation either succeeds or throws exactly one of
 * these. The HTTP layer maps them with code and statusCode.
 */
export class AppError extends Error {
    constructor(
        public code: string,
        message: string,
        public statusCode: number = 400,
        public details?: Array<{ field: string; message: string }>,
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/** Malformed input: non-positive party size or duration, bad date/time */
export class ValidationError extends AppError {
    constructor(
        message: string = 'Validation failed',
        details?: Array<{ field: string; message: string }>,
    ) {
        super('invalid_input', message, 400, details);
        this.name = 'ValidationError';
    }
}

/** Date closed, or occupancy window outside the effective operating window */
export class ClosedError extends AppError {
    constructor(message: string = 'Restaurant is closed at the requested time') {
        super('closed', message, 422);
        this.name = 'ClosedError';
    }
}

/** Every ranked candidate was taken */
export class NoAvailabilityError extends AppError {
    constructor(message: string = 'No single table or combination is free for the requested window') {
        super('no_capacity', message, 409);
        this.name = 'NoAvailabilityError';
    }
}

export class InvalidTransitionError extends AppError {
    constructor(from: string, to: string) {
        super('invalid_transition', `Cannot transition reservation from ${from} to ${to}`, 409);
        this.name = 'InvalidTransitionError';
    }
}

export class NotFoundError extends AppError {
    constructor(entity: string, id?: string) {
        super('not_found', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
        this.name = 'NotFoundError';
    }
}

/**
 * A table lock could not be obtained within the configured wait.
 * The allocator treats it as a lost race and never surfaces it.
 */
export class LockTimeoutError extends AppError {
    constructor(public tableId: string, timeoutMs: number) {
        super('lock_timeout', `Timed out after ${timeoutMs}ms waiting for table ${tableId}`, 503);
        this.name = 'LockTimeoutError';
    }
}
