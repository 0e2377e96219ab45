/**
 * Base application error class
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigurationError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, 'CONFIG_ERROR', cause);
    }
}

/**
 * Venue unreachable after the port's own retries.
 */
export class ConnectionError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, 'CONNECTION_ERROR', cause);
    }
}

/**
 * Venue refused an order.
 */
export class SubmissionError extends AppError {
    constructor(
        message: string,
        public readonly instrument?: string,
        cause?: Error
    ) {
        super(message, 'SUBMISSION_ERROR', cause);
    }
}

/**
 * The order left for the venue but no acknowledgment came back.
 * The venue may hold a live contract; it needs manual reconciliation.
 */
export class SettlementUnknownError extends AppError {
    constructor(
        message: string,
        public readonly instrument: string,
        public readonly stake: number,
        cause?: Error
    ) {
        super(message, 'SETTLEMENT_UNKNOWN', cause);
    }
}

export class TickTimeoutError extends AppError {
    constructor(
        message: string,
        public readonly timeoutMs: number
    ) {
        super(message, 'TICK_TIMEOUT');
    }
}

/**
 * A mutation that would break a ledger or lifecycle invariant.
 * Raised before the mutation is applied.
 */
export class InvariantViolationError extends AppError {
    constructor(
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message, 'INVARIANT_VIOLATION');
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
