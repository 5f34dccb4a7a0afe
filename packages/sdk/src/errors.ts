import { ErrorClass, TaskError } from './types';

export const ErrorCodes = {
    MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
    UNKNOWN_TOPIC: 'UNKNOWN_TOPIC',
    INVALID_PAYLOAD: 'INVALID_PAYLOAD',
    MISSING_CORRELATION_KEY: 'MISSING_CORRELATION_KEY',
    UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',
    UPSTREAM_UNAVAILABLE: 'UPSTREAM_UNAVAILABLE',
    HANDLER_ERROR: 'HANDLER_ERROR',
    AUTH_REJECTED: 'AUTH_REJECTED',
    AUTH_FAILED: 'AUTH_FAILED',
    AUTH_TOKEN_UNUSABLE: 'AUTH_TOKEN_UNUSABLE',
    UPSTREAM_REJECTED: 'UPSTREAM_REJECTED',
    STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
    LEASE_EXPIRED: 'LEASE_EXPIRED',
    RETRY_BUDGET_EXHAUSTED: 'RETRY_BUDGET_EXHAUSTED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base of the gateway error taxonomy. Handlers throw subclasses so the
 * dispatcher can decide between retrying and failing the task.
 */
export class GatewayError extends Error {
    constructor(
        public readonly code: string,
        public readonly errorClass: ErrorClass,
        public readonly retryable: boolean,
        message: string,
        public readonly details?: Record<string, unknown>,
    ) {
        super(message);
        this.name = new.target.name;
    }

    toTaskError(): TaskError {
        const taskError: TaskError = { code: this.code, class: this.errorClass, message: this.message };
        if (this.details) taskError.details = this.details;
        return taskError;
    }
}

export class ValidationError extends GatewayError {
    constructor(message: string, code: string = ErrorCodes.MISSING_REQUIRED_FIELD, details?: Record<string, unknown>) {
        super(code, 'validation', false, message, details);
    }
}

export class TransientError extends GatewayError {
    constructor(message: string, code: string = ErrorCodes.UPSTREAM_UNAVAILABLE, details?: Record<string, unknown>) {
        super(code, 'transient', true, message, details);
    }
}

export class AuthenticationExpiredError extends GatewayError {
    constructor(message: string, code: string = ErrorCodes.AUTH_REJECTED, details?: Record<string, unknown>) {
        super(code, 'auth_expired', true, message, details);
    }
}

// Upstream said no to the request itself; retrying cannot change the answer.
export class BusinessRejectedError extends GatewayError {
    constructor(message: string, details?: Record<string, unknown>, code: string = ErrorCodes.UPSTREAM_REJECTED) {
        super(code, 'business_rejected', false, message, details);
    }
}

export class InfrastructureError extends GatewayError {
    constructor(message: string, code: string = ErrorCodes.STORE_UNAVAILABLE, details?: Record<string, unknown>) {
        super(code, 'infrastructure', false, message, details);
    }
}

export function isRetryable(err: unknown): boolean {
    return err instanceof GatewayError ? err.retryable : true;
}

/** Unclassified throwables are treated as transient handler failures. */
export function toTaskError(err: unknown): TaskError {
    if (err instanceof GatewayError) return err.toTaskError();
    return {
        code: ErrorCodes.HANDLER_ERROR,
        class: 'transient',
        message: err instanceof Error ? err.message : String(err),
    };
}
