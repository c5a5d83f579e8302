import type { FailureReason } from './types.js';

/**
 * Malformed or unauthorized input. Surfaced to the caller as-is and never retried.
 */
export class ValidationError extends Error {
    constructor(
        message: string,
        public readonly field?: string,
    ) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    constructor(
        public readonly entity: string,
        public readonly id: string,
    ) {
        super(`${entity} ${id} not found`);
        this.name = 'NotFoundError';
    }
}

/**
 * Raised by a sender when a delivery attempt did not complete. The dispatcher
 * records it on the notification and never lets it escape.
 */
export class DeliveryError extends Error {
    constructor(
        message: string,
        public readonly reason: FailureReason,
    ) {
        super(message);
        this.name = 'DeliveryError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
