import { DeliveryError } from '../domain/errors.js';

export interface PushResult {
    successCount: number;
    failureCount: number;
}

/**
 * Partial failures are reported in the counts; throws only when the transport
 * itself is unavailable.
 */
export interface PushSender {
    send(tokens: string[], title: string, body: string): Promise<PushResult>;
}

/** Resolves with a provider acknowledgement, throws on failure. */
export interface SmsSender {
    send(message: string, destination: string): Promise<unknown>;
}

export interface MailSender {
    send(to: string, subject: string, body: string): Promise<boolean>;
}

/**
 * Race a delivery attempt against a timer. The timer is always cleared so a
 * settled send leaves nothing scheduled.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new DeliveryError(`${label} timed out after ${timeoutMs}ms`, 'timeout'));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
