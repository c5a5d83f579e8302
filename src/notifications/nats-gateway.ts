import { ErrorCode, NatsError } from 'nats';
import { logger } from '../config/logger.js';
import { DeliveryError, errorMessage } from '../domain/errors.js';
import type { NatsClient } from '../nats/connection.js';
import type { MailSender, PushResult, PushSender, SmsSender } from './senders.js';

export const DELIVERY_SUBJECTS = {
    push: 'delivery.push',
    sms: 'delivery.sms',
    email: 'delivery.email',
} as const;

type Requester = Pick<NatsClient, 'request'>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDeliveryError(subject: string, err: unknown): DeliveryError {
    if (err instanceof DeliveryError) {
        return err;
    }
    if (err instanceof NatsError && err.code === ErrorCode.Timeout) {
        return new DeliveryError(`${subject} timed out`, 'timeout');
    }
    if (err instanceof NatsError && err.code === ErrorCode.NoResponders) {
        return new DeliveryError(`No gateway listening on ${subject}`, 'transport_error');
    }
    return new DeliveryError(`${subject} failed: ${errorMessage(err)}`, 'transport_error');
}

/**
 * Hands deliveries to the external gateway over NATS request-reply. One
 * instance serves as the push, SMS and mail sender.
 */
export class NatsDeliveryGateway {
    readonly push: PushSender = {
        send: (tokens, title, body) => this.sendPush(tokens, title, body),
    };

    readonly sms: SmsSender = {
        send: (message, destination) => this.sendSms(message, destination),
    };

    readonly mail: MailSender = {
        send: (to, subject, body) => this.sendMail(to, subject, body),
    };

    constructor(
        private client: Requester,
        private timeoutMs: number,
    ) { }

    private async call(subject: string, body: unknown): Promise<Record<string, unknown>> {
        let reply: unknown;
        try {
            reply = await this.client.request(subject, body, this.timeoutMs);
        } catch (err) {
            throw toDeliveryError(subject, err);
        }
        if (!isRecord(reply)) {
            throw new DeliveryError(`Malformed reply on ${subject}`, 'transport_error');
        }
        return reply;
    }

    private async sendPush(tokens: string[], title: string, body: string): Promise<PushResult> {
        const reply = await this.call(DELIVERY_SUBJECTS.push, { tokens, title, body });
        const { success_count: successCount, failure_count: failureCount } = reply;
        if (typeof successCount !== 'number' || typeof failureCount !== 'number') {
            throw new DeliveryError(`Malformed reply on ${DELIVERY_SUBJECTS.push}`, 'transport_error');
        }
        return { successCount, failureCount };
    }

    private async sendSms(message: string, destination: string): Promise<unknown> {
        const reply = await this.call(DELIVERY_SUBJECTS.sms, { to: destination, message });
        if (reply.ok !== true) {
            const reason = typeof reply.error === 'string' ? reply.error : 'provider rejected message';
            throw new DeliveryError(`SMS to ${destination} rejected: ${reason}`, 'rejected');
        }
        logger.debug({ destination, messageId: reply.message_id }, 'SMS accepted by gateway');
        return reply;
    }

    private async sendMail(to: string, subject: string, body: string): Promise<boolean> {
        const reply = await this.call(DELIVERY_SUBJECTS.email, { to, subject, body });
        return reply.ok === true;
    }
}
