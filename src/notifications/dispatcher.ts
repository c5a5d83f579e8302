import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { DeliveryError, errorMessage } from '../domain/errors.js';
import type {
    Alert,
    FailureReason,
    Notification,
    NotificationChannel,
} from '../domain/types.js';
import { Metrics } from '../metrics/counter.js';
import type { DirectoryStore, NotificationStore } from '../storage/store.js';
import { withTimeout, type MailSender, type PushSender, type SmsSender } from './senders.js';

export interface DeliveryTarget {
    channel: NotificationChannel;
    recipient: string;
}

export type DeliveryResult =
    | { ok: true }
    | { ok: false; reason: FailureReason; error: string };

export interface Senders {
    push?: PushSender;
    sms?: SmsSender;
    mail?: MailSender;
}

export interface DispatcherOptions {
    channels: NotificationChannel[];
    timeoutMs: number;
    now?: () => Date;
}

export interface DispatchOverrides {
    /** Replaces the alert's message as the notification body. */
    message?: string;
    /** Restricts fan-out to these channels. */
    channels?: NotificationChannel[];
}

type DispatchStore = Pick<DirectoryStore, 'listDevices' | 'listContacts'> &
    Pick<NotificationStore, 'saveNotification' | 'updateNotification'>;

function pushTitle(alert: Alert): string {
    return alert.vitalKind === 'sos' ? 'SOS Alert' : 'Vital Sign Alert';
}

export class NotificationDispatcher {
    private now: () => Date;

    constructor(
        private store: DispatchStore,
        private senders: Senders,
        private metrics: Metrics,
        private options: DispatcherOptions,
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Fan an alert out to every known recipient on the configured channels.
     * Never throws: each recipient's outcome is recorded on its notification.
     */
    async dispatch(alert: Alert, overrides: DispatchOverrides = {}): Promise<Notification[]> {
        const channels = overrides.channels ?? this.options.channels;

        let targets: DeliveryTarget[];
        try {
            targets = await this.collectTargets(alert.userId, channels);
        } catch (err) {
            logger.error({ alertId: alert.id, error: errorMessage(err) }, 'Failed to load notification recipients');
            return [];
        }

        if (targets.length === 0) {
            logger.info({ alertId: alert.id, channels }, 'No notification recipients registered');
            return [];
        }

        const message = overrides.message ?? alert.message;
        const notifications = await Promise.all(
            targets.map((target) => this.deliver(alert, target, message)),
        );

        const delivered = notifications.filter((n): n is Notification => n !== undefined);
        const sent = delivered.filter((n) => n.status === 'sent').length;
        logger.info(
            { alertId: alert.id, attempted: targets.length, sent, failed: targets.length - sent },
            'Alert dispatch finished',
        );

        return delivered;
    }

    /**
     * One target per distinct recipient and channel.
     */
    private async collectTargets(
        userId: string,
        channels: NotificationChannel[],
    ): Promise<DeliveryTarget[]> {
        const targets: DeliveryTarget[] = [];
        const seen = new Set<string>();
        const add = (channel: NotificationChannel, recipient: string | null | undefined) => {
            const value = recipient?.trim();
            if (!value) return;
            const key = `${channel}:${value}`;
            if (seen.has(key)) return;
            seen.add(key);
            targets.push({ channel, recipient: value });
        };

        if (channels.includes('push')) {
            for (const device of await this.store.listDevices(userId)) {
                add('push', device.pushToken);
            }
        }

        if (channels.includes('sms') || channels.includes('email')) {
            const contacts = await this.store.listContacts(userId);
            if (channels.includes('sms')) {
                contacts.forEach((contact) => add('sms', contact.phoneNumber));
            }
            if (channels.includes('email')) {
                contacts.forEach((contact) => add('email', contact.email));
            }
        }

        return targets;
    }

    private async deliver(
        alert: Alert,
        target: DeliveryTarget,
        message: string,
    ): Promise<Notification | undefined> {
        const createdAt = this.now().toISOString();

        let pending: Notification;
        try {
            pending = await this.store.saveNotification({
                id: uuidv4(),
                alertId: alert.id,
                channel: target.channel,
                recipient: target.recipient,
                message,
                status: 'pending',
                createdAt,
                updatedAt: createdAt,
            });
        } catch (err) {
            // No send without a pending row
            this.metrics.increment('notifications_failed');
            logger.error(
                { alertId: alert.id, channel: target.channel, error: errorMessage(err) },
                'Failed to persist pending notification',
            );
            return undefined;
        }

        const result = await this.attempt(alert, target, message);

        const settled: Notification = {
            ...pending,
            status: result.ok ? 'sent' : 'failed',
            updatedAt: this.now().toISOString(),
        };
        if (!result.ok) {
            settled.failureReason = result.reason;
        }

        if (result.ok) {
            this.metrics.increment('notifications_sent');
            logger.info({ notificationId: pending.id, channel: target.channel }, 'Notification sent');
        } else {
            this.metrics.increment('notifications_failed');
            logger.warn(
                {
                    notificationId: pending.id,
                    channel: target.channel,
                    reason: result.reason,
                    error: result.error,
                },
                'Notification delivery failed',
            );
        }

        try {
            return await this.store.updateNotification(settled);
        } catch (err) {
            logger.error(
                { notificationId: pending.id, error: errorMessage(err) },
                'Failed to record notification outcome',
            );
            return settled;
        }
    }

    private async attempt(alert: Alert, target: DeliveryTarget, message: string): Promise<DeliveryResult> {
        const { timeoutMs } = this.options;
        const label = `${target.channel} delivery`;

        try {
            switch (target.channel) {
                case 'push': {
                    if (!this.senders.push) return notConfigured('push');
                    const result = await withTimeout(
                        this.senders.push.send([target.recipient], pushTitle(alert), message),
                        timeoutMs,
                        label,
                    );
                    return result.successCount > 0
                        ? { ok: true }
                        : { ok: false, reason: 'rejected', error: 'Push token rejected by provider' };
                }
                case 'sms': {
                    if (!this.senders.sms) return notConfigured('sms');
                    await withTimeout(this.senders.sms.send(message, target.recipient), timeoutMs, label);
                    return { ok: true };
                }
                case 'email': {
                    if (!this.senders.mail) return notConfigured('email');
                    const accepted = await withTimeout(
                        this.senders.mail.send(target.recipient, pushTitle(alert), message),
                        timeoutMs,
                        label,
                    );
                    return accepted
                        ? { ok: true }
                        : { ok: false, reason: 'rejected', error: 'Mail provider rejected the message' };
                }
            }
        } catch (err) {
            return {
                ok: false,
                reason: err instanceof DeliveryError ? err.reason : 'transport_error',
                error: errorMessage(err),
            };
        }
    }
}

function notConfigured(channel: NotificationChannel): DeliveryResult {
    return { ok: false, reason: 'transport_error', error: `No ${channel} sender configured` };
}
