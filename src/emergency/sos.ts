import { AlertFactory } from '../alerts/factory.js';
import { UNKNOWN_USER, formatSosMessage } from '../alerts/format.js';
import { logger } from '../config/logger.js';
import { NotFoundError, ValidationError, errorMessage } from '../domain/errors.js';
import type { Alert, Emergency, Notification, Severity } from '../domain/types.js';
import { Metrics } from '../metrics/counter.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import type { AlertStore, DirectoryStore } from '../storage/store.js';
import { EmergencyEscalator } from './escalator.js';

export interface SosInput {
    userId: string;
    deviceId?: string | null;
    severity?: Severity;
    latitude?: number | null;
    longitude?: number | null;
}

export interface SosOutcome {
    alert: Alert;
    notifications: Notification[];
    emergency: Emergency | null;
}

type SosStore = Pick<DirectoryStore, 'getUser' | 'getDevice'> & Pick<AlertStore, 'saveAlert'>;

export class SosService {
    constructor(
        private store: SosStore,
        private alertFactory: AlertFactory,
        private dispatcher: NotificationDispatcher,
        private escalator: EmergencyEscalator,
        private metrics: Metrics,
        private now: () => Date = () => new Date(),
    ) { }

    /**
     * Manual emergency: raises an `sos` alert, texts every emergency contact
     * and opens a `sos_manual` emergency.
     */
    async triggerSos(input: SosInput): Promise<SosOutcome> {
        const user = await this.store.getUser(input.userId);
        if (!user) {
            throw new NotFoundError('User', input.userId);
        }

        const deviceId = input.deviceId ?? null;
        if (deviceId !== null) {
            const device = await this.store.getDevice(deviceId);
            if (!device || device.userId !== user.id) {
                throw new ValidationError(`Device ${deviceId} does not belong to user ${user.id}`, 'device_id');
            }
        }

        const message = formatSosMessage({
            userName: user.name,
            triggeredAt: this.now(),
            latitude: input.latitude,
            longitude: input.longitude,
        });

        const alert = await this.store.saveAlert(
            this.alertFactory.build({
                user,
                readingId: null,
                vitalKind: 'sos',
                value: 0,
                severity: input.severity ?? 'high',
                geolocation: { latitude: input.latitude, longitude: input.longitude },
                message,
            }),
        );
        this.metrics.increment('alerts_created');
        logger.warn({ alertId: alert.id, userId: user.id, deviceId }, 'SOS triggered');

        const notifications = await this.dispatcher.dispatch(alert, { channels: ['sms'] });

        let emergency: Emergency | null = null;
        try {
            emergency = await this.escalator.escalate({
                user,
                alert,
                deviceId,
                emergencyType: 'sos_manual',
                description: `SOS triggered by ${user.name || UNKNOWN_USER} (user ${user.id}) via device ${deviceId ?? 'unknown'}`,
            });
        } catch (err) {
            logger.error({ alertId: alert.id, error: errorMessage(err) }, 'Failed to create emergency for SOS');
        }

        return { alert, notifications, emergency };
    }
}
