import { v4 as uuidv4 } from 'uuid';
import { AlertFactory } from '../alerts/factory.js';
import { logger } from '../config/logger.js';
import { NotFoundError, ValidationError, errorMessage } from '../domain/errors.js';
import {
    VITAL_KINDS,
    type Alert,
    type Emergency,
    type Notification,
    type Reading,
    type User,
    type VitalKind,
    type VitalValues,
} from '../domain/types.js';
import { EmergencyEscalator } from '../emergency/escalator.js';
import { Metrics } from '../metrics/counter.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import type { AlertStore, DirectoryStore, ReadingStore } from '../storage/store.js';
import { evaluateBreach } from '../thresholds/evaluator.js';
import { ThresholdResolver } from '../thresholds/resolver.js';

export interface ReadingInput {
    /** Supplying the upstream event id makes redelivery idempotent. */
    id?: string;
    userId?: string | null;
    deviceId: string;
    vitals: VitalValues;
    latitude?: number | null;
    longitude?: number | null;
    locationAccuracy?: number | null;
    recordedAt?: string;
}

interface OutcomeBase {
    vitalKind: VitalKind;
    value: number;
}

export type VitalOutcome =
    | (OutcomeBase & { state: 'not_configured' })
    | (OutcomeBase & { state: 'no_breach' })
    | (OutcomeBase & { state: 'already_alerted'; alertId: string })
    | (OutcomeBase & {
        state: 'breach';
        alert: Alert;
        notifications: Notification[];
        emergency: Emergency | null;
    })
    | (OutcomeBase & { state: 'failed'; error: string });

export interface IngestionReport {
    reading: Reading;
    outcomes: VitalOutcome[];
}

type PipelineStore = Pick<DirectoryStore, 'getDevice' | 'getUser'> &
    Pick<ReadingStore, 'getReading' | 'saveReading'> &
    Pick<AlertStore, 'findAlertForReading' | 'saveAlert' | 'getAlert' | 'updateAlert'>;

/**
 * Drives a single reading through evaluation. Per vital:
 * resolving -> evaluating -> done, or on breach
 * alert created -> notifying -> escalating -> done.
 */
export class IngestionPipeline {
    constructor(
        private store: PipelineStore,
        private resolver: ThresholdResolver,
        private alertFactory: AlertFactory,
        private dispatcher: NotificationDispatcher,
        private escalator: EmergencyEscalator,
        private metrics: Metrics,
        private now: () => Date = () => new Date(),
    ) { }

    async submitReading(input: ReadingInput): Promise<IngestionReport> {
        const device = await this.store.getDevice(input.deviceId);
        if (!device) {
            throw new NotFoundError('Device', input.deviceId);
        }

        const userId = input.userId ?? device.userId;
        if (userId !== device.userId) {
            throw new ValidationError(`Device ${input.deviceId} does not belong to user ${userId}`, 'device_id');
        }

        const user = await this.store.getUser(userId);
        if (!user) {
            throw new NotFoundError('User', userId);
        }

        const reading = await this.persistReading(input, userId);

        const present = VITAL_KINDS.filter((vital) => reading.vitals[vital] !== undefined);
        const outcomes = await Promise.all(
            present.map((vitalKind) => this.evaluateVital(user, reading, vitalKind)),
        );

        this.metrics.increment('readings_processed');
        logger.info(
            {
                readingId: reading.id,
                userId,
                evaluated: outcomes.length,
                breaches: outcomes.filter((o) => o.state === 'breach').length,
            },
            'Reading processed',
        );

        return { reading, outcomes };
    }

    async resolveAlert(alertId: string): Promise<Alert> {
        const alert = await this.store.getAlert(alertId);
        if (!alert) {
            throw new NotFoundError('Alert', alertId);
        }
        if (alert.resolved) {
            return alert;
        }
        const resolved = await this.store.updateAlert({ ...alert, resolved: true });
        logger.info({ alertId }, 'Alert resolved');
        return resolved;
    }

    /**
     * Saved before any evaluation. A redelivered reading keeps its first copy.
     */
    private async persistReading(input: ReadingInput, userId: string): Promise<Reading> {
        if (input.id) {
            const existing = await this.store.getReading(input.id);
            if (existing) {
                if (existing.userId !== userId) {
                    throw new ValidationError(`Reading ${input.id} belongs to another user`, 'id');
                }
                logger.info({ readingId: existing.id }, 'Reading already stored, re-evaluating');
                return existing;
            }
        }

        const reading: Reading = {
            id: input.id ?? uuidv4(),
            userId,
            deviceId: input.deviceId,
            vitals: { ...input.vitals },
            latitude: input.latitude ?? null,
            longitude: input.longitude ?? null,
            locationAccuracy: input.locationAccuracy ?? null,
            recordedAt: input.recordedAt ?? this.now().toISOString(),
        };

        const saved = await this.store.saveReading(reading);
        logger.info({ readingId: saved.id, userId }, 'Reading stored');
        return saved;
    }

    private async evaluateVital(user: User, reading: Reading, vitalKind: VitalKind): Promise<VitalOutcome> {
        const value = reading.vitals[vitalKind] ?? Number.NaN;

        try {
            if (!Number.isFinite(value)) {
                throw new ValidationError(`Non-numeric value for ${vitalKind}`, vitalKind);
            }

            const resolution = await this.resolver.resolve(user.id, vitalKind);
            if (!resolution.configured) {
                return { vitalKind, value, state: 'not_configured' };
            }

            const breach = evaluateBreach(resolution.band, value);
            if (breach === 'no_breach') {
                return { vitalKind, value, state: 'no_breach' };
            }

            const previous = await this.store.findAlertForReading(reading.id, vitalKind);
            if (previous) {
                return { vitalKind, value, state: 'already_alerted', alertId: previous.id };
            }

            const alert = await this.store.saveAlert(
                this.alertFactory.build({
                    user,
                    readingId: reading.id,
                    vitalKind,
                    value,
                    severity: breach,
                    geolocation: { latitude: reading.latitude, longitude: reading.longitude },
                }),
            );
            this.metrics.increment('alerts_created');
            logger.warn(
                {
                    alertId: alert.id,
                    userId: user.id,
                    vitalKind,
                    value,
                    severity: alert.severity,
                    band: { low: resolution.band.low, high: resolution.band.high, source: resolution.source },
                },
                'Threshold breached',
            );

            const notifications = await this.dispatcher.dispatch(alert);
            const emergency = await this.escalate(user, alert, reading.deviceId);

            return { vitalKind, value, state: 'breach', alert, notifications, emergency };
        } catch (err) {
            this.metrics.increment('vital_evaluation_failed');
            logger.error(
                { readingId: reading.id, vitalKind, error: errorMessage(err) },
                'Vital evaluation failed, skipping',
            );
            return { vitalKind, value, state: 'failed', error: errorMessage(err) };
        }
    }

    private async escalate(user: User, alert: Alert, deviceId: string): Promise<Emergency | null> {
        try {
            return await this.escalator.escalate({ user, alert, deviceId });
        } catch (err) {
            logger.error({ alertId: alert.id, error: errorMessage(err) }, 'Failed to create emergency');
            return null;
        }
    }
}
