import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AlertFactory } from '../../../src/alerts/factory.js';
import { NotFoundError, ValidationError } from '../../../src/domain/errors.js';
import { EmergencyEscalator } from '../../../src/emergency/escalator.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { NotificationDispatcher } from '../../../src/notifications/dispatcher.js';
import { IngestionPipeline } from '../../../src/pipeline/ingestion.js';
import { InMemoryHealthStore } from '../../../src/storage/memory-store.js';
import { ThresholdResolver } from '../../../src/thresholds/resolver.js';
import { FakeSmsSender, START, makeBand, makeDevice, makeUser, seededStore } from '../../helpers/fixtures.js';

describe('IngestionPipeline', () => {
    let store: InMemoryHealthStore;
    let metrics: Metrics;
    let sms: FakeSmsSender;
    let resolver: ThresholdResolver;
    let pipeline: IngestionPipeline;

    beforeEach(async () => {
        store = await seededStore();
        await store.saveBand(makeBand('heart_rate', 60, 100));
        await store.saveBand(makeBand('oxygen_saturation', 95, 100));

        metrics = new Metrics();
        sms = new FakeSmsSender();
        const now = () => START;
        resolver = new ThresholdResolver(store);
        const dispatcher = new NotificationDispatcher(store, { sms }, metrics, {
            channels: ['sms'],
            timeoutMs: 1000,
            now,
        });
        pipeline = new IngestionPipeline(
            store,
            resolver,
            new AlertFactory(now),
            dispatcher,
            new EmergencyEscalator(store, metrics, now),
            metrics,
            now,
        );
    });

    it('should alert, notify each contact and escalate on a low heart rate', async () => {
        const report = await pipeline.submitReading({
            id: 'reading-1',
            deviceId: 'device-1',
            vitals: { heart_rate: 45 },
            latitude: 40.7,
            longitude: -74,
        });

        expect(report.reading).toMatchObject({
            id: 'reading-1',
            userId: 'user-1',
            recordedAt: '2024-03-01T08:00:00.000Z',
        });
        expect(report.outcomes).toHaveLength(1);

        const [outcome] = report.outcomes;
        if (outcome.state !== 'breach') {
            throw new Error(`expected a breach, got ${outcome.state}`);
        }
        expect(outcome.alert).toMatchObject({
            userId: 'user-1',
            readingId: 'reading-1',
            vitalKind: 'heart_rate',
            value: 45,
            severity: 'low',
            message: [
                'ALERT for Jane Doe',
                'HEART_RATE breached LOW threshold. Value: 45',
                'Last known location: https://maps.google.com/?q=40.7,-74',
            ].join('\n'),
        });
        expect(outcome.notifications.map((n) => [n.recipient, n.status])).toEqual([
            ['+15550100', 'sent'],
            ['+15550101', 'sent'],
        ]);
        expect(outcome.emergency).toMatchObject({
            emergencyType: 'threshold_breach:heart_rate',
            deviceId: 'device-1',
            severity: 'LOW',
        });

        expect(await store.getReading('reading-1')).toBeDefined();
        expect(await store.listAlerts('user-1')).toHaveLength(1);
        expect(await store.listEmergencies('user-1')).toHaveLength(1);
        expect(metrics.getCounters()).toMatchObject({ readings_processed: 1, alerts_created: 1 });
    });

    it('should do nothing for an in-range oxygen saturation', async () => {
        const report = await pipeline.submitReading({ deviceId: 'device-1', vitals: { oxygen_saturation: 96 } });

        expect(report.outcomes).toEqual([{ vitalKind: 'oxygen_saturation', value: 96, state: 'no_breach' }]);
        expect(await store.listAlerts('user-1')).toEqual([]);
        expect(sms.calls).toHaveLength(0);
        expect(await store.getReading(report.reading.id)).toBeDefined();
    });

    it('should skip vitals without any threshold', async () => {
        const report = await pipeline.submitReading({ deviceId: 'device-1', vitals: { respiratory_rate: 40 } });

        expect(report.outcomes).toEqual([{ vitalKind: 'respiratory_rate', value: 40, state: 'not_configured' }]);
    });

    it('should use the user band ahead of the default', async () => {
        await store.saveBand(makeBand('heart_rate', 40, 90, 'user-1'));

        const report = await pipeline.submitReading({ deviceId: 'device-1', vitals: { heart_rate: 95 } });

        expect(report.outcomes[0]).toMatchObject({ state: 'breach', alert: { severity: 'high' } });
    });

    it('should not alert twice when a reading is redelivered', async () => {
        const input = { id: 'reading-1', deviceId: 'device-1', vitals: { heart_rate: 130 } };

        const first = await pipeline.submitReading(input);
        const second = await pipeline.submitReading(input);

        const [initial] = first.outcomes;
        expect(initial.state).toBe('breach');
        expect(second.outcomes).toEqual([
            {
                vitalKind: 'heart_rate',
                value: 130,
                state: 'already_alerted',
                alertId: initial.state === 'breach' ? initial.alert.id : '',
            },
        ]);
        expect(await store.listAlerts('user-1')).toHaveLength(1);
        expect(sms.calls).toHaveLength(2);
    });

    it('should evaluate each vital independently', async () => {
        const resolve = resolver.resolve.bind(resolver);
        vi.spyOn(resolver, 'resolve').mockImplementation(async (userId, vitalKind) => {
            if (vitalKind === 'oxygen_saturation') {
                throw new Error('threshold lookup failed');
            }
            return resolve(userId, vitalKind);
        });

        const report = await pipeline.submitReading({
            deviceId: 'device-1',
            vitals: { heart_rate: 45, oxygen_saturation: 80 },
        });

        expect(report.outcomes.map((o) => [o.vitalKind, o.state])).toEqual([
            ['heart_rate', 'breach'],
            ['oxygen_saturation', 'failed'],
        ]);
        expect(report.outcomes[1]).toMatchObject({ error: 'threshold lookup failed' });
        expect(metrics.getCounters().vital_evaluation_failed).toBe(1);
    });

    it('should fail a non-numeric vital on its own', async () => {
        const report = await pipeline.submitReading({
            deviceId: 'device-1',
            vitals: { heart_rate: Number.NaN, oxygen_saturation: 96 },
        });

        expect(report.outcomes.map((o) => o.state)).toEqual(['failed', 'no_breach']);
    });

    it('should keep the alert when every notification fails', async () => {
        sms.rejected.add('+15550100');
        sms.rejected.add('+15550101');

        const report = await pipeline.submitReading({ deviceId: 'device-1', vitals: { heart_rate: 45 } });

        const [outcome] = report.outcomes;
        expect(outcome.state).toBe('breach');
        if (outcome.state === 'breach') {
            expect(outcome.notifications.map((n) => n.status)).toEqual(['failed', 'failed']);
            expect(outcome.emergency).not.toBeNull();
        }
    });

    it('should reject an unknown device', async () => {
        await expect(pipeline.submitReading({ deviceId: 'device-x', vitals: { heart_rate: 45 } })).rejects.toBeInstanceOf(
            NotFoundError,
        );
    });

    it('should reject a device that belongs to another user', async () => {
        await store.saveUser(makeUser({ id: 'user-2', email: 'other@example.com' }));
        await store.saveDevice(makeDevice({ id: 'device-2', userId: 'user-2' }));

        await expect(
            pipeline.submitReading({ userId: 'user-1', deviceId: 'device-2', vitals: { heart_rate: 45 } }),
        ).rejects.toBeInstanceOf(ValidationError);
        expect(await store.listAlerts('user-1')).toEqual([]);
    });

    it('should resolve an alert', async () => {
        const report = await pipeline.submitReading({ deviceId: 'device-1', vitals: { heart_rate: 45 } });
        const [outcome] = report.outcomes;
        if (outcome.state !== 'breach') {
            throw new Error('expected a breach');
        }

        const resolved = await pipeline.resolveAlert(outcome.alert.id);

        expect(resolved.resolved).toBe(true);
        expect((await store.getAlert(outcome.alert.id))?.resolved).toBe(true);
        await expect(pipeline.resolveAlert('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
});
