import { describe, it, expect, beforeEach } from 'vitest';
import { AlertFactory } from '../../../src/alerts/factory.js';
import { NotFoundError, ValidationError } from '../../../src/domain/errors.js';
import type { Alert } from '../../../src/domain/types.js';
import { EmergencyEscalator } from '../../../src/emergency/escalator.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { InMemoryHealthStore } from '../../../src/storage/memory-store.js';
import { START, makeDevice, makeUser, seededStore } from '../../helpers/fixtures.js';

describe('EmergencyEscalator', () => {
    let store: InMemoryHealthStore;
    let metrics: Metrics;
    let escalator: EmergencyEscalator;
    let alert: Alert;

    beforeEach(async () => {
        store = await seededStore();
        metrics = new Metrics();
        escalator = new EmergencyEscalator(store, metrics, () => START);
        alert = new AlertFactory(() => START).build({
            user: { id: 'user-1', name: 'Jane Doe' },
            readingId: 'reading-1',
            vitalKind: 'heart_rate',
            value: 45,
            severity: 'low',
        });
    });

    it('should open an emergency for a threshold breach', async () => {
        const emergency = await escalator.escalate({ user: makeUser(), alert, deviceId: 'device-1' });

        expect(emergency).toMatchObject({
            userId: 'user-1',
            alertId: alert.id,
            deviceId: 'device-1',
            emergencyType: 'threshold_breach:heart_rate',
            severity: 'LOW',
            description: 'Auto-created emergency for heart_rate threshold breach (value: 45)',
            resolved: false,
            createdAt: '2024-03-01T08:00:00.000Z',
        });
        expect(await store.getEmergency(emergency.id)).toEqual(emergency);
        expect(metrics.getCounters().emergencies_created).toBe(1);
    });

    it('should reject an alert owned by someone else', async () => {
        await expect(escalator.escalate({ user: makeUser({ id: 'user-2' }), alert })).rejects.toBeInstanceOf(
            ValidationError,
        );
    });

    it('should reject a device owned by someone else', async () => {
        await store.saveDevice(makeDevice({ id: 'device-9', userId: 'user-2' }));

        await expect(escalator.escalate({ user: makeUser(), alert, deviceId: 'device-9' })).rejects.toThrow(
            'Device device-9 does not belong to user user-1',
        );
        expect(metrics.getCounters().emergencies_created).toBe(0);
    });

    it('should resolve an emergency once', async () => {
        const emergency = await escalator.escalate({ user: makeUser(), alert });

        expect((await escalator.resolve(emergency.id)).resolved).toBe(true);
        expect((await escalator.resolve(emergency.id)).resolved).toBe(true);
        await expect(escalator.resolve('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
});
