import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import type { Alert, Emergency, User } from '../domain/types.js';
import { Metrics } from '../metrics/counter.js';
import type { DirectoryStore, EmergencyStore } from '../storage/store.js';

export interface EscalateParams {
    user: Pick<User, 'id' | 'name'>;
    alert: Alert;
    deviceId?: string | null;
    /** Defaults to `threshold_breach:<vital>`. */
    emergencyType?: string;
    description?: string;
}

type EscalatorStore = Pick<DirectoryStore, 'getDevice'> &
    Pick<EmergencyStore, 'saveEmergency' | 'getEmergency' | 'updateEmergency'>;

export class EmergencyEscalator {
    constructor(
        private store: EscalatorStore,
        private metrics: Metrics,
        private now: () => Date = () => new Date(),
    ) { }

    /**
     * Record the case for follow-up. Callers invoke this once per breach.
     */
    async escalate(params: EscalateParams): Promise<Emergency> {
        const { user, alert } = params;

        if (alert.userId !== user.id) {
            throw new ValidationError(`Alert ${alert.id} does not belong to user ${user.id}`, 'alert_id');
        }

        const deviceId = params.deviceId ?? null;
        if (deviceId !== null) {
            const device = await this.store.getDevice(deviceId);
            if (!device || device.userId !== user.id) {
                throw new ValidationError(`Device ${deviceId} does not belong to user ${user.id}`, 'device_id');
            }
        }

        const emergencyType =
            params.emergencyType ?? (alert.vitalKind === 'sos' ? 'sos_manual' : `threshold_breach:${alert.vitalKind}`);

        const description =
            params.description ??
            `Auto-created emergency for ${alert.vitalKind} threshold breach (value: ${alert.value})`;

        const emergency = await this.store.saveEmergency({
            id: uuidv4(),
            userId: user.id,
            alertId: alert.id,
            deviceId,
            emergencyType,
            severity: alert.severity.toUpperCase(),
            description,
            resolved: false,
            createdAt: this.now().toISOString(),
        });

        this.metrics.increment('emergencies_created');
        logger.info(
            { emergencyId: emergency.id, alertId: alert.id, userId: user.id, emergencyType },
            'Emergency created',
        );

        return emergency;
    }

    async resolve(emergencyId: string): Promise<Emergency> {
        const emergency = await this.store.getEmergency(emergencyId);
        if (!emergency) {
            throw new NotFoundError('Emergency', emergencyId);
        }
        if (emergency.resolved) {
            return emergency;
        }
        const resolved = await this.store.updateEmergency({ ...emergency, resolved: true });
        logger.info({ emergencyId }, 'Emergency resolved');
        return resolved;
    }
}
