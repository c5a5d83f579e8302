import { v4 as uuidv4 } from 'uuid';
import type { Alert, AlertSubject, GeoPoint, Severity, User } from '../domain/types.js';
import { formatAlertMessage } from './format.js';

export interface BuildAlertParams {
    user: Pick<User, 'id' | 'name'>;
    readingId: string | null;
    vitalKind: AlertSubject;
    value: number;
    severity: Severity;
    geolocation?: GeoPoint;
    /** Overrides the rendered message (SOS uses its own wording). */
    message?: string;
}

export class AlertFactory {
    constructor(private now: () => Date = () => new Date()) { }

    build(params: BuildAlertParams): Alert {
        const latitude = params.geolocation?.latitude ?? null;
        const longitude = params.geolocation?.longitude ?? null;

        const message =
            params.message ??
            formatAlertMessage({
                userName: params.user.name,
                vitalKind: params.vitalKind,
                value: params.value,
                severity: params.severity,
                latitude,
                longitude,
            });

        return Object.freeze({
            id: uuidv4(),
            userId: params.user.id,
            readingId: params.readingId,
            vitalKind: params.vitalKind,
            value: params.value,
            severity: params.severity,
            message,
            latitude,
            longitude,
            createdAt: this.now().toISOString(),
            resolved: false,
        });
    }
}
