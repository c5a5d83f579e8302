import { coerceSeverity } from '../domain/enums.js';
import type { GeoPoint, NotificationChannel } from '../domain/types.js';

export const UNKNOWN_USER = 'Unknown User';

export interface AlertMessageInput extends GeoPoint {
    userName?: string | null;
    /** Absent for ad-hoc notification messages. */
    vitalKind?: string | null;
    value?: number | null;
    /** Raw severity; anything unrecognised renders as LOW. */
    severity?: string | null;
    alertId?: string | null;
    channel?: NotificationChannel | null;
}

export interface SosMessageInput extends GeoPoint {
    userName?: string | null;
    triggeredAt: Date;
}

function isSet(coordinate: number | null | undefined): coordinate is number {
    return coordinate !== undefined && coordinate !== null && coordinate !== 0;
}

export function mapLink(point: GeoPoint): string | null {
    if (!isSet(point.latitude) || !isSet(point.longitude)) {
        return null;
    }
    return `https://maps.google.com/?q=${point.latitude},${point.longitude}`;
}

export function roundValue(value: number): number {
    return Math.round(value * 10) / 10;
}

/**
 * Render the human-readable alert text used for alerts and for the
 * notifications derived from them.
 */
export function formatAlertMessage(input: AlertMessageInput): string {
    if (input.vitalKind) {
        const name = input.userName?.trim() || UNKNOWN_USER;
        const severity = coerceSeverity(input.severity).toUpperCase();
        const value = input.value === undefined || input.value === null ? 'n/a' : roundValue(input.value);

        const lines = [
            `ALERT for ${name}`,
            `${input.vitalKind.toUpperCase()} breached ${severity} threshold. Value: ${value}`,
        ];
        const link = mapLink(input);
        if (link) {
            lines.push(`Last known location: ${link}`);
        }
        return lines.join('\n');
    }

    if (input.alertId && input.channel) {
        return `ALERT NOTIFICATION: Event ${input.alertId} triggered via ${input.channel.toUpperCase()}.`;
    }

    return 'ALERT: Threshold breached.';
}

function formatUtc(date: Date): string {
    // 2024-01-01T12:00:00.000Z -> 2024-01-01 12:00:00
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatSosMessage(input: SosMessageInput): string {
    const name = input.userName?.trim() || UNKNOWN_USER;
    const lines = [`SOS Alert from ${name}!`, `Emergency triggered at ${formatUtc(input.triggeredAt)} UTC`];
    const link = mapLink(input);
    if (link) {
        lines.push(`Location: ${link}`);
    }
    return lines.join('\n');
}
