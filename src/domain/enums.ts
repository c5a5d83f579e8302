import { ValidationError } from './errors.js';
import {
    NOTIFICATION_CHANNELS,
    SEVERITIES,
    THRESHOLD_CATEGORIES,
    VITAL_KINDS,
    type NotificationChannel,
    type Severity,
    type ThresholdCategory,
    type VitalKind,
} from './types.js';

function matchMember<T extends string>(members: readonly T[], raw: unknown): T | undefined {
    if (typeof raw !== 'string') {
        return undefined;
    }
    // Values and member names differ only in case ("HEART_RATE" / "heart_rate")
    const normalized = raw.trim().toLowerCase();
    return members.find((member) => member === normalized);
}

function parseMember<T extends string>(members: readonly T[], raw: unknown, field: string): T {
    const member = matchMember(members, raw);
    if (member === undefined) {
        throw new ValidationError(
            `Invalid ${field}: ${JSON.stringify(raw)} (expected one of ${members.join(', ')})`,
            field,
        );
    }
    return member;
}

export function parseVitalKind(raw: unknown): VitalKind {
    return parseMember(VITAL_KINDS, raw, 'vital_kind');
}

export function parseSeverity(raw: unknown): Severity {
    return parseMember(SEVERITIES, raw, 'severity');
}

export function parseThresholdCategory(raw: unknown): ThresholdCategory {
    return parseMember(THRESHOLD_CATEGORIES, raw, 'threshold_category');
}

export function parseChannel(raw: unknown): NotificationChannel {
    return parseMember(NOTIFICATION_CHANNELS, raw, 'channel');
}

export function isVitalKind(raw: unknown): raw is VitalKind {
    return matchMember(VITAL_KINDS, raw) === raw;
}

/**
 * Lenient severity lookup for message rendering only. Anything unrecognised
 * renders as `low`; inbound data goes through {@link parseSeverity} instead.
 */
export function coerceSeverity(raw: unknown): Severity {
    return matchMember(SEVERITIES, raw) ?? 'low';
}
