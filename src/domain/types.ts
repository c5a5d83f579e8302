export const VITAL_KINDS = [
    'heart_rate',
    'oxygen_saturation',
    'temperature',
    'respiratory_rate',
    'blood_pressure_systolic',
    'blood_pressure_diastolic',
] as const;

export type VitalKind = (typeof VITAL_KINDS)[number];

/** Alerts raised manually through SOS carry this pseudo vital kind. */
export type AlertSubject = VitalKind | 'sos';

export const SEVERITIES = ['low', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const THRESHOLD_CATEGORIES = [
    'default',
    'blood_pressure',
    'customizable',
    'elderly_60s',
    'elderly_70s',
    'elderly_80s',
    'athlete_young',
    'athlete_adult',
    'athlete_senior',
    'chronic_young',
    'chronic_adult',
    'chronic_senior',
] as const;

export type ThresholdCategory = (typeof THRESHOLD_CATEGORIES)[number];

export const NOTIFICATION_CHANNELS = ['push', 'sms', 'email'] as const;

export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number];

export type NotificationStatus = 'pending' | 'sent' | 'failed';

export type FailureReason = 'timeout' | 'rejected' | 'transport_error';

export type VitalValues = Partial<Record<VitalKind, number>>;

export interface GeoPoint {
    latitude?: number | null;
    longitude?: number | null;
}

export interface User {
    id: string;
    name?: string | null;
    email: string;
    emailVerified: boolean;
}

export interface Device {
    id: string;
    userId: string;
    pushToken?: string | null;
}

export interface EmergencyContact {
    id: string;
    userId: string;
    name: string;
    phoneNumber: string;
    email?: string | null;
}

export interface ThresholdBand {
    id: string;
    /** null for system-wide default rows */
    userId: string | null;
    vitalKind: VitalKind;
    low?: number | null;
    high?: number | null;
    category: ThresholdCategory;
}

export interface Reading extends GeoPoint {
    readonly id: string;
    readonly userId: string;
    readonly deviceId: string;
    readonly vitals: Readonly<VitalValues>;
    readonly locationAccuracy?: number | null;
    readonly recordedAt: string;
}

export interface Alert extends GeoPoint {
    readonly id: string;
    readonly userId: string;
    readonly readingId: string | null;
    readonly vitalKind: AlertSubject;
    readonly value: number;
    readonly severity: Severity;
    readonly message: string;
    readonly createdAt: string;
    resolved: boolean;
}

export interface Notification {
    readonly id: string;
    readonly alertId: string;
    readonly channel: NotificationChannel;
    readonly recipient: string;
    readonly message: string;
    status: NotificationStatus;
    failureReason?: FailureReason;
    readonly createdAt: string;
    updatedAt: string;
}

export interface Emergency {
    readonly id: string;
    readonly userId: string;
    readonly alertId: string | null;
    readonly deviceId: string | null;
    readonly emergencyType: string;
    readonly severity: string;
    readonly description: string;
    resolved: boolean;
    readonly createdAt: string;
}

export interface OtpChallenge {
    readonly id: string;
    readonly userId: string;
    readonly purpose: string;
    readonly codeHash: string;
    readonly createdAt: string;
    expiresAt: string;
    used: boolean;
    attempts: number;
    readonly sentVia: string;
    readonly ipAddress?: string | null;
    readonly userAgent?: string | null;
}
