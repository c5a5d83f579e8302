import type { VitalKind, VitalValues } from '../domain/types.js';

/**
 * Wire shapes of the messages the service accepts. Each interface mirrors the
 * JSON schema of the same name under `contracts/`.
 */

const SCHEMA_BASE = 'https://vital-alerts.example.com/schemas';

export const SCHEMA_IDS = {
    vitalsRecorded: `${SCHEMA_BASE}/events/vitals-recorded.json`,
    sosTrigger: `${SCHEMA_BASE}/commands/sos-trigger.json`,
    otpRequest: `${SCHEMA_BASE}/commands/otp-request.json`,
    otpVerify: `${SCHEMA_BASE}/commands/otp-verify.json`,
    otpResend: `${SCHEMA_BASE}/commands/otp-resend.json`,
    thresholdsSimulate: `${SCHEMA_BASE}/commands/thresholds-simulate.json`,
    thresholdsCustomSet: `${SCHEMA_BASE}/commands/thresholds-custom-set.json`,
    thresholdsCustomClear: `${SCHEMA_BASE}/commands/thresholds-custom-clear.json`,
    alertResolve: `${SCHEMA_BASE}/commands/alert-resolve.json`,
    emergencyResolve: `${SCHEMA_BASE}/commands/emergency-resolve.json`,
    directorySeed: `${SCHEMA_BASE}/config/directory-seed.json`,
} as const;

export interface VitalsRecordedPayload {
    user_id?: string | null;
    device_id: string;
    heart_rate?: number;
    oxygen_saturation?: number;
    temperature?: number;
    respiratory_rate?: number;
    blood_pressure_systolic?: number;
    blood_pressure_diastolic?: number;
    latitude?: number | null;
    longitude?: number | null;
    location_accuracy?: number | null;
    timestamp?: string;
}

export interface VitalsRecordedEvent {
    event_name: 'vitals.recorded';
    event_id: string;
    timestamp: string;
    payload: VitalsRecordedPayload;
}

export interface SosTriggerCommand {
    user_id: string;
    device_id?: string | null;
    severity?: string;
    latitude?: number | null;
    longitude?: number | null;
}

export interface OtpRequestCommand {
    user_id: string;
    ip_address?: string | null;
    user_agent?: string | null;
}

export interface OtpVerifyCommand {
    user_id: string;
    code: string;
}

export interface OtpResendCommand {
    email: string;
    ip_address?: string | null;
    user_agent?: string | null;
}

export interface ThresholdsSimulateCommand {
    user_id: string;
    vitals: VitalValues;
}

export interface ThresholdsCustomSetCommand {
    user_id: string;
    thresholds: Partial<Record<VitalKind, { low?: number | null; high?: number | null }>>;
}

export interface ThresholdsCustomClearCommand {
    user_id: string;
    category?: string;
}

export interface AlertResolveCommand {
    alert_id: string;
}

export interface EmergencyResolveCommand {
    emergency_id: string;
}

export interface SeedUser {
    id: string;
    name?: string | null;
    email: string;
    email_verified?: boolean;
    age?: number;
    activity_level?: string | null;
    chronic_condition?: string | boolean | null;
}

export interface SeedDevice {
    id: string;
    user_id: string;
    push_token?: string | null;
}

export interface SeedContact {
    id: string;
    user_id: string;
    name: string;
    phone_number: string;
    email?: string | null;
}

export interface DirectorySeed {
    users?: SeedUser[];
    devices?: SeedDevice[];
    contacts?: SeedContact[];
}
