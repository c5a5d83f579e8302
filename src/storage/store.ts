import type {
    Alert,
    Device,
    Emergency,
    EmergencyContact,
    Notification,
    OtpChallenge,
    Reading,
    ThresholdBand,
    User,
    VitalKind,
} from '../domain/types.js';

/**
 * Users, devices and contacts are managed elsewhere; the core only reads them
 * (and flips the verified flag once an OTP succeeds).
 */
export interface DirectoryStore {
    getUser(userId: string): Promise<User | undefined>;
    findUserByEmail(email: string): Promise<User | undefined>;
    saveUser(user: User): Promise<User>;
    markUserVerified(userId: string): Promise<boolean>;
    getDevice(deviceId: string): Promise<Device | undefined>;
    saveDevice(device: Device): Promise<Device>;
    listDevices(userId: string): Promise<Device[]>;
    saveContact(contact: EmergencyContact): Promise<EmergencyContact>;
    listContacts(userId: string): Promise<EmergencyContact[]>;
}

export interface ThresholdStore {
    findUserBand(userId: string, vitalKind: VitalKind): Promise<ThresholdBand | undefined>;
    findDefaultBand(vitalKind: VitalKind): Promise<ThresholdBand | undefined>;
    listUserBands(userId: string): Promise<ThresholdBand[]>;
    listDefaultBands(): Promise<ThresholdBand[]>;
    /** Insert or replace by id. */
    saveBand(band: ThresholdBand): Promise<ThresholdBand>;
    deleteBand(bandId: string): Promise<boolean>;
}

export interface ReadingStore {
    getReading(readingId: string): Promise<Reading | undefined>;
    saveReading(reading: Reading): Promise<Reading>;
    /** Removes the reading, its alerts and their notifications. */
    deleteReading(readingId: string): Promise<boolean>;
}

export interface AlertStore {
    getAlert(alertId: string): Promise<Alert | undefined>;
    findAlertForReading(readingId: string, vitalKind: VitalKind): Promise<Alert | undefined>;
    listAlerts(userId: string): Promise<Alert[]>;
    saveAlert(alert: Alert): Promise<Alert>;
    updateAlert(alert: Alert): Promise<Alert>;
}

export interface NotificationStore {
    saveNotification(notification: Notification): Promise<Notification>;
    updateNotification(notification: Notification): Promise<Notification>;
    listNotifications(alertId: string): Promise<Notification[]>;
}

export interface EmergencyStore {
    getEmergency(emergencyId: string): Promise<Emergency | undefined>;
    listEmergencies(userId: string): Promise<Emergency[]>;
    saveEmergency(emergency: Emergency): Promise<Emergency>;
    updateEmergency(emergency: Emergency): Promise<Emergency>;
}

export interface OtpStore {
    /**
     * Atomically invalidates every unused challenge for the challenge's
     * (user, purpose) and inserts the new one. Returns how many were invalidated.
     */
    replaceActiveChallenge(challenge: OtpChallenge, now: Date): Promise<number>;
    findLatestValidChallenge(userId: string, purpose: string, now: Date): Promise<OtpChallenge | undefined>;
    findLatestChallenge(userId: string, purpose: string): Promise<OtpChallenge | undefined>;
    updateChallenge(challenge: OtpChallenge): Promise<OtpChallenge>;
}

export interface HealthStore
    extends DirectoryStore,
        ThresholdStore,
        ReadingStore,
        AlertStore,
        NotificationStore,
        EmergencyStore,
        OtpStore {
    /** Removes the user and everything it owns. */
    deleteUser(userId: string): Promise<boolean>;
}
