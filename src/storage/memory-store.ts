import { NotFoundError } from '../domain/errors.js';
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
import type { HealthStore } from './store.js';

function byCreatedAtDesc<T extends { createdAt: string }>(a: T, b: T): number {
    return Date.parse(b.createdAt) - Date.parse(a.createdAt);
}

/**
 * Process-local store. Records are cloned on the way in and out so callers
 * only change stored state through the update methods.
 */
export class InMemoryHealthStore implements HealthStore {
    private users = new Map<string, User>();
    private devices = new Map<string, Device>();
    private contacts = new Map<string, EmergencyContact>();
    private bands = new Map<string, ThresholdBand>();
    private readings = new Map<string, Reading>();
    private alerts = new Map<string, Alert>();
    private notifications = new Map<string, Notification>();
    private emergencies = new Map<string, Emergency>();
    private challenges = new Map<string, OtpChallenge>();

    // Directory

    async getUser(userId: string): Promise<User | undefined> {
        return this.read(this.users.get(userId));
    }

    async findUserByEmail(email: string): Promise<User | undefined> {
        const needle = email.trim().toLowerCase();
        for (const user of this.users.values()) {
            if (user.email.toLowerCase() === needle) {
                return structuredClone(user);
            }
        }
        return undefined;
    }

    async saveUser(user: User): Promise<User> {
        return this.write(this.users, user);
    }

    async markUserVerified(userId: string): Promise<boolean> {
        const user = this.users.get(userId);
        if (!user) return false;
        user.emailVerified = true;
        return true;
    }

    async getDevice(deviceId: string): Promise<Device | undefined> {
        return this.read(this.devices.get(deviceId));
    }

    async saveDevice(device: Device): Promise<Device> {
        return this.write(this.devices, device);
    }

    async listDevices(userId: string): Promise<Device[]> {
        return this.filter(this.devices, (device) => device.userId === userId);
    }

    async saveContact(contact: EmergencyContact): Promise<EmergencyContact> {
        return this.write(this.contacts, contact);
    }

    async listContacts(userId: string): Promise<EmergencyContact[]> {
        return this.filter(this.contacts, (contact) => contact.userId === userId);
    }

    // Thresholds

    async findUserBand(userId: string, vitalKind: VitalKind): Promise<ThresholdBand | undefined> {
        return this.filter(this.bands, (b) => b.userId === userId && b.vitalKind === vitalKind)[0];
    }

    async findDefaultBand(vitalKind: VitalKind): Promise<ThresholdBand | undefined> {
        return this.filter(this.bands, (b) => b.userId === null && b.vitalKind === vitalKind)[0];
    }

    async listUserBands(userId: string): Promise<ThresholdBand[]> {
        return this.filter(this.bands, (b) => b.userId === userId);
    }

    async listDefaultBands(): Promise<ThresholdBand[]> {
        return this.filter(this.bands, (b) => b.userId === null);
    }

    async saveBand(band: ThresholdBand): Promise<ThresholdBand> {
        return this.write(this.bands, band);
    }

    async deleteBand(bandId: string): Promise<boolean> {
        return this.bands.delete(bandId);
    }

    // Readings

    async getReading(readingId: string): Promise<Reading | undefined> {
        return this.read(this.readings.get(readingId));
    }

    async saveReading(reading: Reading): Promise<Reading> {
        return this.write(this.readings, reading);
    }

    async deleteReading(readingId: string): Promise<boolean> {
        if (!this.readings.delete(readingId)) {
            return false;
        }
        for (const alert of [...this.alerts.values()]) {
            if (alert.readingId === readingId) {
                this.removeAlert(alert.id);
            }
        }
        return true;
    }

    // Alerts

    async getAlert(alertId: string): Promise<Alert | undefined> {
        return this.read(this.alerts.get(alertId));
    }

    async findAlertForReading(readingId: string, vitalKind: VitalKind): Promise<Alert | undefined> {
        return this.filter(this.alerts, (a) => a.readingId === readingId && a.vitalKind === vitalKind)[0];
    }

    async listAlerts(userId: string): Promise<Alert[]> {
        return this.filter(this.alerts, (a) => a.userId === userId).sort(byCreatedAtDesc);
    }

    async saveAlert(alert: Alert): Promise<Alert> {
        return this.write(this.alerts, alert);
    }

    async updateAlert(alert: Alert): Promise<Alert> {
        this.requireExisting(this.alerts, 'Alert', alert.id);
        return this.write(this.alerts, alert);
    }

    // Notifications

    async saveNotification(notification: Notification): Promise<Notification> {
        return this.write(this.notifications, notification);
    }

    async updateNotification(notification: Notification): Promise<Notification> {
        this.requireExisting(this.notifications, 'Notification', notification.id);
        return this.write(this.notifications, notification);
    }

    async listNotifications(alertId: string): Promise<Notification[]> {
        return this.filter(this.notifications, (n) => n.alertId === alertId);
    }

    // Emergencies

    async getEmergency(emergencyId: string): Promise<Emergency | undefined> {
        return this.read(this.emergencies.get(emergencyId));
    }

    async listEmergencies(userId: string): Promise<Emergency[]> {
        return this.filter(this.emergencies, (e) => e.userId === userId).sort(byCreatedAtDesc);
    }

    async saveEmergency(emergency: Emergency): Promise<Emergency> {
        return this.write(this.emergencies, emergency);
    }

    async updateEmergency(emergency: Emergency): Promise<Emergency> {
        this.requireExisting(this.emergencies, 'Emergency', emergency.id);
        return this.write(this.emergencies, emergency);
    }

    // OTP challenges

    async replaceActiveChallenge(challenge: OtpChallenge, now: Date): Promise<number> {
        // No await between the invalidation and the insert: concurrent readers
        // see either the old challenge or the new one, never both.
        let invalidated = 0;
        for (const existing of this.challenges.values()) {
            if (
                existing.userId === challenge.userId &&
                existing.purpose === challenge.purpose &&
                !existing.used
            ) {
                existing.used = true;
                existing.expiresAt = now.toISOString();
                invalidated++;
            }
        }
        this.challenges.set(challenge.id, structuredClone(challenge));
        return invalidated;
    }

    async findLatestValidChallenge(
        userId: string,
        purpose: string,
        now: Date,
    ): Promise<OtpChallenge | undefined> {
        return this.filter(
            this.challenges,
            (c) =>
                c.userId === userId &&
                c.purpose === purpose &&
                !c.used &&
                Date.parse(c.expiresAt) > now.getTime(),
        ).sort(byCreatedAtDesc)[0];
    }

    async findLatestChallenge(userId: string, purpose: string): Promise<OtpChallenge | undefined> {
        return this.filter(
            this.challenges,
            (c) => c.userId === userId && c.purpose === purpose,
        ).sort(byCreatedAtDesc)[0];
    }

    async updateChallenge(challenge: OtpChallenge): Promise<OtpChallenge> {
        this.requireExisting(this.challenges, 'OtpChallenge', challenge.id);
        return this.write(this.challenges, challenge);
    }

    // Cascade

    async deleteUser(userId: string): Promise<boolean> {
        if (!this.users.delete(userId)) {
            return false;
        }
        for (const alert of [...this.alerts.values()]) {
            if (alert.userId === userId) {
                this.removeAlert(alert.id);
            }
        }
        this.deleteWhere(this.readings, (r) => r.userId === userId);
        this.deleteWhere(this.emergencies, (e) => e.userId === userId);
        this.deleteWhere(this.bands, (b) => b.userId === userId);
        this.deleteWhere(this.challenges, (c) => c.userId === userId);
        this.deleteWhere(this.devices, (d) => d.userId === userId);
        this.deleteWhere(this.contacts, (c) => c.userId === userId);
        return true;
    }

    private removeAlert(alertId: string): void {
        this.alerts.delete(alertId);
        this.deleteWhere(this.notifications, (n) => n.alertId === alertId);
    }

    private read<T>(record: T | undefined): T | undefined {
        return record === undefined ? undefined : structuredClone(record);
    }

    private write<T extends { id: string }>(map: Map<string, T>, record: T): T {
        map.set(record.id, structuredClone(record));
        return structuredClone(record);
    }

    private filter<T>(map: Map<string, T>, predicate: (record: T) => boolean): T[] {
        const matches: T[] = [];
        for (const record of map.values()) {
            if (predicate(record)) {
                matches.push(structuredClone(record));
            }
        }
        return matches;
    }

    private deleteWhere<T>(map: Map<string, T>, predicate: (record: T) => boolean): void {
        for (const [id, record] of map.entries()) {
            if (predicate(record)) {
                map.delete(id);
            }
        }
    }

    private requireExisting<T>(map: Map<string, T>, entity: string, id: string): void {
        if (!map.has(id)) {
            throw new NotFoundError(entity, id);
        }
    }
}
