import { DeliveryError } from '../../src/domain/errors.js';
import type { Device, EmergencyContact, ThresholdBand, User, VitalKind } from '../../src/domain/types.js';
import type { MailSender, PushResult, PushSender, SmsSender } from '../../src/notifications/senders.js';
import { InMemoryHealthStore } from '../../src/storage/memory-store.js';

export const START = new Date('2024-03-01T08:00:00.000Z');

export interface TestClock {
    now: () => Date;
    advance(ms: number): void;
}

export function testClock(start: Date = START): TestClock {
    let current = start.getTime();
    return {
        now: () => new Date(current),
        advance: (ms: number) => {
            current += ms;
        },
    };
}

export function makeUser(overrides: Partial<User> = {}): User {
    return {
        id: 'user-1',
        name: 'Jane Doe',
        email: 'jane@example.com',
        emailVerified: false,
        ...overrides,
    };
}

export function makeDevice(overrides: Partial<Device> = {}): Device {
    return { id: 'device-1', userId: 'user-1', pushToken: 'push-token-1', ...overrides };
}

export function makeContact(overrides: Partial<EmergencyContact> = {}): EmergencyContact {
    return {
        id: 'contact-1',
        userId: 'user-1',
        name: 'Sam Doe',
        phoneNumber: '+15550100',
        email: 'sam@example.com',
        ...overrides,
    };
}

export function makeBand(vitalKind: VitalKind, low: number | null, high: number | null, userId: string | null = null): ThresholdBand {
    return {
        id: `band-${userId ?? 'default'}-${vitalKind}`,
        userId,
        vitalKind,
        low,
        high,
        category: 'default',
    };
}

/**
 * One user with one device and two emergency contacts.
 */
export async function seededStore(): Promise<InMemoryHealthStore> {
    const store = new InMemoryHealthStore();
    await store.saveUser(makeUser());
    await store.saveDevice(makeDevice());
    await store.saveContact(makeContact());
    await store.saveContact(
        makeContact({ id: 'contact-2', name: 'Alex Doe', phoneNumber: '+15550101', email: null }),
    );
    return store;
}

export class FakePushSender implements PushSender {
    calls: Array<{ tokens: string[]; title: string; body: string }> = [];
    result: PushResult = { successCount: 1, failureCount: 0 };

    async send(tokens: string[], title: string, body: string): Promise<PushResult> {
        this.calls.push({ tokens, title, body });
        return this.result;
    }
}

export class FakeSmsSender implements SmsSender {
    calls: Array<{ message: string; destination: string }> = [];
    rejected = new Set<string>();
    hang = new Set<string>();
    onSend?: (destination: string) => Promise<void>;

    async send(message: string, destination: string): Promise<unknown> {
        this.calls.push({ message, destination });
        if (this.onSend) {
            await this.onSend(destination);
        }
        if (this.hang.has(destination)) {
            return new Promise<never>(() => undefined);
        }
        if (this.rejected.has(destination)) {
            throw new DeliveryError(`Number ${destination} rejected`, 'rejected');
        }
        return { messageId: `sms-${this.calls.length}` };
    }
}

export class FakeMailSender implements MailSender {
    calls: Array<{ to: string; subject: string; body: string }> = [];
    accept = true;
    failure?: Error;

    async send(to: string, subject: string, body: string): Promise<boolean> {
        this.calls.push({ to, subject, body });
        if (this.failure) {
            throw this.failure;
        }
        return this.accept;
    }
}
