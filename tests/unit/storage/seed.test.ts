import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import { InMemoryHealthStore } from '../../../src/storage/memory-store.js';
import { applyDirectorySeed, loadDirectorySeed } from '../../../src/storage/seed.js';
import { loadThresholdDefaults } from '../../../src/thresholds/loader.js';
import { ThresholdProvisioner } from '../../../src/thresholds/provisioner.js';

describe('directory seed', () => {
    const validator = new SchemaValidator('./contracts');
    const dir = './test-seed';

    beforeAll(() => {
        validator.loadSchemas();
        mkdirSync(dir, { recursive: true });
        writeFileSync(join(dir, 'invalid.json'), JSON.stringify({ users: [{ id: 'user-1' }] }));
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should load the example seed', () => {
        const seed = loadDirectorySeed('./config/directory-seed.example.json', validator);

        expect(seed.users?.map((u) => u.id)).toEqual(['user-1']);
        expect(seed.devices).toHaveLength(1);
        expect(seed.contacts).toHaveLength(1);
    });

    it('should treat a missing file as an empty directory', () => {
        expect(loadDirectorySeed(join(dir, 'absent.json'), validator)).toEqual({});
    });

    it('should fail on a seed that breaks the schema', () => {
        expect(() => loadDirectorySeed(join(dir, 'invalid.json'), validator)).toThrow(
            "Invalid directory seed test-seed/invalid.json: data/users/0 must have required property 'email'",
        );
    });

    it('should store the directory and provision users with a profile', async () => {
        const store = new InMemoryHealthStore();
        const provisioner = new ThresholdProvisioner(store, loadThresholdDefaults('./config/threshold-defaults.json'));

        const summary = await applyDirectorySeed(store, provisioner, {
            users: [
                { id: 'user-1', name: 'Jane Doe', email: 'jane@example.com', age: 72 },
                { id: 'user-2', email: 'kim@example.com' },
            ],
            devices: [
                { id: 'device-1', user_id: 'user-1', push_token: 'push-token-1' },
                { id: 'device-2', user_id: 'user-9' },
            ],
            contacts: [{ id: 'contact-1', user_id: 'user-1', name: 'Sam Doe', phone_number: '+15550100' }],
        });

        expect(summary).toEqual({ users: 2, devices: 1, contacts: 1, provisioned: 1 });
        expect(await store.getUser('user-2')).toEqual({
            id: 'user-2',
            name: null,
            email: 'kim@example.com',
            emailVerified: false,
        });
        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({
            low: 55,
            high: 100,
            category: 'elderly_70s',
        });
        expect(await store.listUserBands('user-2')).toEqual([]);
        expect(await store.getDevice('device-2')).toBeUndefined();
        expect(await store.listContacts('user-1')).toEqual([
            { id: 'contact-1', userId: 'user-1', name: 'Sam Doe', phoneNumber: '+15550100', email: null },
        ]);
    });
});
