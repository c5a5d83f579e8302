import { existsSync, readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import type { DirectorySeed } from '../contracts/messages.js';
import { SchemaValidator } from '../contracts/schema-validator.js';
import { errorMessage } from '../domain/errors.js';
import { ThresholdProvisioner, determineCategory } from '../thresholds/provisioner.js';
import type { DirectoryStore } from './store.js';

export interface SeedSummary {
    users: number;
    devices: number;
    contacts: number;
    provisioned: number;
}

/**
 * Read the optional directory seed. A missing file is an empty directory; an
 * invalid one fails startup.
 */
export function loadDirectorySeed(path: string, validator: SchemaValidator): DirectorySeed {
    if (!existsSync(path)) {
        logger.info({ path }, 'No directory seed found, starting empty');
        return {};
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        logger.error({ path, error: errorMessage(err) }, 'Failed to read directory seed');
        throw new Error(`Failed to read directory seed from ${path}: ${errorMessage(err)}`);
    }

    const result = validator.validateDirectorySeed(raw);
    if (!result.valid) {
        throw new Error(`Invalid directory seed ${path}: ${result.errors}`);
    }
    return result.data;
}

/**
 * Users carrying an age get thresholds provisioned from their demographic
 * category; the rest fall back to system defaults at evaluation time.
 */
export async function applyDirectorySeed(
    store: Pick<DirectoryStore, 'saveUser' | 'getUser' | 'saveDevice' | 'saveContact'>,
    provisioner: ThresholdProvisioner,
    seed: DirectorySeed,
): Promise<SeedSummary> {
    const summary: SeedSummary = { users: 0, devices: 0, contacts: 0, provisioned: 0 };

    for (const user of seed.users ?? []) {
        await store.saveUser({
            id: user.id,
            name: user.name ?? null,
            email: user.email,
            emailVerified: user.email_verified ?? false,
        });
        summary.users++;

        if (user.age !== undefined) {
            const category = determineCategory({
                age: user.age,
                activityLevel: user.activity_level,
                chronicCondition: user.chronic_condition,
            });
            await provisioner.provisionForUser(user.id, category);
            summary.provisioned++;
        }
    }

    for (const device of seed.devices ?? []) {
        if (!(await store.getUser(device.user_id))) {
            logger.warn({ deviceId: device.id, userId: device.user_id }, 'Seed device owner unknown, skipped');
            continue;
        }
        await store.saveDevice({ id: device.id, userId: device.user_id, pushToken: device.push_token ?? null });
        summary.devices++;
    }

    for (const contact of seed.contacts ?? []) {
        if (!(await store.getUser(contact.user_id))) {
            logger.warn({ contactId: contact.id, userId: contact.user_id }, 'Seed contact owner unknown, skipped');
            continue;
        }
        await store.saveContact({
            id: contact.id,
            userId: contact.user_id,
            name: contact.name,
            phoneNumber: contact.phone_number,
            email: contact.email ?? null,
        });
        summary.contacts++;
    }

    logger.info({ ...summary }, 'Directory seed applied');
    return summary;
}
