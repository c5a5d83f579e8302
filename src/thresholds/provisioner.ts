import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import { ValidationError } from '../domain/errors.js';
import { VITAL_KINDS, type ThresholdBand, type ThresholdCategory, type VitalKind } from '../domain/types.js';
import type { ThresholdStore } from '../storage/store.js';
import type { BoundsEntry, CategoryThresholds, ThresholdDefaults } from './loader.js';

export interface DemographicProfile {
    age: number;
    chronicCondition?: boolean | string | null;
    activityLevel?: string | null;
}

/**
 * Map age, activity level and chronic condition onto a threshold category.
 * Elderly applies only to non-athletes without a chronic condition.
 */
export function determineCategory(profile: DemographicProfile): ThresholdCategory {
    const { age } = profile;
    const chronic = Boolean(profile.chronicCondition);
    const athlete = (profile.activityLevel ?? '').toLowerCase() === 'athlete';

    if (age >= 60 && !chronic && !athlete) {
        if (age < 70) return 'elderly_60s';
        if (age < 80) return 'elderly_70s';
        return 'elderly_80s';
    }

    if (athlete) {
        if (age < 30) return 'athlete_young';
        if (age < 60) return 'athlete_adult';
        return 'athlete_senior';
    }

    if (chronic) {
        if (age < 30) return 'chronic_young';
        if (age < 60) return 'chronic_adult';
        return 'chronic_senior';
    }

    return 'default';
}

function categoryForRow(vitalKind: VitalKind, category: ThresholdCategory): ThresholdCategory {
    return vitalKind.startsWith('blood_pressure') ? 'blood_pressure' : category;
}

function entries(thresholds: CategoryThresholds): Array<[VitalKind, BoundsEntry]> {
    const result: Array<[VitalKind, BoundsEntry]> = [];
    for (const vital of VITAL_KINDS) {
        const bounds = thresholds[vital];
        if (bounds) result.push([vital, bounds]);
    }
    return result;
}

export class ThresholdProvisioner {
    constructor(
        private store: ThresholdStore,
        private defaults: ThresholdDefaults,
    ) { }

    /** Thresholds for a category, falling back to `default` when it has none. */
    thresholdsFor(category: ThresholdCategory): CategoryThresholds {
        return this.defaults[category] ?? this.defaults.default;
    }

    async provisionForUser(userId: string, category: ThresholdCategory): Promise<ThresholdBand[]> {
        const key = this.defaults[category] ? category : 'default';
        const bands = await this.refreshDefaults(userId, this.thresholdsFor(key), key);
        logger.info({ userId, category: key, count: bands.length }, 'Provisioned threshold profiles');
        return bands;
    }

    /**
     * Overwrite the user's provisioned rows with new defaults and create any
     * missing ones. Rows tagged `customizable` are left untouched.
     */
    async refreshDefaults(
        userId: string,
        thresholds: CategoryThresholds,
        category: ThresholdCategory = 'default',
    ): Promise<ThresholdBand[]> {
        const existing = new Map(
            (await this.store.listUserBands(userId)).map((band): [VitalKind, ThresholdBand] => [band.vitalKind, band]),
        );

        for (const [vitalKind, bounds] of entries(thresholds)) {
            const current = existing.get(vitalKind);

            if (current?.category === 'customizable') {
                continue;
            }

            if (current) {
                const updated: ThresholdBand = {
                    ...current,
                    low: bounds.low ?? current.low,
                    high: bounds.high ?? current.high,
                    category: categoryForRow(vitalKind, category),
                };
                existing.set(vitalKind, await this.store.saveBand(updated));
            } else {
                const created = await this.store.saveBand({
                    id: uuidv4(),
                    userId,
                    vitalKind,
                    low: bounds.low ?? null,
                    high: bounds.high ?? null,
                    category: categoryForRow(vitalKind, category),
                });
                existing.set(vitalKind, created);
            }
        }

        return [...existing.values()];
    }

    /**
     * Save per-user overrides. An entry without either bound is ignored; a bound
     * left out keeps the value already on the user's row.
     */
    async setCustomThresholds(userId: string, thresholds: CategoryThresholds): Promise<ThresholdBand[]> {
        const pairs = entries(thresholds).filter(([, bounds]) => bounds.low != null || bounds.high != null);
        const current = new Map<VitalKind, ThresholdBand>();
        for (const [vitalKind] of pairs) {
            const band = await this.store.findUserBand(userId, vitalKind);
            if (band) current.set(vitalKind, band);
        }

        const merged = pairs.map(([vitalKind, bounds]): [VitalKind, BoundsEntry] => [
            vitalKind,
            {
                low: bounds.low ?? current.get(vitalKind)?.low ?? null,
                high: bounds.high ?? current.get(vitalKind)?.high ?? null,
            },
        ]);
        for (const [vitalKind, bounds] of merged) {
            if (bounds.low != null && bounds.high != null && bounds.low > bounds.high) {
                throw new ValidationError(
                    `Low bound ${bounds.low} is above high bound ${bounds.high} for ${vitalKind}`,
                    vitalKind,
                );
            }
        }

        const saved: ThresholdBand[] = [];
        for (const [vitalKind, bounds] of merged) {
            saved.push(
                await this.store.saveBand({
                    id: current.get(vitalKind)?.id ?? uuidv4(),
                    userId,
                    vitalKind,
                    low: bounds.low ?? null,
                    high: bounds.high ?? null,
                    category: 'customizable',
                }),
            );
        }

        logger.info({ userId, vitals: merged.map(([vital]) => vital) }, 'Custom thresholds saved');
        return saved;
    }

    /**
     * Drop the user's custom rows. With a category every provisioned row is
     * rebuilt from it. Without one, the category on the user's remaining rows
     * refills only the vitals that were custom; a user left with no rows
     * resolves against the system defaults.
     */
    async clearCustomThresholds(userId: string, category?: ThresholdCategory): Promise<ThresholdBand[]> {
        const kept: ThresholdBand[] = [];
        for (const band of await this.store.listUserBands(userId)) {
            if (band.category === 'customizable') {
                await this.store.deleteBand(band.id);
            } else {
                kept.push(band);
            }
        }

        if (category) {
            return this.provisionForUser(userId, category);
        }

        if (kept.length === 0) {
            logger.info({ userId }, 'Custom thresholds cleared, no provisioned rows left');
            return [];
        }

        const inferred = kept.map((band) => band.category).find((c) => c !== 'blood_pressure') ?? 'default';
        const key = this.defaults[inferred] ? inferred : 'default';
        const present = new Set(kept.map((band) => band.vitalKind));
        const missing: CategoryThresholds = {};
        for (const [vitalKind, bounds] of entries(this.thresholdsFor(key))) {
            if (!present.has(vitalKind)) missing[vitalKind] = bounds;
        }

        const bands = await this.refreshDefaults(userId, missing, key);
        logger.info({ userId, category: key, restored: Object.keys(missing) }, 'Custom thresholds cleared');
        return bands;
    }

    /** Write the `default` category as system-wide rows (no owning user). */
    async seedSystemDefaults(): Promise<ThresholdBand[]> {
        const existing = new Map(
            (await this.store.listDefaultBands()).map((band): [VitalKind, ThresholdBand] => [band.vitalKind, band]),
        );
        const seeded: ThresholdBand[] = [];

        for (const [vitalKind, bounds] of entries(this.defaults.default)) {
            seeded.push(
                await this.store.saveBand({
                    id: existing.get(vitalKind)?.id ?? uuidv4(),
                    userId: null,
                    vitalKind,
                    low: bounds.low ?? null,
                    high: bounds.high ?? null,
                    category: categoryForRow(vitalKind, 'default'),
                }),
            );
        }

        logger.info({ count: seeded.length }, 'System default thresholds seeded');
        return seeded;
    }
}
