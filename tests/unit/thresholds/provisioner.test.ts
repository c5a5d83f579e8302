import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '../../../src/domain/errors.js';
import { InMemoryHealthStore } from '../../../src/storage/memory-store.js';
import { evaluateBreach } from '../../../src/thresholds/evaluator.js';
import { parseThresholdDefaults } from '../../../src/thresholds/loader.js';
import { ThresholdProvisioner, determineCategory } from '../../../src/thresholds/provisioner.js';
import { ThresholdResolver } from '../../../src/thresholds/resolver.js';

const defaults = parseThresholdDefaults({
    default: {
        heart_rate: { low: 60, high: 100 },
        blood_pressure: { systolic: { low: 90, high: 140 } },
    },
    elderly_70s: {
        heart_rate: { low: 55, high: 100 },
        temperature: { low: 35.5, high: 37.8 },
    },
});

describe('determineCategory', () => {
    it('should place healthy seniors by decade', () => {
        expect(determineCategory({ age: 60 })).toBe('elderly_60s');
        expect(determineCategory({ age: 72 })).toBe('elderly_70s');
        expect(determineCategory({ age: 85, activityLevel: 'sedentary' })).toBe('elderly_80s');
    });

    it('should place athletes by age', () => {
        expect(determineCategory({ age: 25, activityLevel: 'athlete' })).toBe('athlete_young');
        expect(determineCategory({ age: 45, activityLevel: 'Athlete' })).toBe('athlete_adult');
        expect(determineCategory({ age: 65, activityLevel: 'athlete' })).toBe('athlete_senior');
    });

    it('should place chronic conditions by age', () => {
        expect(determineCategory({ age: 20, chronicCondition: 'asthma' })).toBe('chronic_young');
        expect(determineCategory({ age: 40, chronicCondition: true })).toBe('chronic_adult');
        expect(determineCategory({ age: 65, chronicCondition: 'diabetes' })).toBe('chronic_senior');
    });

    it('should default everyone else', () => {
        expect(determineCategory({ age: 40 })).toBe('default');
        expect(determineCategory({ age: 40, chronicCondition: '' })).toBe('default');
    });
});

describe('ThresholdProvisioner', () => {
    let store: InMemoryHealthStore;
    let provisioner: ThresholdProvisioner;

    beforeEach(() => {
        store = new InMemoryHealthStore();
        provisioner = new ThresholdProvisioner(store, defaults);
    });

    it('should provision the category thresholds for a user', async () => {
        await provisioner.provisionForUser('user-1', 'elderly_70s');

        const band = await store.findUserBand('user-1', 'heart_rate');
        expect(band).toMatchObject({ userId: 'user-1', low: 55, high: 100, category: 'elderly_70s' });
    });

    it('should fall back to default thresholds for a category without entries', async () => {
        const bands = await provisioner.provisionForUser('user-1', 'athlete_young');

        expect(bands).toHaveLength(2);
        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({ low: 60, high: 100, category: 'default' });
        expect(await store.findUserBand('user-1', 'blood_pressure_systolic')).toMatchObject({
            low: 90,
            high: 140,
            category: 'blood_pressure',
        });
    });

    it('should keep existing bounds the new defaults leave out', async () => {
        await provisioner.provisionForUser('user-1', 'default');

        await provisioner.refreshDefaults('user-1', { heart_rate: { low: 50, high: null } });

        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({ low: 50, high: 100 });
    });

    it('should never overwrite custom thresholds when refreshing', async () => {
        await provisioner.setCustomThresholds('user-1', { heart_rate: { low: 40, high: 120 } });

        await provisioner.provisionForUser('user-1', 'default');

        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({
            low: 40,
            high: 120,
            category: 'customizable',
        });
        expect(await store.listUserBands('user-1')).toHaveLength(2);
    });

    it('should reject a low bound above the high bound', async () => {
        await expect(
            provisioner.setCustomThresholds('user-1', {
                temperature: { low: 36, high: 38 },
                heart_rate: { low: 120, high: 40 },
            }),
        ).rejects.toBeInstanceOf(ValidationError);

        expect(await store.listUserBands('user-1')).toEqual([]);
    });

    it('should restore category defaults when custom thresholds are cleared', async () => {
        await provisioner.setCustomThresholds('user-1', { heart_rate: { low: 40, high: 120 } });

        await provisioner.clearCustomThresholds('user-1', 'elderly_70s');

        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({
            low: 55,
            high: 100,
            category: 'elderly_70s',
        });
    });

    it('should ignore custom entries without any bound', async () => {
        await provisioner.seedSystemDefaults();

        const saved = await provisioner.setCustomThresholds('user-1', {
            heart_rate: {},
            blood_pressure_systolic: { low: null, high: null },
        });

        expect(saved).toEqual([]);
        expect(await store.listUserBands('user-1')).toEqual([]);
        expect(await new ThresholdResolver(store).resolve('user-1', 'heart_rate')).toMatchObject({
            configured: true,
            band: { low: 60, high: 100 },
        });
    });

    it('should keep the bound a custom update leaves out', async () => {
        await provisioner.provisionForUser('user-1', 'default');

        const [band] = await provisioner.setCustomThresholds('user-1', { heart_rate: { high: 120 } });

        expect(band).toMatchObject({ low: 60, high: 120, category: 'customizable' });
        expect(evaluateBreach(band, 30)).toBe('low');
    });

    it('should check the merged bounds against each other', async () => {
        await provisioner.provisionForUser('user-1', 'default');

        await expect(provisioner.setCustomThresholds('user-1', { heart_rate: { low: 110 } })).rejects.toBeInstanceOf(
            ValidationError,
        );
        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({ low: 60, high: 100, category: 'default' });
    });

    it('should keep demographic rows when clearing without a category', async () => {
        await provisioner.provisionForUser('user-1', 'elderly_70s');
        await provisioner.setCustomThresholds('user-1', { blood_pressure_systolic: { low: 100, high: 150 } });

        await provisioner.clearCustomThresholds('user-1');

        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({
            low: 55,
            high: 100,
            category: 'elderly_70s',
        });
        expect(await store.findUserBand('user-1', 'temperature')).toMatchObject({ low: 35.5, high: 37.8 });
        expect(await store.findUserBand('user-1', 'blood_pressure_systolic')).toBeUndefined();
    });

    it('should refill a cleared vital from the category on the remaining rows', async () => {
        await provisioner.provisionForUser('user-1', 'elderly_70s');
        await provisioner.setCustomThresholds('user-1', { heart_rate: { low: 40, high: 130 } });

        const bands = await provisioner.clearCustomThresholds('user-1');

        expect(bands).toHaveLength(2);
        expect(await store.findUserBand('user-1', 'heart_rate')).toMatchObject({
            low: 55,
            high: 100,
            category: 'elderly_70s',
        });
    });

    it('should leave a user without provisioned rows on the system defaults', async () => {
        await provisioner.seedSystemDefaults();
        await provisioner.setCustomThresholds('user-1', { heart_rate: { low: 40, high: 130 } });

        expect(await provisioner.clearCustomThresholds('user-1')).toEqual([]);
        expect(await store.listUserBands('user-1')).toEqual([]);
        expect(await new ThresholdResolver(store).resolve('user-1', 'heart_rate')).toMatchObject({
            configured: true,
            source: 'default',
        });
    });

    it('should seed system defaults once per vital', async () => {
        await provisioner.seedSystemDefaults();
        await provisioner.seedSystemDefaults();

        const rows = await store.listDefaultBands();
        expect(rows).toHaveLength(2);
        expect(rows.every((row) => row.userId === null)).toBe(true);
        expect(await store.findDefaultBand('heart_rate')).toMatchObject({ low: 60, high: 100 });
    });
});
