import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryHealthStore } from '../../../src/storage/memory-store.js';
import { ThresholdResolver } from '../../../src/thresholds/resolver.js';
import { makeBand } from '../../helpers/fixtures.js';

describe('ThresholdResolver', () => {
    let store: InMemoryHealthStore;
    let resolver: ThresholdResolver;

    beforeEach(() => {
        store = new InMemoryHealthStore();
        resolver = new ThresholdResolver(store);
    });

    it('should prefer the user band over the system default', async () => {
        await store.saveBand(makeBand('heart_rate', 60, 100));
        await store.saveBand(makeBand('heart_rate', 40, 90, 'user-1'));

        const resolution = await resolver.resolve('user-1', 'heart_rate');

        expect(resolution).toMatchObject({ configured: true, source: 'user', band: { low: 40, high: 90 } });
    });

    it('should fall back to the system default', async () => {
        await store.saveBand(makeBand('heart_rate', 60, 100));
        await store.saveBand(makeBand('temperature', 35, 38, 'user-1'));

        const resolution = await resolver.resolve('user-1', 'heart_rate');

        expect(resolution).toMatchObject({ configured: true, source: 'default', band: { low: 60, high: 100 } });
    });

    it('should report not configured when no band exists', async () => {
        expect(await resolver.resolve('user-1', 'respiratory_rate')).toEqual({ configured: false });
    });

    it('should report not configured for a user band without bounds', async () => {
        await store.saveBand(makeBand('heart_rate', 60, 100));
        await store.saveBand(makeBand('heart_rate', null, null, 'user-1'));

        expect(await resolver.resolve('user-1', 'heart_rate')).toEqual({ configured: false });
    });

    it('should not create any rows', async () => {
        await resolver.resolve('user-1', 'heart_rate');
        expect(await store.listUserBands('user-1')).toEqual([]);
        expect(await store.listDefaultBands()).toEqual([]);
    });
});
