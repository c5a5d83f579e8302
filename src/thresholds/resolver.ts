import type { ThresholdBand, VitalKind } from '../domain/types.js';
import type { ThresholdStore } from '../storage/store.js';

export type Resolution =
    | { configured: true; band: ThresholdBand; source: 'user' | 'default' }
    | { configured: false };

function hasBounds(band: ThresholdBand): boolean {
    return (band.low !== undefined && band.low !== null) || (band.high !== undefined && band.high !== null);
}

export class ThresholdResolver {
    constructor(private store: Pick<ThresholdStore, 'findUserBand' | 'findDefaultBand'>) { }

    /**
     * User-specific band first, then the system default. A row without any
     * bound counts as not configured. Never creates rows.
     */
    async resolve(userId: string, vitalKind: VitalKind): Promise<Resolution> {
        const userBand = await this.store.findUserBand(userId, vitalKind);
        if (userBand) {
            return hasBounds(userBand)
                ? { configured: true, band: userBand, source: 'user' }
                : { configured: false };
        }

        const defaultBand = await this.store.findDefaultBand(vitalKind);
        if (defaultBand && hasBounds(defaultBand)) {
            return { configured: true, band: defaultBand, source: 'default' };
        }

        return { configured: false };
    }
}
