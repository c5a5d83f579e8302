export type Breach = 'low' | 'high';

export type BreachResult = 'no_breach' | Breach;

export interface Band {
    low?: number | null;
    high?: number | null;
}

/**
 * Classify a single observed value against a band.
 *
 * Bounds are exclusive: a value equal to either bound is not a breach. The low
 * bound is checked first.
 */
export function evaluateBreach(band: Band, value: number): BreachResult {
    if (band.low !== undefined && band.low !== null && value < band.low) {
        return 'low';
    }
    if (band.high !== undefined && band.high !== null && value > band.high) {
        return 'high';
    }
    return 'no_breach';
}
