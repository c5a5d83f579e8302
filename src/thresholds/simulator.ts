import { VITAL_KINDS, type Severity, type VitalKind, type VitalValues } from '../domain/types.js';
import { evaluateBreach } from './evaluator.js';
import type { ThresholdResolver } from './resolver.js';

export interface ThresholdCheckResult {
    vitalKind: VitalKind;
    value: number;
    severity: Severity;
}

/**
 * Dry run of threshold evaluation: reports which vitals would breach without
 * persisting a reading or raising alerts.
 */
export async function simulateThresholds(
    resolver: ThresholdResolver,
    userId: string,
    vitals: VitalValues,
): Promise<ThresholdCheckResult[]> {
    const results: ThresholdCheckResult[] = [];

    for (const vitalKind of VITAL_KINDS) {
        const value = vitals[vitalKind];
        if (value === undefined) continue;

        const resolution = await resolver.resolve(userId, vitalKind);
        if (!resolution.configured) continue;

        const breach = evaluateBreach(resolution.band, value);
        if (breach !== 'no_breach') {
            results.push({ vitalKind, value, severity: breach });
        }
    }

    return results;
}
