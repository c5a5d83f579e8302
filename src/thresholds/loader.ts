import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import { errorMessage } from '../domain/errors.js';
import type { VitalKind } from '../domain/types.js';

export interface BoundsEntry {
    low?: number | null;
    high?: number | null;
}

/** Flattened `{ vital: { low, high } }` for one category. */
export type CategoryThresholds = Partial<Record<VitalKind, BoundsEntry>>;

export type ThresholdDefaults = Record<string, CategoryThresholds>;

const FLAT_VITALS = ['heart_rate', 'oxygen_saturation', 'temperature', 'respiratory_rate'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Accepts `{ low, high }` or a bare number (treated as both bounds).
 */
function extractBounds(raw: unknown): BoundsEntry | undefined {
    if (typeof raw === 'number') {
        return { low: raw, high: raw };
    }
    if (!isRecord(raw)) {
        return undefined;
    }
    const low = toNumber(raw.low);
    const high = toNumber(raw.high);
    if (low === null && high === null) {
        return undefined;
    }
    return { low, high };
}

export function normalizeCategoryThresholds(raw: unknown): CategoryThresholds {
    const thresholds: CategoryThresholds = {};
    if (!isRecord(raw)) {
        return thresholds;
    }

    for (const vital of FLAT_VITALS) {
        const bounds = extractBounds(raw[vital]);
        if (bounds) {
            thresholds[vital] = bounds;
        }
    }

    const bp = raw.blood_pressure;
    if (isRecord(bp)) {
        const systolic = extractBounds(bp.systolic);
        if (systolic) thresholds.blood_pressure_systolic = systolic;
        const diastolic = extractBounds(bp.diastolic);
        if (diastolic) thresholds.blood_pressure_diastolic = diastolic;
    }

    return thresholds;
}

export function parseThresholdDefaults(raw: unknown): ThresholdDefaults {
    if (!isRecord(raw)) {
        throw new Error('Threshold defaults must be a JSON object keyed by category');
    }
    const defaults: ThresholdDefaults = {};
    for (const [category, entry] of Object.entries(raw)) {
        defaults[category.toLowerCase()] = normalizeCategoryThresholds(entry);
    }
    if (!defaults.default) {
        throw new Error('Threshold defaults are missing the "default" category');
    }
    return defaults;
}

export function loadThresholdDefaults(path: string): ThresholdDefaults {
    try {
        const content = readFileSync(path, 'utf-8');
        const defaults = parseThresholdDefaults(JSON.parse(content));

        logger.info({ path, categories: Object.keys(defaults) }, 'Threshold defaults loaded');

        return defaults;
    } catch (err) {
        logger.error({ path, error: errorMessage(err) }, 'Failed to load threshold defaults');
        throw new Error(`Failed to load threshold defaults from ${path}: ${errorMessage(err)}`);
    }
}
