/**
 * Regime Weights
 *
 * Reweights per-curve contributions according to the detected market regime
 * before the weighted scorer aggregates them. Unknown regimes leave the
 * rows untouched. Input rows are never mutated.
 */

import type { Curve } from '../curves/curve-types';

// =============================================================================
// Types
// =============================================================================

export interface WeightedCurve {
    curve: Curve;
    weight?: number;
}

/** Score key → weight multiplier */
export type RegimeMultipliers = Record<string, number>;

/** Regime label → multipliers */
export type RegimeWeightMap = Record<string, RegimeMultipliers>;

export interface RegimeWeightOptions {
    weightMap?: RegimeWeightMap;
    minWeight?: number;
    maxWeight?: number;
}

/**
 * Optional capability handed to the weighted scorer.
 * Callers without a regime simply pass none.
 */
export interface WeightAdjuster {
    readonly label: string;
    adjust(rows: readonly WeightedCurve[]): WeightedCurve[];
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_MIN_WEIGHT = 0.25;
export const DEFAULT_MAX_WEIGHT = 2.5;

export const DEFAULT_REGIME_WEIGHTS: RegimeWeightMap = {
    // Risk-off: safety and structure over momentum
    risk_off: {
        market_score: 0.8,
        technical_score: 1.2,
        macro_score: 1.3,
        sentiment_score: 0.7,
        volatility_score: 1.2,
    },
    risk_on: {
        market_score: 1.3,
        technical_score: 1.1,
        macro_score: 0.9,
        sentiment_score: 1.2,
        volatility_score: 0.8,
    },
    // Range / chop: technicals heavier
    range: {
        market_score: 0.9,
        technical_score: 1.3,
        macro_score: 1.0,
        sentiment_score: 0.9,
        volatility_score: 1.1,
    },
    distribution: {
        market_score: 0.8,
        technical_score: 1.2,
        macro_score: 1.25,
        sentiment_score: 0.8,
        volatility_score: 1.15,
    },
    accumulation: {
        market_score: 1.15,
        technical_score: 1.2,
        macro_score: 1.0,
        sentiment_score: 0.95,
        volatility_score: 1.0,
    },
    neutral: {},
};

// =============================================================================
// Core
// =============================================================================

/**
 * Return a reweighted copy of `rows`:
 *   weight = clamp(baseWeight × regimeMultiplier(curve.input), min, max)
 *
 * An unknown label falls back to the map's `neutral` entry; an empty
 * multiplier set returns the rows unchanged.
 */
export function applyRegimeWeights(
    rows: readonly WeightedCurve[],
    regimeLabel: string | null | undefined,
    options: RegimeWeightOptions = {},
): WeightedCurve[] {
    if (rows.length === 0) return [];

    const weightMap = options.weightMap ?? DEFAULT_REGIME_WEIGHTS;
    const minWeight = options.minWeight ?? DEFAULT_MIN_WEIGHT;
    const maxWeight = options.maxWeight ?? DEFAULT_MAX_WEIGHT;

    const label = normalizeKey(regimeLabel);
    const multipliers = lookup(weightMap, label) ?? lookup(weightMap, 'neutral') ?? {};

    if (Object.keys(multipliers).length === 0) {
        return rows.map(copyRow);
    }

    return rows.map(row => {
        const copy = copyRow(row);
        const inputKey = normalizeKey(row.curve.input);
        if (!inputKey) return copy;

        const baseWeight = positiveOr(row.weight, 1);
        const regimeMultiplier = positiveOr(lookup(multipliers, inputKey), 1);
        const weight = Math.max(minWeight, Math.min(baseWeight * regimeMultiplier, maxWeight));

        copy.weight = round6(weight);
        return copy;
    });
}

/**
 * Bind a regime label and options into a WeightAdjuster.
 */
export function createRegimeWeighting(
    regimeLabel: string,
    options: RegimeWeightOptions = {},
): WeightAdjuster {
    const label = normalizeKey(regimeLabel);
    return {
        label,
        adjust: rows => applyRegimeWeights(rows, label, options),
    };
}

// =============================================================================
// Helpers
// =============================================================================

function normalizeKey(key: string | null | undefined): string {
    return (key ?? '').trim().toLowerCase().replace(/ /g, '_');
}

function lookup<T>(record: Record<string, T>, key: string): T | undefined {
    return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function positiveOr(value: number | undefined, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function copyRow(row: WeightedCurve): WeightedCurve {
    return {
        ...row,
        curve: { ...row.curve, points: row.curve.points.map(p => ({ ...p })) },
    };
}

function round6(n: number): number {
    return Math.round(n * 1_000_000) / 1_000_000;
}
