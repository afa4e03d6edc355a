/**
 * Weighted Curve Score Engine
 *
 * Turns indicator values into a single 10–100 score by running each value
 * through its curve and taking the weighted mean. A regime WeightAdjuster
 * may be injected to reweight rows before aggregation.
 */

import { evaluateCurve } from '../curves/curve-engine';
import { CurveError } from '../curves/curve-types';
import type { WeightAdjuster, WeightedCurve } from './regime-weights';

export const MIN_SCORE = 10;
export const MAX_SCORE = 100;

export interface WeightedScoreOptions {
    weighting?: WeightAdjuster | null;
}

export function calculateWeightedScore(
    indicatorValues: Record<string, number | null | undefined>,
    rows: readonly WeightedCurve[],
    options: WeightedScoreOptions = {},
): number {
    const effectiveRows = options.weighting ? options.weighting.adjust(rows) : rows;

    let weightedSum = 0;
    let weightTotal = 0;

    for (const row of effectiveRows) {
        const inputKey = row.curve.input;
        if (!inputKey) continue;

        const x = indicatorValues[inputKey];
        if (typeof x !== 'number' || !Number.isFinite(x)) continue;

        let y: number;
        try {
            y = evaluateCurve(row.curve, x);
        } catch (error) {
            if (!(error instanceof CurveError)) throw error;
            console.warn(`[ScoreEngine] Skipping curve '${inputKey}': ${error.message}`);
            continue;
        }

        const weight = row.weight ?? 1;
        if (!Number.isFinite(weight) || weight <= 0) continue;

        weightedSum += clampScore(y) * weight;
        weightTotal += weight;
    }

    if (weightTotal === 0) return MIN_SCORE;

    return round2(clampScore(weightedSum / weightTotal));
}

// =============================================================================
// Helpers
// =============================================================================

function clampScore(n: number): number {
    return Math.max(MIN_SCORE, Math.min(n, MAX_SCORE));
}

function round2(n: number): number {
    return Math.round(n * 100) / 100;
}
