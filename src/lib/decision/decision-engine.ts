/**
 * Decision Engine — Position Size per Setup
 *
 * Pure function of (setup, scores). No DB access, no retained state.
 *
 * Modes:
 * - fixed:  base amount, scores ignored
 * - custom: base amount × decision-curve multiplier at the curve's input score
 *
 * Every malformed input throws DecisionError; an amount is never returned
 * for a setup that cannot be sized.
 */

import { evaluateCurve } from '../curves/curve-engine';
import { DEFAULT_CURVE_INPUT } from '../curves/curve-types';
import type { ScoreSnapshot } from '../scoring/score-snapshot';
import { parseSetup } from './setup-parser';
import { DecisionError, type CustomSetup, type Setup } from './setup-types';

export function decideAmount(setup: Setup | null | undefined, scores: ScoreSnapshot): number {
    if (!setup) {
        throw new DecisionError('Setup is missing');
    }

    const { baseAmount } = setup;
    if (typeof baseAmount !== 'number' || !Number.isFinite(baseAmount) || baseAmount <= 0) {
        throw new DecisionError(`Invalid base_amount: ${String(baseAmount)}`);
    }

    const mode: string = setup.executionMode;

    switch (setup.executionMode) {
        case 'fixed':
            return round2(baseAmount);
        case 'custom':
            return decideCustomAmount(setup, scores);
        default:
            throw new DecisionError(`Unknown execution_mode: ${mode}`);
    }
}

/**
 * Size a persisted setup record: parse at the boundary, then decide.
 */
export function decideAmountForRecord(record: unknown, scores: ScoreSnapshot): number {
    return decideAmount(parseSetup(record), scores);
}

/**
 * Multiplier the decision curve yields for the current scores.
 */
export function resolveMultiplier(setup: CustomSetup, scores: ScoreSnapshot): { inputKey: string; score: number; multiplier: number } {
    const curve = setup.decisionCurve;
    if (!curve) {
        throw new DecisionError('Custom mode requires decision_curve');
    }

    const inputKey = curve.input || DEFAULT_CURVE_INPUT;
    const score = scores[inputKey];

    if (typeof score !== 'number' || !Number.isFinite(score)) {
        throw new DecisionError(`Score '${inputKey}' is missing or invalid`);
    }

    return { inputKey, score, multiplier: evaluateCurve(curve, score) };
}

// =============================================================================
// Helpers
// =============================================================================

function decideCustomAmount(setup: CustomSetup, scores: ScoreSnapshot): number {
    const { multiplier } = resolveMultiplier(setup, scores);
    const amount = Math.max(0, setup.baseAmount * multiplier);
    return round2(amount);
}

function round2(n: number): number {
    return Math.round(n * 100) / 100;
}
