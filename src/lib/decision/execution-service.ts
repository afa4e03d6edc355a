/**
 * Execution Service — Final Amount per Setup
 *
 * The one place the invested amount is settled:
 *   1. decideAmount sizes the setup
 *   2. any triggered pause condition forces the amount to 0
 *   3. otherwise an optional exposure multiplier scales the amount
 */

import type { ScoreSnapshot } from '../scoring/score-snapshot';
import { decideAmount } from './decision-engine';
import { applyExposureToAmount } from './exposure-engine';
import type { PauseConditions, Setup } from './setup-types';

export interface ExecutionOptions {
    /** From computeExposureMultiplier; omitted or null leaves the amount as decided */
    exposureMultiplier?: number | null;
}

export interface ExecutionResult {
    amount: number;
    decidedAmount: number;
    paused: boolean;
    pauseReason: string | null;
    exposureMultiplier: number | null;
}

/**
 * First pause condition the scores trigger, as a readable reason.
 * Conditions on a score that is missing or non-numeric never trigger.
 */
export function findPauseTrigger(
    pauseConditions: PauseConditions | undefined,
    scores: ScoreSnapshot,
): string | null {
    if (!pauseConditions) return null;

    for (const [key, condition] of Object.entries(pauseConditions)) {
        const score = scores[key];
        if (typeof score !== 'number' || !Number.isFinite(score)) continue;

        if (condition.gt !== undefined && score > condition.gt) {
            return `${key} ${score} > ${condition.gt}`;
        }
        if (condition.lt !== undefined && score < condition.lt) {
            return `${key} ${score} < ${condition.lt}`;
        }
    }

    return null;
}

export function computeExecution(
    setup: Setup,
    scores: ScoreSnapshot,
    options: ExecutionOptions = {},
): ExecutionResult {
    const decidedAmount = decideAmount(setup, scores);
    const pauseReason = findPauseTrigger(setup.pauseConditions, scores);

    if (pauseReason) {
        console.log(`[ExecutionService] Paused ${setup.name ?? setup.id ?? 'setup'}: ${pauseReason}`);
        return {
            amount: 0,
            decidedAmount,
            paused: true,
            pauseReason,
            exposureMultiplier: null,
        };
    }

    const exposureMultiplier = options.exposureMultiplier ?? null;
    const amount = exposureMultiplier === null
        ? decidedAmount
        : applyExposureToAmount(decidedAmount, exposureMultiplier);

    return {
        amount,
        decidedAmount,
        paused: false,
        pauseReason: null,
        exposureMultiplier,
    };
}

export function computeExecutionAmount(setup: Setup, scores: ScoreSnapshot): number {
    return computeExecution(setup, scores).amount;
}
