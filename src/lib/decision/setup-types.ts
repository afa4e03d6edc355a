/**
 * Setup Types
 *
 * A setup is a named trading configuration. The decision engine only reads
 * its sizing fields. Persisted rows (snake_case) are converted into these
 * types by parseSetup before the engine sees them.
 */

import type { Curve } from '../curves/curve-types';

export type ExecutionMode = 'fixed' | 'custom';

export const EXECUTION_MODES: readonly ExecutionMode[] = ['fixed', 'custom'];

/** Forces the amount to zero when the score is above gt or below lt */
export interface PauseCondition {
    gt?: number;
    lt?: number;
}

/** Score key → condition */
export type PauseConditions = Record<string, PauseCondition>;

interface SetupBase {
    id?: string;
    name?: string;
    symbol?: string;
    baseAmount: number;
    pauseConditions?: PauseConditions;
}

export interface FixedSetup extends SetupBase {
    executionMode: 'fixed';
}

export interface CustomSetup extends SetupBase {
    executionMode: 'custom';
    decisionCurve: Curve;
}

export type Setup = FixedSetup | CustomSetup;

/**
 * Row shape as stored in the `setups` table. Every field is untrusted.
 */
export interface SetupRecord {
    id?: unknown;
    name?: unknown;
    symbol?: unknown;
    execution_mode?: unknown;
    base_amount?: unknown;
    decision_curve?: unknown;
    pause_conditions?: unknown;
    [column: string]: unknown;
}

export class DecisionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DecisionError';
    }
}
