/**
 * Curve Types
 *
 * A curve is an ordered list of (x, y) control points describing a
 * piecewise-linear function. Decision curves map a 0–100 score to a
 * position-size multiplier.
 */

// =============================================================================
// Constants
// =============================================================================

/** Lowest multiplier a decision curve may produce */
export const MIN_MULTIPLIER = 0.05;

/** Highest multiplier a decision curve may produce */
export const MAX_MULTIPLIER = 3.0;

/** Score range a decision curve must cover */
export const DECISION_X_MIN = 0;
export const DECISION_X_MAX = 100;

/** Score key a curve reads when it declares no input */
export const DEFAULT_CURVE_INPUT = 'market_score';

// =============================================================================
// Types
// =============================================================================

export interface CurvePoint {
    x: number;
    y: number;
}

export interface Curve {
    /** Score / indicator key the curve reads its x value from */
    input?: string;
    points: CurvePoint[];
}

/**
 * A curve that passed validateDecisionCurve: at least two points,
 * strictly increasing x covering 0..100, y within the multiplier bounds.
 */
export interface DecisionCurve extends Curve {
    name?: string;
    description?: string;
}

// =============================================================================
// Errors
// =============================================================================

export class CurveError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CurveError';
    }
}
