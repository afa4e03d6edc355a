/**
 * Decision Curve Validator
 *
 * Gate for decision curves before they are stored on a setup.
 * Throws CurveError naming the first violated rule. Points are checked one
 * at a time in the given order; nothing is sorted, so an unsorted curve is
 * rejected as non-increasing.
 *
 * Rules:
 *   1. curve is an object
 *   2. `points` is an array
 *   3. at least 2 points
 *   4. every point is an object with x and y
 *   5. x and y are numbers
 *   6. x within [0, 100]
 *   7. y within [MIN_MULTIPLIER, MAX_MULTIPLIER]
 *   8. x strictly increasing
 *   9. first x is 0, last x is 100
 *  10. `input`, when present, is a non-empty string
 *
 * The decision path never re-runs this; it is a save-time check only.
 */

import {
    CurveError,
    DECISION_X_MAX,
    DECISION_X_MIN,
    MAX_MULTIPLIER,
    MIN_MULTIPLIER,
    type DecisionCurve,
} from './curve-types';

export function validateDecisionCurve(curve: unknown): asserts curve is DecisionCurve {
    if (!isRecord(curve)) {
        throw new CurveError('Decision curve must be an object');
    }

    const points = curve.points;
    if (!Array.isArray(points)) {
        throw new CurveError("Decision curve requires a 'points' list");
    }

    if (points.length < 2) {
        throw new CurveError('Decision curve requires at least 2 points');
    }

    let prevX: number | null = null;

    points.forEach((point: unknown, index: number) => {
        if (!isRecord(point)) {
            throw new CurveError(`Curve point ${index} must be an object`);
        }

        if (!('x' in point) || !('y' in point)) {
            throw new CurveError(`Curve point ${index} requires both x and y`);
        }

        const { x, y } = point;

        if (!isFiniteNumber(x)) {
            throw new CurveError(`Curve point ${index}: x must be numeric`);
        }

        if (!isFiniteNumber(y)) {
            throw new CurveError(`Curve point ${index}: y must be numeric`);
        }

        if (x < DECISION_X_MIN || x > DECISION_X_MAX) {
            throw new CurveError(`Curve point ${index}: x must be between ${DECISION_X_MIN} and ${DECISION_X_MAX} (got ${x})`);
        }

        if (y < MIN_MULTIPLIER || y > MAX_MULTIPLIER) {
            throw new CurveError(`Curve point ${index}: y must be between ${MIN_MULTIPLIER} and ${MAX_MULTIPLIER} (got ${y})`);
        }

        if (prevX !== null && x <= prevX) {
            throw new CurveError(`Curve point ${index}: x values must be strictly increasing (${x} after ${prevX})`);
        }

        prevX = x;
    });

    const firstX = readX(points[0]);
    const lastX = readX(points[points.length - 1]);

    if (firstX !== DECISION_X_MIN || lastX !== DECISION_X_MAX) {
        throw new CurveError(`Decision curve must cover ${DECISION_X_MIN}–${DECISION_X_MAX} (first x ${firstX}, last x ${lastX})`);
    }

    if ('input' in curve && curve.input !== undefined) {
        if (typeof curve.input !== 'string' || curve.input.trim() === '') {
            throw new CurveError("Decision curve 'input' must be a non-empty string");
        }
    }
}

/**
 * Non-throwing variant for callers that want to report rather than reject.
 */
export function checkDecisionCurve(curve: unknown): { valid: true } | { valid: false; error: string } {
    try {
        validateDecisionCurve(curve);
        return { valid: true };
    } catch (error) {
        if (error instanceof CurveError) {
            return { valid: false, error: error.message };
        }
        throw error;
    }
}

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
}

function readX(point: unknown): number | null {
    return isRecord(point) && isFiniteNumber(point.x) ? point.x : null;
}
