/**
 * Curve Engine — Piecewise-Linear Evaluation
 *
 * Pure lookup over a curve's control points. No side effects.
 *
 * - Below the first point → first y (flat)
 * - Above the last point  → last y (flat)
 * - In between            → linear interpolation, rounded to 4 decimals
 */

import { CurveError, type Curve, type CurvePoint } from './curve-types';

/**
 * Evaluate a curve at x.
 *
 * Points are read in ascending x order. The sort is done on a copy and is
 * stable, so points sharing an x keep their authored order and the first
 * matching segment wins.
 */
export function evaluateCurve(curve: Curve | null | undefined, x: number): number {
    if (!curve || !Array.isArray(curve.points)) {
        throw new CurveError('Curve is missing or invalid');
    }

    if (curve.points.length === 0) {
        throw new CurveError('Curve has no points');
    }

    if (typeof x !== 'number' || !Number.isFinite(x)) {
        throw new CurveError(`Curve input is not a number: ${String(x)}`);
    }

    const points = sortedPoints(curve.points);
    const first = points[0];
    const last = points[points.length - 1];

    if (x <= first.x) return first.y;
    if (x >= last.x) return last.y;

    for (let i = 0; i < points.length - 1; i++) {
        const left = points[i];
        const right = points[i + 1];

        if (left.x <= x && x <= right.x) {
            // Zero-width segment
            if (right.x === left.x) return left.y;

            const ratio = (x - left.x) / (right.x - left.x);
            return round4(left.y + ratio * (right.y - left.y));
        }
    }

    return last.y;
}

// =============================================================================
// Helpers
// =============================================================================

function sortedPoints(points: CurvePoint[]): CurvePoint[] {
    return [...points].sort((a, b) => a.x - b.x);
}

function round4(n: number): number {
    return Math.round(n * 10000) / 10000;
}
