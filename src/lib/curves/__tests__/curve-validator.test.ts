/**
 * Decision Curve Validator — Unit Tests (Jest)
 *
 * One case per rule, plus precedence between rules.
 */

import { validateDecisionCurve, checkDecisionCurve } from '../curve-validator';
import { CurveError } from '../curve-types';
import { DECISION_PRESETS } from '../curve-presets';

function curveOf(points: unknown[], extra: Record<string, unknown> = {}): Record<string, unknown> {
    return { input: 'market_score', points, ...extra };
}

describe('validateDecisionCurve', () => {
    it('accepts a well-formed curve', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1.5 }, { x: 50, y: 1.0 }, { x: 100, y: 0.05 }]))).not.toThrow();
    });

    it('accepts every preset', () => {
        for (const preset of Object.values(DECISION_PRESETS)) {
            expect(() => validateDecisionCurve(preset)).not.toThrow();
        }
    });

    it('accepts a curve without an input key', () => {
        expect(() => validateDecisionCurve({ points: [{ x: 0, y: 1 }, { x: 100, y: 1 }] })).not.toThrow();
    });

    // -------------------------------------------------------------------------
    // Rules in order
    // -------------------------------------------------------------------------

    it('rejects non-objects', () => {
        for (const bad of [null, undefined, 5, 'curve', []]) {
            expect(() => validateDecisionCurve(bad)).toThrow('Decision curve must be an object');
        }
    });

    it('rejects a missing or non-list points field', () => {
        expect(() => validateDecisionCurve({})).toThrow("Decision curve requires a 'points' list");
        expect(() => validateDecisionCurve({ points: 'x' })).toThrow("Decision curve requires a 'points' list");
    });

    it('rejects fewer than 2 points', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1 }]))).toThrow('Decision curve requires at least 2 points');
    });

    it('rejects a point that is not an object', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1 }, 3]))).toThrow('Curve point 1 must be an object');
    });

    it('rejects a point without y', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0 }, { x: 100, y: 1 }]))).toThrow('Curve point 0 requires both x and y');
    });

    it('rejects non-numeric coordinates', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: '0', y: 1 }, { x: 100, y: 1 }]))).toThrow('Curve point 0: x must be numeric');
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: null }, { x: 100, y: 1 }]))).toThrow('Curve point 0: y must be numeric');
    });

    it('rejects x outside 0..100', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: -5, y: 1 }, { x: 100, y: 1 }])))
            .toThrow('Curve point 0: x must be between 0 and 100 (got -5)');
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1 }, { x: 120, y: 1 }])))
            .toThrow('Curve point 1: x must be between 0 and 100 (got 120)');
    });

    it('rejects y outside the multiplier bounds', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 0 }, { x: 100, y: 1 }])))
            .toThrow('Curve point 0: y must be between 0.05 and 3 (got 0)');
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1 }, { x: 100, y: 3.5 }])))
            .toThrow('Curve point 1: y must be between 0.05 and 3 (got 3.5)');
    });

    it('accepts y exactly on the bounds', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 0.05 }, { x: 100, y: 3 }]))).not.toThrow();
    });

    it('rejects non-increasing x without sorting', () => {
        const unsorted = curveOf([{ x: 0, y: 1 }, { x: 60, y: 1 }, { x: 40, y: 1 }, { x: 100, y: 1 }]);
        expect(() => validateDecisionCurve(unsorted)).toThrow('Curve point 2: x values must be strictly increasing (40 after 60)');
    });

    it('rejects repeated x', () => {
        const repeated = curveOf([{ x: 0, y: 1 }, { x: 50, y: 1 }, { x: 50, y: 2 }, { x: 100, y: 1 }]);
        expect(() => validateDecisionCurve(repeated)).toThrow('Curve point 2: x values must be strictly increasing (50 after 50)');
    });

    it('rejects curves that do not start at 0', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 10, y: 1 }, { x: 100, y: 1 }])))
            .toThrow('Decision curve must cover 0–100 (first x 10, last x 100)');
    });

    it('rejects curves that do not end at 100', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1 }, { x: 90, y: 1 }])))
            .toThrow('Decision curve must cover 0–100 (first x 0, last x 90)');
    });

    it('rejects an empty input key', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 0, y: 1 }, { x: 100, y: 1 }], { input: ' ' })))
            .toThrow("Decision curve 'input' must be a non-empty string");
    });

    // -------------------------------------------------------------------------
    // Precedence
    // -------------------------------------------------------------------------

    it('reports per-point bounds before coverage', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 10, y: 9 }, { x: 90, y: 1 }])))
            .toThrow('Curve point 0: y must be between 0.05 and 3 (got 9)');
    });

    it('reports x range before y range on the same point', () => {
        expect(() => validateDecisionCurve(curveOf([{ x: 150, y: 9 }, { x: 100, y: 1 }])))
            .toThrow('Curve point 0: x must be between 0 and 100 (got 150)');
    });

    it('throws CurveError instances', () => {
        expect(() => validateDecisionCurve({})).toThrow(CurveError);
    });
});

describe('checkDecisionCurve', () => {
    it('returns valid for a good curve', () => {
        expect(checkDecisionCurve({ points: [{ x: 0, y: 1 }, { x: 100, y: 1 }] })).toEqual({ valid: true });
    });

    it('returns the rule message for a bad curve', () => {
        expect(checkDecisionCurve({ points: [] })).toEqual({
            valid: false,
            error: 'Decision curve requires at least 2 points',
        });
    });
});
