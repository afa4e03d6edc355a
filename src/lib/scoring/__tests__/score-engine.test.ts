/**
 * Weighted Curve Score Engine — Unit Tests (Jest)
 */

import { calculateWeightedScore, MIN_SCORE } from '../score-engine';
import { createRegimeWeighting, type WeightAdjuster, type WeightedCurve } from '../regime-weights';

const RISING = [{ x: 0, y: 0 }, { x: 100, y: 100 }];
const FALLING = [{ x: 0, y: 100 }, { x: 100, y: 0 }];

function rows(rsiWeight = 1, dxyWeight = 1): WeightedCurve[] {
    return [
        { curve: { input: 'rsi', points: RISING }, weight: rsiWeight },
        { curve: { input: 'dxy', points: FALLING }, weight: dxyWeight },
    ];
}

let warnSpy: jest.SpyInstance;

beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
    warnSpy.mockRestore();
});

describe('calculateWeightedScore', () => {
    it('averages curve outputs', () => {
        expect(calculateWeightedScore({ rsi: 60, dxy: 30 }, rows())).toBe(65);
    });

    it('weights curve outputs', () => {
        expect(calculateWeightedScore({ rsi: 60, dxy: 30 }, rows(3, 1))).toBe(62.5);
    });

    it('clamps individual outputs to the minimum score', () => {
        expect(calculateWeightedScore({ rsi: 5 }, rows())).toBe(10);
    });

    it('returns the minimum score when nothing is usable', () => {
        expect(calculateWeightedScore({}, rows())).toBe(MIN_SCORE);
        expect(calculateWeightedScore({ rsi: null, dxy: undefined }, rows())).toBe(MIN_SCORE);
    });

    it('skips rows whose curve cannot be evaluated', () => {
        const broken: WeightedCurve[] = [
            { curve: { input: 'rsi', points: [] } },
            { curve: { input: 'dxy', points: FALLING } },
        ];
        expect(calculateWeightedScore({ rsi: 60, dxy: 30 }, broken)).toBe(70);
        expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('applies an injected weight adjuster before aggregation', () => {
        const adjuster: WeightAdjuster = {
            label: 'test',
            adjust: input => input.map(r => ({ ...r, weight: r.curve.input === 'rsi' ? 3 : 1 })),
        };
        expect(calculateWeightedScore({ rsi: 60, dxy: 30 }, rows(), { weighting: adjuster })).toBe(62.5);
    });

    it('works with a regime weighting', () => {
        const weighting = createRegimeWeighting('trend', { weightMap: { trend: { rsi: 2 } } });
        // (60 × 2 + 70 × 1) / 3
        expect(calculateWeightedScore({ rsi: 60, dxy: 30 }, rows(), { weighting })).toBe(63.33);
    });

    it('ignores a null weighting', () => {
        expect(calculateWeightedScore({ rsi: 60, dxy: 30 }, rows(), { weighting: null })).toBe(65);
    });
});
