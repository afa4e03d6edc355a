/**
 * Decision Curve Presets
 *
 * Data-only sizing presets. x = score (0–100), y = multiplier on the base
 * amount. Every preset stays inside the multiplier bounds, so the floor is
 * MIN_MULTIPLIER rather than zero. Presets are frozen; use
 * getDecisionPreset() for an editable copy.
 */

import type { DecisionCurve } from './curve-types';

function freezeCurve(curve: DecisionCurve): DecisionCurve {
    curve.points.forEach(point => Object.freeze(point));
    Object.freeze(curve.points);
    return Object.freeze(curve);
}

export type DecisionPresetKey = 'dca_contrarian' | 'dca_trend_following';

/** Buy more into weakness, scale down into euphoria */
export const DCA_CONTRARIAN: DecisionCurve = freezeCurve({
    name: 'Contrarian DCA',
    description: 'Buy more on weakness, scale down on euphoria.',
    input: 'market_score',
    points: [
        { x: 0, y: 1.7 },
        { x: 20, y: 1.5 },
        { x: 40, y: 1.2 },
        { x: 60, y: 1.0 },
        { x: 80, y: 0.5 },
        { x: 90, y: 0.05 },
        { x: 100, y: 0.05 },
    ],
});

/** Invest more on strength, less on weakness */
export const DCA_TREND_FOLLOWING: DecisionCurve = freezeCurve({
    name: 'Trend Following DCA',
    description: 'Invest more on strength, less on weakness.',
    input: 'market_score',
    points: [
        { x: 0, y: 0.5 },
        { x: 20, y: 0.7 },
        { x: 40, y: 0.9 },
        { x: 60, y: 1.1 },
        { x: 80, y: 1.4 },
        { x: 100, y: 1.5 },
    ],
});

export const DECISION_PRESETS: Readonly<Record<DecisionPresetKey, DecisionCurve>> = Object.freeze({
    dca_contrarian: DCA_CONTRARIAN,
    dca_trend_following: DCA_TREND_FOLLOWING,
});

export function isDecisionPresetKey(key: string): key is DecisionPresetKey {
    return Object.prototype.hasOwnProperty.call(DECISION_PRESETS, key);
}

/**
 * Copy of a preset, safe for callers to store on a setup.
 */
export function getDecisionPreset(key: string): DecisionCurve | null {
    if (!isDecisionPresetKey(key)) return null;
    const preset = DECISION_PRESETS[key];
    return {
        ...preset,
        points: preset.points.map(p => ({ x: p.x, y: p.y })),
    };
}
