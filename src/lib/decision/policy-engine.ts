/**
 * Policy Engine — Rule-Based Risk Gates
 *
 * Turns the latest scores plus transition risk, market pressure and the
 * regime label into a risk mode, the actions a bot may take, and the
 * exposure caps the exposure engine must respect.
 *
 * Rules run in a fixed order; later rules override earlier ones:
 *   1. market pressure sets the baseline risk mode
 *   2. transition risk de-risks it
 *   3. the regime label nudges it
 *   4. very weak scores force risk-off
 */

import type { ScoreSnapshot } from '../scoring/score-snapshot';

// =============================================================================
// Types
// =============================================================================

export type PolicyRiskMode = 'risk_on' | 'neutral' | 'risk_off' | 'no_data';

export type PolicyAction = 'buy' | 'hold';

export interface PolicyInput {
    scores: ScoreSnapshot;
    /** 0 stable … 1 unstable; missing → 0.5 */
    transitionRisk?: number | null;
    /** 0 defensive … 1 aggressive; missing → 0.5 */
    marketPressure?: number | null;
    regimeLabel?: string | null;
}

export interface PolicyDecision {
    riskMode: PolicyRiskMode;
    allowedActions: PolicyAction[];
    maxExposureMultiplier: number;
    minExposureMultiplier: number;
    cooldownHours: number;
    notes: string[];
}

// =============================================================================
// Constants
// =============================================================================

const NEUTRAL_INPUT = 0.5;

const CAPS: Readonly<Record<'risk_on' | 'neutral' | 'risk_off', { max: number; min: number; cooldown: number }>> = {
    risk_on: { max: 1.35, min: 0.1, cooldown: 6 },
    neutral: { max: 1.0, min: 0.08, cooldown: 12 },
    risk_off: { max: 0.55, min: 0.05, cooldown: 24 },
};

const NO_DATA_DECISION: PolicyDecision = {
    riskMode: 'no_data',
    allowedActions: ['hold'],
    maxExposureMultiplier: 0.5,
    minExposureMultiplier: 0.05,
    cooldownHours: 24,
    notes: ['No scores available, holding.'],
};

// =============================================================================
// Core
// =============================================================================

export function evaluatePolicy(input: PolicyInput): PolicyDecision {
    const transition = unitOrNeutral(input.transitionRisk);
    const pressure = unitOrNeutral(input.marketPressure);

    const market = scoreOf(input.scores, 'market_score');
    const technical = scoreOf(input.scores, 'technical_score');
    const macro = scoreOf(input.scores, 'macro_score');
    const setup = scoreOf(input.scores, 'setup_score');

    if (market === null && technical === null && macro === null && setup === null) {
        return { ...NO_DATA_DECISION, allowedActions: ['hold'], notes: [...NO_DATA_DECISION.notes] };
    }

    const notes: string[] = [];
    const label = (input.regimeLabel ?? '').trim().toLowerCase().replace(/ /g, '_');

    // ── Risk mode ────────────────────────────────────────────────────────
    let riskMode: 'risk_on' | 'neutral' | 'risk_off' =
        pressure >= 0.72 ? 'risk_on' : pressure <= 0.42 ? 'risk_off' : 'neutral';

    if (transition >= 0.8) {
        riskMode = 'risk_off';
        notes.push('Transition risk extreme: forced risk-off.');
    } else if (transition >= 0.65 && riskMode === 'risk_on') {
        riskMode = 'neutral';
        notes.push('Transition risk elevated: risk-on lowered to neutral.');
    }

    if (label === 'distribution' || label === 'risk_off') {
        riskMode = 'risk_off';
        notes.push(`Regime '${label}': risk-off bias.`);
    } else if (label === 'accumulation' && riskMode === 'risk_off' && transition < 0.55) {
        riskMode = 'neutral';
        notes.push('Accumulation regime: risk-off relaxed to neutral.');
    }

    if (market !== null && market <= 30) {
        riskMode = 'risk_off';
        notes.push('Market score very low: risk-off.');
    }
    if (technical !== null && technical <= 30 && transition > 0.55) {
        riskMode = 'risk_off';
        notes.push('Weak technical score with elevated transition risk: risk-off.');
    }

    // ── Allowed actions ──────────────────────────────────────────────────
    let allowedActions: PolicyAction[] = riskMode === 'risk_off' ? ['hold'] : ['buy', 'hold'];

    if (setup !== null && setup < 40 && allowedActions.includes('buy')) {
        allowedActions = ['hold'];
        notes.push('Setup score weak: buying blocked.');
    }
    if (transition >= 0.65 && allowedActions.includes('buy') && (setup === null || setup < 75)) {
        allowedActions = ['hold'];
        notes.push('High transition risk: buying needs a setup score of 75 or more.');
    }

    // ── Exposure caps ────────────────────────────────────────────────────
    let { max, min, cooldown } = CAPS[riskMode];

    if (transition >= 0.8) {
        max = Math.min(max, 0.35);
        cooldown = Math.max(cooldown, 36);
        notes.push('Extreme transition: exposure hard-capped.');
    } else if (transition >= 0.65) {
        max = Math.min(max, 0.6);
        notes.push('Elevated transition: exposure cap tightened.');
    }

    if (macro !== null && macro <= 25) {
        max = Math.min(max, 0.5);
        notes.push('Macro score very weak: exposure capped.');
    }

    const maxExposureMultiplier = clamp(max, 0.05, 2);
    const minExposureMultiplier = clamp(min, 0.01, maxExposureMultiplier);

    return {
        riskMode,
        allowedActions,
        maxExposureMultiplier,
        minExposureMultiplier,
        cooldownHours: cooldown,
        notes,
    };
}

// =============================================================================
// Helpers
// =============================================================================

function scoreOf(scores: ScoreSnapshot, key: string): number | null {
    const value = scores[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function unitOrNeutral(value: number | null | undefined): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) return NEUTRAL_INPUT;
    return clamp(value, 0, 1);
}

function clamp(n: number, lo: number, hi: number): number {
    return Math.max(lo, Math.min(n, hi));
}
