/**
 * Exposure Engine — Regime Exposure Multiplier
 *
 * Scales overall exposure by market regime, dampened by transition risk and
 * nudged by regime confidence. Hard bounds are [0, 2]; policy caps may
 * narrow them further.
 */

// =============================================================================
// Types
// =============================================================================

export type RiskMode = 'risk_off' | 'defensive' | 'neutral' | 'risk_on';

export interface RegimeMemory {
    label?: string | null;
    /** 0–1, or 0–100 as a percentage */
    confidence?: number | null;
}

export interface PolicyCaps {
    min?: number;
    max?: number;
}

export interface ExposureResult {
    multiplier: number;
    riskMode: RiskMode;
    reason: string;
    components: {
        baseExposure?: number;
        transitionDampener?: number;
        confidenceBooster?: number;
    };
}

// =============================================================================
// Constants
// =============================================================================

export const MIN_EXPOSURE = 0;
export const MAX_EXPOSURE = 2;
export const DEFAULT_EXPOSURE = 1;

export const REGIME_EXPOSURE: Readonly<Record<string, number>> = {
    accumulation: 1.4,
    bull: 1.25,
    neutral: 1.0,
    distribution: 0.55,
    bear: 0.35,
};

// =============================================================================
// Core
// =============================================================================

export function computeExposureMultiplier(
    regimeMemory: RegimeMemory | null | undefined,
    transitionRisk: number | null | undefined,
    options: { policyCaps?: PolicyCaps } = {},
): ExposureResult {
    if (!regimeMemory) {
        return {
            multiplier: DEFAULT_EXPOSURE,
            riskMode: 'neutral',
            reason: 'No regime data, using baseline exposure.',
            components: {},
        };
    }

    const label = (regimeMemory.label ?? 'neutral').toLowerCase();
    const baseExposure = Object.prototype.hasOwnProperty.call(REGIME_EXPOSURE, label)
        ? REGIME_EXPOSURE[label]
        : DEFAULT_EXPOSURE;

    const dampener = transitionDampener(transitionRisk);
    const booster = confidenceBooster(regimeMemory.confidence);

    let exposure = clampExposure(baseExposure * dampener * booster);

    const caps = options.policyCaps;
    if (caps) {
        const minCap = caps.min ?? MIN_EXPOSURE;
        const maxCap = caps.max ?? MAX_EXPOSURE;
        exposure = Math.max(minCap, Math.min(exposure, maxCap));
    }

    const multiplier = round3(exposure);

    return {
        multiplier,
        riskMode: riskModeFor(multiplier),
        reason: `Regime=${label} | base=${baseExposure} | transition_adj=${dampener} | confidence_adj=${booster}`,
        components: {
            baseExposure,
            transitionDampener: dampener,
            confidenceBooster: booster,
        },
    };
}

/**
 * Apply an exposure multiplier (clamped to [0, 2]) to an amount.
 */
export function applyExposureToAmount(amount: number, exposureMultiplier: number): number {
    if (!Number.isFinite(amount) || !Number.isFinite(exposureMultiplier)) return 0;
    if (amount <= 0) return 0;

    const finalAmount = amount * clampExposure(exposureMultiplier);
    return finalAmount > 0 ? round2(finalAmount) : 0;
}

// =============================================================================
// Helpers
// =============================================================================

function transitionDampener(transitionRisk: number | null | undefined): number {
    if (typeof transitionRisk !== 'number' || !Number.isFinite(transitionRisk)) return 1;

    const risk = Math.max(0, Math.min(transitionRisk, 1));
    if (risk >= 0.8) return 0.25;
    if (risk >= 0.6) return 0.45;
    if (risk >= 0.4) return 0.65;
    if (risk >= 0.2) return 0.85;
    return 1;
}

function confidenceBooster(confidence: number | null | undefined): number {
    if (typeof confidence !== 'number' || !Number.isFinite(confidence)) return 1;

    const c = confidence > 1 ? confidence / 100 : confidence;
    if (c >= 0.8) return 1.1;
    if (c <= 0.4) return 0.9;
    return 1;
}

function riskModeFor(multiplier: number): RiskMode {
    if (multiplier <= 0.4) return 'risk_off';
    if (multiplier <= 0.9) return 'defensive';
    if (multiplier <= 1.2) return 'neutral';
    return 'risk_on';
}

function clampExposure(n: number): number {
    return Math.max(MIN_EXPOSURE, Math.min(n, MAX_EXPOSURE));
}

function round2(n: number): number {
    return Math.round(n * 100) / 100;
}

function round3(n: number): number {
    return Math.round(n * 1000) / 1000;
}
