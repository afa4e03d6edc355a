/**
 * Engine Config
 *
 * Reads engine parameters from env vars with sane defaults.
 * No side effects — just reads process.env at call time.
 */

import * as path from 'path';
import { DEFAULT_MAX_WEIGHT, DEFAULT_MIN_WEIGHT, type RegimeWeightOptions } from '../scoring/regime-weights';

// =============================================================================
// Types
// =============================================================================

export interface EngineConfig {
    /** Directory holding macro.json, technical.json, market.json (+ sentiment.json) */
    indicatorConfigDir: string;
    regimeMinWeight: number;
    regimeMaxWeight: number;
    scoreJobLockTtlSeconds: number;
    executionJobLockTtlSeconds: number;
    narrativeModel: string;
    narrativeTimeoutMs: number;
}

// =============================================================================
// Defaults
// =============================================================================

const DEFAULTS = {
    indicatorConfigDir: path.join('config', 'indicators'),
    regimeMinWeight: DEFAULT_MIN_WEIGHT,
    regimeMaxWeight: DEFAULT_MAX_WEIGHT,
    scoreJobLockTtlSeconds: 300,
    executionJobLockTtlSeconds: 300,
    narrativeModel: 'gpt-4o-mini',
    narrativeTimeoutMs: 30000,
};

// =============================================================================
// Getter
// =============================================================================

export function getEngineConfig(): EngineConfig {
    const dir = process.env.INDICATOR_CONFIG_DIR?.trim() || DEFAULTS.indicatorConfigDir;

    let regimeMinWeight = parseEnvNumber('REGIME_MIN_WEIGHT', DEFAULTS.regimeMinWeight);
    let regimeMaxWeight = parseEnvNumber('REGIME_MAX_WEIGHT', DEFAULTS.regimeMaxWeight);
    if (regimeMinWeight <= 0 || regimeMinWeight > regimeMaxWeight) {
        console.warn(`[EngineConfig] Ignoring regime weight bounds ${regimeMinWeight}..${regimeMaxWeight}`);
        regimeMinWeight = DEFAULTS.regimeMinWeight;
        regimeMaxWeight = DEFAULTS.regimeMaxWeight;
    }

    return {
        indicatorConfigDir: path.resolve(process.cwd(), dir),
        regimeMinWeight,
        regimeMaxWeight,
        scoreJobLockTtlSeconds: parseEnvNumber('SCORE_JOB_LOCK_TTL_SECONDS', DEFAULTS.scoreJobLockTtlSeconds),
        executionJobLockTtlSeconds: parseEnvNumber(
            'EXECUTION_JOB_LOCK_TTL_SECONDS',
            DEFAULTS.executionJobLockTtlSeconds,
        ),
        narrativeModel: process.env.NARRATIVE_MODEL?.trim() || DEFAULTS.narrativeModel,
        narrativeTimeoutMs: parseEnvNumber('NARRATIVE_TIMEOUT_MS', DEFAULTS.narrativeTimeoutMs),
    };
}

/**
 * Clamp bounds for createRegimeWeighting / applyRegimeWeights.
 */
export function getRegimeWeightOptions(config: EngineConfig = getEngineConfig()): RegimeWeightOptions {
    return { minWeight: config.regimeMinWeight, maxWeight: config.regimeMaxWeight };
}

// =============================================================================
// Helpers
// =============================================================================

function parseEnvNumber(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw == null || raw === '') return fallback;
    const parsed = parseFloat(raw);
    return isNaN(parsed) ? fallback : parsed;
}
