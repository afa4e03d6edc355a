/**
 * Indicator Scorer — Threshold Bands
 *
 * Maps a raw indicator value to a discrete 25 / 50 / 75 / 100 score using
 * three ascending thresholds, and averages the scores of a category.
 *
 * Missing data is never fabricated: a null or non-numeric value scores null
 * and is left out of the category average.
 */

// =============================================================================
// Types
// =============================================================================

export type IndicatorScore = 25 | 50 | 75 | 100;

export interface IndicatorRule {
    /** Exactly 3 ascending boundary values */
    thresholds: number[];
    /** true when a higher raw value is better */
    positive: boolean;
}

/** Indicator name → scoring rule */
export type IndicatorConfig = Record<string, IndicatorRule>;

export interface IndicatorScoreDetail {
    value: unknown;
    score: IndicatorScore | null;
    thresholds: number[];
    positive: boolean;
}

export interface GeneratedScores {
    scores: Record<string, IndicatorScoreDetail>;
    /** Mean of the non-null scores, 2 decimals; null when none were computable */
    totalScore: number | null;
}

export const DEFAULT_THRESHOLDS: readonly number[] = [0, 50, 100];

// =============================================================================
// Single indicator
// =============================================================================

/**
 * Score one value against its thresholds.
 *
 * Thresholds that are not exactly three numbers fall back to [0, 50, 100]
 * with a warning; the config loader rejects such files up front, so this
 * path is only reachable with configs built in code.
 */
export function calculateScore(
    value: unknown,
    thresholds: readonly number[],
    positive: boolean = true,
): IndicatorScore | null {
    if (value === null || value === undefined) return null;

    const numeric = toNumber(value);
    if (numeric === null) {
        console.warn(`[IndicatorScorer] Invalid indicator value: ${JSON.stringify(value)}`);
        return null;
    }

    const [low, mid, high] = resolveThresholds(thresholds);

    if (positive) {
        if (numeric > high) return 100;
        if (numeric > mid) return 75;
        if (numeric > low) return 50;
        return 25;
    }

    if (numeric < low) return 100;
    if (numeric < mid) return 75;
    if (numeric < high) return 50;
    return 25;
}

// =============================================================================
// Category
// =============================================================================

/**
 * Score every configured indicator found in `data`.
 * Keys are matched case-insensitively; an exact match wins.
 */
export function generateScores(
    data: Record<string, unknown>,
    config: IndicatorConfig,
): GeneratedScores {
    const lowered = new Map<string, unknown>();
    for (const [key, value] of Object.entries(data)) {
        const k = key.toLowerCase();
        if (!lowered.has(k)) lowered.set(k, value);
    }

    const scores: Record<string, IndicatorScoreDetail> = {};
    let total = 0;
    let count = 0;

    for (const [name, rule] of Object.entries(config)) {
        const value = Object.prototype.hasOwnProperty.call(data, name)
            ? data[name]
            : lowered.get(name.toLowerCase());

        const score = calculateScore(value, rule.thresholds, rule.positive);

        scores[name] = {
            value: value ?? null,
            score,
            thresholds: rule.thresholds,
            positive: rule.positive,
        };

        if (score !== null) {
            total += score;
            count++;
        }
    }

    const totalScore = count > 0 ? round2(total / count) : null;
    console.log(`[IndicatorScorer] Scored ${count}/${Object.keys(config).length} indicators (average: ${totalScore ?? 'n/a'})`);

    return { scores, totalScore };
}

// =============================================================================
// Helpers
// =============================================================================

function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function resolveThresholds(thresholds: readonly number[]): readonly [number, number, number] {
    if (thresholds.length === 3 && thresholds.every(t => Number.isFinite(t))) {
        return [thresholds[0], thresholds[1], thresholds[2]];
    }

    console.warn(`[IndicatorScorer] Invalid thresholds ${JSON.stringify(thresholds)}, using [${DEFAULT_THRESHOLDS.join(', ')}]`);
    return [DEFAULT_THRESHOLDS[0], DEFAULT_THRESHOLDS[1], DEFAULT_THRESHOLDS[2]];
}

function round2(n: number): number {
    return Math.round(n * 100) / 100;
}
