/**
 * Score Snapshot Builder
 *
 * Runs the indicator scorer once per category and collects the category
 * averages into the snapshot the decision engine consumes.
 */

import { generateScores, type GeneratedScores, type IndicatorConfig } from './indicator-scorer';

// =============================================================================
// Types
// =============================================================================

export type ScoreCategory = 'macro' | 'technical' | 'market' | 'sentiment';

export const SCORE_CATEGORIES: readonly ScoreCategory[] = ['macro', 'technical', 'market', 'sentiment'];

/** Indicator configs per category, loaded once and passed in */
export type ScoringConfig = Partial<Record<ScoreCategory, IndicatorConfig>>;

/** Score key → value; null means insufficient data */
export type ScoreSnapshot = Record<string, number | null | undefined>;

export interface CategoryScoreSnapshot extends ScoreSnapshot {
    macro_score: number | null;
    technical_score: number | null;
    market_score: number | null;
    sentiment_score: number | null;
}

export interface ScoreSnapshotResult {
    snapshot: CategoryScoreSnapshot;
    details: Partial<Record<ScoreCategory, GeneratedScores>>;
}

// =============================================================================
// Builder
// =============================================================================

export function scoreKeyFor(category: ScoreCategory): `${ScoreCategory}_score` {
    return `${category}_score`;
}

export function buildScoreSnapshot(
    data: Record<string, unknown>,
    config: ScoringConfig,
): ScoreSnapshotResult {
    const snapshot: CategoryScoreSnapshot = {
        macro_score: null,
        technical_score: null,
        market_score: null,
        sentiment_score: null,
    };
    const details: Partial<Record<ScoreCategory, GeneratedScores>> = {};

    for (const category of SCORE_CATEGORIES) {
        const categoryConfig = config[category];
        if (!categoryConfig) continue;

        const generated = generateScores(data, categoryConfig);
        details[category] = generated;
        snapshot[scoreKeyFor(category)] = generated.totalScore;
    }

    return { snapshot, details };
}
