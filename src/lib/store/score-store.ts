/**
 * Score Store — Daily Category Scores
 *
 * One row per score_date in daily_scores. Re-running the daily job for a
 * date overwrites that date's row. Missing category scores are stored as
 * NULL, never as 0.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { CategoryScoreSnapshot } from '../scoring/score-snapshot';

/** A stored daily_scores row; kept apart from the indexed snapshot type */
export type DailyScoreRow = {
    score_date: string;
    macro_score: number | null;
    technical_score: number | null;
    market_score: number | null;
    sentiment_score: number | null;
};

// =============================================================================
// Write (upsert)
// =============================================================================

export async function writeDailyScores(
    supabase: SupabaseClient,
    date: string,
    snapshot: CategoryScoreSnapshot,
): Promise<void> {
    const row = {
        score_date: date,
        macro_score: snapshot.macro_score,
        technical_score: snapshot.technical_score,
        market_score: snapshot.market_score,
        sentiment_score: snapshot.sentiment_score,
        updated_at: new Date().toISOString(),
    };

    const { error } = await supabase
        .from('daily_scores')
        .upsert(row, { onConflict: 'score_date' });

    if (error) {
        console.error('[ScoreStore] writeDailyScores error:', error);
        throw new Error(`Failed to write daily scores: ${error.message}`);
    }
}

// =============================================================================
// Read
// =============================================================================

/**
 * Most recent daily scores, or null when none have been written yet.
 */
export async function loadLatestScores(supabase: SupabaseClient): Promise<DailyScoreRow | null> {
    const { data, error } = await supabase
        .from('daily_scores')
        .select('score_date, macro_score, technical_score, market_score, sentiment_score')
        .order('score_date', { ascending: false })
        .limit(1)
        .maybeSingle();

    if (error) {
        console.error('[ScoreStore] loadLatestScores error:', error);
        throw new Error(`Failed to load latest scores: ${error.message}`);
    }
    if (!data) return null;

    return {
        score_date: String(data.score_date),
        macro_score: toScore(data.macro_score),
        technical_score: toScore(data.technical_score),
        market_score: toScore(data.market_score),
        sentiment_score: toScore(data.sentiment_score),
    };
}

function toScore(value: unknown): number | null {
    if (value == null) return null;
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
}
