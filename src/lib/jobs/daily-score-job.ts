/**
 * Daily Score Job
 *
 * Turns the latest raw indicator values into the day's category scores:
 *   1. acquire the ops_job_locks lock (TTL from SCORE_JOB_LOCK_TTL_SECONDS)
 *   2. load latest indicator values for the symbol
 *   3. build the score snapshot
 *   4. upsert daily_scores for the date
 *   5. record the run, release the lock
 *
 * Never throws once it has a client: failures come back as outcome 'error'
 * and are recorded on both the run row and the lock. Without `db` the
 * service-role client is used.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { getEngineConfig } from '../config/engine-config';
import { acquireLock, releaseLock } from '../ops/job-lock';
import { writeJobRun, type JobOutcome } from '../ops/job-run-store';
import { buildScoreSnapshot, type CategoryScoreSnapshot, type ScoringConfig } from '../scoring/score-snapshot';
import { loadLatestIndicatorValues } from '../store/indicator-store';
import { writeDailyScores } from '../store/score-store';
import { createServerSupabase } from '../supabase/server';

export const DAILY_SCORE_JOB = 'daily-score';

export interface DailyScoreJobOptions {
    db?: SupabaseClient;
    scoringConfig: ScoringConfig;
    /** YYYY-MM-DD, defaults to today (UTC) */
    date?: string;
    symbol?: string;
    lockTtlSeconds?: number;
}

export interface DailyScoreJobResult {
    outcome: JobOutcome;
    runId: string;
    date: string;
    snapshot?: CategoryScoreSnapshot;
    reason?: string;
    error?: string;
}

export async function runDailyScoreJob(options: DailyScoreJobOptions): Promise<DailyScoreJobResult> {
    const { scoringConfig } = options;
    const db = options.db ?? createServerSupabase();
    const startedAt = new Date().toISOString();
    const date = options.date ?? startedAt.slice(0, 10);
    const symbol = (options.symbol ?? 'BTC').toUpperCase();
    const ttl = options.lockTtlSeconds ?? getEngineConfig().scoreJobLockTtlSeconds;

    // ── Lock ─────────────────────────────────────────────────────────────
    const lock = await acquireLock(db, DAILY_SCORE_JOB, ttl, uuidv4());
    if (!lock.acquired) {
        console.log(`[ScoreJob] Skipped: ${lock.reason ?? 'lock not acquired'}`);
        await writeJobRun(db, { runId: lock.runId, jobName: DAILY_SCORE_JOB, startedAt, outcome: 'skipped_locked' });
        return { outcome: 'skipped_locked', runId: lock.runId, date, reason: lock.reason };
    }

    const runId = lock.runId;

    // ── Score ────────────────────────────────────────────────────────────
    try {
        const values = await loadLatestIndicatorValues(db, symbol);
        const { snapshot } = buildScoreSnapshot(values, scoringConfig);
        await writeDailyScores(db, date, snapshot);

        console.log(`[ScoreJob] ${date} ${symbol}: ${JSON.stringify(snapshot)}`);
        await writeJobRun(db, { runId, jobName: DAILY_SCORE_JOB, startedAt, outcome: 'ran', rowsWritten: 1 });
        await releaseLock(db, DAILY_SCORE_JOB, runId);

        return { outcome: 'ran', runId, date, snapshot };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[ScoreJob] Failed:', message.slice(0, 200));

        await writeJobRun(db, { runId, jobName: DAILY_SCORE_JOB, startedAt, outcome: 'error', errorSummary: message });
        await releaseLock(db, DAILY_SCORE_JOB, runId, message);

        return { outcome: 'error', runId, date, error: message };
    }
}
