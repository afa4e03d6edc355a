/**
 * Execution Plan Job
 *
 * Sizes every active setup against the latest daily scores and records one
 * bot_decisions row per setup:
 *   buy    → amount > 0
 *   hold   → amount settled at 0
 *   paused → a pause condition fired
 *   error  → the setup could not be sized (recorded, batch continues)
 *
 * An optional regime context runs the policy engine and scales every
 * unpaused amount through the exposure engine, inside the policy caps. A
 * buy the policy does not allow is recorded as a hold.
 *
 * Without `db` the service-role client is used.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { CurveError } from '../curves/curve-types';
import { getEngineConfig } from '../config/engine-config';
import { computeExecution } from '../decision/execution-service';
import {
    computeExposureMultiplier,
    type ExposureResult,
    type PolicyCaps,
    type RegimeMemory,
} from '../decision/exposure-engine';
import { evaluatePolicy, type PolicyDecision } from '../decision/policy-engine';
import { DecisionError, type Setup } from '../decision/setup-types';
import { acquireLock, releaseLock } from '../ops/job-lock';
import { writeJobRun, type JobOutcome } from '../ops/job-run-store';
import type { ScoreSnapshot } from '../scoring/score-snapshot';
import { writeBotDecisions, type BotDecision } from '../store/decision-store';
import { loadLatestScores } from '../store/score-store';
import { loadActiveSetups } from '../store/setup-store';
import { createServerSupabase } from '../supabase/server';

export const EXECUTION_PLAN_JOB = 'execution-plan';

export interface ExposureContext {
    regimeMemory: RegimeMemory | null;
    transitionRisk?: number | null;
    /** 0–1, feeds the policy engine; missing → 0.5 */
    marketPressure?: number | null;
    /** Overrides the caps derived from the policy */
    policyCaps?: PolicyCaps;
}

export interface ExecutionPlanJobOptions {
    db?: SupabaseClient;
    /** YYYY-MM-DD, defaults to today (UTC) */
    date?: string;
    exposure?: ExposureContext;
    lockTtlSeconds?: number;
}

export interface ExecutionPlanJobResult {
    outcome: JobOutcome;
    runId: string;
    date: string;
    decisions: BotDecision[];
    exposure?: ExposureResult;
    policy?: PolicyDecision;
    reason?: string;
    error?: string;
}

export async function runExecutionPlanJob(options: ExecutionPlanJobOptions): Promise<ExecutionPlanJobResult> {
    const db = options.db ?? createServerSupabase();
    const startedAt = new Date().toISOString();
    const date = options.date ?? startedAt.slice(0, 10);
    const ttl = options.lockTtlSeconds ?? getEngineConfig().executionJobLockTtlSeconds;

    // ── Lock ─────────────────────────────────────────────────────────────
    const lock = await acquireLock(db, EXECUTION_PLAN_JOB, ttl, uuidv4());
    if (!lock.acquired) {
        console.log(`[ExecutionPlan] Skipped: ${lock.reason ?? 'lock not acquired'}`);
        await writeJobRun(db, { runId: lock.runId, jobName: EXECUTION_PLAN_JOB, startedAt, outcome: 'skipped_locked' });
        return { outcome: 'skipped_locked', runId: lock.runId, date, decisions: [], reason: lock.reason };
    }

    const runId = lock.runId;

    // ── Plan ─────────────────────────────────────────────────────────────
    try {
        const latest = await loadLatestScores(db);
        if (!latest) {
            throw new Error('No daily scores available');
        }
        const { score_date: scoreDate, ...scores } = latest;

        const context = options.exposure;
        const policy = context
            ? evaluatePolicy({
                scores,
                transitionRisk: context.transitionRisk,
                marketPressure: context.marketPressure,
                regimeLabel: context.regimeMemory?.label,
            })
            : undefined;
        const exposure = context && policy
            ? computeExposureMultiplier(context.regimeMemory, context.transitionRisk, {
                policyCaps: context.policyCaps ?? {
                    min: policy.minExposureMultiplier,
                    max: policy.maxExposureMultiplier,
                },
            })
            : undefined;

        const setups = await loadActiveSetups(db);
        const decisions = setups.map(setup => planSetup(setup, scores, {
            runId,
            date,
            scoreDate,
            exposureMultiplier: exposure?.multiplier ?? null,
            buyAllowed: policy ? policy.allowedActions.includes('buy') : true,
        }));

        const { written } = await writeBotDecisions(db, decisions);
        const errors = decisions.filter(d => d.action === 'error').length;
        console.log(`[ExecutionPlan] ${date}: ${written} decisions (${errors} errors), scores from ${scoreDate}`);

        await writeJobRun(db, { runId, jobName: EXECUTION_PLAN_JOB, startedAt, outcome: 'ran', rowsWritten: written });
        await releaseLock(db, EXECUTION_PLAN_JOB, runId);

        return { outcome: 'ran', runId, date, decisions, exposure, policy };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[ExecutionPlan] Failed:', message.slice(0, 200));

        await writeJobRun(db, { runId, jobName: EXECUTION_PLAN_JOB, startedAt, outcome: 'error', errorSummary: message });
        await releaseLock(db, EXECUTION_PLAN_JOB, runId, message);

        return { outcome: 'error', runId, date, decisions: [], error: message };
    }
}

// =============================================================================
// Helpers
// =============================================================================

function planSetup(
    setup: Setup,
    scores: ScoreSnapshot,
    ctx: { runId: string; date: string; scoreDate: string; exposureMultiplier: number | null; buyAllowed: boolean },
): BotDecision {
    const base = {
        runId: ctx.runId,
        decisionDate: ctx.date,
        setupId: setup.id ?? null,
        symbol: setup.symbol ?? null,
        scores,
    };

    try {
        const result = computeExecution(setup, scores, { exposureMultiplier: ctx.exposureMultiplier });
        const wantsBuy = !result.paused && result.amount > 0;
        const blocked = wantsBuy && !ctx.buyAllowed;
        const action = result.paused ? 'paused' : wantsBuy && !blocked ? 'buy' : 'hold';
        return {
            ...base,
            action,
            amount: blocked ? 0 : result.amount,
            reason: {
                executionMode: setup.executionMode,
                decidedAmount: result.decidedAmount,
                pauseReason: result.pauseReason,
                exposureMultiplier: result.exposureMultiplier,
                ...(blocked ? { policyBlocked: true } : {}),
                scoreDate: ctx.scoreDate,
            },
        };
    } catch (err) {
        if (!(err instanceof DecisionError || err instanceof CurveError)) throw err;
        console.warn(`[ExecutionPlan] Setup ${setup.id ?? setup.name ?? '?'} not sized: ${err.message}`);
        return {
            ...base,
            action: 'error',
            amount: 0,
            reason: { executionMode: setup.executionMode, error: err.message, scoreDate: ctx.scoreDate },
        };
    }
}
