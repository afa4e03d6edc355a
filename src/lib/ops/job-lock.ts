/**
 * Job Lock — DB-backed Advisory Locks for Scheduled Jobs
 *
 * Uses the ops_job_locks table so only one instance of a job runs at a time.
 * Stale locks auto-expire based on TTL.
 *
 * - acquireLock never throws: a failed check or insert means "not acquired"
 * - releaseLock only touches the row holding the caller's run id
 * - expireStaleLocks cleans up after crashed jobs
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';

const LOCK_TABLE = 'ops_job_locks';

// =============================================================================
// Types
// =============================================================================

export interface LockResult {
    acquired: boolean;
    runId: string;
    reason?: string;
}

interface LockRow {
    job_name: string;
    run_id: string;
    expires_at: string;
    released_at: string | null;
}

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Attempt to acquire a named job lock.
 *
 * 1. Read the current row for the job
 * 2. Active (not expired, not released) → skip
 * 3. Stale or released → delete, then insert a fresh row
 */
export async function acquireLock(
    db: SupabaseClient,
    jobName: string,
    ttlSeconds: number = 120,
    runId: string = uuidv4(),
): Promise<LockResult> {
    const now = new Date();
    const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);

    const { data, error: readError } = await db
        .from(LOCK_TABLE)
        .select('job_name, run_id, expires_at, released_at')
        .eq('job_name', jobName)
        .limit(1)
        .maybeSingle();

    if (readError) {
        return {
            acquired: false,
            runId,
            reason: `Lock check failed: ${readError.message.slice(0, 100)}`,
        };
    }

    const existing: LockRow | null = data;
    if (existing) {
        const isReleased = Boolean(existing.released_at);
        const isExpired = new Date(existing.expires_at) <= now;

        if (!isReleased && !isExpired) {
            return {
                acquired: false,
                runId: existing.run_id,
                reason: `Lock held by ${existing.run_id}, expires at ${existing.expires_at}`,
            };
        }

        await db.from(LOCK_TABLE).delete().eq('job_name', jobName);
    }

    const { error } = await db
        .from(LOCK_TABLE)
        .insert({
            job_name: jobName,
            run_id: runId,
            acquired_at: now.toISOString(),
            expires_at: expiresAt.toISOString(),
            released_at: null,
            last_error: null,
        });

    if (error) {
        // Another process inserted first
        return {
            acquired: false,
            runId,
            reason: `Insert failed (race): ${error.message.slice(0, 100)}`,
        };
    }

    return { acquired: true, runId };
}

/**
 * Mark a lock released, recording the job's error if it failed.
 */
export async function releaseLock(
    db: SupabaseClient,
    jobName: string,
    runId: string,
    errorMessage?: string,
): Promise<void> {
    const { error } = await db
        .from(LOCK_TABLE)
        .update({
            released_at: new Date().toISOString(),
            last_error: errorMessage?.slice(0, 500) ?? null,
        })
        .eq('job_name', jobName)
        .eq('run_id', runId);

    if (error) {
        console.error(`[JobLock] releaseLock ${jobName} error:`, error.message.slice(0, 200));
    }
}

/**
 * Delete every unreleased lock past its expires_at.
 */
export async function expireStaleLocks(db: SupabaseClient): Promise<{ expired: number }> {
    const now = new Date().toISOString();

    const { data, error } = await db
        .from(LOCK_TABLE)
        .delete()
        .lt('expires_at', now)
        .is('released_at', null)
        .select('job_name');

    if (error) {
        throw new Error(`Failed to expire stale locks: ${error.message}`);
    }

    return { expired: data?.length ?? 0 };
}
