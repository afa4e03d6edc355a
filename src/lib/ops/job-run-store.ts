/**
 * Job Run Store — Job Execution History
 *
 * Every scheduled job writes one row to ops_job_runs. A failed write is
 * logged and never fails the job itself.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

// =============================================================================
// Types
// =============================================================================

export type JobOutcome = 'ran' | 'skipped_locked' | 'error';

export interface WriteJobRunParams {
    runId: string;
    jobName: string;
    startedAt: string;
    outcome: JobOutcome;
    rowsWritten?: number;
    errorSummary?: string;
}

// =============================================================================
// Write
// =============================================================================

export async function writeJobRun(db: SupabaseClient, params: WriteJobRunParams): Promise<void> {
    const { error } = await db
        .from('ops_job_runs')
        .insert({
            run_id: params.runId,
            job_name: params.jobName,
            started_at: params.startedAt,
            finished_at: new Date().toISOString(),
            outcome: params.outcome,
            rows_written: params.rowsWritten ?? 0,
            error_summary: params.errorSummary?.slice(0, 500) ?? null,
        });

    if (error) {
        console.error('[JobRunStore] writeJobRun error:', error.message.slice(0, 200));
    }
}
