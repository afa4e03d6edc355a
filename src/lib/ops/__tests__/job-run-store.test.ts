import type { SupabaseClient } from '@supabase/supabase-js';
import { writeJobRun } from '../job-run-store';

function mockDb(insertResult: { error: null | { message: string } } = { error: null }) {
    const insert = jest.fn().mockResolvedValue(insertResult);
    const from = jest.fn(() => ({ insert }));
    return { db: { from } as unknown as SupabaseClient, from, insert };
}

describe('writeJobRun', () => {
    it('inserts a run row with defaults', async () => {
        const { db, from, insert } = mockDb();

        await writeJobRun(db, {
            runId: 'run-1',
            jobName: 'daily-score',
            startedAt: '2026-03-01T06:00:00.000Z',
            outcome: 'skipped_locked',
        });

        expect(from).toHaveBeenCalledWith('ops_job_runs');
        expect(insert).toHaveBeenCalledWith(expect.objectContaining({
            run_id: 'run-1',
            job_name: 'daily-score',
            outcome: 'skipped_locked',
            rows_written: 0,
            error_summary: null,
        }));
    });

    it('truncates long error summaries', async () => {
        const { db, insert } = mockDb();

        await writeJobRun(db, {
            runId: 'run-1',
            jobName: 'daily-score',
            startedAt: '2026-03-01T06:00:00.000Z',
            outcome: 'error',
            errorSummary: 'x'.repeat(800),
        });

        expect(insert.mock.calls[0][0].error_summary).toHaveLength(500);
    });

    it('logs a failed write without throwing', async () => {
        const { db } = mockDb({ error: { message: 'denied' } });
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        await writeJobRun(db, {
            runId: 'run-1',
            jobName: 'daily-score',
            startedAt: '2026-03-01T06:00:00.000Z',
            outcome: 'ran',
        });

        expect(errorSpy).toHaveBeenCalledWith('[JobRunStore] writeJobRun error:', 'denied');
        errorSpy.mockRestore();
    });
});
