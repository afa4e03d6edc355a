/**
 * Decision Store — Planned Bot Decisions
 *
 * Append-only log of what the execution-plan job decided per setup.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ScoreSnapshot } from '../scoring/score-snapshot';

export type DecisionAction = 'buy' | 'hold' | 'paused' | 'error';

export interface BotDecision {
    runId: string;
    decisionDate: string;
    setupId: string | null;
    symbol: string | null;
    action: DecisionAction;
    amount: number;
    scores: ScoreSnapshot;
    reason: Record<string, unknown>;
}

export async function writeBotDecisions(
    supabase: SupabaseClient,
    decisions: BotDecision[],
): Promise<{ written: number }> {
    if (decisions.length === 0) return { written: 0 };

    const rows = decisions.map(d => ({
        run_id: d.runId,
        decision_date: d.decisionDate,
        setup_id: d.setupId,
        symbol: d.symbol,
        action: d.action,
        amount: d.amount,
        scores_json: d.scores,
        reason_json: d.reason,
        status: 'planned',
    }));

    const { error } = await supabase
        .from('bot_decisions')
        .insert(rows);

    if (error) {
        console.error('[DecisionStore] writeBotDecisions error:', error);
        throw new Error(`Failed to write bot decisions: ${error.message}`);
    }

    return { written: rows.length };
}
