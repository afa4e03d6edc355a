/**
 * Setup Store — Trading Setups
 *
 * Reads active setups into the typed Setup union and persists decision
 * curves. Saving a curve is the only write path for decision_curve, and it
 * validates the curve first.
 *
 * All functions accept a SupabaseClient (server service-role).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { validateDecisionCurve } from '../curves/curve-validator';
import type { DecisionCurve } from '../curves/curve-types';
import { parseSetup } from '../decision/setup-parser';
import { DecisionError, type Setup } from '../decision/setup-types';

const SETUP_COLUMNS = 'id, name, symbol, execution_mode, base_amount, decision_curve, pause_conditions';

// =============================================================================
// Read
// =============================================================================

/**
 * Load every active setup. Rows that do not parse are skipped with a
 * warning so one broken setup cannot block the rest.
 */
export async function loadActiveSetups(supabase: SupabaseClient): Promise<Setup[]> {
    const { data, error } = await supabase
        .from('setups')
        .select(SETUP_COLUMNS)
        .eq('is_active', true)
        .order('id', { ascending: true });

    if (error) {
        console.error('[SetupStore] loadActiveSetups error:', error);
        throw new Error(`Failed to load setups: ${error.message}`);
    }

    const setups: Setup[] = [];
    for (const row of data ?? []) {
        try {
            setups.push(parseSetup(row));
        } catch (err) {
            if (!(err instanceof DecisionError)) throw err;
            console.warn(`[SetupStore] Skipping setup ${String(row.id)}: ${err.message}`);
        }
    }

    return setups;
}

// =============================================================================
// Write
// =============================================================================

/**
 * Validate and store a decision curve on a setup.
 * Throws CurveError for an invalid curve without touching the DB.
 */
export async function saveDecisionCurve(
    supabase: SupabaseClient,
    setupId: string,
    curve: unknown,
): Promise<DecisionCurve> {
    validateDecisionCurve(curve);

    const { error } = await supabase
        .from('setups')
        .update({ decision_curve: curve, updated_at: new Date().toISOString() })
        .eq('id', setupId);

    if (error) {
        console.error('[SetupStore] saveDecisionCurve error:', error);
        throw new Error(`Failed to save decision curve: ${error.message}`);
    }

    return curve;
}
