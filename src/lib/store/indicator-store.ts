/**
 * Indicator Store — Latest Raw Indicator Values
 *
 * Merges the newest value of every indicator into one flat map for the
 * scorer:
 *   - macro_data: one row per (name, value, timestamp); newest row per name
 *   - technical_data / market_data: one wide row per symbol; newest row wins
 *
 * Values that are not numeric come back as null (insufficient data).
 */

import type { SupabaseClient } from '@supabase/supabase-js';

export type IndicatorValues = Record<string, number | null>;

/** Columns of the wide tables that are not indicators */
const META_COLUMNS = new Set(['id', 'symbol', 'timestamp', 'created_at', 'updated_at']);

const MACRO_ROW_LIMIT = 500;

// =============================================================================
// Read
// =============================================================================

export async function loadLatestIndicatorValues(
    supabase: SupabaseClient,
    symbol: string = 'BTC',
): Promise<IndicatorValues> {
    const macro = await loadLatestMacroValues(supabase);
    const technical = await loadLatestWideRow(supabase, 'technical_data', symbol);
    const market = await loadLatestWideRow(supabase, 'market_data', symbol);

    const values: IndicatorValues = { ...macro, ...technical, ...market };
    console.log(`[IndicatorStore] Loaded ${Object.keys(values).length} indicator values for ${symbol}`);
    return values;
}

async function loadLatestMacroValues(supabase: SupabaseClient): Promise<IndicatorValues> {
    const { data, error } = await supabase
        .from('macro_data')
        .select('name, value, timestamp')
        .order('timestamp', { ascending: false })
        .limit(MACRO_ROW_LIMIT);

    if (error) {
        console.error('[IndicatorStore] macro_data error:', error);
        throw new Error(`Failed to load macro data: ${error.message}`);
    }

    const values: IndicatorValues = {};
    for (const row of data ?? []) {
        if (typeof row.name !== 'string' || Object.prototype.hasOwnProperty.call(values, row.name)) continue;
        values[row.name] = toNumberOrNull(row.value);
    }
    return values;
}

async function loadLatestWideRow(
    supabase: SupabaseClient,
    table: 'technical_data' | 'market_data',
    symbol: string,
): Promise<IndicatorValues> {
    const { data, error } = await supabase
        .from(table)
        .select('*')
        .eq('symbol', symbol.toUpperCase())
        .order('timestamp', { ascending: false })
        .limit(1)
        .maybeSingle();

    if (error) {
        console.error(`[IndicatorStore] ${table} error:`, error);
        throw new Error(`Failed to load ${table}: ${error.message}`);
    }

    const values: IndicatorValues = {};
    if (!data) return values;

    for (const [column, value] of Object.entries<unknown>(data)) {
        if (META_COLUMNS.has(column)) continue;
        values[column] = toNumberOrNull(value);
    }
    return values;
}

// =============================================================================
// Helpers
// =============================================================================

function toNumberOrNull(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const n = Number(value);
        return Number.isFinite(n) ? n : null;
    }
    return null;
}
