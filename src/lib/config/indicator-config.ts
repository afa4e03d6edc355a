/**
 * Indicator Config Loader
 *
 * Loads the per-category indicator scoring rules from JSON files once, so
 * callers can inject the result into the scorer. Thresholds are checked
 * strictly here: exactly three ascending numbers, or the file is rejected.
 *
 * Files (in the config directory):
 *   macro.json, technical.json, market.json   (required)
 *   sentiment.json                            (optional)
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { IndicatorConfig } from '../scoring/indicator-scorer';
import type { ScoreCategory, ScoringConfig } from '../scoring/score-snapshot';

// =============================================================================
// Schema
// =============================================================================

const indicatorRuleSchema = z.object({
    thresholds: z
        .tuple([z.number().finite(), z.number().finite(), z.number().finite()])
        .refine(([low, mid, high]) => low < mid && mid < high, {
            message: 'thresholds must be strictly ascending',
        }),
    positive: z.boolean().default(true),
    description: z.string().optional(),
});

export const indicatorConfigSchema = z.record(z.string().min(1), indicatorRuleSchema);

const CATEGORY_FILES: ReadonlyArray<{ category: ScoreCategory; file: string; required: boolean }> = [
    { category: 'macro', file: 'macro.json', required: true },
    { category: 'technical', file: 'technical.json', required: true },
    { category: 'market', file: 'market.json', required: true },
    { category: 'sentiment', file: 'sentiment.json', required: false },
];

// =============================================================================
// Loaders
// =============================================================================

/**
 * Parse indicator rules from an already-decoded JSON value.
 */
export function parseIndicatorConfig(raw: unknown, source: string): IndicatorConfig {
    const parsed = indicatorConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new Error(`Indicator config ${source} is invalid — ${where}${issue?.message ?? 'unknown error'}`);
    }

    const config: IndicatorConfig = {};
    for (const [name, rule] of Object.entries(parsed.data)) {
        config[name] = { thresholds: [...rule.thresholds], positive: rule.positive };
    }
    return config;
}

/**
 * Load one indicator config file.
 * Throws if the file is missing, not JSON, or fails validation.
 */
export function loadIndicatorConfig(filePath: string): IndicatorConfig {
    const name = path.basename(filePath);

    if (!fs.existsSync(filePath)) {
        throw new Error(`Indicator config not found: ${filePath}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        const message = error instanceof Error ? error.message : 'unknown error';
        throw new Error(`Indicator config ${name} is not valid JSON — ${message}`);
    }

    return parseIndicatorConfig(raw, name);
}

/**
 * Load every category config from a directory.
 */
export function loadScoringConfig(configDir: string): ScoringConfig {
    const config: ScoringConfig = {};

    for (const { category, file, required } of CATEGORY_FILES) {
        const filePath = path.join(configDir, file);
        if (!required && !fs.existsSync(filePath)) continue;
        config[category] = loadIndicatorConfig(filePath);
    }

    const counts = CATEGORY_FILES
        .map(({ category }) => `${category}=${Object.keys(config[category] ?? {}).length}`)
        .join(', ');
    console.log(`[IndicatorConfig] Loaded from ${configDir} (${counts})`);

    return config;
}
