/**
 * Decision Prompt Builder
 *
 * The single point of construction for decision-explanation prompts.
 * Output is deterministic for a given input: scores are listed in key
 * order and every missing value is spelled out as INSUFFICIENT DATA, so the
 * model is never left to fill a gap.
 */

import type { ExecutionMode } from '../decision/setup-types';
import type { ScoreSnapshot } from '../scoring/score-snapshot';

export const INSUFFICIENT_DATA = 'INSUFFICIENT DATA';

export interface DecisionExplanationInput {
    setupName: string;
    symbol?: string | null;
    executionMode: ExecutionMode;
    baseAmount: number;
    /** Final amount after pause and exposure */
    amount: number;
    scores: ScoreSnapshot;
    /** Curve input key and the multiplier it produced (custom mode) */
    inputKey?: string | null;
    multiplier?: number | null;
    pauseReason?: string | null;
    exposureMultiplier?: number | null;
}

export interface DecisionPrompt {
    system: string;
    user: string;
}

export const DECISION_SYSTEM_PROMPT = `You explain position-sizing decisions for a DCA trading dashboard.

Hard rules (never break):

DATA INTEGRITY
- Never invent data.
- Use only the values provided below.
- Never fill in a missing value. Where a value reads ${INSUFFICIENT_DATA}, say so explicitly and draw no conclusion from it.

CERTAINTY
- Never claim certainty about market outcomes.
- No predictions without a basis in the provided scores.

STYLE
- At most five sentences.
- No hype, no metaphors, no advice beyond the decision itself.
`;

export function buildDecisionPrompt(input: DecisionExplanationInput): DecisionPrompt {
    const lines: string[] = [
        `SETUP: ${input.setupName}${input.symbol ? ` (${input.symbol})` : ''}`,
        `MODE: ${input.executionMode}`,
        `BASE AMOUNT: ${formatAmount(input.baseAmount)}`,
        `FINAL AMOUNT: ${formatAmount(input.amount)}`,
    ];

    if (input.executionMode === 'custom') {
        const key = input.inputKey ?? null;
        const score = key ? input.scores[key] : undefined;
        lines.push(`CURVE INPUT: ${key ?? INSUFFICIENT_DATA} = ${formatValue(score)}`);
        lines.push(`CURVE MULTIPLIER: ${formatValue(input.multiplier)}`);
    }

    lines.push(`PAUSED: ${input.pauseReason ? `yes (${input.pauseReason})` : 'no'}`);
    lines.push(`EXPOSURE MULTIPLIER: ${input.exposureMultiplier == null ? 'none' : String(input.exposureMultiplier)}`);

    lines.push('SCORES:');
    const keys = Object.keys(input.scores).sort();
    if (keys.length === 0) {
        lines.push(`- ${INSUFFICIENT_DATA}`);
    }
    for (const key of keys) {
        lines.push(`- ${key}: ${formatValue(input.scores[key])}`);
    }

    lines.push('');
    lines.push('Explain why this amount was chosen.');

    return { system: DECISION_SYSTEM_PROMPT, user: lines.join('\n') };
}

// =============================================================================
// Helpers
// =============================================================================

function formatValue(value: number | null | undefined): string {
    return typeof value === 'number' && Number.isFinite(value) ? String(value) : INSUFFICIENT_DATA;
}

function formatAmount(value: number): string {
    return value.toFixed(2);
}
