/**
 * Setup Parser — Boundary Validation
 *
 * Converts an untyped setup record (DB row, request body) into a typed
 * Setup. All shape checks live here so the decision engine works on
 * typed values only. Failures throw DecisionError.
 *
 * JSON columns may arrive as objects or as JSON text.
 */

import { z } from 'zod';
import { DEFAULT_CURVE_INPUT, type Curve } from '../curves/curve-types';
import {
    DecisionError,
    type PauseConditions,
    type Setup,
    type SetupRecord,
} from './setup-types';

// =============================================================================
// Schemas
// =============================================================================

const curvePointSchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
});

export const curveSchema = z.object({
    input: z.string().min(1).optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    points: z.array(curvePointSchema).min(1),
});

const pauseConditionSchema = z.object({
    gt: z.number().finite().optional(),
    lt: z.number().finite().optional(),
});

export const pauseConditionsSchema = z.record(z.string(), pauseConditionSchema);

// =============================================================================
// Parser
// =============================================================================

export function parseSetup(record: unknown): Setup {
    if (!isRecord(record) || Object.keys(record).length === 0) {
        throw new DecisionError('Setup is missing');
    }

    const row: SetupRecord = record;
    const baseAmount = toPositiveNumber(row.base_amount);
    if (baseAmount === null) {
        throw new DecisionError(`Invalid base_amount: ${JSON.stringify(row.base_amount ?? null)}`);
    }

    const mode = row.execution_mode ?? 'fixed';
    const identity = {
        ...(row.id != null ? { id: String(row.id) } : {}),
        ...(typeof row.name === 'string' ? { name: row.name } : {}),
        ...(typeof row.symbol === 'string' ? { symbol: row.symbol.toUpperCase() } : {}),
    };

    // Mode and curve errors are reported before pause condition errors.
    if (mode === 'fixed') {
        const pauseConditions = parsePauseConditions(row.pause_conditions);
        return { ...identity, executionMode: 'fixed', baseAmount, pauseConditions };
    }

    if (mode === 'custom') {
        if (row.decision_curve == null) {
            throw new DecisionError('Custom mode requires decision_curve');
        }
        const decisionCurve = parseCurve(row.decision_curve);
        const pauseConditions = parsePauseConditions(row.pause_conditions);
        return { ...identity, executionMode: 'custom', baseAmount, decisionCurve, pauseConditions };
    }

    throw new DecisionError(`Unknown execution_mode: ${String(mode)}`);
}

// =============================================================================
// Field parsers
// =============================================================================

function parseCurve(raw: unknown): Curve {
    const parsed = curveSchema.safeParse(parseJsonColumn(raw, 'decision_curve'));
    if (!parsed.success) {
        throw new DecisionError(`Invalid decision_curve: ${describeIssue(parsed.error)}`);
    }
    return {
        ...parsed.data,
        input: parsed.data.input ?? DEFAULT_CURVE_INPUT,
    };
}

function parsePauseConditions(raw: unknown): PauseConditions | undefined {
    if (raw == null) return undefined;

    const parsed = pauseConditionsSchema.safeParse(parseJsonColumn(raw, 'pause_conditions'));
    if (!parsed.success) {
        throw new DecisionError(`Invalid pause_conditions: ${describeIssue(parsed.error)}`);
    }
    return parsed.data;
}

function parseJsonColumn(raw: unknown, column: string): unknown {
    if (typeof raw !== 'string') return raw;
    try {
        return JSON.parse(raw);
    } catch {
        throw new DecisionError(`Invalid ${column}: not valid JSON`);
    }
}

// =============================================================================
// Helpers
// =============================================================================

function describeIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) return 'invalid value';
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
}

function toPositiveNumber(value: unknown): number | null {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof n === 'number' && Number.isFinite(n) && n > 0 ? n : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
