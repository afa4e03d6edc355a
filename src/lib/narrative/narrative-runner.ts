/**
 * Narrative Runner
 *
 * The only place that calls an LLM provider (OpenAI chat completions).
 * The result is advisory text; the sizing decision never depends on it.
 *
 * - Retry with exponential backoff for 429/503 and quota errors
 * - Per-request timeout via AbortController
 * - Never throws: failures come back as { success: false, errorCode }
 * - No secrets in logs (no headers, no key)
 */

import { getEngineConfig } from '../config/engine-config';
import { buildDecisionPrompt, DECISION_SYSTEM_PROMPT, type DecisionExplanationInput } from './prompt-builder';

// =============================================================================
// Types
// =============================================================================

export type ProviderErrorCode = 'AUTH' | 'QUOTA' | 'RATE_LIMIT' | 'BAD_REQUEST' | 'SERVER_ERROR' | 'NOT_FOUND' | 'UNKNOWN';

export interface ProviderErrorClassification {
    code: ProviderErrorCode;
    shouldRetry: boolean;
}

export type NarrativeErrorCode = 'MISSING_API_KEY' | 'QUOTA_OR_RATE_LIMIT' | 'PROVIDER_FAILED' | 'EMPTY_RESPONSE';

export interface NarrativeOptions {
    systemPrompt?: string;
    model?: string;
    /** Defaults to OPENAI_API_KEY */
    apiKey?: string;
    timeoutMs?: number;
    maxTokens?: number;
    temperature?: number;
    maxRetries?: number;
    retryBaseDelayMs?: number;
}

export interface NarrativeResult {
    success: boolean;
    text?: string;
    errorCode?: NarrativeErrorCode;
    error?: string;
    model?: string;
    retries?: number;
}

const DEFAULTS = {
    endpoint: 'https://api.openai.com/v1/chat/completions',
    maxTokens: 512,
    temperature: 0.3,
    maxRetries: 2,
    retryBaseDelayMs: 400,
};

interface RequestOutcome {
    success: boolean;
    text?: string;
    httpStatus?: number;
    errorText?: string;
}

// =============================================================================
// Error classification
// =============================================================================

const QUOTA_PATTERNS = ['resource_exhausted', 'quota', 'rate limit', 'rate_limit', 'insufficient_quota'];

export function classifyProviderError(status: number, bodyText: string): ProviderErrorClassification {
    if (status === 401 || status === 403) return { code: 'AUTH', shouldRetry: false };
    if (status === 404) return { code: 'NOT_FOUND', shouldRetry: false };
    if (status === 429) return { code: 'RATE_LIMIT', shouldRetry: true };

    const lowerBody = bodyText.toLowerCase();
    if (QUOTA_PATTERNS.some(pattern => lowerBody.includes(pattern))) {
        return { code: 'QUOTA', shouldRetry: true };
    }

    if (status === 400) return { code: 'BAD_REQUEST', shouldRetry: false };
    if (status === 503) return { code: 'SERVER_ERROR', shouldRetry: true };
    if (status >= 500 && status < 600) return { code: 'SERVER_ERROR', shouldRetry: false };

    return { code: 'UNKNOWN', shouldRetry: false };
}

// =============================================================================
// Runner
// =============================================================================

export async function runNarrative(userMessage: string, options: NarrativeOptions = {}): Promise<NarrativeResult> {
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
        console.error('[NarrativeRunner] OPENAI_API_KEY is not set');
        return { success: false, errorCode: 'MISSING_API_KEY', error: 'OPENAI_API_KEY is not set' };
    }

    const config = getEngineConfig();
    const model = options.model ?? config.narrativeModel;
    const timeoutMs = options.timeoutMs ?? config.narrativeTimeoutMs;
    const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
    const baseDelay = options.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs;

    const body = {
        model,
        max_tokens: options.maxTokens ?? DEFAULTS.maxTokens,
        temperature: options.temperature ?? DEFAULTS.temperature,
        messages: [
            { role: 'system', content: options.systemPrompt ?? DECISION_SYSTEM_PROMPT },
            { role: 'user', content: userMessage },
        ],
    };
    const headers = {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
    };

    console.log(`[NarrativeRunner] Calling model=${model} promptLength=${userMessage.length}`);

    let last: RequestOutcome = { success: false, errorText: 'Unknown error' };
    let retries = 0;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        last = await makeRequest(headers, body, timeoutMs);

        if (last.success) {
            const text = last.text ?? '';
            if (!text.trim()) {
                return { success: false, errorCode: 'EMPTY_RESPONSE', error: 'Provider returned no text', model, retries };
            }
            console.log(`[NarrativeRunner] Success: response length=${text.length} chars`);
            return { success: true, text, model, retries };
        }

        const classification = classifyProviderError(last.httpStatus ?? 0, last.errorText ?? '');
        if (!classification.shouldRetry || attempt >= maxRetries) break;

        const delay = baseDelay * Math.pow(2, attempt) + Math.random() * Math.min(100, baseDelay);
        console.log(`[NarrativeRunner] Provider returned ${last.httpStatus}, retrying in ${Math.round(delay)}ms (attempt ${attempt + 1}/${maxRetries})`);
        await sleep(delay);
        retries++;
    }

    const classification = classifyProviderError(last.httpStatus ?? 0, last.errorText ?? '');
    const errorCode: NarrativeErrorCode = classification.code === 'QUOTA' || classification.code === 'RATE_LIMIT'
        ? 'QUOTA_OR_RATE_LIMIT'
        : 'PROVIDER_FAILED';
    const preview = extractMessagePreview(last.errorText ?? '');

    console.error(`[NarrativeRunner] Failed: status=${last.httpStatus ?? 'none'} code=${classification.code}`);
    return {
        success: false,
        errorCode,
        error: last.httpStatus ? `HTTP ${last.httpStatus}: ${preview}` : preview,
        model,
        retries,
    };
}

/**
 * Build the decision prompt and ask the provider to explain it.
 */
export async function explainDecision(
    input: DecisionExplanationInput,
    options: NarrativeOptions = {},
): Promise<NarrativeResult> {
    const prompt = buildDecisionPrompt(input);
    return runNarrative(prompt.user, { ...options, systemPrompt: prompt.system });
}

// =============================================================================
// Helpers
// =============================================================================

async function makeRequest(
    headers: Record<string, string>,
    body: object,
    timeoutMs: number,
): Promise<RequestOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetch(DEFAULTS.endpoint, {
            method: 'POST',
            headers,
            body: JSON.stringify(body),
            signal: controller.signal,
        });

        if (!response.ok) {
            return { success: false, httpStatus: response.status, errorText: await response.text() };
        }

        const data: unknown = await response.json();
        return { success: true, text: extractText(data) };
    } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        return { success: false, errorText: message };
    } finally {
        clearTimeout(timeoutId);
    }
}

function extractText(data: unknown): string {
    if (!isRecord(data) || !Array.isArray(data.choices)) return '';
    const first: unknown = data.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) return '';
    const content = first.message.content;
    return typeof content === 'string' ? content : '';
}

/** First 200 chars of the provider's error message */
function extractMessagePreview(errorText: string): string {
    let parsed: unknown = null;
    try {
        parsed = JSON.parse(errorText);
    } catch {
        return errorText.slice(0, 200);
    }

    if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === 'string') {
        return parsed.error.message.slice(0, 200);
    }
    return errorText.slice(0, 200);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
