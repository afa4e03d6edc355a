// Curves
export { evaluateCurve } from './lib/curves/curve-engine';
export { validateDecisionCurve, checkDecisionCurve } from './lib/curves/curve-validator';
export {
    DCA_CONTRARIAN,
    DCA_TREND_FOLLOWING,
    DECISION_PRESETS,
    getDecisionPreset,
    isDecisionPresetKey,
    type DecisionPresetKey,
} from './lib/curves/curve-presets';
export {
    CurveError,
    DECISION_X_MAX,
    DECISION_X_MIN,
    DEFAULT_CURVE_INPUT,
    MAX_MULTIPLIER,
    MIN_MULTIPLIER,
    type Curve,
    type CurvePoint,
    type DecisionCurve,
} from './lib/curves/curve-types';

// Scoring
export {
    calculateScore,
    generateScores,
    DEFAULT_THRESHOLDS,
    type GeneratedScores,
    type IndicatorConfig,
    type IndicatorRule,
    type IndicatorScore,
    type IndicatorScoreDetail,
} from './lib/scoring/indicator-scorer';
export {
    buildScoreSnapshot,
    scoreKeyFor,
    SCORE_CATEGORIES,
    type CategoryScoreSnapshot,
    type ScoreCategory,
    type ScoreSnapshot,
    type ScoreSnapshotResult,
    type ScoringConfig,
} from './lib/scoring/score-snapshot';
export {
    applyRegimeWeights,
    createRegimeWeighting,
    DEFAULT_MAX_WEIGHT,
    DEFAULT_MIN_WEIGHT,
    DEFAULT_REGIME_WEIGHTS,
    type RegimeWeightOptions,
    type WeightAdjuster,
    type WeightedCurve,
} from './lib/scoring/regime-weights';
export { calculateWeightedScore, MAX_SCORE, MIN_SCORE } from './lib/scoring/score-engine';

// Decisions
export { decideAmount, decideAmountForRecord, resolveMultiplier } from './lib/decision/decision-engine';
export { parseSetup } from './lib/decision/setup-parser';
export {
    DecisionError,
    type CustomSetup,
    type ExecutionMode,
    type FixedSetup,
    type PauseConditions,
    type Setup,
    type SetupRecord,
} from './lib/decision/setup-types';
export {
    computeExecution,
    computeExecutionAmount,
    findPauseTrigger,
    type ExecutionOptions,
    type ExecutionResult,
} from './lib/decision/execution-service';
export {
    applyExposureToAmount,
    computeExposureMultiplier,
    type ExposureResult,
    type PolicyCaps,
    type RegimeMemory,
    type RiskMode,
} from './lib/decision/exposure-engine';
export {
    evaluatePolicy,
    type PolicyAction,
    type PolicyDecision,
    type PolicyInput,
    type PolicyRiskMode,
} from './lib/decision/policy-engine';

// Config
export { getEngineConfig, getRegimeWeightOptions, type EngineConfig } from './lib/config/engine-config';
export { loadIndicatorConfig, loadScoringConfig, parseIndicatorConfig } from './lib/config/indicator-config';

// Persistence
export { createServerSupabase, isServerSupabaseConfigured, resetServerSupabase } from './lib/supabase/server';
export { loadActiveSetups, saveDecisionCurve } from './lib/store/setup-store';
export { loadLatestIndicatorValues, type IndicatorValues } from './lib/store/indicator-store';
export { loadLatestScores, writeDailyScores, type DailyScoreRow } from './lib/store/score-store';
export { writeBotDecisions, type BotDecision, type DecisionAction } from './lib/store/decision-store';
export { acquireLock, expireStaleLocks, releaseLock, type LockResult } from './lib/ops/job-lock';
export { writeJobRun, type JobOutcome } from './lib/ops/job-run-store';

// Jobs
export { runDailyScoreJob, type DailyScoreJobOptions, type DailyScoreJobResult } from './lib/jobs/daily-score-job';
export {
    runExecutionPlanJob,
    type ExecutionPlanJobOptions,
    type ExecutionPlanJobResult,
    type ExposureContext,
} from './lib/jobs/execution-plan-job';

// Narratives
export { buildDecisionPrompt, INSUFFICIENT_DATA, type DecisionExplanationInput } from './lib/narrative/prompt-builder';
export { classifyProviderError, explainDecision, runNarrative, type NarrativeResult } from './lib/narrative/narrative-runner';
