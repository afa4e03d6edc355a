/**
 * Policy Engine — Unit Tests (Jest)
 */

import { evaluatePolicy } from '../policy-engine';

const HEALTHY = { macro_score: 50, technical_score: 60, market_score: 50 };

describe('evaluatePolicy', () => {
    it('holds when no scores are available', () => {
        expect(evaluatePolicy({ scores: { market_score: null } })).toEqual({
            riskMode: 'no_data',
            allowedActions: ['hold'],
            maxExposureMultiplier: 0.5,
            minExposureMultiplier: 0.05,
            cooldownHours: 24,
            notes: ['No scores available, holding.'],
        });
    });

    it('takes a neutral posture at middling pressure', () => {
        expect(evaluatePolicy({ scores: HEALTHY, transitionRisk: 0.2, marketPressure: 0.5 })).toEqual({
            riskMode: 'neutral',
            allowedActions: ['buy', 'hold'],
            maxExposureMultiplier: 1,
            minExposureMultiplier: 0.08,
            cooldownHours: 12,
            notes: [],
        });
    });

    it('goes risk-on at high pressure', () => {
        const policy = evaluatePolicy({ scores: HEALTHY, transitionRisk: 0.1, marketPressure: 0.8 });
        expect(policy.riskMode).toBe('risk_on');
        expect(policy.maxExposureMultiplier).toBe(1.35);
        expect(policy.minExposureMultiplier).toBe(0.1);
        expect(policy.cooldownHours).toBe(6);
    });

    it('forces risk-off and hard caps exposure on extreme transition risk', () => {
        expect(evaluatePolicy({ scores: HEALTHY, transitionRisk: 0.9, marketPressure: 0.8 })).toEqual({
            riskMode: 'risk_off',
            allowedActions: ['hold'],
            maxExposureMultiplier: 0.35,
            minExposureMultiplier: 0.05,
            cooldownHours: 36,
            notes: ['Transition risk extreme: forced risk-off.', 'Extreme transition: exposure hard-capped.'],
        });
    });

    it('only buys strong setups while transition risk is elevated', () => {
        const strong = evaluatePolicy({ scores: { ...HEALTHY, setup_score: 80 }, transitionRisk: 0.7, marketPressure: 0.8 });
        expect(strong.riskMode).toBe('neutral');
        expect(strong.allowedActions).toEqual(['buy', 'hold']);
        expect(strong.maxExposureMultiplier).toBe(0.6);

        const weak = evaluatePolicy({ scores: { ...HEALTHY, setup_score: 70 }, transitionRisk: 0.7, marketPressure: 0.8 });
        expect(weak.allowedActions).toEqual(['hold']);
        expect(weak.notes).toContain('High transition risk: buying needs a setup score of 75 or more.');
    });

    it('blocks buying on a weak setup score', () => {
        const policy = evaluatePolicy({ scores: { ...HEALTHY, setup_score: 30 }, transitionRisk: 0.1, marketPressure: 0.5 });
        expect(policy.riskMode).toBe('neutral');
        expect(policy.allowedActions).toEqual(['hold']);
    });

    it('biases a distribution regime to risk-off', () => {
        const policy = evaluatePolicy({
            scores: HEALTHY,
            transitionRisk: 0.1,
            marketPressure: 0.8,
            regimeLabel: 'Distribution',
        });
        expect(policy.riskMode).toBe('risk_off');
        expect(policy.allowedActions).toEqual(['hold']);
        expect(policy.maxExposureMultiplier).toBe(0.55);
    });

    it('relaxes risk-off to neutral in a stable accumulation regime', () => {
        const policy = evaluatePolicy({
            scores: HEALTHY,
            transitionRisk: 0.2,
            marketPressure: 0.3,
            regimeLabel: 'accumulation',
        });
        expect(policy.riskMode).toBe('neutral');
        expect(policy.notes).toEqual(['Accumulation regime: risk-off relaxed to neutral.']);
    });

    it('lets a very low market score override the regime', () => {
        const policy = evaluatePolicy({
            scores: { ...HEALTHY, market_score: 25 },
            transitionRisk: 0.2,
            marketPressure: 0.3,
            regimeLabel: 'accumulation',
        });
        expect(policy.riskMode).toBe('risk_off');
    });

    it('goes risk-off on weak technicals only with elevated transition risk', () => {
        const scores = { ...HEALTHY, technical_score: 20 };
        expect(evaluatePolicy({ scores, transitionRisk: 0.6 }).riskMode).toBe('risk_off');
        expect(evaluatePolicy({ scores, transitionRisk: 0.5 }).riskMode).toBe('neutral');
    });

    it('treats missing transition risk and pressure as 0.5', () => {
        const policy = evaluatePolicy({ scores: HEALTHY, transitionRisk: null });
        expect(policy.riskMode).toBe('neutral');
        expect(policy.allowedActions).toEqual(['buy', 'hold']);
    });

    it('caps exposure when macro is very weak', () => {
        const policy = evaluatePolicy({ scores: { ...HEALTHY, macro_score: 20 }, transitionRisk: 0.1, marketPressure: 0.5 });
        expect(policy.maxExposureMultiplier).toBe(0.5);
        expect(policy.notes).toEqual(['Macro score very weak: exposure capped.']);
    });
});
