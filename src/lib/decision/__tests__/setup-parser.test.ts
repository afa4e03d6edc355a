/**
 * Setup Parser — Unit Tests (Jest)
 */

import { parseSetup } from '../setup-parser';
import { DecisionError } from '../setup-types';

describe('parseSetup', () => {
    it('defaults the execution mode to fixed', () => {
        expect(parseSetup({ id: 7, name: 'Weekly DCA', symbol: 'btc', base_amount: 250 })).toEqual({
            id: '7',
            name: 'Weekly DCA',
            symbol: 'BTC',
            executionMode: 'fixed',
            baseAmount: 250,
            pauseConditions: undefined,
        });
    });

    it('ignores the curve of a fixed setup', () => {
        const setup = parseSetup({ execution_mode: 'fixed', base_amount: 10, decision_curve: 'not json' });
        expect(setup.executionMode).toBe('fixed');
    });

    it('parses a custom setup and defaults the curve input', () => {
        const setup = parseSetup({
            execution_mode: 'custom',
            base_amount: 100,
            decision_curve: { points: [{ x: 0, y: 1 }, { x: 100, y: 2 }] },
        });

        expect(setup).toEqual({
            executionMode: 'custom',
            baseAmount: 100,
            decisionCurve: { input: 'market_score', points: [{ x: 0, y: 1 }, { x: 100, y: 2 }] },
            pauseConditions: undefined,
        });
    });

    it('parses pause conditions stored as JSON text', () => {
        const setup = parseSetup({
            base_amount: 100,
            pause_conditions: '{"market_score":{"gt":80},"macro_score":{"lt":20}}',
        });
        expect(setup.pauseConditions).toEqual({ market_score: { gt: 80 }, macro_score: { lt: 20 } });
    });

    it('rejects malformed pause conditions', () => {
        expect(() => parseSetup({ base_amount: 100, pause_conditions: { market_score: { gt: 'high' } } }))
            .toThrow(/^Invalid pause_conditions: market_score\.gt/);
    });

    it('reports an unknown mode before malformed pause conditions', () => {
        expect(() => parseSetup({ execution_mode: 'martingale', base_amount: 100, pause_conditions: '{bad' }))
            .toThrow('Unknown execution_mode: martingale');
    });

    it('reports a missing curve before malformed pause conditions', () => {
        expect(() => parseSetup({
            execution_mode: 'custom',
            base_amount: 100,
            pause_conditions: { market_score: { gt: 'x' } },
        })).toThrow('Custom mode requires decision_curve');
    });

    it('reports an invalid curve before malformed pause conditions', () => {
        expect(() => parseSetup({
            execution_mode: 'custom',
            base_amount: 100,
            decision_curve: '{points',
            pause_conditions: '{bad',
        })).toThrow('Invalid decision_curve: not valid JSON');
    });

    it('rejects a curve that is not valid JSON', () => {
        expect(() => parseSetup({ execution_mode: 'custom', base_amount: 100, decision_curve: '{points' }))
            .toThrow('Invalid decision_curve: not valid JSON');
    });

    it('rejects a curve without points', () => {
        expect(() => parseSetup({ execution_mode: 'custom', base_amount: 100, decision_curve: { points: [] } }))
            .toThrow(/^Invalid decision_curve: points/);
    });

    it('rejects a curve with non-numeric coordinates', () => {
        expect(() => parseSetup({
            execution_mode: 'custom',
            base_amount: 100,
            decision_curve: { points: [{ x: '0', y: 1 }] },
        })).toThrow(/^Invalid decision_curve: points\.0\.x/);
    });

    it('rejects a non-numeric base amount', () => {
        expect(() => parseSetup({ base_amount: 'lots' })).toThrow('Invalid base_amount: "lots"');
        expect(() => parseSetup({ name: 'no amount' })).toThrow('Invalid base_amount: null');
    });

    it('throws DecisionError instances', () => {
        expect(() => parseSetup({})).toThrow(DecisionError);
    });
});
