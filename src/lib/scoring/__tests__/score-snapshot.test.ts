import { buildScoreSnapshot, scoreKeyFor, type ScoringConfig } from '../score-snapshot';

let logSpy: jest.SpyInstance;

beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
    logSpy.mockRestore();
});

describe('buildScoreSnapshot', () => {
    const config: ScoringConfig = {
        macro: { fear_greed_index: { thresholds: [25, 50, 75], positive: false } },
        technical: { rsi: { thresholds: [30, 50, 70], positive: true } },
    };

    it('collects category averages under their score keys', () => {
        const { snapshot, details } = buildScoreSnapshot({ fear_greed_index: 77, rsi: 63 }, config);

        expect(snapshot).toEqual({
            macro_score: 25,
            technical_score: 75,
            market_score: null,
            sentiment_score: null,
        });
        expect(Object.keys(details)).toEqual(['macro', 'technical']);
    });

    it('keeps a configured category null when its data is missing', () => {
        const { snapshot } = buildScoreSnapshot({ rsi: 63 }, config);
        expect(snapshot.macro_score).toBeNull();
        expect(snapshot.technical_score).toBe(75);
    });

    it('derives score keys from categories', () => {
        expect(scoreKeyFor('sentiment')).toBe('sentiment_score');
    });
});
