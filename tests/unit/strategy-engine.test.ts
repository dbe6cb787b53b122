import { StrategyEngine } from '../../src/strategy/strategy-engine';
import { clarityOf } from '../helpers/fixtures';

describe('StrategyEngine', () => {
  const engine = new StrategyEngine(5);
  const none = clarityOf({});

  it('should proceed, ask for feedback or close outside the probing states', () => {
    expect(engine.decide('RECOMMENDING', none, 2)).toEqual({ kind: 'proceed' });
    expect(engine.decide('FEEDBACK', none, 3)).toEqual({ kind: 'feedback' });
    expect(engine.decide('ENDED', none, 4)).toEqual({ kind: 'close' });
    expect(engine.decide('ABORTED', none, 1)).toEqual({ kind: 'close' });
    expect(engine.decide('TIMEOUT', none, 1)).toEqual({ kind: 'close' });
  });

  it('should never probe once the budget is spent', () => {
    expect(engine.decide('PROBING_MOOD', none, 5)).toEqual({ kind: 'proceed' });
    expect(engine.decide('CONFIRMING', none, 6)).toEqual({ kind: 'proceed' });
  });

  it('should deepen questions as the budget shrinks', () => {
    expect([1, 2, 3, 4].map((turn) => engine.depthFor(turn))).toEqual([1, 2, 2, 3]);
  });

  it('should confirm from CONFIRMING at the current depth', () => {
    expect(engine.decide('CONFIRMING', none, 3)).toEqual({ kind: 'confirm', depth: 2 });
  });

  it('should only probe mood before a mood is known', () => {
    expect(engine.decide('GREETING', none, 1)).toEqual({ kind: 'probe', dimension: 'mood', depth: 1 });
    expect(engine.decide('PROBING_MOOD', none, 4)).toEqual({ kind: 'probe', dimension: 'mood', depth: 3 });
  });

  it('should probe intensity first on a tie in PROBING_INTENSITY', () => {
    expect(engine.decide('PROBING_INTENSITY', none, 1)).toEqual({ kind: 'probe', dimension: 'intensity', depth: 1 });
  });

  it('should probe the weakest outstanding dimension', () => {
    const contextWeak = clarityOf({ mood: 1, confidence: 0.6, consistency: 0.5, intensity: 1, context: 1 / 3 });
    expect(engine.decide('PROBING_CONTEXT', contextWeak, 2)).toEqual({ kind: 'probe', dimension: 'context', depth: 2 });

    const moodWeak = clarityOf({ mood: 1, confidence: 0.6, consistency: 0.5, intensity: 1, context: 1 });
    expect(engine.decide('PROBING_CONTEXT', moodWeak, 2)).toEqual({ kind: 'probe', dimension: 'mood', depth: 2 });
  });

  it('should rate mood by its weakest supporting signal', () => {
    expect(StrategyEngine.dimensionScore('mood', clarityOf({ mood: 1, confidence: 0.9, consistency: 0.4 }))).toBe(0.4);
    expect(StrategyEngine.dimensionScore('intensity', clarityOf({ intensity: 1 }))).toBe(1);
  });
});
