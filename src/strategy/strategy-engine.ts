import { ClarityModel } from '../clarity/clarity-model';
import { ClarityResult, DialogueState } from '../dialogue/types';

export type ProbeDimension = 'mood' | 'intensity' | 'context';

/** 1 = surface question, 3 = most specific */
export type ProbeDepth = 1 | 2 | 3;

export type StrategyDecision =
  | { kind: 'probe'; dimension: ProbeDimension; depth: ProbeDepth }
  | { kind: 'confirm'; depth: ProbeDepth }
  | { kind: 'proceed' }
  | { kind: 'feedback' }
  | { kind: 'close' };

/** Dimensions still open per state, in tie-break order. */
const OUTSTANDING: Partial<Record<DialogueState, readonly ProbeDimension[]>> = {
  GREETING: ['mood'],
  PROBING_MOOD: ['mood'],
  PROBING_INTENSITY: ['intensity', 'mood'],
  PROBING_CONTEXT: ['context', 'intensity', 'mood'],
};

const SURFACE_LIMIT = 0.4;
const MIDDLE_LIMIT = 0.8;

/**
 * Decides what the next bot message does after the state machine has moved:
 * keep probing (which dimension, how deep), confirm, hand off, collect
 * feedback or close. Never probes once the turn budget is spent.
 */
export class StrategyEngine {
  constructor(private readonly maxTurns: number) {}

  decide(state: DialogueState, clarity: ClarityResult, turnCount: number): StrategyDecision {
    switch (state) {
      case 'RECOMMENDING':
        return { kind: 'proceed' };
      case 'FEEDBACK':
        return { kind: 'feedback' };
      case 'ENDED':
      case 'ABORTED':
      case 'TIMEOUT':
        return { kind: 'close' };
      default:
        break;
    }

    if (turnCount >= this.maxTurns) return { kind: 'proceed' };

    const depth = this.depthFor(turnCount);
    if (state === 'CONFIRMING') return { kind: 'confirm', depth };

    const dimensions = OUTSTANDING[state] ?? ['mood'];
    const dimension =
      ClarityModel.weakest(dimensions.map((d) => ({ key: d, score: StrategyEngine.dimensionScore(d, clarity) }))) ??
      'mood';
    return { kind: 'probe', dimension, depth };
  }

  /** Deeper questions as the remaining budget shrinks. */
  depthFor(turnCount: number): ProbeDepth {
    const used = turnCount / this.maxTurns;
    if (used < SURFACE_LIMIT) return 1;
    if (used < MIDDLE_LIMIT) return 2;
    return 3;
  }

  /** Mood counts as only as clear as its weakest supporting signal. */
  static dimensionScore(dimension: ProbeDimension, clarity: ClarityResult): number {
    const c = clarity.components;
    switch (dimension) {
      case 'mood':
        return Math.min(c.mood, c.confidence, c.consistency);
      case 'intensity':
        return c.intensity;
      case 'context':
        return c.context;
    }
  }
}
