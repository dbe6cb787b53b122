import { ClarityResult, DialogueState, DIALOGUE_STATES, Intent, isTerminal, PROBING_STATES, TerminalState } from './types';
import { logger } from '../observability/logger';
import { stateTransitions } from '../observability/metrics';

export type TransitionTrigger =
  | 'cancel'
  | 'budget_exhausted'
  | 'skip'
  | 'clarity_high'
  | 'mood_detected'
  | 'mood_unclear'
  | 'intensity_set'
  | 'intensity_missing'
  | 'context_clear'
  | 'context_unclear'
  | 'confirmed'
  | 'corrected'
  | 'unconfirmed'
  | 'recommendation_delivered'
  | 'feedback_mismatch'
  | 'feedback_done'
  | 'idle_timeout'
  | 'user_ended';

export const TRANSITION_TRIGGERS: readonly TransitionTrigger[] = [
  'cancel',
  'budget_exhausted',
  'skip',
  'clarity_high',
  'mood_detected',
  'mood_unclear',
  'intensity_set',
  'intensity_missing',
  'context_clear',
  'context_unclear',
  'confirmed',
  'corrected',
  'unconfirmed',
  'recommendation_delivered',
  'feedback_mismatch',
  'feedback_done',
  'idle_timeout',
  'user_ended',
];

export type LiveState = Exclude<DialogueState, TerminalState>;

/** Triggers every live state accepts, whatever the turn carried. */
const COMMON: Partial<Record<TransitionTrigger, DialogueState>> = {
  cancel: 'ABORTED',
  idle_timeout: 'TIMEOUT',
  user_ended: 'ENDED',
};

/** States that still spend turn budget on questions. */
const BUDGETED: Partial<Record<TransitionTrigger, DialogueState>> = {
  budget_exhausted: 'RECOMMENDING',
  skip: 'RECOMMENDING',
};

/**
 * The complete transition table: (state, trigger) → next state.
 * Self-loops are listed so every move a session can make is enumerable here.
 */
export const TRANSITION_TABLE: Readonly<Record<DialogueState, Readonly<Partial<Record<TransitionTrigger, DialogueState>>>>> = {
  GREETING: {
    ...COMMON,
    ...BUDGETED,
    clarity_high: 'RECOMMENDING',
    mood_detected: 'PROBING_INTENSITY',
    mood_unclear: 'PROBING_MOOD',
  },
  PROBING_MOOD: {
    ...COMMON,
    ...BUDGETED,
    mood_detected: 'PROBING_INTENSITY',
    mood_unclear: 'PROBING_MOOD',
  },
  PROBING_INTENSITY: {
    ...COMMON,
    ...BUDGETED,
    clarity_high: 'RECOMMENDING',
    intensity_set: 'PROBING_CONTEXT',
    intensity_missing: 'PROBING_INTENSITY',
  },
  PROBING_CONTEXT: {
    ...COMMON,
    ...BUDGETED,
    context_clear: 'CONFIRMING',
    context_unclear: 'PROBING_CONTEXT',
  },
  CONFIRMING: {
    ...COMMON,
    ...BUDGETED,
    confirmed: 'RECOMMENDING',
    corrected: 'PROBING_MOOD',
    unconfirmed: 'CONFIRMING',
  },
  RECOMMENDING: {
    ...COMMON,
    recommendation_delivered: 'FEEDBACK',
  },
  FEEDBACK: {
    ...COMMON,
    feedback_mismatch: 'PROBING_MOOD',
    feedback_done: 'ENDED',
  },
  ENDED: {},
  ABORTED: {},
  TIMEOUT: {},
};

export interface TransitionRecord {
  from: DialogueState;
  trigger: TransitionTrigger;
  to: DialogueState;
}

export interface TransitionOutcome {
  state: DialogueState;
  /** Null when the move was rejected and the state is unchanged */
  trigger: TransitionTrigger | null;
}

export interface StateMachineOptions {
  maxTurns: number;
  thresholds: { high: number; medium: number };
  contextClearThreshold: number;
}

export class DialogueStateMachine {
  constructor(private readonly options: StateMachineOptions) {}

  /** Every (from, trigger, to) row of the table. */
  static listTransitions(): TransitionRecord[] {
    const rows: TransitionRecord[] = [];
    for (const from of DIALOGUE_STATES) {
      for (const trigger of TRANSITION_TRIGGERS) {
        const to = TRANSITION_TABLE[from][trigger];
        if (to) rows.push({ from, trigger, to });
      }
    }
    return rows;
  }

  private static isBudgeted(state: DialogueState): boolean {
    return state === 'GREETING' || state === 'CONFIRMING' || PROBING_STATES.includes(state);
  }

  static isAllowed(from: DialogueState, to: DialogueState): boolean {
    return Object.values(TRANSITION_TABLE[from]).includes(to);
  }

  /**
   * One turn-driven transition:
   * `next = transition(state, intent, clarity, turnCount)`.
   * `turnCount` includes the turn being processed.
   */
  transition(
    sessionId: string,
    state: DialogueState,
    intent: Intent,
    clarity: ClarityResult,
    turnCount: number,
  ): TransitionOutcome {
    if (isTerminal(state)) {
      logger.warn({ sessionId, state, intent }, 'Transition requested from terminal state');
      return { state, trigger: null };
    }
    return this.apply(sessionId, state, this.deriveTrigger(state, intent, clarity, turnCount));
  }

  /** Apply a trigger directly (timeouts, explicit end). Unknown moves leave the state as is. */
  apply(sessionId: string, from: DialogueState, trigger: TransitionTrigger): TransitionOutcome {
    const to = TRANSITION_TABLE[from][trigger];
    if (!to) {
      logger.warn({ sessionId, from, trigger }, 'Invalid state transition attempted');
      return { state: from, trigger: null };
    }

    stateTransitions.inc({ from, to });
    logger.info({ sessionId, from, to, trigger }, 'State transition');
    return { state: to, trigger };
  }

  /** True once a question-asking state has used all of its turns. */
  budgetSpent(state: DialogueState, turnCount: number): boolean {
    return DialogueStateMachine.isBudgeted(state) && turnCount >= this.options.maxTurns;
  }

  /** Rules in priority order; the first that fires names the trigger. */
  deriveTrigger(state: LiveState, intent: Intent, clarity: ClarityResult, turnCount: number): TransitionTrigger {
    const budgetLeft = turnCount < this.options.maxTurns;
    const budgeted = DialogueStateMachine.isBudgeted(state);

    if (intent === 'CANCEL') return 'cancel';
    if (budgeted && !budgetLeft) return 'budget_exhausted';
    if (budgeted && intent === 'SKIP') return 'skip';

    const clarityHigh = clarity.score >= this.options.thresholds.high;
    const moodDetected =
      clarity.components.mood === 1 && clarity.components.confidence >= this.options.thresholds.medium;

    switch (state) {
      case 'GREETING':
        if (clarityHigh) return 'clarity_high';
        return moodDetected ? 'mood_detected' : 'mood_unclear';

      case 'PROBING_MOOD':
        return moodDetected ? 'mood_detected' : 'mood_unclear';

      case 'PROBING_INTENSITY':
        if (clarityHigh) return 'clarity_high';
        return clarity.components.intensity === 1 ? 'intensity_set' : 'intensity_missing';

      case 'PROBING_CONTEXT':
        return clarity.components.context >= this.options.contextClearThreshold ? 'context_clear' : 'context_unclear';

      case 'CONFIRMING':
        if (intent === 'CONFIRMATION' || intent === 'FEEDBACK_POSITIVE') return 'confirmed';
        if (intent === 'MOOD_CORRECTION' || intent === 'NEGATION') return 'corrected';
        return 'unconfirmed';

      case 'RECOMMENDING':
        return 'recommendation_delivered';

      case 'FEEDBACK':
        if ((intent === 'FEEDBACK_NEGATIVE' || intent === 'MOOD_CORRECTION') && budgetLeft) {
          return 'feedback_mismatch';
        }
        return 'feedback_done';
    }
  }
}
