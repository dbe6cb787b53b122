import { DialogueConfig, DialogueConfigService, resolveDialogueConfig } from '../../src/config/dialogue-config';
import { ClarityComponent, ClarityResult } from '../../src/dialogue/types';
import { InMemorySessionStore } from '../../src/session/session-store';
import { CommitTurnInput, ConversationSession, ConversationTurn, SessionStoreOptions } from '../../src/session/types';

/** 2026-01-05 09:00 local time: a Monday morning */
export const MONDAY_9AM = new Date(2026, 0, 5, 9, 0).getTime();

export function testConfig(overrides: Partial<Record<string, unknown>> = {}): DialogueConfig {
  return resolveDialogueConfig({ ...DialogueConfigService.builtInDefault(), ...overrides });
}

export function storeOptions(config: DialogueConfig = testConfig()): SessionStoreOptions {
  return {
    sessionTimeoutMs: config.sessionTimeoutMs,
    idempotencyTtlMs: config.idempotencyTtlMs,
    retentionSeconds: config.sessionRetentionSeconds,
    maxTurns: config.maxTurns,
  };
}

export function memoryStore(config: DialogueConfig = testConfig()): InMemorySessionStore {
  return new InMemorySessionStore(storeOptions(config));
}

/** Manually advanced clock for deterministic timestamps. */
export class TestClock {
  constructor(public now: number = MONDAY_9AM) {}

  advance(ms: number): void {
    this.now += ms;
  }

  read = (): number => this.now;
}

export function clarityOf(components: Partial<Record<ClarityComponent, number>>, score = 0): ClarityResult {
  return {
    score,
    level: 'insufficient',
    components: { mood: 0, confidence: 0, intensity: 0, context: 0, consistency: 0, ...components },
    weights: { mood: 0.35, confidence: 0.25, intensity: 0.15, context: 0.1, consistency: 0.15 },
  };
}

export function turnFor(session: ConversationSession, overrides: Partial<ConversationTurn> = {}): ConversationTurn {
  return {
    turnId: `turn-${session.turnCount + 1}`,
    sessionId: session.sessionId,
    turnIndex: session.turnCount + 1,
    inputText: 'buồn',
    inputType: 'text',
    intent: 'MOOD_EXPRESSION',
    intentConfidence: 0.65,
    emotionalSignals: {
      mood: 'sad',
      confidence: 0.6,
      intensity: null,
      intensityConfidence: 0,
      negated: false,
      explicit: false,
      keywords: ['buồn'],
    },
    contextSignals: { timeOfDay: 'morning', activity: null, social: null },
    stateBefore: session.state,
    stateAfter: 'PROBING_INTENSITY',
    trigger: 'mood_detected',
    clarity: clarityOf({ mood: 1 }, 0.35),
    responseType: 'probing',
    botMessage: 'Bạn đang cảm nhận điều này mạnh mẽ đến mức nào?',
    timestamp: session.lastActivityAt,
    ...overrides,
  };
}

/** Commit input for the turn after `session`, at `now`. */
export function nextTurn(session: ConversationSession, now: number, overrides: Partial<CommitTurnInput> = {}): CommitTurnInput {
  const next: ConversationSession = {
    ...session,
    state: 'PROBING_INTENSITY',
    turnCount: session.turnCount + 1,
    lastActivityAt: now,
  };
  return { session: next, turn: turnFor(next, { turnIndex: next.turnCount }), expectedVersion: session.version, ...overrides };
}
