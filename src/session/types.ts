import {
  ClarityResult,
  ContextSignals,
  DialogueState,
  EmotionalContext,
  EmotionalSignals,
  EnrichedRequest,
  InputType,
  Intent,
  Locale,
  ResponseType,
  TerminalState,
} from '../dialogue/types';
import { TransitionTrigger } from '../dialogue/state-machine';

export interface ConversationSession {
  sessionId: string;
  userId: string;
  state: DialogueState;
  /** Equals the number of persisted turns */
  turnCount: number;
  maxTurns: number;
  createdAt: number;
  lastActivityAt: number;
  /** Optimistic concurrency counter, bumped on every write */
  version: number;
  emotionalContext: EmotionalContext;
  locale: Locale;
  askedQuestionIds: string[];
  /** Latest hand-off payload, set once the session reaches RECOMMENDING */
  enrichedRequest: EnrichedRequest | null;
  endedAt?: number;
  endReason?: TransitionTrigger;
}

/** Immutable, append-only record of one exchange. */
export interface ConversationTurn {
  turnId: string;
  sessionId: string;
  /** 1-based */
  turnIndex: number;
  inputText: string;
  inputType: InputType;
  intent: Intent;
  intentConfidence: number;
  emotionalSignals: EmotionalSignals;
  contextSignals: ContextSignals;
  stateBefore: DialogueState;
  stateAfter: DialogueState;
  trigger: TransitionTrigger | null;
  clarity: ClarityResult;
  responseType: ResponseType;
  botMessage: string;
  questionId?: string;
  timestamp: number;
}

export interface IdempotencyRecord {
  key: string;
  sessionId: string;
  /** Serialized TurnResponse, replayed byte for byte */
  response: string;
  createdAt: number;
}

export interface CommitTurnInput {
  /** Session as it should look after the turn; the store assigns the version */
  session: ConversationSession;
  turn: ConversationTurn;
  expectedVersion: number;
  idempotency?: IdempotencyRecord;
}

export interface PurgeResult {
  sessionsExpired: number;
  keysPurged: number;
}

export interface SessionStoreOptions {
  sessionTimeoutMs: number;
  idempotencyTtlMs: number;
  /** How long closed and idle sessions stay readable */
  retentionSeconds: number;
  maxTurns: number;
}

/**
 * Persistence for sessions, turns, idempotency records and question usage.
 * `commitTurn` is the only way a turn becomes visible and is all-or-nothing:
 * session row, turn row, idempotency record and usage counter land together
 * or not at all.
 */
export interface SessionStore {
  createSession(userId: string, now: number, locale: Locale): Promise<ConversationSession>;
  /**
   * Throws SessionNotFoundError when absent. A live session idle past the
   * timeout is moved to TIMEOUT and SessionExpiredError is thrown.
   */
  loadSession(sessionId: string, now: number): Promise<ConversationSession>;
  /** Raw read without the idle check */
  getSession(sessionId: string): Promise<ConversationSession | null>;
  commitTurn(input: CommitTurnInput): Promise<ConversationSession>;
  closeSession(
    sessionId: string,
    state: TerminalState,
    reason: TransitionTrigger,
    now: number,
  ): Promise<ConversationSession>;
  /** Serialized response for the key, or null when unknown or expired */
  getIdempotentResponse(key: string, now: number): Promise<string | null>;
  listTurns(sessionId: string): Promise<ConversationTurn[]>;
  getQuestionUsage(): Promise<Record<string, number>>;
  /** Sweep idle sessions to TIMEOUT and drop expired keys. Skips sessions `isBusy` reports. */
  purgeExpired(now: number, isBusy?: (sessionId: string) => boolean): Promise<PurgeResult>;
  ping(): Promise<boolean>;
}
