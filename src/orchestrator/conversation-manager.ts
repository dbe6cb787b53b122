import { v4 as uuidv4 } from 'uuid';
import pino from 'pino';
import { DialogueConfig } from '../config/dialogue-config';
import { ClarityModel } from '../clarity/clarity-model';
import { ContextSignalExtractor } from '../context/context-extractor';
import { DialogueStateMachine, TransitionOutcome, TransitionTrigger } from '../dialogue/state-machine';
import {
  ClarityResult,
  ContextSignals,
  EmotionalContext,
  EmotionalSignals,
  EnrichedRequest,
  IntentResult,
  isMoodLabel,
  isTerminal,
  Locale,
  MoodSource,
  ResponseType,
  TurnRequest,
  TurnResponse,
} from '../dialogue/types';
import { EmotionTracker } from '../emotion/emotion-tracker';
import { intensityDisplayName, loadLexicon, moodDisplayName, MoodLexicon } from '../emotion/lexicon';
import { MoodSignalDetector } from '../emotion/mood-detector';
import {
  InvalidInputError,
  isDialogueError,
  SessionConflictError,
  SessionExpiredError,
  SessionNotFoundError,
  StorageError,
} from '../errors/dialogue-errors';
import { IntentClassifier, PatternIntentClassifier } from '../intent/intent-classifier';
import { detectLocale } from '../nlp/text';
import { childLogger, logger } from '../observability/logger';
import {
  clarityScores,
  idempotentReplays,
  recommendationHandoffs,
  turnDuration,
  turnsProcessed,
} from '../observability/metrics';
import { createTraceContext, summarizeSpans, traced, tracedAsync, TraceContext } from '../observability/trace';
import { QuestionBank, SelectedQuestion } from '../questions/question-bank';
import { SessionLock } from '../session/session-lock';
import { ConversationSession, ConversationTurn, SessionStore } from '../session/types';
import { StrategyDecision, StrategyEngine } from '../strategy/strategy-engine';
import { InflightDedup } from './inflight-dedup';
import { LoggingRecommendationSink, RecommendationSink } from './recommendation-sink';
import { ResponseComposer } from './response-composer';

export interface ConversationManagerDeps {
  store: SessionStore;
  config: DialogueConfig;
  classifier?: IntentClassifier;
  detector?: MoodSignalDetector;
  contextExtractor?: ContextSignalExtractor;
  questionBank?: QuestionBank;
  composer?: ResponseComposer;
  sink?: RecommendationSink;
  lock?: SessionLock;
  lexicon?: MoodLexicon;
  clock?: () => number;
}

export interface SessionSummary {
  session: ConversationSession;
  turns: ConversationTurn[];
}

interface ComposedReply {
  botMessage: string;
  responseType: ResponseType;
  questionId?: string;
}

/** Work items for one turn once the session is resolved. */
interface TurnPlan {
  session: ConversationSession;
  text: string;
  locale: Locale;
  intent: IntentResult;
  signals: EmotionalSignals;
  contextSignals: ContextSignals;
  source: MoodSource;
  emotionalContext: EmotionalContext;
  clarity: ClarityResult;
  outcome: TransitionOutcome;
  turnIndex: number;
  /** HELP answered without moving the dialogue */
  answeredInPlace: boolean;
}

/**
 * Runs one user turn end to end:
 * validate → idempotency → lock → resolve session → classify → extract →
 * track → score → transition → strategy → compose → commit → hand off.
 *
 * Nothing is written until the single `commitTurn` at the end, so a failed
 * turn leaves the session exactly as it was.
 */
export class ConversationManager {
  readonly store: SessionStore;
  readonly lock: SessionLock;
  private readonly config: DialogueConfig;
  private readonly classifier: IntentClassifier;
  private readonly detector: MoodSignalDetector;
  private readonly contextExtractor: ContextSignalExtractor;
  private readonly tracker: EmotionTracker;
  private readonly clarityModel: ClarityModel;
  private readonly stateMachine: DialogueStateMachine;
  private readonly strategy: StrategyEngine;
  private readonly questionBank: QuestionBank;
  private readonly composer: ResponseComposer;
  private readonly sink: RecommendationSink;
  private readonly lexicon: MoodLexicon;
  private readonly clock: () => number;
  private readonly inflight = new InflightDedup<TurnResponse>();
  private log = logger.child({ component: 'conversation-manager' });

  constructor(deps: ConversationManagerDeps) {
    const { config } = deps;
    this.config = config;
    this.store = deps.store;
    this.lexicon = deps.lexicon ?? loadLexicon();
    this.classifier = deps.classifier ?? new PatternIntentClassifier(undefined, this.lexicon);
    this.detector = deps.detector ?? new MoodSignalDetector(this.lexicon);
    this.contextExtractor = deps.contextExtractor ?? new ContextSignalExtractor();
    this.tracker = new EmotionTracker(
      { consistencyWindow: config.consistencyWindow, minMoodConfidence: config.minMoodConfidence },
      this.lexicon,
    );
    this.clarityModel = new ClarityModel(config.weights, config.thresholds);
    this.stateMachine = new DialogueStateMachine({
      maxTurns: config.maxTurns,
      thresholds: config.thresholds,
      contextClearThreshold: config.contextClearThreshold,
    });
    this.strategy = new StrategyEngine(config.maxTurns);
    this.questionBank = deps.questionBank ?? new QuestionBank();
    this.composer = deps.composer ?? new ResponseComposer();
    this.sink = deps.sink ?? new LoggingRecommendationSink();
    this.lock = deps.lock ?? new SessionLock();
    this.clock = deps.clock ?? Date.now;
  }

  /** Seed question usage from the store so selection balances across restarts. */
  async warmUp(): Promise<void> {
    this.questionBank.hydrate(await this.store.getQuestionUsage());
  }

  // ───── Turn processing ─────

  async processTurn(request: TurnRequest): Promise<TurnResponse> {
    const timer = turnDuration.startTimer();

    try {
      ConversationManager.validate(request);
      const idempotencyKey = request.idempotencyKey ? `${request.userId}:${request.idempotencyKey}` : undefined;
      if (!idempotencyKey) {
        return await this.processLocked(request);
      }

      const cached = await this.store.getIdempotentResponse(idempotencyKey, this.clock());
      if (cached !== null) return this.replay(cached, idempotencyKey);

      return await this.inflight.run(idempotencyKey, () => this.processLocked(request, idempotencyKey));
    } catch (err) {
      turnsProcessed.inc({ outcome: isDialogueError(err) ? err.code.toLowerCase() : 'error' });
      throw err;
    } finally {
      timer();
    }
  }

  private async processLocked(request: TurnRequest, idempotencyKey?: string): Promise<TurnResponse> {
    const lockKey = request.sessionId ?? `new:${request.userId}`;

    return this.lock.runExclusive(lockKey, async () => {
      if (idempotencyKey) {
        const cached = await this.store.getIdempotentResponse(idempotencyKey, this.clock());
        if (cached !== null) return this.replay(cached, idempotencyKey);
      }

      for (let attempt = 0; ; attempt++) {
        try {
          return await this.executeTurn(request, idempotencyKey);
        } catch (err) {
          if (!(err instanceof SessionConflictError)) throw err;
          if (attempt >= this.config.maxCommitRetries) {
            throw new StorageError(`Session ${err.sessionId} kept changing; gave up after ${attempt + 1} attempts`, err);
          }
          this.log.warn({ sessionId: err.sessionId, attempt }, 'Version conflict on commit; retrying');
        }
      }
    });
  }

  private replay(serialized: string, idempotencyKey: string): TurnResponse {
    idempotentReplays.inc();
    turnsProcessed.inc({ outcome: 'replayed' });
    this.log.debug({ idempotencyKey }, 'Idempotent replay');
    return JSON.parse(serialized);
  }

  private async executeTurn(request: TurnRequest, idempotencyKey?: string): Promise<TurnResponse> {
    const now = this.clock();
    const trace = createTraceContext({ userId: request.userId });
    const session = await this.resolveSession(request, now);
    trace.sessionId = session.sessionId;
    const log = childLogger(trace.requestId, { sessionId: session.sessionId, component: 'conversation-manager' });

    const plan = this.plan(request, session, now, trace);
    const { outcome, clarity, emotionalContext, turnIndex } = plan;

    const decision: StrategyDecision | null =
      plan.answeredInPlace ? null : traced(trace, 'strategy', () => this.strategy.decide(outcome.state, clarity, turnIndex));
    const reply = this.compose(plan, decision);

    const enteredRecommending =
      outcome.state === 'RECOMMENDING' && outcome.trigger !== null && session.state !== 'RECOMMENDING';
    const enrichedRequest = enteredRecommending ? this.buildEnrichedRequest(plan, outcome.trigger) : undefined;

    const next: ConversationSession = {
      ...session,
      state: outcome.state,
      turnCount: turnIndex,
      lastActivityAt: now,
      emotionalContext,
      askedQuestionIds: reply.questionId ? [...session.askedQuestionIds, reply.questionId] : session.askedQuestionIds,
      enrichedRequest: enrichedRequest ?? session.enrichedRequest,
      ...(isTerminal(outcome.state) && outcome.trigger ? { endedAt: now, endReason: outcome.trigger } : {}),
    };

    const response: TurnResponse = {
      sessionId: session.sessionId,
      turnIndex,
      dialogueState: outcome.state,
      botMessage: reply.botMessage,
      responseType: reply.responseType,
      shouldRecommend: enrichedRequest !== undefined,
      clarityScore: clarity.score,
      detectedMood: emotionalContext.dominantMood,
      detectedIntensity: emotionalContext.dominantIntensity,
      ...(enrichedRequest ? { enrichedRequest } : {}),
    };
    const serialized = JSON.stringify(response);

    const turn: ConversationTurn = {
      turnId: uuidv4(),
      sessionId: session.sessionId,
      turnIndex,
      inputText: plan.text,
      inputType: request.inputType ?? 'text',
      intent: plan.intent.intent,
      intentConfidence: plan.intent.confidence,
      emotionalSignals: plan.signals,
      contextSignals: plan.contextSignals,
      stateBefore: session.state,
      stateAfter: outcome.state,
      trigger: outcome.trigger,
      clarity,
      responseType: reply.responseType,
      botMessage: reply.botMessage,
      ...(reply.questionId ? { questionId: reply.questionId } : {}),
      timestamp: now,
    };

    await tracedAsync(trace, 'persist', () =>
      this.store.commitTurn({
        session: next,
        turn,
        expectedVersion: session.version,
        idempotency: idempotencyKey
          ? { key: idempotencyKey, sessionId: session.sessionId, response: serialized, createdAt: now }
          : undefined,
      }),
    );

    if (reply.questionId) this.questionBank.recordUsage(reply.questionId);
    clarityScores.observe(clarity.score);
    turnsProcessed.inc({ outcome: 'ok' });
    log.info(
      {
        turnIndex,
        intent: plan.intent.intent,
        stateBefore: session.state,
        stateAfter: outcome.state,
        trigger: outcome.trigger,
        clarity: Number(clarity.score.toFixed(3)),
        inputLength: plan.text.length,
        spans: summarizeSpans(trace),
      },
      'Turn processed',
    );

    if (enrichedRequest) await this.handOff(enrichedRequest, log);

    return JSON.parse(serialized);
  }

  private plan(request: TurnRequest, session: ConversationSession, now: number, trace: TraceContext): TurnPlan {
    const text = request.inputText.trim();
    const turnIndex = session.turnCount + 1;
    const chip = request.inputType === 'chip' ? request.moodChip : undefined;

    const intent: IntentResult = chip
      ? { intent: 'MOOD_EXPRESSION', confidence: 1 }
      : traced(trace, 'classify', () => this.classifier.classify(text, session.state));

    const signals = traced(trace, 'detect', () =>
      chip ? this.detector.fromChip(chip, text) : this.detector.detect(text),
    );
    const contextSignals = traced(trace, 'extract', () => this.contextExtractor.extract(text, now));
    const context = this.contextExtractor.merge(session.emotionalContext.context, contextSignals);

    // HELP answers in place: the turn is recorded, state and emotional context do not move.
    // The turn budget still applies, so a HELP that spends the last turn recommends.
    const isHelp = intent.intent === 'HELP';
    const answeredInPlace = isHelp && !this.stateMachine.budgetSpent(session.state, turnIndex);
    const source: MoodSource = chip ? 'chip' : intent.intent === 'MOOD_CORRECTION' ? 'correction' : 'text';
    const emotionalContext = isHelp
      ? session.emotionalContext
      : traced(trace, 'track', () =>
          this.tracker.update(session.emotionalContext, { signals, turnIndex, timestamp: now, source, context }),
        );
    const clarity = traced(trace, 'score', () => this.clarityModel.score(emotionalContext));

    const outcome: TransitionOutcome =
      answeredInPlace
        ? { state: session.state, trigger: null }
        : traced(trace, 'transition', () =>
            this.stateMachine.transition(session.sessionId, session.state, intent.intent, clarity, turnIndex),
          );

    return {
      session,
      text,
      locale: session.locale,
      intent,
      signals,
      contextSignals,
      source,
      emotionalContext,
      clarity,
      outcome,
      turnIndex,
      answeredInPlace,
    };
  }

  // ───── Session resolution ─────

  /**
   * The session the turn belongs to. Missing, expired, terminal or foreign
   * sessions are replaced by a fresh one.
   */
  private async resolveSession(request: TurnRequest, now: number): Promise<ConversationSession> {
    if (request.sessionId) {
      try {
        const session = await this.store.loadSession(request.sessionId, now);
        if (session.userId !== request.userId) {
          this.log.warn({ sessionId: session.sessionId }, 'Session belongs to another user; starting a new one');
        } else if (isTerminal(session.state)) {
          this.log.info({ sessionId: session.sessionId, state: session.state }, 'Session already closed; starting a new one');
        } else {
          return session;
        }
      } catch (err) {
        if (err instanceof SessionExpiredError) {
          this.log.info({ sessionId: err.sessionId, idleMs: err.idleMs }, 'Session timed out; starting a new one');
        } else if (err instanceof SessionNotFoundError) {
          this.log.info({ sessionId: err.sessionId }, 'Session not found; starting a new one');
        } else {
          throw err;
        }
      }
    }

    const locale = detectLocale(request.inputText) ?? this.config.defaultLocale;
    const session = await this.store.createSession(request.userId, now, locale);
    this.log.info({ sessionId: session.sessionId, locale }, 'Session created');
    return session;
  }

  // ───── Reply composition ─────

  private compose(plan: TurnPlan, decision: StrategyDecision | null): ComposedReply {
    const { locale, outcome, session, emotionalContext } = plan;
    const composer = this.composer;

    if (!decision) {
      return { botMessage: composer.help(locale), responseType: 'clarification' };
    }

    switch (decision.kind) {
      case 'proceed': {
        const mood = emotionalContext.dominantMood ?? this.config.fallbackMood;
        return {
          botMessage: composer.recommend(locale, moodDisplayName(this.lexicon, mood, locale)),
          responseType: 'recommendation',
        };
      }

      case 'feedback':
        return { botMessage: composer.feedbackPrompt(locale), responseType: 'feedback_ack' };

      case 'close':
        return {
          botMessage:
            outcome.state === 'ABORTED'
              ? composer.aborted(locale)
              : outcome.trigger === 'feedback_done'
                ? composer.feedback(locale)
                : composer.farewell(locale),
          responseType: 'farewell',
        };

      case 'confirm': {
        const question = this.selectQuestion(plan, 'confirm', decision.depth);
        return {
          botMessage: question?.text ?? composer.acknowledge(locale, emotionalContext.dominantMood),
          responseType: 'confirmation',
          questionId: question?.id,
        };
      }

      case 'probe': {
        const question = this.selectQuestion(plan, decision.dimension, decision.depth);
        let lead: string | undefined;
        let responseType: ResponseType = outcome.state === session.state ? 'clarification' : 'probing';

        if (session.state === 'GREETING' && plan.intent.intent === 'GREETING') {
          lead = composer.greeting(locale);
          responseType = 'greeting';
        } else if (outcome.trigger === 'feedback_mismatch') {
          lead = composer.feedbackRetry(locale);
        } else if (plan.signals.mood && emotionalContext.dominantMood === plan.signals.mood) {
          lead = composer.acknowledge(locale, plan.signals.mood);
        }

        return {
          botMessage: ResponseComposer.join(lead, question?.text),
          responseType,
          questionId: question?.id,
        };
      }
    }
  }

  private selectQuestion(
    plan: TurnPlan,
    category: 'mood' | 'intensity' | 'context' | 'confirm',
    depth: 1 | 2 | 3,
  ): SelectedQuestion | null {
    const { locale, emotionalContext, session } = plan;
    const mood = emotionalContext.dominantMood ?? this.config.fallbackMood;
    const intensity = emotionalContext.dominantIntensity ?? 'medium';
    return this.questionBank.select({
      category,
      depth,
      exclude: session.askedQuestionIds,
      locale,
      vars: {
        mood: moodDisplayName(this.lexicon, mood, locale),
        intensity: intensityDisplayName(this.lexicon, intensity, locale),
      },
    });
  }

  // ───── Hand-off ─────

  private buildEnrichedRequest(plan: TurnPlan, trigger: TransitionTrigger | null): EnrichedRequest {
    const ctx = plan.emotionalContext;
    const source: EnrichedRequest['source'] =
      trigger === 'skip'
        ? 'skip'
        : trigger === 'budget_exhausted'
          ? 'budget_exhausted'
          : plan.source === 'chip'
            ? 'chip'
            : 'conversation';

    return {
      sessionId: plan.session.sessionId,
      userId: plan.session.userId,
      mood: ctx.dominantMood ?? this.config.fallbackMood,
      intensity: ctx.dominantIntensity ?? 'medium',
      confidence: ctx.dominantMood ? ctx.moodConfidence : 0,
      valence: ctx.valence,
      arousal: ctx.arousal,
      context: ctx.context,
      source,
    };
  }

  private async handOff(request: EnrichedRequest, log: pino.Logger): Promise<void> {
    try {
      await this.sink.handoff(request);
      recommendationHandoffs.inc({ status: 'ok' });
    } catch (err) {
      recommendationHandoffs.inc({ status: 'failed' });
      log.warn({ err }, 'Recommendation hand-off failed; turn already committed');
    }
  }

  // ───── Session operations ─────

  /** Close a session on the user's request. Closing a closed session is a no-op. */
  async endSession(sessionId: string): Promise<ConversationSession> {
    return this.lock.runExclusive(sessionId, async () => {
      const session = await this.store.getSession(sessionId);
      if (!session) throw new SessionNotFoundError(sessionId);
      if (isTerminal(session.state)) return session;

      const outcome = this.stateMachine.apply(sessionId, session.state, 'user_ended');
      if (!isTerminal(outcome.state)) return session;
      return this.store.closeSession(sessionId, outcome.state, 'user_ended', this.clock());
    });
  }

  async getSessionSummary(sessionId: string): Promise<SessionSummary> {
    const session = await this.store.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return { session, turns: await this.store.listTurns(sessionId) };
  }

  /** Latest hand-off payload, or null while the conversation has not reached a recommendation. */
  async getEnrichedRequest(sessionId: string): Promise<EnrichedRequest | null> {
    const session = await this.store.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session.enrichedRequest;
  }

  // ───── Validation ─────

  private static validate(request: TurnRequest): void {
    if (typeof request.userId !== 'string' || request.userId.trim() === '') {
      throw new InvalidInputError('user_id must not be empty');
    }
    if (typeof request.inputText !== 'string' || request.inputText.trim() === '') {
      throw new InvalidInputError();
    }
    if (request.inputType === 'chip' && !isMoodLabel(request.moodChip)) {
      throw new InvalidInputError('mood_chip must name a known mood when input_type is chip');
    }
  }
}
