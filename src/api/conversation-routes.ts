import { FastifyInstance, FastifyReply } from 'fastify';
import { ConversationManager, SessionSummary } from '../orchestrator/conversation-manager';
import { EnrichedRequest, InputType, MOOD_LABELS, MoodLabel, TurnResponse } from '../dialogue/types';
import { isDialogueError } from '../errors/dialogue-errors';
import { logger } from '../observability/logger';

/** POST /v1/conversation/turn */
interface TurnBody {
  user_id: string;
  input_text: string;
  session_id?: string;
  idempotency_key?: string;
  input_type?: InputType;
  mood_chip?: MoodLabel;
}

interface SessionParams {
  id: string;
}

const turnBodySchema = {
  type: 'object',
  properties: {
    user_id: { type: 'string', minLength: 1, maxLength: 128 },
    input_text: { type: 'string', maxLength: 2000 },
    session_id: { type: 'string', minLength: 1, maxLength: 128 },
    idempotency_key: { type: 'string', minLength: 1, maxLength: 128 },
    input_type: { type: 'string', enum: ['text', 'chip'] },
    mood_chip: { type: 'string', enum: [...MOOD_LABELS] },
  },
  required: ['user_id', 'input_text'],
  additionalProperties: false,
} as const;

const sessionParamsSchema = {
  type: 'object',
  properties: { id: { type: 'string', minLength: 1 } },
  required: ['id'],
} as const;

// ───── Wire mapping (snake_case) ─────

function enrichedToWire(request: EnrichedRequest): Record<string, unknown> {
  return {
    session_id: request.sessionId,
    user_id: request.userId,
    mood: request.mood,
    intensity: request.intensity,
    confidence: request.confidence,
    valence: request.valence,
    arousal: request.arousal,
    context: request.context
      ? { time_of_day: request.context.timeOfDay, activity: request.context.activity, social: request.context.social }
      : null,
    source: request.source,
  };
}

function turnToWire(response: TurnResponse): Record<string, unknown> {
  return {
    session_id: response.sessionId,
    turn_index: response.turnIndex,
    dialogue_state: response.dialogueState,
    bot_message: response.botMessage,
    response_type: response.responseType,
    should_recommend: response.shouldRecommend,
    clarity_score: response.clarityScore,
    detected_mood: response.detectedMood,
    detected_intensity: response.detectedIntensity,
    ...(response.enrichedRequest ? { enriched_request: enrichedToWire(response.enrichedRequest) } : {}),
  };
}

function summaryToWire(summary: SessionSummary): Record<string, unknown> {
  const { session, turns } = summary;
  return {
    session_id: session.sessionId,
    user_id: session.userId,
    state: session.state,
    turn_count: session.turnCount,
    max_turns: session.maxTurns,
    locale: session.locale,
    created_at: new Date(session.createdAt).toISOString(),
    last_activity_at: new Date(session.lastActivityAt).toISOString(),
    ended_at: session.endedAt ? new Date(session.endedAt).toISOString() : null,
    end_reason: session.endReason ?? null,
    dominant_mood: session.emotionalContext.dominantMood,
    dominant_intensity: session.emotionalContext.dominantIntensity,
    turns: turns.map((t) => ({
      turn_index: t.turnIndex,
      input_type: t.inputType,
      intent: t.intent,
      intent_confidence: t.intentConfidence,
      state_before: t.stateBefore,
      state_after: t.stateAfter,
      trigger: t.trigger,
      clarity_score: t.clarity.score,
      response_type: t.responseType,
      bot_message: t.botMessage,
      question_id: t.questionId ?? null,
      timestamp: new Date(t.timestamp).toISOString(),
    })),
  };
}

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_INPUT: 400,
  SESSION_NOT_FOUND: 404,
  STORAGE_ERROR: 503,
};

function sendError(reply: FastifyReply, err: unknown, log: typeof logger): FastifyReply {
  if (isDialogueError(err)) {
    const status = STATUS_BY_CODE[err.code] ?? 500;
    if (status >= 500) log.error({ err }, 'Conversation request failed');
    return reply.status(status).send({ error: err.message, code: err.code, retriable: err.retriable });
  }
  log.error({ err }, 'Unexpected conversation error');
  return reply.status(500).send({ error: 'Internal error', code: 'INTERNAL', retriable: false });
}

/**
 * Register the conversation endpoints.
 */
export function registerConversationRoutes(app: FastifyInstance, manager: ConversationManager): void {
  const log = logger.child({ component: 'conversation-routes' });

  // ─────────────────────────────────────────────
  // POST /v1/conversation/turn: Process one user turn
  // ─────────────────────────────────────────────
  app.post<{ Body: TurnBody }>('/v1/conversation/turn', { schema: { body: turnBodySchema } }, async (req, reply) => {
    const body = req.body;
    try {
      const response = await manager.processTurn({
        userId: body.user_id,
        inputText: body.input_text,
        sessionId: body.session_id,
        idempotencyKey: body.idempotency_key ?? req.headers['idempotency-key']?.toString(),
        inputType: body.input_type,
        moodChip: body.mood_chip,
      });
      return reply.send(turnToWire(response));
    } catch (err) {
      return sendError(reply, err, log);
    }
  });

  // ─────────────────────────────────────────────
  // GET /v1/conversation/sessions/:id: Session summary with turns
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>(
    '/v1/conversation/sessions/:id',
    { schema: { params: sessionParamsSchema } },
    async (req, reply) => {
      try {
        return reply.send(summaryToWire(await manager.getSessionSummary(req.params.id)));
      } catch (err) {
        return sendError(reply, err, log);
      }
    },
  );

  // ─────────────────────────────────────────────
  // POST /v1/conversation/sessions/:id/end: End a conversation
  // ─────────────────────────────────────────────
  app.post<{ Params: SessionParams }>(
    '/v1/conversation/sessions/:id/end',
    { schema: { params: sessionParamsSchema } },
    async (req, reply) => {
      try {
        const session = await manager.endSession(req.params.id);
        return reply.send({ session_id: session.sessionId, state: session.state });
      } catch (err) {
        return sendError(reply, err, log);
      }
    },
  );

  // ─────────────────────────────────────────────
  // GET /v1/conversation/sessions/:id/enriched: Latest hand-off payload
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>(
    '/v1/conversation/sessions/:id/enriched',
    { schema: { params: sessionParamsSchema } },
    async (req, reply) => {
      try {
        const enriched = await manager.getEnrichedRequest(req.params.id);
        if (!enriched) {
          return reply.status(404).send({ error: 'No recommendation request yet', code: 'NOT_READY' });
        }
        return reply.send(enrichedToWire(enriched));
      } catch (err) {
        return sendError(reply, err, log);
      }
    },
  );
}
