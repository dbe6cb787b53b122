import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({ register, prefix: 'mood_dialogue_' });

// ───── HTTP ─────

export const httpRequestDuration = new client.Histogram({
  name: 'mood_dialogue_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [register],
});

// ───── Dialogue ─────

export const turnsProcessed = new client.Counter({
  name: 'mood_dialogue_turns_total',
  help: 'Turns processed, by outcome',
  labelNames: ['outcome'] as const,
  registers: [register],
});

export const turnDuration = new client.Histogram({
  name: 'mood_dialogue_turn_duration_seconds',
  help: 'End-to-end turn processing time',
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [register],
});

export const stateTransitions = new client.Counter({
  name: 'mood_dialogue_state_transitions_total',
  help: 'Dialogue state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

export const clarityScores = new client.Histogram({
  name: 'mood_dialogue_clarity_score',
  help: 'Clarity score after each turn',
  buckets: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1],
  registers: [register],
});

export const questionSelections = new client.Counter({
  name: 'mood_dialogue_question_selections_total',
  help: 'Probing questions selected, by category and depth',
  labelNames: ['category', 'depth', 'repeated'] as const,
  registers: [register],
});

// ───── Session store ─────

export const idempotentReplays = new client.Counter({
  name: 'mood_dialogue_idempotent_replays_total',
  help: 'Turn requests answered from the idempotency cache',
  registers: [register],
});

export const storageConflicts = new client.Counter({
  name: 'mood_dialogue_storage_conflicts_total',
  help: 'Optimistic version conflicts on turn commit',
  registers: [register],
});

export const sessionsExpired = new client.Counter({
  name: 'mood_dialogue_sessions_expired_total',
  help: 'Sessions moved to TIMEOUT, by path',
  labelNames: ['path'] as const,
  registers: [register],
});

export const recommendationHandoffs = new client.Counter({
  name: 'mood_dialogue_recommendation_handoffs_total',
  help: 'Enriched requests handed to the recommendation collaborator',
  labelNames: ['status'] as const,
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
