import { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';
import { memoryStore, testConfig, TestClock } from '../helpers/fixtures';

describe('Conversation API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    const config = testConfig();
    const clock = new TestClock();
    const result = await buildApp({ store: memoryStore(config), config, clock: clock.read });
    app = result.app;
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  async function turn(body: Record<string, unknown>, headers: Record<string, string> = {}) {
    return app.inject({ method: 'POST', url: '/v1/conversation/turn', payload: body, headers });
  }

  describe('POST /v1/conversation/turn', () => {
    it('should process a turn and answer in snake_case', async () => {
      const res = await turn({ user_id: 'api-user-1', input_text: 'buồn' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toEqual({
        session_id: expect.any(String),
        turn_index: 1,
        dialogue_state: 'PROBING_INTENSITY',
        bot_message: 'Mình hiểu, đôi khi mọi chuyện cũng có lúc như vậy. Bạn đang cảm nhận điều này mạnh mẽ đến mức nào?',
        response_type: 'probing',
        should_recommend: false,
        clarity_score: expect.any(Number),
        detected_mood: 'sad',
        detected_intensity: null,
      });
    });

    it('should return the enriched request when the turn recommends', async () => {
      const res = await turn({ user_id: 'api-user-2', input_text: 'rất', input_type: 'chip', mood_chip: 'happy' });

      expect(res.statusCode).toBe(200);
      expect(res.json().enriched_request).toEqual({
        session_id: res.json().session_id,
        user_id: 'api-user-2',
        mood: 'happy',
        intensity: 'high',
        confidence: 1,
        valence: expect.closeTo(0.8, 10),
        arousal: expect.closeTo(0.91, 10),
        context: { time_of_day: 'morning', activity: null, social: null },
        source: 'chip',
      });
    });

    it('should reject whitespace-only input with 400', async () => {
      const res = await turn({ user_id: 'api-user-3', input_text: '   ' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'input_text must not be empty', code: 'INVALID_INPUT', retriable: false });
    });

    it('should reject a body that fails the schema', async () => {
      const res = await turn({ user_id: 'api-user-3' });
      expect(res.statusCode).toBe(400);
    });

    it('should honour the Idempotency-Key header', async () => {
      const first = await turn({ user_id: 'api-user-4', input_text: 'xin chào' }, { 'idempotency-key': 'req-1' });
      const second = await turn({ user_id: 'api-user-4', input_text: 'xin chào' }, { 'idempotency-key': 'req-1' });

      expect(second.statusCode).toBe(200);
      expect(second.body).toBe(first.body);
    });
  });

  describe('session endpoints', () => {
    it('should return the session summary with its turns', async () => {
      const created = (await turn({ user_id: 'api-user-5', input_text: 'xin chào' })).json();
      const res = await app.inject({ method: 'GET', url: `/v1/conversation/sessions/${created.session_id}` });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toEqual(
        expect.objectContaining({
          session_id: created.session_id,
          user_id: 'api-user-5',
          state: 'PROBING_MOOD',
          turn_count: 1,
          max_turns: 5,
          locale: 'vi',
          end_reason: null,
        }),
      );
      expect(body.turns).toHaveLength(1);
      expect(body.turns[0]).toEqual(
        expect.objectContaining({ turn_index: 1, intent: 'GREETING', trigger: 'mood_unclear', response_type: 'greeting' }),
      );
    });

    it('should return 404 for an unknown session', async () => {
      const res = await app.inject({ method: 'GET', url: '/v1/conversation/sessions/missing' });
      expect(res.statusCode).toBe(404);
      expect(res.json().code).toBe('SESSION_NOT_FOUND');
    });

    it('should end a session', async () => {
      const created = (await turn({ user_id: 'api-user-6', input_text: 'buồn' })).json();
      const res = await app.inject({ method: 'POST', url: `/v1/conversation/sessions/${created.session_id}/end` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ session_id: created.session_id, state: 'ENDED' });
    });

    it('should report NOT_READY until a recommendation exists', async () => {
      const created = (await turn({ user_id: 'api-user-7', input_text: 'buồn' })).json();
      const pending = await app.inject({ method: 'GET', url: `/v1/conversation/sessions/${created.session_id}/enriched` });
      expect(pending.statusCode).toBe(404);
      expect(pending.json().code).toBe('NOT_READY');

      await turn({ user_id: 'api-user-7', input_text: 'bỏ qua', session_id: created.session_id });
      const ready = await app.inject({ method: 'GET', url: `/v1/conversation/sessions/${created.session_id}/enriched` });
      expect(ready.statusCode).toBe(200);
      expect(ready.json()).toEqual(expect.objectContaining({ mood: 'sad', source: 'skip' }));
    });
  });

  describe('health', () => {
    it('should report liveness', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe('ok');
    });

    it('should report readiness from the session store', async () => {
      const res = await app.inject({ method: 'GET', url: '/ready' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(
        expect.objectContaining({ status: 'ready', checks: { sessionStore: expect.objectContaining({ status: 'ok', backend: 'memory' }) } }),
      );
    });

    it('should expose Prometheus metrics', async () => {
      const res = await app.inject({ method: 'GET', url: '/metrics' });
      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('mood_dialogue_turns_total');
    });
  });
});
