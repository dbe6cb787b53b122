import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import {
  CommitTurnInput,
  ConversationSession,
  ConversationTurn,
  IdempotencyRecord,
  PurgeResult,
  SessionStore,
  SessionStoreOptions,
} from './types';
import { TransitionTrigger } from '../dialogue/state-machine';
import { isTerminal, Locale, TerminalState } from '../dialogue/types';
import { EmotionTracker } from '../emotion/emotion-tracker';
import { env } from '../config/env';
import {
  isDialogueError,
  SessionConflictError,
  SessionExpiredError,
  SessionNotFoundError,
  StorageError,
} from '../errors/dialogue-errors';
import { logger } from '../observability/logger';
import { sessionsExpired, storageConflicts } from '../observability/metrics';

const log = logger.child({ component: 'session-store' });

function newSession(userId: string, now: number, locale: Locale, maxTurns: number): ConversationSession {
  return {
    sessionId: uuidv4(),
    userId,
    state: 'GREETING',
    turnCount: 0,
    maxTurns,
    createdAt: now,
    lastActivityAt: now,
    version: 0,
    emotionalContext: EmotionTracker.initialContext(),
    locale,
    askedQuestionIds: [],
    enrichedRequest: null,
  };
}

function closedCopy(
  session: ConversationSession,
  state: TerminalState,
  reason: TransitionTrigger,
  now: number,
): ConversationSession {
  return { ...session, state, endReason: reason, endedAt: now, version: session.version + 1 };
}

function isIdle(session: ConversationSession, now: number, timeoutMs: number): boolean {
  return !isTerminal(session.state) && now - session.lastActivityAt > timeoutMs;
}

/** The turn must be the next row after the ones already persisted. */
function assertTurnFollows(input: CommitTurnInput): void {
  if (input.turn.turnIndex !== input.session.turnCount || input.turn.sessionId !== input.session.sessionId) {
    throw new StorageError(
      `Turn ${input.turn.turnIndex} does not match session ${input.session.sessionId} at turn ${input.session.turnCount}`,
    );
  }
}

// ───── Redis ─────

/**
 * Checks the stored version and writes session, turn row, activity index,
 * idempotency record and usage counter in one step.
 */
const COMMIT_TURN_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return 'missing' end
if tonumber(cjson.decode(current).version) ~= tonumber(ARGV[1]) then return 'conflict' end
redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[4])
redis.call('RPUSH', KEYS[2], ARGV[3])
redis.call('EXPIRE', KEYS[2], ARGV[4])
if ARGV[10] == '1' then
  redis.call('ZADD', KEYS[3], ARGV[5], ARGV[6])
else
  redis.call('ZREM', KEYS[3], ARGV[6])
end
if ARGV[7] ~= '' then redis.call('SET', KEYS[4], ARGV[7], 'PX', ARGV[8]) end
if ARGV[9] ~= '' then redis.call('HINCRBY', KEYS[5], ARGV[9], 1) end
return 'ok'
`;

const CLOSE_SESSION_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return 'missing' end
if tonumber(cjson.decode(current).version) ~= tonumber(ARGV[1]) then return 'conflict' end
redis.call('SET', KEYS[1], ARGV[2], 'EX', ARGV[3])
redis.call('EXPIRE', KEYS[2], ARGV[3])
redis.call('ZREM', KEYS[3], ARGV[4])
return 'ok'
`;

/**
 * Redis-backed store. Session JSON and turn lists expire after the retention
 * period; live sessions are indexed in a sorted set by last activity so the
 * sweeper finds idle ones without a scan.
 */
export class RedisSessionStore implements SessionStore {
  private prefix: string;

  constructor(
    private readonly redis: Redis,
    private readonly options: SessionStoreOptions,
    prefix: string = env.redis.keyPrefix,
  ) {
    this.prefix = prefix;
  }

  private sessionKey(sessionId: string): string {
    return `${this.prefix}session:${sessionId}`;
  }

  private turnsKey(sessionId: string): string {
    return `${this.prefix}session:${sessionId}:turns`;
  }

  private idempotencyKey(key: string): string {
    return `${this.prefix}idem:${key}`;
  }

  private get activityKey(): string {
    return `${this.prefix}sessions:active`;
  }

  private get usageKey(): string {
    return `${this.prefix}question-usage`;
  }

  async createSession(userId: string, now: number, locale: Locale): Promise<ConversationSession> {
    const session = newSession(userId, now, locale, this.options.maxTurns);
    await this.run('createSession', async () => {
      await this.redis
        .multi()
        .set(this.sessionKey(session.sessionId), JSON.stringify(session), 'EX', this.options.retentionSeconds)
        .zadd(this.activityKey, now, session.sessionId)
        .exec();
    });
    return session;
  }

  async getSession(sessionId: string): Promise<ConversationSession | null> {
    const raw = await this.run('getSession', () => this.redis.get(this.sessionKey(sessionId)));
    return raw ? RedisSessionStore.decode<ConversationSession>(raw, 'sessionId') : null;
  }

  async loadSession(sessionId: string, now: number): Promise<ConversationSession> {
    const session = await this.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    if (isIdle(session, now, this.options.sessionTimeoutMs)) {
      await this.writeClosed(session, closedCopy(session, 'TIMEOUT', 'idle_timeout', now));
      sessionsExpired.inc({ path: 'load' });
      throw new SessionExpiredError(sessionId, now - session.lastActivityAt);
    }
    return session;
  }

  async commitTurn(input: CommitTurnInput): Promise<ConversationSession> {
    assertTurnFollows(input);
    const committed: ConversationSession = { ...input.session, version: input.expectedVersion + 1 };
    const { sessionId } = committed;

    const result = await this.run('commitTurn', () =>
      this.redis.eval(
        COMMIT_TURN_SCRIPT,
        5,
        this.sessionKey(sessionId),
        this.turnsKey(sessionId),
        this.activityKey,
        this.idempotencyKey(input.idempotency?.key ?? ''),
        this.usageKey,
        String(input.expectedVersion),
        JSON.stringify(committed),
        JSON.stringify(input.turn),
        String(this.options.retentionSeconds),
        String(committed.lastActivityAt),
        sessionId,
        input.idempotency ? JSON.stringify(input.idempotency) : '',
        String(this.options.idempotencyTtlMs),
        input.turn.questionId ?? '',
        isTerminal(committed.state) ? '0' : '1',
      ),
    );

    this.checkScriptResult(result, sessionId, input.expectedVersion);
    return committed;
  }

  async closeSession(
    sessionId: string,
    state: TerminalState,
    reason: TransitionTrigger,
    now: number,
  ): Promise<ConversationSession> {
    const session = await this.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (isTerminal(session.state)) return session;

    const closed = closedCopy(session, state, reason, now);
    await this.writeClosed(session, closed);
    return closed;
  }

  async getIdempotentResponse(key: string, now: number): Promise<string | null> {
    const raw = await this.run('getIdempotentResponse', () => this.redis.get(this.idempotencyKey(key)));
    if (!raw) return null;
    const record = RedisSessionStore.decode<IdempotencyRecord>(raw, 'key');
    return now - record.createdAt < this.options.idempotencyTtlMs ? record.response : null;
  }

  async listTurns(sessionId: string): Promise<ConversationTurn[]> {
    const rows = await this.run('listTurns', () => this.redis.lrange(this.turnsKey(sessionId), 0, -1));
    return rows.map((row) => RedisSessionStore.decode<ConversationTurn>(row, 'turnId'));
  }

  async getQuestionUsage(): Promise<Record<string, number>> {
    const raw = await this.run('getQuestionUsage', () => this.redis.hgetall(this.usageKey));
    const usage: Record<string, number> = {};
    for (const [id, count] of Object.entries(raw)) {
      usage[id] = parseInt(count, 10) || 0;
    }
    return usage;
  }

  /** Idempotency records and retired sessions expire through Redis TTLs; this sweeps the activity index. */
  async purgeExpired(now: number, isBusy: (sessionId: string) => boolean = () => false): Promise<PurgeResult> {
    const cutoff = now - this.options.sessionTimeoutMs;
    const ids = await this.run('purgeExpired', () =>
      this.redis.zrangebyscore(this.activityKey, '-inf', `(${cutoff}`),
    );

    const result: PurgeResult = { sessionsExpired: 0, keysPurged: 0 };
    for (const sessionId of ids) {
      if (isBusy(sessionId)) continue;
      const session = await this.getSession(sessionId);

      if (!session || isTerminal(session.state)) {
        await this.run('purgeExpired', () => this.redis.zrem(this.activityKey, sessionId));
        result.keysPurged++;
        continue;
      }
      if (!isIdle(session, now, this.options.sessionTimeoutMs)) continue;

      try {
        await this.writeClosed(session, closedCopy(session, 'TIMEOUT', 'idle_timeout', now));
        sessionsExpired.inc({ path: 'sweep' });
        result.sessionsExpired++;
      } catch (err) {
        if (!(err instanceof SessionConflictError)) throw err;
        log.debug({ sessionId }, 'Session changed during sweep; skipped');
      }
    }
    return result;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      log.warn({ err }, 'Redis ping failed');
      return false;
    }
  }

  private async writeClosed(current: ConversationSession, closed: ConversationSession): Promise<void> {
    const result = await this.run('closeSession', () =>
      this.redis.eval(
        CLOSE_SESSION_SCRIPT,
        3,
        this.sessionKey(current.sessionId),
        this.turnsKey(current.sessionId),
        this.activityKey,
        String(current.version),
        JSON.stringify(closed),
        String(this.options.retentionSeconds),
        current.sessionId,
      ),
    );
    this.checkScriptResult(result, current.sessionId, current.version);
  }

  private checkScriptResult(result: unknown, sessionId: string, expectedVersion: number): void {
    if (result === 'ok') return;
    if (result === 'missing') throw new SessionNotFoundError(sessionId);
    if (result === 'conflict') {
      storageConflicts.inc();
      throw new SessionConflictError(sessionId, expectedVersion);
    }
    throw new StorageError(`Unexpected script result for session ${sessionId}: ${String(result)}`);
  }

  /** Redis failures surface as StorageError; domain errors pass through. */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isDialogueError(err)) throw err;
      log.error({ err, operation }, 'Redis session store operation failed');
      throw new StorageError(`Session store ${operation} failed`, err);
    }
  }

  private static decode<T extends object>(raw: string, idField: keyof T): T {
    const parsed: T = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || typeof parsed[idField] !== 'string') {
      throw new StorageError(`Malformed ${String(idField)} record in session store`);
    }
    return parsed;
  }
}

// ───── In-memory ─────

/**
 * In-memory store (dev/test fallback). Same contract as the Redis store;
 * every read and write copies so callers never share state with the store.
 */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, ConversationSession>();
  private turns = new Map<string, ConversationTurn[]>();
  private idempotency = new Map<string, IdempotencyRecord>();
  private usage = new Map<string, number>();

  constructor(private readonly options: SessionStoreOptions) {}

  async createSession(userId: string, now: number, locale: Locale): Promise<ConversationSession> {
    const session = newSession(userId, now, locale, this.options.maxTurns);
    this.sessions.set(session.sessionId, structuredClone(session));
    this.turns.set(session.sessionId, []);
    return session;
  }

  async getSession(sessionId: string): Promise<ConversationSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async loadSession(sessionId: string, now: number): Promise<ConversationSession> {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    if (isIdle(session, now, this.options.sessionTimeoutMs)) {
      this.sessions.set(sessionId, closedCopy(session, 'TIMEOUT', 'idle_timeout', now));
      sessionsExpired.inc({ path: 'load' });
      throw new SessionExpiredError(sessionId, now - session.lastActivityAt);
    }
    return structuredClone(session);
  }

  async commitTurn(input: CommitTurnInput): Promise<ConversationSession> {
    assertTurnFollows(input);
    const { sessionId } = input.session;
    const current = this.sessions.get(sessionId);
    if (!current) throw new SessionNotFoundError(sessionId);
    if (current.version !== input.expectedVersion) {
      storageConflicts.inc();
      throw new SessionConflictError(sessionId, input.expectedVersion);
    }

    const committed: ConversationSession = { ...structuredClone(input.session), version: input.expectedVersion + 1 };
    this.sessions.set(sessionId, committed);
    this.turns.set(sessionId, [...(this.turns.get(sessionId) ?? []), structuredClone(input.turn)]);
    if (input.idempotency) {
      this.idempotency.set(input.idempotency.key, { ...input.idempotency });
    }
    if (input.turn.questionId) {
      this.usage.set(input.turn.questionId, (this.usage.get(input.turn.questionId) ?? 0) + 1);
    }
    return structuredClone(committed);
  }

  async closeSession(
    sessionId: string,
    state: TerminalState,
    reason: TransitionTrigger,
    now: number,
  ): Promise<ConversationSession> {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    if (isTerminal(session.state)) return structuredClone(session);

    const closed = closedCopy(session, state, reason, now);
    this.sessions.set(sessionId, closed);
    return structuredClone(closed);
  }

  async getIdempotentResponse(key: string, now: number): Promise<string | null> {
    const record = this.idempotency.get(key);
    if (!record) return null;
    if (now - record.createdAt >= this.options.idempotencyTtlMs) {
      this.idempotency.delete(key);
      return null;
    }
    return record.response;
  }

  async listTurns(sessionId: string): Promise<ConversationTurn[]> {
    return structuredClone(this.turns.get(sessionId) ?? []);
  }

  async getQuestionUsage(): Promise<Record<string, number>> {
    return Object.fromEntries(this.usage);
  }

  async purgeExpired(now: number, isBusy: (sessionId: string) => boolean = () => false): Promise<PurgeResult> {
    const result: PurgeResult = { sessionsExpired: 0, keysPurged: 0 };
    const retentionMs = this.options.retentionSeconds * 1000;

    for (const [sessionId, session] of this.sessions) {
      if (isBusy(sessionId)) continue;
      if (now - session.lastActivityAt > retentionMs) {
        this.sessions.delete(sessionId);
        this.turns.delete(sessionId);
        result.keysPurged++;
        continue;
      }
      if (isIdle(session, now, this.options.sessionTimeoutMs)) {
        this.sessions.set(sessionId, closedCopy(session, 'TIMEOUT', 'idle_timeout', now));
        sessionsExpired.inc({ path: 'sweep' });
        result.sessionsExpired++;
      }
    }

    for (const [key, record] of this.idempotency) {
      if (now - record.createdAt >= this.options.idempotencyTtlMs) {
        this.idempotency.delete(key);
        result.keysPurged++;
      }
    }
    return result;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

/**
 * Factory: Redis when a client is given, in-memory otherwise.
 */
export function createSessionStore(options: SessionStoreOptions, redis?: Redis): SessionStore {
  if (redis) {
    return new RedisSessionStore(redis, options);
  }
  log.warn('Using in-memory session store (no Redis)');
  return new InMemorySessionStore(options);
}
