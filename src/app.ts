import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { DialogueConfig, DialogueConfigService } from './config/dialogue-config';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createSessionStore } from './session/session-store';
import { SessionStore } from './session/types';
import { SessionSweeper } from './session/session-sweeper';
import { ConversationManager } from './orchestrator/conversation-manager';
import { RecommendationSink } from './orchestrator/recommendation-sink';
import { registerConversationRoutes } from './api/conversation-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  manager: ConversationManager;
  sweeper: SessionSweeper;
  redis?: Redis;
}

export interface BuildAppOptions {
  /** Skip Redis and use this store (tests) */
  store?: SessionStore;
  config?: DialogueConfig;
  sink?: RecommendationSink;
  clock?: () => number;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled) {
    logger.info('Redis disabled; using in-memory session store');
    return undefined;
  }

  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 65_536,
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const config = options.config ?? new DialogueConfigService().get();

  const redis = options.store ? undefined : await connectRedis();
  const store =
    options.store ??
    createSessionStore(
      {
        sessionTimeoutMs: config.sessionTimeoutMs,
        idempotencyTtlMs: config.idempotencyTtlMs,
        retentionSeconds: config.sessionRetentionSeconds,
        maxTurns: config.maxTurns,
      },
      redis,
    );

  const manager = new ConversationManager({ store, config, sink: options.sink, clock: options.clock });
  await manager.warmUp();

  const sweeper = new SessionSweeper(store, manager.lock, env.sweeper.intervalSeconds * 1000, options.clock);

  registerHealthRoutes(app, store, redis ? 'redis' : 'memory');
  registerConversationRoutes(app, manager);

  logger.info(
    { maxTurns: config.maxTurns, weightProfile: config.weightProfile, store: redis ? 'redis' : 'memory' },
    'Mood dialogue service initialized',
  );

  return { app, manager, sweeper, redis };
}
