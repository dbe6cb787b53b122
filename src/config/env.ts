import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

/** Unset or unparsable values yield undefined so file config stays in charge. */
function overrideNumber(key: string): number | undefined {
  const val = process.env[key];
  if (!val) return undefined;
  const parsed = Number(val);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function overrideString(key: string): string | undefined {
  return process.env[key] || undefined;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  redis: {
    enabled: optionalBool('REDIS_ENABLED', true),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'moodchat:'),
  },

  // ───── Dialogue overrides (config/dialogue.json holds the defaults) ─────
  dialogue: {
    maxTurns: overrideNumber('DIALOGUE_MAX_TURNS'),
    sessionTimeoutSeconds: overrideNumber('SESSION_TIMEOUT_SECONDS'),
    idempotencyTtlSeconds: overrideNumber('IDEMPOTENCY_TTL_SECONDS'),
    weightProfile: overrideString('CLARITY_WEIGHT_PROFILE'),
    defaultLocale: overrideString('DEFAULT_LOCALE'),
  },

  sweeper: {
    intervalSeconds: optionalInt('SESSION_SWEEP_INTERVAL_SECONDS', 60),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },
} as const;

export type DialogueEnvOverrides = typeof env.dialogue;
