import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { DialogueEnvOverrides, env } from './env';
import { ClarityWeights, CLARITY_COMPONENTS, Locale, MOOD_LABELS, MoodLabel } from '../dialogue/types';
import { ConfigError } from '../errors/dialogue-errors';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const CONFIG_DIR = path.resolve(PROJECT_ROOT, 'config');
const DIALOGUE_CONFIG_PATH = path.join(CONFIG_DIR, 'dialogue.json');

const WEIGHT_SUM_TOLERANCE = 1e-6;

/** Shape of config/dialogue.json */
export interface RawDialogueConfig {
  maxTurns: number;
  thresholds: { high: number; medium: number; low: number };
  minMoodConfidence: number;
  contextClearThreshold: number;
  consistencyWindow: number;
  weightProfile: string;
  weightProfiles: Record<string, ClarityWeights>;
  sessionTimeoutSeconds: number;
  idempotencyTtlSeconds: number;
  sessionRetentionSeconds: number;
  maxCommitRetries: number;
  fallbackMood: MoodLabel;
  defaultLocale: Locale;
}

export interface DialogueConfig {
  maxTurns: number;
  thresholds: { high: number; medium: number; low: number };
  minMoodConfidence: number;
  contextClearThreshold: number;
  consistencyWindow: number;
  weightProfile: string;
  /** Weights of the active profile */
  weights: ClarityWeights;
  sessionTimeoutMs: number;
  idempotencyTtlMs: number;
  sessionRetentionSeconds: number;
  maxCommitRetries: number;
  fallbackMood: MoodLabel;
  defaultLocale: Locale;
}

const unitInterval = { type: 'number', minimum: 0, maximum: 1 };

const weightsSchema = {
  type: 'object',
  properties: Object.fromEntries(CLARITY_COMPONENTS.map((c) => [c, unitInterval])),
  required: [...CLARITY_COMPONENTS],
  additionalProperties: false,
};

const dialogueConfigSchema = {
  type: 'object',
  properties: {
    maxTurns: { type: 'integer', minimum: 1 },
    thresholds: {
      type: 'object',
      properties: { high: unitInterval, medium: unitInterval, low: unitInterval },
      required: ['high', 'medium', 'low'],
      additionalProperties: false,
    },
    minMoodConfidence: unitInterval,
    contextClearThreshold: unitInterval,
    consistencyWindow: { type: 'integer', minimum: 1 },
    weightProfile: { type: 'string', minLength: 1 },
    weightProfiles: { type: 'object', additionalProperties: weightsSchema, minProperties: 1 },
    sessionTimeoutSeconds: { type: 'integer', minimum: 1 },
    idempotencyTtlSeconds: { type: 'integer', minimum: 1 },
    sessionRetentionSeconds: { type: 'integer', minimum: 1 },
    maxCommitRetries: { type: 'integer', minimum: 0 },
    fallbackMood: { type: 'string', enum: [...MOOD_LABELS] },
    defaultLocale: { type: 'string', enum: ['vi', 'en'] },
  },
  required: [
    'maxTurns',
    'thresholds',
    'minMoodConfidence',
    'contextClearThreshold',
    'consistencyWindow',
    'weightProfile',
    'weightProfiles',
    'sessionTimeoutSeconds',
    'idempotencyTtlSeconds',
    'sessionRetentionSeconds',
    'maxCommitRetries',
    'fallbackMood',
    'defaultLocale',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateRawConfig = ajv.compile<RawDialogueConfig>(dialogueConfigSchema);

/** Throws ConfigError unless the weights sum to 1. */
export function assertWeightsSumToOne(weights: ClarityWeights, profile = 'custom'): void {
  const sum = CLARITY_COMPONENTS.reduce((acc, c) => acc + weights[c], 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(`Clarity weight profile "${profile}" sums to ${sum}, expected 1`);
  }
}

/**
 * Validate a raw dialogue config, apply env overrides and resolve the active
 * weight profile.
 */
export function resolveDialogueConfig(
  raw: unknown,
  overrides: Partial<DialogueEnvOverrides> = {},
): DialogueConfig {
  if (!validateRawConfig(raw)) {
    const errors = validateRawConfig.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new ConfigError(`Invalid dialogue config: ${errors}`);
  }

  const { high, medium, low } = raw.thresholds;
  if (!(low <= medium && medium <= high)) {
    throw new ConfigError(`Clarity thresholds must satisfy low <= medium <= high (got ${low}/${medium}/${high})`);
  }

  for (const [name, weights] of Object.entries(raw.weightProfiles)) {
    assertWeightsSumToOne(weights, name);
  }

  const weightProfile = overrides.weightProfile ?? raw.weightProfile;
  const weights = raw.weightProfiles[weightProfile];
  if (!weights) {
    throw new ConfigError(`Unknown clarity weight profile "${weightProfile}"`);
  }

  const locale = overrides.defaultLocale ?? raw.defaultLocale;
  if (locale !== 'vi' && locale !== 'en') {
    throw new ConfigError(`Unsupported default locale "${locale}"`);
  }

  return Object.freeze({
    maxTurns: overrides.maxTurns ?? raw.maxTurns,
    thresholds: { high, medium, low },
    minMoodConfidence: raw.minMoodConfidence,
    contextClearThreshold: raw.contextClearThreshold,
    consistencyWindow: raw.consistencyWindow,
    weightProfile,
    weights: { ...weights },
    sessionTimeoutMs: (overrides.sessionTimeoutSeconds ?? raw.sessionTimeoutSeconds) * 1000,
    idempotencyTtlMs: (overrides.idempotencyTtlSeconds ?? raw.idempotencyTtlSeconds) * 1000,
    sessionRetentionSeconds: raw.sessionRetentionSeconds,
    maxCommitRetries: raw.maxCommitRetries,
    fallbackMood: raw.fallbackMood,
    defaultLocale: locale,
  });
}

export class DialogueConfigService {
  private config: DialogueConfig;

  constructor(
    private readonly filePath: string = DIALOGUE_CONFIG_PATH,
    private readonly overrides: Partial<DialogueEnvOverrides> = env.dialogue,
  ) {
    this.config = this.load();
  }

  load(): DialogueConfig {
    if (!fs.existsSync(this.filePath)) {
      logger.warn({ file: this.filePath }, 'Dialogue config not found; using built-in default');
      return resolveDialogueConfig(DialogueConfigService.builtInDefault(), this.overrides);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to read ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const config = resolveDialogueConfig(raw, this.overrides);
    logger.info(
      { maxTurns: config.maxTurns, weightProfile: config.weightProfile, thresholds: config.thresholds },
      'Loaded dialogue config',
    );
    return config;
  }

  reload(): DialogueConfig {
    this.config = this.load();
    return this.config;
  }

  get(): DialogueConfig {
    return this.config;
  }

  static builtInDefault(): RawDialogueConfig {
    return {
      maxTurns: 5,
      thresholds: { high: 0.8, medium: 0.6, low: 0.4 },
      minMoodConfidence: 0.5,
      contextClearThreshold: 0.66,
      consistencyWindow: 5,
      weightProfile: 'balanced',
      weightProfiles: {
        balanced: { mood: 0.35, confidence: 0.25, intensity: 0.15, context: 0.1, consistency: 0.15 },
        quick: { mood: 0.5, confidence: 0.2, intensity: 0.1, context: 0.05, consistency: 0.15 },
        detailed: { mood: 0.25, confidence: 0.25, intensity: 0.2, context: 0.15, consistency: 0.15 },
      },
      sessionTimeoutSeconds: 1800,
      idempotencyTtlSeconds: 300,
      sessionRetentionSeconds: 7 * 24 * 60 * 60,
      maxCommitRetries: 3,
      fallbackMood: 'chill',
      defaultLocale: 'vi',
    };
  }
}
