import {
  ClarityComponent,
  ClarityLevel,
  ClarityResult,
  ClarityWeights,
  CLARITY_COMPONENTS,
  EmotionalContext,
} from '../dialogue/types';
import { contextCompleteness } from '../context/context-extractor';
import { assertWeightsSumToOne } from '../config/dialogue-config';

export interface ClarityThresholds {
  high: number;
  medium: number;
  low: number;
}

function unit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Fuses an EmotionalContext into one clarity score:
 * `score = Σ weight_i × component_i`, every component in [0,1].
 *
 * Weights are injected so they can be tuned without code changes; they must
 * sum to 1 and the constructor rejects any set that does not.
 */
export class ClarityModel {
  private readonly weights: ClarityWeights;

  constructor(weights: ClarityWeights, private readonly thresholds: ClarityThresholds) {
    assertWeightsSumToOne(weights);
    this.weights = { ...weights };
  }

  score(context: EmotionalContext): ClarityResult {
    const components: Record<ClarityComponent, number> = {
      mood: context.dominantMood ? 1 : 0,
      confidence: unit(context.moodConfidence),
      intensity: context.dominantIntensity ? 1 : 0,
      context: unit(contextCompleteness(context.context)),
      consistency: unit(context.consistency),
    };

    const raw = CLARITY_COMPONENTS.reduce((sum, c) => sum + this.weights[c] * components[c], 0);
    const score = unit(raw);

    return {
      score,
      level: this.level(score),
      components,
      weights: { ...this.weights },
    };
  }

  level(score: number): ClarityLevel {
    if (score >= this.thresholds.high) return 'high';
    if (score >= this.thresholds.medium) return 'medium';
    if (score >= this.thresholds.low) return 'low';
    return 'insufficient';
  }

  /** Lowest-scoring entry; ties go to the earlier one. */
  static weakest<T extends string>(scores: ReadonlyArray<{ key: T; score: number }>): T | null {
    let weakest: { key: T; score: number } | null = null;
    for (const entry of scores) {
      if (!weakest || entry.score < weakest.score) weakest = entry;
    }
    return weakest ? weakest.key : null;
  }
}
