import pino from 'pino';
import { EnrichedRequest } from '../dialogue/types';
import { logger } from '../observability/logger';

/**
 * Downstream recommender. Receives the EnrichedRequest once the turn that
 * produced it has been committed; a failure here never fails the turn.
 */
export interface RecommendationSink {
  handoff(request: EnrichedRequest): Promise<void>;
}

/** Default sink: records the hand-off in the log. The payload itself lives on the session. */
export class LoggingRecommendationSink implements RecommendationSink {
  constructor(private readonly log: pino.Logger = logger.child({ component: 'recommendation-sink' })) {}

  async handoff(request: EnrichedRequest): Promise<void> {
    this.log.info(
      {
        sessionId: request.sessionId,
        mood: request.mood,
        intensity: request.intensity,
        confidence: request.confidence,
        source: request.source,
      },
      'Enriched request handed off',
    );
  }
}
