import pino from 'pino';
import { LoggingRecommendationSink } from '../../src/orchestrator/recommendation-sink';
import { EnrichedRequest } from '../../src/dialogue/types';

function request(sessionId: string): EnrichedRequest {
  return {
    sessionId,
    userId: 'user-1',
    mood: 'sad',
    intensity: 'medium',
    confidence: 0.6,
    valence: -0.42,
    arousal: 0.38,
    context: { timeOfDay: 'morning', activity: 'work', social: null },
    source: 'conversation',
  };
}

describe('LoggingRecommendationSink', () => {
  it('should log the hand-off summary', async () => {
    const lines: string[] = [];
    const sink = new LoggingRecommendationSink(pino({ base: undefined }, { write: (line: string) => lines.push(line) }));

    await sink.handoff(request('s-1'));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual(
      expect.objectContaining({
        level: 30,
        msg: 'Enriched request handed off',
        sessionId: 's-1',
        mood: 'sad',
        intensity: 'medium',
        confidence: 0.6,
        source: 'conversation',
      }),
    );
  });

  it('should not hold on to handed-off payloads', async () => {
    const sink = new LoggingRecommendationSink(pino({ level: 'silent' }));
    for (let i = 0; i < 3; i++) await sink.handoff(request(`s-${i}`));

    expect(Object.values(sink).filter((value) => value instanceof Map)).toEqual([]);
  });
});
