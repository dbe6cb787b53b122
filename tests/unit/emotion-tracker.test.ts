import { EmotionTracker } from '../../src/emotion/emotion-tracker';
import { EmotionalContext, EmotionalSignals, MoodHistoryEntry } from '../../src/dialogue/types';
import { MONDAY_9AM } from '../helpers/fixtures';

function signals(overrides: Partial<EmotionalSignals> = {}): EmotionalSignals {
  return {
    mood: null,
    confidence: 0,
    intensity: null,
    intensityConfidence: 0,
    negated: false,
    explicit: false,
    keywords: [],
    ...overrides,
  };
}

function entry(mood: MoodHistoryEntry['mood'], overrides: Partial<MoodHistoryEntry> = {}): MoodHistoryEntry {
  return { mood, intensity: null, confidence: 0.8, turnIndex: 1, timestamp: MONDAY_9AM, source: 'text', ...overrides };
}

describe('EmotionTracker', () => {
  const tracker = new EmotionTracker({ consistencyWindow: 5, minMoodConfidence: 0.5 });

  it('should start neutral', () => {
    expect(EmotionTracker.initialContext()).toEqual({
      valence: 0,
      arousal: 0.5,
      moodHistory: [],
      consistency: 0,
      dominantMood: null,
      dominantIntensity: null,
      moodConfidence: 0,
      context: null,
    });
  });

  it('should move valence and arousal towards the mood anchor by confidence', () => {
    const next = tracker.update(EmotionTracker.initialContext(), {
      signals: signals({ mood: 'sad', confidence: 0.6 }),
      turnIndex: 1,
      timestamp: MONDAY_9AM,
      source: 'text',
    });

    expect(next.valence).toBeCloseTo(-0.42, 10);
    expect(next.arousal).toBeCloseTo(0.38, 10);
    expect(next.dominantMood).toBe('sad');
    expect(next.moodConfidence).toBe(0.6);
    expect(next.consistency).toBe(1);
    expect(next.moodHistory).toEqual([entry('sad', { confidence: 0.6 })]);
  });

  it('should not mutate the prior context', () => {
    const prior = EmotionTracker.initialContext();
    tracker.update(prior, { signals: signals({ mood: 'happy', confidence: 0.8 }), turnIndex: 1, timestamp: 0, source: 'text' });
    expect(prior.moodHistory).toEqual([]);
    expect(prior.valence).toBe(0);
  });

  it('should record a weak signal as no mood and keep valence', () => {
    const next = tracker.update(EmotionTracker.initialContext(), {
      signals: signals({ mood: 'happy', confidence: 0.4, intensity: 'low' }),
      turnIndex: 1,
      timestamp: MONDAY_9AM,
      source: 'text',
    });

    expect(next.valence).toBe(0);
    expect(next.dominantMood).toBeNull();
    expect(next.dominantIntensity).toBe('low');
    expect(next.moodHistory[0]).toEqual(entry('none', { confidence: 0, intensity: 'low' }));
  });

  it('should scale arousal by intensity and clamp it to 1', () => {
    const next = tracker.update(EmotionTracker.initialContext(), {
      signals: signals({ mood: 'energetic', confidence: 1, intensity: 'high' }),
      turnIndex: 1,
      timestamp: MONDAY_9AM,
      source: 'chip',
    });
    expect(next.arousal).toBe(1);
    expect(next.valence).toBe(0.6);
  });

  it('should keep the earlier intensity when a turn names none', () => {
    const prior: EmotionalContext = { ...EmotionTracker.initialContext(), dominantIntensity: 'high' };
    const next = tracker.update(prior, { signals: signals(), turnIndex: 2, timestamp: MONDAY_9AM, source: 'text' });
    expect(next.dominantIntensity).toBe('high');
  });

  it('should let a correction override the earlier majority', () => {
    let ctx = EmotionTracker.initialContext();
    ctx = tracker.update(ctx, { signals: signals({ mood: 'sad', confidence: 0.8 }), turnIndex: 1, timestamp: 0, source: 'text' });
    ctx = tracker.update(ctx, { signals: signals({ mood: 'sad', confidence: 0.8 }), turnIndex: 2, timestamp: 0, source: 'text' });
    ctx = tracker.update(ctx, {
      signals: signals({ mood: 'happy', confidence: 0.6 }),
      turnIndex: 3,
      timestamp: 0,
      source: 'correction',
    });

    expect(ctx.dominantMood).toBe('happy');
    expect(ctx.moodConfidence).toBe(0.95);
    expect(ctx.consistency).toBe(1);
  });

  it('should keep the prior context when the turn carries none', () => {
    const prior: EmotionalContext = {
      ...EmotionTracker.initialContext(),
      context: { timeOfDay: 'morning', activity: 'working', social: null },
    };
    const next = tracker.update(prior, { signals: signals(), turnIndex: 1, timestamp: 0, source: 'text' });
    expect(next.context).toEqual({ timeOfDay: 'morning', activity: 'working', social: null });
  });

  describe('dominantMood', () => {
    it('should break count ties towards the most recent label', () => {
      expect(tracker.dominantMood([entry('happy'), entry('sad')])).toEqual({
        mood: 'sad',
        confidence: 0.8,
        consistency: 0.5,
      });
    });

    it('should count "none" entries against consistency', () => {
      expect(tracker.dominantMood([entry('sad', { confidence: 0.6 }), entry('none', { confidence: 0 })])).toEqual({
        mood: 'sad',
        confidence: 0.6,
        consistency: 0.5,
      });
    });

    it('should only look at the configured window', () => {
      const narrow = new EmotionTracker({ consistencyWindow: 2, minMoodConfidence: 0.5 });
      expect(narrow.dominantMood([entry('sad'), entry('sad'), entry('happy'), entry('happy')]).mood).toBe('happy');
    });

    it('should report no mood for an empty history', () => {
      expect(tracker.dominantMood([])).toEqual({ mood: null, confidence: 0, consistency: 0 });
    });
  });
});
