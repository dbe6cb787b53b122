import {
  ContextSignals,
  EmotionalContext,
  EmotionalSignals,
  IntensityLabel,
  MoodHistoryEntry,
  MoodLabel,
  MoodSource,
} from '../dialogue/types';
import { loadLexicon, MoodLexicon } from './lexicon';

export interface EmotionTrackerOptions {
  /** Entries considered for the dominant mood and consistency */
  consistencyWindow: number;
  /** Signals below this confidence are recorded as "no signal" */
  minMoodConfidence: number;
}

export interface TrackedTurn {
  signals: EmotionalSignals;
  turnIndex: number;
  timestamp: number;
  source: MoodSource;
  /** Context already merged across turns */
  context?: ContextSignals | null;
}

interface DominantMood {
  mood: MoodLabel | null;
  confidence: number;
  consistency: number;
}

const CORRECTION_CONFIDENCE = 0.95;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Folds per-turn signals into a session's EmotionalContext.
 *
 * `update` never mutates its input. The caller works on a checked-out copy of
 * the session and commits the returned context with the turn.
 */
export class EmotionTracker {
  constructor(
    private readonly options: EmotionTrackerOptions,
    private readonly lexicon: MoodLexicon = loadLexicon(),
  ) {}

  static initialContext(): EmotionalContext {
    return {
      valence: 0,
      arousal: 0.5,
      moodHistory: [],
      consistency: 0,
      dominantMood: null,
      dominantIntensity: null,
      moodConfidence: 0,
      context: null,
    };
  }

  update(prior: EmotionalContext, turn: TrackedTurn): EmotionalContext {
    const { signals, source } = turn;
    const hasMood = signals.mood !== null && signals.confidence >= this.options.minMoodConfidence;

    const dominantIntensity: IntensityLabel | null = signals.intensity ?? prior.dominantIntensity;
    let { valence, arousal } = prior;
    let entry: MoodHistoryEntry;

    if (hasMood && signals.mood) {
      const confidence = source === 'correction' ? Math.max(signals.confidence, CORRECTION_CONFIDENCE) : signals.confidence;
      const anchor = this.lexicon.moods[signals.mood];
      const scale = this.lexicon.arousalScale[dominantIntensity ?? 'medium'];
      const targetArousal = clamp(anchor.arousal * scale, 0, 1);

      // Confidence-weighted running combination
      valence = clamp((1 - confidence) * valence + confidence * anchor.valence, -1, 1);
      arousal = clamp((1 - confidence) * arousal + confidence * targetArousal, 0, 1);

      entry = {
        mood: signals.mood,
        intensity: signals.intensity,
        confidence,
        turnIndex: turn.turnIndex,
        timestamp: turn.timestamp,
        source,
      };
    } else {
      entry = {
        mood: 'none',
        intensity: signals.intensity,
        confidence: 0,
        turnIndex: turn.turnIndex,
        timestamp: turn.timestamp,
        source: source === 'correction' ? 'text' : source,
      };
    }

    const moodHistory = [...prior.moodHistory, entry];
    const dominant = this.dominantMood(moodHistory);

    return {
      valence,
      arousal,
      moodHistory,
      consistency: dominant.consistency,
      dominantMood: dominant.mood,
      dominantIntensity,
      moodConfidence: dominant.confidence,
      context: turn.context === undefined ? prior.context : turn.context,
    };
  }

  /**
   * Most frequent label among the last N entries since the latest correction;
   * ties go to the label seen most recently.
   */
  dominantMood(history: readonly MoodHistoryEntry[]): DominantMood {
    let segmentStart = 0;
    history.forEach((e, i) => {
      if (e.source === 'correction' && e.mood !== 'none') segmentStart = i;
    });
    const window = history.slice(segmentStart).slice(-this.options.consistencyWindow);

    const counts = new Map<MoodLabel, { count: number; lastSeen: number }>();
    window.forEach((e, i) => {
      if (e.mood === 'none') return;
      const current = counts.get(e.mood);
      counts.set(e.mood, { count: (current?.count ?? 0) + 1, lastSeen: i });
    });

    let mood: MoodLabel | null = null;
    let best = { count: 0, lastSeen: -1 };
    for (const [label, stat] of counts) {
      if (stat.count > best.count || (stat.count === best.count && stat.lastSeen > best.lastSeen)) {
        mood = label;
        best = stat;
      }
    }

    if (mood === null) return { mood: null, confidence: 0, consistency: 0 };

    const matching = window.filter((e) => e.mood === mood);
    const confidence = matching.reduce((acc, e) => acc + e.confidence, 0) / matching.length;
    return { mood, confidence, consistency: matching.length / window.length };
  }
}
