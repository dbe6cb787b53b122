import { EmotionalSignals, INTENSITY_LABELS, IntensityLabel, MOOD_LABELS, MoodLabel } from '../dialogue/types';
import { normalizeText, phraseRegex, tokenize } from '../nlp/text';
import { loadLexicon, MoodLexicon } from './lexicon';

const EXPLICIT_CONFIDENCE = 0.8;
const IMPLICIT_CONFIDENCE = 0.6;
const CHIP_CONFIDENCE = 1.0;

const INTENSITY_STRONG_CONFIDENCE = 0.9;
const INTENSITY_WEAK_CONFIDENCE = 0.7;
const LEVEL_WORD_POINTS = 2;
const MARKER_POINTS = 1;

/** Tokens before a keyword that are searched for a negator */
const NEGATION_WINDOW = 3;

interface MoodMention {
  mood: MoodLabel;
  keyword: string;
  index: number;
  negated: boolean;
}

/**
 * Lexicon-based detector for one turn's emotional signals. Stateless; the
 * running picture across turns is the EmotionTracker's job.
 */
export class MoodSignalDetector {
  private readonly moodPatterns: Array<{ mood: MoodLabel; regex: RegExp }>;
  private readonly levelPatterns: Array<{ level: IntensityLabel; words: RegExp; markers: RegExp | null }>;
  private readonly negatorPattern: RegExp;
  private readonly explicitCuePattern: RegExp;
  private readonly amplifiers: Set<string>;

  constructor(lexicon: MoodLexicon = loadLexicon()) {
    this.moodPatterns = MOOD_LABELS.map((mood) => ({
      mood,
      regex: phraseRegex(lexicon.moods[mood].keywords, 'gu'),
    }));
    this.levelPatterns = INTENSITY_LABELS.map((level) => {
      const entry = lexicon.intensity[level];
      return {
        level,
        words: phraseRegex(entry.levelWords, 'gu'),
        markers: entry.markers.length > 0 ? phraseRegex(entry.markers, 'gu') : null,
      };
    });
    this.negatorPattern = phraseRegex(lexicon.negators);
    this.explicitCuePattern = phraseRegex(lexicon.explicitCues);
    this.amplifiers = new Set(lexicon.amplifiers.map(normalizeText));
  }

  detect(text: string): EmotionalSignals {
    const normalized = normalizeText(text);
    const mentions = this.findMoodMentions(normalized);
    const intensity = this.detectIntensity(normalized);

    const live = mentions.filter((m) => !m.negated);
    const keywords = live.map((m) => m.keyword);
    keywords.push(...intensity.matched);

    if (live.length === 0) {
      return {
        mood: null,
        confidence: 0,
        intensity: intensity.level,
        intensityConfidence: intensity.confidence,
        negated: mentions.length > 0,
        explicit: false,
        keywords,
      };
    }

    // Longest keyword is the most specific; later mentions win ties
    const chosen = live.reduce((best, m) =>
      m.keyword.length > best.keyword.length ||
      (m.keyword.length === best.keyword.length && m.index > best.index)
        ? m
        : best,
    );
    const explicit = this.isExplicit(normalized, chosen);

    return {
      mood: chosen.mood,
      confidence: explicit ? EXPLICIT_CONFIDENCE : IMPLICIT_CONFIDENCE,
      intensity: intensity.level,
      intensityConfidence: intensity.confidence,
      negated: false,
      explicit,
      keywords,
    };
  }

  /** Signals for a mood picked from a fixed choice list; any intensity in the text still counts. */
  fromChip(mood: MoodLabel, text: string): EmotionalSignals {
    const intensity = this.detectIntensity(normalizeText(text));
    return {
      mood,
      confidence: CHIP_CONFIDENCE,
      intensity: intensity.level,
      intensityConfidence: intensity.confidence,
      negated: false,
      explicit: true,
      keywords: intensity.matched,
    };
  }

  private findMoodMentions(normalized: string): MoodMention[] {
    const mentions: MoodMention[] = [];
    for (const { mood, regex } of this.moodPatterns) {
      for (const match of normalized.matchAll(regex)) {
        const index = match.index ?? 0;
        mentions.push({
          mood,
          keyword: match[0],
          index,
          negated: this.isNegated(normalized.slice(0, index)),
        });
      }
    }
    return mentions;
  }

  private isNegated(preceding: string): boolean {
    const window = tokenize(preceding).slice(-NEGATION_WINDOW).join(' ');
    return window.length > 0 && this.negatorPattern.test(window);
  }

  private isExplicit(normalized: string, mention: MoodMention): boolean {
    if (this.explicitCuePattern.test(normalized)) return true;
    const before = tokenize(normalized.slice(0, mention.index)).pop();
    const after = tokenize(normalized.slice(mention.index + mention.keyword.length)).shift();
    return (before !== undefined && this.amplifiers.has(before)) || (after !== undefined && this.amplifiers.has(after));
  }

  private detectIntensity(normalized: string): {
    level: IntensityLabel | null;
    confidence: number;
    matched: string[];
  } {
    let best: { level: IntensityLabel; score: number; lastIndex: number; matched: string[] } | null = null;

    for (const { level, words, markers } of this.levelPatterns) {
      let score = 0;
      let lastIndex = -1;
      const matched: string[] = [];
      for (const m of normalized.matchAll(words)) {
        score += LEVEL_WORD_POINTS;
        lastIndex = Math.max(lastIndex, m.index ?? 0);
        matched.push(m[0]);
      }
      if (markers) {
        for (const m of normalized.matchAll(markers)) {
          score += MARKER_POINTS;
          lastIndex = Math.max(lastIndex, m.index ?? 0);
          matched.push(m[0]);
        }
      }
      if (score === 0) continue;
      if (!best || score > best.score || (score === best.score && lastIndex > best.lastIndex)) {
        best = { level, score, lastIndex, matched };
      }
    }

    if (!best) return { level: null, confidence: 0, matched: [] };
    return {
      level: best.level,
      confidence: best.score >= LEVEL_WORD_POINTS ? INTENSITY_STRONG_CONFIDENCE : INTENSITY_WEAK_CONFIDENCE,
      matched: best.matched,
    };
  }
}
