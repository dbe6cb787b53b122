import { loadCatalog, localizedText, stringList } from '../config/catalog-loader';
import { IntensityLabel, MOOD_LABELS, MoodLabel } from '../dialogue/types';

export interface LocalizedText {
  vi: string;
  en: string;
}

export interface MoodEntry {
  valence: number;
  arousal: number;
  label: LocalizedText;
  keywords: string[];
}

export interface IntensityEntry {
  label: LocalizedText;
  /** Words that name a level outright ("mạnh", "light") */
  levelWords: string[];
  /** Modifiers that lean towards a level ("rất", "a bit") */
  markers: string[];
}

export interface MoodLexicon {
  moods: Record<MoodLabel, MoodEntry>;
  intensity: Record<IntensityLabel, IntensityEntry>;
  arousalScale: Record<IntensityLabel, number>;
  explicitCues: string[];
  amplifiers: string[];
  negators: string[];
}

const moodEntrySchema = {
  type: 'object',
  properties: {
    valence: { type: 'number', minimum: -1, maximum: 1 },
    arousal: { type: 'number', minimum: 0, maximum: 1 },
    label: localizedText,
    keywords: { ...stringList, minItems: 1 },
  },
  required: ['valence', 'arousal', 'label', 'keywords'],
  additionalProperties: false,
};

const intensityEntrySchema = {
  type: 'object',
  properties: { label: localizedText, levelWords: { ...stringList, minItems: 1 }, markers: stringList },
  required: ['label', 'levelWords', 'markers'],
  additionalProperties: false,
};

const levels = ['low', 'medium', 'high'];

export const lexiconSchema = {
  type: 'object',
  properties: {
    moods: {
      type: 'object',
      properties: Object.fromEntries(MOOD_LABELS.map((m) => [m, moodEntrySchema])),
      required: [...MOOD_LABELS],
      additionalProperties: false,
    },
    intensity: {
      type: 'object',
      properties: Object.fromEntries(levels.map((l) => [l, intensityEntrySchema])),
      required: levels,
      additionalProperties: false,
    },
    arousalScale: {
      type: 'object',
      properties: Object.fromEntries(levels.map((l) => [l, { type: 'number', minimum: 0 }])),
      required: levels,
      additionalProperties: false,
    },
    explicitCues: stringList,
    amplifiers: stringList,
    negators: stringList,
  },
  required: ['moods', 'intensity', 'arousalScale', 'explicitCues', 'amplifiers', 'negators'],
  additionalProperties: false,
};

let cached: MoodLexicon | undefined;

/** Lexicon from config/lexicon.yaml, read once per process. */
export function loadLexicon(): MoodLexicon {
  if (!cached) {
    cached = loadCatalog<MoodLexicon>('lexicon.yaml', lexiconSchema);
  }
  return cached;
}

export function moodDisplayName(lexicon: MoodLexicon, mood: MoodLabel, locale: keyof LocalizedText): string {
  return lexicon.moods[mood].label[locale];
}

export function intensityDisplayName(
  lexicon: MoodLexicon,
  intensity: IntensityLabel,
  locale: keyof LocalizedText,
): string {
  return lexicon.intensity[intensity].label[locale];
}
