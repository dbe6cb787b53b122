import { loadCatalog, stringList } from '../config/catalog-loader';
import { ContextSignals, TimeOfDay } from '../dialogue/types';
import { normalizeText, phraseRegex } from '../nlp/text';

export interface ContextKeywords {
  timeOfDay: Record<TimeOfDay, string[]>;
  activity: Record<string, string[]>;
  social: Record<string, string[]>;
  /** [startHour, endHour) per bucket; hours outside every bucket are night */
  hourBuckets: Partial<Record<TimeOfDay, [number, number]>>;
}

const bucketMap = { type: 'object', additionalProperties: stringList };
const hourRange = {
  type: 'array',
  items: { type: 'integer', minimum: 0, maximum: 24 },
  minItems: 2,
  maxItems: 2,
};

const contextKeywordsSchema = {
  type: 'object',
  properties: {
    timeOfDay: {
      type: 'object',
      properties: {
        morning: stringList,
        afternoon: stringList,
        evening: stringList,
        night: stringList,
      },
      required: ['morning', 'afternoon', 'evening', 'night'],
      additionalProperties: false,
    },
    activity: bucketMap,
    social: bucketMap,
    hourBuckets: {
      type: 'object',
      properties: { morning: hourRange, afternoon: hourRange, evening: hourRange, night: hourRange },
      additionalProperties: false,
    },
  },
  required: ['timeOfDay', 'activity', 'social', 'hourBuckets'],
  additionalProperties: false,
};

const TIME_BUCKETS: readonly TimeOfDay[] = ['morning', 'afternoon', 'evening', 'night'];

type Matchers<K extends string> = Array<{ bucket: K; regex: RegExp }>;

function compile<K extends string>(buckets: readonly K[], table: Record<K, string[]>): Matchers<K> {
  return buckets
    .filter((bucket) => table[bucket].length > 0)
    .map((bucket) => ({ bucket, regex: phraseRegex(table[bucket]) }));
}

/** Fraction of context dimensions known, in [0,1]. */
export function contextCompleteness(context: ContextSignals | null): number {
  if (!context) return 0;
  const known = [context.timeOfDay, context.activity, context.social].filter((v) => v !== null).length;
  return known / 3;
}

/**
 * Situational signals from a turn's text. Time of day always resolves: a
 * keyword wins, otherwise the hour of the turn timestamp decides.
 */
export class ContextSignalExtractor {
  private readonly time: Matchers<TimeOfDay>;
  private readonly activity: Matchers<string>;
  private readonly social: Matchers<string>;
  private readonly hourBuckets: Partial<Record<TimeOfDay, [number, number]>>;

  constructor(keywords: ContextKeywords = loadCatalog<ContextKeywords>('context-keywords.yaml', contextKeywordsSchema)) {
    this.time = compile(TIME_BUCKETS, keywords.timeOfDay);
    this.activity = compile(Object.keys(keywords.activity), keywords.activity);
    this.social = compile(Object.keys(keywords.social), keywords.social);
    this.hourBuckets = keywords.hourBuckets;
  }

  extract(text: string, timestamp: number = Date.now()): ContextSignals {
    const normalized = normalizeText(text);
    return {
      timeOfDay: this.firstMatch(this.time, normalized) ?? this.timeOfDayFromHour(new Date(timestamp).getHours()),
      activity: this.firstMatch(this.activity, normalized),
      social: this.firstMatch(this.social, normalized),
    };
  }

  /**
   * Combine a new turn's signals with what earlier turns established. The
   * latest turn decides the time of day; silence keeps earlier activity and
   * social values.
   */
  merge(prior: ContextSignals | null, next: ContextSignals): ContextSignals {
    if (!prior) return next;
    return {
      timeOfDay: next.timeOfDay,
      activity: next.activity ?? prior.activity,
      social: next.social ?? prior.social,
    };
  }

  timeOfDayFromHour(hour: number): TimeOfDay {
    for (const bucket of TIME_BUCKETS) {
      const range = this.hourBuckets[bucket];
      if (range && hour >= range[0] && hour < range[1]) return bucket;
    }
    return 'night';
  }

  private firstMatch<K extends string>(matchers: Matchers<K>, normalized: string): K | null {
    for (const { bucket, regex } of matchers) {
      if (regex.test(normalized)) return bucket;
    }
    return null;
  }
}
