import { loadCatalog, stringList } from '../config/catalog-loader';
import { DialogueState, Intent, IntentResult, INTENTS } from '../dialogue/types';
import { loadLexicon, MoodLexicon } from '../emotion/lexicon';
import { normalizeText, phraseAlternation, wordBounded } from '../nlp/text';
import { logger } from '../observability/logger';

/**
 * Pluggable classification strategy. Rule tables today; a statistical model
 * can slot in behind the same method.
 */
export interface IntentClassifier {
  classify(text: string, state?: DialogueState): IntentResult;
}

export interface IntentRule {
  intent: Intent;
  confidence: number;
  patterns: string[];
}

export interface IntentPatternTable {
  genres: string[];
  rules: IntentRule[];
}

const intentPatternSchema = {
  type: 'object',
  properties: {
    genres: stringList,
    rules: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          intent: { type: 'string', enum: INTENTS.filter((i) => i !== 'UNKNOWN') },
          confidence: { type: 'number', exclusiveMinimum: 0, maximum: 1 },
          patterns: { ...stringList, minItems: 1 },
        },
        required: ['intent', 'confidence', 'patterns'],
        additionalProperties: false,
      },
    },
  },
  required: ['genres', 'rules'],
  additionalProperties: false,
};

interface CompiledPattern {
  intent: Intent;
  confidence: number;
  order: number;
  regex: RegExp;
}

interface Candidate {
  intent: Intent;
  confidence: number;
  order: number;
  span: string;
}

/**
 * Intent rewrites that only make sense in a given state: in CONFIRMING or
 * FEEDBACK a plain mood statement is the user correcting an earlier reading.
 */
const STATE_HINTS: Partial<Record<DialogueState, Partial<Record<Intent, Intent>>>> = {
  CONFIRMING: { MOOD_EXPRESSION: 'MOOD_CORRECTION' },
  FEEDBACK: { MOOD_EXPRESSION: 'MOOD_CORRECTION' },
};

export const UNKNOWN_RESULT: IntentResult = Object.freeze({ intent: 'UNKNOWN', confidence: 0 });

/**
 * Rule-table classifier. Vietnamese and English rules live in one table and
 * run through the same code path.
 *
 * Tie-break: the longest matched span wins, then the higher confidence, then
 * the rule listed first. Nothing matched → UNKNOWN with confidence 0.
 */
export class PatternIntentClassifier implements IntentClassifier {
  private readonly patterns: CompiledPattern[] = [];
  private log = logger.child({ component: 'intent-classifier' });

  constructor(
    table: IntentPatternTable = loadCatalog<IntentPatternTable>('intent-patterns.yaml', intentPatternSchema),
    lexicon: MoodLexicon = loadLexicon(),
  ) {
    const macros: Record<string, string> = {
      mood: phraseAlternation(Object.values(lexicon.moods).flatMap((m) => m.keywords)),
      intensity: phraseAlternation(
        Object.values(lexicon.intensity).flatMap((entry) => [...entry.levelWords, ...entry.markers]),
      ),
      genre: phraseAlternation(table.genres),
    };

    table.rules.forEach((rule, order) => {
      for (const source of rule.patterns) {
        const expanded = source.replace(/\{(\w+)\}/g, (whole, name: string) => {
          const macro = macros[name];
          if (macro === undefined) {
            this.log.warn({ macro: name, intent: rule.intent }, 'Unknown macro in intent pattern');
            return whole;
          }
          return macro;
        });
        try {
          this.patterns.push({
            intent: rule.intent,
            confidence: rule.confidence,
            order,
            regex: wordBounded(normalizeText(expanded), 'iu'),
          });
        } catch (err) {
          this.log.warn({ err, intent: rule.intent, pattern: source }, 'Invalid intent pattern skipped');
        }
      }
    });

    this.log.debug({ patternCount: this.patterns.length }, 'Intent patterns compiled');
  }

  classify(text: string, state?: DialogueState): IntentResult {
    const normalized = normalizeText(text);
    if (!normalized) return UNKNOWN_RESULT;

    let best: Candidate | null = null;
    for (const pattern of this.patterns) {
      const match = pattern.regex.exec(normalized);
      if (!match) continue;
      const candidate: Candidate = {
        intent: pattern.intent,
        confidence: pattern.confidence,
        order: pattern.order,
        span: match[0],
      };
      if (!best || PatternIntentClassifier.outranks(candidate, best)) best = candidate;
    }

    if (!best) return UNKNOWN_RESULT;

    const hinted = state ? STATE_HINTS[state]?.[best.intent] : undefined;
    return {
      intent: hinted ?? best.intent,
      confidence: best.confidence,
      matched: best.span,
    };
  }

  private static outranks(a: Candidate, b: Candidate): boolean {
    if (a.span.length !== b.span.length) return a.span.length > b.span.length;
    if (a.confidence !== b.confidence) return a.confidence > b.confidence;
    return a.order < b.order;
  }
}
