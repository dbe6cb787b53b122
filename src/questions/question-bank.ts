import { loadCatalog, localizedText } from '../config/catalog-loader';
import { Locale } from '../dialogue/types';
import { LocalizedText } from '../emotion/lexicon';
import { logger } from '../observability/logger';
import { questionSelections } from '../observability/metrics';
import { ProbeDepth } from '../strategy/strategy-engine';

export type QuestionCategory = 'mood' | 'intensity' | 'context' | 'confirm';

export interface ProbingQuestion {
  id: string;
  category: QuestionCategory;
  depth: ProbeDepth;
  text: LocalizedText;
}

export interface QuestionQuery {
  category: QuestionCategory;
  depth: ProbeDepth;
  /** Ids already asked in this session */
  exclude?: readonly string[];
  locale: Locale;
  vars?: Record<string, string>;
}

export interface SelectedQuestion {
  id: string;
  category: QuestionCategory;
  depth: ProbeDepth;
  text: string;
  /** True when every candidate had already been asked */
  repeated: boolean;
}

const questionCatalogSchema = {
  type: 'array',
  minItems: 1,
  items: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1 },
      category: { type: 'string', enum: ['mood', 'intensity', 'context', 'confirm'] },
      depth: { type: 'integer', enum: [1, 2, 3] },
      text: localizedText,
    },
    required: ['id', 'category', 'depth', 'text'],
    additionalProperties: false,
  },
};

export function renderTemplate(template: string, vars: Record<string, string> = {}): string {
  return template.replace(/\{(\w+)\}/g, (whole, name: string) => vars[name] ?? whole);
}

/**
 * Probing questions keyed by (category, depth).
 *
 * Selection order: unused questions at the requested depth, then unused ones
 * at the nearest other depth of the same category (shallower first on a tie),
 * then the nearest depth again with the exclusion relaxed. Among candidates
 * the least-used question wins; catalog order breaks ties. Selecting does
 * not count as usage: callers report it through `recordUsage`.
 */
export class QuestionBank {
  private readonly questions: ProbingQuestion[];
  private readonly usage = new Map<string, number>();
  private log = logger.child({ component: 'question-bank' });

  constructor(questions: ProbingQuestion[] = loadCatalog<ProbingQuestion[]>('questions.yaml', questionCatalogSchema)) {
    const seen = new Set<string>();
    for (const q of questions) {
      if (seen.has(q.id)) this.log.warn({ questionId: q.id }, 'Duplicate question id in catalog');
      seen.add(q.id);
    }
    this.questions = [...questions];
  }

  /** Seed usage counts from persisted analytics. */
  hydrate(usage: Record<string, number>): void {
    for (const [id, count] of Object.entries(usage)) {
      this.usage.set(id, count);
    }
  }

  /** Count one asking of a question. Called once the turn that asked it is committed. */
  recordUsage(id: string): void {
    this.usage.set(id, (this.usage.get(id) ?? 0) + 1);
  }

  getUsage(): Record<string, number> {
    return Object.fromEntries(this.usage);
  }

  get(id: string): ProbingQuestion | undefined {
    return this.questions.find((q) => q.id === id);
  }

  select(query: QuestionQuery): SelectedQuestion | null {
    const exclude = new Set(query.exclude ?? []);
    const tiers = this.tiers(query.category, query.depth);
    if (tiers.length === 0) {
      this.log.warn({ category: query.category, depth: query.depth }, 'No questions for category');
      return null;
    }

    let candidates: ProbingQuestion[] = [];
    for (const tier of tiers) {
      candidates = tier.filter((q) => !exclude.has(q.id));
      if (candidates.length > 0) break;
    }
    const repeated = candidates.length === 0;
    const chosen = this.leastUsed(repeated ? tiers[0] : candidates);

    questionSelections.inc({ category: chosen.category, depth: String(chosen.depth), repeated: String(repeated) });

    return {
      id: chosen.id,
      category: chosen.category,
      depth: chosen.depth,
      text: renderTemplate(chosen.text[query.locale], query.vars),
      repeated,
    };
  }

  /**
   * Non-empty depth groups of a category, nearest to the requested depth
   * first (shallower first at equal distance).
   */
  private tiers(category: QuestionCategory, depth: ProbeDepth): ProbingQuestion[][] {
    const byDepth = new Map<number, ProbingQuestion[]>();
    for (const q of this.questions) {
      if (q.category !== category) continue;
      const group = byDepth.get(q.depth) ?? [];
      group.push(q);
      byDepth.set(q.depth, group);
    }
    return [...byDepth.entries()]
      .sort(([a], [b]) => Math.abs(a - depth) - Math.abs(b - depth) || a - b)
      .map(([, group]) => group);
  }

  private leastUsed(candidates: ProbingQuestion[]): ProbingQuestion {
    let best = candidates[0];
    for (const q of candidates) {
      if ((this.usage.get(q.id) ?? 0) < (this.usage.get(best.id) ?? 0)) best = q;
    }
    return best;
  }
}
