import { loadCatalog, localizedText } from '../config/catalog-loader';
import { Locale, MOOD_LABELS, MoodLabel } from '../dialogue/types';
import { LocalizedText } from '../emotion/lexicon';
import { renderTemplate } from '../questions/question-bank';

type AcknowledgeKey = MoodLabel | 'default';

export interface ResponseTemplates {
  greeting: LocalizedText;
  acknowledge: Record<Locale, Record<AcknowledgeKey, string>>;
  recommend: LocalizedText;
  feedbackPrompt: LocalizedText;
  feedback: LocalizedText;
  feedbackRetry: LocalizedText;
  help: LocalizedText;
  farewell: LocalizedText;
  aborted: LocalizedText;
}

const acknowledgeKeys = [...MOOD_LABELS, 'default'];

const acknowledgeSchema = {
  type: 'object',
  properties: Object.fromEntries(acknowledgeKeys.map((k) => [k, { type: 'string' }])),
  required: acknowledgeKeys,
  additionalProperties: false,
};

const responseTemplatesSchema = {
  type: 'object',
  properties: {
    greeting: localizedText,
    acknowledge: {
      type: 'object',
      properties: { vi: acknowledgeSchema, en: acknowledgeSchema },
      required: ['vi', 'en'],
      additionalProperties: false,
    },
    recommend: localizedText,
    feedbackPrompt: localizedText,
    feedback: localizedText,
    feedbackRetry: localizedText,
    help: localizedText,
    farewell: localizedText,
    aborted: localizedText,
  },
  required: [
    'greeting',
    'acknowledge',
    'recommend',
    'feedbackPrompt',
    'feedback',
    'feedbackRetry',
    'help',
    'farewell',
    'aborted',
  ],
  additionalProperties: false,
};

/** Localized bot sentences that are not probing questions. */
export class ResponseComposer {
  constructor(
    private readonly templates: ResponseTemplates = loadCatalog<ResponseTemplates>(
      'responses.json',
      responseTemplatesSchema,
    ),
  ) {}

  greeting(locale: Locale): string {
    return this.templates.greeting[locale];
  }

  acknowledge(locale: Locale, mood: MoodLabel | null): string {
    return this.templates.acknowledge[locale][mood ?? 'default'];
  }

  recommend(locale: Locale, moodName: string): string {
    return renderTemplate(this.templates.recommend[locale], { mood: moodName });
  }

  feedbackPrompt(locale: Locale): string {
    return this.templates.feedbackPrompt[locale];
  }

  feedback(locale: Locale): string {
    return this.templates.feedback[locale];
  }

  feedbackRetry(locale: Locale): string {
    return this.templates.feedbackRetry[locale];
  }

  help(locale: Locale): string {
    return this.templates.help[locale];
  }

  farewell(locale: Locale): string {
    return this.templates.farewell[locale];
  }

  aborted(locale: Locale): string {
    return this.templates.aborted[locale];
  }

  /** Joins sentences with a single space, skipping empty parts. */
  static join(...parts: Array<string | undefined>): string {
    return parts.filter((p): p is string => Boolean(p)).join(' ');
  }
}
