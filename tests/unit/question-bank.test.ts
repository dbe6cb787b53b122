import { ProbingQuestion, QuestionBank, renderTemplate } from '../../src/questions/question-bank';

function question(id: string, category: ProbingQuestion['category'], depth: ProbingQuestion['depth'], text = id): ProbingQuestion {
  return { id, category, depth, text: { vi: `${text} (vi)`, en: text } };
}

const catalog: ProbingQuestion[] = [
  question('m1', 'mood', 1),
  question('m2', 'mood', 1),
  question('m3', 'mood', 3),
  question('c1', 'confirm', 2, '{mood} at {intensity}?'),
];

describe('QuestionBank', () => {
  it('should pick the least-used question, catalog order on ties', () => {
    const bank = new QuestionBank(catalog);
    const picks = [1, 2, 3].map(() => {
      const id = bank.select({ category: 'mood', depth: 1, locale: 'en' })?.id;
      if (id) bank.recordUsage(id);
      return id;
    });
    expect(picks).toEqual(['m1', 'm2', 'm1']);
    expect(bank.getUsage()).toEqual({ m1: 2, m2: 1 });
  });

  it('should not count a selection until its usage is recorded', () => {
    const bank = new QuestionBank(catalog);
    expect(bank.select({ category: 'mood', depth: 1, locale: 'en' })?.id).toBe('m1');
    expect(bank.select({ category: 'mood', depth: 1, locale: 'en' })?.id).toBe('m1');
    expect(bank.getUsage()).toEqual({});
  });

  it('should skip questions already asked in the session', () => {
    const bank = new QuestionBank(catalog);
    expect(bank.select({ category: 'mood', depth: 1, exclude: ['m1'], locale: 'en' })).toEqual({
      id: 'm2',
      category: 'mood',
      depth: 1,
      text: 'm2',
      repeated: false,
    });
  });

  it('should fall back to the nearest depth before repeating', () => {
    const bank = new QuestionBank(catalog);
    expect(bank.select({ category: 'mood', depth: 1, exclude: ['m1', 'm2'], locale: 'en' })?.id).toBe('m3');
  });

  it('should prefer the shallower depth at equal distance', () => {
    const bank = new QuestionBank(catalog);
    expect(bank.select({ category: 'mood', depth: 2, locale: 'en' })?.id).toBe('m1');
  });

  it('should repeat from the nearest depth once everything was asked', () => {
    const bank = new QuestionBank(catalog);
    expect(bank.select({ category: 'mood', depth: 1, exclude: ['m1', 'm2', 'm3'], locale: 'en' })).toEqual(
      expect.objectContaining({ id: 'm1', repeated: true }),
    );
  });

  it('should return null for a category with no questions', () => {
    expect(new QuestionBank(catalog).select({ category: 'intensity', depth: 1, locale: 'vi' })).toBeNull();
  });

  it('should render the locale text with variables', () => {
    const bank = new QuestionBank(catalog);
    expect(
      bank.select({ category: 'confirm', depth: 2, locale: 'vi', vars: { mood: 'buồn', intensity: 'vừa' } })?.text,
    ).toBe('buồn at vừa? (vi)');
  });

  it('should balance from hydrated usage', () => {
    const bank = new QuestionBank(catalog);
    bank.hydrate({ m1: 5 });
    expect(bank.select({ category: 'mood', depth: 1, locale: 'en' })?.id).toBe('m2');
  });

  it('should load the shipped catalog', () => {
    const bank = new QuestionBank();
    expect(bank.get('intensity_01')?.text.en).toBe('How strongly are you feeling this?');
    expect(bank.get('missing')).toBeUndefined();
  });
});

describe('renderTemplate', () => {
  it('should fill known placeholders and leave unknown ones', () => {
    expect(renderTemplate('Hi {name}, {unknown}', { name: 'An' })).toBe('Hi An, {unknown}');
  });

  it('should return the template unchanged without variables', () => {
    expect(renderTemplate('{mood} music')).toBe('{mood} music');
  });
});
