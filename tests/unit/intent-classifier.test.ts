import { IntentPatternTable, PatternIntentClassifier } from '../../src/intent/intent-classifier';

describe('PatternIntentClassifier', () => {
  const classifier = new PatternIntentClassifier();

  describe('Vietnamese input', () => {
    it('should read a first-person mood statement as MOOD_EXPRESSION', () => {
      const result = classifier.classify('Hôm nay tôi buồn quá');
      expect(result.intent).toBe('MOOD_EXPRESSION');
      expect(result.confidence).toBe(0.85);
    });

    it('should read a bare intensity answer as a weak MOOD_EXPRESSION', () => {
      expect(classifier.classify('rất mạnh')).toEqual(
        expect.objectContaining({ intent: 'MOOD_EXPRESSION', confidence: 0.45 }),
      );
    });

    it('should detect greetings at the start of the message', () => {
      expect(classifier.classify('xin chào')).toEqual({ intent: 'GREETING', confidence: 0.85, matched: 'xin chào' });
    });

    it('should prefer the longer negative-feedback span over a bare negation', () => {
      expect(classifier.classify('không hay')).toEqual({
        intent: 'FEEDBACK_NEGATIVE',
        confidence: 0.85,
        matched: 'không hay',
      });
    });

    it('should detect positive feedback', () => {
      expect(classifier.classify('hay lắm').intent).toBe('FEEDBACK_POSITIVE');
    });

    it('should detect skip and cancel requests', () => {
      expect(classifier.classify('bỏ qua').intent).toBe('SKIP');
      expect(classifier.classify('hủy').intent).toBe('CANCEL');
    });

    it('should detect confirmations', () => {
      expect(classifier.classify('đúng rồi')).toEqual({ intent: 'CONFIRMATION', confidence: 0.85, matched: 'đúng rồi' });
    });

    it('should match decomposed Unicode the same as composed', () => {
      expect(classifier.classify('buồn'.normalize('NFD'))).toEqual(classifier.classify('buồn'));
    });
  });

  describe('English input', () => {
    it('should read "I feel so happy" as MOOD_EXPRESSION', () => {
      expect(classifier.classify('I feel so happy')).toEqual({
        intent: 'MOOD_EXPRESSION',
        confidence: 0.85,
        matched: 'i feel so happy',
      });
    });

    it('should let a play request outrank the mood request inside it', () => {
      expect(classifier.classify('play some chill music').intent).toBe('PLAY_REQUEST');
    });

    it('should ask for help', () => {
      expect(classifier.classify('help').intent).toBe('HELP');
    });

    it('should not match a keyword inside a longer word', () => {
      expect(classifier.classify('chilly')).toEqual({ intent: 'UNKNOWN', confidence: 0 });
    });
  });

  describe('fallbacks', () => {
    it('should return UNKNOWN with confidence 0 when nothing matches', () => {
      expect(classifier.classify('hmm')).toEqual({ intent: 'UNKNOWN', confidence: 0 });
    });

    it('should return UNKNOWN for empty or whitespace-only text', () => {
      expect(classifier.classify('')).toEqual({ intent: 'UNKNOWN', confidence: 0 });
      expect(classifier.classify('   ')).toEqual({ intent: 'UNKNOWN', confidence: 0 });
    });
  });

  describe('state hints', () => {
    it('should turn a mood statement into a correction while confirming', () => {
      expect(classifier.classify('buồn').intent).toBe('MOOD_EXPRESSION');
      expect(classifier.classify('buồn', 'CONFIRMING')).toEqual({
        intent: 'MOOD_CORRECTION',
        confidence: 0.65,
        matched: 'buồn',
      });
    });

    it('should turn a mood statement into a correction during feedback', () => {
      expect(classifier.classify('buồn', 'FEEDBACK').intent).toBe('MOOD_CORRECTION');
    });

    it('should leave other intents alone in hinted states', () => {
      expect(classifier.classify('đúng rồi', 'CONFIRMING').intent).toBe('CONFIRMATION');
    });
  });

  describe('tie-breaking', () => {
    function table(rules: IntentPatternTable['rules']): IntentPatternTable {
      return { genres: [], rules };
    }

    it('should pick the higher confidence when spans are equally long', () => {
      const custom = new PatternIntentClassifier(
        table([
          { intent: 'SKIP', confidence: 0.6, patterns: ['next'] },
          { intent: 'CANCEL', confidence: 0.9, patterns: ['next'] },
        ]),
      );
      expect(custom.classify('next').intent).toBe('CANCEL');
    });

    it('should pick the earlier rule when span and confidence tie', () => {
      const custom = new PatternIntentClassifier(
        table([
          { intent: 'SKIP', confidence: 0.7, patterns: ['next'] },
          { intent: 'CANCEL', confidence: 0.7, patterns: ['next'] },
        ]),
      );
      expect(custom.classify('next').intent).toBe('SKIP');
    });

    it('should skip a pattern that does not compile and keep the rest', () => {
      const custom = new PatternIntentClassifier(
        table([{ intent: 'HELP', confidence: 0.8, patterns: ['(', 'help'] }]),
      );
      expect(custom.classify('help').intent).toBe('HELP');
    });
  });
});
