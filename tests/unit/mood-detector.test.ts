import { MoodSignalDetector } from '../../src/emotion/mood-detector';

describe('MoodSignalDetector', () => {
  const detector = new MoodSignalDetector();

  describe('detect', () => {
    it('should rate a first-person mood as explicit', () => {
      expect(detector.detect('Hôm nay tôi buồn quá')).toEqual({
        mood: 'sad',
        confidence: 0.8,
        intensity: null,
        intensityConfidence: 0,
        negated: false,
        explicit: true,
        keywords: ['buồn'],
      });
    });

    it('should rate a bare mood word as implicit', () => {
      const signals = detector.detect('buồn');
      expect(signals.mood).toBe('sad');
      expect(signals.confidence).toBe(0.6);
      expect(signals.explicit).toBe(false);
    });

    it('should count an adjacent amplifier as explicit', () => {
      expect(detector.detect('so sad')).toEqual(expect.objectContaining({ mood: 'sad', explicit: true }));
    });

    it('should drop a negated mood and flag the negation', () => {
      expect(detector.detect('không buồn')).toEqual({
        mood: null,
        confidence: 0,
        intensity: null,
        intensityConfidence: 0,
        negated: true,
        explicit: false,
        keywords: [],
      });
      expect(detector.detect('tôi không vui').mood).toBeNull();
    });

    it('should only look three tokens back for a negator', () => {
      expect(detector.detect('không, hôm nay tôi buồn').mood).toBe('sad');
    });

    it('should prefer the longest keyword', () => {
      expect(detector.detect('tôi vui nhưng cũng cô đơn').mood).toBe('sad');
    });

    it('should let the later mention win between equally long keywords', () => {
      expect(detector.detect('chill rồi focus').mood).toBe('focused');
    });

    it('should read intensity from level words and markers', () => {
      expect(detector.detect('rất mạnh')).toEqual({
        mood: null,
        confidence: 0,
        intensity: 'high',
        intensityConfidence: 0.9,
        negated: false,
        explicit: false,
        keywords: ['mạnh', 'rất'],
      });
      expect(detector.detect('vừa phải')).toEqual(
        expect.objectContaining({ intensity: 'medium', intensityConfidence: 0.9 }),
      );
    });

    it('should give a marker alone the weaker intensity confidence', () => {
      expect(detector.detect('hơi buồn')).toEqual({
        mood: 'sad',
        confidence: 0.6,
        intensity: 'low',
        intensityConfidence: 0.7,
        negated: false,
        explicit: false,
        keywords: ['buồn', 'hơi'],
      });
    });

    it('should let a level word outweigh a marker of another level', () => {
      expect(detector.detect('hơi mạnh').intensity).toBe('high');
    });

    it('should return no signals for unrelated text', () => {
      expect(detector.detect('hmm')).toEqual({
        mood: null,
        confidence: 0,
        intensity: null,
        intensityConfidence: 0,
        negated: false,
        explicit: false,
        keywords: [],
      });
    });
  });

  describe('fromChip', () => {
    it('should take the chip mood at full confidence and still read intensity', () => {
      expect(detector.fromChip('happy', 'rất')).toEqual({
        mood: 'happy',
        confidence: 1,
        intensity: 'high',
        intensityConfidence: 0.7,
        negated: false,
        explicit: true,
        keywords: ['rất'],
      });
    });
  });
});
