import { NameMatcherService } from './name-matcher.service';

describe('NameMatcherService', () => {
  const matcher = new NameMatcherService();
  const roster = matcher.normalizeRoster(['Kabir Malhotra', 'Riya Sen', 'Arjun Mehta', 'Karen Bhatiya']);

  describe('normalize', () => {
    it('lowercases, strips punctuation and collapses whitespace', () => {
      expect(matcher.normalize('  Dr. Neha   KAPOOR!! ')).toBe('dr neha kapoor');
      expect(matcher.normalize(null)).toBe('');
      expect(matcher.normalize(undefined)).toBe('');
    });
  });

  describe('isMember', () => {
    it('matches exact and contained names', () => {
      expect(matcher.isMember('Ayushman Jetlearn', ['ayushman jetlearn'])).toBe(true);
      expect(matcher.isMember('Ayushman J', ['ayushman jetlearn'])).toBe(true);
      expect(matcher.isMember('RIYA SEN (B2C)', roster)).toBe(true);
    });

    it('matches on a shared token', () => {
      expect(matcher.isMember('Mehta Arjun K', roster)).toBe(true);
    });

    it('matches close spellings by similarity', () => {
      expect(matcher.isMember('Karan Bhatia', roster)).toBe(true);
    });

    it('rejects unrelated and empty names', () => {
      expect(matcher.isMember('Zoya Khan', roster)).toBe(false);
      expect(matcher.isMember('', roster)).toBe(false);
      expect(matcher.isMember('  ...  ', roster)).toBe(false);
      expect(matcher.isMember(null, roster)).toBe(false);
    });
  });

  it('computes a similarity ratio', () => {
    expect(matcher.similarity('abc', 'abc')).toBe(1);
    expect(matcher.similarity('karan bhatia', 'karen bhatiya')).toBeCloseTo(0.88, 5);
  });
});
