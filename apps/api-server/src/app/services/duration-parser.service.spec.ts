import { DurationParserService } from './duration-parser.service';

describe('DurationParserService', () => {
  const parser = new DurationParserService();

  it('reads MM:SS and HH:MM:SS clock text', () => {
    expect(parser.parse('2:30')).toBe(150);
    expect(parser.parse('1:02:03')).toBe(3723);
    expect(parser.parse(' 00:45 ')).toBe(45);
  });

  it('reads plain and decimal numbers', () => {
    expect(parser.parse('95')).toBe(95);
    expect(parser.parse('95.5')).toBe(95.5);
    expect(parser.parse(42)).toBe(42);
    expect(parser.parse('1e2')).toBe(100);
  });

  it('passes negative values through', () => {
    expect(parser.parse('-5')).toBe(-5);
    expect(parser.parse(-12)).toBe(-12);
  });

  it('returns null for missing or unparseable input', () => {
    expect(parser.parse('')).toBeNull();
    expect(parser.parse('   ')).toBeNull();
    expect(parser.parse(null)).toBeNull();
    expect(parser.parse(undefined)).toBeNull();
    expect(parser.parse(NaN)).toBeNull();
    expect(parser.parse('abc')).toBeNull();
    expect(parser.parse('1:2:3:4')).toBeNull();
    expect(parser.parse('1:xx')).toBeNull();
    expect(parser.parse('12s')).toBeNull();
    expect(parser.parse(true)).toBeNull();
  });
});
