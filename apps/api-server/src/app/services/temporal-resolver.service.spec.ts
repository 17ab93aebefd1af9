import { DEFAULT_ANALYTICS_CONFIG } from '../config/analytics.config';
import { cellText, TemporalResolverService } from './temporal-resolver.service';

describe('TemporalResolverService', () => {
  const resolver = new TemporalResolverService(DEFAULT_ANALYTICS_CONFIG);

  it('rejects an unknown reporting zone', () => {
    expect(
      () => new TemporalResolverService({ ...DEFAULT_ANALYTICS_CONFIG, reportingZone: 'Mars/Olympus' })
    ).toThrow('Invalid reporting zone: Mars/Olympus');
  });

  describe('separate date and time', () => {
    it('localizes wall time to the reporting zone', () => {
      const result = resolver.deriveSeparate('2024-01-15', '14:30', 'DAY_FIRST');

      expect(result.instant?.toISO()).toBe('2024-01-15T14:30:00.000+05:30');
      expect(result.localDate).toBe('2024-01-15');
      expect(result.localHour).toBe(14);
      expect(result.dateFailed).toBe(false);
      expect(result.timeFailed).toBe(false);
    });

    it('reads 12-hour times', () => {
      const result = resolver.deriveSeparate('15/01/2024', '2:15 PM', 'DAY_FIRST');
      expect(result.localDate).toBe('2024-01-15');
      expect(result.localHour).toBe(14);
    });

    it('keeps the date when there is no time', () => {
      const result = resolver.deriveSeparate('2024-01-15', null, 'DAY_FIRST');
      expect(result).toEqual({
        instant: null,
        localDate: '2024-01-15',
        localHour: null,
        dateFailed: false,
        timeFailed: false,
      });
    });

    it('flags an unparseable time but keeps the date', () => {
      const result = resolver.deriveSeparate('2024-01-15', '25:99', 'DAY_FIRST');
      expect(result.instant).toBeNull();
      expect(result.localDate).toBe('2024-01-15');
      expect(result.timeFailed).toBe(true);
    });

    it('rejects time cells without a clock part', () => {
      expect(resolver.parseTime('1030')).toBeNull();
      expect(resolver.parseTime('2024-01-15')).toBeNull();
      expect(resolver.parseTime('10:30:15+05:30')).toEqual({ hour: 10, minute: 30, second: 15, millisecond: 0 });

      const result = resolver.deriveSeparate('15/01/2024', '1030', 'DAY_FIRST');
      expect(result).toEqual({
        instant: null,
        localDate: '2024-01-15',
        localHour: null,
        dateFailed: false,
        timeFailed: true,
      });
    });

    it('flags an unparseable date', () => {
      const result = resolver.deriveSeparate('not a date', '10:00', 'DAY_FIRST');
      expect(result).toEqual({
        instant: null,
        localDate: null,
        localHour: null,
        dateFailed: true,
        timeFailed: false,
      });
    });
  });

  describe('combined start time', () => {
    it('reads naive text as reporting-zone wall time', () => {
      const result = resolver.deriveCombined('15/01/2024 10:05', 'DAY_FIRST');
      expect(result.instant?.toISO()).toBe('2024-01-15T10:05:00.000+05:30');
      expect(result.localHour).toBe(10);
    });

    it('converts zone-qualified text to the reporting zone', () => {
      const iso = resolver.deriveCombined('2024-01-15T09:00:00Z', 'DAY_FIRST');
      expect(iso.instant?.toISO()).toBe('2024-01-15T14:30:00.000+05:30');

      const utc = resolver.deriveCombined('2024-01-15 23:00:00 UTC', 'DAY_FIRST');
      expect(utc.localDate).toBe('2024-01-16');
      expect(utc.localHour).toBe(4);
    });

    it('reads day- and month-first dates followed by an offset', () => {
      const dayFirst = resolver.deriveCombined('15/01/2024 10:00 +05:30', 'DAY_FIRST');
      expect(dayFirst.instant?.toISO()).toBe('2024-01-15T10:00:00.000+05:30');
      expect(dayFirst.dateFailed).toBe(false);

      const zulu = resolver.deriveCombined('15/01/2024 10:00:00 Z', 'DAY_FIRST');
      expect(zulu.instant?.toISO()).toBe('2024-01-15T15:30:00.000+05:30');
      expect(zulu.localHour).toBe(15);

      const monthFirst = resolver.deriveCombined('01/15/2024 10:00 PM -0500', 'MONTH_FIRST');
      expect(monthFirst.localDate).toBe('2024-01-16');
      expect(monthFirst.localHour).toBe(8);
    });

    it('reads epoch seconds and milliseconds', () => {
      expect(resolver.deriveCombined('1705291200', 'DAY_FIRST').instant?.toISO()).toBe(
        '2024-01-15T09:30:00.000+05:30'
      );
      expect(resolver.deriveCombined('1705291200000', 'DAY_FIRST').instant?.toISO()).toBe(
        '2024-01-15T09:30:00.000+05:30'
      );
    });

    it('falls back to the date when there is no time part', () => {
      const result = resolver.deriveCombined('2024-01-15', 'DAY_FIRST');
      expect(result.instant).toBeNull();
      expect(result.localDate).toBe('2024-01-15');
      expect(result.dateFailed).toBe(false);
    });

    it('treats an empty cell as missing, not failed', () => {
      const result = resolver.deriveCombined('   ', 'DAY_FIRST');
      expect(result.localDate).toBeNull();
      expect(result.dateFailed).toBe(false);
    });
  });

  describe('date order', () => {
    it('parses ambiguous dates by the given order', () => {
      expect(resolver.parseDate('03/04/2024', 'DAY_FIRST')).toEqual({ year: 2024, month: 4, day: 3 });
      expect(resolver.parseDate('03/04/2024', 'MONTH_FIRST')).toEqual({ year: 2024, month: 3, day: 4 });
    });

    it('picks the order with fewer failures, ties going day-first', () => {
      expect(resolver.chooseDateOrder(['25/12/2024', '03/04/2024'])).toBe('DAY_FIRST');
      expect(resolver.chooseDateOrder(['12/25/2024', '03/04/2024', ''])).toBe('MONTH_FIRST');
      expect(resolver.chooseDateOrder(['03/04/2024'])).toBe('DAY_FIRST');
      expect(resolver.chooseDateOrder([])).toBe('DAY_FIRST');
    });
  });

  describe('zones with daylight saving', () => {
    const newYork = new TemporalResolverService({
      ...DEFAULT_ANALYTICS_CONFIG,
      reportingZone: 'America/New_York',
    });

    it('resolves ordinary wall times', () => {
      expect(newYork.resolve('2024-07-01', '12:00', null, 'DAY_FIRST')?.toISO()).toBe(
        '2024-07-01T12:00:00.000-04:00'
      );
    });

    it('returns null for nonexistent and ambiguous wall times', () => {
      const gap = newYork.deriveSeparate('2024-03-10', '02:30', 'DAY_FIRST');
      expect(gap.instant).toBeNull();
      expect(gap.timeFailed).toBe(true);

      const overlap = newYork.deriveSeparate('2024-11-03', '01:30', 'DAY_FIRST');
      expect(overlap.instant).toBeNull();
      expect(overlap.localDate).toBe('2024-11-03');
    });
  });
});

describe('cellText', () => {
  it('trims, collapses whitespace and maps blanks to null', () => {
    expect(cellText('  a   b ')).toBe('a b');
    expect(cellText('   ')).toBeNull();
    expect(cellText(null)).toBeNull();
    expect(cellText(12)).toBe('12');
  });
});
