import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DateTime, FixedOffsetZone, Zone } from 'luxon';
import { DateOrder } from '@talktime/shared-models';
import { analyticsConfig } from '../config/analytics.config';

/**
 * Calendar date without a zone.
 */
export interface LocalDateParts {
  year: number;
  month: number;
  day: number;
}

/**
 * Wall-clock time without a date or zone.
 */
export interface LocalTimeParts {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/**
 * Derived temporal fields of one record plus what went wrong, if anything.
 */
export interface TemporalDerivation {
  instant: DateTime | null;

  /** yyyy-MM-dd in the reporting zone; may be set without an instant */
  localDate: string | null;

  /** Set iff instant is set */
  localHour: number | null;

  /** A non-empty date (or combined) cell could not be parsed */
  dateFailed: boolean;

  /** A non-empty time could not be parsed, or the wall time does not exist once */
  timeFailed: boolean;
}

const YEAR_FIRST_FORMATS = ['yyyy-M-d', 'yyyy/M/d', 'yyyy.M.d'];

const DAY_FIRST_FORMATS = ['d/M/yyyy', 'd-M-yyyy', 'd.M.yyyy', 'd/M/yy', 'd-M-yy', 'd.M.yy'];

const MONTH_FIRST_FORMATS = ['M/d/yyyy', 'M-d-yyyy', 'M.d.yyyy', 'M/d/yy', 'M-d-yy', 'M.d.yy'];

const NAMED_MONTH_FORMATS = [
  'd MMM yyyy',
  'd MMMM yyyy',
  'd-MMM-yyyy',
  'd-MMM-yy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'MMM d yyyy',
  'MMMM d yyyy',
];

/** Tried in order; the first valid parse wins */
const TIME_FORMATS = [
  'H:mm',
  'H:mm:ss',
  'H:mm:ss.SSS',
  'h:mm a',
  'h:mm:ss a',
  'h:mma',
  'h:mm:ssa',
  'h a',
  'ha',
];

/** Splits "<date> <time>" (also ISO "T" and "date, time") */
const DATE_TIME_SPLIT =
  /^(.*?\d)(?:\s*,\s*|\s+|T)(\d{1,2}(?::\d{2}){1,2}(?:\.\d+)?(?:\s*[AaPp][Mm])?)$/;

/** A time followed by a zone designator */
const ZONE_QUALIFIED =
  /\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[AaPp][Mm])?\s*(?:Z|[+-]\d{2}(?::?\d{2})?|UTC|GMT)$/i;

const UTC_SUFFIX = /^(.*?)\s*(?:UTC|GMT)$/i;

const OFFSET_SUFFIX = /^(.*?)\s*(?:(Z)|([+-])(\d{2}):?(\d{2})?)$/i;

/** ISO fallback for times is only taken when a clock part is present */
const CLOCK_PART = /\d{1,2}:\d{2}/;

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/** Unix epoch in seconds (or milliseconds above 1e10) */
const EPOCH_PATTERN = /^\d{9,13}(?:\.\d+)?$/;

const DAY_MS = 24 * 60 * 60 * 1000;

const PARSE_OPTIONS = { zone: 'UTC', locale: 'en-US' };

/**
 * Turns date/time cells into instants in the reporting zone.
 *
 * Supports a single combined timestamp column or separate date and time
 * columns. Ambiguous numeric dates are read day-first or month-first for a
 * whole column at once, whichever fails less often.
 */
@Injectable()
export class TemporalResolverService {
  private readonly logger = new Logger(TemporalResolverService.name);
  private readonly zone: Zone;

  constructor(
    @Inject(analyticsConfig.KEY)
    private readonly config: ConfigType<typeof analyticsConfig>
  ) {
    const probe = DateTime.now().setZone(config.reportingZone);
    if (!probe.isValid) {
      throw new Error(`Invalid reporting zone: ${config.reportingZone}`);
    }
    this.zone = probe.zone;
    this.logger.log(`Reporting zone: ${this.zone.name}`);
  }

  get zoneName(): string {
    return this.zone.name;
  }

  // ==========================================================================
  // COLUMN LEVEL
  // ==========================================================================

  /**
   * Pick the date order for a whole column: the one with fewer parse
   * failures among non-empty cells. Ties go to day-first.
   */
  chooseDateOrder(values: readonly unknown[]): DateOrder {
    let dayFirstFailures = 0;
    let monthFirstFailures = 0;

    for (const value of values) {
      if (cellText(value) === null) continue;
      if (this.parseDate(value, 'DAY_FIRST') === null) dayFirstFailures++;
      if (this.parseDate(value, 'MONTH_FIRST') === null) monthFirstFailures++;
    }

    const order: DateOrder = dayFirstFailures <= monthFirstFailures ? 'DAY_FIRST' : 'MONTH_FIRST';
    this.logger.debug(
      `Date order ${order} (failures day-first=${dayFirstFailures}, month-first=${monthFirstFailures})`
    );
    return order;
  }

  // ==========================================================================
  // RECORD LEVEL
  // ==========================================================================

  /**
   * Resolve one record's start instant. Pass either a date (with an
   * optional time) or a combined value.
   */
  resolve(
    dateValue: unknown,
    timeValue: unknown,
    combinedValue: unknown,
    order: DateOrder
  ): DateTime | null {
    if (cellText(dateValue) !== null) {
      return this.deriveSeparate(dateValue, timeValue, order).instant;
    }
    return this.deriveCombined(combinedValue, order).instant;
  }

  /**
   * Separate date and time cells. Without a usable time the record keeps
   * its local date but gets no instant.
   */
  deriveSeparate(dateValue: unknown, timeValue: unknown, order: DateOrder): TemporalDerivation {
    const date = this.parseDate(dateValue, order);
    if (date === null) {
      return emptyDerivation(cellText(dateValue) !== null, false);
    }

    const localDate = formatDate(date);
    const hasTime = cellText(timeValue) !== null;
    const time = hasTime ? this.parseTime(timeValue) : null;
    if (time === null) {
      return { instant: null, localDate, localHour: null, dateFailed: false, timeFailed: hasTime };
    }

    const instant = this.localize(date, time);
    if (instant === null) {
      return { instant: null, localDate, localHour: null, dateFailed: false, timeFailed: true };
    }
    return this.fromInstant(instant);
  }

  /**
   * A single start-timestamp cell. Zone-qualified text is converted to the
   * reporting zone; anything else is read as reporting-zone wall time.
   */
  deriveCombined(value: unknown, order: DateOrder): TemporalDerivation {
    const text = cellText(value);
    if (text === null) {
      return emptyDerivation(false, false);
    }

    if (EPOCH_PATTERN.test(text)) {
      const epoch = Number(text);
      const millis = epoch > 1e10 ? epoch : epoch * 1000;
      const instant = DateTime.fromMillis(millis, { zone: this.zone });
      return instant.isValid ? this.fromInstant(instant) : emptyDerivation(true, false);
    }

    if (ZONE_QUALIFIED.test(text)) {
      const instant = this.parseZoned(text, order);
      if (instant !== null) {
        return this.fromInstant(instant);
      }
    }

    const split = DATE_TIME_SPLIT.exec(text);
    if (split === null) {
      const dateOnly = this.parseDate(text, order);
      return dateOnly === null
        ? emptyDerivation(true, false)
        : { instant: null, localDate: formatDate(dateOnly), localHour: null, dateFailed: false, timeFailed: false };
    }
    return this.deriveSeparate(split[1], split[2], order);
  }

  // ==========================================================================
  // FIELD PARSERS
  // ==========================================================================

  /**
   * Parse the date part of a cell. A trailing time is ignored.
   */
  parseDate(value: unknown, order: DateOrder): LocalDateParts | null {
    const text = cellText(value);
    if (text === null) {
      return null;
    }

    const direct = this.matchDate(text, order);
    if (direct !== null) {
      return direct;
    }

    const split = DATE_TIME_SPLIT.exec(text);
    return split === null ? null : this.matchDate(split[1], order);
  }

  /**
   * Parse a time cell, trying progressively looser layouts.
   */
  parseTime(value: unknown): LocalTimeParts | null {
    const text = cellText(value);
    if (text === null) {
      return null;
    }

    for (const format of TIME_FORMATS) {
      const parsed = DateTime.fromFormat(text, format, PARSE_OPTIONS);
      if (parsed.isValid) {
        return timeParts(parsed);
      }
    }

    if (CLOCK_PART.test(text)) {
      const iso = DateTime.fromISO(text, { zone: 'UTC', setZone: true });
      if (iso.isValid) {
        return timeParts(iso);
      }
    }

    // A full timestamp in the time column: keep its time of day
    const split = DATE_TIME_SPLIT.exec(text);
    if (split !== null) {
      for (const format of TIME_FORMATS) {
        const parsed = DateTime.fromFormat(split[2], format, PARSE_OPTIONS);
        if (parsed.isValid) {
          return timeParts(parsed);
        }
      }
    }

    this.logger.debug(`Unparseable time: "${text}"`);
    return null;
  }

  /**
   * Attach the reporting zone to a wall time. Returns null when the wall
   * time falls in a gap or an overlap of the zone's offsets.
   */
  localize(date: LocalDateParts, time: LocalTimeParts): DateTime | null {
    const wall = Date.UTC(
      date.year,
      date.month - 1,
      date.day,
      time.hour,
      time.minute,
      time.second,
      time.millisecond
    );

    const offsets = new Set([
      this.zone.offset(wall - DAY_MS),
      this.zone.offset(wall),
      this.zone.offset(wall + DAY_MS),
    ]);

    const candidates: number[] = [];
    for (const offset of offsets) {
      const instant = wall - offset * 60_000;
      if (this.zone.offset(instant) === offset) {
        candidates.push(instant);
      }
    }

    if (candidates.length !== 1) {
      this.logger.debug(
        `Wall time ${formatDate(date)} ${time.hour}:${time.minute} is ${candidates.length === 0 ? 'nonexistent' : 'ambiguous'} in ${this.zone.name}`
      );
      return null;
    }
    return DateTime.fromMillis(candidates[0], { zone: this.zone });
  }

  // --- Private ---

  private matchDate(text: string, order: DateOrder): LocalDateParts | null {
    if (ISO_DATE_PREFIX.test(text)) {
      const iso = DateTime.fromISO(text, { zone: 'UTC', setZone: true });
      if (iso.isValid) {
        return dateParts(iso);
      }
      const sql = DateTime.fromSQL(text, { zone: 'UTC', setZone: true });
      if (sql.isValid) {
        return dateParts(sql);
      }
    }

    const ordered = order === 'DAY_FIRST' ? DAY_FIRST_FORMATS : MONTH_FIRST_FORMATS;
    for (const format of [...YEAR_FIRST_FORMATS, ...ordered, ...NAMED_MONTH_FORMATS]) {
      const parsed = DateTime.fromFormat(text, format, PARSE_OPTIONS);
      if (parsed.isValid) {
        return dateParts(parsed);
      }
    }
    return null;
  }

  private parseZoned(text: string, order: DateOrder): DateTime | null {
    const utc = UTC_SUFFIX.exec(text);
    if (utc !== null) {
      const split = DATE_TIME_SPLIT.exec(utc[1]);
      if (split === null) return null;
      const date = this.parseDate(split[1], order);
      const time = this.parseTime(split[2]);
      if (date === null || time === null) return null;
      return DateTime.fromObject({ ...date, ...time }, { zone: 'UTC' }).setZone(this.zone);
    }

    for (const parsed of [
      DateTime.fromISO(text, { setZone: true }),
      DateTime.fromSQL(text, { setZone: true }),
      DateTime.fromRFC2822(text, { setZone: true }),
    ]) {
      if (parsed.isValid) {
        return parsed.setZone(this.zone);
      }
    }

    // Day- or month-first date with a trailing Z or numeric offset
    const offset = OFFSET_SUFFIX.exec(text);
    if (offset === null) return null;
    const split = DATE_TIME_SPLIT.exec(offset[1]);
    if (split === null) return null;
    const date = this.parseDate(split[1], order);
    const time = this.parseTime(split[2]);
    if (date === null || time === null) return null;

    const minutes = offset[2] ? 0 : Number(offset[4]) * 60 + Number(offset[5] ?? '0');
    const zoned = DateTime.fromObject(
      { ...date, ...time },
      { zone: FixedOffsetZone.instance(offset[3] === '-' ? -minutes : minutes) }
    );
    return zoned.isValid ? zoned.setZone(this.zone) : null;
  }

  private fromInstant(instant: DateTime): TemporalDerivation {
    return {
      instant,
      localDate: instant.toFormat('yyyy-MM-dd'),
      localHour: instant.hour,
      dateFailed: false,
      timeFailed: false,
    };
  }
}

/**
 * Trimmed cell text with inner whitespace collapsed; null when empty.
 */
export function cellText(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim().replace(/\s+/g, ' ');
  return text === '' ? null : text;
}

function emptyDerivation(dateFailed: boolean, timeFailed: boolean): TemporalDerivation {
  return { instant: null, localDate: null, localHour: null, dateFailed, timeFailed };
}

function dateParts(parsed: DateTime): LocalDateParts {
  return { year: parsed.year, month: parsed.month, day: parsed.day };
}

function timeParts(parsed: DateTime): LocalTimeParts {
  return {
    hour: parsed.hour,
    minute: parsed.minute,
    second: parsed.second,
    millisecond: parsed.millisecond,
  };
}

function formatDate(date: LocalDateParts): string {
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${String(date.year).padStart(4, '0')}-${month}-${day}`;
}
