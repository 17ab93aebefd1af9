import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DateTime } from 'luxon';
import {
  AnalyticsPreset,
  CountingMode,
  DashboardQuery,
  DateRangePreset,
  DateRangeSelection,
  DateWindow,
  FilterSpec,
} from '@talktime/shared-models';
import { analyticsConfig } from '../config/analytics.config';
import { TeamRosterService } from '../services/team-roster.service';
import { TemporalResolverService } from '../services/temporal-resolver.service';

const DATE_RANGE_PRESETS: readonly DateRangePreset[] = ['TODAY', 'YESTERDAY', 'ALL', 'CUSTOM'];
const COUNTING_MODES: readonly CountingMode[] = ['ALL_CALLS', 'TALKTIME'];
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Turns a dashboard query from the presentation layer into a FilterSpec.
 *
 * Omitted fields take the preset's defaults. Anything malformed is a
 * BadRequestException; nothing is silently dropped.
 */
@Injectable()
export class QueryBuilderService {
  constructor(
    @Inject(analyticsConfig.KEY)
    private readonly config: ConfigType<typeof analyticsConfig>,
    private readonly teamRoster: TeamRosterService,
    private readonly temporalResolver: TemporalResolverService
  ) {}

  /**
   * @param now reference instant for TODAY / YESTERDAY
   */
  toFilterSpec(
    query: DashboardQuery | undefined,
    preset: AnalyticsPreset,
    now: DateTime = DateTime.now()
  ): FilterSpec {
    const q = query ?? {};

    return {
      dateWindow: this.dateWindow(q.dateRange, now),
      agents: this.selection('agents', q.agents),
      countries: this.selection('countries', q.countries),
      callTypes: this.selection('callTypes', q.callTypes),
      callStatuses: this.selection('callStatuses', q.callStatuses),
      teamBase: q.teamBase === undefined || q.teamBase === 'ALL' ? 'ALL' : this.teamTag(q.teamBase),
      additiveTeams: this.additiveTeams(q.additiveTeams),
      includeMissing: this.flag('includeMissing', q.includeMissing, preset.defaultIncludeMissing),
      mode: this.mode(q.mode, preset.defaultMode),
      thresholdSeconds: this.threshold(q.thresholdSeconds),
    };
  }

  /**
   * Half-open window for a date selection. CUSTOM bounds are inclusive
   * calendar dates; the window ends the day after `end`.
   */
  dateWindow(selection: DateRangeSelection | null | undefined, now: DateTime): DateWindow | null {
    if (selection === undefined || selection === null) {
      return null;
    }
    if (typeof selection !== 'object' || Array.isArray(selection)) {
      throw new BadRequestException('"dateRange" must be an object with a "preset".');
    }
    const preset = DATE_RANGE_PRESETS.find((p) => p === selection.preset);
    if (!preset) {
      throw new BadRequestException(
        `Invalid date range "${String(selection.preset)}". Expected one of: ${DATE_RANGE_PRESETS.join(', ')}.`
      );
    }

    const today = now.setZone(this.temporalResolver.zoneName).startOf('day');
    switch (preset) {
      case 'ALL':
        return null;
      case 'TODAY':
        return { start: isoDate(today), end: isoDate(today.plus({ days: 1 })) };
      case 'YESTERDAY':
        return { start: isoDate(today.minus({ days: 1 })), end: isoDate(today) };
      case 'CUSTOM': {
        const start = this.calendarDate('start', selection.start);
        const end = this.calendarDate('end', selection.end);
        if (end < start) {
          throw new BadRequestException(`Date range end ${isoDate(end)} is before start ${isoDate(start)}.`);
        }
        return { start: isoDate(start), end: isoDate(end.plus({ days: 1 })) };
      }
    }
  }

  // --- Private ---

  private calendarDate(field: 'start' | 'end', value: unknown): DateTime {
    const parsed =
      typeof value === 'string' && ISO_DATE.test(value)
        ? DateTime.fromISO(value, { zone: 'UTC' })
        : null;
    if (!parsed || !parsed.isValid) {
      throw new BadRequestException(`Custom date range needs "${field}" as yyyy-MM-dd, got "${String(value)}".`);
    }
    return parsed;
  }

  private selection(field: string, value: unknown): string[] | null {
    if (value === undefined || value === null) {
      return null;
    }
    if (!Array.isArray(value)) {
      throw new BadRequestException(`"${field}" must be an array of strings or null.`);
    }
    const items: unknown[] = value;
    if (!items.every((item): item is string => typeof item === 'string')) {
      throw new BadRequestException(`"${field}" must be an array of strings or null.`);
    }
    return items.length > 0 ? items : null;
  }

  private teamTag(value: unknown): string {
    const team = typeof value === 'string' ? this.teamRoster.getTeam(value) : undefined;
    if (!team) {
      const known = this.teamRoster.getTeams().map((t) => t.tag);
      throw new BadRequestException(`Unknown team "${String(value)}". Known teams: ALL, ${known.join(', ')}.`);
    }
    return team.tag;
  }

  private additiveTeams(value: unknown): string[] {
    if (value === undefined || value === null) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw new BadRequestException('"additiveTeams" must be an array of team tags.');
    }
    const tags: unknown[] = value;
    return [...new Set(tags.map((tag) => this.teamTag(tag)))];
  }

  private flag(field: string, value: unknown, fallback: boolean): boolean {
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      throw new BadRequestException(`"${field}" must be a boolean.`);
    }
    return value;
  }

  private mode(value: unknown, fallback: CountingMode): CountingMode {
    if (value === undefined) {
      return fallback;
    }
    const mode = COUNTING_MODES.find((m) => m === value);
    if (!mode) {
      throw new BadRequestException(
        `Invalid mode "${String(value)}". Expected one of: ${COUNTING_MODES.join(', ')}.`
      );
    }
    return mode;
  }

  private threshold(value: unknown): number {
    if (value === undefined) {
      return this.config.defaultThresholdSeconds;
    }
    const { thresholdMinSeconds: min, thresholdMaxSeconds: max } = this.config;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
      throw new BadRequestException(
        `"thresholdSeconds" must be a number between ${min} and ${max}, got ${String(value)}.`
      );
    }
    return value;
  }
}

function isoDate(value: DateTime): string {
  return value.toFormat('yyyy-MM-dd');
}
