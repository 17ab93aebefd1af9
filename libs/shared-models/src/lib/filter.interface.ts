/**
 * Filter Interfaces
 *
 * A FilterSpec is rebuilt from the user's selections on every interaction.
 * Nothing here is persisted.
 */

/**
 * Which calls the summary views count.
 * - ALL_CALLS: every call that passes the filters
 * - TALKTIME: only calls whose duration meets the threshold
 */
export type CountingMode = 'ALL_CALLS' | 'TALKTIME';

/**
 * Half-open calendar window [start, end) in the reporting zone.
 * Dates are yyyy-MM-dd.
 */
export interface DateWindow {
  start: string;
  end: string;
}

/** Date range presets offered to the user */
export type DateRangePreset = 'TODAY' | 'YESTERDAY' | 'ALL' | 'CUSTOM';

/**
 * The user's date choice before it is turned into a window.
 * CUSTOM bounds are inclusive calendar dates.
 */
export interface DateRangeSelection {
  preset: DateRangePreset;
  start?: string;
  end?: string;
}

/** Base agent set: every agent, or a single team's roster */
export type TeamBase = 'ALL' | string;

/**
 * The active query.
 */
export interface FilterSpec {
  /** Null means no date constraint */
  dateWindow: DateWindow | null;

  /** Selected values per categorical dimension; null or empty = no constraint */
  agents: string[] | null;
  countries: string[] | null;
  callTypes: string[] | null;
  callStatuses: string[] | null;

  teamBase: TeamBase;

  /** Team tags whose members are added on top of the base set */
  additiveTeams: string[];

  /** Keep rows whose filtered field is missing */
  includeMissing: boolean;

  mode: CountingMode;

  /** Minimum duration in seconds for TALKTIME mode */
  thresholdSeconds: number;
}

/**
 * The two record subsets every query produces.
 */
export interface FilteredViews<T> {
  /** All filters applied except the duration threshold */
  attempts: T[];

  /** All filters plus the duration threshold (same as attempts in ALL_CALLS mode) */
  view: T[];
}
