/**
 * Analytics Interfaces
 *
 * Request and response shapes of the dashboard API consumed by the
 * presentation layer.
 */

import { Dimension } from './call-record.interface';
import { AggregationResult, CountResult } from './aggregation.interface';
import { CountingMode, DateRangeSelection, FilterSpec, TeamBase } from './filter.interface';
import { ResolvedSchema } from './schema.interface';

// === Query ===

/**
 * Dashboard query as sent by the presentation layer.
 * Omitted fields fall back to the upload's preset defaults.
 */
export interface DashboardQuery {
  dateRange?: DateRangeSelection | null;
  mode?: CountingMode;
  thresholdSeconds?: number;
  agents?: string[] | null;
  countries?: string[] | null;
  callTypes?: string[] | null;
  callStatuses?: string[] | null;
  teamBase?: TeamBase;
  additiveTeams?: string[];
  includeMissing?: boolean;
}

export interface ExplorerRequest {
  query?: DashboardQuery;

  /** One or two dimensions, in grouping order */
  dimensions: Dimension[];
}

// === Views ===

/** Summary tables built from the threshold-filtered view */
export type SummaryViewId =
  | 'agent-wise'
  | 'country-wise'
  | 'agent-country'
  | 'call-type-profile'
  | 'call-status-profile'
  | 'to-name-profile';

/** Attempt tables built from all filtered calls, regardless of threshold */
export type AttemptViewId = 'attempts-by-hour' | 'hour-country' | 'agent-hour';

export type ViewId = SummaryViewId | AttemptViewId;

export const SUMMARY_VIEW_IDS: readonly SummaryViewId[] = [
  'agent-wise',
  'country-wise',
  'agent-country',
  'call-type-profile',
  'call-status-profile',
  'to-name-profile',
];

export const ATTEMPT_VIEW_IDS: readonly AttemptViewId[] = [
  'attempts-by-hour',
  'hour-country',
  'agent-hour',
];

/**
 * A view that could not be built because a column is missing.
 */
export interface UnavailableView {
  available: false;
  reason: string;
}

export interface SummaryView {
  available: true;

  /** Column labels, dimension headers first */
  columns: string[];

  result: AggregationResult;
}

export interface AttemptView {
  available: true;
  columns: string[];
  result: CountResult;
}

// === Dashboard ===

export interface OverviewKpis {
  /** Calls in the view */
  totalCalls: number;

  /** Null when no call in the view has a duration */
  avgDurationSeconds: number | null;
  medianDurationSeconds: number | null;

  /** Distinct non-missing agents in the view */
  agents: number;

  /** Calls before the duration threshold */
  attempts: number;
}

export interface DashboardResult {
  uploadId: string;
  presetId: string | null;
  generatedAt: string;

  /** The filter actually applied */
  filter: FilterSpec;

  schema: ResolvedSchema;
  overview: OverviewKpis;

  summaries: Record<SummaryViewId, SummaryView | UnavailableView>;
  attempts: Record<AttemptViewId, AttemptView | UnavailableView>;
}
