import { SortMode } from './aggregation.interface';
import { CountingMode } from './filter.interface';
import { ColumnRole } from './schema.interface';

/** Header label of the call-count column */
export type CountLabel = 'Total Calls' | 'Call Count';

/**
 * Per-variant configuration of the dashboard.
 *
 * Each known export layout gets one preset. The pipeline is the same for all;
 * presets only change aliases, defaults and labels.
 */
export interface AnalyticsPreset {
  id: string;
  name: string;
  description: string;

  /** Headers this preset expects (for auto-detection) */
  expectedColumns: string[];

  /** Aliases tried before the default alias lists */
  extraAliases: Partial<Record<ColumnRole, string[]>>;

  defaultMode: CountingMode;
  defaultIncludeMissing: boolean;

  sortMode: SortMode;
  countLabel: CountLabel;

  /** Team tags offered as base selection */
  baseTeams: string[];

  /** Team tags offered as additive flags */
  additiveTeams: string[];
}
