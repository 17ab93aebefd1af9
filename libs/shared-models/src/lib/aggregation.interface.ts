import { Dimension, DimensionValue } from './call-record.interface';

/**
 * Sort order of summary rows.
 * - COUNT_THEN_SUM: most calls first, then most time
 * - SUM: most time first
 */
export type SortMode = 'COUNT_THEN_SUM' | 'SUM';

/**
 * One group of a summary table.
 */
export interface AggregationRow {
  /** One value per grouping dimension; null is the missing group */
  values: DimensionValue[];

  /** Rows in the group, including rows with a missing value */
  count: number;

  /** Sum of non-missing values (0 when there are none) */
  sum: number;

  /** Null when the group has no non-missing value */
  mean: number | null;

  /** Null when the group has no non-missing value */
  median: number | null;
}

export interface AggregationResult {
  dimensions: Dimension[];
  sortMode: SortMode;

  /** Records that went into the aggregation */
  totalRecords: number;

  rows: AggregationRow[];
}

/**
 * Attempt count for one dimension tuple.
 */
export interface CountRow {
  values: DimensionValue[];
  attempts: number;
}

export interface CountResult {
  dimensions: Dimension[];
  totalRecords: number;
  rows: CountRow[];
}
