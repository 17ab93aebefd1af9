import { Injectable } from '@nestjs/common';
import {
  AggregationResult,
  AggregationRow,
  CallRecord,
  CountResult,
  CountRow,
  Dimension,
  DimensionValue,
  NumericRecordField,
  SortMode,
} from '@talktime/shared-models';

interface Group {
  values: DimensionValue[];
  count: number;
  numbers: number[];
}

/**
 * Grouped summaries over call records.
 *
 * Groups are keyed by the exact tuple of dimension values; a missing value
 * forms its own group. Nothing is cached between calls.
 */
@Injectable()
export class AggregationEngineService {
  /**
   * Count, sum, mean and median of `valueField` per group.
   *
   * `count` includes rows whose value is missing; the statistics only see
   * non-missing values.
   */
  aggregate(
    records: readonly CallRecord[],
    dimensions: readonly Dimension[],
    valueField: NumericRecordField = 'durationSeconds',
    sortMode: SortMode = 'COUNT_THEN_SUM'
  ): AggregationResult {
    assertDimensionCount(dimensions);

    const groups = this.group(records, dimensions, (group, record) => {
      const value = record[valueField];
      if (value !== null && !Number.isNaN(value)) {
        group.numbers.push(value);
      }
    });

    const rows = groups.map((group): AggregationRow => {
      const sum = group.numbers.reduce((acc, n) => acc + n, 0);
      return {
        values: group.values,
        count: group.count,
        sum,
        mean: group.numbers.length > 0 ? sum / group.numbers.length : null,
        median: median(group.numbers),
      };
    });

    // Array.prototype.sort is stable: ties stay in first-seen order
    rows.sort(sortMode === 'SUM' ? (a, b) => b.sum - a.sum : (a, b) => b.count - a.count || b.sum - a.sum);

    return {
      dimensions: [...dimensions],
      sortMode,
      totalRecords: records.length,
      rows,
    };
  }

  /**
   * Attempts per dimension tuple, sorted ascending by the tuple.
   */
  countBy(records: readonly CallRecord[], dimensions: readonly Dimension[]): CountResult {
    assertDimensionCount(dimensions);

    const rows = this.group(records, dimensions).map(
      (group): CountRow => ({ values: group.values, attempts: group.count })
    );
    rows.sort((a, b) => compareTuples(a.values, b.values));

    return {
      dimensions: [...dimensions],
      totalRecords: records.length,
      rows,
    };
  }

  // --- Private ---

  private group(
    records: readonly CallRecord[],
    dimensions: readonly Dimension[],
    collect?: (group: Group, record: CallRecord) => void
  ): Group[] {
    const groups = new Map<string, Group>();

    for (const record of records) {
      const values = dimensions.map((dimension): DimensionValue => record[dimension]);
      const key = JSON.stringify(values);

      let group = groups.get(key);
      if (!group) {
        group = { values, count: 0, numbers: [] };
        groups.set(key, group);
      }
      group.count++;
      collect?.(group, record);
    }

    return [...groups.values()];
  }
}

function assertDimensionCount(dimensions: readonly Dimension[]): void {
  if (dimensions.length < 1 || dimensions.length > 2) {
    throw new Error(`Expected one or two dimensions, got ${dimensions.length}`);
  }
}

/**
 * Median of the values; the mean of the two middle values for even counts.
 */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Numbers numerically, strings by code unit, missing last */
export function compareValues(a: DimensionValue, b: DimensionValue): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareTuples(a: readonly DimensionValue[], b: readonly DimensionValue[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const order = compareValues(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}
