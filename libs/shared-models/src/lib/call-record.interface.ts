/**
 * Call Record Interfaces
 *
 * One row of an uploaded call log, with the fields the analytics pipeline
 * reads and the values derived from them at ingestion time.
 *
 * Missing values are always `null` - never 0 and never an empty string.
 */

/**
 * A single call record. Immutable once ingested.
 */
export interface CallRecord {
  /** `<uploadId>-R<rowNumber>` */
  id: string;

  /**
   * Data row position plus one: the header counts as row 1 and blank
   * lines are skipped, so it matches the file line only without blank lines
   */
  rowNumber: number;

  /** Agent / caller name */
  agent: string | null;

  /** Country of the called party */
  country: string | null;

  /** Call type (inbound, outbound, ...) */
  callType: string | null;

  /** Call status (answered, missed, ...) */
  callStatus: string | null;

  /** Called party name */
  toName: string | null;

  /** Duration cell as it appeared in the file */
  rawDuration: string | null;

  /** Date cell (separate date/time schemas) */
  rawDate: string | null;

  /** Time cell (separate date/time schemas) */
  rawTime: string | null;

  /** Combined start timestamp cell (single-field schemas) */
  rawStartTime: string | null;

  /** Parsed duration in seconds, never negative */
  durationSeconds: number | null;

  /** Call start as ISO-8601 in the reporting zone */
  localInstant: string | null;

  /** Calendar date in the reporting zone (yyyy-MM-dd) */
  localDate: string | null;

  /** Hour of day 0-23 in the reporting zone; set iff localInstant is set */
  localHour: number | null;
}

/**
 * Fields a record can be grouped or filtered by.
 */
export type Dimension =
  | 'agent'
  | 'country'
  | 'callType'
  | 'callStatus'
  | 'toName'
  | 'localDate'
  | 'localHour';

/** Categorical dimensions that carry a multi-select filter */
export type FilterDimension = 'agent' | 'country' | 'callType' | 'callStatus';

export const FILTER_DIMENSIONS: readonly FilterDimension[] = [
  'agent',
  'country',
  'callType',
  'callStatus',
];

export const ALL_DIMENSIONS: readonly Dimension[] = [
  'agent',
  'country',
  'callType',
  'callStatus',
  'toName',
  'localDate',
  'localHour',
];

/** A grouping key component; null is the missing group */
export type DimensionValue = string | number | null;

/**
 * Record fields holding numbers that can be summarised.
 */
export type NumericRecordField = {
  [K in keyof CallRecord]: CallRecord[K] extends number | null ? K : never;
}[keyof CallRecord];
