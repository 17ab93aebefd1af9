/**
 * Interfaces for CSV ingestion and the in-memory record store.
 *
 * Data Flow:
 * CSV Upload → Column Resolution → Field Derivation → RecordStore (in-memory) → Filters → Aggregates
 */

import { ColumnOverrides, ResolvedSchema } from './schema.interface';

/** Interpretation of ambiguous numeric dates such as 03/04/2024 */
export type DateOrder = 'DAY_FIRST' | 'MONTH_FIRST';

/** Outcome of an upload */
export type UploadStatus = 'COMPLETED' | 'FAILED';

// === Upload Request ===

export interface UploadRequest {
  /** Original file name */
  fileName: string;

  /** Raw CSV text including the header row */
  csvText: string;

  /** Explicit header names per role, checked before the alias lists */
  overrides?: ColumnOverrides;

  /** Preset to apply; detected from the headers when omitted */
  presetId?: string;
}

// === Upload Result ===

/**
 * Parse-failure counters for the derived fields.
 * A failure is a non-empty cell that could not be parsed.
 */
export interface DerivationStats {
  /** Duration cells that did not parse */
  invalidDurations: number;

  /** Durations that parsed but fell outside [0, maxDurationSeconds] */
  rejectedDurations: number;

  /** Date (or combined start time) cells that did not parse */
  invalidDates: number;

  /** Time cells that did not parse, or date+time pairs with no valid local time */
  invalidTimes: number;
}

/**
 * Response returned after a CSV upload.
 */
export interface UploadResult {
  /** Unique ID for this upload batch ('NONE' when the upload failed) */
  uploadId: string;

  status: UploadStatus;

  fileName: string;

  /** Data rows parsed (excluding header) */
  totalRows: number;

  /** Records stored */
  storedRows: number;

  uploadedAt: string;

  /** Header row as read */
  headers: string[];

  /** Column resolution (null when the upload failed before resolution) */
  schema: ResolvedSchema | null;

  /** Date interpretation chosen for the whole upload (null without a date column) */
  dateOrder: DateOrder | null;

  /** Preset applied */
  presetId: string | null;

  stats: DerivationStats;

  /** Human-readable status summary */
  message: string;

  /** Non-fatal problems (unresolved roles, ignored overrides, rejected values) */
  warnings: string[];
}

// === Record Store State ===

export interface UploadSummary {
  uploadId: string;
  fileName: string;
  uploadedAt: string;
  totalRows: number;
  presetId: string | null;
}

/**
 * Summary of the in-memory store.
 */
export interface RecordStoreState {
  hasRecords: boolean;

  /** Uploads held, oldest first */
  uploads: UploadSummary[];

  /** Most recent upload */
  lastUpload: UploadSummary | null;
}

// === Filter Options ===

/**
 * Values the presentation layer offers in its pickers for one upload.
 * A dimension whose column is unresolved is null.
 */
export interface FilterOptions {
  uploadId: string;
  agents: string[] | null;
  countries: string[] | null;
  callTypes: string[] | null;
  callStatuses: string[] | null;

  /** Earliest and latest local dates present */
  dateBounds: { min: string; max: string } | null;

  /** Whether hour-of-day views can be built */
  hasHourData: boolean;
}
