/**
 * Column schema resolution.
 *
 * Uploaded files name the same logical column in many ways ("Caller",
 * "Agent Name", "Owner", ...). The resolver maps each logical role to the
 * header actually present, once per upload.
 */

/** Logical columns the pipeline understands */
export type ColumnRole =
  | 'agent'
  | 'country'
  | 'callType'
  | 'callStatus'
  | 'toName'
  | 'duration'
  | 'startTime'
  | 'date'
  | 'time';

export const COLUMN_ROLES: readonly ColumnRole[] = [
  'agent',
  'country',
  'callType',
  'callStatus',
  'toName',
  'duration',
  'startTime',
  'date',
  'time',
];

/** How a role was matched to a header */
export type ColumnMatchKind = 'override' | 'exact' | 'case-insensitive';

/**
 * Resolution of one role.
 */
export interface ResolvedColumn {
  role: ColumnRole;

  /** Header in the file, or null when no alias matched */
  column: string | null;

  /** How the header was found (null when unresolved) */
  matchedBy: ColumnMatchKind | null;
}

/**
 * Which temporal fields the records are derived from.
 * - SEPARATE: a date column and a time column
 * - COMBINED: a single start timestamp column
 * - DATE_ONLY: a date column without a time column (no hour views)
 * - NONE: no usable temporal column
 */
export type TemporalShape = 'SEPARATE' | 'COMBINED' | 'DATE_ONLY' | 'NONE';

/**
 * Output of the column resolver.
 */
export interface ResolvedSchema {
  /** role → header, null when unresolved */
  columns: Record<ColumnRole, string | null>;

  /** Per-role detail, in COLUMN_ROLES order */
  resolutions: ResolvedColumn[];

  temporalShape: TemporalShape;

  /** Roles that could not be resolved */
  unresolved: ColumnRole[];

  /** Overrides that named headers not present in the file */
  ignoredOverrides: Partial<Record<ColumnRole, string>>;
}

/** Explicit header names supplied by the user, per role */
export type ColumnOverrides = Partial<Record<ColumnRole, string>>;

/** Ordered alias lists per role */
export type ColumnAliasMap = Record<ColumnRole, readonly string[]>;

/**
 * Known header spellings, most specific first.
 */
export const DEFAULT_COLUMN_ALIASES: ColumnAliasMap = {
  agent: [
    'Caller',
    'Owner',
    'Agent',
    'User',
    'Student/Academic Counsellor',
    'Student/Academic Counselor',
    'Assigned To',
    'Rep',
    'Agent Name',
  ],
  country: ['Country', 'Country/Region', 'Country Name'],
  callType: ['Call Type', 'Type'],
  callStatus: ['Call Status', 'Status'],
  toName: ['To Name', 'Callee', 'Called Name'],
  duration: ['Call Duration', 'Duration', 'Talk Time', 'CallDuration', 'Call_Duration'],
  startTime: [
    'Start Time',
    'Call Start Time',
    'Created At',
    'Timestamp',
    'Call Start',
    'Started At',
    'Date/Time',
    'Datetime',
  ],
  date: ['Date', 'Call Date'],
  time: ['Time', 'Call Time'],
};
