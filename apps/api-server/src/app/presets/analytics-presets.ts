import { AnalyticsPreset } from '@talktime/shared-models';

/** Preset used for defaults when none was detected or requested */
export const FALLBACK_PRESET_ID = 'agent-activity';

/** Share of a preset's expected headers a file must carry to match it */
const DETECTION_RATIO = 0.8;

const CALL_LOG_COLUMNS = [
  'Date',
  'Time',
  'Caller',
  'Call Type',
  'Country Name',
  'Call Status',
  'Call Duration',
];

const CALL_LOG_ALIASES: AnalyticsPreset['extraAliases'] = {
  agent: ['Caller'],
  country: ['Country Name'],
  duration: ['Call Duration'],
};

export const ANALYTICS_PRESETS: AnalyticsPreset[] = [
  {
    id: 'counsellor-talktime',
    name: 'Counsellor Talktime',
    description: 'Call log with separate Date/Time columns and a To Name column; talktime counting',
    expectedColumns: [...CALL_LOG_COLUMNS, 'To Name'],
    extraAliases: CALL_LOG_ALIASES,
    defaultMode: 'TALKTIME',
    defaultIncludeMissing: false,
    sortMode: 'SUM',
    countLabel: 'Call Count',
    baseTeams: [],
    additiveTeams: [],
  },
  {
    id: 'team-activity',
    name: 'Team Activity',
    description: 'Call log with separate Date/Time columns, B2C base team and additive MT team',
    expectedColumns: CALL_LOG_COLUMNS,
    extraAliases: CALL_LOG_ALIASES,
    defaultMode: 'ALL_CALLS',
    defaultIncludeMissing: true,
    sortMode: 'COUNT_THEN_SUM',
    countLabel: 'Total Calls',
    baseTeams: ['B2C'],
    additiveTeams: ['MT'],
  },
  {
    id: 'agent-activity',
    name: 'Agent Activity',
    description: 'Call log with separate Date/Time columns; all calls counted',
    expectedColumns: CALL_LOG_COLUMNS,
    extraAliases: CALL_LOG_ALIASES,
    defaultMode: 'ALL_CALLS',
    defaultIncludeMissing: false,
    sortMode: 'COUNT_THEN_SUM',
    countLabel: 'Total Calls',
    baseTeams: [],
    additiveTeams: [],
  },
  {
    id: 'activity-feed',
    name: 'Activity Feed',
    description: 'CRM activity export with a single start timestamp column; talktime counting',
    expectedColumns: ['Owner', 'Call Duration', 'Start Time'],
    extraAliases: {
      agent: ['Owner', 'Agent', 'User'],
    },
    defaultMode: 'TALKTIME',
    defaultIncludeMissing: false,
    sortMode: 'SUM',
    countLabel: 'Call Count',
    baseTeams: [],
    additiveTeams: [],
  },
];

/**
 * Try to auto-detect which preset matches the given headers.
 *
 * The best match ratio wins; ties go to the earlier preset. Returns null when
 * no preset reaches DETECTION_RATIO.
 */
export function detectPreset(headers: readonly string[]): AnalyticsPreset | null {
  const headerSet = new Set(headers.map((h) => h.trim().toLowerCase()));

  let best: AnalyticsPreset | null = null;
  let bestRatio = 0;
  for (const preset of ANALYTICS_PRESETS) {
    const matchCount = preset.expectedColumns.filter((col) =>
      headerSet.has(col.toLowerCase())
    ).length;
    const ratio = matchCount / preset.expectedColumns.length;

    if (ratio >= DETECTION_RATIO && ratio > bestRatio) {
      best = preset;
      bestRatio = ratio;
    }
  }

  return best;
}

/**
 * Get a preset by ID
 */
export function getPresetById(id: string): AnalyticsPreset | undefined {
  return ANALYTICS_PRESETS.find((p) => p.id === id);
}

/**
 * The preset whose defaults apply to an upload.
 */
export function effectivePreset(presetId: string | null): AnalyticsPreset {
  const preset = (presetId && getPresetById(presetId)) || getPresetById(FALLBACK_PRESET_ID);
  if (!preset) {
    throw new Error(`Fallback preset "${FALLBACK_PRESET_ID}" is not defined`);
  }
  return preset;
}
