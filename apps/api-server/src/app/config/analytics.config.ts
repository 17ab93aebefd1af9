import { registerAs } from '@nestjs/config';

export interface AnalyticsConfig {
  /** IANA zone or fixed offset all local dates and hours are derived in */
  reportingZone: string;

  defaultThresholdSeconds: number;
  thresholdMinSeconds: number;
  thresholdMaxSeconds: number;

  /** Durations above this are treated as malformed */
  maxDurationSeconds: number;

  /** Upload row limit */
  maxRows: number;

  /** Roster file replacing the bundled teams.json */
  teamsFile: string | null;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got "${raw}"`);
  }
  return value;
}

export const analyticsConfig = registerAs(
  'analytics',
  (): AnalyticsConfig => ({
    reportingZone: process.env['REPORTING_ZONE'] || 'Asia/Kolkata',
    defaultThresholdSeconds: readNumber('DEFAULT_THRESHOLD', 60),
    thresholdMinSeconds: readNumber('THRESHOLD_MIN', 10),
    thresholdMaxSeconds: readNumber('THRESHOLD_MAX', 300),
    maxDurationSeconds: readNumber('MAX_DURATION_SECONDS', 86400),
    maxRows: readNumber('MAX_ROWS', 500_000),
    teamsFile: process.env['TEAMS_FILE'] || null,
  })
);

/** Values used when no environment overrides are present; handy for tests */
export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = {
  reportingZone: 'Asia/Kolkata',
  defaultThresholdSeconds: 60,
  thresholdMinSeconds: 10,
  thresholdMaxSeconds: 300,
  maxDurationSeconds: 86400,
  maxRows: 500_000,
  teamsFile: null,
};
