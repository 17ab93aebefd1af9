import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DateTime } from 'luxon';
import { DashboardQuery } from '@talktime/shared-models';
import { AppModule } from '../app.module';
import { analyticsConfig, DEFAULT_ANALYTICS_CONFIG } from '../config/analytics.config';
import { CsvIngestionService } from '../ingestion/csv-ingestion.service';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './analytics.service';

const CALL_LOG = [
  'Date,Time,Caller,Call Type,Country Name,Call Status,Call Duration',
  '15/01/2024,10:00,A,Outbound,India,Answered,60',
  '15/01/2024,10:30,A,Outbound,India,Answered,30',
  '15/01/2024,11:00,B,Outbound,Nepal,Answered,2:00',
  '14/01/2024,18:00,B,Inbound,Nepal,Missed,0',
].join('\n');

const TALKTIME_ON_15TH: DashboardQuery = {
  dateRange: { preset: 'CUSTOM', start: '2024-01-15', end: '2024-01-15' },
  mode: 'TALKTIME',
  thresholdSeconds: 60,
};

describe('AnalyticsService', () => {
  let analytics: AnalyticsService;
  let controller: AnalyticsController;
  let uploadId: string;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(analyticsConfig.KEY)
      .useValue(DEFAULT_ANALYTICS_CONFIG)
      .compile();

    analytics = moduleRef.get(AnalyticsService);
    controller = moduleRef.get(AnalyticsController);
    uploadId = moduleRef.get(CsvIngestionService).ingest({ fileName: 'calls.csv', csvText: CALL_LOG }).uploadId;
  });

  describe('dashboard', () => {
    it('counts only calls meeting the threshold in TALKTIME mode', () => {
      const dashboard = analytics.buildDashboard(uploadId, TALKTIME_ON_15TH);
      const agentWise = dashboard.summaries['agent-wise'];

      expect(dashboard.presetId).toBe('team-activity');
      expect(agentWise).toEqual({
        available: true,
        columns: ['Caller', 'Total Calls', 'Total Duration (sec)', 'Avg Duration (sec)', 'Median Duration (sec)'],
        result: {
          dimensions: ['agent'],
          sortMode: 'COUNT_THEN_SUM',
          totalRecords: 2,
          rows: [
            { values: ['B'], count: 1, sum: 120, mean: 120, median: 120 },
            { values: ['A'], count: 1, sum: 60, mean: 60, median: 60 },
          ],
        },
      });
      expect(dashboard.overview).toEqual({
        totalCalls: 2,
        avgDurationSeconds: 90,
        medianDurationSeconds: 90,
        agents: 2,
        attempts: 3,
      });
    });

    it('builds attempt views from every filtered call', () => {
      const { attempts } = analytics.buildDashboard(uploadId, TALKTIME_ON_15TH);

      expect(attempts['attempts-by-hour']).toEqual({
        available: true,
        columns: ['Hour', 'Attempts'],
        result: {
          dimensions: ['localHour'],
          totalRecords: 3,
          rows: [
            { values: [10], attempts: 2 },
            { values: [11], attempts: 1 },
          ],
        },
      });
      const hourCountry = attempts['hour-country'];
      expect(hourCountry.available && hourCountry.columns).toEqual(['Country Name', 'Hour', 'Attempts']);
      expect(hourCountry.available && hourCountry.result.rows).toEqual([
        { values: ['India', 10], attempts: 2 },
        { values: ['Nepal', 11], attempts: 1 },
      ]);
    });

    it('marks views without a source column unavailable', () => {
      const { summaries } = analytics.buildDashboard(uploadId);
      expect(summaries['to-name-profile']).toEqual({
        available: false,
        reason: 'No column found for "toName".',
      });
    });

    it('uses the preset defaults when the query is empty', () => {
      const dashboard = analytics.buildDashboard(uploadId, {});
      expect(dashboard.filter.mode).toBe('ALL_CALLS');
      expect(dashboard.overview.totalCalls).toBe(4);
      expect(dashboard.overview.attempts).toBe(4);
    });

    it('resolves TODAY against the reporting zone', () => {
      const now = DateTime.fromISO('2024-01-14T12:00:00Z');
      const dashboard = analytics.buildDashboard(uploadId, { dateRange: { preset: 'TODAY' } }, now);
      expect(dashboard.overview.totalCalls).toBe(1);
      expect(dashboard.filter.dateWindow).toEqual({ start: '2024-01-14', end: '2024-01-15' });
    });

    it('rejects unknown uploads', () => {
      expect(() => analytics.buildDashboard('UPL-404')).toThrow(NotFoundException);
    });
  });

  describe('explorer', () => {
    it('aggregates the view on chosen dimensions', () => {
      const result = analytics.explore(uploadId, { query: TALKTIME_ON_15TH, dimensions: ['country', 'agent'] });
      expect(result.rows.map((r) => [...r.values, r.count, r.sum])).toEqual([
        ['Nepal', 'B', 1, 120],
        ['India', 'A', 1, 60],
      ]);
    });

    it('rejects bad dimension lists', () => {
      expect(() => analytics.explore(uploadId, { dimensions: [] })).toThrow(
        '"dimensions" must list one or two dimensions.'
      );
      expect(() => analytics.explore(uploadId, { dimensions: ['agent', 'agent'] })).toThrow(
        'The two dimensions must differ.'
      );
      expect(() => analytics.explore(uploadId, { dimensions: ['toName'] })).toThrow(
        'No column found for "toName".'
      );
    });
  });

  describe('export', () => {
    it('renders a summary view as CSV', () => {
      expect(controller.export(uploadId, 'agent-wise', TALKTIME_ON_15TH)).toBe(
        [
          'Caller,Total Calls,Total Duration (sec),Avg Duration (sec),Median Duration (sec)',
          'B,1,120,120,120',
          'A,1,60,60,60',
        ].join('\n')
      );
    });

    it('renders an attempt view as CSV', () => {
      expect(controller.export(uploadId, 'agent-hour', TALKTIME_ON_15TH)).toBe(
        'Caller,Hour,Attempts\nA,10,2\nB,11,1'
      );
    });

    it('rejects unknown and unavailable views', () => {
      expect(() => analytics.exportView(uploadId, 'nope')).toThrow(BadRequestException);
      expect(() => analytics.exportView(uploadId, 'to-name-profile')).toThrow(
        'View "to-name-profile" is unavailable: No column found for "toName".'
      );
    });
  });

  it('lists presets and teams', () => {
    expect(controller.getPresets().map((p) => p.id)).toEqual([
      'counsellor-talktime',
      'team-activity',
      'agent-activity',
      'activity-feed',
    ]);
    expect(controller.getTeams().map((t) => t.tag)).toEqual(['B2C', 'MT']);
  });
});
