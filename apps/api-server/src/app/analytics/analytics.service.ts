import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DateTime } from 'luxon';
import {
  AggregationResult,
  ALL_DIMENSIONS,
  AnalyticsPreset,
  ATTEMPT_VIEW_IDS,
  AttemptView,
  AttemptViewId,
  CallRecord,
  DashboardQuery,
  DashboardResult,
  Dimension,
  ExplorerRequest,
  FilterSpec,
  OverviewKpis,
  ResolvedSchema,
  SUMMARY_VIEW_IDS,
  SummaryView,
  SummaryViewId,
  UnavailableView,
  ViewId,
} from '@talktime/shared-models';
import { RecordStoreService, StoredUpload } from '../ingestion/record-store.service';
import { effectivePreset } from '../presets/analytics-presets';
import { AggregationEngineService, median } from '../services/aggregation-engine.service';
import { FilterEngineService } from '../services/filter-engine.service';
import { QueryBuilderService } from './query-builder.service';

const SUMMARY_VIEWS: Record<SummaryViewId, readonly Dimension[]> = {
  'agent-wise': ['agent'],
  'country-wise': ['country'],
  'agent-country': ['agent', 'country'],
  'call-type-profile': ['callType'],
  'call-status-profile': ['callStatus'],
  'to-name-profile': ['toName'],
};

/** Grouping order is also the row order of the export */
const ATTEMPT_VIEWS: Record<AttemptViewId, readonly Dimension[]> = {
  'attempts-by-hour': ['localHour'],
  'hour-country': ['country', 'localHour'],
  'agent-hour': ['agent', 'localHour'],
};

const VIEW_IDS: readonly ViewId[] = [...SUMMARY_VIEW_IDS, ...ATTEMPT_VIEW_IDS];

const DURATION_COLUMNS = ['Total Duration (sec)', 'Avg Duration (sec)', 'Median Duration (sec)'];

/**
 * Dashboard, explorer and export over one stored upload.
 *
 * Every request re-runs filter and aggregation over the upload's records;
 * nothing is cached between requests.
 */
@Injectable()
export class AnalyticsService {
  private readonly logger = new Logger(AnalyticsService.name);

  constructor(
    private readonly recordStore: RecordStoreService,
    private readonly queryBuilder: QueryBuilderService,
    private readonly filterEngine: FilterEngineService,
    private readonly aggregation: AggregationEngineService
  ) {}

  buildDashboard(uploadId: string, query?: DashboardQuery, now?: DateTime): DashboardResult {
    const { upload, preset, filter } = this.prepare(uploadId, query, now);
    const { attempts, view } = this.filterEngine.apply(upload.records, filter, upload.schema);

    const summary = (id: SummaryViewId): SummaryView | UnavailableView =>
      this.summaryView(SUMMARY_VIEWS[id], view, upload.schema, preset);
    const attemptView = (id: AttemptViewId): AttemptView | UnavailableView =>
      this.attemptView(ATTEMPT_VIEWS[id], attempts, upload.schema);

    const summaries: Record<SummaryViewId, SummaryView | UnavailableView> = {
      'agent-wise': summary('agent-wise'),
      'country-wise': summary('country-wise'),
      'agent-country': summary('agent-country'),
      'call-type-profile': summary('call-type-profile'),
      'call-status-profile': summary('call-status-profile'),
      'to-name-profile': summary('to-name-profile'),
    };
    const attemptViews: Record<AttemptViewId, AttemptView | UnavailableView> = {
      'attempts-by-hour': attemptView('attempts-by-hour'),
      'hour-country': attemptView('hour-country'),
      'agent-hour': attemptView('agent-hour'),
    };

    this.logger.log(
      `Dashboard for ${uploadId}: ${view.length} calls in view, ${attempts.length} attempts`
    );

    return {
      uploadId,
      presetId: upload.presetId,
      generatedAt: new Date().toISOString(),
      filter,
      schema: upload.schema,
      overview: this.overview(view, attempts),
      summaries,
      attempts: attemptViews,
    };
  }

  /**
   * Ad-hoc aggregation on one or two chosen dimensions of the view.
   */
  explore(uploadId: string, request: ExplorerRequest, now?: DateTime): AggregationResult {
    const { upload, preset, filter } = this.prepare(uploadId, request.query, now);
    const dimensions = this.validateDimensions(request.dimensions, upload.schema);

    const { view } = this.filterEngine.apply(upload.records, filter, upload.schema);
    return this.aggregation.aggregate(view, dimensions, 'durationSeconds', preset.sortMode);
  }

  /**
   * One dashboard view, ready for CSV export.
   */
  exportView(
    uploadId: string,
    viewId: string,
    query?: DashboardQuery,
    now?: DateTime
  ): SummaryView | AttemptView {
    const id = VIEW_IDS.find((v) => v === viewId);
    if (!id) {
      throw new BadRequestException(
        `Unknown view "${viewId}". Expected one of: ${VIEW_IDS.join(', ')}.`
      );
    }

    const { upload, preset, filter } = this.prepare(uploadId, query, now);
    const { attempts, view } = this.filterEngine.apply(upload.records, filter, upload.schema);

    const result = isSummaryViewId(id)
      ? this.summaryView(SUMMARY_VIEWS[id], view, upload.schema, preset)
      : this.attemptView(ATTEMPT_VIEWS[id], attempts, upload.schema);

    if (!result.available) {
      throw new BadRequestException(`View "${id}" is unavailable: ${result.reason}`);
    }
    return result;
  }

  // --- Private ---

  private prepare(
    uploadId: string,
    query: DashboardQuery | undefined,
    now: DateTime | undefined
  ): { upload: StoredUpload; preset: AnalyticsPreset; filter: FilterSpec } {
    const upload = this.recordStore.getUpload(uploadId);
    if (!upload) {
      throw new NotFoundException(`Upload "${uploadId}" not found`);
    }
    const preset = effectivePreset(upload.presetId);
    const filter = this.queryBuilder.toFilterSpec(query, preset, now);
    return { upload, preset, filter };
  }

  private overview(view: readonly CallRecord[], attempts: readonly CallRecord[]): OverviewKpis {
    const durations = view
      .map((r) => r.durationSeconds)
      .filter((d): d is number => d !== null);
    const agents = new Set(view.map((r) => r.agent).filter((a) => a !== null));

    return {
      totalCalls: view.length,
      avgDurationSeconds:
        durations.length > 0 ? durations.reduce((acc, d) => acc + d, 0) / durations.length : null,
      medianDurationSeconds: median(durations),
      agents: agents.size,
      attempts: attempts.length,
    };
  }

  private summaryView(
    dimensions: readonly Dimension[],
    view: readonly CallRecord[],
    schema: ResolvedSchema,
    preset: AnalyticsPreset
  ): SummaryView | UnavailableView {
    const missing = this.missingSource(dimensions, schema);
    if (missing !== null) {
      return { available: false, reason: missing };
    }
    return {
      available: true,
      columns: [...this.dimensionLabels(dimensions, schema), preset.countLabel, ...DURATION_COLUMNS],
      result: this.aggregation.aggregate(view, dimensions, 'durationSeconds', preset.sortMode),
    };
  }

  /**
   * Attempt counts. Records without an hour are left out of hour views.
   */
  private attemptView(
    dimensions: readonly Dimension[],
    attempts: readonly CallRecord[],
    schema: ResolvedSchema
  ): AttemptView | UnavailableView {
    const missing = this.missingSource(dimensions, schema);
    if (missing !== null) {
      return { available: false, reason: missing };
    }
    const withHour = dimensions.includes('localHour')
      ? attempts.filter((r) => r.localHour !== null)
      : attempts;

    return {
      available: true,
      columns: [...this.dimensionLabels(dimensions, schema), 'Attempts'],
      result: this.aggregation.countBy(withHour, dimensions),
    };
  }

  private validateDimensions(value: unknown, schema: ResolvedSchema): Dimension[] {
    if (!Array.isArray(value) || value.length < 1 || value.length > 2) {
      throw new BadRequestException('"dimensions" must list one or two dimensions.');
    }
    const items: unknown[] = value;
    const dimensions = items.map((item) => {
      const dimension = ALL_DIMENSIONS.find((d) => d === item);
      if (!dimension) {
        throw new BadRequestException(
          `Invalid dimension "${String(item)}". Expected one of: ${ALL_DIMENSIONS.join(', ')}.`
        );
      }
      return dimension;
    });
    if (dimensions.length === 2 && dimensions[0] === dimensions[1]) {
      throw new BadRequestException('The two dimensions must differ.');
    }

    const missing = this.missingSource(dimensions, schema);
    if (missing !== null) {
      throw new BadRequestException(missing);
    }
    return dimensions;
  }

  /**
   * Why a dimension cannot be built from this upload, or null when all can.
   */
  private missingSource(dimensions: readonly Dimension[], schema: ResolvedSchema): string | null {
    for (const dimension of dimensions) {
      if (dimension === 'localHour') {
        if (schema.temporalShape !== 'SEPARATE' && schema.temporalShape !== 'COMBINED') {
          return 'No time of day available (needs a start time, or date and time columns).';
        }
      } else if (dimension === 'localDate') {
        if (schema.temporalShape === 'NONE') {
          return 'No date column available.';
        }
      } else if (schema.columns[dimension] === null) {
        return `No column found for "${dimension}".`;
      }
    }
    return null;
  }

  private dimensionLabels(dimensions: readonly Dimension[], schema: ResolvedSchema): string[] {
    return dimensions.map((dimension) => {
      if (dimension === 'localHour') return 'Hour';
      if (dimension === 'localDate') return 'Date';
      return schema.columns[dimension] ?? dimension;
    });
  }
}

function isSummaryViewId(id: ViewId): id is SummaryViewId {
  return id in SUMMARY_VIEWS;
}
