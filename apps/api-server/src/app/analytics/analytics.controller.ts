import { Body, Controller, Get, Header, HttpCode, Logger, Param, Post } from '@nestjs/common';
import {
  AggregationResult,
  AnalyticsPreset,
  DashboardQuery,
  DashboardResult,
  ExplorerRequest,
  TeamDefinition,
} from '@talktime/shared-models';
import { ANALYTICS_PRESETS } from '../presets/analytics-presets';
import { TeamRosterService } from '../services/team-roster.service';
import { AnalyticsService } from './analytics.service';
import { CsvExportService } from './csv-export.service';

@Controller('analytics')
export class AnalyticsController {
  private readonly logger = new Logger(AnalyticsController.name);

  constructor(
    private readonly analytics: AnalyticsService,
    private readonly csvExport: CsvExportService,
    private readonly teamRoster: TeamRosterService
  ) {}

  /**
   * GET /api/analytics/presets
   */
  @Get('presets')
  getPresets(): AnalyticsPreset[] {
    return ANALYTICS_PRESETS;
  }

  /**
   * GET /api/analytics/teams
   *
   * Team tags and rosters available for base and additive selection.
   */
  @Get('teams')
  getTeams(): TeamDefinition[] {
    return this.teamRoster.getTeams().map(({ tag, label, members }) => ({ tag, label, members }));
  }

  /**
   * POST /api/analytics/:uploadId/dashboard
   *
   * KPIs plus every summary and attempt view for the query.
   */
  @Post(':uploadId/dashboard')
  @HttpCode(200)
  dashboard(
    @Param('uploadId') uploadId: string,
    @Body() query: DashboardQuery
  ): DashboardResult {
    return this.analytics.buildDashboard(uploadId, query);
  }

  /**
   * POST /api/analytics/:uploadId/explore
   */
  @Post(':uploadId/explore')
  @HttpCode(200)
  explore(
    @Param('uploadId') uploadId: string,
    @Body() request: ExplorerRequest
  ): AggregationResult {
    return this.analytics.explore(uploadId, request);
  }

  /**
   * POST /api/analytics/:uploadId/export/:view
   *
   * One view as CSV, header row first.
   */
  @Post(':uploadId/export/:view')
  @HttpCode(200)
  @Header('Content-Type', 'text/csv; charset=utf-8')
  export(
    @Param('uploadId') uploadId: string,
    @Param('view') viewId: string,
    @Body() query: DashboardQuery
  ): string {
    const view = this.analytics.exportView(uploadId, viewId, query);
    this.logger.log(`Exporting ${viewId} for upload ${uploadId} (${view.result.rows.length} rows)`);
    return this.csvExport.toCsv(view);
  }
}
