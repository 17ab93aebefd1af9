import {
  Controller,
  Post,
  Get,
  Delete,
  Body,
  Param,
  Logger,
  BadRequestException,
  NotFoundException,
} from '@nestjs/common';
import {
  COLUMN_ROLES,
  ColumnOverrides,
  FilterOptions,
  RecordStoreState,
  UploadResult,
} from '@talktime/shared-models';
import { getPresetById } from '../presets/analytics-presets';
import { CsvIngestionService } from './csv-ingestion.service';
import { RecordStoreService } from './record-store.service';

interface UploadBody {
  fileName?: unknown;
  csvText?: unknown;
  overrides?: unknown;
  presetId?: unknown;
}

@Controller('ingestion')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(
    private readonly csvIngestion: CsvIngestionService,
    private readonly recordStore: RecordStoreService
  ) {}

  /**
   * POST /api/ingestion/upload
   *
   * Accepts raw CSV text and a file name, plus optional column overrides and
   * a preset id. Parses, derives and stores records in memory.
   */
  @Post('upload')
  upload(@Body() body: UploadBody): UploadResult {
    if (!body.csvText || typeof body.csvText !== 'string') {
      throw new BadRequestException(
        'Request body must include "csvText" as a string containing CSV data.'
      );
    }

    const fileName = typeof body.fileName === 'string' && body.fileName ? body.fileName : 'unknown.csv';
    const presetId = this.parsePresetId(body.presetId);
    const overrides = this.parseOverrides(body.overrides);

    this.logger.log(`Upload request received: "${fileName}" (${body.csvText.length} chars)`);

    return this.csvIngestion.ingest({ fileName, csvText: body.csvText, overrides, presetId });
  }

  /**
   * GET /api/ingestion/store/state
   *
   * Returns the current in-memory store state summary.
   */
  @Get('store/state')
  getStoreState(): RecordStoreState {
    return this.recordStore.getStoreState();
  }

  /**
   * GET /api/ingestion/uploads/:uploadId/options
   *
   * Values for the filter pickers of one upload.
   */
  @Get('uploads/:uploadId/options')
  getFilterOptions(@Param('uploadId') uploadId: string): FilterOptions {
    const options = this.recordStore.getFilterOptions(uploadId);
    if (!options) {
      throw new NotFoundException(`Upload "${uploadId}" not found`);
    }
    return options;
  }

  /**
   * DELETE /api/ingestion/store
   */
  @Delete('store')
  clearStore(): { message: string } {
    const { uploads } = this.recordStore.getStoreState();
    this.recordStore.clear();
    return { message: `${uploads.length} uploads cleared.` };
  }

  // --- Private ---

  private parsePresetId(value: unknown): string | undefined {
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string' || !getPresetById(value)) {
      throw new BadRequestException(`Unknown preset "${String(value)}".`);
    }
    return value;
  }

  private parseOverrides(value: unknown): ColumnOverrides | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'object' || Array.isArray(value)) {
      throw new BadRequestException('"overrides" must be an object of role → header name.');
    }

    const overrides: ColumnOverrides = {};
    for (const [role, header] of Object.entries(value)) {
      const known = COLUMN_ROLES.find((r) => r === role);
      if (!known) {
        throw new BadRequestException(
          `Unknown column role "${role}". Expected one of: ${COLUMN_ROLES.join(', ')}.`
        );
      }
      if (typeof header !== 'string') {
        throw new BadRequestException(`Override for "${role}" must be a header name.`);
      }
      overrides[known] = header;
    }
    return overrides;
  }
}
