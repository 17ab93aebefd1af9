import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Papa, { ParseError } from 'papaparse';
import {
  AnalyticsPreset,
  CallRecord,
  DateOrder,
  DerivationStats,
  ResolvedSchema,
  UploadRequest,
  UploadResult,
} from '@talktime/shared-models';
import { analyticsConfig } from '../config/analytics.config';
import { detectPreset, getPresetById } from '../presets/analytics-presets';
import { ColumnResolverService } from '../services/column-resolver.service';
import { DurationParserService } from '../services/duration-parser.service';
import {
  TemporalDerivation,
  TemporalResolverService,
} from '../services/temporal-resolver.service';
import { RecordStoreService } from './record-store.service';

type CsvRow = Record<string, string | undefined>;

const NO_DERIVATION: TemporalDerivation = {
  instant: null,
  localDate: null,
  localHour: null,
  dateFailed: false,
  timeFailed: false,
};

@Injectable()
export class CsvIngestionService {
  private readonly logger = new Logger(CsvIngestionService.name);

  constructor(
    @Inject(analyticsConfig.KEY)
    private readonly config: ConfigType<typeof analyticsConfig>,
    private readonly recordStore: RecordStoreService,
    private readonly columnResolver: ColumnResolverService,
    private readonly durationParser: DurationParserService,
    private readonly temporalResolver: TemporalResolverService
  ) {}

  /**
   * Parse raw CSV text, derive call fields and persist the records.
   *
   * Returns transparent feedback: row counts, how every role was resolved,
   * the date order chosen and how many cells failed to parse. A file that
   * cannot be read as a table is reported as FAILED and nothing is stored.
   */
  ingest(request: UploadRequest): UploadResult {
    const { fileName } = request;
    const uploadedAt = new Date().toISOString();

    this.logger.log(`Starting ingestion for "${fileName}" (${request.csvText.length} chars)`);

    // --- Parse CSV ---
    const parsed = Papa.parse<CsvRow>(request.csvText, {
      header: true,
      delimiter: ',',
      skipEmptyLines: 'greedy',
      transformHeader: (header) => header.trim(),
      preview: this.config.maxRows + 1,
    });

    const headers = parsed.meta.fields ?? [];
    const rows = parsed.data;

    const fatal = this.findFatalError(parsed.errors, headers, rows.length);
    if (fatal !== null) {
      this.logger.warn(`Upload "${fileName}" rejected: ${fatal}`);
      return failedResult(fileName, uploadedAt, headers, rows.length, `Upload failed: ${fatal}`);
    }

    this.logger.log(`Parsed headers: [${headers.join(', ')}] | Data rows: ${rows.length}`);

    // --- Resolve schema ---
    const preset = this.selectPreset(request.presetId, headers);
    const aliases = this.columnResolver.mergeAliases(preset?.extraAliases ?? {});
    const schema = this.columnResolver.resolve(headers, request.overrides, aliases);

    const dateOrder = this.chooseDateOrder(schema, rows);

    // --- Derive fields ---
    const uploadId = this.generateUploadId();
    const stats: DerivationStats = {
      invalidDurations: 0,
      rejectedDurations: 0,
      invalidDates: 0,
      invalidTimes: 0,
    };
    const records = rows.map((row, index) =>
      this.buildRecord(uploadId, index + 2, row, schema, dateOrder ?? 'DAY_FIRST', stats)
    );

    // --- Persist to store ---
    this.recordStore.storeUpload({
      uploadId,
      fileName,
      uploadedAt,
      totalRows: records.length,
      presetId: preset?.id ?? null,
      schema,
      dateOrder,
      records,
    });

    const warnings = this.buildWarnings(schema, stats, parsed.errors);
    for (const warning of warnings) {
      this.logger.warn(`Upload ${uploadId}: ${warning}`);
    }
    this.logger.log(
      `Upload ${uploadId} complete: ${records.length} records, preset ${preset?.id ?? 'none'}, dates ${dateOrder ?? 'n/a'}`
    );

    return {
      uploadId,
      status: 'COMPLETED',
      fileName,
      totalRows: rows.length,
      storedRows: records.length,
      uploadedAt,
      headers,
      schema,
      dateOrder,
      presetId: preset?.id ?? null,
      stats,
      message: this.buildUploadMessage(fileName, records.length, stats, warnings.length),
      warnings,
    };
  }

  // --- Private ---

  private findFatalError(
    errors: readonly ParseError[],
    headers: readonly string[],
    rowCount: number
  ): string | null {
    if (headers.length === 0 || headers.every((h) => h === '')) {
      return 'CSV file has no header row.';
    }
    const structural = errors.find((e) => e.type === 'Quotes' || e.code === 'TooManyFields');
    if (structural) {
      const row = structural.row === undefined ? '' : ` (data row ${structural.row + 1})`;
      return `malformed CSV${row}: ${structural.message}.`;
    }
    if (rowCount === 0) {
      return 'CSV file contains no data rows. A header row and at least one data row are required.';
    }
    if (rowCount > this.config.maxRows) {
      return `CSV file exceeds the limit of ${this.config.maxRows} data rows.`;
    }
    return null;
  }

  /**
   * Requested preset first, else the one the headers look like.
   */
  private selectPreset(
    presetId: string | undefined,
    headers: readonly string[]
  ): AnalyticsPreset | null {
    if (presetId) {
      const requested = getPresetById(presetId);
      if (requested) {
        return requested;
      }
      this.logger.warn(`Unknown preset "${presetId}"; detecting from headers`);
    }
    return detectPreset(headers);
  }

  /**
   * Date order for the whole upload, from the date column or the combined
   * start-time column. Null when the file has neither.
   */
  private chooseDateOrder(schema: ResolvedSchema, rows: readonly CsvRow[]): DateOrder | null {
    const { temporalShape, columns } = schema;
    const column = temporalShape === 'COMBINED' ? columns.startTime : columns.date;
    if (temporalShape === 'NONE' || column === null) {
      return null;
    }
    return this.temporalResolver.chooseDateOrder(rows.map((row) => row[column]));
  }

  private buildRecord(
    uploadId: string,
    rowNumber: number,
    row: CsvRow,
    schema: ResolvedSchema,
    dateOrder: DateOrder,
    stats: DerivationStats
  ): CallRecord {
    const { columns } = schema;
    const cell = (column: string | null): string | null => {
      if (column === null) return null;
      const value = row[column]?.trim();
      return value ? value : null;
    };

    const rawDuration = cell(columns.duration);
    const durationSeconds = this.applyDurationPolicy(rawDuration, stats);

    const rawDate = cell(columns.date);
    const rawTime = cell(columns.time);
    const rawStartTime = cell(columns.startTime);

    let temporal: TemporalDerivation;
    switch (schema.temporalShape) {
      case 'SEPARATE':
        temporal = this.temporalResolver.deriveSeparate(rawDate, rawTime, dateOrder);
        break;
      case 'COMBINED':
        temporal = this.temporalResolver.deriveCombined(rawStartTime, dateOrder);
        break;
      case 'DATE_ONLY':
        temporal = this.temporalResolver.deriveSeparate(rawDate, null, dateOrder);
        break;
      default:
        temporal = NO_DERIVATION;
    }
    if (temporal.dateFailed) stats.invalidDates++;
    if (temporal.timeFailed) stats.invalidTimes++;

    return {
      id: `${uploadId}-R${rowNumber}`,
      rowNumber,
      agent: cell(columns.agent),
      country: cell(columns.country),
      callType: cell(columns.callType),
      callStatus: cell(columns.callStatus),
      toName: cell(columns.toName),
      rawDuration,
      rawDate,
      rawTime,
      rawStartTime,
      durationSeconds,
      localInstant: temporal.instant?.toISO() ?? null,
      localDate: temporal.localDate,
      localHour: temporal.localHour,
    };
  }

  /**
   * Parsed durations outside [0, maxDurationSeconds] become missing.
   */
  private applyDurationPolicy(raw: string | null, stats: DerivationStats): number | null {
    if (raw === null) {
      return null;
    }
    const seconds = this.durationParser.parse(raw);
    if (seconds === null) {
      stats.invalidDurations++;
      return null;
    }
    if (seconds < 0 || seconds > this.config.maxDurationSeconds) {
      stats.rejectedDurations++;
      return null;
    }
    return seconds;
  }

  private buildWarnings(
    schema: ResolvedSchema,
    stats: DerivationStats,
    errors: readonly ParseError[]
  ): string[] {
    const warnings: string[] = [];

    for (const role of schema.unresolved) {
      // Temporal roles are alternatives; reported below by shape
      if (role === 'date' || role === 'time' || role === 'startTime') continue;
      warnings.push(`No column found for "${role}"; views that need it are unavailable.`);
    }
    if (schema.temporalShape === 'NONE') {
      warnings.push('No date or start-time column found; date filters and hour views are unavailable.');
    } else if (schema.temporalShape === 'DATE_ONLY') {
      warnings.push('No time column found; hour views are unavailable.');
    }

    for (const [role, header] of Object.entries(schema.ignoredOverrides)) {
      warnings.push(`Override for "${role}" ignored: no header named "${header}".`);
    }

    if (stats.invalidDurations > 0) {
      warnings.push(`${stats.invalidDurations} duration values could not be parsed.`);
    }
    if (stats.rejectedDurations > 0) {
      warnings.push(
        `${stats.rejectedDurations} durations were negative or above ${this.config.maxDurationSeconds}s and treated as missing.`
      );
    }
    if (stats.invalidDates > 0) {
      warnings.push(`${stats.invalidDates} date values could not be parsed.`);
    }
    if (stats.invalidTimes > 0) {
      warnings.push(`${stats.invalidTimes} time values could not be parsed or do not exist in ${this.temporalResolver.zoneName}.`);
    }

    const shortRows = errors.filter((e) => e.code === 'TooFewFields').length;
    if (shortRows > 0) {
      warnings.push(`${shortRows} rows had fewer fields than the header; missing cells are empty.`);
    }
    return warnings;
  }

  private buildUploadMessage(
    fileName: string,
    stored: number,
    stats: DerivationStats,
    warningCount: number
  ): string {
    const parts: string[] = [`Upload complete: "${fileName}" processed ${stored} rows.`];

    const failures = stats.invalidDurations + stats.invalidDates + stats.invalidTimes;
    if (failures > 0) {
      parts.push(`${failures} cells could not be parsed and are treated as missing.`);
    }
    if (warningCount > 0) {
      parts.push(`${warningCount} warnings.`);
    }
    return parts.join(' ');
  }

  private generateUploadId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `UPL-${timestamp}-${random}`;
  }
}

function failedResult(
  fileName: string,
  uploadedAt: string,
  headers: string[],
  totalRows: number,
  message: string
): UploadResult {
  return {
    uploadId: 'NONE',
    status: 'FAILED',
    fileName,
    totalRows,
    storedRows: 0,
    uploadedAt,
    headers,
    schema: null,
    dateOrder: null,
    presetId: null,
    stats: { invalidDurations: 0, rejectedDurations: 0, invalidDates: 0, invalidTimes: 0 },
    message,
    warnings: [],
  };
}
