import { Injectable, Logger } from '@nestjs/common';
import {
  CallRecord,
  DateOrder,
  FilterOptions,
  RecordStoreState,
  ResolvedSchema,
  UploadSummary,
} from '@talktime/shared-models';

/**
 * One stored upload: its records plus what is needed to query them.
 */
export interface StoredUpload extends UploadSummary {
  schema: ResolvedSchema;
  dateOrder: DateOrder | null;
  records: readonly CallRecord[];
}

/**
 * Application-scoped singleton that holds ingested call records in memory.
 *
 * Records are frozen on the way in; queries only ever read them.
 *
 * Lifecycle: Upload → store records here → dashboard/explorer/export read from here.
 */
@Injectable()
export class RecordStoreService {
  private readonly logger = new Logger(RecordStoreService.name);

  /** Primary store: uploadId → upload */
  private uploads = new Map<string, StoredUpload>();

  /** Track upload order for "most recent" queries */
  private uploadOrder: string[] = [];

  /**
   * Store a batch of records from a CSV upload.
   */
  storeUpload(upload: StoredUpload): void {
    const records = Object.freeze(upload.records.map((record) => Object.freeze(record)));
    this.uploads.set(upload.uploadId, { ...upload, records });
    this.uploadOrder.push(upload.uploadId);

    this.logger.log(
      `Stored ${records.length} records for upload ${upload.uploadId} (${upload.fileName})`
    );
  }

  getUpload(uploadId: string): StoredUpload | undefined {
    return this.uploads.get(uploadId);
  }

  /**
   * Get a summary of the current store state.
   */
  getStoreState(): RecordStoreState {
    const uploads = this.uploadOrder
      .map((id) => this.uploads.get(id))
      .filter((upload): upload is StoredUpload => upload !== undefined)
      .map(toSummary);

    return {
      hasRecords: uploads.some((u) => u.totalRows > 0),
      uploads,
      lastUpload: uploads.length > 0 ? uploads[uploads.length - 1] : null,
    };
  }

  /**
   * Picker values for an upload: sorted distinct values per categorical
   * dimension, and the local date range. Undefined for an unknown upload.
   */
  getFilterOptions(uploadId: string): FilterOptions | undefined {
    const upload = this.uploads.get(uploadId);
    if (!upload) {
      return undefined;
    }

    const { columns } = upload.schema;
    const distinct = (pick: (record: CallRecord) => string | null): string[] => {
      const values = new Set<string>();
      for (const record of upload.records) {
        const value = pick(record);
        if (value !== null) values.add(value);
      }
      return [...values].sort();
    };

    const dates = distinct((r) => r.localDate);

    return {
      uploadId,
      agents: columns.agent === null ? null : distinct((r) => r.agent),
      countries: columns.country === null ? null : distinct((r) => r.country),
      callTypes: columns.callType === null ? null : distinct((r) => r.callType),
      callStatuses: columns.callStatus === null ? null : distinct((r) => r.callStatus),
      dateBounds: dates.length > 0 ? { min: dates[0], max: dates[dates.length - 1] } : null,
      hasHourData: upload.records.some((r) => r.localHour !== null),
    };
  }

  /**
   * Clear all data.
   */
  clear(): void {
    this.uploads.clear();
    this.uploadOrder = [];
    this.logger.log('Record store cleared');
  }
}

function toSummary(upload: StoredUpload): UploadSummary {
  return {
    uploadId: upload.uploadId,
    fileName: upload.fileName,
    uploadedAt: upload.uploadedAt,
    totalRows: upload.totalRows,
    presetId: upload.presetId,
  };
}
