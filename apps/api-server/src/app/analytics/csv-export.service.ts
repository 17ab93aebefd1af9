import { Injectable } from '@nestjs/common';
import Papa from 'papaparse';
import { AttemptView, SummaryView } from '@talktime/shared-models';

type CsvCell = string | number | null;

/**
 * Renders dashboard views as CSV. Missing values become empty cells.
 */
@Injectable()
export class CsvExportService {
  toCsv(view: SummaryView | AttemptView): string {
    const data: CsvCell[][] = isSummary(view)
      ? view.result.rows.map((row) => [...row.values, row.count, row.sum, row.mean, row.median])
      : view.result.rows.map((row) => [...row.values, row.attempts]);

    return Papa.unparse(
      { fields: view.columns, data: data.map((row) => row.map(toCell)) },
      { newline: '\n' }
    );
  }
}

function isSummary(view: SummaryView | AttemptView): view is SummaryView {
  return 'sortMode' in view.result;
}

function toCell(value: CsvCell): string {
  return value === null ? '' : String(value);
}
