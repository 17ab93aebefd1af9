import { AttemptView, SummaryView } from '@talktime/shared-models';
import { CsvExportService } from './csv-export.service';

describe('CsvExportService', () => {
  const exporter = new CsvExportService();

  it('writes summary rows with empty cells for missing values', () => {
    const view: SummaryView = {
      available: true,
      columns: ['Caller', 'Total Calls', 'Total Duration (sec)', 'Avg Duration (sec)', 'Median Duration (sec)'],
      result: {
        dimensions: ['agent'],
        sortMode: 'COUNT_THEN_SUM',
        totalRecords: 3,
        rows: [
          { values: ['Sen, Riya'], count: 2, sum: 150, mean: 75, median: 75 },
          { values: [null], count: 1, sum: 0, mean: null, median: null },
        ],
      },
    };

    expect(exporter.toCsv(view)).toBe(
      [
        'Caller,Total Calls,Total Duration (sec),Avg Duration (sec),Median Duration (sec)',
        '"Sen, Riya",2,150,75,75',
        ',1,0,,',
      ].join('\n')
    );
  });

  it('writes attempt rows', () => {
    const view: AttemptView = {
      available: true,
      columns: ['Country Name', 'Hour', 'Attempts'],
      result: {
        dimensions: ['country', 'localHour'],
        totalRecords: 3,
        rows: [
          { values: ['India', 9], attempts: 2 },
          { values: ['Nepal', 14], attempts: 1 },
        ],
      },
    };

    expect(exporter.toCsv(view)).toBe('Country Name,Hour,Attempts\nIndia,9,2\nNepal,14,1');
  });
});
