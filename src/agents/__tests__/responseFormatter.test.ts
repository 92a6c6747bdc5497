import { NO_DATA_MESSAGE, ResponseFormatter, columnLabel, formatValue } from '../responseFormatter';
import { Artifact, Classification, ResultSet } from '../../types';
import { FormattingError } from '../../types/errors';

const formatter = new ResponseFormatter({ previewRows: 2, maxResultRows: 5 });

const ARTIFACT: Artifact = {
  url: 'https://files.example.test/exports/query_results_20240301_120000_abcd1234.csv',
  rowCount: 3,
  fileName: 'query_results_20240301_120000_abcd1234.csv'
};

const single: ResultSet = { columns: ['total'], rows: [{ total: 4523.1 }], rowCount: 1 };

const several: ResultSet = {
  columns: ['id', 'description'],
  rows: [
    { id: 1, description: 'Rent' },
    { id: 2, description: 'Fees | misc' },
    { id: 3, description: null }
  ],
  rowCount: 3
};

const empty: ResultSet = { columns: ['id'], rows: [], rowCount: 0 };

const PREVIEW = [
  'Found 3 rows.',
  '',
  '| Id | Description |',
  '| --- | --- |',
  '| 1 | Rent |',
  '| 2 | Fees \\| misc |',
  '',
  'Showing 2 of 3 rows.'
].join('\n');

describe('formatValue', () => {
  it('should print non-integers with two decimals', () => {
    expect(formatValue(4523.1)).toBe('4523.10');
    expect(formatValue(-0.5)).toBe('-0.50');
  });

  it('should print integers as they are', () => {
    expect(formatValue(12)).toBe('12');
  });

  it('should print other scalars', () => {
    expect(formatValue(null)).toBe('—');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(new Date('2024-03-01T00:00:00.000Z'))).toBe('2024-03-01T00:00:00.000Z');
  });
});

describe('columnLabel', () => {
  it('should turn column names into labels', () => {
    expect(columnLabel('total_balance')).toBe('Total balance');
    expect(columnLabel('AccountID')).toBe('Account ID');
    expect(columnLabel('')).toBe('Value');
  });
});

describe('ResponseFormatter', () => {
  describe('format', () => {
    it('should return the conversational reply for GENERAL', () => {
      expect(formatter.format(Classification.GENERAL, undefined, undefined, { reply: ' Hello! ' })).toEqual({
        text: 'Hello!'
      });
    });

    it('should summarise a single row as labelled values', () => {
      expect(formatter.format(Classification.RELEVANT, single, undefined)).toEqual({ text: 'Total: 4523.10' });
    });

    it('should preview several rows as a table', () => {
      expect(formatter.format(Classification.RELEVANT, several, undefined).text).toBe(PREVIEW);
    });

    it('should say when nothing was found', () => {
      expect(formatter.format(Classification.RELEVANT, empty, undefined).text).toBe(NO_DATA_MESSAGE);
    });

    it('should include the download URL exactly once for a list with an artifact', () => {
      const response = formatter.format(Classification.LIST_REQUEST, several, ARTIFACT);

      expect(response.text).toBe(`${PREVIEW}\n\nRows exported: 3\nDownload URL: ${ARTIFACT.url}`);
      expect(response.text.split(ARTIFACT.url)).toHaveLength(2);
      expect(response.artifact).toEqual(ARTIFACT);
    });

    it('should note that no file is available when export was skipped', () => {
      expect(formatter.format(Classification.LIST_REQUEST, several, undefined).text).toBe(
        `${PREVIEW}\n\nNo file is available for download.`
      );
    });

    it('should keep the summary and explain a failed export', () => {
      const response = formatter.format(Classification.LIST_REQUEST, several, undefined, { exportFailed: true });

      expect(response.text).toBe(
        `${PREVIEW}\n\nNo file is available for download: the file couldn't be created this time.`
      );
      expect(response.artifact).toBeUndefined();
    });

    it('should explain an empty list', () => {
      expect(formatter.format(Classification.LIST_REQUEST, empty, undefined).text).toBe(
        `${NO_DATA_MESSAGE}\n\nNo file is available for download: the query returned no rows.`
      );
    });

    it('should ask for a narrower question when the result is too large', () => {
      const rows = Array.from({ length: 6 }, (_, index) => ({ id: index }));
      const large: ResultSet = { columns: ['id'], rows, rowCount: 6 };

      expect(formatter.exceedsLimit(large)).toBe(true);
      expect(formatter.format(Classification.LIST_REQUEST, large, undefined).text).toBe(
        'Too many records found for that question (more than 5). Please refine your query.\n\n' +
        'No file is available for download: the result is too large to export.'
      );
    });

    it('should give identical text for identical inputs', () => {
      const first = formatter.format(Classification.LIST_REQUEST, several, ARTIFACT);
      const second = formatter.format(Classification.LIST_REQUEST, several, ARTIFACT);

      expect(second.text).toBe(first.text);
    });

    it('should reject inputs that break the contract', () => {
      expect(() => formatter.format(Classification.GENERAL, single, undefined, { reply: 'Hi' })).toThrow(FormattingError);
      expect(() => formatter.format(Classification.GENERAL, undefined, ARTIFACT, { reply: 'Hi' })).toThrow(FormattingError);
      expect(() => formatter.format(Classification.GENERAL, undefined, undefined)).toThrow(FormattingError);
      expect(() => formatter.format(Classification.RELEVANT, undefined, undefined)).toThrow(FormattingError);
      expect(() => formatter.format(Classification.RELEVANT, several, ARTIFACT)).toThrow(
        'Only LIST_REQUEST responses can carry an artifact'
      );
      expect(() => formatter.format(Classification.LIST_REQUEST, several, { ...ARTIFACT, url: ' ' })).toThrow(
        'Artifact URL must not be empty'
      );
    });
  });
});
