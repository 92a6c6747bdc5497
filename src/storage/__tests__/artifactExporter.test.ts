import { parse } from 'csv-parse/sync';
import { ArtifactExporter, CSV_CONTENT_TYPE, exportFileName, toCsv } from '../artifactExporter';
import { BlobStore } from '../blobStore';
import { ResultSet } from '../../types';
import { StorageError } from '../../types/errors';
import { MemoryBlobStore, TEST_BLOB_BASE } from '../../__tests__/fakes';

const RESULT: ResultSet = {
  columns: ['id', 'memo', 'amount'],
  rows: [
    { id: 1, memo: 'Rent, March\nsecond line', amount: 1200.5 },
    { id: 2, memo: 'Said "hi"', amount: null }
  ],
  rowCount: 2
};

describe('toCsv', () => {
  it('should write a header and quote strings', () => {
    expect(toCsv(RESULT)).toBe(
      '"id","memo","amount"\n' +
      '1,"Rent, March\nsecond line",1200.5\n' +
      '2,"Said ""hi""",""'
    );
  });

  it('should round-trip through a CSV parser', () => {
    const records: Record<string, string>[] = parse(toCsv(RESULT), { columns: true });

    expect(records).toHaveLength(RESULT.rows.length);
    RESULT.rows.forEach((row, index) => {
      for (const column of RESULT.columns) {
        expect(records[index][column]).toBe(String(row[column] ?? ''));
      }
    });
  });

  it('should write dates as ISO strings', () => {
    const result: ResultSet = {
      columns: ['paid_on'],
      rows: [{ paid_on: new Date('2024-03-05T00:00:00.000Z') }],
      rowCount: 1
    };

    expect(toCsv(result)).toBe('"paid_on"\n"2024-03-05T00:00:00.000Z"');
  });
});

describe('exportFileName', () => {
  it('should stamp the name with the UTC time', () => {
    expect(exportFileName(new Date(Date.UTC(2024, 2, 5, 9, 7, 3)))).toMatch(
      /^query_results_20240305_090703_[0-9a-f]{8}\.csv$/
    );
  });
});

describe('ArtifactExporter', () => {
  describe('export', () => {
    it('should upload the CSV and return its URL', async () => {
      const store = new MemoryBlobStore();
      const exporter = new ArtifactExporter(store, { timeoutMs: 1000 });

      const artifact = await exporter.export(RESULT);

      expect(artifact.url).toBe(`${TEST_BLOB_BASE}/${artifact.fileName}`);
      expect(artifact.rowCount).toBe(2);
      const stored = store.files.get(artifact.fileName);
      expect(stored?.contentType).toBe(CSV_CONTENT_TYPE);
      expect(stored?.body.toString('utf8')).toBe(toCsv(RESULT));
    });

    it('should refuse an empty result set', async () => {
      const exporter = new ArtifactExporter(new MemoryBlobStore(), { timeoutMs: 1000 });

      await expect(exporter.export({ columns: ['id'], rows: [], rowCount: 0 })).rejects.toBeInstanceOf(StorageError);
    });

    it('should wrap upload failures', async () => {
      const store = new MemoryBlobStore();
      store.failure = new Error('container missing');
      const exporter = new ArtifactExporter(store, { timeoutMs: 1000 });

      await expect(exporter.export(RESULT)).rejects.toThrow(new StorageError('Upload failed: container missing'));
    });

    it('should time out slow uploads', async () => {
      const stalled: BlobStore = { upload: () => new Promise<string>(() => undefined) };
      const exporter = new ArtifactExporter(stalled, { timeoutMs: 20 });

      await expect(exporter.export(RESULT)).rejects.toThrow(new StorageError('Upload timed out after 20ms'));
    });
  });
});
