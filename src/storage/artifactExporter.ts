import { Parser } from 'json2csv';
import { v4 as uuidv4 } from 'uuid';
import { BlobStore } from './blobStore';
import { Artifact, ResultRow, ResultSet, ScalarValue } from '../types';
import { StorageError, errorMessage } from '../types/errors';
import { withTimeout } from '../utils/timeout';
import { componentLogger } from '../config/logger';

const log = componentLogger('artifact-exporter');

export const CSV_CONTENT_TYPE = 'text/csv';

export interface ArtifactExporterOptions {
  timeoutMs: number;
}

function csvCell(value: ScalarValue | undefined): string | number | boolean {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return value;
}

/**
 * Header row of column names, then one line per record. String fields are
 * always quoted with embedded quotes doubled; nulls become empty strings.
 */
export function toCsv(resultSet: ResultSet): string {
  const parser = new Parser<ResultRow>({
    fields: resultSet.columns.map((column) => ({
      label: column,
      value: (row: ResultRow) => csvCell(row[column])
    })),
    eol: '\n'
  });
  return parser.parse(resultSet.rows);
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

export function exportFileName(now: Date = new Date()): string {
  return `query_results_${timestamp(now)}_${uuidv4().slice(0, 8)}.csv`;
}

export class ArtifactExporter {
  private readonly store: BlobStore;
  private readonly options: ArtifactExporterOptions;

  constructor(store: BlobStore, options: ArtifactExporterOptions) {
    this.store = store;
    this.options = options;
  }

  async export(resultSet: ResultSet): Promise<Artifact> {
    if (resultSet.rows.length === 0) {
      throw new StorageError('Nothing to export: result set is empty');
    }

    const fileName = exportFileName();
    let body: Buffer;
    try {
      body = Buffer.from(toCsv(resultSet), 'utf8');
    } catch (error) {
      throw new StorageError(`CSV serialization failed: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const url = await withTimeout(
        (signal) => this.store.upload(fileName, body, CSV_CONTENT_TYPE, signal),
        this.options.timeoutMs,
        () => new StorageError(`Upload timed out after ${this.options.timeoutMs}ms`)
      );

      log.info('Export uploaded', { fileName, rowCount: resultSet.rowCount, bytes: body.length });
      return { url, rowCount: resultSet.rowCount, fileName };
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`Upload failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
