import { Artifact, Classification, FormattedResponse, ResultSet, ScalarValue } from '../types';
import { FormattingError } from '../types/errors';

export const NO_DATA_MESSAGE = 'No data found for that question.';
export const NULL_DISPLAY = '—';

export interface ResponseFormatterOptions {
  /** Rows shown in the markdown preview of a multi-row result. */
  previewRows: number;
  /** Results above this size are neither summarised nor exported. */
  maxResultRows: number;
}

export interface FormatContext {
  /** Conversational text for GENERAL questions. */
  reply?: string;
  /** An export was attempted for this result and failed. */
  exportFailed?: boolean;
}

export function formatValue(value: ScalarValue | undefined): string {
  if (value === null || value === undefined) return NULL_DISPLAY;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number') {
    return Number.isInteger(value) || !Number.isFinite(value) ? String(value) : value.toFixed(2);
  }
  return String(value);
}

/** total_balance -> "Total balance", AccountID -> "Account ID" */
export function columnLabel(column: string): string {
  const spaced = column
    .replace(/_+/g, ' ')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .trim();
  if (!spaced) return 'Value';
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

function tableCell(value: ScalarValue | undefined): string {
  return formatValue(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Turns pipeline outputs into the text the user reads. No model call; the
 * same inputs always give the same text.
 */
export class ResponseFormatter {
  private readonly options: ResponseFormatterOptions;

  constructor(options: ResponseFormatterOptions) {
    this.options = options;
  }

  exceedsLimit(resultSet: ResultSet): boolean {
    return resultSet.rowCount > this.options.maxResultRows;
  }

  format(
    classification: Classification,
    resultSet: ResultSet | undefined,
    artifact: Artifact | undefined,
    context: FormatContext = {}
  ): FormattedResponse {
    if (classification === Classification.GENERAL) {
      if (resultSet && resultSet.rowCount > 0) {
        throw new FormattingError('GENERAL responses cannot carry result rows');
      }
      if (artifact) {
        throw new FormattingError('GENERAL responses cannot carry an artifact');
      }
      const reply = context.reply?.trim();
      if (!reply) {
        throw new FormattingError('GENERAL responses need a conversational reply');
      }
      return { text: reply };
    }

    if (!resultSet) {
      throw new FormattingError(`${classification} responses need a result set`);
    }
    if (artifact && classification !== Classification.LIST_REQUEST) {
      throw new FormattingError('Only LIST_REQUEST responses can carry an artifact');
    }
    if (artifact && !artifact.url.trim()) {
      throw new FormattingError('Artifact URL must not be empty');
    }

    const summary = this.summarize(resultSet);

    if (classification === Classification.RELEVANT) {
      return { text: summary };
    }

    if (artifact) {
      return {
        text: `${summary}\n\nRows exported: ${artifact.rowCount}\nDownload URL: ${artifact.url}`,
        artifact
      };
    }

    return { text: `${summary}\n\n${this.noFileNote(resultSet, context)}` };
  }

  private summarize(resultSet: ResultSet): string {
    if (this.exceedsLimit(resultSet)) {
      return `Too many records found for that question (more than ${this.options.maxResultRows}). Please refine your query.`;
    }
    if (resultSet.rowCount === 0 || resultSet.rows.length === 0) {
      return NO_DATA_MESSAGE;
    }
    if (resultSet.rows.length === 1) {
      const [row] = resultSet.rows;
      return resultSet.columns.map((column) => `${columnLabel(column)}: ${formatValue(row[column])}`).join('\n');
    }
    return this.previewTable(resultSet);
  }

  private previewTable(resultSet: ResultSet): string {
    const { columns, rows, rowCount } = resultSet;
    const shown = rows.slice(0, Math.max(1, this.options.previewRows));

    const lines = [
      `Found ${rowCount} rows.`,
      '',
      `| ${columns.map((column) => tableCell(columnLabel(column))).join(' | ')} |`,
      `| ${columns.map(() => '---').join(' | ')} |`,
      ...shown.map((row) => `| ${columns.map((column) => tableCell(row[column])).join(' | ')} |`)
    ];

    if (shown.length < rowCount) {
      lines.push('', `Showing ${shown.length} of ${rowCount} rows.`);
    }
    return lines.join('\n');
  }

  private noFileNote(resultSet: ResultSet, context: FormatContext): string {
    if (context.exportFailed) {
      return "No file is available for download: the file couldn't be created this time.";
    }
    if (resultSet.rowCount === 0) {
      return 'No file is available for download: the query returned no rows.';
    }
    if (this.exceedsLimit(resultSet)) {
      return 'No file is available for download: the result is too large to export.';
    }
    return 'No file is available for download.';
  }
}
