export enum Classification {
  RELEVANT = 'RELEVANT',
  LIST_REQUEST = 'LIST_REQUEST',
  GENERAL = 'GENERAL',
}

export type QueryClassification = Classification.RELEVANT | Classification.LIST_REQUEST;

export interface ChatTurn {
  question: string;
  answer: string;
}

/**
 * A user question and the conversation it arrived in. Immutable for the
 * lifetime of a request.
 */
export interface Question {
  readonly text: string;
  readonly chatHistory: readonly ChatTurn[];
  readonly userName?: string;
}

export interface ColumnDescriptor {
  readonly name: string;
  readonly type: string;
}

/**
 * Table name to ordered column list. Loaded once at startup and shared
 * read-only between requests.
 */
export type SchemaDescriptor = ReadonlyMap<string, readonly ColumnDescriptor[]>;

export interface ClassificationResult {
  classification: Classification;
  /** Conversational reply, only meaningful for GENERAL. */
  reply: string;
  reasoning?: string;
}

export interface GeneratedQuery {
  readonly sql: string;
  readonly classification: QueryClassification;
}

export type ScalarValue = string | number | boolean | Date | null;

export type ResultRow = Record<string, ScalarValue>;

export interface ResultSet {
  columns: string[];
  rows: ResultRow[];
  rowCount: number;
}

export interface Artifact {
  url: string;
  rowCount: number;
  fileName: string;
}

export type PipelineStage = 'classification' | 'generation' | 'execution' | 'export' | 'formatting';

export type PipelineState =
  | 'RECEIVED'
  | 'CLASSIFIED'
  | 'ANSWERED'
  | 'GENERATED'
  | 'EXECUTED'
  | 'EXPORTED'
  | 'EXPORT_SKIPPED'
  | 'FORMATTED'
  | 'DONE'
  | 'ERROR';

export interface ExportOutcome {
  artifact?: Artifact;
  /** Set when an export was attempted and failed. */
  failed?: boolean;
}

export interface FormattedResponse {
  text: string;
  artifact?: Artifact;
}

export interface PipelineResponse extends FormattedResponse {
  classification: Classification;
  states: PipelineState[];
  error?: {
    stage: PipelineStage;
    kind: string;
  };
}
