import { PipelineStage } from './index';

/**
 * Base class for every stage-local failure. The orchestrator catches these and
 * turns them into a degraded response; they never reach the caller.
 */
export class PipelineError extends Error {
  readonly stage: PipelineStage;
  readonly kind: string;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = new.target.name;
    this.stage = stage;
  }
}

export class ClassificationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('classification', message, options);
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('generation', message, options);
  }
}

export class ExecutionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('execution', message, options);
  }
}

/** Raised before the database is touched when a statement is not read-only. */
export class UnsafeQueryError extends ExecutionError {
  readonly reasons: string[];

  constructor(reasons: string[]) {
    super(`Query rejected: ${reasons.join('; ')}`);
    this.reasons = reasons;
  }
}

export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('export', message, options);
  }
}

export class FormattingError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('formatting', message, options);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
