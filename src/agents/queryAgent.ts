import { v4 as uuidv4 } from 'uuid';
import { IntentClassifier } from './intentClassifier';
import { SQLGenerator } from './sqlGenerator';
import { ResponseFormatter } from './responseFormatter';
import { QueryExecutor } from '../db/queryExecutor';
import { ArtifactExporter } from '../storage/artifactExporter';
import {
  Classification,
  ClassificationResult,
  ExportOutcome,
  PipelineResponse,
  PipelineStage,
  PipelineState,
  Question,
  ResultSet,
  SchemaDescriptor
} from '../types';
import { ClassificationError, StorageError, errorMessage, isPipelineError } from '../types/errors';
import { componentLogger } from '../config/logger';

const log = componentLogger('query-agent');

export const CLASSIFICATION_FALLBACK_REPLY =
  "I couldn't work out what you were asking. Could you rephrase your question about your financial data?";

const STAGE_MESSAGES: Record<PipelineStage, string> = {
  classification: CLASSIFICATION_FALLBACK_REPLY,
  generation: "I couldn't generate a query for that question. Try rephrasing it with the account, period or amount you're interested in.",
  execution: "I couldn't retrieve that data right now. Please try again in a moment.",
  export: "The file couldn't be created this time. Please try again in a moment.",
  formatting: 'Something went wrong while preparing the answer. Please try again.'
};

export interface QueryAgentDependencies {
  schema: SchemaDescriptor;
  classifier: IntentClassifier;
  generator: SQLGenerator;
  executor: QueryExecutor;
  exporter: ArtifactExporter;
  formatter: ResponseFormatter;
}

/**
 * Runs one question through classification, generation, execution, export and
 * formatting. `handle` always resolves: stage failures become a degraded
 * response carrying the failing stage and error kind.
 */
export class QueryAgent {
  private readonly deps: QueryAgentDependencies;

  constructor(deps: QueryAgentDependencies) {
    this.deps = deps;
  }

  async handle(question: Question): Promise<PipelineResponse> {
    const requestId = uuidv4();
    const startTime = Date.now();
    const states: PipelineState[] = [];
    let stage: PipelineStage = 'classification';
    let classification = Classification.GENERAL;

    const enter = (state: PipelineState): void => {
      states.push(state);
      log.debug('Pipeline state', { requestId, state, elapsed: Date.now() - startTime });
    };

    enter('RECEIVED');

    try {
      const classified = await this.classify(question, requestId);
      classification = classified.classification;
      enter('CLASSIFIED');

      if (classification === Classification.GENERAL) {
        stage = 'formatting';
        const response = this.deps.formatter.format(classification, undefined, undefined, {
          reply: classified.reply
        });
        enter('ANSWERED');
        enter('DONE');
        return { ...response, classification, states };
      }

      stage = 'generation';
      const query = await this.deps.generator.generate(question, classification, this.deps.schema);
      enter('GENERATED');

      stage = 'execution';
      const resultSet = await this.deps.executor.execute(query.sql);
      enter('EXECUTED');

      stage = 'export';
      const outcome = await this.exportIfNeeded(classification, resultSet, requestId);
      enter(outcome.artifact ? 'EXPORTED' : 'EXPORT_SKIPPED');

      stage = 'formatting';
      const response = this.deps.formatter.format(classification, resultSet, outcome.artifact, {
        exportFailed: outcome.failed
      });
      enter('FORMATTED');
      enter('DONE');

      log.info('Question answered', {
        requestId,
        classification,
        rowCount: resultSet.rowCount,
        exported: Boolean(outcome.artifact),
        processingTime: Date.now() - startTime
      });
      return { ...response, classification, states };
    } catch (error) {
      enter('ERROR');
      const failedStage = isPipelineError(error) ? error.stage : stage;
      const kind = isPipelineError(error) ? error.kind : 'UnexpectedError';

      if (isPipelineError(error)) {
        log.warn('Pipeline stage failed', { requestId, stage: failedStage, kind, error: error.message });
      } else {
        log.error('Unexpected pipeline failure', {
          requestId,
          stage: failedStage,
          error: errorMessage(error),
          stack: error instanceof Error ? error.stack : undefined
        });
      }

      return {
        text: STAGE_MESSAGES[failedStage],
        classification,
        states,
        error: { stage: failedStage, kind }
      };
    }
  }

  private async classify(question: Question, requestId: string): Promise<ClassificationResult> {
    try {
      return await this.deps.classifier.classify(question, this.deps.schema);
    } catch (error) {
      if (!(error instanceof ClassificationError)) {
        throw error;
      }
      log.warn('Classification failed, answering as GENERAL', { requestId, error: error.message });
      return { classification: Classification.GENERAL, reply: CLASSIFICATION_FALLBACK_REPLY };
    }
  }

  private async exportIfNeeded(
    classification: Classification,
    resultSet: ResultSet,
    requestId: string
  ): Promise<ExportOutcome> {
    if (
      classification !== Classification.LIST_REQUEST ||
      resultSet.rowCount === 0 ||
      this.deps.formatter.exceedsLimit(resultSet)
    ) {
      return {};
    }

    try {
      return { artifact: await this.deps.exporter.export(resultSet) };
    } catch (error) {
      if (!(error instanceof StorageError)) {
        throw error;
      }
      log.warn('Export failed, answering without a file', { requestId, error: error.message });
      return { failed: true };
    }
  }
}
