import { Config } from './config';
import { createChatModel } from './config/langchain';
import { componentLogger } from './config/logger';
import { CompletionService, LangChainCompletionService } from './agents/completion';
import { IntentClassifier } from './agents/intentClassifier';
import { QueryAgent } from './agents/queryAgent';
import { ResponseFormatter } from './agents/responseFormatter';
import { SQLGenerator } from './agents/sqlGenerator';
import { QueryPool, closeDatabaseConnection, connectDatabase } from './db/connection';
import { QueryExecutor } from './db/queryExecutor';
import { SchemaProvider } from './db/schemaProvider';
import { ArtifactExporter } from './storage/artifactExporter';
import { AzureBlobStore, BlobStore, LocalBlobStore } from './storage/blobStore';
import { SchemaDescriptor } from './types';

const log = componentLogger('context');

/**
 * Process-wide state shared by every request: the pooled connection, the
 * schema loaded at startup, and the agent wired over both. Built once on
 * startup and closed once on shutdown.
 */
export interface AppContext {
  agent: QueryAgent;
  pool: QueryPool;
  schema: SchemaDescriptor;
  /** Directory served under /exports when files are stored locally. */
  exportsDir?: string;
  close(): Promise<void>;
}

export interface PipelineCollaborators {
  completion: CompletionService;
  pool: QueryPool;
  schema: SchemaDescriptor;
  blobStore: BlobStore;
}

export function createQueryAgent(config: Config, collaborators: PipelineCollaborators): QueryAgent {
  const { timeouts, pipeline } = config;

  return new QueryAgent({
    schema: collaborators.schema,
    classifier: new IntentClassifier(collaborators.completion, {
      timeoutMs: timeouts.llmMs,
      policy: {
        keywordPromotion: pipeline.listKeywordPromotion,
        keywords: pipeline.listKeywords
      }
    }),
    generator: new SQLGenerator(collaborators.completion, {
      timeoutMs: timeouts.llmMs,
      rephraseQuestions: pipeline.rephraseQuestions,
      listRowLimit: pipeline.listRowLimit
    }),
    executor: new QueryExecutor(collaborators.pool, { timeoutMs: timeouts.queryMs }),
    exporter: new ArtifactExporter(collaborators.blobStore, { timeoutMs: timeouts.uploadMs }),
    formatter: new ResponseFormatter({
      previewRows: pipeline.summaryPreviewRows,
      maxResultRows: pipeline.maxResultRows
    })
  });
}

export function createBlobStore(config: Config): BlobStore {
  const storage = config.storage;

  if (storage.driver === 'azure') {
    if (!storage.connectionString) {
      throw new Error('BLOB_STORAGE_CONNECTION_STRING is required for the azure storage driver');
    }
    return new AzureBlobStore(storage.connectionString, storage.containerName, storage.publicBaseUrl);
  }

  const baseUrl = storage.publicBaseUrl ?? `http://localhost:${config.port}`;
  return new LocalBlobStore(storage.localDir, `${baseUrl.replace(/\/+$/, '')}/exports`);
}

export async function createAppContext(config: Config): Promise<AppContext> {
  const pool = await connectDatabase(config);

  try {
    const schema = await new SchemaProvider(pool, config.pipeline.includeTables).load();
    const blobStore = createBlobStore(config);
    const agent = createQueryAgent(config, {
      completion: new LangChainCompletionService(createChatModel(config)),
      pool,
      schema,
      blobStore
    });

    log.info('Application context ready', {
      tables: schema.size,
      storage: config.storage.driver
    });

    return {
      agent,
      pool,
      schema,
      exportsDir: blobStore instanceof LocalBlobStore ? blobStore.directory : undefined,
      close: () => closeDatabaseConnection(pool)
    };
  } catch (error) {
    await closeDatabaseConnection(pool);
    throw error;
  }
}

export async function closeAppContext(context: AppContext): Promise<void> {
  await context.close();
  log.info('Application context closed');
}
