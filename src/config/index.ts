import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const csvList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

// Rejects blank and non-numeric values instead of passing NaN along
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Environment variable schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(7071),

  // Anthropic configuration
  ANTHROPIC_API_KEY: z.string().min(1, 'ANTHROPIC_API_KEY is required'),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-20241022'),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  ANTHROPIC_MAX_TOKENS: positiveInt(2048),

  // Database configuration
  DB_SERVER: z.string().min(1, 'DB_SERVER is required'),
  DB_DATABASE: z.string().min(1, 'DB_DATABASE is required'),
  DB_USERNAME: z.string().min(1, 'DB_USERNAME is required'),
  DB_PASSWORD: z.string().min(1, 'DB_PASSWORD is required'),
  DB_PORT: positiveInt(1433),
  DB_ENCRYPT: z.string().transform(val => val === 'true').default('true'),
  DB_TRUST_SERVER_CERTIFICATE: z.string().transform(val => val === 'true').default('false'),
  DB_POOL_MIN: z.coerce.number().int().nonnegative().default(0),
  DB_POOL_MAX: positiveInt(10),
  DB_POOL_IDLE_TIMEOUT_MS: positiveInt(30000),

  // Export storage
  STORAGE_DRIVER: z.enum(['azure', 'local']).default('local'),
  BLOB_STORAGE_CONNECTION_STRING: z.string().optional(),
  BLOB_STORAGE_CONTAINER_NAME: z.string().default('query-exports'),
  EXPORT_PUBLIC_BASE_URL: z
    .union([z.string().url(), z.literal('')])
    .optional()
    .transform(val => val || undefined),
  EXPORT_LOCAL_DIR: z.string().default('./exports'),

  // Timeouts for every network call
  LLM_TIMEOUT_MS: positiveInt(30000),
  QUERY_TIMEOUT_MS: positiveInt(30000), // 30 seconds
  UPLOAD_TIMEOUT_MS: positiveInt(20000),

  // Pipeline policy
  INCLUDE_TABLES: z.string().transform(csvList).default(''),
  MAX_RESULT_ROWS: positiveInt(10000),
  SUMMARY_PREVIEW_ROWS: positiveInt(10),
  LIST_ROW_LIMIT: positiveInt(1000),
  LIST_KEYWORD_PROMOTION: z.string().transform(val => val === 'true').default('true'),
  LIST_KEYWORDS: z
    .string()
    .transform(csvList)
    .default('list,all transactions,show all,display all,give me all,download,export,csv'),
  REPHRASE_QUESTIONS: z.string().transform(val => val === 'true').default('true'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_FORMAT: z.enum(['json', 'simple']).default('simple'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface PipelinePolicy {
  includeTables: string[];
  maxResultRows: number;
  summaryPreviewRows: number;
  listRowLimit: number;
  listKeywordPromotion: boolean;
  listKeywords: string[];
  rephraseQuestions: boolean;
}

export interface StorageSettings {
  driver: 'azure' | 'local';
  connectionString?: string;
  containerName: string;
  publicBaseUrl?: string;
  localDir: string;
}

export interface TimeoutSettings {
  llmMs: number;
  queryMs: number;
  uploadMs: number;
}

export class Config {
  private _config: EnvConfig | null = null;

  get nodeEnv(): string {
    return this.config.NODE_ENV;
  }

  get port(): number {
    return this.config.PORT;
  }

  get anthropic() {
    return {
      apiKey: this.config.ANTHROPIC_API_KEY,
      model: this.config.ANTHROPIC_MODEL,
      temperature: this.config.ANTHROPIC_TEMPERATURE,
      maxTokens: this.config.ANTHROPIC_MAX_TOKENS,
    };
  }

  get database() {
    return {
      server: this.config.DB_SERVER,
      database: this.config.DB_DATABASE,
      user: this.config.DB_USERNAME,
      password: this.config.DB_PASSWORD,
      port: this.config.DB_PORT,
      pool: {
        min: this.config.DB_POOL_MIN,
        max: this.config.DB_POOL_MAX,
        idleTimeoutMillis: this.config.DB_POOL_IDLE_TIMEOUT_MS,
      },
      options: {
        encrypt: this.config.DB_ENCRYPT,
        trustServerCertificate: this.config.DB_TRUST_SERVER_CERTIFICATE,
        requestTimeout: this.config.QUERY_TIMEOUT_MS,
      },
    };
  }

  get storage(): StorageSettings {
    return {
      driver: this.config.STORAGE_DRIVER,
      connectionString: this.config.BLOB_STORAGE_CONNECTION_STRING,
      containerName: this.config.BLOB_STORAGE_CONTAINER_NAME,
      publicBaseUrl: this.config.EXPORT_PUBLIC_BASE_URL,
      localDir: this.config.EXPORT_LOCAL_DIR,
    };
  }

  get timeouts(): TimeoutSettings {
    return {
      llmMs: this.config.LLM_TIMEOUT_MS,
      queryMs: this.config.QUERY_TIMEOUT_MS,
      uploadMs: this.config.UPLOAD_TIMEOUT_MS,
    };
  }

  get pipeline(): PipelinePolicy {
    return {
      includeTables: this.config.INCLUDE_TABLES,
      maxResultRows: this.config.MAX_RESULT_ROWS,
      summaryPreviewRows: this.config.SUMMARY_PREVIEW_ROWS,
      listRowLimit: this.config.LIST_ROW_LIMIT,
      listKeywordPromotion: this.config.LIST_KEYWORD_PROMOTION,
      listKeywords: this.config.LIST_KEYWORDS,
      rephraseQuestions: this.config.REPHRASE_QUESTIONS,
    };
  }

  get logging() {
    return {
      level: this.config.LOG_LEVEL,
      format: this.config.LOG_FORMAT,
    };
  }

  private get config(): EnvConfig {
    if (!this._config) {
      throw new Error('Configuration not validated. Call validate() first.');
    }
    return this._config;
  }

  validate(env: NodeJS.ProcessEnv = process.env): void {
    const result = envSchema.safeParse(env);
    if (!result.success) {
      console.error('❌ Environment configuration validation failed:');
      result.error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('Invalid environment configuration');
    }

    const parsed = result.data;
    if (parsed.STORAGE_DRIVER === 'azure' && !parsed.BLOB_STORAGE_CONNECTION_STRING) {
      console.error('❌ BLOB_STORAGE_CONNECTION_STRING is required when STORAGE_DRIVER is azure');
      throw new Error('Invalid environment configuration');
    }

    this._config = parsed;
  }

  isValidated(): boolean {
    return this._config !== null;
  }

  isDevelopment(): boolean {
    return this.nodeEnv === 'development';
  }

  isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  isTest(): boolean {
    return this.nodeEnv === 'test';
  }
}

export const config = new Config();
