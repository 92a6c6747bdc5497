import { Config } from '../index';
import { TEST_ENV, testConfig } from '../../__tests__/fakes';

describe('Config', () => {
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('should apply defaults', () => {
    const config = testConfig();

    expect(config.port).toBe(7071);
    expect(config.isTest()).toBe(true);
    expect(config.storage).toEqual({
      driver: 'local',
      connectionString: undefined,
      containerName: 'query-exports',
      publicBaseUrl: 'https://files.example.test',
      localDir: './exports'
    });
    expect(config.timeouts).toEqual({ llmMs: 30000, queryMs: 30000, uploadMs: 20000 });
    expect(config.pipeline).toEqual({
      includeTables: [],
      maxResultRows: 10000,
      summaryPreviewRows: 10,
      listRowLimit: 1000,
      listKeywordPromotion: true,
      listKeywords: ['list', 'all transactions', 'show all', 'display all', 'give me all', 'download', 'export', 'csv'],
      rephraseQuestions: true
    });
  });

  it('should parse numbers, booleans and lists', () => {
    const config = testConfig({
      PORT: '8080',
      DB_ENCRYPT: 'false',
      INCLUDE_TABLES: 'transactions, accounts,',
      REPHRASE_QUESTIONS: 'false'
    });

    expect(config.port).toBe(8080);
    expect(config.database.options.encrypt).toBe(false);
    expect(config.pipeline.includeTables).toEqual(['transactions', 'accounts']);
    expect(config.pipeline.rephraseQuestions).toBe(false);
  });

  it('should treat an empty public base URL as unset', () => {
    expect(testConfig({ EXPORT_PUBLIC_BASE_URL: '' }).storage.publicBaseUrl).toBeUndefined();
  });

  it('should reject non-numeric timeouts and limits', () => {
    expect(() => testConfig({ LLM_TIMEOUT_MS: 'abc' })).toThrow('Invalid environment configuration');
    expect(consoleError).toHaveBeenCalledWith(expect.stringContaining('LLM_TIMEOUT_MS'));
    expect(() => testConfig({ LIST_ROW_LIMIT: '0' })).toThrow('Invalid environment configuration');
    expect(() => testConfig({ QUERY_TIMEOUT_MS: '' })).toThrow('Invalid environment configuration');
  });

  it('should refuse getters before validation', () => {
    expect(() => new Config().port).toThrow('Configuration not validated. Call validate() first.');
  });

  it('should reject a missing API key', () => {
    const env = { ...TEST_ENV };
    delete env.ANTHROPIC_API_KEY;

    expect(() => new Config().validate(env)).toThrow('Invalid environment configuration');
    expect(consoleError).toHaveBeenCalledWith(expect.stringContaining('ANTHROPIC_API_KEY'));
  });

  it('should require a connection string for azure storage', () => {
    expect(() => testConfig({ STORAGE_DRIVER: 'azure' })).toThrow('Invalid environment configuration');
  });
});
