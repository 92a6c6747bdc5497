import { CLASSIFICATION_FALLBACK_REPLY, QueryAgent } from '../queryAgent';
import { createQueryAgent } from '../../context';
import { Classification, Question } from '../../types';
import {
  FakePool,
  MemoryBlobStore,
  ScriptedCompletion,
  TEST_BLOB_BASE,
  TEST_SCHEMA,
  testConfig,
  transactionRows
} from '../../__tests__/fakes';

const classified = (category: Classification, reply = ''): string => JSON.stringify({ category, reply });

const question = (text: string): Question => ({ text, chatHistory: [] });

const TOTAL_SQL = "SELECT SUM(amount) AS total FROM transactions WHERE account_id = 'A123'";
const MARCH_SQL =
  'SELECT id, account_id, amount, description, transaction_date FROM transactions ' +
  "WHERE transaction_date >= '2024-03-01' AND transaction_date < '2024-04-01' ORDER BY transaction_date DESC";

describe('QueryAgent', () => {
  let pool: FakePool;
  let store: MemoryBlobStore;

  const agentWith = (completion: ScriptedCompletion): QueryAgent =>
    createQueryAgent(testConfig(), { completion, pool, schema: TEST_SCHEMA, blobStore: store });

  beforeEach(() => {
    store = new MemoryBlobStore();
  });

  describe('handle', () => {
    it('should answer a balance question with the total and no URL', async () => {
      pool = new FakePool(() => [{ total: 4523.1 }]);
      const completion = new ScriptedCompletion([
        classified(Classification.RELEVANT),
        'Total amount of transactions for account A123',
        TOTAL_SQL
      ]);

      const response = await agentWith(completion).handle(question('What is the total balance for account A123?'));

      expect(response.classification).toBe(Classification.RELEVANT);
      expect(response.text).toContain('4523.10');
      expect(response.text).not.toMatch(/https?:\/\//);
      expect(response.artifact).toBeUndefined();
      expect(pool.queries).toEqual([TOTAL_SQL]);
      expect(response.states).toEqual([
        'RECEIVED', 'CLASSIFIED', 'GENERATED', 'EXECUTED', 'EXPORT_SKIPPED', 'FORMATTED', 'DONE'
      ]);
    });

    it('should export a large list and link it exactly once', async () => {
      pool = new FakePool(() => transactionRows(500));
      const completion = new ScriptedCompletion([classified(Classification.LIST_REQUEST), MARCH_SQL]);

      const response = await agentWith(completion).handle(question('List all transactions in March'));

      expect(response.classification).toBe(Classification.LIST_REQUEST);
      expect(response.artifact).toBeDefined();
      expect(response.artifact?.rowCount).toBe(500);
      expect(response.artifact?.url.startsWith(`${TEST_BLOB_BASE}/query_results_`)).toBe(true);
      expect(response.text.match(/https?:\/\/\S+/g)).toEqual([response.artifact?.url]);
      expect(response.text).toContain('Rows exported: 500');
      expect(store.files.size).toBe(1);
      expect(response.states).toEqual([
        'RECEIVED', 'CLASSIFIED', 'GENERATED', 'EXECUTED', 'EXPORTED', 'FORMATTED', 'DONE'
      ]);
    });

    it('should answer small talk without generating or running SQL', async () => {
      pool = new FakePool();
      const completion = new ScriptedCompletion([
        classified(Classification.GENERAL, "I'm doing well, thanks! How can I help with your financial records?")
      ]);

      const response = await agentWith(completion).handle(question('Hi, how are you?'));

      expect(response).toEqual({
        text: "I'm doing well, thanks! How can I help with your financial records?",
        classification: Classification.GENERAL,
        states: ['RECEIVED', 'CLASSIFIED', 'ANSWERED', 'DONE']
      });
      expect(completion.calls).toHaveLength(1);
      expect(pool.requests).toBe(0);
    });

    it('should still answer when the export fails', async () => {
      pool = new FakePool(() => transactionRows(3));
      store.failure = new Error('network down');
      const completion = new ScriptedCompletion([classified(Classification.LIST_REQUEST), MARCH_SQL]);

      const response = await agentWith(completion).handle(question('List all transactions in March'));

      expect(response.artifact).toBeUndefined();
      expect(response.error).toBeUndefined();
      expect(response.text).toContain('Found 3 rows.');
      expect(response.text).toContain("No file is available for download: the file couldn't be created this time.");
      expect(response.text).not.toContain('Download URL');
      expect(response.states).toContain('EXPORT_SKIPPED');
      expect(response.states).not.toContain('ERROR');
    });

    it('should skip export for an empty list', async () => {
      pool = new FakePool(() => []);
      const completion = new ScriptedCompletion([classified(Classification.LIST_REQUEST), MARCH_SQL]);

      const response = await agentWith(completion).handle(question('List all transactions in March'));

      expect(response.text).toBe(
        'No data found for that question.\n\nNo file is available for download: the query returned no rows.'
      );
      expect(store.files.size).toBe(0);
    });

    it('should fall back to GENERAL when classification fails', async () => {
      pool = new FakePool();
      const completion = new ScriptedCompletion(['not json at all']);

      const response = await agentWith(completion).handle(question('asdf qwerty'));

      expect(response.text).toBe(CLASSIFICATION_FALLBACK_REPLY);
      expect(response.classification).toBe(Classification.GENERAL);
      expect(response.states).toEqual(['RECEIVED', 'CLASSIFIED', 'ANSWERED', 'DONE']);
      expect(pool.requests).toBe(0);
    });

    it('should report a generation failure without exposing SQL', async () => {
      pool = new FakePool();
      const completion = new ScriptedCompletion([
        classified(Classification.RELEVANT),
        'Salaries by employee',
        'SELECT salary FROM payroll'
      ]);

      const response = await agentWith(completion).handle(question('What does everyone earn?'));

      expect(response.error).toEqual({ stage: 'generation', kind: 'GenerationError' });
      expect(response.text).toMatch(/^I couldn't generate a query for that question\./);
      expect(response.text).not.toContain('payroll');
      expect(response.states[response.states.length - 1]).toBe('ERROR');
      expect(pool.requests).toBe(0);
    });

    it('should report a database failure generically', async () => {
      pool = new FakePool(() => new Error("Login failed for user 'test_user'"));
      const completion = new ScriptedCompletion([
        classified(Classification.RELEVANT),
        'Total amount for account A123',
        TOTAL_SQL
      ]);

      const response = await agentWith(completion).handle(question('What is the total balance for account A123?'));

      expect(response.error).toEqual({ stage: 'execution', kind: 'ExecutionError' });
      expect(response.text).toBe("I couldn't retrieve that data right now. Please try again in a moment.");
      expect(response.states).toEqual(['RECEIVED', 'CLASSIFIED', 'GENERATED', 'ERROR']);
      expect(pool.released).toBe(1);
    });
  });
});
