/**
 * Prompt Templates for the query pipeline
 */

import { PromptTemplate } from '@langchain/core/prompts';

export const CLASSIFIER_SYSTEM = 'You are a classifier for a financial reconciliation agent. Reply with JSON only.';
export const REPHRASE_SYSTEM = 'You are an expert at rephrasing questions for SQL databases.';
export const SQL_SYSTEM = 'You are a Microsoft SQL Server expert who writes read-only queries.';

/**
 * Decide whether a question needs data, needs a list of rows, or is small talk
 */
export const CLASSIFICATION_PROMPT = new PromptTemplate({
  template: `You are a Financial Reconciliation Agent that analyzes transaction data.
Decide whether the user's message is general conversation, a data question, or a request for a list of records.

Tables you can answer from:
{tableNames}

RULES:
1. Questions that mention financial terms, accounts, amounts, dates or entities from the tables are RELEVANT.
2. Follow-ups that refer to earlier data questions in the conversation are RELEVANT.
3. Summaries, totals, counts and other aggregated answers are RELEVANT, not LIST_REQUEST.
4. Requests to "list", "show all", "display all" or "give me all" records, or for many individual records over a period, are LIST_REQUEST.
5. Greetings and chit-chat with no data context are GENERAL.
6. When unsure between RELEVANT and LIST_REQUEST, choose RELEVANT.

Previous conversation:
{chatHistory}

User message: "{question}"

Response Format (JSON only):
{{
  "category": "RELEVANT" | "LIST_REQUEST" | "GENERAL",
  "reply": "a short friendly reply if GENERAL, otherwise an empty string",
  "listReasoning": "why this is or is not a list request"
}}`,
  inputVariables: ['tableNames', 'chatHistory', 'question']
});

/**
 * Rewrite a question so the SQL step sees explicit filters and a summary goal
 */
export const REPHRASE_PROMPT = new PromptTemplate({
  template: `Rephrase the user's question for a SQL agent working on the database below.

Key principles:
1. Preserve every filter in the original question: statuses, payment methods, date ranges, amount thresholds, store numbers, account or reference ids.
2. Ask for summaries (totals, counts, averages) unless the user wants individual records.
3. Only mention tables and columns that exist in the schema.
4. Reply with the rephrased question only.

Database schema:
{schema}

Previous conversation:
{chatHistory}

Original question: {question}
Rephrased question:`,
  inputVariables: ['schema', 'chatHistory', 'question']
});

/**
 * Aggregated or single-answer query
 */
export const SQL_GENERATION_PROMPT = new PromptTemplate({
  template: `Write one Microsoft SQL Server SELECT statement that answers the question.

Guidelines:
1. Never use SELECT *; name the columns you need.
2. Use aggregation (SUM, COUNT, AVG) for totals and summaries, with explicit GROUP BY and ORDER BY columns.
3. Use JOINs only when the data spans several tables.
4. Use CAST(GETDATE() AS date) for the current date.
5. Handle NULL values explicitly.

Key constraints:
- Read-only: no INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE, MERGE, CREATE or EXEC.
- Only use the tables and columns listed in the schema below.
- Reply with the SQL statement only, no explanation.

Database schema:
{schema}

Previous conversation:
{chatHistory}

Question: {question}
SQL:`,
  inputVariables: ['schema', 'chatHistory', 'question']
});

/**
 * Row-level query whose result becomes a downloadable file
 */
export const LIST_SQL_PROMPT = new PromptTemplate({
  template: `Write one Microsoft SQL Server SELECT statement that returns the individual records the user asked for.

Guidelines:
1. Include every column needed to understand each record.
2. Do not aggregate; return one row per record.
3. Apply every filter in the request (dates, statuses, amounts, identifiers).
4. Sort by the most relevant date column descending unless another order is requested.
5. Return at most {rowLimit} rows using TOP {rowLimit}.

Key constraints:
- Read-only: no INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE, MERGE, CREATE or EXEC.
- Only use the tables and columns listed in the schema below.
- Reply with the SQL statement only, no explanation.

Database schema:
{schema}

Previous conversation:
{chatHistory}

Request: {question}
SQL:`,
  inputVariables: ['schema', 'chatHistory', 'question', 'rowLimit']
});
