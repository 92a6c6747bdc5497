import { CompletionService } from './completion';
import { LIST_SQL_PROMPT, REPHRASE_PROMPT, REPHRASE_SYSTEM, SQL_GENERATION_PROMPT, SQL_SYSTEM } from './promptTemplates';
import { renderSchema } from '../db/schemaProvider';
import { SchemaGuard } from '../safety/schemaGuard';
import { QueryValidator } from '../safety/validator';
import { Classification, GeneratedQuery, Question, QueryClassification, SchemaDescriptor } from '../types';
import { GenerationError, errorMessage } from '../types/errors';
import { formatChatHistory, stripCodeFences } from '../utils/chatHistory';
import { withTimeout } from '../utils/timeout';
import { componentLogger } from '../config/logger';

const log = componentLogger('sql-generator');

export interface SQLGeneratorOptions {
  timeoutMs: number;
  rephraseQuestions: boolean;
  listRowLimit: number;
}

/**
 * Clean model output down to the statement itself: no fences, no "SQL:"
 * label, no trailing semicolon.
 */
export function cleanGeneratedSql(raw: string): string {
  const withoutFences = stripCodeFences(raw).replace(/^\s*(?:sql\s*query|sql)\s*:\s*/i, '');
  return QueryValidator.sanitizeQuery(withoutFences);
}

export class SQLGenerator {
  private readonly completion: CompletionService;
  private readonly options: SQLGeneratorOptions;
  // Guards are built per schema; the schema is fixed for the process lifetime
  private readonly guards = new WeakMap<SchemaDescriptor, SchemaGuard>();

  constructor(completion: CompletionService, options: SQLGeneratorOptions) {
    this.completion = completion;
    this.options = options;
  }

  async generate(
    question: Question,
    classification: Classification,
    schema: SchemaDescriptor
  ): Promise<GeneratedQuery> {
    if (classification === Classification.GENERAL) {
      throw new TypeError('SQL generation called for a GENERAL question');
    }
    const target: QueryClassification = classification;

    const schemaText = renderSchema(schema);
    const chatHistory = formatChatHistory(question.chatHistory);

    const questionText = target === Classification.RELEVANT && this.options.rephraseQuestions
      ? await this.rephrase(question.text, schemaText, chatHistory)
      : question.text;

    const prompt = target === Classification.LIST_REQUEST
      ? await LIST_SQL_PROMPT.format({
        schema: schemaText,
        chatHistory,
        question: questionText,
        rowLimit: String(this.options.listRowLimit)
      })
      : await SQL_GENERATION_PROMPT.format({ schema: schemaText, chatHistory, question: questionText });

    const raw = await this.call(prompt, SQL_SYSTEM, 'SQL generation');
    const sql = cleanGeneratedSql(raw);

    if (!sql) {
      throw new GenerationError('Model returned no SQL');
    }

    const check = this.guardFor(schema).check(sql);
    if (!check.isValid) {
      log.warn('Generated SQL rejected', { errors: check.errors });
      throw new GenerationError(`Generated SQL failed schema checks: ${check.errors.join('; ')}`);
    }

    log.debug('Generated SQL', { classification: target, sql });
    return { sql, classification: target };
  }

  /**
   * Rewrite the question so filters are explicit. Falls back to the original
   * wording when the rewrite fails or comes back empty.
   */
  private async rephrase(text: string, schemaText: string, chatHistory: string): Promise<string> {
    try {
      const prompt = await REPHRASE_PROMPT.format({ schema: schemaText, chatHistory, question: text });
      const rephrased = (await this.call(prompt, REPHRASE_SYSTEM, 'Rephrasing')).trim();
      if (rephrased) {
        log.debug('Question rephrased', { original: text, rephrased });
        return rephrased;
      }
    } catch (error) {
      log.warn('Rephrasing failed, using original question', { error: errorMessage(error) });
    }
    return text;
  }

  private async call(prompt: string, system: string, label: string): Promise<string> {
    try {
      return await withTimeout(
        (signal) => this.completion.complete(prompt, { system, stage: 'generation', signal }),
        this.options.timeoutMs,
        () => new GenerationError(`${label} timed out after ${this.options.timeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError(`${label} call failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private guardFor(schema: SchemaDescriptor): SchemaGuard {
    let guard = this.guards.get(schema);
    if (!guard) {
      guard = new SchemaGuard(schema);
      this.guards.set(schema, guard);
    }
    return guard;
  }
}
