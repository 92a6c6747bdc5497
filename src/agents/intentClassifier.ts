import { z } from 'zod';
import { CompletionService } from './completion';
import { CLASSIFICATION_PROMPT, CLASSIFIER_SYSTEM } from './promptTemplates';
import { Classification, ClassificationResult, Question, SchemaDescriptor } from '../types';
import { ClassificationError, errorMessage } from '../types/errors';
import { formatChatHistory, lastInteraction, stripCodeFences } from '../utils/chatHistory';
import { withTimeout } from '../utils/timeout';
import { componentLogger } from '../config/logger';

const log = componentLogger('intent-classifier');

export const DEFAULT_GREETING =
  "Hi! I'm your Financial Reconciliation Agent. Ask me about balances, payments or transactions and I'll look them up for you.";

const classifierReplySchema = z.object({
  category: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.nativeEnum(Classification)),
  reply: z.string().optional().default(''),
  listReasoning: z.string().optional()
});

export interface ListRequestPolicy {
  /** Promote RELEVANT to LIST_REQUEST when the question contains a keyword. */
  keywordPromotion: boolean;
  keywords: string[];
}

export interface IntentClassifierOptions {
  policy: ListRequestPolicy;
  timeoutMs: number;
}

export class IntentClassifier {
  private readonly completion: CompletionService;
  private readonly options: IntentClassifierOptions;

  constructor(completion: CompletionService, options: IntentClassifierOptions) {
    this.completion = completion;
    this.options = options;
  }

  async classify(question: Question, schema: SchemaDescriptor): Promise<ClassificationResult> {
    if (!question.text.trim()) {
      throw new ClassificationError('Question text must not be empty');
    }

    const prompt = await CLASSIFICATION_PROMPT.format({
      tableNames: Array.from(schema.keys()).join(', ') || '(none)',
      chatHistory: formatChatHistory(question.chatHistory),
      question: question.text
    });

    let raw: string;
    try {
      raw = await withTimeout(
        (signal) => this.completion.complete(prompt, { system: CLASSIFIER_SYSTEM, stage: 'classification', signal }),
        this.options.timeoutMs,
        () => new ClassificationError(`Classification timed out after ${this.options.timeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof ClassificationError) {
        throw error;
      }
      throw new ClassificationError(`Classification call failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = this.parseReply(raw);
    const classification = this.applyPolicy(parsed.category, question.text);

    log.debug('Question classified', {
      classification,
      modelCategory: parsed.category,
      listReasoning: parsed.listReasoning
    });

    return {
      classification,
      reply: classification === Classification.GENERAL ? this.generalReply(question, parsed.reply) : '',
      reasoning: parsed.listReasoning
    };
  }

  private parseReply(raw: string): z.infer<typeof classifierReplySchema> {
    const text = stripCodeFences(raw);
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new ClassificationError('Classifier reply did not contain a JSON object');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text.slice(start, end + 1));
    } catch (error) {
      throw new ClassificationError('Classifier reply was not valid JSON', { cause: error });
    }

    const result = classifierReplySchema.safeParse(payload);
    if (!result.success) {
      throw new ClassificationError(
        `Unrecognized classifier reply: ${result.error.issues.map((issue) => issue.message).join(', ')}`
      );
    }
    return result.data;
  }

  /**
   * The model's label decides; keyword promotion can only widen RELEVANT into
   * LIST_REQUEST. GENERAL is never promoted.
   */
  private applyPolicy(category: Classification, text: string): Classification {
    const { keywordPromotion, keywords } = this.options.policy;
    if (!keywordPromotion || category !== Classification.RELEVANT) {
      return category;
    }

    const matched = keywords.find((keyword) => {
      const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
      return new RegExp(`\\b${escaped}\\b`, 'i').test(text);
    });
    if (matched) {
      log.debug('Promoting question to list request', { keyword: matched });
      return Classification.LIST_REQUEST;
    }
    return category;
  }

  private generalReply(question: Question, modelReply: string): string {
    const previous = lastInteraction(question.chatHistory);
    if (previous) {
      const name = question.userName?.trim();
      const greeting = name ? `Hi, ${name}!` : 'Hi!';
      return `${greeting} I'm your Financial Reconciliation Agent. Last time you asked about ${previous.question}. How can I help you with your financial data today?`;
    }

    return modelReply.trim() || DEFAULT_GREETING;
  }
}
