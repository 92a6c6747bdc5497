import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { PipelineStage } from '../types';

export interface CompletionContext {
  system: string;
  stage: PipelineStage;
  signal?: AbortSignal;
}

/**
 * Text-in, text-out view of the generative model. Callers treat the answer as
 * untrusted and validate it themselves.
 */
export interface CompletionService {
  complete(prompt: string, context: CompletionContext): Promise<string>;
}

export class LangChainCompletionService implements CompletionService {
  private readonly model: BaseChatModel;
  private readonly outputParser = new StringOutputParser();

  constructor(model: BaseChatModel) {
    this.model = model;
  }

  async complete(prompt: string, context: CompletionContext): Promise<string> {
    const messages = [
      new SystemMessage(context.system),
      new HumanMessage(prompt)
    ];

    const response = await this.model.invoke(messages, {
      signal: context.signal,
      runName: `recon-${context.stage}`
    });

    return this.outputParser.invoke(response);
  }
}
