import { ChatAnthropic } from '@langchain/anthropic';
import { Config } from './index';

export function createChatModel(config: Config): ChatAnthropic {
  return new ChatAnthropic({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
    temperature: config.anthropic.temperature,
    maxTokens: config.anthropic.maxTokens,
    maxRetries: 1,
  });
}
