/**
 * OpenAI LLM Provider implementation
 *
 * Also serves OpenAI-compatible hosts through `baseUrl`.
 */

import OpenAI from 'openai';
import type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  JSONCompletionResult,
  TokenUsage,
} from '../interfaces/llm-provider.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

export class OpenAIProvider implements ILLMProvider {
  readonly name = 'openai';
  readonly model: string;

  private client: OpenAI;

  constructor(config: LLMProviderConfig) {
    this.model = config.model ?? DEFAULT_OPENAI_MODEL;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 30000,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  async completeJSON(messages: Message[], options?: CompletionOptions): Promise<JSONCompletionResult> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      temperature: options?.temperature ?? 0.3, // Lower temp for structured output
      max_tokens: options?.maxTokens ?? 1024,
      response_format: { type: 'json_object' },
    });

    const content = response.choices.at(0)?.message.content ?? '{}';

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new Error(`Failed to parse JSON response: ${content}`);
    }

    return { data, tokensUsed: usageOf(response) };
  }
}

function usageOf(response: ChatCompletion): TokenUsage {
  return {
    prompt: response.usage?.prompt_tokens ?? 0,
    completion: response.usage?.completion_tokens ?? 0,
    total: response.usage?.total_tokens ?? 0,
  };
}
