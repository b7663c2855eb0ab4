/**
 * LLM Provider interface - abstraction over chat-completion backends
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export interface JSONCompletionResult {
  /** Parsed response body; callers validate its shape */
  data: unknown;
  tokensUsed: TokenUsage;
}

export interface ILLMProvider {
  readonly name: string;
  readonly model: string;

  /**
   * Completion in JSON mode. Rejects when the response is not valid JSON.
   */
  completeJSON(messages: Message[], options?: CompletionOptions): Promise<JSONCompletionResult>;
}

export interface LLMProviderConfig {
  apiKey: string;
  model?: string;
  /** OpenAI-compatible endpoint; the SDK default when omitted */
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
}
