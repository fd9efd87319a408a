/**
 * LLM Types
 *
 * Type definitions for LLM and embedding configuration and responses.
 * Generation supports Anthropic and OpenAI; embeddings use any
 * OpenAI-compatible endpoint.
 */

export type LLMProvider = 'anthropic' | 'openai';

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number; // milliseconds
}

/**
 * Default configurations for each provider
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-3-5-sonnet-20241022',
    temperature: 0,
    maxTokens: 4096,
    timeout: 30000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o',
    temperature: 0,
    maxTokens: 4096,
    timeout: 30000
  }
};

export type MessageRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: MessageRole;
  content: string;
}

export interface LLMRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  model?: string; // Override the default model for this request
  /** Ask the provider for a JSON object where it supports that */
  responseFormat?: 'text' | 'json';
  /** Set false to bypass the response cache */
  cache?: boolean;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason?: string;
}

export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMs: number[];
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMs: [1000, 2000, 4000]
};

export interface EmbeddingConfig {
  apiKey: string;
  model: string;
  /** OpenAI-compatible endpoint; unset means api.openai.com */
  baseUrl?: string;
  timeout: number; // milliseconds
}

export const DEFAULT_EMBEDDING_CONFIG: Omit<EmbeddingConfig, 'apiKey'> = {
  model: 'text-embedding-3-small',
  timeout: 30000
};
