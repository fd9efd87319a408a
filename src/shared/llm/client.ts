/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI LLM providers.
 * Supports JSON output, caching, and retry logic.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import {
  LLMConfig,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG,
  RetryConfig,
  DEFAULT_RETRY_CONFIG
} from './types';
import { LLMCache, CacheConfig, DEFAULT_CACHE_CONFIG } from './cache';
import { loggers } from '../logging/logger';

const JSON_MODE_MODELS = ['gpt-4-turbo', 'gpt-4o', 'gpt-3.5-turbo-1106', 'gpt-3.5-turbo-0125'];

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private cache: LLMCache;
  private retryConfig: RetryConfig;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string; provider: LLMProvider },
    cacheConfig: Partial<CacheConfig> = {},
    retryConfig: Partial<RetryConfig> = {}
  ) {
    const defaults = DEFAULT_LLM_CONFIG[config.provider];
    this.config = {
      ...defaults,
      ...config
    };

    if (this.config.provider === 'anthropic') {
      this.anthropicClient = new Anthropic({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: this.config.apiKey,
        timeout: this.config.timeout
      });
    }

    this.cache = new LLMCache({ ...DEFAULT_CACHE_CONFIG, ...cacheConfig });
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const temperature = request.temperature ?? this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    const model = request.model ?? this.config.model;
    const systemPrompt = request.systemPrompt || '';
    const useCache = request.cache !== false;
    const log = loggers.llm;

    const userMessage = request.messages.find(m => m.role === 'user');
    if (!userMessage) {
      throw new Error('Request must include at least one user message');
    }

    const cacheKey = { model, temperature, systemPrompt, userPrompt: userMessage.content };
    if (useCache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        log.debug({ model }, 'LLM cache hit');
        return cached;
      }
    }

    const start = Date.now();
    log.debug(
      { provider: this.config.provider, model, temperature, maxTokens, messages: request.messages.length },
      'LLM request start'
    );

    const response = await this.retryWithBackoff(async () => {
      if (this.config.provider === 'anthropic') {
        return await this.callAnthropic(request, temperature, maxTokens, model);
      }
      return await this.callOpenAI(request, temperature, maxTokens, model);
    });

    log.debug(
      {
        model: response.model,
        finishReason: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    if (useCache) {
      this.cache.set(cacheKey, response);
    }

    return response;
  }

  private async callAnthropic(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    const messages: Array<{ role: 'user' | 'assistant'; content: string }> = [];
    for (const message of request.messages) {
      if (message.role !== 'system') {
        messages.push({ role: message.role, content: message.content });
      }
    }

    const response = await this.anthropicClient.messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      system: request.systemPrompt || undefined,
      messages
    });

    let text: string | undefined;
    for (const block of response.content) {
      if (block.type === 'text') {
        text = block.text;
        break;
      }
    }
    if (text === undefined) {
      throw new Error('Unexpected response type from Anthropic');
    }

    return {
      content: text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  private async callOpenAI(
    request: LLMRequest,
    temperature: number,
    maxTokens: number,
    model: string
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({
        role: 'system',
        content: request.systemPrompt
      });
    }

    for (const message of request.messages) {
      messages.push({ role: message.role, content: message.content });
    }

    const requestOptions: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages,
      temperature,
      max_tokens: maxTokens
    };

    if (request.responseFormat === 'json' && JSON_MODE_MODELS.some(name => model.includes(name))) {
      requestOptions.response_format = { type: 'json_object' };
    }

    const response = await this.openaiClient.chat.completions.create(requestOptions);

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage ? {
        inputTokens: response.usage.prompt_tokens,
        outputTokens: response.usage.completion_tokens,
        totalTokens: response.usage.total_tokens
      } : undefined,
      finishReason: choice.finish_reason || undefined
    };
  }

  /**
   * Retry logic with exponential backoff
   */
  private async retryWithBackoff<T>(fn: () => Promise<T>): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt < this.retryConfig.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (this.retryConfig.shouldRetry && !this.retryConfig.shouldRetry(lastError)) {
          throw lastError;
        }

        if (attempt === this.retryConfig.maxAttempts - 1) {
          break;
        }

        const delay = this.retryConfig.backoffMs[attempt] || this.retryConfig.delayMs;
        loggers.llm.warn({ attempt: attempt + 1, delay, message: lastError.message }, 'LLM call failed, retrying');
        await this.sleep(delay);
      }
    }

    throw lastError || new Error('Retry failed');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): { size: number; maxEntries: number; enabled: boolean } {
    return this.cache.getStats();
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

/**
 * Parse a JSON response from an LLM, tolerating code fences, surrounding
 * prose and small syntax slips.
 */
export function parseJsonResponse(text: string): unknown {
  let cleanText = text.trim();
  cleanText = cleanText.replace(/^```json\s*/i, '');
  cleanText = cleanText.replace(/^```\s*/, '');
  cleanText = cleanText.replace(/\s*```$/, '');

  try {
    return JSON.parse(cleanText.trim());
  } catch (error) {
    const firstBrace = text.indexOf('{');
    const lastBrace = text.lastIndexOf('}');
    const candidate = firstBrace !== -1 && lastBrace > firstBrace
      ? text.substring(firstBrace, lastBrace + 1)
      : cleanText;

    try {
      return JSON.parse(candidate);
    } catch {
      // fall through to repair
    }

    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      const errorMsg = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(
        `Failed to parse LLM response as JSON: ${errorMsg}\n\nResponse preview (first 500 chars):\n${text.substring(0, 500)}`
      );
    }
  }
}

/**
 * Strip a Markdown code fence wrapped around a whole response
 */
export function extractMarkdown(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n?```$/i.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}
