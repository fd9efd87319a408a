/**
 * LLM-backed capabilities
 *
 * Binds the shared LLM client to the rewrite and extraction interfaces the
 * improvement engine consumes. EmbeddingClient already satisfies
 * EmbeddingProvider.
 */

import { extractMarkdown, parseJsonResponse } from '../../shared/llm/client';
import type { LLMRequest, LLMResponse } from '../../shared/llm/types';
import { formatZodIssues } from '../../shared/validation/validator';
import type { OutputSchema } from '../../shared/validation/types';
import { ImprovementErrorFactory } from '../errors/types';
import type { GenerativeRewriter, SchemaExtractor } from '../types';

const REWRITE_SYSTEM_PROMPT =
  'You are an expert resume writer. Reply with the complete resume in Markdown and nothing else.';

const EXTRACTION_SYSTEM_PROMPT =
  'You convert documents into JSON. Reply with a single JSON object and no commentary.';

/**
 * The part of LLMClient the adapters use
 */
export interface CompletionClient {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

/** Sampling temperature for rewrites; each attempt should differ */
export const REWRITE_TEMPERATURE = 0.7;

export class LLMRewriter implements GenerativeRewriter {
  constructor(private readonly client: CompletionClient) {}

  async run(prompt: string): Promise<string> {
    const response = await this.client.complete({
      systemPrompt: REWRITE_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
      temperature: REWRITE_TEMPERATURE,
      cache: false
    });
    return extractMarkdown(response.content);
  }
}

export class LLMSchemaExtractor implements SchemaExtractor {
  constructor(private readonly client: CompletionClient, private readonly schemaName = 'output') {}

  async run<T>(prompt: string, schema: OutputSchema<T>): Promise<T> {
    const response = await this.client.complete({
      systemPrompt: EXTRACTION_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0,
      responseFormat: 'json'
    });

    let parsed: unknown;
    try {
      parsed = parseJsonResponse(response.content);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw ImprovementErrorFactory.schemaValidationFailed(this.schemaName, details);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const details = formatZodIssues(result.error)
        .map(issue => `${issue.field}: ${issue.message}`)
        .join('; ');
      throw ImprovementErrorFactory.schemaValidationFailed(this.schemaName, details);
    }
    return result.data;
  }
}
