/**
 * Embedding Client
 *
 * Produces embedding vectors through the OpenAI embeddings API or any server
 * that speaks it (set baseUrl for local model servers).
 */

import OpenAI from 'openai';
import { loggers } from '../logging/logger';
import { DEFAULT_EMBEDDING_CONFIG, EmbeddingConfig } from './types';

export class EmbeddingClient {
  private readonly client: OpenAI;
  private readonly config: EmbeddingConfig;

  constructor(config: Partial<EmbeddingConfig> & { apiKey: string }, client?: OpenAI) {
    this.config = { ...DEFAULT_EMBEDDING_CONFIG, ...config };
    this.client = client ?? new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout
    });
  }

  async embed(text: string): Promise<number[]> {
    const start = Date.now();
    const response = await this.client.embeddings.create({
      model: this.config.model,
      input: text
    });

    const first = response.data[0];
    if (!first) {
      throw new Error(`Embedding response from ${this.config.model} contained no vectors`);
    }

    loggers.llm.debug(
      { model: this.config.model, dimensions: first.embedding.length, elapsedMs: Date.now() - start },
      'Embedding computed'
    );
    return first.embedding;
  }

  getModel(): string {
    return this.config.model;
  }
}
