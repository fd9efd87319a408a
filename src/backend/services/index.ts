/**
 * Services index - builds the engine services the routes depend on.
 * Routes receive an AppServices object, so tests can hand them fakes or
 * in-memory stores instead of the SQLite and LLM-backed wiring below.
 */

import { EmbeddingClient, LLMClient } from '../../shared/llm';
import { DatabaseEntityStore } from '../../shared/storage';
import {
  ConfigManager,
  LLMRewriter,
  LLMSchemaExtractor,
  MarkedRenderer,
  ReadinessValidator,
  ScoreImprovementService,
  StructuredExtractionService,
} from '../../improvement';
import type { EntityStore } from '../../improvement';
import type { Config } from '../config';

export interface AppServices {
  improvement: ScoreImprovementService;
  extraction: StructuredExtractionService;
  readiness: ReadinessValidator;
}

export interface ServiceContainer extends AppServices {
  store: EntityStore;
  close(): void;
}

export function createServices(config: Config, env: Record<string, string | undefined> = process.env): ServiceContainer {
  const store = new DatabaseEntityStore({ databasePath: config.database.path });

  const llm = new LLMClient({
    provider: config.llm.provider,
    apiKey: config.llm.apiKey,
    timeout: config.llm.timeoutMs,
    ...(config.llm.model ? { model: config.llm.model } : {}),
  });
  const embedder = new EmbeddingClient({
    apiKey: config.embeddings.apiKey,
    model: config.embeddings.model,
    baseUrl: config.embeddings.baseUrl ?? undefined,
    timeout: config.embeddings.timeoutMs,
  });

  const readiness = new ReadinessValidator(store);
  const improvementConfig = new ConfigManager(undefined, env).getConfig();

  const improvement = new ScoreImprovementService({
    validator: readiness,
    embedder,
    rewriter: new LLMRewriter(llm),
    extractor: new LLMSchemaExtractor(llm, 'resume preview'),
    renderer: new MarkedRenderer(),
    config: improvementConfig,
  });

  const extraction = new StructuredExtractionService(
    store,
    new LLMSchemaExtractor(llm, 'structured document'),
    readiness
  );

  return {
    store,
    improvement,
    extraction,
    readiness,
    close: () => store.close(),
  };
}
