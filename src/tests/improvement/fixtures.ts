/**
 * Shared fakes and seed helpers for improvement engine tests
 */

import { vi } from 'vitest';
import { MemoryEntityStore } from '../../shared/storage/memoryStore';
import type { OutputSchema } from '../../shared/validation/types';
import { ImprovementErrorFactory } from '../../improvement/errors/types';
import { ProcessingStatus } from '../../improvement/types';
import type {
  EmbeddingProvider,
  EmbeddingVector,
  EntityKind,
  GenerativeRewriter,
  SchemaExtractor
} from '../../improvement/types';

export const RESUME_ID = 'resume-1';
export const JOB_ID = 'job-1';
export const RESUME_TEXT = '# Jane Doe\n\nBackend engineer. Python, SQL.';
export const JOB_TEXT = 'We need a backend engineer with Python, SQL and Docker.';

export interface SeedOptions {
  status?: ProcessingStatus;
  keywords?: string[] | null;
  /** Raw extracted_keywords column, overrides keywords */
  rawKeywords?: string | null;
  processingError?: string | null;
  /** Store the source only */
  processed?: boolean;
  parentId?: string | null;
}

export async function seed(
  store: MemoryEntityStore,
  kind: EntityKind,
  id: string,
  content: string,
  options: SeedOptions = {}
): Promise<void> {
  await store.saveSource({
    id,
    kind,
    content,
    parentId: options.parentId ?? null,
    createdAt: new Date('2024-01-01T00:00:00.000Z')
  });

  if (options.processed === false) {
    return;
  }

  const keywords = options.keywords === undefined ? ['python', 'sql'] : options.keywords;
  const extractedKeywords = options.rawKeywords !== undefined
    ? options.rawKeywords
    : keywords === null ? null : JSON.stringify({ extracted_keywords: keywords });

  await store.saveProcessed({
    id,
    kind,
    processingStatus: options.status ?? ProcessingStatus.COMPLETED,
    processingError: options.processingError ?? null,
    extractedKeywords,
    structuredData: { extracted_keywords: keywords ?? [] },
    processedAt: new Date('2024-01-01T00:05:00.000Z')
  });
}

/**
 * A store holding a ready resume and job
 */
export async function readyStore(): Promise<MemoryEntityStore> {
  const store = new MemoryEntityStore();
  await seed(store, 'resume', RESUME_ID, RESUME_TEXT, { keywords: ['python', 'sql'] });
  await seed(store, 'job', JOB_ID, JOB_TEXT, { keywords: ['python', 'sql', 'docker'], parentId: RESUME_ID });
  return store;
}

/**
 * Embeds by exact text lookup; unknown text gets the fallback vector
 */
export class LookupEmbedder implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly vectors: Record<string, EmbeddingVector>,
    private readonly fallback: EmbeddingVector = [0, 0, 1]
  ) {}

  async embed(text: string): Promise<EmbeddingVector> {
    this.calls.push(text);
    return this.vectors[text] ?? this.fallback;
  }
}

/**
 * Returns the scripted candidates in order, repeating the last one
 */
export class ScriptedRewriter implements GenerativeRewriter {
  readonly prompts: string[] = [];

  constructor(private readonly candidates: string[]) {}

  async run(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.prompts.length - 1, this.candidates.length - 1);
    return this.candidates[index];
  }
}

/**
 * Validates a fixed model answer against whatever schema is asked for
 */
export class FixedExtractor implements SchemaExtractor {
  readonly prompts: string[] = [];

  constructor(private readonly answer: unknown) {}

  async run<T>(prompt: string, schema: OutputSchema<T>): Promise<T> {
    this.prompts.push(prompt);
    const result = schema.safeParse(this.answer);
    if (!result.success) {
      throw ImprovementErrorFactory.schemaValidationFailed('test', result.error.message);
    }
    return result.data;
  }
}

export const PREVIEW_ANSWER = {
  personalInfo: { name: 'Jane Doe', title: 'Backend Engineer' },
  summary: 'Backend engineer',
  experience: [{ id: 1, title: 'Engineer', company: 'Acme', description: ['Built APIs'] }],
  education: [],
  skills: ['Python', 'SQL', 'Docker']
};

export function fakeRenderer() {
  return { render: vi.fn((markdown: string) => `<html>${markdown}</html>`) };
}
