/**
 * Tests for the shared LLM layer: cache, client configuration, response
 * parsing and the embeddings client
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import OpenAI from 'openai';
import {
  DEFAULT_LLM_CONFIG,
  EmbeddingClient,
  LLMCache,
  LLMClient,
  buildStructuredPrompt,
  extractMarkdown,
  parseJsonResponse
} from '../../shared/llm';
import type { CacheKeyParts } from '../../shared/llm';

const parts: CacheKeyParts = {
  model: 'test-model',
  temperature: 0,
  systemPrompt: 'You are a helpful assistant',
  userPrompt: 'Hello'
};

const response = { content: 'Hi there!', model: 'test-model' };

describe('LLM Cache', () => {
  let cache: LLMCache;

  beforeEach(() => {
    cache = new LLMCache({ enabled: true, ttlSeconds: 60, maxEntries: 10 });
  });

  it('should cache and retrieve responses', () => {
    expect(cache.get(parts)).toBeNull();

    cache.set(parts, response);

    expect(cache.get(parts)).toEqual(response);
  });

  it('should miss on any differing key part', () => {
    cache.set(parts, response);

    expect(cache.get({ ...parts, userPrompt: 'Goodbye' })).toBeNull();
    expect(cache.get({ ...parts, temperature: 0.7 })).toBeNull();
    expect(cache.get({ ...parts, model: 'other-model' })).toBeNull();
  });

  it('should enforce max entries limit with FIFO eviction', () => {
    const small = new LLMCache({ enabled: true, ttlSeconds: 60, maxEntries: 2 });
    small.set({ ...parts, userPrompt: 'one' }, response);
    small.set({ ...parts, userPrompt: 'two' }, response);
    small.set({ ...parts, userPrompt: 'three' }, response);

    expect(small.get({ ...parts, userPrompt: 'one' })).toBeNull();
    expect(small.get({ ...parts, userPrompt: 'three' })).toEqual(response);
    expect(small.getStats().size).toBe(2);
  });

  it('should expire entries after the TTL', () => {
    vi.useFakeTimers();
    try {
      cache.set(parts, response);
      vi.advanceTimersByTime(61_000);

      expect(cache.get(parts)).toBeNull();
    } finally {
      vi.useRealTimers();
    }
  });

  it('should do nothing when disabled', () => {
    const disabled = new LLMCache({ enabled: false });
    disabled.set(parts, response);

    expect(disabled.get(parts)).toBeNull();
    expect(disabled.getStats()).toEqual({ size: 0, maxEntries: 500, enabled: false });
  });

  it('should clear all entries', () => {
    cache.set(parts, response);
    cache.clear();

    expect(cache.getStats().size).toBe(0);
  });
});

describe('LLM Client Configuration', () => {
  it('should have default configurations for both providers', () => {
    expect(DEFAULT_LLM_CONFIG.anthropic.model).toBe('claude-3-5-sonnet-20241022');
    expect(DEFAULT_LLM_CONFIG.openai.model).toBe('gpt-4o');
  });

  it('should merge with defaults when partial config provided', () => {
    const client = new LLMClient({ provider: 'openai', apiKey: 'test-secret', temperature: 0.3 });

    expect(client.getConfig()).toEqual({
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
      temperature: 0.3,
      maxTokens: 4096,
      timeout: 30000
    });
  });

  it('should pass cache settings through', () => {
    const client = new LLMClient({ provider: 'anthropic', apiKey: 'test-secret' }, { enabled: false, maxEntries: 5 });

    expect(client.getCacheStats()).toEqual({ size: 0, maxEntries: 5, enabled: false });
  });
});

describe('parseJsonResponse', () => {
  it('should parse clean JSON', () => {
    expect(parseJsonResponse('{"key": "value"}')).toEqual({ key: 'value' });
  });

  it('should parse JSON inside markdown code blocks', () => {
    expect(parseJsonResponse('```json\n{"key": "value"}\n```')).toEqual({ key: 'value' });
  });

  it('should extract JSON from surrounding text', () => {
    expect(parseJsonResponse('Here you go: {"key": [1, 2]} Hope that helps.')).toEqual({ key: [1, 2] });
  });

  it('should repair trailing commas', () => {
    expect(parseJsonResponse('{"skills": ["python", "sql",],}')).toEqual({ skills: ['python', 'sql'] });
  });

  it('should keep unicode characters', () => {
    expect(parseJsonResponse('{"name": "José"}')).toEqual({ name: 'José' });
  });
});

describe('extractMarkdown', () => {
  it('should strip a markdown fence around the whole response', () => {
    expect(extractMarkdown('```markdown\n# Jane Doe\n\n- Python\n```')).toBe('# Jane Doe\n\n- Python');
  });

  it('should leave unfenced text alone apart from trimming', () => {
    expect(extractMarkdown('  # Jane Doe\n')).toBe('# Jane Doe');
  });

  it('should keep fences that are part of the content', () => {
    const text = '# Projects\n\n```js\nrun()\n```\n\nMore text';

    expect(extractMarkdown(text)).toBe(text);
  });
});

describe('buildStructuredPrompt', () => {
  it('should lay out task, numbered instructions, sections and output format', () => {
    const prompt = buildStructuredPrompt(
      'Do the task.',
      ['First rule', 'Second rule'],
      [{ title: 'Input', body: 'some text' }],
      'JSON'
    );

    expect(prompt).toBe(
      'Do the task.\n\nINSTRUCTIONS:\n1. First rule\n2. Second rule\n\nINPUT:\nsome text\n\nOUTPUT FORMAT:\nJSON\n'
    );
  });
});

describe('EmbeddingClient', () => {
  it('should return the first embedding from the API', async () => {
    const openai = new OpenAI({ apiKey: 'test-secret' });
    const create = vi.spyOn(openai.embeddings, 'create').mockResolvedValue({
      object: 'list',
      model: 'text-embedding-3-small',
      data: [{ object: 'embedding', index: 0, embedding: [0.1, 0.2, 0.3] }],
      usage: { prompt_tokens: 3, total_tokens: 3 }
    });
    const client = new EmbeddingClient({ apiKey: 'test-secret' }, openai);

    const vector = await client.embed('python, sql');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(create).toHaveBeenCalledWith({ model: 'text-embedding-3-small', input: 'python, sql' });
  });

  it('should fail when the API returns no vectors', async () => {
    const openai = new OpenAI({ apiKey: 'test-secret' });
    vi.spyOn(openai.embeddings, 'create').mockResolvedValue({
      object: 'list',
      model: 'text-embedding-3-small',
      data: [],
      usage: { prompt_tokens: 0, total_tokens: 0 }
    });
    const client = new EmbeddingClient({ apiKey: 'test-secret', model: 'text-embedding-3-small' }, openai);

    await expect(client.embed('anything')).rejects.toThrow(
      'Embedding response from text-embedding-3-small contained no vectors'
    );
  });
});
