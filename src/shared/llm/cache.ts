/**
 * LLM Cache
 *
 * Response caching for deterministic LLM calls (structured extraction at
 * temperature 0). Free-form rewrites bypass it so repeated attempts can
 * produce different candidates.
 */

import { createHash } from 'crypto';
import { LLMResponse } from './types';

interface CacheEntry {
  response: LLMResponse;
  timestamp: number;
}

export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
  maxEntries: number;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlSeconds: 3600,
  maxEntries: 500
};

/**
 * Parameters that identify a completion
 */
export interface CacheKeyParts {
  model: string;
  temperature: number;
  systemPrompt: string;
  userPrompt: string;
}

/**
 * LLM response cache with TTL expiry and FIFO eviction
 */
export class LLMCache {
  private cache: Map<string, CacheEntry> = new Map();
  private config: CacheConfig;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  static keyFor(parts: CacheKeyParts): string {
    const digest = createHash('sha256')
      .update(parts.model)
      .update('\u0000')
      .update(String(parts.temperature))
      .update('\u0000')
      .update(parts.systemPrompt)
      .update('\u0000')
      .update(parts.userPrompt)
      .digest('hex');
    return `${parts.model}-${digest}`;
  }

  get(parts: CacheKeyParts): LLMResponse | null {
    if (!this.config.enabled) {
      return null;
    }

    const key = LLMCache.keyFor(parts);
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    const ageSeconds = (Date.now() - entry.timestamp) / 1000;
    if (ageSeconds > this.config.ttlSeconds) {
      this.cache.delete(key);
      return null;
    }

    return entry.response;
  }

  set(parts: CacheKeyParts, response: LLMResponse): void {
    if (!this.config.enabled) {
      return;
    }

    if (this.cache.size >= this.config.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(LLMCache.keyFor(parts), {
      response,
      timestamp: Date.now()
    });
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): { size: number; maxEntries: number; enabled: boolean } {
    return {
      size: this.cache.size,
      maxEntries: this.config.maxEntries,
      enabled: this.config.enabled
    };
  }
}
