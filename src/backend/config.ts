/**
 * Environment Configuration
 *
 * Loads and validates environment variables, providing a typed configuration object.
 * Fails fast on missing required variables to prevent runtime errors.
 *
 * Usage:
 *   import { getConfig } from './config';
 *   const config = getConfig();
 *   console.log(config.server.port);
 */

import 'dotenv/config';
import type { LLMProvider } from '../shared/llm/types';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

type Env = Record<string, string | undefined>;

export interface ServerConfig {
  port: number;
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  corsOrigins: string[];
}

export interface DatabaseConfig {
  /** SQLite file path; ':memory:' for an ephemeral store */
  path: string;
}

export interface LLMConfig {
  provider: LLMProvider;
  /** Key for the selected provider */
  apiKey: string;
  /** Empty means the provider default */
  model: string;
  timeoutMs: number;
}

export interface EmbeddingsConfig {
  apiKey: string;
  model: string;
  baseUrl: string | null;
  timeoutMs: number;
}

export interface Config {
  server: ServerConfig;
  database: DatabaseConfig;
  llm: LLMConfig;
  embeddings: EmbeddingsConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get a numeric environment variable
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a number.`
    );
  }
  return parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string[] {
  if (!value) return [];
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

function parseLLMProvider(value: string): LLMProvider {
  if (value === 'openai') return 'openai';
  return 'anthropic'; // default
}

function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') return value;
  return 'development'; // default
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));

  const anthropicApiKey = env.ANTHROPIC_API_KEY || '';
  const openaiApiKey = env.OPENAI_API_KEY || '';

  // Fall back to OpenAI when only its key is present
  let provider = parseLLMProvider(getEnvWithDefault(env, 'LLM_PROVIDER', 'anthropic'));
  if (provider === 'anthropic' && !anthropicApiKey && openaiApiKey) {
    provider = 'openai';
  }

  const embeddingBaseUrl = env.EMBEDDING_BASE_URL || null;

  return {
    server: {
      port: getEnvNumber(env, 'PORT', 3001),
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      corsOrigins: parseCorsOrigins(
        getEnvWithDefault(env, 'CORS_ORIGINS', 'http://localhost:5173,http://localhost:3000')
      ),
    },

    database: {
      path: getEnvWithDefault(env, 'DATABASE_PATH', './data/improver.db'),
    },

    llm: {
      provider,
      apiKey: provider === 'anthropic' ? anthropicApiKey : openaiApiKey,
      model: env.LLM_MODEL || '',
      timeoutMs: getEnvNumber(env, 'LLM_TIMEOUT_MS', 30000),
    },

    embeddings: {
      // Local OpenAI-compatible servers ignore the key but the SDK wants one
      apiKey: env.EMBEDDING_API_KEY || openaiApiKey || (embeddingBaseUrl ? 'unused' : ''),
      model: getEnvWithDefault(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
      baseUrl: embeddingBaseUrl,
      timeoutMs: getEnvNumber(env, 'EMBEDDING_TIMEOUT_MS', 30000),
    },
  };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Throws ConfigurationError listing every missing setting
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!config.llm.apiKey) {
    errors.push(
      config.llm.provider === 'anthropic'
        ? 'ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic'
        : 'OPENAI_API_KEY is required when LLM_PROVIDER is openai'
    );
  }

  if (!config.embeddings.apiKey) {
    errors.push('EMBEDDING_API_KEY or OPENAI_API_KEY is required unless EMBEDDING_BASE_URL is set');
  }

  if (config.server.port <= 0 || config.server.port > 65535) {
    errors.push(`PORT must be between 1 and 65535, got ${config.server.port}`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'Configuration validation failed:\n' +
      errors.map(e => `  - ${e}`).join('\n')
    );
  }
}

// =============================================================================
// Export
// =============================================================================

let cachedConfig: Config | null = null;

/**
 * Application configuration, loaded and validated on first use
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    const loaded = loadConfig();
    validateConfig(loaded);
    cachedConfig = loaded;
  }
  return cachedConfig;
}

export { ConfigurationError };
