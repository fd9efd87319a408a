/**
 * Configuration Management
 *
 * Centralized configuration for the improvement engine with environment
 * variable support. Precedence: defaults < environment < explicit overrides.
 */

import { ImprovementErrorFactory } from '../errors/types';
import type { ConcurrencyPolicy, ImprovementConfig, ProgressStage } from '../types';

export const PROGRESS_STAGES: readonly ProgressStage[] = [
  'starting',
  'parsing',
  'scoring',
  'improving',
  'generating'
];

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ImprovementConfig = {
  maxAttempts: 5,
  keywordDelimiter: ', ',
  streamDelaysMs: {
    starting: 0,
    parsing: 0,
    scoring: 0,
    improving: 0,
    generating: 0
  },
  concurrencyPolicy: 'unguarded'
};

/**
 * Pacing that spreads the stream out for progress UIs
 */
export const PACED_STREAM_DELAYS_MS: Record<ProgressStage, number> = {
  starting: 1000,
  parsing: 2000,
  scoring: 3000,
  improving: 2000,
  generating: 2000
};

export interface ImprovementConfigOverrides {
  maxAttempts?: number;
  keywordDelimiter?: string;
  streamDelaysMs?: Partial<Record<ProgressStage, number>>;
  concurrencyPolicy?: ConcurrencyPolicy;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: ImprovementConfig;

  constructor(overrides?: ImprovementConfigOverrides, env: NodeJS.ProcessEnv = process.env) {
    const config = this.merge(this.merge(DEFAULT_CONFIG, this.loadFromEnv(env)), overrides ?? {});
    this.validateConfig(config);
    this.config = config;
  }

  /**
   * Read engine settings from environment variables
   */
  private loadFromEnv(env: NodeJS.ProcessEnv): ImprovementConfigOverrides {
    const overrides: ImprovementConfigOverrides = {};

    const maxAttempts = this.parseInt(env.IMPROVEMENT_MAX_ATTEMPTS);
    if (maxAttempts !== undefined) {
      overrides.maxAttempts = maxAttempts;
    }

    if (env.IMPROVEMENT_KEYWORD_DELIMITER !== undefined && env.IMPROVEMENT_KEYWORD_DELIMITER !== '') {
      overrides.keywordDelimiter = env.IMPROVEMENT_KEYWORD_DELIMITER;
    }

    // "paced" selects the UI pacing preset, a number applies to every stage
    const delay = env.IMPROVEMENT_STREAM_DELAY_MS;
    if (delay === 'paced') {
      overrides.streamDelaysMs = { ...PACED_STREAM_DELAYS_MS };
    } else {
      const uniform = this.parseInt(delay);
      if (uniform !== undefined) {
        const delays: Partial<Record<ProgressStage, number>> = {};
        for (const stage of PROGRESS_STAGES) {
          delays[stage] = uniform;
        }
        overrides.streamDelaysMs = delays;
      }
    }

    const policy = env.IMPROVEMENT_CONCURRENCY;
    if (policy !== undefined && policy !== '') {
      if (policy !== 'unguarded' && policy !== 'advisory-lock') {
        throw ImprovementErrorFactory.configurationError(
          'concurrencyPolicy',
          `Expected "unguarded" or "advisory-lock", got "${policy}"`
        );
      }
      overrides.concurrencyPolicy = policy;
    }

    return overrides;
  }

  private validateConfig(config: ImprovementConfig): void {
    const { maxAttempts, keywordDelimiter, streamDelaysMs } = config;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw ImprovementErrorFactory.configurationError('maxAttempts', 'Must be an integer of at least 1');
    }

    if (keywordDelimiter.length === 0) {
      throw ImprovementErrorFactory.configurationError('keywordDelimiter', 'Must not be empty');
    }

    for (const stage of PROGRESS_STAGES) {
      const value = streamDelaysMs[stage];
      if (!Number.isFinite(value) || value < 0) {
        throw ImprovementErrorFactory.configurationError(`streamDelaysMs.${stage}`, 'Must be non-negative');
      }
    }
  }

  getConfig(): ImprovementConfig {
    return { ...this.config, streamDelaysMs: { ...this.config.streamDelaysMs } };
  }

  /**
   * Apply updates; an invalid result leaves the current config in place
   */
  updateConfig(updates: ImprovementConfigOverrides): void {
    const next = this.merge(this.config, updates);
    this.validateConfig(next);
    this.config = next;
  }

  private parseInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }

  private merge(base: ImprovementConfig, overrides: ImprovementConfigOverrides): ImprovementConfig {
    return {
      maxAttempts: overrides.maxAttempts ?? base.maxAttempts,
      keywordDelimiter: overrides.keywordDelimiter ?? base.keywordDelimiter,
      streamDelaysMs: { ...base.streamDelaysMs, ...overrides.streamDelaysMs },
      concurrencyPolicy: overrides.concurrencyPolicy ?? base.concurrencyPolicy
    };
  }
}

/**
 * Global configuration instance
 */
let globalConfig: ConfigManager | null = null;

export function initializeConfig(overrides?: ImprovementConfigOverrides): ConfigManager {
  globalConfig = new ConfigManager(overrides);
  return globalConfig;
}

export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}

export function resetConfig(): void {
  globalConfig = null;
}
