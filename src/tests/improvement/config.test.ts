/**
 * Tests for improvement engine configuration
 */

import {
  ConfigManager,
  DEFAULT_CONFIG,
  PACED_STREAM_DELAYS_MS,
  getConfig,
  initializeConfig,
  resetConfig
} from '../../improvement/config';
import { ImprovementErrorCode, isImprovementError } from '../../improvement/errors/types';

function configErrorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return null;
}

describe('ConfigManager', () => {
  afterEach(() => {
    resetConfig();
  });

  it('uses defaults with an empty environment', () => {
    expect(new ConfigManager(undefined, {}).getConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('reads settings from the environment', () => {
    const config = new ConfigManager(undefined, {
      IMPROVEMENT_MAX_ATTEMPTS: '2',
      IMPROVEMENT_KEYWORD_DELIMITER: ' ',
      IMPROVEMENT_STREAM_DELAY_MS: '10',
      IMPROVEMENT_CONCURRENCY: 'advisory-lock'
    }).getConfig();

    expect(config).toEqual({
      maxAttempts: 2,
      keywordDelimiter: ' ',
      streamDelaysMs: { starting: 10, parsing: 10, scoring: 10, improving: 10, generating: 10 },
      concurrencyPolicy: 'advisory-lock'
    });
  });

  it('selects the paced preset', () => {
    const config = new ConfigManager(undefined, { IMPROVEMENT_STREAM_DELAY_MS: 'paced' }).getConfig();

    expect(config.streamDelaysMs).toEqual(PACED_STREAM_DELAYS_MS);
  });

  it('lets explicit overrides win over the environment', () => {
    const config = new ConfigManager(
      { maxAttempts: 7, streamDelaysMs: { scoring: 5 } },
      { IMPROVEMENT_MAX_ATTEMPTS: '2' }
    ).getConfig();

    expect(config.maxAttempts).toBe(7);
    expect(config.streamDelaysMs).toEqual({ starting: 0, parsing: 0, scoring: 5, improving: 0, generating: 0 });
  });

  it('rejects an unknown concurrency policy', () => {
    const error = configErrorOf(() => new ConfigManager(undefined, { IMPROVEMENT_CONCURRENCY: 'mutex' }));

    expect(isImprovementError(error, ImprovementErrorCode.CONFIGURATION_ERROR)).toBe(true);
  });

  it.each([0, -1, 2.5])('rejects maxAttempts of %s', maxAttempts => {
    const error = configErrorOf(() => new ConfigManager({ maxAttempts }, {}));

    expect(isImprovementError(error, ImprovementErrorCode.CONFIGURATION_ERROR)).toBe(true);
  });

  it('rejects negative delays on update and keeps the old value', () => {
    const manager = new ConfigManager(undefined, {});

    const error = configErrorOf(() => manager.updateConfig({ streamDelaysMs: { parsing: -5 } }));

    expect(isImprovementError(error, ImprovementErrorCode.CONFIGURATION_ERROR)).toBe(true);
    expect(manager.getConfig().streamDelaysMs.parsing).toBe(0);
  });

  it('returns copies from getConfig', () => {
    const manager = new ConfigManager(undefined, {});
    const config = manager.getConfig();
    config.streamDelaysMs.starting = 99;

    expect(manager.getConfig().streamDelaysMs.starting).toBe(0);
  });

  it('keeps one global instance until reset', () => {
    const initialized = initializeConfig({ maxAttempts: 3 });

    expect(getConfig()).toBe(initialized);
    resetConfig();
    expect(getConfig()).not.toBe(initialized);
  });
});
