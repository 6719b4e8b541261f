import { describe, it, expect, afterEach } from 'vitest';
import { getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config.js';
import type { Config } from '../../src/types.js';

function createValidConfig(overrides: Partial<Config> = {}): Config {
  return {
    promptChapterThreshold: 3,
    noneFoundSentinel: 'None found',
    narratorAliases: ['narrator', 'protagonist', 'main character'],
    binderTtlS: 3600,
    binderStoreSize: 50,
    logLevel: 'info',
    ...overrides,
  };
}

const ENV_KEYS = [
  'PROMPT_CHAPTER_THRESHOLD',
  'NONE_FOUND_SENTINEL',
  'NARRATOR_ALIASES',
  'BINDER_TTL_S',
  'BINDER_STORE_SIZE',
  'LOG_LEVEL',
];

describe('loadConfig', () => {
  afterEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    resetConfig();
  });

  it('uses defaults when nothing is set', () => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    expect(loadConfig()).toEqual(createValidConfig());
  });

  it('reads values from the environment', () => {
    process.env['PROMPT_CHAPTER_THRESHOLD'] = '5';
    process.env['NARRATOR_ALIASES'] = 'narrator, hero ,';
    process.env['LOG_LEVEL'] = 'DEBUG';
    process.env['BINDER_TTL_S'] = 'not-a-number';

    const config = loadConfig();

    expect(config.promptChapterThreshold).toBe(5);
    expect(config.narratorAliases).toEqual(['narrator', 'hero']);
    expect(config.logLevel).toBe('debug');
    expect(config.binderTtlS).toBe(3600);
  });

  it('falls back to info for an unknown log level', () => {
    process.env['LOG_LEVEL'] = 'verbose';
    expect(loadConfig().logLevel).toBe('info');
  });

  it('caches the config until reset', () => {
    process.env['BINDER_STORE_SIZE'] = '7';
    const first = getConfig();
    process.env['BINDER_STORE_SIZE'] = '9';

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().binderStoreSize).toBe(9);
  });
});

describe('validateConfig', () => {
  it('returns no errors for valid config', () => {
    expect(validateConfig(createValidConfig())).toEqual([]);
  });

  it('validates promptChapterThreshold bounds', () => {
    expect(validateConfig(createValidConfig({ promptChapterThreshold: -1 }))).toEqual([
      'PROMPT_CHAPTER_THRESHOLD must be between 0 and 1000',
    ]);
    expect(validateConfig(createValidConfig({ promptChapterThreshold: 1001 }))).toEqual([
      'PROMPT_CHAPTER_THRESHOLD must be between 0 and 1000',
    ]);
  });

  it('rejects an empty sentinel', () => {
    expect(validateConfig(createValidConfig({ noneFoundSentinel: '  ' }))).toEqual([
      'NONE_FOUND_SENTINEL must not be empty',
    ]);
  });

  it('requires at least one narrator alias', () => {
    expect(validateConfig(createValidConfig({ narratorAliases: [] }))).toEqual([
      'NARRATOR_ALIASES must list at least one alias',
    ]);
  });

  it('validates store settings', () => {
    expect(validateConfig(createValidConfig({ binderTtlS: -5, binderStoreSize: 0 }))).toEqual([
      'BINDER_TTL_S must be at least 0',
      'BINDER_STORE_SIZE must be between 1 and 10000',
    ]);
  });
});
