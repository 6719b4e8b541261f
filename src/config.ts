/**
 * Configuration management for lorebinder-mcp
 */

import type { Config, LogLevel } from './types.js';

const LOG_LEVELS: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error', 'silent']);

export const DEFAULT_NARRATOR_ALIASES = ['narrator', 'protagonist', 'main character'];

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringArray(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return 'info';
  const lower = value.trim().toLowerCase();
  return isLogLevel(lower) ? lower : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export function loadConfig(): Config {
  return {
    promptChapterThreshold: parseNumber(process.env['PROMPT_CHAPTER_THRESHOLD'], 3),
    noneFoundSentinel: process.env['NONE_FOUND_SENTINEL'] ?? 'None found',
    narratorAliases: parseStringArray(process.env['NARRATOR_ALIASES'], DEFAULT_NARRATOR_ALIASES),
    binderTtlS: parseNumber(process.env['BINDER_TTL_S'], 3600),
    binderStoreSize: parseNumber(process.env['BINDER_STORE_SIZE'], 50),
    logLevel: parseLogLevel(process.env['LOG_LEVEL']),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}

// Validate configuration
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (config.promptChapterThreshold < 0 || config.promptChapterThreshold > 1000) {
    errors.push('PROMPT_CHAPTER_THRESHOLD must be between 0 and 1000');
  }
  if (config.noneFoundSentinel.trim() === '') {
    errors.push('NONE_FOUND_SENTINEL must not be empty');
  }
  if (config.narratorAliases.length === 0) {
    errors.push('NARRATOR_ALIASES must list at least one alias');
  }
  if (config.binderTtlS < 0) {
    errors.push('BINDER_TTL_S must be at least 0');
  }
  if (config.binderStoreSize < 1 || config.binderStoreSize > 10000) {
    errors.push('BINDER_STORE_SIZE must be between 1 and 10000');
  }

  return errors;
}
