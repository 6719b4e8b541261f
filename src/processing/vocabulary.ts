/**
 * Vocabulary tables used by name sorting and merging.
 *
 * Every table is immutable and injected into the components that use it, so
 * tests and callers can swap in their own lists.
 */

import { readFileSync } from 'node:fs';
import { DEFAULT_NARRATOR_ALIASES } from '../config.js';
import type { Config } from '../types.js';

export interface SingularRule {
  pattern: RegExp;
  replacement: string;
}

export interface Vocabulary {
  /** Placeholder terms for the first-person narrator */
  readonly narratorAliases: readonly string[];
  /** Whole words that mark an extracted line as noise */
  readonly fillerWords: ReadonlySet<string>;
  /** Leading titles, honorifics and articles ignored when comparing names */
  readonly titles: ReadonlySet<string>;
  /** Lower-cased header -> canonical category name */
  readonly categoryAliases: ReadonlyMap<string, string>;
  /** Ordered plural -> singular rewrites; first match wins */
  readonly singularRules: readonly SingularRule[];
}

export const DEFAULT_FILLER_WORDS: readonly string[] = [
  'additional',
  'note',
  'none',
  'mentioned',
  'unknown',
  'he',
  'they',
  'she',
  'we',
  'it',
  'boy',
  'girl',
  'main',
  'him',
  'her',
  'i',
  '</s>',
  'a',
];

export const DEFAULT_CATEGORY_ALIASES: ReadonlyMap<string, string> = new Map([
  ['character', 'Characters'],
  ['characters', 'Characters'],
  ['setting', 'Settings'],
  ['settings', 'Settings'],
  ['location', 'Settings'],
  ['locations', 'Settings'],
  ['place', 'Settings'],
  ['places', 'Settings'],
]);

export const ENGLISH_SINGULAR_RULES: readonly SingularRule[] = [
  { pattern: /(\w+)ves$/, replacement: '$1f' },
  { pattern: /(\w+)ies$/, replacement: '$1y' },
  { pattern: /(\w+)oes$/, replacement: '$1o' },
  { pattern: /(\w+)sses$/, replacement: '$1ss' },
  { pattern: /(\w+)ses$/, replacement: '$1se' },
  { pattern: /(\w+)hes$/, replacement: '$1h' },
  { pattern: /(\w+)xes$/, replacement: '$1x' },
  { pattern: /(\w+)zes$/, replacement: '$1ze' },
  { pattern: /(\w*)men$/, replacement: '$1man' },
  { pattern: /(\w+[^s])s$/, replacement: '$1' },
];

const TITLES_URL = new URL('../../data/titles.json', import.meta.url);

let defaultTitles: ReadonlySet<string> | null = null;

function toStringList(value: unknown, label: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`${label} must be a JSON array of strings`);
  }
  return value;
}

/**
 * Titles shipped in data/titles.json, loaded once.
 */
export function loadDefaultTitles(): ReadonlySet<string> {
  if (!defaultTitles) {
    const parsed: unknown = JSON.parse(readFileSync(TITLES_URL, 'utf8'));
    defaultTitles = new Set(toStringList(parsed, 'titles.json').map(title => title.toLowerCase()));
  }
  return defaultTitles;
}

export function createVocabulary(overrides: Partial<Vocabulary> = {}): Vocabulary {
  return Object.freeze({
    narratorAliases: overrides.narratorAliases ?? DEFAULT_NARRATOR_ALIASES,
    fillerWords: overrides.fillerWords ?? new Set(DEFAULT_FILLER_WORDS),
    titles: overrides.titles ?? loadDefaultTitles(),
    categoryAliases: overrides.categoryAliases ?? DEFAULT_CATEGORY_ALIASES,
    singularRules: overrides.singularRules ?? ENGLISH_SINGULAR_RULES,
  });
}

/**
 * Default tables with the narrator aliases configured for this process.
 */
export function vocabularyFromConfig(config: Pick<Config, 'narratorAliases'>): Vocabulary {
  return createVocabulary({ narratorAliases: config.narratorAliases });
}
