/**
 * Prompt Builder
 *
 * Picks the names that appear in enough chapters and flattens their
 * attributes into one description line each, ready to hand to a summarizer.
 */

import type { AttributeValue, Lorebinder, NameEntry, PromptOptions, PromptTuple } from '../types.js';
import { SUMMARY_KEY } from '../types.js';

export const DEFAULT_CHAPTER_THRESHOLD = 3;

const TOKEN_SEPARATOR_PATTERN = /[,;]/;

/**
 * Number of distinct chapters in which any attribute of the entry appears.
 */
export function chapterCoverage(entry: NameEntry): number {
  const chapters = new Set<string>();
  for (const [attribute, byChapter] of Object.entries(entry)) {
    if (attribute === SUMMARY_KEY || typeof byChapter === 'string') continue;
    for (const chapter of Object.keys(byChapter)) {
      chapters.add(chapter);
    }
  }
  return chapters.size;
}

function splitTokens(value: string): string[] {
  return value.split(TOKEN_SEPARATOR_PATTERN).map(token => token.trim()).filter(token => token.length > 0);
}

function flattenNested(value: AttributeValue): string {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) return value.map(item => item.trim()).filter(item => item.length > 0).join(', ');
  return Object.entries(value).map(([key, inner]) => `${key}: ${flattenNested(inner)}`).join(', ');
}

/**
 * Trait tokens of one chapter value. Strings are split on commas and
 * semicolons; list items are kept whole; nested mappings become
 * "key: value" tokens.
 */
export function valueTokens(value: AttributeValue): string[] {
  if (typeof value === 'string') return splitTokens(value);
  if (Array.isArray(value)) {
    return value.map(item => item.trim()).filter(item => item.length > 0);
  }
  return Object.entries(value).map(([key, inner]) => `${key}: ${flattenNested(inner)}`);
}

/**
 * "Appearance: tall, scarred; Personality: gruff"
 *
 * Tokens are collected per attribute across chapters in chapter order,
 * without removing repeats.
 */
export function describeEntry(entry: NameEntry): string {
  const parts: string[] = [];
  for (const [attribute, byChapter] of Object.entries(entry)) {
    if (attribute === SUMMARY_KEY || typeof byChapter === 'string') continue;
    const tokens = Object.values(byChapter).flatMap(valueTokens);
    if (tokens.length > 0) {
      parts.push(`${attribute}: ${tokens.join(', ')}`);
    }
  }
  return parts.join('; ');
}

export class PromptBuilder {
  private readonly threshold: number;

  constructor(options: PromptOptions = {}) {
    this.threshold = options.threshold ?? DEFAULT_CHAPTER_THRESHOLD;
  }

  /**
   * Prompts for every name whose coverage exceeds the threshold. The result
   * is lazy and recomputed from the binder on every iteration.
   */
  build(binder: Lorebinder): Iterable<PromptTuple> {
    const threshold = this.threshold;
    return {
      *[Symbol.iterator](): Generator<PromptTuple> {
        for (const [category, names] of Object.entries(binder)) {
          for (const [name, entry] of Object.entries(names)) {
            if (chapterCoverage(entry) <= threshold) continue;
            yield { category, name, prompt: `${name}: ${describeEntry(entry)}` };
          }
        }
      },
    };
  }
}

export function buildPrompts(binder: Lorebinder, options: PromptOptions = {}): Iterable<PromptTuple> {
  return new PromptBuilder(options).build(binder);
}
