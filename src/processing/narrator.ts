/**
 * Narrator alias substitution
 *
 * Rewrites "the narrator", "protagonist", "main character" and any other
 * configured alias to the book's narrator name, in keys and values alike.
 * Keys that collide after renaming are merged.
 */

import type { AttributeValue, Lorebinder, NameEntry } from '../types.js';
import { getOwn, isStorableKey } from '../utils/records.js';
import { collapseWhitespace, compareKeys, escapeRegExp } from '../utils/text.js';
import { mergeAttributeValues, mergeCategoryNames, mergeEntryValues, mergeNameEntries, sortRecord } from './values.js';

export class NarratorReplacer {
  private readonly pattern: RegExp | null;
  private readonly narrator: string;

  constructor(narrator: string, aliases: readonly string[]) {
    this.narrator = narrator.trim();
    this.pattern = this.narrator && isStorableKey(this.narrator) ? buildReplacementPattern(aliases) : null;
  }

  get enabled(): boolean {
    return this.pattern !== null;
  }

  replaceText(value: string): string {
    if (!this.pattern) return value;
    return value.replace(this.pattern, this.narrator);
  }

  replaceValue(value: AttributeValue, path: string[] = []): AttributeValue {
    if (typeof value === 'string') {
      return this.replaceText(value);
    }
    if (Array.isArray(value)) {
      const result: string[] = [];
      for (const item of value) {
        const replaced = this.replaceText(item);
        if (!result.includes(replaced)) result.push(replaced);
      }
      return result;
    }
    return this.renameKeys(value, (inner, key) => this.replaceValue(inner, [...path, key]), (a, b, key) =>
      mergeAttributeValues(a, b, [...path, key])
    );
  }

  replaceInBinder(binder: Lorebinder): Lorebinder {
    if (!this.pattern) return binder;

    return this.renameKeys(binder, (names, category) =>
      this.renameKeys(
        names,
        (entry, name) => this.replaceInEntry(entry, [category, name]),
        (a, b, name) => mergeNameEntries(a, b, [category, name])
      ),
      (a, b, category) => mergeCategoryNames(a, b, [category])
    );
  }

  private replaceInEntry(entry: NameEntry, path: string[]): NameEntry {
    return this.renameKeys(
      entry,
      (value, attribute) => {
        if (typeof value === 'string') return this.replaceText(value);
        // chapter ids are never renamed
        return sortRecord(value, chapterValue => this.replaceValue(chapterValue, [...path, attribute]));
      },
      (a, b, attribute) => mergeEntryValues(a, b, [...path, attribute])
    );
  }

  /**
   * Rebuild a record with renamed keys, merging values whose new keys
   * collide, and return it in sorted key order.
   */
  private renameKeys<V>(
    record: Record<string, V>,
    mapValue: (value: V, key: string) => V,
    merge: (left: V, right: V, key: string) => V
  ): Record<string, V> {
    const result: Record<string, V> = {};
    for (const [key, value] of Object.entries(record)) {
      const renamed = this.replaceText(key);
      const mapped = mapValue(value, renamed);
      const existing = getOwn(result, renamed);
      result[renamed] = existing === undefined ? mapped : merge(existing, mapped, renamed);
    }
    const sorted: Record<string, V> = {};
    for (const key of Object.keys(result).sort(compareKeys)) {
      const value = result[key];
      if (value !== undefined) sorted[key] = value;
    }
    return sorted;
  }
}

/**
 * Matches any alias, optionally preceded by "the", as whole words.
 */
export function buildReplacementPattern(aliases: readonly string[]): RegExp | null {
  const terms = aliases
    .map(alias => collapseWhitespace(alias).replace(/^the\s+/i, ''))
    .filter(alias => alias.length > 0)
    .sort((a, b) => b.length - a.length)
    .map(alias => escapeRegExp(alias).replace(/ /g, '\\s+'));
  if (terms.length === 0) return null;
  return new RegExp(`\\b(?:the\\s+)?(?:${terms.join('|')})\\b`, 'gi');
}

export function replaceNarrator(binder: Lorebinder, narrator: string, aliases: readonly string[]): Lorebinder {
  return new NarratorReplacer(narrator, aliases).replaceInBinder(binder);
}
