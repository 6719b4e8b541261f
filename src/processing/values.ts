/**
 * Attribute value helpers
 *
 * Validation of untyped attribute input, sentinel stripping, and the merge
 * rules used whenever two values land on the same key.
 */

import type { AttributeMap, AttributeValue, ChapterValues, NameAttributes, NameEntry } from '../types.js';
import { StructureMismatchError } from '../errors.js';
import type { ILogger } from '../utils/logger.js';
import { getOwn, hasOwn, isStorableKey } from '../utils/records.js';
import { compareKeys } from '../utils/text.js';

export const ALSO_KEY = 'Also';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAttributeMap(value: AttributeValue): value is AttributeMap {
  return typeof value === 'object' && !Array.isArray(value);
}

function kindOf(value: AttributeValue): 'string' | 'list' | 'mapping' {
  if (typeof value === 'string') return 'string';
  return Array.isArray(value) ? 'list' : 'mapping';
}

// ============================================
// SANITIZE
// ============================================

/**
 * Coerce an untyped value into an AttributeValue. Numbers and booleans become
 * strings; null, undefined and anything else are dropped. Every coercion or
 * drop is logged with its path.
 */
export function sanitizeAttributeValue(
  value: unknown,
  path: string[],
  logger: ILogger
): AttributeValue | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    logger.warn('Coerced non-string attribute value', { path, value });
    return String(value);
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    value.forEach((item: unknown, index) => {
      if (typeof item === 'string') {
        items.push(item);
      } else if (typeof item === 'number' || typeof item === 'boolean') {
        logger.warn('Coerced non-string list item', { path, index, value: item });
        items.push(String(item));
      } else {
        logger.warn('Dropped malformed list item', { path, index });
      }
    });
    return items.length > 0 ? items : undefined;
  }
  if (isRecord(value)) {
    const map: AttributeMap = {};
    for (const [key, inner] of Object.entries(value)) {
      const cleanKey = key.trim();
      if (!cleanKey) continue;
      if (!isStorableKey(cleanKey)) {
        logger.warn('Dropped reserved key', { path, key: cleanKey });
        continue;
      }
      const sanitized = sanitizeAttributeValue(inner, [...path, cleanKey], logger);
      if (sanitized !== undefined) {
        map[cleanKey] = sanitized;
      }
    }
    return Object.keys(map).length > 0 ? map : undefined;
  }

  logger.warn('Dropped malformed attribute value', { path, type: value === null ? 'null' : typeof value });
  return undefined;
}

// ============================================
// SENTINELS
// ============================================

/**
 * Exact match after trimming, ignoring case.
 */
export function isSentinel(value: string, sentinel: string): boolean {
  return value.trim().toLowerCase() === sentinel.trim().toLowerCase();
}

/**
 * Remove every string equal to the sentinel. Lists left with one item
 * collapse to that item; emptied lists and mappings disappear.
 */
export function stripSentinelValue(value: AttributeValue, sentinel: string): AttributeValue | undefined {
  if (typeof value === 'string') {
    return isSentinel(value, sentinel) ? undefined : value;
  }
  if (Array.isArray(value)) {
    const kept = value.filter(item => !isSentinel(item, sentinel));
    if (kept.length === 0) return undefined;
    if (kept.length === 1) return kept[0];
    return kept;
  }
  const map = stripSentinelMap(value, sentinel);
  return Object.keys(map).length > 0 ? map : undefined;
}

export function stripSentinelMap(map: AttributeMap, sentinel: string): AttributeMap {
  const result: AttributeMap = {};
  for (const [key, value] of Object.entries(map)) {
    if (isSentinel(key, sentinel)) continue;
    const stripped = stripSentinelValue(value, sentinel);
    if (stripped !== undefined) {
      result[key] = stripped;
    }
  }
  return result;
}

// ============================================
// MERGE
// ============================================

function appendUnique(target: string[], items: readonly string[]): string[] {
  const result = [...target];
  for (const item of items) {
    if (!result.includes(item)) {
      result.push(item);
    }
  }
  return result;
}

/**
 * Combine two values found under the same key.
 *
 * - string + string: both, as a list (identical strings collapse)
 * - list + string / list + list: concatenation without exact duplicates
 * - mapping + mapping: key-wise merge
 * - mapping + string: the string goes under "Also" unless it is already a key
 * - list + mapping: StructureMismatchError
 */
export function mergeAttributeValues(
  left: AttributeValue,
  right: AttributeValue,
  path: string[] = []
): AttributeValue {
  if (typeof left === 'string' && typeof right === 'string') {
    return left === right ? left : [left, right];
  }
  if (Array.isArray(left) && typeof right === 'string') {
    return appendUnique(left, [right]);
  }
  if (typeof left === 'string' && Array.isArray(right)) {
    return appendUnique([left], right);
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return appendUnique(left, right);
  }
  if (isAttributeMap(left) && isAttributeMap(right)) {
    return mergeAttributeMaps(left, right, path);
  }
  if (isAttributeMap(left) && typeof right === 'string') {
    return mergeStringIntoMap(left, right, path);
  }
  if (typeof left === 'string' && isAttributeMap(right)) {
    return mergeStringIntoMap(right, left, path);
  }
  throw new StructureMismatchError(path, kindOf(left), kindOf(right));
}

function mergeStringIntoMap(map: AttributeMap, value: string, path: string[]): AttributeMap {
  if (hasOwn(map, value)) {
    return map;
  }
  const also = getOwn(map, ALSO_KEY);
  return {
    ...map,
    [ALSO_KEY]: also === undefined ? value : mergeAttributeValues(also, value, [...path, ALSO_KEY]),
  };
}

export function mergeAttributeMaps(left: AttributeMap, right: AttributeMap, path: string[] = []): AttributeMap {
  const result: AttributeMap = { ...left };
  for (const [key, value] of Object.entries(right)) {
    const existing = getOwn(result, key);
    result[key] = existing === undefined ? value : mergeAttributeValues(existing, value, [...path, key]);
  }
  return result;
}

export function mergeNameAttributes(left: NameAttributes, right: NameAttributes, path: string[] = []): NameAttributes {
  return mergeAttributeMaps(left, right, path);
}

export function mergeChapterValues(left: ChapterValues, right: ChapterValues, path: string[] = []): ChapterValues {
  return mergeAttributeMaps(left, right, path);
}

/**
 * Merge two values of the same lorebinder attribute. Chapter maps merge
 * key-wise; of two summaries the left one wins.
 */
export function mergeEntryValues(
  left: ChapterValues | string,
  right: ChapterValues | string,
  path: string[] = []
): ChapterValues | string {
  if (typeof left === 'string' && typeof right === 'string') {
    return left;
  }
  if (typeof left !== 'string' && typeof right !== 'string') {
    return mergeChapterValues(left, right, path);
  }
  throw new StructureMismatchError(
    path,
    typeof left === 'string' ? 'string' : 'mapping',
    typeof right === 'string' ? 'string' : 'mapping'
  );
}

export function mergeNameEntries(left: NameEntry, right: NameEntry, path: string[] = []): NameEntry {
  const result: NameEntry = { ...left };
  for (const [attribute, value] of Object.entries(right)) {
    const existing = getOwn(result, attribute);
    result[attribute] = existing === undefined ? value : mergeEntryValues(existing, value, [...path, attribute]);
  }
  return result;
}

export function mergeCategoryNames(
  left: Record<string, NameEntry>,
  right: Record<string, NameEntry>,
  path: string[] = []
): Record<string, NameEntry> {
  const result: Record<string, NameEntry> = { ...left };
  for (const [name, entry] of Object.entries(right)) {
    const existing = getOwn(result, name);
    result[name] = existing === undefined ? entry : mergeNameEntries(existing, entry, [...path, name]);
  }
  return result;
}

// ============================================
// SORT
// ============================================

export function sortRecord<V>(record: Record<string, V>, mapValue: (value: V) => V = value => value): Record<string, V> {
  const result: Record<string, V> = {};
  for (const key of Object.keys(record).sort(compareKeys)) {
    const value = record[key];
    if (value !== undefined) {
      result[key] = mapValue(value);
    }
  }
  return result;
}

export function sortAttributeValue(value: AttributeValue): AttributeValue {
  if (typeof value === 'string' || Array.isArray(value)) return value;
  return sortRecord(value, sortAttributeValue);
}
