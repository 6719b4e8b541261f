/**
 * Attribute Merger
 *
 * Folds per-chapter attribute maps into one lorebinder:
 *
 *   sanitize -> strip sentinels -> dedupe names per chapter -> pivot
 *   -> strip sentinels -> dedupe names -> fold into Characters -> sort
 *   -> narrator substitution -> dedupe names -> fold into Characters -> sort
 *
 * Every stage is a pure function over its input and returns a new structure.
 * Chapters and keys are always visited in sorted order, so the result does
 * not depend on the order in which chapters arrived.
 */

import type {
  BookChapters,
  ChapterAttributes,
  ChapterValues,
  Config,
  Lorebinder,
  NameAttributes,
  NameEntry,
} from '../types.js';
import { SUMMARY_KEY } from '../types.js';
import { StructureMismatchError } from '../errors.js';
import type { ILogger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { getOwn, isStorableKey } from '../utils/records.js';
import { compareKeys, titleCase } from '../utils/text.js';
import { isSimilarKey, prioritizeKeys } from './name-rules.js';
import { NarratorReplacer } from './narrator.js';
import {
  isRecord,
  isSentinel,
  mergeAttributeValues,
  mergeNameAttributes,
  mergeNameEntries,
  sanitizeAttributeValue,
  sortAttributeValue,
  sortRecord,
  stripSentinelMap,
} from './values.js';
import { createVocabulary, vocabularyFromConfig, type Vocabulary } from './vocabulary.js';

export const DEFAULT_SENTINEL = 'None found';

/** Category that names found in other categories are folded into */
export const CHARACTERS_CATEGORY = 'Characters';

/** Attribute used when a name maps straight to a string or list */
export const DESCRIPTION_KEY = 'Description';

export interface AttributeMergerOptions {
  vocabulary?: Vocabulary;
  sentinel?: string;
  logger?: ILogger;
}

// ============================================
// STAGE 0: SANITIZE
// ============================================

/**
 * Validate untyped chapter input. Malformed entries are logged and coerced or
 * dropped; this stage never throws.
 */
export function sanitizeChapters(input: unknown, logger: ILogger = silentLogger): BookChapters {
  if (!isRecord(input)) {
    logger.warn('Chapter input is not a mapping', { type: input === null ? 'null' : typeof input });
    return {};
  }

  const chapters: BookChapters = {};
  for (const [rawChapter, rawCategories] of Object.entries(input)) {
    const chapter = rawChapter.trim();
    if (!chapter || !storable(chapter, [], logger)) continue;
    if (!isRecord(rawCategories)) {
      logger.warn('Dropped chapter that is not a mapping', { chapter });
      continue;
    }

    const categories: ChapterAttributes = {};
    for (const [rawCategory, rawNames] of Object.entries(rawCategories)) {
      const category = rawCategory.trim();
      if (!category || !storable(category, [chapter], logger)) continue;
      if (!isRecord(rawNames)) {
        logger.warn('Dropped category that is not a mapping', { chapter, category });
        continue;
      }

      const names: Record<string, NameAttributes> = {};
      for (const [rawName, rawAttributes] of Object.entries(rawNames)) {
        const name = rawName.trim();
        if (!name || !storable(name, [chapter, category], logger)) continue;
        const attributes = sanitizeNameAttributes(rawAttributes, [chapter, category, name], logger);
        if (attributes) {
          names[name] = attributes;
        }
      }
      categories[category] = names;
    }
    chapters[chapter] = categories;
  }
  return chapters;
}

function sanitizeNameAttributes(value: unknown, path: string[], logger: ILogger): NameAttributes | undefined {
  if (typeof value === 'string' || Array.isArray(value)) {
    logger.warn('Name maps directly to a value; storing it as Description', { path });
    const description = sanitizeAttributeValue(value, [...path, DESCRIPTION_KEY], logger);
    return description === undefined ? undefined : { [DESCRIPTION_KEY]: description };
  }
  if (!isRecord(value)) {
    logger.warn('Dropped name without attributes', { path });
    return undefined;
  }

  const attributes: NameAttributes = {};
  for (const [rawAttribute, rawValue] of Object.entries(value)) {
    const attribute = rawAttribute.trim();
    if (!attribute || !storable(attribute, path, logger)) continue;
    if (attribute.toLowerCase() === SUMMARY_KEY) {
      logger.warn('Dropped reserved attribute from chapter input', { path, attribute });
      continue;
    }
    const sanitized = sanitizeAttributeValue(rawValue, [...path, attribute], logger);
    if (sanitized !== undefined) {
      attributes[attribute] = sanitized;
    }
  }
  return attributes;
}

function storable(key: string, path: string[], logger: ILogger): boolean {
  if (isStorableKey(key)) return true;
  logger.warn('Dropped reserved key', { path, key });
  return false;
}

/**
 * Validate an untyped lorebinder, e.g. one passed back in by a client.
 * String attributes are kept only under the summary key.
 */
export function sanitizeBinder(input: unknown, logger: ILogger = silentLogger): Lorebinder {
  if (!isRecord(input)) {
    logger.warn('Lorebinder is not a mapping', { type: input === null ? 'null' : typeof input });
    return {};
  }

  const binder: Lorebinder = {};
  for (const [category, rawNames] of Object.entries(input)) {
    if (!storable(category, [], logger)) continue;
    if (!isRecord(rawNames)) {
      logger.warn('Dropped category that is not a mapping', { category });
      continue;
    }
    const names: Record<string, NameEntry> = {};
    for (const [name, rawEntry] of Object.entries(rawNames)) {
      if (!storable(name, [category], logger)) continue;
      if (!isRecord(rawEntry)) {
        logger.warn('Dropped name that is not a mapping', { category, name });
        continue;
      }
      const entry: NameEntry = {};
      for (const [attribute, rawValue] of Object.entries(rawEntry)) {
        const path = [category, name, attribute];
        if (!storable(attribute, [category, name], logger)) continue;
        if (attribute === SUMMARY_KEY && typeof rawValue === 'string') {
          entry[attribute] = rawValue;
          continue;
        }
        if (!isRecord(rawValue)) {
          logger.warn('Dropped attribute without chapter values', { path });
          continue;
        }
        const byChapter: ChapterValues = {};
        for (const [chapter, value] of Object.entries(rawValue)) {
          if (!storable(chapter, path, logger)) continue;
          const sanitized = sanitizeAttributeValue(value, [...path, chapter], logger);
          if (sanitized !== undefined) {
            byChapter[chapter] = sanitized;
          }
        }
        entry[attribute] = byChapter;
      }
      names[name] = entry;
    }
    binder[category] = names;
  }
  return binder;
}

// ============================================
// STAGE 1: STRIP SENTINELS (PER CHAPTER)
// ============================================

export function stripChapterSentinels(chapters: BookChapters, sentinel: string = DEFAULT_SENTINEL): BookChapters {
  const result: BookChapters = {};
  for (const [chapter, categories] of Object.entries(chapters)) {
    const cleanCategories: ChapterAttributes = {};
    for (const [category, names] of Object.entries(categories)) {
      const cleanNames: Record<string, NameAttributes> = {};
      for (const [name, attributes] of Object.entries(names)) {
        if (isSentinel(name, sentinel)) continue;
        const stripped = stripSentinelMap(attributes, sentinel);
        if (Object.keys(stripped).length > 0) {
          cleanNames[name] = stripped;
        }
      }
      if (Object.keys(cleanNames).length > 0) {
        cleanCategories[category] = cleanNames;
      }
    }
    if (Object.keys(cleanCategories).length > 0) {
      result[chapter] = cleanCategories;
    }
  }
  return result;
}

// ============================================
// NAME KEY DEDUPLICATION
// ============================================

/**
 * Merge near-duplicate name keys of one category. Keys are visited in sorted
 * order; passes repeat until no two remaining keys are similar, so the result
 * is a fixed point of this function.
 */
export function dedupeNames<V>(
  record: Record<string, V>,
  merge: (keep: V, drop: V, key: string) => V,
  vocabulary: Vocabulary
): Record<string, V> {
  let current = record;
  for (;;) {
    const next = new Map<string, V>();
    let merged = false;

    for (const key of Object.keys(current).sort(compareKeys)) {
      const value = current[key];
      if (value === undefined) continue;

      let match: string | undefined;
      for (const existing of next.keys()) {
        if (isSimilarKey(existing, key, vocabulary)) {
          match = existing;
          break;
        }
      }
      const matchValue = match === undefined ? undefined : next.get(match);
      if (match === undefined || matchValue === undefined) {
        next.set(key, value);
        continue;
      }

      const { keep } = prioritizeKeys(match, key);
      const combined = keep === match ? merge(matchValue, value, keep) : merge(value, matchValue, keep);
      next.delete(match);
      next.set(keep, combined);
      merged = true;
    }

    current = Object.fromEntries(next);
    if (!merged) return current;
  }
}

export function dedupeChapterNames(chapters: BookChapters, vocabulary: Vocabulary): BookChapters {
  const result: BookChapters = {};
  for (const [chapter, categories] of Object.entries(chapters)) {
    const deduped: ChapterAttributes = {};
    for (const [category, names] of Object.entries(categories)) {
      deduped[category] = dedupeNames(
        names,
        (keep, drop, name) => mergeNameAttributes(keep, drop, [chapter, category, name]),
        vocabulary
      );
    }
    result[chapter] = deduped;
  }
  return result;
}

// ============================================
// STAGE 3: PIVOT
// ============================================

/**
 * {chapter: {category: {name: {attribute: value}}}}
 *   -> {category: {name: {attribute: {chapter: value}}}}
 */
export function pivot(chapters: BookChapters): Lorebinder {
  const binder: Lorebinder = {};

  for (const chapter of Object.keys(chapters).sort(compareKeys)) {
    const categories = chapters[chapter] ?? {};
    for (const [rawCategory, names] of Object.entries(categories)) {
      const category = titleCase(rawCategory);
      const binderNames = getOwn(binder, category) ?? {};
      binder[category] = binderNames;

      for (const [name, attributes] of Object.entries(names)) {
        const entry: NameEntry = getOwn(binderNames, name) ?? {};
        binderNames[name] = entry;

        for (const [attribute, value] of Object.entries(attributes)) {
          const existing = getOwn(entry, attribute);
          if (typeof existing === 'string') {
            throw new StructureMismatchError([category, name, attribute], 'string', 'mapping');
          }
          const byChapter: ChapterValues = existing ?? {};
          const previous = getOwn(byChapter, chapter);
          byChapter[chapter] = previous === undefined
            ? value
            : mergeAttributeValues(previous, value, [category, name, attribute, chapter]);
          entry[attribute] = byChapter;
        }
      }
    }
  }
  return binder;
}

/**
 * Inverse of {@link pivot}. Summaries are not chapter data and are left out.
 */
export function unpivot(binder: Lorebinder): BookChapters {
  const chapters: BookChapters = {};
  for (const [category, names] of Object.entries(binder)) {
    for (const [name, entry] of Object.entries(names)) {
      for (const [attribute, byChapter] of Object.entries(entry)) {
        if (typeof byChapter === 'string') continue;
        for (const [chapter, value] of Object.entries(byChapter)) {
          const categories = getOwn(chapters, chapter) ?? {};
          chapters[chapter] = categories;
          const chapterNames = getOwn(categories, category) ?? {};
          categories[category] = chapterNames;
          const attributes = getOwn(chapterNames, name) ?? {};
          chapterNames[name] = attributes;
          attributes[attribute] = value;
        }
      }
    }
  }
  return chapters;
}

// ============================================
// STAGE 4: POST-PIVOT NORMALIZATION
// ============================================

export function stripBinderSentinels(binder: Lorebinder, sentinel: string = DEFAULT_SENTINEL): Lorebinder {
  const result: Lorebinder = {};
  for (const [category, names] of Object.entries(binder)) {
    const cleanNames: Record<string, NameEntry> = {};
    for (const [name, entry] of Object.entries(names)) {
      if (isSentinel(name, sentinel)) continue;
      const cleanEntry: NameEntry = {};
      for (const [attribute, value] of Object.entries(entry)) {
        if (isSentinel(attribute, sentinel)) continue;
        if (typeof value === 'string') {
          // summary text is kept as written
          cleanEntry[attribute] = value;
          continue;
        }
        const stripped = stripSentinelMap(value, sentinel);
        if (Object.keys(stripped).length > 0) {
          cleanEntry[attribute] = stripped;
        }
      }
      if (Object.keys(cleanEntry).length > 0) {
        cleanNames[name] = cleanEntry;
      }
    }
    if (Object.keys(cleanNames).length > 0) {
      result[category] = cleanNames;
    }
  }
  return result;
}

export function dedupeBinderNames(binder: Lorebinder, vocabulary: Vocabulary): Lorebinder {
  const result: Lorebinder = {};
  for (const [category, names] of Object.entries(binder)) {
    result[category] = dedupeNames(
      names,
      (keep, drop, name) => mergeNameEntries(keep, drop, [category, name]),
      vocabulary
    );
  }
  return result;
}

/**
 * Fold a name that also appears, spelled exactly the same, under another
 * category into its Characters entry. Categories emptied by the fold are
 * removed.
 */
export function foldIntoCharacters(binder: Lorebinder): Lorebinder {
  const characters = getOwn(binder, CHARACTERS_CATEGORY);
  if (!characters) return binder;

  const folded: Record<string, NameEntry> = { ...characters };
  const result: Lorebinder = {};
  for (const [category, names] of Object.entries(binder)) {
    if (category === CHARACTERS_CATEGORY) continue;
    const kept: Record<string, NameEntry> = {};
    for (const [name, entry] of Object.entries(names)) {
      const character = getOwn(folded, name);
      if (character === undefined) {
        kept[name] = entry;
        continue;
      }
      folded[name] = mergeNameEntries(character, entry, [CHARACTERS_CATEGORY, name]);
    }
    if (Object.keys(kept).length > 0) {
      result[category] = kept;
    }
  }
  result[CHARACTERS_CATEGORY] = folded;
  return result;
}

// ============================================
// STAGE 5: SORT
// ============================================

export function sortLorebinder(binder: Lorebinder): Lorebinder {
  return sortRecord(binder, names =>
    sortRecord(names, entry =>
      sortRecord(entry, value => (typeof value === 'string' ? value : sortRecord(value, sortAttributeValue)))
    )
  );
}

// ============================================
// MERGER
// ============================================

export class AttributeMerger {
  private readonly vocabulary: Vocabulary;
  private readonly sentinel: string;
  private readonly logger: ILogger;

  /**
   * @throws Error when the sentinel is blank
   */
  constructor(options: AttributeMergerOptions = {}) {
    const sentinel = options.sentinel ?? DEFAULT_SENTINEL;
    if (sentinel.trim() === '') {
      throw new Error('Sentinel must not be blank');
    }
    this.vocabulary = options.vocabulary ?? createVocabulary();
    this.sentinel = sentinel;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Build the lorebinder for a set of chapters.
   *
   * @param chapters - {chapterId: ChapterAttributes}, validated here
   * @param narrator - real name substituted for narrator aliases; empty for none
   * @throws StructureMismatchError when a list and a mapping meet on one key
   */
  merge(chapters: unknown, narrator = ''): Lorebinder {
    const sanitized = sanitizeChapters(chapters, this.logger);
    const stripped = stripChapterSentinels(sanitized, this.sentinel);
    const deduped = dedupeChapterNames(stripped, this.vocabulary);
    const binder = this.normalize(pivot(deduped), narrator);

    this.logger.debug('Merged chapters', {
      chapters: Object.keys(sanitized).length,
      categories: Object.keys(binder).length,
    });
    return binder;
  }

  /**
   * Post-pivot stages on their own. Idempotent: normalizing a normalized
   * binder returns an equal binder.
   *
   * Aliases are merged before the narrator is substituted, so "The Narrator"
   * and "Main Character" stay apart without a narrator. Names are deduped
   * again afterwards, since the narrator's name may match another key.
   */
  normalize(binder: Lorebinder, narrator = ''): Lorebinder {
    const stripped = stripBinderSentinels(binder, this.sentinel);
    const replacer = new NarratorReplacer(narrator, this.vocabulary.narratorAliases);
    const merged = this.consolidate(stripped);
    return replacer.enabled ? this.consolidate(replacer.replaceInBinder(merged)) : merged;
  }

  private consolidate(binder: Lorebinder): Lorebinder {
    return sortLorebinder(foldIntoCharacters(dedupeBinderNames(binder, this.vocabulary)));
  }

  unpivot(binder: Lorebinder): BookChapters {
    return unpivot(binder);
  }
}

export function mergeChapters(chapters: unknown, narrator = '', options: AttributeMergerOptions = {}): Lorebinder {
  return new AttributeMerger(options).merge(chapters, narrator);
}

/**
 * Merger using the sentinel and narrator aliases of the given config.
 */
export function mergerFromConfig(
  config: Pick<Config, 'narratorAliases' | 'noneFoundSentinel'>,
  logger: ILogger = silentLogger
): AttributeMerger {
  return new AttributeMerger({
    vocabulary: vocabularyFromConfig(config),
    sentinel: config.noneFoundSentinel,
    logger,
  });
}
