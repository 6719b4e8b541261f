/**
 * Name Sorter
 *
 * Turns one chapter's freeform entity listing into categorized, deduplicated
 * canonical names. Input is whatever the extraction model produced: headers
 * may be misspelled or glued to names, names may arrive as comma lists or
 * numbered bullets, and settings may be grouped under "interior:" or
 * "exterior:" prefixes. Nothing here throws; malformed lines are repaired or
 * dropped.
 */

import type { CategorizedNames } from '../types.js';
import type { ILogger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { collapseWhitespace, escapeRegExp, titleCase } from '../utils/text.js';
import { chooseCanonical, shouldCompareNames, stripLocationTag, toSingular } from './name-rules.js';
import { createVocabulary, type Vocabulary } from './vocabulary.js';

export const BASE_CATEGORIES = ['Characters', 'Settings'] as const;

const LIST_MARKER_PATTERN = /^(?:\d+[.)]\s*|[-*+•]\s*|\.\s+)/;
const LEADING_COLON_PATTERN = /^\s*:\s*/;
const HEADER_DECORATION_PATTERN = /^[#*_\s]+|[*_\s]+$/g;
const LOCATION_PREFIX_PATTERN = /^(interior|exterior)\s*:\s*(.*)$/i;
const GLUED_HEADER_PATTERN = /^(\p{L}[\p{L} ]*?)\s*:\s*(\S.*)$/u;
const INVERTED_TAG_PATTERN = /^(interior|exterior)\s*\((.+)\)$/i;
const TAG_CASE_PATTERN = /\((interior|exterior)\)/gi;
const OTHER_PARENTHETICAL_PATTERN = /\s*\((?!(?:interior|exterior)\))[^()]*\)\s*$/i;
const LIST_SEPARATOR_PATTERN = /\s*[,;]\s*/;
const HAS_WORD_CHARACTER = /[\p{L}\p{N}]/u;

export interface NameSorterOptions {
  vocabulary?: Vocabulary;
  logger?: ILogger;
}

/**
 * One parsed line: either a category header, a set of candidate names, or
 * both when the model glued them together ("Characters: Bob, Ann").
 */
export interface ParsedLine {
  header?: string;
  candidates: string[];
}

export class NameSorter {
  private readonly vocabulary: Vocabulary;
  private readonly logger: ILogger;
  private readonly narratorPattern: RegExp | null;

  constructor(options: NameSorterOptions = {}) {
    this.vocabulary = options.vocabulary ?? createVocabulary();
    this.logger = options.logger ?? silentLogger;
    this.narratorPattern = buildAliasPattern(this.vocabulary.narratorAliases);
  }

  /**
   * Sort a raw entity listing into categories of canonical names.
   *
   * Narrator aliases become the given narrator name; with an empty narrator
   * they are dropped.
   */
  sort(text: string, narrator = ''): CategorizedNames {
    const collected = new Map<string, string[]>();
    let current: string | null = null;
    let sawContent = false;

    for (const rawLine of text.split(/\r?\n/)) {
      const parsed = this.parseLine(rawLine);
      if (!parsed) continue;
      sawContent = true;

      if (parsed.header !== undefined) {
        const header = this.normalizeHeader(parsed.header);
        if (header === null) {
          this.logger.debug('Skipping filler header', { line: rawLine.trim() });
          continue;
        }
        current = header;
        if (!collected.has(current)) {
          collected.set(current, []);
        }
      }

      for (const candidate of parsed.candidates) {
        const name = this.cleanCandidate(candidate, narrator);
        if (name === null) continue;
        if (current === null) {
          this.logger.debug('Dropping name listed before any category header', { name });
          continue;
        }
        collected.get(current)?.push(name);
      }
    }

    if (!sawContent) {
      return {};
    }

    const folded = this.foldSingularCategories(collected);
    const result: CategorizedNames = {};
    for (const [category, names] of folded) {
      const merged = this.mergeVariants(names);
      if (merged.length > 0 || isBaseCategory(category)) {
        result[category] = merged;
      }
    }
    for (const category of BASE_CATEGORIES) {
      if (!(category in result)) {
        result[category] = [];
      }
    }
    return result;
  }

  /**
   * Split one raw line into a header and/or candidate names. Returns null for
   * blank lines.
   */
  parseLine(rawLine: string): ParsedLine | null {
    const line = stripLeadingNoise(rawLine.trim());
    if (!line || !HAS_WORD_CHARACTER.test(line)) return null;

    const location = line.match(LOCATION_PREFIX_PATTERN);
    if (location) {
      const tag = (location[1] ?? '').toLowerCase();
      const items = splitList(location[2] ?? '');
      return { candidates: items.map(item => `${stripLocationTag(item)} (${tag})`) };
    }

    if (line.endsWith(':')) {
      return { header: line.slice(0, -1), candidates: [] };
    }

    const glued = line.match(GLUED_HEADER_PATTERN);
    if (glued) {
      return { header: glued[1] ?? '', candidates: splitList(glued[2] ?? '') };
    }

    return { candidates: splitList(line) };
  }

  /**
   * Canonical category name for a header, or null when the header is noise.
   */
  normalizeHeader(raw: string): string | null {
    const cleaned = collapseWhitespace(stripLeadingNoise(raw).replace(HEADER_DECORATION_PATTERN, ''));
    if (!cleaned || !HAS_WORD_CHARACTER.test(cleaned)) return null;

    const lower = cleaned.toLowerCase();
    const alias = this.vocabulary.categoryAliases.get(lower);
    if (alias) return alias;
    if (lower.split(' ').some(word => this.vocabulary.fillerWords.has(word))) return null;
    return titleCase(cleaned);
  }

  /**
   * Repair one candidate name. Returns null when it should be dropped.
   */
  cleanCandidate(raw: string, narrator = ''): string | null {
    let name = stripLeadingNoise(raw.trim());

    const inverted = name.match(INVERTED_TAG_PATTERN);
    if (inverted) {
      name = `${inverted[2] ?? ''} (${inverted[1] ?? ''})`;
    }
    name = name.replace(TAG_CASE_PATTERN, (tag: string) => tag.toLowerCase());

    if (countOf(name, '(') !== countOf(name, ')')) {
      name = name.replace(/[()]/g, '');
    }
    name = collapseWhitespace(name.replace(OTHER_PARENTHETICAL_PATTERN, ''));

    if (!HAS_WORD_CHARACTER.test(name)) return null;

    if (this.narratorPattern?.test(name)) {
      return narrator.trim() || null;
    }

    const words = name.toLowerCase().split(' ');
    if (words.some(word => this.vocabulary.fillerWords.has(word))) {
      this.logger.debug('Dropping filler candidate', { name });
      return null;
    }

    return name;
  }

  /**
   * Collapse spelling variants within one category. Each new name is compared
   * against the names kept so far; comparable names collapse into one entry at
   * the position of the first-seen variant.
   */
  mergeVariants(names: string[]): string[] {
    const kept: string[] = [];

    for (const name of names) {
      const matches: number[] = [];
      for (let i = 0; i < kept.length; i++) {
        const existing = kept[i];
        if (existing === undefined) continue;
        if (existing.toLowerCase() === name.toLowerCase() ||
          shouldCompareNames(existing, name, this.vocabulary)) {
          matches.push(i);
        }
      }

      const first = matches[0];
      if (first === undefined) {
        kept.push(name);
        continue;
      }

      let canonical = name;
      for (let m = matches.length - 1; m >= 0; m--) {
        const index = matches[m];
        if (index === undefined) continue;
        canonical = chooseCanonical(kept[index] ?? canonical, canonical, this.vocabulary);
      }
      for (let m = matches.length - 1; m > 0; m--) {
        const index = matches[m];
        if (index !== undefined) kept.splice(index, 1);
      }
      kept[first] = canonical;
    }

    return kept;
  }

  /**
   * Fold singular headers into their plural ("Weapon" into "Weapons").
   */
  private foldSingularCategories(collected: Map<string, string[]>): Map<string, string[]> {
    const result = new Map<string, string[]>();
    const byLower = new Map<string, string>();
    for (const category of collected.keys()) {
      byLower.set(category.toLowerCase(), category);
    }

    const foldedInto = new Map<string, string>();
    for (const category of collected.keys()) {
      const singular = byLower.get(toSingular(category, this.vocabulary));
      if (singular && singular !== category) {
        foldedInto.set(singular, category);
      }
    }

    for (const [category, names] of collected) {
      const target = foldedInto.get(category) ?? category;
      const bucket = result.get(target) ?? [];
      bucket.push(...names);
      result.set(target, bucket);
    }
    return result;
  }
}

function stripLeadingNoise(value: string): string {
  return value.replace(LIST_MARKER_PATTERN, '').replace(LEADING_COLON_PATTERN, '').trim();
}

function splitList(value: string): string[] {
  return value.split(LIST_SEPARATOR_PATTERN).map(item => item.trim()).filter(item => item.length > 0);
}

function countOf(value: string, char: string): number {
  return value.split(char).length - 1;
}

function isBaseCategory(category: string): boolean {
  return category === 'Characters' || category === 'Settings';
}

function buildAliasPattern(aliases: readonly string[]): RegExp | null {
  const terms = aliases
    .map(alias => collapseWhitespace(alias))
    .filter(alias => alias.length > 0)
    .sort((a, b) => b.length - a.length)
    .map(alias => escapeRegExp(alias).replace(/ /g, '\\s+'));
  if (terms.length === 0) return null;
  return new RegExp(`\\b(?:${terms.join('|')})\\b`, 'i');
}

/**
 * Convenience wrapper around {@link NameSorter.sort}.
 */
export function sortNames(text: string, narrator = '', options: NameSorterOptions = {}): CategorizedNames {
  return new NameSorter(options).sort(text, narrator);
}
