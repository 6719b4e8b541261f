/**
 * Name comparison rules
 *
 * Heuristics that decide when two spellings refer to the same entity and
 * which spelling survives. Used by the name sorter (raw extracted names) and
 * the attribute merger (name keys of attribute maps).
 *
 * Known limitation: the "shorter name is an alias of the longer one" rule
 * merges genuinely distinct names that share a prefix or first word
 * ("Al" and "Alice", "Anna Smith" and "Anna Li"). Those merges are accepted
 * rather than special-cased.
 */

import type { Vocabulary } from './vocabulary.js';
import { collapseWhitespace, compareKeys, containsWords } from '../utils/text.js';

export type LocationTag = 'interior' | 'exterior';

const LOCATION_TAG_PATTERN = /\s*\((interior|exterior)\)\s*$/i;
const POSSESSIVE_PATTERN = /['’]s\b|(?<=s)['’](?=\s|$)/gi;
const PUNCTUATION_PATTERN = /[^\p{L}\p{N}\s-]/gu;

// ============================================
// NORMALIZATION
// ============================================

function normalizeTitleToken(token: string): string {
  return token.toLowerCase().replace(/\.$/, '');
}

export function isTitle(value: string, vocabulary: Vocabulary): boolean {
  return vocabulary.titles.has(normalizeTitleToken(value.trim()));
}

/**
 * Drop leading titles and articles ("The Captain Ahab" -> "Ahab").
 * A name made only of titles is returned unchanged.
 */
export function stripTitles(name: string, vocabulary: Vocabulary): string {
  const tokens = name.trim().split(/\s+/);
  let start = 0;
  while (start < tokens.length - 1 && vocabulary.titles.has(normalizeTitleToken(tokens[start] ?? ''))) {
    start++;
  }
  return tokens.slice(start).join(' ');
}

/**
 * Lower-cased singular form using the vocabulary's rule table.
 */
export function toSingular(word: string, vocabulary: Vocabulary): string {
  const lower = word.trim().toLowerCase();
  for (const rule of vocabulary.singularRules) {
    if (rule.pattern.test(lower)) {
      return lower.replace(rule.pattern, rule.replacement);
    }
  }
  return lower;
}

export function locationTag(name: string): LocationTag | null {
  const match = name.match(LOCATION_TAG_PATTERN);
  const tag = match?.[1]?.toLowerCase();
  if (tag === 'interior' || tag === 'exterior') return tag;
  return null;
}

export function stripLocationTag(name: string): string {
  return name.replace(LOCATION_TAG_PATTERN, '').trim();
}

/**
 * Comparison form of a name: no location tag, titles, possessives or
 * punctuation; lower case.
 */
export function comparisonForm(name: string, vocabulary: Vocabulary): string {
  const untagged = stripLocationTag(name);
  const untitled = stripTitles(untagged, vocabulary);
  return collapseWhitespace(
    untitled
      .replace(POSSESSIVE_PATTERN, '')
      .replace(PUNCTUATION_PATTERN, '')
  ).toLowerCase();
}

function firstToken(value: string): string {
  return value.split(' ')[0] ?? '';
}

// ============================================
// NAME SORTER RULES
// ============================================

/**
 * Whether two extracted names are plausibly the same entity: same location
 * tag, and either a shared first word, a prefix/suffix relation, or a
 * singular/plural pair.
 */
export function shouldCompareNames(a: string, b: string, vocabulary: Vocabulary): boolean {
  if (locationTag(a) !== locationTag(b)) return false;

  const left = comparisonForm(a, vocabulary);
  const right = comparisonForm(b, vocabulary);
  if (!left || !right) return false;
  if (left === right) return true;

  return (
    firstToken(left) === firstToken(right) ||
    left.startsWith(right) ||
    right.startsWith(left) ||
    left.endsWith(right) ||
    right.endsWith(left) ||
    isSingularPluralPair(a, b, vocabulary)
  );
}

export function isSingularPluralPair(a: string, b: string, vocabulary: Vocabulary): boolean {
  const left = comparisonForm(a, vocabulary);
  const right = comparisonForm(b, vocabulary);
  if (left === right) return false;
  return left === toSingular(right, vocabulary) || right === toSingular(left, vocabulary);
}

/**
 * The surviving spelling of two comparable names. Plural beats singular,
 * otherwise the longer string is canonical and the shorter is its alias.
 * Ties keep the name seen first.
 */
export function chooseCanonical(existing: string, candidate: string, vocabulary: Vocabulary): string {
  const existingForm = comparisonForm(existing, vocabulary);
  const candidateForm = comparisonForm(candidate, vocabulary);

  if (existingForm === candidateForm) {
    return candidate.length > existing.length && stripTitles(candidate, vocabulary) !== candidate
      ? candidate
      : existing;
  }
  if (existingForm === toSingular(candidateForm, vocabulary)) return candidate;
  if (candidateForm === toSingular(existingForm, vocabulary)) return existing;

  return candidate.length > existing.length ? candidate : existing;
}

// ============================================
// ATTRIBUTE KEY RULES
// ============================================

/**
 * Whether two name keys of an attribute map should be merged: equal after
 * case folding or singularizing, a bare title that heads the other key, or
 * equal/contained once leading titles and articles are removed.
 */
export function isSimilarKey(a: string, b: string, vocabulary: Vocabulary): boolean {
  // tagged settings are never compared with untagged or differently tagged ones
  if (locationTag(a) !== locationTag(b)) return false;

  const key1 = collapseWhitespace(a).toLowerCase();
  const key2 = collapseWhitespace(b).toLowerCase();
  const singular1 = toSingular(key1, vocabulary);
  const singular2 = toSingular(key2, vocabulary);

  if (key1 === key2 || key1 === singular2 || singular1 === key2 || singular1 === singular2) {
    return true;
  }

  if ((isTitle(key1, vocabulary) && containsWords(key2, key1)) ||
    (isTitle(key2, vocabulary) && containsWords(key1, key2))) {
    return true;
  }

  const untitled1 = stripTitles(key1, vocabulary);
  const untitled2 = stripTitles(key2, vocabulary);
  if (untitled1 === key1 && untitled2 === key2) {
    return false;
  }

  return (
    untitled1 === key2 ||
    key1 === untitled2 ||
    untitled1 === untitled2 ||
    untitled1 === singular2 ||
    singular1 === untitled2 ||
    startsWithWords(key2, untitled1) ||
    startsWithWords(key1, untitled2) ||
    startsWithWords(untitled2, key1) ||
    startsWithWords(untitled1, key2)
  );
}

/**
 * needle appears in haystack as whole words followed by at least one more word
 */
function startsWithWords(haystack: string, needle: string): boolean {
  if (!needle) return false;
  return ` ${haystack}`.includes(` ${needle} `);
}

/**
 * Which of two similar keys survives: the longer one, ties broken by key
 * order so the result does not depend on iteration order.
 */
export function prioritizeKeys(a: string, b: string): { keep: string; drop: string } {
  if (a.length !== b.length) {
    return a.length > b.length ? { keep: a, drop: b } : { keep: b, drop: a };
  }
  return compareKeys(a, b) <= 0 ? { keep: a, drop: b } : { keep: b, drop: a };
}
