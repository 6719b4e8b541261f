/**
 * Markdown attribute parser
 *
 * Reads one chapter's analysis response written as
 *
 *   # Characters
 *   ## Bob
 *   ### Appearance
 *   - tall
 *   - scarred
 *   ## Ann
 *   - Personality: gruff
 *
 * into ChapterAttributes. Lines that fit nowhere are ignored.
 */

import type { ChapterAttributes, NameAttributes } from '../types.js';
import { getOwn, isStorableKey } from '../utils/records.js';
import { collapseWhitespace } from '../utils/text.js';
import { mergeAttributeValues } from './values.js';

const HEADING_PATTERN = /^(#{1,6})\s*(.*?)\s*#*$/;
const BULLET_PATTERN = /^(?:[-*+•]|\d+[.)])\s+(.*)$/;
const INLINE_ATTRIBUTE_PATTERN = /^([^:]+?)\s*:\s*(\S.*)$/;
const EMPHASIS_PATTERN = /^[*_]+|[*_]+$/g;

function cleanText(value: string): string {
  return collapseWhitespace(value.replace(EMPHASIS_PATTERN, ''));
}

export function parseAttributeMarkdown(markdown: string): ChapterAttributes {
  const result: ChapterAttributes = {};
  let names: Record<string, NameAttributes> | null = null;
  let attributes: NameAttributes | null = null;
  let attribute: string | null = null;
  let lines: string[] = [];

  const flush = (): void => {
    if (attributes && attribute && lines.length > 0) {
      const value = lines.length === 1 ? (lines[0] ?? '') : lines;
      const existing = getOwn(attributes, attribute);
      attributes[attribute] = existing === undefined ? value : mergeAttributeValues(existing, value, [attribute]);
    }
    lines = [];
  };

  for (const rawLine of markdown.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const heading = line.match(HEADING_PATTERN);
    if (heading) {
      const level = (heading[1] ?? '').length;
      const text = cleanText(heading[2] ?? '');
      if (!text) continue;
      flush();
      // an unusable heading closes its level, so its lines are ignored
      const usable = isStorableKey(text);

      if (level === 1) {
        names = usable ? getOwn(result, text) ?? {} : null;
        if (names) result[text] = names;
        attributes = null;
        attribute = null;
      } else if (level === 2) {
        attributes = names && usable ? getOwn(names, text) ?? {} : null;
        if (names && attributes) names[text] = attributes;
        attribute = null;
      } else {
        attribute = attributes && usable ? text : null;
      }
      continue;
    }

    const bullet = line.match(BULLET_PATTERN);
    const text = cleanText(bullet ? (bullet[1] ?? '') : line);
    if (!text) continue;

    if (attribute) {
      lines.push(text);
      continue;
    }
    if (attributes && bullet) {
      const inline = text.match(INLINE_ATTRIBUTE_PATTERN);
      if (!inline) continue;
      const key = cleanText(inline[1] ?? '');
      const value = cleanText(inline[2] ?? '');
      if (!key || !value || !isStorableKey(key)) continue;
      const existing = getOwn(attributes, key);
      attributes[key] = existing === undefined ? value : mergeAttributeValues(existing, value, [key]);
    }
  }
  flush();

  return result;
}
