/**
 * Full Pipeline Integration Tests
 *
 * Tests the complete flow: sort -> parse -> merge -> prompts -> summaries
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { resetConfig } from '../../src/config.js';
import { readResource } from '../../src/resources/handlers.js';
import { BinderStore } from '../../src/resources/store.js';
import { executeAddSummaries } from '../../src/tools/add-summaries.js';
import { executeBuildPrompts } from '../../src/tools/build-prompts.js';
import { executeMergeAttributes } from '../../src/tools/merge-attributes.js';
import { executeParseAttributes } from '../../src/tools/parse-attributes.js';
import { executeSortNames } from '../../src/tools/sort-names.js';
import type { ChapterAttributes } from '../../src/types.js';
import { getLogger, resetLogger } from '../../src/utils/logger.js';

function chapterMarkdown(bob: string, mood: string, thought: string, weather: string): string {
  return [
    '# Characters',
    `## ${bob}`,
    '### Mood',
    `- ${mood}`,
    '## The Narrator',
    '### Thoughts',
    `- ${thought}`,
    '# Settings',
    '## Dock (exterior)',
    '### Weather',
    `- ${weather}`,
  ].join('\n');
}

const CHAPTERS: Array<[string, string]> = [
  ['1', chapterMarkdown('Captain Bob', 'calm', 'uneasy', 'rain')],
  ['2', chapterMarkdown('Bob', 'angry', 'hopeful', 'None found')],
  ['3', chapterMarkdown('Captain Bob', 'tired', 'None found', 'None found')],
  ['4', chapterMarkdown('Bob', 'calm', 'resolved', 'None found')],
];

function parseChapters(ids: string[]): Record<string, ChapterAttributes> {
  const chapters: Record<string, ChapterAttributes> = {};
  for (const [id, markdown] of CHAPTERS) {
    if (!ids.includes(id)) continue;
    const parsed = executeParseAttributes({ markdown });
    expect(parsed.success).toBe(true);
    chapters[id] = parsed.attributes ?? {};
  }
  return chapters;
}

describe('Full Pipeline Integration', () => {
  let store: BinderStore;

  beforeAll(() => {
    resetConfig();
    getLogger().setLevel('silent');
    store = new BinderStore({ defaultTtlMs: 0, maxSize: 10 });
  });

  afterAll(() => {
    store.destroy();
    resetLogger();
  });

  it('should sort a chapter listing', () => {
    const result = executeSortNames({
      text: 'Characters:\nCaptain Bob\nNarrator\nSettings:\nExterior: Dock',
      narrator: 'Kalia',
    });

    expect(result.names).toEqual({
      Characters: ['Captain Bob', 'Kalia'],
      Settings: ['Dock (exterior)'],
    });
  });

  it('should complete full pipeline: parse -> merge -> prompts -> summaries', () => {
    // Step 1: Merge the first two chapters, naming the narrator
    const first = executeMergeAttributes(
      { chapters: parseChapters(['1', '2']), narrator: 'Kalia', book_id: 'harbor' },
      store
    );
    expect(first.success).toBe(true);
    expect(first.chapter_count).toBe(2);

    // Step 2: Merge the rest; the stored narrator carries over
    const second = executeMergeAttributes({ chapters: parseChapters(['3', '4']), book_id: 'harbor' }, store);
    expect(second.success).toBe(true);
    expect(second.chapter_count).toBe(4);
    expect(second.binder).toEqual({
      Characters: {
        'Captain Bob': { Mood: { '1': 'calm', '2': 'angry', '3': 'tired', '4': 'calm' } },
        Kalia: { Thoughts: { '1': 'uneasy', '2': 'hopeful', '4': 'resolved' } },
      },
      Settings: {
        'Dock (exterior)': { Weather: { '1': 'rain' } },
      },
    });

    // Step 3: Only names seen in more than three chapters get prompts
    const prompts = executeBuildPrompts({ book_id: 'harbor' }, store);
    expect(prompts.prompts).toEqual([
      { category: 'Characters', name: 'Captain Bob', prompt: 'Captain Bob: Mood: calm, angry, tired, calm' },
    ]);

    // Step 4: Summaries land in the stored binder
    const summaries = executeAddSummaries(
      { book_id: 'harbor', summaries: [{ category: 'Characters', name: 'Captain Bob', summary: 'A weary harbor captain.' }] },
      store
    );
    expect(summaries.applied).toBe(1);

    const { contents } = readResource(store, 'lorebinder://binder/harbor');
    const binder: unknown = JSON.parse(contents[0]?.text ?? '{}');
    expect(binder).toMatchObject({
      Characters: { 'Captain Bob': { summary: 'A weary harbor captain.' } },
    });
  });

  it('should give the same binder when all chapters arrive at once', () => {
    const once = executeMergeAttributes(
      { chapters: parseChapters(['1', '2', '3', '4']), narrator: 'Kalia' },
      store
    );

    expect(once.binder).toEqual({
      Characters: {
        'Captain Bob': { Mood: { '1': 'calm', '2': 'angry', '3': 'tired', '4': 'calm' } },
        Kalia: { Thoughts: { '1': 'uneasy', '2': 'hopeful', '4': 'resolved' } },
      },
      Settings: {
        'Dock (exterior)': { Weather: { '1': 'rain' } },
      },
    });
  });
});
