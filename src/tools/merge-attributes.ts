/**
 * Merge Attributes Tool
 *
 * Builds a lorebinder from per-chapter attribute maps. With a book_id the
 * chapters are added to that book's stored chapters and the stored binder is
 * rebuilt; without one the merge is stateless.
 */

import type { Lorebinder, ToolError } from '../types.js';
import { getConfig } from '../config.js';
import { isLorebinderError, StructureMismatchError } from '../errors.js';
import { mergerFromConfig, sanitizeChapters } from '../processing/attribute-merger.js';
import { getBinderStore, notifyListChanged, type BinderStore } from '../resources/store.js';
import { buildResourceUri } from '../resources/uri.js';
import { getLogger } from '../utils/logger.js';

export interface MergeAttributesToolInput {
  chapters: unknown;
  narrator?: string;
  book_id?: string;
}

export interface MergeAttributesToolOutput {
  success: boolean;
  binder?: Lorebinder;
  chapter_count?: number;
  book_id?: string;
  resource_uri?: string;
  error?: ToolError;
}

export function executeMergeAttributes(
  input: MergeAttributesToolInput,
  store: BinderStore = getBinderStore()
): MergeAttributesToolOutput {
  const logger = getLogger().child('merge');
  const narrator = input.narrator ?? '';

  try {
    if (input.book_id !== undefined) {
      const { entry, isNew } = store.mergeChapters(input.book_id, input.chapters, narrator);
      if (isNew) {
        notifyListChanged();
      }
      return {
        success: true,
        binder: entry.binder,
        chapter_count: Object.keys(entry.chapters).length,
        book_id: entry.bookId,
        resource_uri: buildResourceUri('binder', entry.bookId),
      };
    }

    const merger = mergerFromConfig(getConfig(), logger);
    const binder = merger.merge(input.chapters, narrator);
    return {
      success: true,
      binder,
      chapter_count: Object.keys(sanitizeChapters(input.chapters)).length,
    };
  } catch (err) {
    logger.error('Merge failed', err, { bookId: input.book_id });
    return { success: false, error: toToolError(err) };
  }
}

function toToolError(err: unknown): ToolError {
  if (err instanceof StructureMismatchError) {
    return { code: err.code, message: err.message, details: { path: err.path } };
  }
  if (isLorebinderError(err)) {
    return { code: err.code, message: err.message };
  }
  return {
    code: 'TOOL_ERROR',
    message: err instanceof Error ? err.message : 'Failed to merge attributes',
  };
}

export function getMergeAttributesInputSchema(): object {
  return {
    type: 'object',
    properties: {
      chapters: {
        type: 'object',
        description: 'Chapter id -> { category -> { name -> { attribute -> value } } }. Values are strings, lists of strings, or nested objects of those.',
        additionalProperties: { type: 'object' },
      },
      narrator: {
        type: 'string',
        description: 'Real name substituted for "narrator", "protagonist" and "main character"',
      },
      book_id: {
        type: 'string',
        description: 'Accumulate these chapters into the stored lorebinder for this book',
      },
    },
    required: ['chapters'],
  };
}
