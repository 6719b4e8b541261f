/**
 * Build Prompts Tool
 *
 * Summarization prompts for every name that appears in more chapters than
 * the threshold.
 */

import type { PromptTuple, ToolError } from '../types.js';
import { getConfig } from '../config.js';
import { sanitizeBinder } from '../processing/attribute-merger.js';
import { buildPrompts } from '../processing/prompt-builder.js';
import { getBinderStore, type BinderStore } from '../resources/store.js';
import { getLogger } from '../utils/logger.js';

export interface BuildPromptsToolInput {
  binder?: unknown;
  book_id?: string;
  threshold?: number;
}

export interface BuildPromptsToolOutput {
  success: boolean;
  prompts?: PromptTuple[];
  threshold?: number;
  error?: ToolError;
}

export function executeBuildPrompts(
  input: BuildPromptsToolInput,
  store: BinderStore = getBinderStore()
): BuildPromptsToolOutput {
  const threshold = input.threshold ?? getConfig().promptChapterThreshold;

  if (input.book_id !== undefined) {
    const entry = store.get(input.book_id);
    if (!entry) {
      return {
        success: false,
        error: { code: 'BOOK_NOT_FOUND', message: `No lorebinder stored for book ${input.book_id}` },
      };
    }
    return { success: true, prompts: [...buildPrompts(entry.binder, { threshold })], threshold };
  }

  const binder = sanitizeBinder(input.binder, getLogger().child('prompts'));
  return { success: true, prompts: [...buildPrompts(binder, { threshold })], threshold };
}

export function getBuildPromptsInputSchema(): object {
  return {
    type: 'object',
    properties: {
      binder: {
        type: 'object',
        description: 'Lorebinder as returned by merge_attributes. Ignored when book_id is given.',
      },
      book_id: {
        type: 'string',
        description: 'Use the stored lorebinder of this book',
      },
      threshold: {
        type: 'integer',
        minimum: 0,
        description: 'Names must appear in more than this many chapters',
        default: 3,
      },
    },
  };
}
