/**
 * Add Summaries Tool
 *
 * Stores summarizer output under the "summary" attribute of each name.
 */

import type { Lorebinder, SummaryInput, ToolError } from '../types.js';
import { sanitizeBinder } from '../processing/attribute-merger.js';
import { applySummaries } from '../processing/summaries.js';
import { getBinderStore, type BinderStore } from '../resources/store.js';
import { getLogger } from '../utils/logger.js';

export interface AddSummariesToolInput {
  binder?: unknown;
  book_id?: string;
  summaries: SummaryInput[];
}

export interface AddSummariesToolOutput {
  success: boolean;
  binder?: Lorebinder;
  applied?: number;
  skipped?: SummaryInput[];
  error?: ToolError;
}

export function executeAddSummaries(
  input: AddSummariesToolInput,
  store: BinderStore = getBinderStore()
): AddSummariesToolOutput {
  if (input.book_id !== undefined) {
    const update = store.addSummaries(input.book_id, input.summaries);
    if (!update) {
      return {
        success: false,
        error: { code: 'BOOK_NOT_FOUND', message: `No lorebinder stored for book ${input.book_id}` },
      };
    }
    return { success: true, binder: update.entry.binder, applied: update.applied, skipped: update.skipped };
  }

  const binder = sanitizeBinder(input.binder, getLogger().child('summaries'));
  const result = applySummaries(binder, input.summaries);
  return { success: true, binder: result.binder, applied: result.applied, skipped: result.skipped };
}

export function getAddSummariesInputSchema(): object {
  return {
    type: 'object',
    properties: {
      binder: {
        type: 'object',
        description: 'Lorebinder to update. Ignored when book_id is given.',
      },
      book_id: {
        type: 'string',
        description: 'Update the stored lorebinder of this book',
      },
      summaries: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            category: { type: 'string' },
            name: { type: 'string' },
            summary: { type: 'string' },
          },
          required: ['category', 'name', 'summary'],
        },
      },
    },
    required: ['summaries'],
  };
}
