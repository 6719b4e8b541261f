/**
 * Sort Names Tool
 *
 * Turns one chapter's raw entity listing into categorized canonical names.
 */

import type { CategorizedNames, ToolError } from '../types.js';
import { getConfig } from '../config.js';
import { NameSorter } from '../processing/name-sorter.js';
import { vocabularyFromConfig } from '../processing/vocabulary.js';
import { getLogger } from '../utils/logger.js';

export interface SortNamesToolInput {
  text: string;
  narrator?: string;
}

export interface SortNamesToolOutput {
  success: boolean;
  names?: CategorizedNames;
  error?: ToolError;
}

export function executeSortNames(input: SortNamesToolInput): SortNamesToolOutput {
  try {
    const sorter = new NameSorter({
      vocabulary: vocabularyFromConfig(getConfig()),
      logger: getLogger().child('sort'),
    });
    return {
      success: true,
      names: sorter.sort(input.text, input.narrator ?? ''),
    };
  } catch (err) {
    return {
      success: false,
      error: {
        code: 'TOOL_ERROR',
        message: err instanceof Error ? err.message : 'Failed to sort names',
      },
    };
  }
}

export function getSortNamesInputSchema(): object {
  return {
    type: 'object',
    properties: {
      text: {
        type: 'string',
        description: 'Raw entity listing for one chapter, e.g. "Characters:\\nBob\\nSettings:\\nKitchen (interior)"',
      },
      narrator: {
        type: 'string',
        description: 'Name of the first-person narrator. Narrator placeholders are replaced with it, or dropped when omitted.',
      },
    },
    required: ['text'],
  };
}
