/**
 * Parse Attributes Tool
 *
 * Converts a markdown analysis response into the per-chapter attribute map
 * accepted by merge_attributes.
 */

import type { ChapterAttributes, ToolError } from '../types.js';
import { parseAttributeMarkdown } from '../processing/markdown-attributes.js';

export interface ParseAttributesToolInput {
  markdown: string;
}

export interface ParseAttributesToolOutput {
  success: boolean;
  attributes?: ChapterAttributes;
  error?: ToolError;
}

export function executeParseAttributes(input: ParseAttributesToolInput): ParseAttributesToolOutput {
  const attributes = parseAttributeMarkdown(input.markdown);
  if (Object.keys(attributes).length === 0) {
    return {
      success: false,
      error: {
        code: 'NO_ATTRIBUTES',
        message: 'No "# Category" heading found in markdown',
      },
    };
  }
  return { success: true, attributes };
}

export function getParseAttributesInputSchema(): object {
  return {
    type: 'object',
    properties: {
      markdown: {
        type: 'string',
        description: 'Analysis response using "# Category", "## Name", "### Attribute" headings and "- " bullets',
      },
    },
    required: ['markdown'],
  };
}
