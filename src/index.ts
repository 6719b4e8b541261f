#!/usr/bin/env node

/**
 * lorebinder-mcp
 *
 * MCP server that turns per-chapter entity extractions into a cross-chapter
 * lorebinder: sorted names, merged attributes and summarization prompts.
 * The server never calls a model; the client does and feeds the results in.
 */

import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  CompleteRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';

import { getConfig, validateConfig } from './config.js';
import type { SummaryInput } from './types.js';
import { executeSortNames, getSortNamesInputSchema } from './tools/sort-names.js';
import { executeParseAttributes, getParseAttributesInputSchema } from './tools/parse-attributes.js';
import { executeMergeAttributes, getMergeAttributesInputSchema } from './tools/merge-attributes.js';
import { executeBuildPrompts, getBuildPromptsInputSchema } from './tools/build-prompts.js';
import { executeAddSummaries, getAddSummariesInputSchema } from './tools/add-summaries.js';
import { listResources, listResourceTemplates, readResource } from './resources/handlers.js';
import { getBinderStore, resetBinderStore, setResourceListChangedNotifier } from './resources/store.js';
import { buildCompletionResult } from './completions.js';
import { paginateResults } from './pagination.js';
import { getLogger } from './utils/logger.js';

const PROMPTS = [
  {
    name: 'build_lorebinder',
    title: 'Build Lorebinder',
    description: 'Step-by-step tool workflow for turning chapters into a lorebinder',
    arguments: [
      { name: 'book_id', description: 'Id under which the lorebinder is stored', required: true },
      { name: 'narrator', description: 'Name of the first-person narrator, if any', required: false },
    ],
  },
  {
    name: 'summarize_binder',
    title: 'Summarize Lorebinder',
    description: 'Generate summaries for well-covered names and store them',
    arguments: [
      { name: 'book_id', description: 'Id of a stored lorebinder', required: true },
      { name: 'threshold', description: 'Minimum chapter count to exceed', required: false },
    ],
  },
];

const PROMPT_MAP = new Map(PROMPTS.map(prompt => [prompt.name, prompt]));

function getArgs(
  args: Record<string, string> | undefined,
  required: string[]
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const key of required) {
    const value = args?.[key];
    if (!value || value.trim() === '') {
      throw new McpError(ErrorCode.InvalidParams, `Missing required argument: ${key}`);
    }
  }
  if (args) {
    for (const [key, value] of Object.entries(args)) {
      resolved[key] = value;
    }
  }
  return resolved;
}

function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be an object`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new McpError(ErrorCode.InvalidParams, `Missing required parameter: ${label}`);
  }
  return value;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new McpError(ErrorCode.InvalidParams, `${label} must be a string`);
  }
  return value;
}

function optionalThreshold(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new McpError(ErrorCode.InvalidParams, 'threshold must be a non-negative integer');
  }
  return value;
}

/**
 * Exactly one of binder and book_id
 */
function requireBinderSource(argsObject: Record<string, unknown>): { binder?: unknown; book_id?: string } {
  const bookId = optionalString(argsObject['book_id'], 'book_id');
  const binder = argsObject['binder'];
  if (bookId !== undefined) {
    return { book_id: bookId };
  }
  return { binder: requireRecord(binder, 'binder (or book_id)') };
}

function requireSummaries(value: unknown): SummaryInput[] {
  if (!Array.isArray(value)) {
    throw new McpError(ErrorCode.InvalidParams, 'summaries must be an array');
  }
  return value.map((item: unknown, index) => {
    const record = requireRecord(item, `summaries[${index}]`);
    return {
      category: requireString(record['category'], `summaries[${index}].category`),
      name: requireString(record['name'], `summaries[${index}].name`),
      summary: optionalString(record['summary'], `summaries[${index}].summary`) ?? '',
    };
  });
}

function buildLorebinderPrompt(args: Record<string, string>): string {
  const bookId = args['book_id'] ?? '';
  const narrator = args['narrator'];
  const mergePayload: Record<string, unknown> = {
    book_id: bookId,
    chapters: { '<chapter id>': '<parse_attributes result.attributes>' },
  };
  if (narrator) {
    mergePayload['narrator'] = narrator;
  }

  return [
    'For each chapter of the book, in any order:',
    '',
    `1) Ask the model to list the chapter's characters, settings and other named entities under "Category:" headers, then call \`sort_names\` with the listing${narrator ? ` and narrator "${narrator}"` : ''}.`,
    '',
    '2) Ask the model to describe each sorted name as markdown ("# Category", "## Name", "### Attribute", "- value") and call `parse_attributes` on the response.',
    '',
    '3) Call `merge_attributes` with:',
    '```json',
    JSON.stringify(mergePayload, null, 2),
    '```',
    '',
    `The merged lorebinder is readable at lorebinder://binder/${bookId}.`,
  ].join('\n');
}

function buildSummarizeBinderPrompt(args: Record<string, string>): string {
  const bookId = args['book_id'] ?? '';
  const threshold = args['threshold'];
  const promptsPayload: Record<string, unknown> = { book_id: bookId };
  if (threshold && Number.isInteger(Number(threshold))) {
    promptsPayload['threshold'] = Number(threshold);
  }

  return [
    '1) Call `build_prompts` with:',
    '```json',
    JSON.stringify(promptsPayload, null, 2),
    '```',
    '',
    '2) For each returned prompt, write a short summary of the name from its description.',
    '',
    '3) Call `add_summaries` with:',
    '```json',
    JSON.stringify({ book_id: bookId, summaries: [{ category: '<category>', name: '<name>', summary: '<text>' }] }, null, 2),
    '```',
  ].join('\n');
}

const TOOLS = [
  {
    name: 'sort_names',
    description: `Sort one chapter's raw entity listing into categories of canonical names.

Repairs malformed model output: misspelled or glued headers, comma lists, numbering, "interior:"/"exterior:" prefixes.
Merges spelling variants ("Jon" into "Jonathan") and replaces narrator placeholders with the narrator's name.
Always returns "Characters" and "Settings".`,
    inputSchema: getSortNamesInputSchema(),
  },
  {
    name: 'parse_attributes',
    description: `Parse a markdown analysis response ("# Category", "## Name", "### Attribute", "- value") into the attribute map for one chapter.`,
    inputSchema: getParseAttributesInputSchema(),
  },
  {
    name: 'merge_attributes',
    description: `Merge per-chapter attribute maps into a lorebinder: category > name > attribute > chapter > value.

Removes "None found" values, merges near-duplicate names ("The Captain" into "Captain Ahab"), sorts every level and substitutes the narrator's name.
With book_id, chapters accumulate across calls and the result is stored as lorebinder://binder/{book_id}.`,
    inputSchema: getMergeAttributesInputSchema(),
  },
  {
    name: 'build_prompts',
    description: `Build one summarization prompt per name that appears in more than threshold chapters (default 3).

Each prompt reads "<name>: <attribute>: <traits>; <attribute>: <traits>".`,
    inputSchema: getBuildPromptsInputSchema(),
  },
  {
    name: 'add_summaries',
    description: `Store summaries under each name's "summary" attribute. Unknown names are reported as skipped.`,
    inputSchema: getAddSummariesInputSchema(),
  },
];

const SERVER_INSTRUCTIONS = [
  'Workflow: sort_names -> (model describes names) -> parse_attributes -> merge_attributes -> build_prompts -> (model summarizes) -> add_summaries.',
  '',
  'Pass book_id to merge_attributes to accumulate chapters across calls. Stored lorebinders are MCP resources:',
  '  lorebinder://binder/{book_id}  → lorebinder JSON',
  '  lorebinder://prompts/{book_id} → summarization prompts JSON',
].join('\n');

function textResult(result: { success: boolean }): { content: Array<{ type: 'text'; text: string }>; isError: boolean } {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = getConfig();
  const logger = getLogger();
  logger.setLevel(config.logLevel);

  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    logger.error('Configuration errors', undefined, { errors: configErrors });
    process.exit(1);
  }

  const server = new Server(
    {
      name: 'lorebinder-mcp',
      version: '1.0.0',
    },
    {
      capabilities: {
        tools: {
          listChanged: false,
        },
        completions: {},
        prompts: {
          listChanged: false,
        },
        resources: {
          listChanged: true,
        },
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  setResourceListChangedNotifier(() => server.sendResourceListChanged());

  server.setRequestHandler(ListToolsRequestSchema, async (request) => {
    const { items, nextCursor } = paginateResults(TOOLS, request.params?.cursor);
    return {
      tools: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async (request) => {
    const { items, nextCursor } = paginateResults(PROMPTS, request.params?.cursor);
    return {
      prompts: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(CompleteRequestSchema, async (request) => {
    return buildCompletionResult(request.params, {
      prompts: PROMPTS,
      binderStore: getBinderStore(),
    });
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const prompt = PROMPT_MAP.get(name);
    if (!prompt) {
      throw new McpError(ErrorCode.InvalidParams, `Prompt ${name} not found`);
    }

    const resolved = getArgs(args, prompt.arguments.filter(arg => arg.required).map(arg => arg.name));
    const text = name === 'build_lorebinder'
      ? buildLorebinderPrompt(resolved)
      : buildSummarizeBinderPrompt(resolved);

    return {
      description: prompt.description,
      messages: [
        {
          role: 'user',
          content: { type: 'text', text },
        },
      ],
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, async (request) => {
    const { resources } = listResources(getBinderStore());
    const { items, nextCursor } = paginateResults(resources, request.params?.cursor);
    return {
      resources: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async (request) => {
    const { resourceTemplates } = listResourceTemplates();
    const { items, nextCursor } = paginateResults(resourceTemplates, request.params?.cursor);
    return {
      resourceTemplates: items,
      ...(nextCursor ? { nextCursor } : {}),
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    return readResource(getBinderStore(), request.params.uri, { threshold: config.promptChapterThreshold });
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const argsObject = requireRecord(args, 'arguments');
      switch (name) {
        case 'sort_names':
          return textResult(executeSortNames({
            text: optionalString(argsObject['text'], 'text') ?? '',
            narrator: optionalString(argsObject['narrator'], 'narrator'),
          }));

        case 'parse_attributes':
          return textResult(executeParseAttributes({
            markdown: requireString(argsObject['markdown'], 'markdown'),
          }));

        case 'merge_attributes':
          return textResult(executeMergeAttributes({
            chapters: requireRecord(argsObject['chapters'], 'chapters'),
            narrator: optionalString(argsObject['narrator'], 'narrator'),
            book_id: optionalString(argsObject['book_id'], 'book_id'),
          }));

        case 'build_prompts':
          return textResult(executeBuildPrompts({
            ...requireBinderSource(argsObject),
            threshold: optionalThreshold(argsObject['threshold']),
          }));

        case 'add_summaries':
          return textResult(executeAddSummaries({
            ...requireBinderSource(argsObject),
            summaries: requireSummaries(argsObject['summaries']),
          }));

        default:
          throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${name}`);
      }
    } catch (err) {
      if (err instanceof McpError) {
        throw err;
      }
      logger.error('Tool failed', err, { tool: name });
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: {
                code: 'TOOL_ERROR',
                message: err instanceof Error ? err.message : 'Unknown error',
              },
            }),
          },
        ],
        isError: true,
      };
    }
  });

  const shutdown = (): void => {
    logger.info('Shutting down...');
    resetBinderStore();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('lorebinder-mcp server started');
}

main().catch((err: unknown) => {
  getLogger().error('Fatal error', err);
  process.exit(1);
});
