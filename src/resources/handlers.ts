import type { Resource, ResourceTemplate, TextResourceContents } from '@modelcontextprotocol/sdk/types.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { buildPrompts } from '../processing/prompt-builder.js';
import type { PromptOptions } from '../types.js';
import type { BinderEntry, BinderStore } from './store.js';
import { buildResourceUri, buildResourceUriTemplate, parseResourceUri, type ResourceKind } from './uri.js';

export const RESOURCE_NOT_FOUND = -32002;

const JSON_MIME_TYPE = 'application/json';

const RESOURCE_TEMPLATES: Array<{
  kind: ResourceKind;
  name: string;
  title: string;
  description: string;
}> = [
  {
    kind: 'binder',
    name: 'lorebinder-binder',
    title: 'Lorebinder',
    description: 'Merged category > name > attribute > chapter structure for a book.',
  },
  {
    kind: 'prompts',
    name: 'lorebinder-prompts',
    title: 'Lorebinder Summary Prompts',
    description: 'Summarization prompts for names that appear in enough chapters.',
  },
];

export function listResources(store: BinderStore): { resources: Resource[] } {
  const resources = store.list().map(entry => buildResource(entry));
  return { resources };
}

export function listResourceTemplates(): { resourceTemplates: ResourceTemplate[] } {
  return {
    resourceTemplates: RESOURCE_TEMPLATES.map(template => ({
      uriTemplate: buildResourceUriTemplate(template.kind),
      name: template.name,
      title: template.title,
      description: template.description,
      mimeType: JSON_MIME_TYPE,
    })),
  };
}

export function readResource(
  store: BinderStore,
  uri: string,
  promptOptions: PromptOptions = {}
): { contents: TextResourceContents[] } {
  const parsed = parseResourceUri(uri);
  if (!parsed) {
    throw resourceNotFound(uri);
  }

  const entry = store.get(parsed.bookId);
  if (!entry) {
    throw resourceNotFound(uri);
  }

  switch (parsed.kind) {
    case 'binder':
      return {
        contents: [{ uri, mimeType: JSON_MIME_TYPE, text: JSON.stringify(entry.binder, null, 2) }],
      };
    case 'prompts':
      return {
        contents: [
          {
            uri,
            mimeType: JSON_MIME_TYPE,
            text: JSON.stringify([...buildPrompts(entry.binder, promptOptions)], null, 2),
          },
        ],
      };
  }
}

function buildResource(entry: BinderEntry): Resource {
  const chapterCount = Object.keys(entry.chapters).length;
  const nameCount = Object.values(entry.binder).reduce((sum, names) => sum + Object.keys(names).length, 0);

  return {
    uri: buildResourceUri('binder', entry.bookId),
    name: entry.bookId,
    title: `Lorebinder: ${entry.bookId}`,
    description: `${nameCount} names across ${chapterCount} chapters`,
    mimeType: JSON_MIME_TYPE,
    annotations: {
      lastModified: entry.updatedAt,
    },
  };
}

function resourceNotFound(uri: string): McpError {
  return new McpError(RESOURCE_NOT_FOUND, 'Resource not found', { uri });
}
