import { describe, it, expect, afterEach, vi } from 'vitest';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { BinderStore } from '../../src/resources/store.js';
import {
  RESOURCE_NOT_FOUND,
  listResourceTemplates,
  listResources,
  readResource,
} from '../../src/resources/handlers.js';
import { buildResourceUri, buildResourceUriTemplate, parseResourceUri } from '../../src/resources/uri.js';
import type { ILogger } from '../../src/utils/logger.js';

function createMockLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('resource uris', () => {
  it('builds and parses book uris', () => {
    const uri = buildResourceUri('binder', 'my book');

    expect(uri).toBe('lorebinder://binder/my%20book');
    expect(parseResourceUri(uri)).toEqual({ kind: 'binder', bookId: 'my book' });
    expect(parseResourceUri('lorebinder://prompts/b1')).toEqual({ kind: 'prompts', bookId: 'b1' });
  });

  it('builds templates', () => {
    expect(buildResourceUriTemplate('prompts')).toBe('lorebinder://prompts/{book_id}');
  });

  it.each([
    'http://binder/b1',
    'lorebinder://chapters/b1',
    'lorebinder://binder/',
    'lorebinder://binder/a/b',
    'lorebinder://binder/b1?x=1',
    'not a uri',
  ])('rejects %s', uri => {
    expect(parseResourceUri(uri)).toBeNull();
  });
});

describe('resource handlers', () => {
  let store: BinderStore | null = null;

  function createStore(): BinderStore {
    store = new BinderStore({ defaultTtlMs: 60_000, maxSize: 10, logger: createMockLogger() });
    store.mergeChapters('b1', {
      '1': { Characters: { Bob: { Job: 'baker' } } },
      '2': { Characters: { Ann: { Job: 'sailor' }, Bob: { Mood: 'calm' } } },
    });
    return store;
  }

  afterEach(() => {
    store?.destroy();
    store = null;
  });

  it('lists stored books', () => {
    const { resources } = listResources(createStore());

    expect(resources).toHaveLength(1);
    expect(resources[0]).toMatchObject({
      uri: 'lorebinder://binder/b1',
      name: 'b1',
      title: 'Lorebinder: b1',
      description: '2 names across 2 chapters',
      mimeType: 'application/json',
    });
  });

  it('lists both templates', () => {
    expect(listResourceTemplates().resourceTemplates.map(template => template.uriTemplate)).toEqual([
      'lorebinder://binder/{book_id}',
      'lorebinder://prompts/{book_id}',
    ]);
  });

  it('reads a binder as JSON', () => {
    const { contents } = readResource(createStore(), 'lorebinder://binder/b1');

    expect(contents[0]?.mimeType).toBe('application/json');
    expect(JSON.parse(contents[0]?.text ?? '')).toEqual({
      Characters: {
        Ann: { Job: { '2': 'sailor' } },
        Bob: { Job: { '1': 'baker' }, Mood: { '2': 'calm' } },
      },
    });
  });

  it('reads prompts with the given threshold', () => {
    const { contents } = readResource(createStore(), 'lorebinder://prompts/b1', { threshold: 1 });

    expect(JSON.parse(contents[0]?.text ?? '')).toEqual([
      { category: 'Characters', name: 'Bob', prompt: 'Bob: Job: baker; Mood: calm' },
    ]);
  });

  it('rejects unknown books and uris', () => {
    const binders = createStore();

    for (const uri of ['lorebinder://binder/missing', 'lorebinder://other/b1']) {
      try {
        readResource(binders, uri);
        throw new Error('expected not found');
      } catch (err) {
        expect(err).toBeInstanceOf(McpError);
        if (err instanceof McpError) {
          expect(err.code).toBe(RESOURCE_NOT_FOUND);
        }
      }
    }
  });
});
