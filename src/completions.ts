import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { BinderStore } from './resources/store.js';
import { BOOK_ID_PARAM, RESOURCE_KINDS, RESOURCE_SCHEME } from './resources/uri.js';
import { getOwn } from './utils/records.js';

const COMPLETION_LIMIT = 100;
const TEMPLATE_REF_PATTERN = new RegExp(`^${RESOURCE_SCHEME}://([^/]+)/\\{([^}]+)\\}$`);
const URI_REF_PATTERN = new RegExp(`^${RESOURCE_SCHEME}://([^/]+)/([^/?#]+)$`);

/** Fixed suggestions per prompt argument */
const ARGUMENT_SUGGESTIONS: Record<string, Record<string, string[]>> = {
    summarize_binder: {
        threshold: ['2', '3', '5', '10'],
    },
};

export type CompletionParams = {
    ref: { type: 'ref/prompt'; name: string } | { type: 'ref/resource'; uri: string };
    argument: { name: string; value: string };
    context?: { arguments?: Record<string, string> };
};

export type CompletionResult = {
    completion: {
        values: string[];
        total?: number;
        hasMore?: boolean;
    };
};

export type CompletionOptions = {
    prompts: Array<{ name: string }>;
    binderStore: BinderStore;
};

/**
 * Book ids are offered wherever a `book_id` is asked for, whether by a
 * prompt argument or a lorebinder resource template.
 */
export function buildCompletionResult(
    params: CompletionParams,
    options: CompletionOptions
): CompletionResult {
    const argument = expectString(params.argument.name, 'argument.name');
    const partial = expectString(params.argument.value, 'argument.value');
    return toCompletion(candidatesFor(params.ref, argument, options), partial);
}

function candidatesFor(ref: CompletionParams['ref'], argument: string, options: CompletionOptions): string[] {
    if (ref.type === 'ref/resource') {
        const param = bookParamOf(expectString(ref.uri, 'ref.uri'));
        return param === argument ? storedBookIds(options.binderStore) : [];
    }

    const prompt = expectString(ref.name, 'ref.name');
    if (!options.prompts.some(known => known.name === prompt)) {
        throw new McpError(ErrorCode.InvalidParams, `Prompt ${prompt} not found`);
    }
    if (argument === BOOK_ID_PARAM) {
        return storedBookIds(options.binderStore);
    }
    const suggestions = getOwn(ARGUMENT_SUGGESTIONS, prompt);
    return (suggestions && getOwn(suggestions, argument)) ?? [];
}

function toCompletion(candidates: string[], partial: string): CompletionResult {
    const matches = matchCandidates(candidates, partial);
    const values = matches.slice(0, COMPLETION_LIMIT);
    return {
        completion: {
            values,
            total: matches.length || undefined,
            hasMore: matches.length > values.length || undefined,
        },
    };
}

/**
 * Case-insensitive substring match ordered by where the match starts, then
 * by length. Without input every candidate is returned in its own order.
 */
function matchCandidates(candidates: string[], partial: string): string[] {
    const unique = [...new Set(candidates)];
    const needle = partial.trim().toLowerCase();
    if (!needle) return unique;

    const ranked: Array<{ value: string; at: number }> = [];
    for (const value of unique) {
        const at = value.toLowerCase().indexOf(needle);
        if (at !== -1) ranked.push({ value, at });
    }
    ranked.sort((a, b) => a.at - b.at || a.value.length - b.value.length || a.value.localeCompare(b.value));
    return ranked.map(entry => entry.value);
}

/**
 * The book id parameter named by a lorebinder template or URI; null for
 * anything else.
 */
function bookParamOf(uri: string): string | null {
    const template = TEMPLATE_REF_PATTERN.exec(uri);
    if (template) {
        return isResourceKind(template[1]) ? template[2] ?? null : null;
    }
    const concrete = URI_REF_PATTERN.exec(uri);
    return concrete && isResourceKind(concrete[1]) ? BOOK_ID_PARAM : null;
}

function isResourceKind(kind: string | undefined): boolean {
    return RESOURCE_KINDS.some(known => known === kind);
}

function storedBookIds(store: BinderStore): string[] {
    return store.list().map(entry => entry.bookId);
}

function expectString(value: unknown, label: string): string {
    if (typeof value !== 'string') {
        throw new McpError(ErrorCode.InvalidParams, `${label} must be a string`);
    }
    return value;
}
