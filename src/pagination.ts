import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

export type PaginationResult<T> = {
    items: T[];
    nextCursor?: string;
};

export const DEFAULT_PAGE_SIZE = 50;

/**
 * Slice a list for an MCP list request. Cursors are opaque base64url
 * offsets; a cursor past the end of the list is rejected.
 */
export function paginateResults<T>(
    items: T[],
    cursor: string | undefined,
    pageSize = DEFAULT_PAGE_SIZE
): PaginationResult<T> {
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
        throw new McpError(ErrorCode.InvalidParams, 'Page size must be a positive integer');
    }

    const offset = cursor ? decodeCursor(cursor) : 0;
    if (offset > items.length) {
        throw new McpError(ErrorCode.InvalidParams, 'Invalid cursor');
    }

    const end = Math.min(items.length, offset + pageSize);
    const page = items.slice(offset, end);

    return end >= items.length ? { items: page } : { items: page, nextCursor: encodeCursor(end) };
}

export function encodeCursor(offset: number): string {
    return Buffer.from(`offset:${offset}`, 'utf8').toString('base64url');
}

function decodeCursor(cursor: string): number {
    const decoded = Buffer.from(cursor, 'base64url').toString('utf8');
    const match = /^offset:(\d+)$/.exec(decoded);
    if (!match) {
        throw new McpError(ErrorCode.InvalidParams, 'Invalid cursor');
    }
    return Number(match[1]);
}
