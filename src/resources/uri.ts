export type ResourceKind = 'binder' | 'prompts';

export const RESOURCE_SCHEME = 'lorebinder';
export const RESOURCE_KINDS: readonly ResourceKind[] = ['binder', 'prompts'];
export const BOOK_ID_PARAM = 'book_id';

function isResourceKind(value: string): value is ResourceKind {
  return value === 'binder' || value === 'prompts';
}

export function buildResourceUri(kind: ResourceKind, bookId: string): string {
  return `${RESOURCE_SCHEME}://${kind}/${encodeURIComponent(bookId)}`;
}

export function buildResourceUriTemplate(kind: ResourceKind, paramName = BOOK_ID_PARAM): string {
  return `${RESOURCE_SCHEME}://${kind}/{${paramName}}`;
}

export function parseResourceUri(uri: string): { kind: ResourceKind; bookId: string } | null {
  try {
    const parsed = new URL(uri);
    if (parsed.protocol !== `${RESOURCE_SCHEME}:`) return null;
    if (parsed.username || parsed.password || parsed.port) return null;
    if (parsed.search || parsed.hash) return null;

    const kind = parsed.hostname;
    if (!isResourceKind(kind)) return null;

    const parts = parsed.pathname.split('/').filter(Boolean);
    if (parts.length !== 1) return null;

    const bookId = decodeURIComponent(parts[0] ?? '');
    if (!bookId) return null;

    return { kind, bookId };
  } catch {
    return null;
  }
}
