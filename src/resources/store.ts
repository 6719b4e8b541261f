import type { BookChapters, Lorebinder, SummaryInput } from '../types.js';
import { getConfig } from '../config.js';
import { AttributeMerger, mergerFromConfig, sanitizeChapters } from '../processing/attribute-merger.js';
import { applySummaries } from '../processing/summaries.js';
import { TtlCache } from '../utils/cache.js';
import { getLogger, type ILogger } from '../utils/logger.js';

export interface BinderEntry {
  bookId: string;
  narrator: string;
  /** every chapter merged so far, sanitized */
  chapters: BookChapters;
  /** latest applied summary per name, reapplied after each merge */
  summaries: SummaryInput[];
  binder: Lorebinder;
  updatedAt: string;
}

export interface BinderUpdate {
  entry: BinderEntry;
  isNew: boolean;
}

export interface SummaryUpdate extends BinderUpdate {
  applied: number;
  skipped: SummaryInput[];
}

type ListChangedNotifier = () => void | Promise<void>;

/**
 * Per-book lorebinders held in memory for the lifetime of the server.
 *
 * Each merge adds the new chapters to the book's accumulated chapters and
 * rebuilds the binder from all of them, so feeding chapters in batches gives
 * the same binder as feeding them at once. A merge that throws leaves the
 * stored entry untouched.
 */
export class BinderStore {
  private cache: TtlCache<BinderEntry>;
  private merger: AttributeMerger;
  private logger: ILogger;

  constructor(options: { defaultTtlMs: number; maxSize: number; merger?: AttributeMerger; logger?: ILogger }) {
    this.cache = new TtlCache({
      defaultTtlMs: options.defaultTtlMs,
      maxSize: options.maxSize,
    });
    this.merger = options.merger ?? new AttributeMerger();
    this.logger = options.logger ?? getLogger();
  }

  /**
   * @param narrator - replaces the stored narrator when non-empty
   * @throws StructureMismatchError from the merge
   */
  mergeChapters(bookId: string, chapters: unknown, narrator = ''): BinderUpdate {
    const existing = this.get(bookId);
    const accumulated: BookChapters = {
      ...existing?.chapters,
      ...sanitizeChapters(chapters, this.logger),
    };
    const bookNarrator = narrator.trim() || existing?.narrator || '';
    const summaries = existing?.summaries ?? [];

    const merged = this.merger.merge(accumulated, bookNarrator);
    const binder = summaries.length > 0 ? applySummaries(merged, summaries).binder : merged;

    const entry: BinderEntry = {
      bookId,
      narrator: bookNarrator,
      chapters: accumulated,
      summaries,
      binder,
      updatedAt: new Date().toISOString(),
    };
    this.cache.set(bookId, entry);
    this.logger.debug('Stored binder', { bookId, chapters: Object.keys(accumulated).length });
    return { entry, isNew: existing === undefined };
  }

  /**
   * Write summaries into a stored book. Returns undefined for unknown books.
   */
  addSummaries(bookId: string, summaries: readonly SummaryInput[]): SummaryUpdate | undefined {
    const existing = this.get(bookId);
    if (!existing) return undefined;

    const result = applySummaries(existing.binder, summaries);
    const applied = summaries.filter(item => item.summary.trim() !== '' && !result.skipped.includes(item));
    const entry: BinderEntry = {
      ...existing,
      summaries: latestSummaries([...existing.summaries, ...applied]),
      binder: result.binder,
      updatedAt: new Date().toISOString(),
    };
    this.cache.set(bookId, entry);
    return { entry, isNew: false, applied: result.applied, skipped: result.skipped };
  }

  get(bookId: string): BinderEntry | undefined {
    return this.cache.get(bookId);
  }

  /**
   * Live entries, most recently updated first
   */
  list(): BinderEntry[] {
    const entries: BinderEntry[] = [];
    for (const key of this.cache.keys()) {
      const entry = this.cache.get(key);
      if (entry) entries.push(entry);
    }

    return entries.sort((a, b) => {
      if (a.updatedAt !== b.updatedAt) {
        return a.updatedAt < b.updatedAt ? 1 : -1;
      }
      return a.bookId.localeCompare(b.bookId);
    });
  }

  clear(): void {
    this.cache.clear();
  }

  destroy(): void {
    this.cache.destroy();
  }
}

/**
 * The last summary per category and name, in first-written order.
 */
function latestSummaries(summaries: readonly SummaryInput[]): SummaryInput[] {
  const byTarget = new Map<string, SummaryInput>();
  for (const item of summaries) {
    byTarget.set(JSON.stringify([item.category, item.name]), item);
  }
  return [...byTarget.values()];
}

let binderStore: BinderStore | null = null;
let listChangedNotifier: ListChangedNotifier | null = null;

export function getBinderStore(): BinderStore {
  if (!binderStore) {
    const config = getConfig();
    binderStore = new BinderStore({
      defaultTtlMs: Math.max(0, config.binderTtlS) * 1000,
      maxSize: config.binderStoreSize,
      merger: mergerFromConfig(config, getLogger().child('merge')),
    });
  }
  return binderStore;
}

export function resetBinderStore(): void {
  if (binderStore) {
    binderStore.destroy();
    binderStore = null;
  }
}

export function setResourceListChangedNotifier(notifier: ListChangedNotifier | null): void {
  listChangedNotifier = notifier;
}

export function notifyListChanged(): void {
  if (!listChangedNotifier) return;
  try {
    const result = listChangedNotifier();
    if (result instanceof Promise) {
      void result.catch((err: unknown) => getLogger().warn('Resource list notification failed', { error: String(err) }));
    }
  } catch (err) {
    getLogger().warn('Resource list notification failed', { error: String(err) });
  }
}
