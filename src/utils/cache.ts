/**
 * In-memory map with per-entry expiry and a size cap
 */

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface TtlCacheOptions {
  /** 0 keeps entries until evicted */
  defaultTtlMs?: number;
  maxSize?: number;
  cleanupIntervalMs?: number;
  now?: () => number;
}

export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private defaultTtlMs: number;
  private maxSize: number;
  private now: () => number;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: TtlCacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? 60 * 60 * 1000;
    this.maxSize = options.maxSize ?? 50;
    this.now = options.now ?? Date.now;

    const cleanupIntervalMs = options.cleanupIntervalMs ?? 60 * 1000;
    if (cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(() => this.cleanup(), cleanupIntervalMs);
      // never keep the process alive for housekeeping
      this.cleanupTimer.unref();
    }
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  /**
   * Store a value. Re-setting a key moves it to the back of the eviction
   * order; at capacity the least recently written key is evicted.
   */
  set(key: string, value: T, ttlMs?: number): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      this.cleanup();
    }
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    const ttl = ttlMs ?? this.defaultTtlMs;
    this.entries.set(key, {
      value,
      expiresAt: ttl > 0 ? this.now() + ttl : Infinity,
    });
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Live keys, oldest write first
   */
  keys(): string[] {
    this.cleanup();
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() > entry.expiresAt;
  }

  private cleanup(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
      }
    }
  }
}
