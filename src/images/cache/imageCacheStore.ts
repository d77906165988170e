import { CachedImage, CacheWriteResult, ResolvedImage } from '../types';

/**
 * Persistent mapping of (query, rank) to a cached image.
 *
 * `lookup` never fails; a read fault is reported as an empty result.
 * `replace` swaps the whole set of rows for a query in one step and never
 * throws: a failed write leaves the previous generation in place and is
 * reported as `unchanged`.
 */
export interface ImageCacheStore {
  readonly kind: 'postgres' | 'memory';
  lookup(query: string, count: number): Promise<CachedImage[]>;
  replace(query: string, images: ResolvedImage[]): Promise<CacheWriteResult>;
}

export function toCachedRows(query: string, images: ResolvedImage[], cachedAt: Date): CachedImage[] {
  return images.map((image, rank) => ({
    query,
    rank,
    url: image.url,
    photographer: image.photographer || '',
    photographerUrl: image.photographer_url || '',
    cachedAt,
  }));
}

export const DEFAULT_MEMORY_CACHE_QUERIES = 500;

/**
 * In-process store used when no database is configured. Each query maps to
 * a frozen generation that is replaced by reference, so readers never see a
 * half-written set. At most `maxQueries` queries are held; the least recently
 * written one is evicted first.
 */
export class MemoryImageCacheStore implements ImageCacheStore {
  readonly kind = 'memory' as const;
  private generations = new Map<string, readonly CachedImage[]>();

  constructor(private readonly maxQueries: number = DEFAULT_MEMORY_CACHE_QUERIES) {}

  get size(): number {
    return this.generations.size;
  }

  async lookup(query: string, count: number): Promise<CachedImage[]> {
    const rows = this.generations.get(query) ?? [];
    return rows.slice(0, Math.max(0, count));
  }

  async replace(query: string, images: ResolvedImage[]): Promise<CacheWriteResult> {
    // Re-inserting moves the query to the newest position in Map order
    this.generations.delete(query);
    this.generations.set(query, Object.freeze(toCachedRows(query, images, new Date())));

    while (this.generations.size > Math.max(1, this.maxQueries)) {
      const oldest = this.generations.keys().next();
      if (oldest.done) break;
      this.generations.delete(oldest.value);
    }

    return { status: 'written', count: images.length };
  }
}
