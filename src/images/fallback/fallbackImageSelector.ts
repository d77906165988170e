import poolData from './fallback-pools.json';
import { ResolvedImage } from '../types';

export interface FallbackPool {
  name: string;
  keywords: string[];
  urls: string[];
}

export const FALLBACK_ATTRIBUTION = {
  photographer: 'Unsplash',
  photographer_url: 'https://unsplash.com',
} as const;

export const DEFAULT_POOL_NAME = 'scenic';

export const DEFAULT_FALLBACK_POOLS: readonly FallbackPool[] = poolData.pools;

export interface PoolScore {
  pool: FallbackPool;
  score: number;
}

/**
 * Offline, deterministic stand-in for live search. Maps a query to one of
 * the themed pools by keyword hits and hands out their static URLs.
 */
export class FallbackImageSelector {
  constructor(private readonly pools: readonly FallbackPool[] = DEFAULT_FALLBACK_POOLS) {}

  /**
   * Scores every pool by how many of its keywords occur in the query.
   * The result is sorted best-first; ties keep declaration order.
   */
  score(query: string): PoolScore[] {
    const text = query.toLowerCase();
    const scored = this.pools.map(pool => ({
      pool,
      score: pool.keywords.filter(keyword => text.includes(keyword)).length,
    }));
    // Array.prototype.sort is stable, so equal scores stay in declaration order
    return scored.sort((a, b) => b.score - a.score);
  }

  /**
   * Returns up to `count` fallback images. URLs in `exclude` (already used
   * elsewhere in the same resolution) are skipped.
   */
  select(query: string, count: number, exclude: ReadonlySet<string> = new Set()): ResolvedImage[] {
    if (count < 1) return [];

    const ranked = this.score(query);
    const best = ranked[0];
    const primary = best && best.score > 0
      ? best.pool
      : this.pools.find(pool => pool.name === DEFAULT_POOL_NAME) ?? best?.pool;

    const order = primary
      ? [primary, ...ranked.map(entry => entry.pool).filter(pool => pool !== primary)]
      : [];

    const used = new Set(exclude);
    const images: ResolvedImage[] = [];

    for (const pool of order) {
      for (const url of pool.urls) {
        if (used.has(url)) continue;
        used.add(url);
        images.push({ url, ...FALLBACK_ATTRIBUTION });
        if (images.length >= count) return images;
      }
    }

    return images;
  }
}
