import { Pool, PoolClient } from 'pg';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errorHandler';
import { CachedImage, CacheWriteResult, ResolvedImage } from '../types';
import { ImageCacheStore } from './imageCacheStore';

type CacheRow = {
  query: string;
  image_index: number;
  image_url: string;
  photographer: string | null;
  photographer_url: string | null;
  cached_at: Date | string;
};

export const CREATE_IMAGE_CACHE_TABLE = `
  CREATE TABLE IF NOT EXISTS image_cache (
    id SERIAL PRIMARY KEY,
    query TEXT NOT NULL,
    image_index INTEGER NOT NULL DEFAULT 0,
    image_url TEXT NOT NULL,
    photographer TEXT,
    photographer_url TEXT,
    cached_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (query, image_index)
  )`;

export const SELECT_CACHED_IMAGES =
  'SELECT query, image_index, image_url, photographer, photographer_url, cached_at FROM image_cache WHERE query = $1 ORDER BY image_index LIMIT $2';

export const DELETE_CACHED_IMAGES = 'DELETE FROM image_cache WHERE query = $1';

export const INSERT_CACHED_IMAGE =
  'INSERT INTO image_cache (query, image_index, image_url, photographer, photographer_url) VALUES ($1, $2, $3, $4, $5)';

function fromRow(row: CacheRow): CachedImage {
  return {
    query: row.query,
    rank: row.image_index,
    url: row.image_url,
    photographer: row.photographer ?? '',
    photographerUrl: row.photographer_url ?? '',
    cachedAt: row.cached_at instanceof Date ? row.cached_at : new Date(row.cached_at),
  };
}

export class PgImageCacheStore implements ImageCacheStore {
  readonly kind = 'postgres' as const;

  constructor(private readonly pool: Pool) {}

  /**
   * Creates the image_cache table if it does not exist yet.
   */
  async init(): Promise<void> {
    await this.pool.query(CREATE_IMAGE_CACHE_TABLE);
  }

  async lookup(query: string, count: number): Promise<CachedImage[]> {
    if (count < 1) return [];

    try {
      const { rows } = await this.pool.query<CacheRow>(SELECT_CACHED_IMAGES, [query, count]);
      return rows.map(fromRow);
    } catch (error) {
      logger.warn(`[ImageCache] Lookup failed for "${query}": ${describeError(error)}`);
      return [];
    }
  }

  async replace(query: string, images: ResolvedImage[]): Promise<CacheWriteResult> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      logger.error(`[ImageCache] Could not acquire a connection for "${query}": ${describeError(error)}`);
      return { status: 'unchanged', reason: describeError(error) };
    }

    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN');
      await client.query(DELETE_CACHED_IMAGES, [query]);
      for (const [index, image] of images.entries()) {
        await client.query(INSERT_CACHED_IMAGE, [
          query,
          index,
          image.url,
          image.photographer || '',
          image.photographer_url || '',
        ]);
      }
      await client.query('COMMIT');
      return { status: 'written', count: images.length };
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        // The connection is in an unknown state; have the pool discard it
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logger.error(`[ImageCache] Rollback failed for "${query}": ${describeError(rollbackError)}`);
      }
      logger.error(`[ImageCache] Failed to update cache atomically for "${query}": ${describeError(error)}`);
      logger.info('[ImageCache] Keeping previous cache intact');
      return { status: 'unchanged', reason: describeError(error) };
    } finally {
      client.release(releaseError);
    }
  }
}
