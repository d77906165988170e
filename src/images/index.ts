import { Pool } from 'pg';
import { Config } from '../config/config';
import { createPool } from '../db/pool';
import { createGenerativeClient, GenerativeModelClient } from '../ai/generativeClient';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errorHandler';
import { ImageCacheStore, MemoryImageCacheStore } from './cache/imageCacheStore';
import { PgImageCacheStore } from './cache/pgImageCacheStore';
import { FallbackImageSelector } from './fallback/fallbackImageSelector';
import { RelevanceRanker } from './ranking/relevanceRanker';
import { ExternalImageSearchClient, UnsplashSearchClient } from './search/unsplashSearchClient';
import { ImageResolutionPipeline } from './imageResolutionPipeline';
import { DestinationImageService } from './destinationImages';

export * from './types';
export * from './imageResolutionPipeline';
export * from './destinationImages';

export interface ImageServices {
  cache: ImageCacheStore;
  search: ExternalImageSearchClient;
  generative: GenerativeModelClient;
  ranker: RelevanceRanker;
  pipeline: ImageResolutionPipeline;
  destinations: DestinationImageService;
  close(): Promise<void>;
}

/**
 * Builds every collaborator from config. Capability flags (search
 * configured, generative model available) are decided here, once.
 */
export async function createImageServices(config: Config): Promise<ImageServices> {
  let pool: Pool | undefined;
  let cache: ImageCacheStore | undefined;

  if (config.database.connectionString) {
    pool = createPool(config.database.connectionString);
    const store = new PgImageCacheStore(pool);
    try {
      await store.init();
      cache = store;
    } catch (error) {
      logger.error(`[ImageCache] Could not initialize the cache database: ${describeError(error)}`);
      await pool.end();
      pool = undefined;
    }
  }

  if (!cache) {
    logger.warn('No usable cache database - caching images in memory');
    cache = new MemoryImageCacheStore();
  }

  const search = new UnsplashSearchClient(config.unsplash, {
    retryPolicy: config.retry.search,
    widenThreshold: config.resolution.widenThreshold,
  });
  if (!search.configured) {
    logger.warn('Unsplash API key not found - will use fallback images');
  }

  const generative = createGenerativeClient(config.generative, config.retry.generation);
  const ranker = new RelevanceRanker(generative, config.generative.models);
  const pipeline = new ImageResolutionPipeline({
    cache,
    search,
    ranker,
    fallback: new FallbackImageSelector(),
  });

  return {
    cache,
    search,
    generative,
    ranker,
    pipeline,
    destinations: new DestinationImageService(pipeline, config.resolution.previewRegion),
    close: async () => {
      await pool?.end();
    },
  };
}
