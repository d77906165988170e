import { logger } from '../utils/logger';
import { ImageServiceError } from '../utils/errorHandler';
import { ImageCacheStore } from './cache/imageCacheStore';
import { FallbackImageSelector } from './fallback/fallbackImageSelector';
import { RelevanceRanker } from './ranking/relevanceRanker';
import { ExternalImageSearchClient, usableCandidates } from './search/unsplashSearchClient';
import { primaryTerm } from './search/queryVariations';
import { normalizeImageUrl } from './imageUrl';
import { RawCandidate, ResolvedImage, toResolvedImage } from './types';

export interface ImageResolutionDeps {
  cache: ImageCacheStore;
  search: ExternalImageSearchClient;
  ranker: RelevanceRanker;
  fallback: FallbackImageSelector;
}

export interface ImageResolver {
  resolve(query: string, count: number): Promise<ResolvedImage[]>;
}

/**
 * Turns a text query into `count` attributed image URLs.
 *
 * Tiers, in order: cached rows for the query, live search ranked by the
 * generative model, then the static fallback pools. Only invalid input is
 * thrown; every other fault drops to the next tier.
 *
 * Concurrent calls for the same query are not coordinated. Each may search,
 * and the last cache replacement to commit wins.
 */
export class ImageResolutionPipeline implements ImageResolver {
  constructor(private readonly deps: ImageResolutionDeps) {}

  async resolve(query: string, count: number): Promise<ResolvedImage[]> {
    if (typeof query !== 'string' || !query.trim()) {
      throw new ImageServiceError('Query must be a non-empty string', 'INVALID_QUERY');
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new ImageServiceError('Count must be an integer of at least 1', 'INVALID_COUNT');
    }

    const { cache, search, ranker, fallback } = this.deps;

    const cached = await cache.lookup(query, count);
    if (cached.length >= count) {
      return cached.slice(0, count).map(toResolvedImage);
    }

    if (!search.configured) {
      return fallback.select(query, count);
    }

    const candidates = usableCandidates(await search.search(query, count));
    if (candidates.length === 0) {
      logger.warn(`[Images] No search results for "${query}", using fallback images`);
      return fallback.select(query, count);
    }

    const ranking = await ranker.rank(primaryTerm(query), candidates);
    const images = this.collect(candidates, ranking, count);

    if (images.length > 0) {
      const written = await cache.replace(query, images);
      if (written.status === 'unchanged') {
        logger.warn(`[Images] Cache for "${query}" left unchanged: ${written.reason}`);
      }
    }

    if (images.length < count) {
      const before = images.length;
      const usedUrls = new Set(images.map(image => image.url));
      images.push(...fallback.select(query, count - images.length, usedUrls));
      logger.info(`[Images] Padded ${images.length - before} fallback images to meet count requirement`);
    }

    return images.slice(0, count);
  }

  /**
   * Walks the ranking best-first, skipping repeats by candidate id and then
   * by normalized URL.
   */
  private collect(candidates: RawCandidate[], ranking: number[], count: number): ResolvedImage[] {
    const images: ResolvedImage[] = [];
    const usedIds = new Set<string>();
    const usedUrls = new Set<string>();

    for (const index of ranking) {
      if (images.length >= count) break;

      const candidate = candidates[index];
      if (!candidate || usedIds.has(candidate.id)) continue;

      const url = normalizeImageUrl(candidate.urls.regular);
      if (usedUrls.has(url)) continue;

      images.push({
        url,
        photographer: candidate.user.name,
        photographer_url: candidate.user.links.html,
      });
      usedIds.add(candidate.id);
      usedUrls.add(url);
    }

    return images;
  }
}
