import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { UnsplashConfig } from '../../config/config';
import { logger } from '../../utils/logger';
import { describeError } from '../../utils/errorHandler';
import { classifyTransportError, HttpStatusError, TransportFault } from '../../utils/errorCategorizer';
import { RetryPolicy, withRetry } from '../../utils/retry';
import { RawCandidate, rawCandidateSchema, SearchCandidates } from '../types';
import { buildQueryVariations, isPeopleFocused } from './queryVariations';

export interface ExternalImageSearchClient {
  /** False when no credential is configured; callers skip search entirely. */
  readonly configured: boolean;
  search(query: string, targetCount: number): Promise<SearchCandidates>;
}

export type VariationOutcome =
  | { ok: true; total: number; results: RawCandidate[] }
  | { ok: false; fault: TransportFault; message: string };

export interface UnsplashSearchOptions {
  retryPolicy: RetryPolicy;
  /** Stop widening once filtered results reach widenThreshold x targetCount. */
  widenThreshold: number;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
}

const searchResponseSchema = z.object({
  total: z.number().default(0),
  results: z.array(z.unknown()).default([]),
});

/**
 * Filtered results when there are any, the unfiltered ones otherwise.
 * Coverage wins over filtering strictness here.
 */
export function usableCandidates(result: SearchCandidates): RawCandidate[] {
  return result.filtered.length > 0 ? result.filtered : result.raw;
}

function candidateText(candidate: RawCandidate): string {
  const tags = candidate.tags.map(tag => tag.title.toLowerCase()).join(' ');
  return `${tags} ${candidate.alt_description ?? ''} ${candidate.description ?? ''}`;
}

export class UnsplashSearchClient implements ExternalImageSearchClient {
  private readonly http: AxiosInstance;

  constructor(private readonly config: UnsplashConfig, private readonly options: UnsplashSearchOptions) {
    this.http = options.http ?? axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Client-ID ${config.accessKey}`,
        'Accept-Version': 'v1',
      },
      // Status codes are classified below rather than thrown by axios
      validateStatus: () => true,
    });
  }

  get configured(): boolean {
    return this.config.accessKey.length > 0;
  }

  async search(query: string, targetCount: number): Promise<SearchCandidates> {
    const raw: RawCandidate[] = [];
    const filtered: RawCandidate[] = [];

    if (!this.configured) {
      return { raw, filtered };
    }

    const variations = buildQueryVariations(query);
    const enough = this.options.widenThreshold * targetCount;

    for (const [index, variation] of variations.entries()) {
      const attempt = `${index + 1}/${variations.length}`;
      const outcome = await this.fetchVariation(variation);

      if (!outcome.ok) {
        logger.error(`[Unsplash] Search failed on attempt ${attempt} for '${variation}': ${outcome.message}`);
        continue;
      }

      for (const candidate of outcome.results) {
        raw.push(candidate);
        if (!isPeopleFocused(candidateText(candidate))) {
          filtered.push(candidate);
        }
      }

      logger.info(
        `[Unsplash] Attempt ${attempt}: '${variation}' returned ${outcome.results.length} of ${outcome.total} results. ` +
        `Total collected: ${filtered.length} filtered, ${raw.length} total`
      );

      if (filtered.length >= enough) {
        logger.info('[Unsplash] Sufficient images collected, stopping search');
        break;
      }
    }

    return { raw, filtered };
  }

  async fetchVariation(variation: string): Promise<VariationOutcome> {
    let body: unknown;
    try {
      const response = await withRetry(
        async () => {
          const res = await this.http.get<unknown>('/search/photos', {
            params: {
              query: variation,
              per_page: this.config.perPage,
              orientation: 'landscape',
              order_by: 'relevant',
              content_filter: 'high',
            },
          });
          if (res.status !== 200) {
            throw new HttpStatusError(res.status, `Unsplash responded with ${res.status}`);
          }
          return res;
        },
        this.options.retryPolicy,
        { label: 'Unsplash', sleep: this.options.sleep }
      );
      body = response.data;
    } catch (error) {
      return { ok: false, fault: classifyTransportError(error), message: describeError(error) };
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, fault: { kind: 'permanent' }, message: 'Malformed search response' };
    }

    const results: RawCandidate[] = [];
    for (const entry of parsed.data.results) {
      const candidate = rawCandidateSchema.safeParse(entry);
      if (candidate.success) {
        results.push(candidate.data);
      } else {
        logger.debug(`[Unsplash] Skipping result that does not match the photo shape: ${candidate.error.issues[0]?.message}`);
      }
    }

    return { ok: true, total: parsed.data.total, results };
  }
}
