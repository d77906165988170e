import { z } from 'zod';

/**
 * One search hit as returned by the Unsplash search endpoint. Only the
 * fields the pipeline reads are declared; zod drops the rest.
 */
export const rawCandidateSchema = z.object({
  id: z.string(),
  urls: z.object({ regular: z.string() }),
  user: z.object({
    name: z.string().default(''),
    links: z.object({ html: z.string().default('') }).default({}),
  }),
  tags: z.array(z.object({ title: z.string().default('') })).default([]),
  alt_description: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
});

export type RawCandidate = z.infer<typeof rawCandidateSchema>;

export interface ResolvedImage {
  url: string;
  photographer: string;
  photographer_url: string;
}

export interface CachedImage {
  query: string;
  rank: number;
  url: string;
  photographer: string;
  photographerUrl: string;
  cachedAt: Date;
}

export type CacheWriteResult =
  | { status: 'written'; count: number }
  | { status: 'unchanged'; reason: string };

export interface SearchCandidates {
  raw: RawCandidate[];
  filtered: RawCandidate[];
}

export function toResolvedImage(cached: CachedImage): ResolvedImage {
  return {
    url: cached.url,
    photographer: cached.photographer,
    photographer_url: cached.photographerUrl,
  };
}
