import { z } from 'zod';
import { GenerativeModelClient } from '../../ai/generativeClient';
import { logger } from '../../utils/logger';
import { RawCandidate } from '../types';

export const MAX_RANKING_MODELS = 2;

export type RankingParseResult =
  | { ok: true; indices: number[] }
  | { ok: false; reason: string };

const rankingSchema = z.object({
  ranked_indices: z.array(z.unknown()),
});

export function identityOrder(length: number): number[] {
  return Array.from({ length }, (_, index) => index);
}

export function summarizeCandidates(candidates: RawCandidate[]): Array<{ index: number; info: string }> {
  return candidates.map((candidate, index) => {
    const parts: string[] = [];
    if (candidate.description) parts.push(`Description: ${candidate.description}`);
    if (candidate.alt_description) parts.push(`Alt: ${candidate.alt_description}`);
    if (candidate.tags.length > 0) {
      parts.push(`Tags: ${candidate.tags.slice(0, 5).map(tag => tag.title).join(', ')}`);
    }
    return { index, info: parts.length > 0 ? parts.join(' | ') : 'No description' };
  });
}

export function buildRankingPrompt(destination: string, candidates: RawCandidate[]): string {
  return `You are an expert in selecting the most representative and beautiful images for travel destinations.

Destination: ${destination}

I have ${candidates.length} images to choose from. Analyze which images would best represent this destination for travelers looking for tourist information, attractions, and landmarks.

Images to evaluate:
${JSON.stringify(summarizeCandidates(candidates), null, 2)}

Consider:
1. Relevance to the destination's famous landmarks and attractions
2. Visual appeal and quality indicators from descriptions
3. Representation of the destination's character (heritage, nature, urban, etc.)
4. Avoiding generic or people-focused images

Return ONLY valid JSON with the indices ranked from best to worst:
{"ranked_indices": [index1, index2, index3, ...]}`;
}

/**
 * Parses a model reply into candidate indices. Code fences are tolerated;
 * indices outside [0, candidateCount) and repeats are dropped.
 */
export function parseRanking(text: string, candidateCount: number): RankingParseResult {
  const jsonStr = text.trim().replace(/^```(?:json)?/i, '').replace(/```$/, '').trim();

  let data: unknown;
  try {
    data = JSON.parse(jsonStr);
  } catch {
    return { ok: false, reason: 'invalid JSON' };
  }

  const parsed = rankingSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, reason: 'missing ranked_indices' };
  }

  const seen = new Set<number>();
  for (const value of parsed.data.ranked_indices) {
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < candidateCount) {
      seen.add(value);
    }
  }

  if (seen.size === 0) {
    return { ok: false, reason: 'empty ranking' };
  }
  return { ok: true, indices: Array.from(seen) };
}

/**
 * Asks the generative model to order candidates by destination relevance.
 * Ranking is a hint: any failure yields the search order.
 */
export class RelevanceRanker {
  private readonly models: string[];

  constructor(private readonly client: GenerativeModelClient, models: string[]) {
    this.models = models.slice(0, MAX_RANKING_MODELS);
  }

  get available(): boolean {
    return this.client.available && this.models.length > 0;
  }

  async rank(destination: string, candidates: RawCandidate[]): Promise<number[]> {
    if (!this.available || candidates.length === 0) {
      return identityOrder(candidates.length);
    }

    const prompt = buildRankingPrompt(destination, candidates);

    for (const model of this.models) {
      const result = await this.client.generateJson(model, prompt);
      if (!result.ok) {
        logger.warn(`[Ranker] Image ranking with ${model} failed: ${result.message}`);
        continue;
      }

      const ranking = parseRanking(result.text, candidates.length);
      if (ranking.ok) {
        logger.info(`[Ranker] AI ranked ${ranking.indices.length} images for ${destination} using ${model}`);
        return ranking.indices;
      }
      logger.warn(`[Ranker] Image ranking with ${model} returned an unusable reply: ${ranking.reason}`);
    }

    logger.warn('[Ranker] AI image ranking failed, using original order');
    return identityOrder(candidates.length);
  }
}
