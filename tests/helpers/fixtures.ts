import { RawCandidate } from '../../src/images/types';
import { RetryPolicy } from '../../src/utils/retry';

export const NO_WAIT_POLICY: RetryPolicy = {
  maxAttempts: 2,
  baseDelayMs: 1000,
  multipliers: { rate_limited: 2, unavailable: 2 },
};

/** An Unsplash search hit as it comes off the wire. */
export function photo(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    urls: { regular: `https://images.unsplash.com/photo-${id}?ixid=test` },
    user: { name: `Photographer ${id}`, links: { html: `https://unsplash.com/@p${id}` } },
    tags: [{ title: 'landmark' }],
    alt_description: 'old fort at sunset',
    description: null,
    ...overrides,
  };
}

export function candidate(id: string, overrides: Partial<RawCandidate> = {}): RawCandidate {
  return {
    id,
    urls: { regular: `https://images.unsplash.com/photo-${id}?ixid=test` },
    user: { name: `Photographer ${id}`, links: { html: `https://unsplash.com/@p${id}` } },
    tags: [{ title: 'landmark' }],
    alt_description: 'old fort at sunset',
    description: null,
    ...overrides,
  };
}
