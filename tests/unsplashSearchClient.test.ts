import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosInstance } from 'axios';
import { UnsplashSearchClient, usableCandidates } from '../src/images/search/unsplashSearchClient';
import { UnsplashConfig } from '../src/config/config';
import { candidate, NO_WAIT_POLICY, photo } from './helpers/fixtures';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const config: UnsplashConfig = {
  accessKey: 'test-unsplash-key',
  baseUrl: 'https://api.unsplash.com',
  timeoutMs: 10000,
  perPage: 20,
};

function ok(results: unknown[]) {
  return { status: 200, data: { total: results.length, results } };
}

describe('UnsplashSearchClient', () => {
  const get = vi.fn();
  const sleep = vi.fn();
  let client: UnsplashSearchClient;

  beforeEach(() => {
    get.mockReset();
    sleep.mockReset().mockResolvedValue(undefined);
    client = new UnsplashSearchClient(config, {
      retryPolicy: NO_WAIT_POLICY,
      widenThreshold: 2,
      http: { get } as unknown as AxiosInstance,
      sleep,
    });
  });

  it('should stop widening once filtered results reach twice the target', async () => {
    get.mockResolvedValueOnce(ok(['a', 'b', 'c', 'd', 'e'].map(id => photo(id))));

    const result = await client.search('Jaipur city landmark', 2);

    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith('/search/photos', {
      params: {
        query: 'jaipur city landmark',
        per_page: 20,
        orientation: 'landscape',
        order_by: 'relevant',
        content_filter: 'high',
      },
    });
    expect(result.raw).toHaveLength(5);
    expect(result.filtered).toHaveLength(5);
  });

  it('should keep people-focused results out of the filtered list', async () => {
    get
      .mockResolvedValueOnce(ok([photo('a', { tags: [{ title: 'Portrait' }] }), photo('b')]))
      .mockResolvedValue(ok([]));

    const result = await client.search('Kyoto', 2);

    expect(get).toHaveBeenCalledTimes(4);
    expect(get.mock.calls.map(call => call[1].params.query)).toEqual([
      'kyoto',
      'kyoto city',
      'kyoto architecture',
      'kyoto travel destination',
    ]);
    expect(result.raw.map(c => c.id)).toEqual(['a', 'b']);
    expect(result.filtered.map(c => c.id)).toEqual(['b']);
  });

  it('should return nothing when every variation fails', async () => {
    get.mockRejectedValue(new Error('socket hang up'));

    const result = await client.search('Jaipur city landmark', 4);

    expect(result).toEqual({ raw: [], filtered: [] });
    expect(get).toHaveBeenCalledTimes(5);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry a variation after a 503', async () => {
    get
      .mockResolvedValueOnce({ status: 503, data: {} })
      .mockResolvedValueOnce(ok(['a', 'b', 'c', 'd'].map(id => photo(id))));

    const result = await client.search('Jaipur', 2);

    expect(get).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(result.filtered).toHaveLength(4);
  });

  it('should not retry a rejected credential and move to the next variation', async () => {
    get.mockResolvedValue({ status: 401, data: { errors: ['OAuth error'] } });

    const result = await client.search('Kyoto', 1);

    expect(get).toHaveBeenCalledTimes(4);
    expect(sleep).not.toHaveBeenCalled();
    expect(result).toEqual({ raw: [], filtered: [] });
  });

  it('should skip results that do not look like photos', async () => {
    get.mockResolvedValueOnce(ok([photo('a'), { id: 'broken' }])).mockResolvedValue(ok([]));

    const result = await client.search('Kyoto', 1);

    expect(result.raw.map(c => c.id)).toEqual(['a']);
  });

  it('should make no calls without an access key', async () => {
    const unconfigured = new UnsplashSearchClient({ ...config, accessKey: '' }, {
      retryPolicy: NO_WAIT_POLICY,
      widenThreshold: 2,
      http: { get } as unknown as AxiosInstance,
    });

    expect(unconfigured.configured).toBe(false);
    expect(await unconfigured.search('Kyoto', 2)).toEqual({ raw: [], filtered: [] });
    expect(get).not.toHaveBeenCalled();
  });
});

describe('usableCandidates', () => {
  it('should prefer filtered results and fall back to raw ones', () => {
    const a = candidate('a');
    const b = candidate('b');
    expect(usableCandidates({ raw: [a, b], filtered: [b] })).toEqual([b]);
    expect(usableCandidates({ raw: [a], filtered: [] })).toEqual([a]);
  });
});
