import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosInstance } from 'axios';
import {
  createGenerativeClient,
  OpenRouterClient,
  UnavailableGenerativeClient,
} from '../src/ai/generativeClient';
import { GenerativeConfig } from '../src/config/config';
import { RetryPolicy } from '../src/utils/retry';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const config: GenerativeConfig = {
  apiKey: 'test-secret',
  baseUrl: 'https://openrouter.ai/api/v1',
  models: ['model-a', 'model-b'],
  timeoutMs: 10000,
  temperature: 0.3,
};

const policy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  multipliers: { rate_limited: 3, unavailable: 2 },
};

function completion(content: string | null) {
  return { status: 200, data: { choices: [{ message: { content } }] } };
}

describe('OpenRouterClient', () => {
  const post = vi.fn();
  const sleep = vi.fn();
  let client: OpenRouterClient;

  beforeEach(() => {
    post.mockReset();
    sleep.mockReset().mockResolvedValue(undefined);
    client = new OpenRouterClient(config, {
      retryPolicy: policy,
      http: { post } as unknown as AxiosInstance,
      sleep,
    });
  });

  it('should request a JSON completion and return its text', async () => {
    post.mockResolvedValueOnce(completion(' {"ranked_indices": [1]} '));

    const result = await client.generateJson('model-a', 'rank these');

    expect(result).toEqual({ ok: true, model: 'model-a', text: '{"ranked_indices": [1]}' });
    expect(post).toHaveBeenCalledWith('/chat/completions', {
      model: 'model-a',
      messages: [{ role: 'user', content: 'rank these' }],
      response_format: { type: 'json_object' },
      temperature: 0.3,
    });
  });

  it('should retry after a rate limit', async () => {
    post.mockResolvedValueOnce({ status: 429, data: {} }).mockResolvedValueOnce(completion('{}'));

    const result = await client.generateJson('model-a', 'rank these');

    expect(result.ok).toBe(true);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('should report a permanent fault without retrying', async () => {
    post.mockResolvedValue({ status: 400, data: { error: 'bad model' } });

    const result = await client.generateJson('model-a', 'rank these');

    expect(result).toEqual({
      ok: false,
      model: 'model-a',
      fault: { kind: 'permanent', status: 400 },
      message: 'model-a responded with 400',
    });
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('should treat an empty completion as a failure', async () => {
    post.mockResolvedValueOnce(completion(null));

    const result = await client.generateJson('model-a', 'rank these');

    expect(result).toEqual({ ok: false, model: 'model-a', fault: { kind: 'permanent' }, message: 'Empty completion' });
  });
});

describe('createGenerativeClient', () => {
  it('should return an unavailable client without an API key', async () => {
    const client = createGenerativeClient({ ...config, apiKey: '' }, policy);

    expect(client).toBeInstanceOf(UnavailableGenerativeClient);
    expect(client.available).toBe(false);
    const result = await client.generateJson('model-a', 'rank these');
    expect(result.ok).toBe(false);
  });

  it('should return a live client when a key is configured', () => {
    expect(createGenerativeClient(config, policy).available).toBe(true);
  });
});
