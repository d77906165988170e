import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { GenerativeConfig } from '../config/config';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errorHandler';
import { classifyTransportError, HttpStatusError, TransportFault } from '../utils/errorCategorizer';
import { RetryPolicy, withRetry } from '../utils/retry';

export type GenerationResult =
  | { ok: true; model: string; text: string }
  | { ok: false; model: string; fault: TransportFault; message: string };

/**
 * Connection to the generative model. Built once at startup and handed to
 * the components that need it; `available` is false when no credential is
 * configured, which is not an error.
 */
export interface GenerativeModelClient {
  readonly available: boolean;
  generateJson(model: string, prompt: string): Promise<GenerationResult>;
}

export class UnavailableGenerativeClient implements GenerativeModelClient {
  readonly available = false;

  async generateJson(model: string): Promise<GenerationResult> {
    return {
      ok: false,
      model,
      fault: { kind: 'permanent' },
      message: 'Generative model is not configured',
    };
  }
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
});

export interface OpenRouterClientOptions {
  retryPolicy: RetryPolicy;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
}

export class OpenRouterClient implements GenerativeModelClient {
  readonly available = true;
  private readonly http: AxiosInstance;

  constructor(private readonly config: GenerativeConfig, private readonly options: OpenRouterClientOptions) {
    this.http = options.http ?? axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.apiKey}`,
        'X-Title': 'Destination Image Service',
        'Content-Type': 'application/json',
      },
      validateStatus: () => true,
    });
  }

  async generateJson(model: string, prompt: string): Promise<GenerationResult> {
    try {
      const body = await withRetry(
        async () => {
          const res = await this.http.post<unknown>('/chat/completions', {
            model,
            messages: [{ role: 'user', content: prompt }],
            response_format: { type: 'json_object' },
            temperature: this.config.temperature,
          });
          if (res.status !== 200) {
            throw new HttpStatusError(res.status, `${model} responded with ${res.status}`);
          }
          return res.data;
        },
        this.options.retryPolicy,
        { label: `Generative:${model}`, sleep: this.options.sleep }
      );

      const parsed = completionSchema.safeParse(body);
      const text = parsed.success ? parsed.data.choices[0]?.message?.content?.trim() : undefined;
      if (!text) {
        return { ok: false, model, fault: { kind: 'permanent' }, message: 'Empty completion' };
      }
      return { ok: true, model, text };
    } catch (error) {
      return { ok: false, model, fault: classifyTransportError(error), message: describeError(error) };
    }
  }
}

export function createGenerativeClient(config: GenerativeConfig, retryPolicy: RetryPolicy): GenerativeModelClient {
  if (!config.apiKey) {
    logger.warn('Generative model API key not found - image ranking will keep search order');
    return new UnavailableGenerativeClient();
  }
  logger.info('Generative model client initialized');
  return new OpenRouterClient(config, { retryPolicy });
}
