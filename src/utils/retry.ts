import { logger } from './logger';
import { describeError } from './errorHandler';
import { classifyTransportError, TransportFault, TransientReason } from './errorCategorizer';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multipliers: Record<TransientReason, number>;
}

export interface RetryOptions {
  label: string;
  classify?: (error: unknown) => TransportFault;
  sleep?: (ms: number) => Promise<void>;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before the given retry (1-based): baseDelayMs * multiplier^(retry - 1).
 */
export function retryDelayMs(policy: RetryPolicy, reason: TransientReason, retry: number): number {
  return policy.baseDelayMs * Math.pow(policy.multipliers[reason], retry - 1);
}

/**
 * Runs `operation` until it succeeds, a permanent fault is raised, or the
 * policy's attempts run out. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const classify = options.classify ?? classifyTransportError;
  const sleep = options.sleep ?? delay;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const fault = classify(error);
      if (fault.kind === 'permanent' || attempt >= maxAttempts) {
        throw error;
      }

      const wait = retryDelayMs(policy, fault.reason, attempt);
      const what = fault.reason === 'rate_limited' ? 'Rate limit hit' : 'Service unavailable';
      logger.info(`[${options.label}] ${what} (${describeError(error)}), retrying in ${wait}ms (attempt ${attempt}/${maxAttempts})`);
      await sleep(wait);
    }
  }
}
