import axios from 'axios';
import { AppError } from '../../errors';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** 'full' picks a uniform delay in [0, backoff]. */
  jitter: 'none' | 'full';
  isRetryable: (err: unknown) => boolean;
}

/** Network errors (any axios error) and our own retryable errors, e.g. non-2xx responses. */
export function isTransientFetchError(err: unknown): boolean {
  if (err instanceof AppError) return err.isRetryable;
  return axios.isAxiosError(err);
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
  jitter: 'none',
  isRetryable: isTransientFetchError,
};

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const delay = Math.min(policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1), policy.maxDelayMs);
  return policy.jitter === 'full' ? Math.floor(random() * delay) : delay;
}

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Run `fn` until it succeeds or the policy gives up.
 * A non-retryable error is rethrown as-is on the attempt that raised it;
 * running out of attempts rejects with RetryExhaustedError.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!policy.isRetryable(err)) throw err;
      lastError = err;
      if (attempt < maxAttempts) {
        const delayMs = backoffDelay(policy, attempt, hooks.random);
        hooks.onRetry?.({ attempt, delayMs, error: err });
        await wait(delayMs);
      }
    }
  }
  throw new RetryExhaustedError(maxAttempts, lastError);
}
