import { isDomainError } from '../errors';
import logger from './logger';

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Label used in log lines */
  operation?: string;
  shouldRetry?: (error: unknown) => boolean;
  /** Runs after the backoff delay, before the next attempt */
  beforeRetry?: (error: unknown, nextAttempt: number) => Promise<void> | void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterOptions {
  requestsPerSecond: number;
  burstSize?: number;
}

const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

const RETRYABLE_SOCKET_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ECONNABORTED']);

/**
 * Retryable domain errors and raw socket failures.
 */
export function isRetryableError(error: unknown): boolean {
  if (isDomainError(error)) {
    return error.isRetryable;
  }
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    RETRYABLE_SOCKET_CODES.has(error.code)
  );
}

/**
 * Delays execution for a specified number of milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the given retry (1 = first retry), capped at `maxDelayMs`.
 */
export function backoffDelay(
  retry: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'> = {}
): number {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const raw = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, retry - 1);
  return Math.min(raw, opts.maxDelayMs);
}

/**
 * Executes an async function with exponential backoff retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const sleep = options.sleep ?? delay;
  const operation = options.operation ?? 'operation';

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = shouldRetry(error);
      if (!retryable || attempt >= opts.maxAttempts) {
        logger.debug(`${operation} failed`, {
          attempt,
          maxAttempts: opts.maxAttempts,
          retryable,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delayMs = backoffDelay(attempt, opts);
      logger.warn(`${operation} failed, retrying`, {
        attempt,
        maxAttempts: opts.maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });

      await sleep(delayMs);
      await options.beforeRetry?.(error, attempt + 1);
    }
  }
}

/**
 * Simple token bucket rate limiter
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly tokensPerMs: number;
  private readonly maxTokens: number;

  constructor(options: RateLimiterOptions) {
    this.maxTokens = options.burstSize ?? options.requestsPerSecond;
    this.tokens = this.maxTokens;
    this.lastRefill = Date.now();
    this.tokensPerMs = options.requestsPerSecond / 1000;
  }

  /**
   * Waits until a token is available, then consumes it
   */
  async acquire(): Promise<void> {
    while (true) {
      this.refill();

      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      const waitMs = Math.ceil((1 - this.tokens) / this.tokensPerMs);
      await delay(Math.min(waitMs, 1000));
    }
  }

  private refill(): void {
    const now = Date.now();
    const tokensToAdd = (now - this.lastRefill) * this.tokensPerMs;

    this.tokens = Math.min(this.tokens + tokensToAdd, this.maxTokens);
    this.lastRefill = now;
  }
}
