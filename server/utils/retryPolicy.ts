import { Logger } from './logger';
import { sleep, CancellationToken } from './cancellation';
import { Result, fail } from './types';

export interface RetryPolicyOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff policy for idempotent collaborator calls.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  constructor(options: RetryPolicyOptions) {
    this.maxRetries = options.maxRetries;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
  }

  /**
   * Delay before the given retry (0-based attempt index)
   */
  delayFor(attempt: number): number {
    return Math.min(this.baseDelayMs * Math.pow(2, attempt), this.maxDelayMs);
  }

  /**
   * Run `fn`, retrying while `shouldRetry(error)` holds.
   * The last error is rethrown once attempts are exhausted or the token fires.
   */
  async run<T>(
    fn: () => Promise<T>,
    options: {
      description: string;
      logger?: Logger;
      shouldRetry?: (error: unknown) => boolean;
      token?: CancellationToken;
    }
  ): Promise<T> {
    const shouldRetry = options.shouldRetry ?? (() => true);

    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        const exhausted = attempt >= this.maxRetries;
        if (exhausted || !shouldRetry(error) || options.token?.isCancellationRequested) {
          throw error;
        }

        const delay = this.delayFor(attempt);
        options.logger?.warn(`${options.description} failed, retrying`, {
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
          delay,
          error: error instanceof Error ? error.message : String(error),
        });

        const completed = await sleep(delay, options.token);
        if (!completed) {
          throw error;
        }
      }
    }
  }
}

export class TimeoutError extends Error {
  constructor(description: string, ms: number) {
    super(`${description} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Bound a collaborator call. The underlying promise keeps running; only the
 * caller stops waiting for it.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, description: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(description, ms)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Bound a Result-returning collaborator call; a timeout becomes a failed Result
 */
export async function boundedResult<T>(
  call: Promise<Result<T>>,
  ms: number,
  description: string
): Promise<Result<T>> {
  try {
    return await withTimeout(call, ms, description);
  } catch (error) {
    return fail(error instanceof Error ? error : new Error(String(error)));
  }
}
