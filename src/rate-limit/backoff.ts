/**
 * Exponential backoff with jitter, used when reopening tool server sessions
 */

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** 0-1, share of the delay that is randomised */
  jitterFactor: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 250,
  maxDelayMs: 10000,
  maxRetries: 5,
  jitterFactor: 0.1,
};

export class ExponentialBackoff {
  readonly config: BackoffConfig;
  private random: () => number;

  constructor(config: Partial<BackoffConfig> = {}, random: () => number = Math.random) {
    this.config = { ...DEFAULT_BACKOFF, ...config };
    this.random = random;
  }

  /**
   * Delay before retry number `retry` (0 = first retry)
   */
  delayFor(retry: number): number {
    const capped = Math.min(this.config.baseDelayMs * 2 ** retry, this.config.maxDelayMs);
    const jitter = capped * this.config.jitterFactor * (this.random() * 2 - 1);
    return Math.max(0, capped + jitter);
  }

  /**
   * Run `fn` until it succeeds, `shouldRetry` refuses, retries run out or
   * the signal aborts. The last error is rethrown.
   */
  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    shouldRetry: (error: unknown) => boolean,
    signal?: AbortSignal
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.config.maxRetries || !shouldRetry(error) || signal?.aborted) {
          throw error;
        }
        await sleep(this.delayFor(attempt), signal);
      }
    }
  }
}

/**
 * Resolve after `ms`; reject with the signal's reason if it aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
