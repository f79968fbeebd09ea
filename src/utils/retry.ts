/**
 * Bounded retry with exponential backoff.
 *
 * Used for transient transport failures only; quota backoff lives in the
 * rate limiter. Retries are selected by error code, the delay doubles (or
 * grows by `backoffMultiplier`) up to `maxDelayMs`, and an AbortSignal stops
 * the loop between attempts.
 */

export interface RetryConfig {
  /** Total attempts, including the first call */
  maxAttempts: number;

  /** Delay before the first retry (ms) */
  initialDelayMs: number;

  /** Upper bound for any single delay (ms) */
  maxDelayMs: number;

  /** Growth factor applied to the delay after each retry */
  backoffMultiplier: number;

  /** Error codes (or names) that may be retried, case insensitive */
  retryableErrors: string[];

  signal?: AbortSignal;

  /** Jitter factor (0-1) applied as ±jitter around the delay */
  jitter?: number;

  onRetry?: (context: RetryAttemptContext) => void;
}

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export class RetryAbortedError extends Error {
  constructor(message = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

function readCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  const { code } = error;
  if (typeof code === 'string') {
    return code;
  }
  if (typeof code === 'number') {
    return String(code);
  }
  return undefined;
}

/**
 * Whether an error carries a retryable code or name.
 */
export function isRetryableError(error: unknown, retryable: ReadonlySet<string>): boolean {
  if (retryable.size === 0 || error instanceof RetryAbortedError) {
    return false;
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return false;
  }

  const code = readCode(error);
  if (code !== undefined && retryable.has(code.toUpperCase())) {
    return true;
  }

  return error instanceof Error && retryable.has(error.name.toUpperCase());
}

/**
 * Sleep that rejects with RetryAbortedError when the signal fires. The timer
 * and the abort listener are both released whichever happens first.
 */
export async function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new RetryAbortedError();
  }

  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function validate(config: RetryConfig): void {
  if (config.maxAttempts < 1) {
    throw new Error('maxAttempts must be >= 1');
  }
  if (config.initialDelayMs < 0) {
    throw new Error('initialDelayMs must be >= 0');
  }
  if (config.maxDelayMs < config.initialDelayMs) {
    throw new Error('maxDelayMs must be >= initialDelayMs');
  }
  if (config.backoffMultiplier < 1) {
    throw new Error('backoffMultiplier must be >= 1');
  }
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or runs out
 * of attempts. The last error is rethrown as-is.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig
): Promise<T> {
  validate(config);

  const retryable = new Set(config.retryableErrors.map((token) => token.toUpperCase()));
  const jitter = Math.min(Math.max(config.jitter ?? 0, 0), 1);
  let delayMs = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    if (config.signal?.aborted) {
      throw new RetryAbortedError();
    }

    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= config.maxAttempts || !isRetryableError(error, retryable)) {
        throw error;
      }

      const waitMs =
        jitter > 0 ? Math.floor(delayMs * (1 - jitter + 2 * jitter * Math.random())) : delayMs;

      config.onRetry?.({ attempt, delayMs: waitMs, error });
      await abortableDelay(waitMs, config.signal);

      delayMs = Math.min(config.maxDelayMs, Math.round(delayMs * config.backoffMultiplier));
    }
  }
}
