import { RunCancelledError } from '../errors';

export interface BackoffOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${detail}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Resolves after `ms`, or rejects with RunCancelledError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationError(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(cancellationError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancellationError(signal);
  }
}

export function cancellationError(signal?: AbortSignal): RunCancelledError {
  if (signal?.reason instanceof RunCancelledError) {
    return signal.reason;
  }
  return new RunCancelledError('cancelled');
}

export function backoffDelay(attempt: number, options: Pick<BackoffOptions, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'>): number {
  const multiplier = options.multiplier ?? 2;
  const delay = options.initialDelayMs * Math.pow(multiplier, attempt - 1);
  return Math.min(delay, options.maxDelayMs);
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or the attempt budget runs out.
 * Non-retryable errors are rethrown as-is; exhaustion raises RetryExhaustedError.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: BackoffOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    throwIfAborted(options.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (options.retryIf && !options.retryIf(error)) {
        throw error;
      }
      if (attempt === options.maxAttempts) {
        break;
      }

      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, options.signal);
    }
  }

  throw new RetryExhaustedError(options.maxAttempts, lastError);
}

export interface ConcurrencyOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * Maps items with at most `concurrency` calls in flight. Once `signal` aborts no new
 * item is started; skipped slots are filled by `onSkipped`. Resolves after every
 * started call settles.
 */
export async function mapWithConcurrency<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  options: ConcurrencyOptions & { onSkipped: (item: T, index: number) => U },
): Promise<U[]> {
  const results: U[] = new Array(items.length);
  const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      const item = items[index];
      if (options.signal?.aborted) {
        results[index] = options.onSkipped(item, index);
        continue;
      }
      results[index] = await fn(item, index);
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < workerCount; i += 1) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
