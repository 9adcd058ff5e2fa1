import { createChildLogger } from './logger.js';
import { CancelledError } from './errors.js';

const logger = createChildLogger('async-helpers');

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage?: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(
        errorMessage ?? `Operation timed out after ${timeoutMs}ms`,
        timeoutMs
      ));
    }, timeoutMs);
  });

  return Promise.race([promise, timeoutPromise]).finally(() => {
    clearTimeout(timeoutHandle);
  });
}

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each attempt with its 1-based number. */
  onAttempt?: (attempt: number) => void;
  /** Ends the wait between attempts; no further attempt is made once aborted. */
  signal?: AbortSignal | undefined;
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    backoffMultiplier = 2,
    shouldRetry = () => true,
    onAttempt,
    signal,
  } = options;

  let currentDelay = delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      onAttempt?.(attempt);
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      logger.warn({ attempt, maxAttempts, delayMs: currentDelay }, 'Retrying after error');
      await sleep(currentDelay, signal);
      if (signal?.aborted) {
        throw new CancelledError('Retry abandoned while waiting', {
          context: { attempt, lastError: error instanceof Error ? error.message : String(error) },
        });
      }
      currentDelay *= backoffMultiplier;
    }
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
