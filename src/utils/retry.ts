import { logger, errorMessage } from './logger.js';
import { isRetryableError, TransientServiceError } from './errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitterFactor: number;
}

export function calculateRetryDelay(attempt: number, policy: RetryPolicy): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  const jitter = cappedDelay * policy.jitterFactor * (Math.random() - 0.5);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface CallOptions {
  /** Shown in log lines and timeout errors. */
  label: string;
  policy: RetryPolicy;
  /** Per-attempt timeout; the attempt's signal is aborted when it fires. */
  timeoutMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Thrown once a call has used up its attempts. `attempts` is how many were made.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    super(`${label} failed after ${attempts} attempt(s): ${errorMessage(cause)}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

async function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  label: string,
  timeoutMs?: number
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    return operation(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientServiceError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run an external call under the shared retry policy.
 * Retryable failures back off exponentially; anything else, or the last
 * attempt, surfaces as a RetryExhaustedError wrapping the final cause.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: CallOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const maxAttempts = Math.max(1, options.policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await runWithTimeout(operation, options.label, options.timeoutMs);
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw new RetryExhaustedError(options.label, attempt, error);
      }

      const delay = calculateRetryDelay(attempt, options.policy);
      logger.warn(`${options.label} will retry after transient failure`, {
        attempt,
        maxAttempts,
        delay,
        error: errorMessage(error),
      });
      await wait(delay);
    }
  }
}

/** Underlying cause and attempt count of a failure returned by withRetry. */
export function unwrapRetryError(error: unknown): { cause: unknown; attempts: number } {
  if (error instanceof RetryExhaustedError) {
    return { cause: error.cause, attempts: error.attempts };
  }
  return { cause: error, attempts: 1 };
}
