/**
 * Retry with linear backoff around transient failures.
 *
 * Classification is by error type first and message content second:
 * validation-class errors are never retried, TransientError always is, and
 * any other error is transient when its message carries a rate-limit,
 * timeout, provider or connection signal.
 */

import { InvalidInputError, ValidationError } from "../dataset/errors.js";
import { MissingDependencyError } from "../stages/context.js";
import { IllegalTransitionError } from "../progress/tracker.js";

/**
 * A failure the thrower knows is worth retrying.
 */
export class TransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientError";
  }
}

const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /rate[\s_-]?limit/i,
  /too many requests/i,
  /time[\s_-]?out/i,
  /timed out/i,
  /provider/i,
  /connection/i,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket hang up/i,
  /\b(429|502|503|504)\b/,
  /temporarily unavailable/i,
];

export function isTransientError(err: unknown): boolean {
  if (
    err instanceof ValidationError ||
    err instanceof InvalidInputError ||
    err instanceof MissingDependencyError ||
    err instanceof IllegalTransitionError
  ) {
    return false;
  }
  if (err instanceof TransientError) {
    return true;
  }
  const message = err instanceof Error ? err.message : String(err);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryEvent {
  /** Attempt that just failed, 1-based */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  maxAttempts: number;
  /** The wait after failed attempt n is n × backoffMs */
  backoffMs: number;
  sleep?: Sleep;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Invoke `operation` until it succeeds, fails with a non-retryable error, or
 * runs out of attempts. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? sleep;
  const isRetryable = options.isRetryable ?? isTransientError;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return { value: await operation(attempt), attempts: attempt };
    } catch (err) {
      if (attempt >= maxAttempts || !isRetryable(err)) {
        throw err;
      }
      const delayMs = attempt * options.backoffMs;
      options.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await wait(delayMs);
    }
  }
}
