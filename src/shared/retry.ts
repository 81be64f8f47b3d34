/**
 * Exponential backoff for outbound sends.
 *
 * Only delivery uses this: source fetches are deliberately single-shot and
 * a failed fetch becomes a run note instead.
 */

import { getLogger } from './logger.js';
import { sleep } from './timing.js';

const log = getLogger('delivery', { component: 'retry' });

/** Socket-level failure codes worth another attempt. */
export const TRANSIENT_NETWORK_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EAI_AGAIN',
];

export interface RetryOptions {
  /** Total attempts including the first. Default: 3 */
  maxAttempts?: number;
  /** Delay before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Default: 30000 */
  maxDelayMs?: number;
  /** Jitter as a fraction of the delay (0-1). Default: 0.1 */
  jitterFactor?: number;
  /** Whether a failure gets another attempt. Default: every failure does. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export function isTransientNetworkError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return TRANSIENT_NETWORK_CODES.includes(String(error.code));
}

/** Doubles per attempt from `baseDelayMs`, capped, with symmetric jitter. */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number,
): number {
  const capped = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
  const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

/**
 * Calls `fn` until it resolves, `shouldRetry` declines the error, or the
 * attempts run out. Rejects with the last error.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30_000,
    jitterFactor = 0.1,
    shouldRetry = () => true,
    onRetry,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw failure;
      }

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, jitterFactor);
      log.warn(
        { attempt, maxAttempts, delayMs, error: failure.message },
        `Retry attempt ${attempt}/${maxAttempts} after ${delayMs}ms`,
      );
      onRetry?.(failure, attempt, delayMs);

      await sleep(delayMs);
    }
  }
}
