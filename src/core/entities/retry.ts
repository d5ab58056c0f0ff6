/**
 * Bounded retry settings. Delay before attempt n+1 is
 * `min(baseDelayMs * 2^(n-1), maxDelayMs)`.
 */
export type RetryPolicy<E> = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (error: E) => boolean;
};

export type RetryTiming = Pick<
  RetryPolicy<unknown>,
  "maxAttempts" | "baseDelayMs" | "maxDelayMs"
>;
