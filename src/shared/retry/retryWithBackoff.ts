import { err, ok, type Result } from "neverthrow";
import type { RetryPolicy } from "../../core/entities/retry";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";

export type RetrySuccess<T> = {
  value: T;
  attempts: number;
};

export type RetryFailure<E> = {
  error: E;
  attempts: number;
  exhausted: boolean;
};

export type RetryDependencies = {
  sleeper: SleepPort;
  clock?: ClockPort;
  deadline?: Date;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

/**
 * Delay slept after the given (1-based) failed attempt.
 */
export const backoffDelay = (
  attempt: number,
  policy: Pick<RetryPolicy<unknown>, "baseDelayMs" | "maxDelayMs">,
): number =>
  Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

/**
 * Runs `op` until it succeeds, fails fatally, runs out of attempts, or the
 * next sleep would cross the deadline. The attempt number is passed to `op`.
 */
export const retryWithBackoff = async <T, E>(
  op: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy<E>,
  deps: RetryDependencies,
): Promise<Result<RetrySuccess<T>, RetryFailure<E>>> => {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    const outcome = await op(attempt);
    if (outcome.isOk()) {
      return ok({ value: outcome.value, attempts: attempt });
    }

    const error = outcome.error;
    if (!policy.isRetryable(error)) {
      return err({ error, attempts: attempt, exhausted: false });
    }

    if (attempt >= maxAttempts) {
      return err({ error, attempts: attempt, exhausted: true });
    }

    const delayMs = backoffDelay(attempt, policy);
    if (deps.deadline && deps.clock) {
      const remaining = deps.deadline.getTime() - deps.clock.now().getTime();
      if (remaining <= delayMs) {
        return err({ error, attempts: attempt, exhausted: true });
      }
    }

    deps.onRetry?.({ attempt, delayMs, error });
    await deps.sleeper.sleep(delayMs);
  }
};
