import { RemoteRetryPolicy } from '../../config/temp-mail.config';

export type RetryAttemptInfo = {
  attemptNumber: number;
  maxAttempts: number;
  waitMs: number;
  error: unknown;
};

export async function sleep(ms: number): Promise<void> {
  if (!Number.isFinite(ms) || ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export function resolveBackoffDelayMs(
  policy: Pick<RemoteRetryPolicy, 'backoffMs' | 'jitterMs'>,
  attemptIndex: number,
  random: () => number = Math.random,
): number {
  const jitterMs =
    policy.jitterMs > 0 ? Math.floor(random() * (policy.jitterMs + 1)) : 0;
  return policy.backoffMs * 2 ** attemptIndex + jitterMs;
}

/**
 * Runs `operation` until it succeeds, throws a non-retryable error, or the
 * attempt budget is spent. The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(input: {
  operation: (attemptNumber: number) => Promise<T>;
  policy: RemoteRetryPolicy;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  wait?: (ms: number) => Promise<void>;
}): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(input.policy.maxAttempts));
  const wait = input.wait ?? sleep;
  let lastError: unknown = new Error('retry budget was empty');

  for (let attemptIndex = 0; attemptIndex < maxAttempts; attemptIndex += 1) {
    try {
      return await input.operation(attemptIndex + 1);
    } catch (error: unknown) {
      lastError = error;
      const isLastAttempt = attemptIndex >= maxAttempts - 1;
      if (!input.isRetryable(error) || isLastAttempt) throw error;

      const waitMs = resolveBackoffDelayMs(input.policy, attemptIndex);
      input.onRetry?.({
        attemptNumber: attemptIndex + 1,
        maxAttempts,
        waitMs,
        error,
      });
      await wait(waitMs);
    }
  }
  throw lastError;
}
