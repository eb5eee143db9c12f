import { ModelCallResult } from '../types/model.types';

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs?: number;
}

export interface RetryOutcome<T> {
  result: ModelCallResult<T>;
  attempts: number;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.backoffMs * 2 ** (attempt - 1);
  return Math.min(delay, policy.maxBackoffMs ?? 30_000);
}

/**
 * Runs `call` until it succeeds, fails fatally, or `maxAttempts` retryable
 * failures have been seen. Never throws on a failed call; the last result is returned.
 */
export async function callWithRetry<T>(
  call: (attempt: number) => Promise<ModelCallResult<T>>,
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void> = defaultSleep,
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let attempt = 1;
  for (;;) {
    const result = await call(attempt);
    if (result.kind !== 'retryable' || attempt >= maxAttempts) {
      return { result, attempts: attempt };
    }
    await sleep(backoffDelay(policy, attempt));
    attempt += 1;
  }
}

async function defaultSleep(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
