/**
 * Bounded polling for state that becomes visible asynchronously
 */

export interface RetryPolicy {
  maxAttempts: number;
  /** Milliseconds before the next attempt, fixed or derived from the attempt just made (1-based) */
  delay: number | ((attempt: number) => number);
}

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function fixedDelay(maxAttempts: number, ms: number): RetryPolicy {
  return { maxAttempts, delay: ms };
}

export function delayFor(policy: RetryPolicy, attempt: number): number {
  return typeof policy.delay === 'number' ? policy.delay : policy.delay(attempt);
}

export interface PollOptions {
  sleep?: Sleep;
  /** Called after a failed attempt that will be retried */
  onRetry?: (attempt: number, maxAttempts: number, delayMs: number) => void;
}

export interface PollResult {
  satisfied: boolean;
  attempts: number;
}

/**
 * Run `check` until it returns true or the policy's attempts are spent.
 * Waits only between attempts, never after the last one.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  policy: RetryPolicy,
  options: PollOptions = {}
): Promise<PollResult> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (await check()) {
      return { satisfied: true, attempts: attempt };
    }

    if (attempt < maxAttempts) {
      const delayMs = delayFor(policy, attempt);
      options.onRetry?.(attempt, maxAttempts, delayMs);
      await wait(delayMs);
    }
  }

  return { satisfied: false, attempts: maxAttempts };
}
