// Bounded retry with a fixed cooldown, shared by every resilient platform call.
//
// The caller decides what each failure means through `classify`; this module
// only owns the attempt budget and the waiting. The budget counts calls, so a
// policy of 5 makes at most 5 calls, and a cooldown is slept only when another
// attempt follows.

import { setTimeout as delay } from 'timers/promises';
import { EndpointExceededRetryLimitError } from './errors.js';
import type { ApiResult, PlatformError, Sleeper } from './types.js';

export interface RetryPolicy {
  /** Label used in the exhaustion error, e.g. "Account age" */
  readonly endpoint: string;
  readonly maxAttempts: number;
  readonly cooldownMs: number;
}

/** What to do with one failed attempt */
export type AttemptVerdict<T> =
  | { readonly kind: 'retry'; readonly cooldown: boolean }
  | { readonly kind: 'resolve'; readonly value: T }
  | { readonly kind: 'abort'; readonly error: Error };

/** Production sleeper using real timers */
export const realSleeper: Sleeper = {
  sleep: (ms: number) => delay(ms),
};

/** Default classification: wait out rate limits, retry everything else at once */
export function retryAll<T>(error: PlatformError): AttemptVerdict<T> {
  return { kind: 'retry', cooldown: error.kind === 'rate-limited' };
}

export async function runWithRetry<T>(
  policy: RetryPolicy,
  attempt: () => Promise<ApiResult<T>>,
  classify: (error: PlatformError) => AttemptVerdict<T>,
  sleeper: Sleeper,
): Promise<T> {
  let attemptsRemaining = policy.maxAttempts;

  for (;;) {
    const result = await attempt();
    if (result.ok) return result.value;

    const verdict = classify(result.error);
    switch (verdict.kind) {
      case 'resolve':
        return verdict.value;
      case 'abort':
        throw verdict.error;
      case 'retry':
        attemptsRemaining -= 1;
        if (attemptsRemaining <= 0) {
          throw new EndpointExceededRetryLimitError(policy.endpoint);
        }
        if (verdict.cooldown) {
          await sleeper.sleep(policy.cooldownMs);
        }
        break;
    }
  }
}
