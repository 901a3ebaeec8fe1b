// Account-creation year lookup.

import { MalformedCreationDateError } from './errors.js';
import { retryAll, runWithRetry, type RetryPolicy } from './retry-policy.js';
import { ACCOUNT_AGE_ENDPOINT, MAX_CREATION_YEAR, MIN_CREATION_YEAR } from './thresholds.js';
import type { SyncContext, UserDetails, UserId } from './types.js';

export function accountAgePolicy(context: Pick<SyncContext, 'config'>): RetryPolicy {
  const { behavior } = context.config;
  return {
    endpoint: ACCOUNT_AGE_ENDPOINT,
    maxAttempts: behavior.accountAgeAttempts,
    cooldownMs: behavior.cooldownSeconds * 1000,
  };
}

/** Parse the leading four-digit year of an ISO 8601 timestamp; null when it has none */
export function parseCreationYear(created: string): number | null {
  const head = created.slice(0, 4);
  if (!/^\d{4}$/.test(head)) return null;
  const year = Number(head);
  return year >= MIN_CREATION_YEAR && year <= MAX_CREATION_YEAR ? year : null;
}

/** Every failure costs an attempt; rate limits also wait out the cooldown. */
export async function classifyAccountYear(
  context: Pick<SyncContext, 'config' | 'api' | 'sleeper'>,
  userId: UserId,
): Promise<number> {
  const details = await runWithRetry<UserDetails>(
    accountAgePolicy(context),
    () => context.api.getUserDetails(userId),
    retryAll,
    context.sleeper,
  );

  const year = parseCreationYear(details.created);
  if (year === null) {
    throw new MalformedCreationDateError(userId, details.created);
  }
  return year;
}
