// Idempotent "make this member hold this role" call.
//
// Failure handling per attempt:
//   invalid-credential → abort the run, no retry
//   rate-limited       → cooldown, then retry
//   already-has-role   → success
//   anything else      → retry at once
// Retries share one budget; exhaustion raises EndpointExceededRetryLimitError.

import { NonRecoverablePlatformError } from './errors.js';
import { runWithRetry, type AttemptVerdict, type RetryPolicy } from './retry-policy.js';
import { SET_ROLE_ENDPOINT } from './thresholds.js';
import type { PlatformError, RoleId, SyncContext, UserId } from './types.js';

export function setRolePolicy(context: Pick<SyncContext, 'config'>): RetryPolicy {
  const { behavior } = context.config;
  return {
    endpoint: SET_ROLE_ENDPOINT,
    maxAttempts: behavior.setRoleAttempts,
    cooldownMs: behavior.cooldownSeconds * 1000,
  };
}

export function classifySetRoleFailure(error: PlatformError): AttemptVerdict<void> {
  switch (error.kind) {
    case 'invalid-credential':
      return { kind: 'abort', error: new NonRecoverablePlatformError(error) };
    case 'rate-limited':
      return { kind: 'retry', cooldown: true };
    case 'already-has-role':
      return { kind: 'resolve', value: undefined };
    case 'platform-code':
    case 'other':
      return { kind: 'retry', cooldown: false };
  }
}

export async function assignRole(
  context: Pick<SyncContext, 'config' | 'api' | 'sleeper'>,
  userId: UserId,
  roleId: RoleId,
): Promise<void> {
  const { groupId } = context.config;
  await runWithRetry(
    setRolePolicy(context),
    () => context.api.setMemberRole(groupId, userId, roleId),
    classifySetRoleFailure,
    context.sleeper,
  );
}
