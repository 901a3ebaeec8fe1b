// Shared fakes for the rank sync tests — in-process, deterministic, no network.

import { Sensitive } from '../secret.js';
import {
  fail, ok,
  type ApiResult, type Assignment, type Clock, type GroupApi, type GroupId, type GroupRole,
  type MemberPage, type PlatformError, type RoleId, type Sleeper, type SyncConfig,
  type SyncReporter, type UserDetails, type UserId,
} from '../types.js';

export const RATE_LIMITED: PlatformError = { kind: 'rate-limited' };
export const INVALID_CREDENTIAL: PlatformError = { kind: 'invalid-credential' };
export const ALREADY_HAS_ROLE: PlatformError = { kind: 'already-has-role', code: 26 };
export const SERVER_ERROR: PlatformError = { kind: 'other', status: 500, message: 'unexpected HTTP 500' };

/** Sleeper that returns at once and remembers every requested wait */
export function recordingSleeper(): Sleeper & { readonly waits: number[] } {
  const waits: number[] = [];
  return {
    waits,
    async sleep(ms: number): Promise<void> {
      waits.push(ms);
    },
  };
}

/** Clock that advances by `stepMs` on every read */
export function steppingClock(startIso: string, stepMs: number = 0): Clock {
  let t = new Date(startIso).getTime();
  return {
    now: () => {
      const d = new Date(t);
      t += stepMs;
      return d;
    },
    isoNow: () => new Date(t).toISOString(),
  };
}

/** Reporter that keeps everything it is told */
export function recordingReporter(): SyncReporter & { readonly assignments: Assignment[]; readonly notes: string[] } {
  const assignments: Assignment[] = [];
  const notes: string[] = [];
  return {
    assignments,
    notes,
    assigned: (a) => { assignments.push(a); },
    note: (m) => { notes.push(m); },
  };
}

export function makeConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    groupId: 1234,
    roblosecurity: new Sensitive('test-secret'),
    scannedRoles: ['Member'],
    roleYearPairs: new Map([['Vintage', [2006, 2007]], ['Modern', [2020]]]),
    wildcardRole: 'Member',
    behavior: { cooldownSeconds: 60, accountAgeAttempts: 5, setRoleAttempts: 5, pageLimit: 100 },
    ...overrides,
  };
}

export const DEFAULT_ROLES: readonly GroupRole[] = [
  { id: 1, name: 'Guest', rank: 0 },
  { id: 10, name: 'Member', rank: 1 },
  { id: 20, name: 'Modern', rank: 2 },
  { id: 30, name: 'Vintage', rank: 3 },
];

export function userDetails(id: UserId, created: string): UserDetails {
  return { id, name: `user${id}`, created };
}

/**
 * Scripted GroupApi.
 *
 * - pages are keyed by role id and cursor ("" for the first page)
 * - user details and set-role outcomes are queues per user; the last entry repeats
 * - every call is logged in order; successful set-role calls are kept in `assignments`
 */
export class ScriptedGroupApi implements GroupApi {
  readonly calls: string[] = [];
  readonly assignments: Array<{ readonly userId: UserId; readonly roleId: RoleId }> = [];
  rolesResult: ApiResult<readonly GroupRole[]> = ok(DEFAULT_ROLES);
  readonly pages = new Map<string, ApiResult<MemberPage>>();
  readonly details = new Map<UserId, ApiResult<UserDetails>[]>();
  readonly setRoleOutcomes = new Map<UserId, ApiResult<void>[]>();

  addPage(roleId: RoleId, cursor: string | undefined, userIds: readonly UserId[], nextCursor?: string): this {
    const members = userIds.map(userId => ({ userId }));
    this.pages.set(`${roleId}:${cursor ?? ''}`, ok(nextCursor === undefined ? { members } : { members, nextCursor }));
    return this;
  }

  addUser(userId: UserId, created: string, failuresFirst: readonly PlatformError[] = []): this {
    this.details.set(userId, [...failuresFirst.map(e => fail(e)), ok(userDetails(userId, created))]);
    return this;
  }

  scriptSetRole(userId: UserId, outcomes: readonly ApiResult<void>[]): this {
    this.setRoleOutcomes.set(userId, [...outcomes]);
    return this;
  }

  async listGroupRoles(groupId: GroupId): Promise<ApiResult<readonly GroupRole[]>> {
    this.calls.push(`roles:${groupId}`);
    return this.rolesResult;
  }

  async listRoleMembers(groupId: GroupId, roleId: RoleId, limit: number, cursor?: string): Promise<ApiResult<MemberPage>> {
    this.calls.push(`members:${roleId}:${cursor ?? ''}:${limit}`);
    return this.pages.get(`${roleId}:${cursor ?? ''}`) ?? ok({ members: [] });
  }

  async getUserDetails(userId: UserId): Promise<ApiResult<UserDetails>> {
    this.calls.push(`user:${userId}`);
    return shiftOrRepeat(this.details.get(userId)) ?? fail({ kind: 'other', status: 404, message: 'unexpected HTTP 404' });
  }

  async setMemberRole(groupId: GroupId, userId: UserId, roleId: RoleId): Promise<ApiResult<void>> {
    this.calls.push(`set:${userId}:${roleId}`);
    const outcome = shiftOrRepeat(this.setRoleOutcomes.get(userId)) ?? ok(undefined);
    if (outcome.ok) this.assignments.push({ userId, roleId });
    return outcome;
  }
}

function shiftOrRepeat<T>(queue: T[] | undefined): T | undefined {
  if (!queue || queue.length === 0) return undefined;
  return queue.length > 1 ? queue.shift() : queue[0];
}
