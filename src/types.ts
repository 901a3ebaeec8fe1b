// Core types for the group rank sync
//
// Design principles:
//   - Make illegal states unrepresentable: discriminated unions over boolean+optional
//   - Validate at boundaries, trust inside: the config loader and the API client
//     are the only places raw input is inspected
//   - Explicit domain types over primitives where meaning matters

import type { Sensitive } from './secret.js';

export type GroupId = number;
export type RoleId = number;
export type UserId = number;

/** A rank within a group, as listed by the platform */
export interface GroupRole {
  readonly id: RoleId;
  readonly name: string;
  readonly rank: number;
}

export interface GroupMember {
  readonly userId: UserId;
}

/** One page of a role's member list. nextCursor is absent on the last page. */
export interface MemberPage {
  readonly members: readonly GroupMember[];
  readonly nextCursor?: string;
}

export interface UserDetails {
  readonly id: UserId;
  readonly name: string;
  readonly created: string;          // ISO 8601, e.g. 2006-03-01T12:00:00.000Z
}

/** Every way a platform call can fail, classified once by the API client */
export type PlatformError =
  | { readonly kind: 'rate-limited' }
  | { readonly kind: 'invalid-credential' }
  | { readonly kind: 'already-has-role'; readonly code: number }
  | { readonly kind: 'platform-code'; readonly status: number; readonly code: number; readonly message: string }
  | { readonly kind: 'other'; readonly message: string; readonly status?: number };

/** Outcome of a platform call — errors are data until a component decides they are fatal */
export type ApiResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PlatformError };

export function ok<T>(value: T): ApiResult<T> {
  return { ok: true, value };
}

export function fail(error: PlatformError): ApiResult<never> {
  return { ok: false, error };
}

/** Group-management platform boundary — injected to keep the engine testable */
export interface GroupApi {
  listGroupRoles(groupId: GroupId): Promise<ApiResult<readonly GroupRole[]>>;
  listRoleMembers(groupId: GroupId, roleId: RoleId, limit: number, cursor?: string): Promise<ApiResult<MemberPage>>;
  getUserDetails(userId: UserId): Promise<ApiResult<UserDetails>>;
  setMemberRole(groupId: GroupId, userId: UserId, roleId: RoleId): Promise<ApiResult<void>>;
}

/** Injectable wait for deterministic cooldowns in tests */
export interface Sleeper {
  sleep(ms: number): Promise<void>;
}

/** Injectable clock for deterministic time in tests */
export interface Clock {
  now(): Date;
  isoNow(): string;
}

/** Production clock using real wall time */
export const realClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

/** User-configurable retry and paging knobs — the config file's "behavior" block, resolved */
export interface BehaviorConfig {
  /** Seconds to wait after a rate-limited response. Default: 60. Range: 1–600. */
  readonly cooldownSeconds: number;
  /** Total attempts for one account-age lookup. Default: 5. Range: 1–20. */
  readonly accountAgeAttempts: number;
  /** Total attempts for one set-role call. Default: 5. Range: 1–20. */
  readonly setRoleAttempts: number;
  /** Members per page. Default: 100. One of 10, 25, 50, 100. */
  readonly pageLimit: number;
}

/** Validated, immutable run configuration */
export interface SyncConfig {
  readonly groupId: GroupId;
  readonly roblosecurity: Sensitive<string>;
  readonly scannedRoles: readonly string[];
  readonly roleYearPairs: ReadonlyMap<string, readonly number[]>;
  readonly wildcardRole: string;
  readonly behavior: BehaviorConfig;
}

/** One completed assignment, handed to the reporter */
export interface Assignment {
  readonly roleName: string;
  readonly userId: UserId;
  readonly year: number;
}

/** Progress sink for the orchestrator */
export interface SyncReporter {
  assigned(assignment: Assignment): void;
  note(message: string): void;
}

/** Everything the engine needs, built once by the CLI and passed down */
export interface SyncContext {
  readonly config: SyncConfig;
  readonly api: GroupApi;
  readonly sleeper: Sleeper;
  readonly clock: Clock;
  readonly reporter: SyncReporter;
}

/** Where the run was when it stopped — kept current by the orchestrator for the failure journal */
export interface RunProgress {
  scannedRole?: string;
  userId?: UserId;
  assigned: number;
}

/** Result of a complete run */
export interface SyncSummary {
  readonly assigned: number;
  readonly byTargetRole: Readonly<Record<string, number>>;
  readonly byScannedRole: Readonly<Record<string, number>>;
  readonly elapsedMs: number;
}
