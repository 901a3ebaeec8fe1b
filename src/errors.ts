// Fatal run errors.
//
// Each carries a stable `code` so the CLI and the failure journal can branch on
// the kind of failure without string matching. Recoverable platform failures
// never become one of these; they stay PlatformError values inside the retry loop.

import type { PlatformError } from './types.js';

export const RANK_SYNC_ERROR_CODES = [
  'config-file-not-provided',
  'config-load',
  'role-not-found',
  'retry-limit-exceeded',
  'non-recoverable-platform',
  'malformed-creation-date',
  'interrupted',
] as const;

export type RankSyncErrorCode = typeof RANK_SYNC_ERROR_CODES[number];

export abstract class RankSyncError extends Error {
  abstract readonly code: RankSyncErrorCode;
}

export const USAGE = 'Usage: group-rank-sync <config_file>';

export class ConfigFileNotProvidedError extends RankSyncError {
  readonly code = 'config-file-not-provided';

  constructor() {
    super(`Please provide a config file as an argument. ${USAGE}`);
    this.name = 'ConfigFileNotProvidedError';
  }
}

export class ConfigLoadError extends RankSyncError {
  readonly code = 'config-load';

  constructor(readonly configPath: string, detail: string) {
    super(`Failed to load config ${configPath}: ${detail}`);
    this.name = 'ConfigLoadError';
  }
}

export class RoleNotFoundError extends RankSyncError {
  readonly code = 'role-not-found';

  constructor(readonly roleName: string) {
    super(`Role ${roleName} not found`);
    this.name = 'RoleNotFoundError';
  }
}

export class EndpointExceededRetryLimitError extends RankSyncError {
  readonly code = 'retry-limit-exceeded';

  constructor(readonly endpoint: string) {
    super(`${endpoint} endpoint exceeded retry limit`);
    this.name = 'EndpointExceededRetryLimitError';
  }
}

export class NonRecoverablePlatformError extends RankSyncError {
  readonly code = 'non-recoverable-platform';

  constructor(readonly platformError: PlatformError) {
    super(`Non-recoverable platform error: (${describePlatformError(platformError)})`);
    this.name = 'NonRecoverablePlatformError';
  }
}

export class MalformedCreationDateError extends RankSyncError {
  readonly code = 'malformed-creation-date';

  constructor(readonly userId: number, readonly created: string) {
    super(`User ${userId} has an unparseable creation date: "${created}"`);
    this.name = 'MalformedCreationDateError';
  }
}

export class RunInterruptedError extends RankSyncError {
  readonly code = 'interrupted';

  constructor(readonly signal: string) {
    super(`Run interrupted by ${signal}`);
    this.name = 'RunInterruptedError';
  }
}

/** Human-readable one-liner for a classified platform failure */
export function describePlatformError(error: PlatformError): string {
  switch (error.kind) {
    case 'rate-limited':
      return 'too many requests';
    case 'invalid-credential':
      return 'invalid .ROBLOSECURITY cookie';
    case 'already-has-role':
      return `user already has role (code ${error.code})`;
    case 'platform-code':
      return `HTTP ${error.status}, code ${error.code}: ${error.message}`;
    case 'other':
      return error.status === undefined ? error.message : `HTTP ${error.status}: ${error.message}`;
  }
}
