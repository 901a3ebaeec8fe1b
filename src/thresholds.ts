// Central policy definitions for the rank sync.
//
// Split into two categories intentionally:
//
//   PLATFORM — facts about the Roblox API. Not configurable.
//
//   USER-FACING — control how patiently the job talks to the API.
//   Exposed via the config file under a top-level "behavior" key.
//   All have defaults; the user only needs to set what they want to change.

// ─── Platform constants ────────────────────────────────────────────────────

/** Error code returned by the set-role endpoint when the member already holds the role. */
export const ALREADY_HAS_ROLE_ERROR_CODE = 26;

/** Page sizes the role-members endpoint accepts. */
export const ALLOWED_PAGE_LIMITS: readonly number[] = [10, 25, 50, 100];

/** Inclusive bounds for a four-digit creation year. */
export const MIN_CREATION_YEAR = 1000;
export const MAX_CREATION_YEAR = 9999;

// ─── User-facing behavior defaults ─────────────────────────────────────────

/** Wait after a rate-limited response before the next attempt. */
export const DEFAULT_COOLDOWN_SECONDS = 60;

/** Total attempts for one account-age lookup. */
export const DEFAULT_ACCOUNT_AGE_ATTEMPTS = 5;

/** Total attempts for one set-role call. */
export const DEFAULT_SET_ROLE_ATTEMPTS = 5;

/** Members requested per page (the platform maximum). */
export const DEFAULT_PAGE_LIMIT = 100;

// ─── Endpoint labels ───────────────────────────────────────────────────────
// Used in EndpointExceededRetryLimitError messages.

export const ACCOUNT_AGE_ENDPOINT = 'Account age';
export const SET_ROLE_ENDPOINT = 'Set group member role';
