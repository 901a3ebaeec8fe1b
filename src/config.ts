// Configuration loading for the rank sync.
//
// Sources: the JSON file named on the command line, plus one env var tier for
// the credential (RANK_SYNC_ROBLOSECURITY) so the cookie can stay out of the file.
// Structural problems are fatal (ConfigLoadError); a bad "behavior" value only
// warns and falls back to its default, the same way thresholds always have.

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigLoadError } from './errors.js';
import { Sensitive } from './secret.js';
import {
  ALLOWED_PAGE_LIMITS,
  DEFAULT_ACCOUNT_AGE_ATTEMPTS,
  DEFAULT_COOLDOWN_SECONDS,
  DEFAULT_PAGE_LIMIT,
  DEFAULT_SET_ROLE_ATTEMPTS,
  MAX_CREATION_YEAR,
  MIN_CREATION_YEAR,
} from './thresholds.js';
import type { BehaviorConfig, SyncConfig } from './types.js';

export const CREDENTIAL_ENV_VAR = 'RANK_SYNC_ROBLOSECURITY';

const roleName = z.string().min(1, 'role names must not be empty');
const year = z.number().int().min(MIN_CREATION_YEAR).max(MAX_CREATION_YEAR);

const ConfigFileSchema = z.object({
  groupId: z.number().int().positive(),
  roblosecurity: z.string().min(1).optional(),
  scannedRoles: z.array(roleName),
  roleYearPairs: z.record(roleName, z.array(year)),
  wildcardRole: roleName,
  behavior: z.record(z.string(), z.unknown()).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Validate and clamp a numeric threshold to a given range.
 *  Returns the default if the value is missing, NaN, or out of range. */
function clampThreshold(key: string, value: unknown, defaultValue: number, min: number, max: number): number {
  if (value === undefined || value === null) return defaultValue;
  const n = Number(value);
  if (isNaN(n) || n < min || n > max) {
    process.stderr.write(`[rank-sync] Behavior "${key}" out of range [${min}, ${max}]: ${String(value)}; using default ${defaultValue}\n`);
    return defaultValue;
  }
  return Math.round(n); // integer thresholds only
}

/** Known behavior config keys — used to warn on typos/unknown fields at startup. */
const KNOWN_BEHAVIOR_KEYS = new Set<string>([
  'cooldownSeconds', 'accountAgeAttempts', 'setRoleAttempts', 'pageLimit',
]);

/** Parse and validate a behavior block, falling back to defaults for each field.
 *  Warns to stderr for unknown keys (likely typos) and out-of-range values. */
export function parseBehaviorConfig(raw?: Readonly<Record<string, unknown>>): BehaviorConfig {
  if (!raw) {
    return {
      cooldownSeconds: DEFAULT_COOLDOWN_SECONDS,
      accountAgeAttempts: DEFAULT_ACCOUNT_AGE_ATTEMPTS,
      setRoleAttempts: DEFAULT_SET_ROLE_ATTEMPTS,
      pageLimit: DEFAULT_PAGE_LIMIT,
    };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_BEHAVIOR_KEYS.has(key)) {
      process.stderr.write(
        `[rank-sync] Unknown behavior config key "${key}"; ignored. ` +
        `Valid keys: ${Array.from(KNOWN_BEHAVIOR_KEYS).join(', ')}\n`
      );
    }
  }

  return {
    cooldownSeconds: clampThreshold('cooldownSeconds', raw.cooldownSeconds, DEFAULT_COOLDOWN_SECONDS, 1, 600),
    accountAgeAttempts: clampThreshold('accountAgeAttempts', raw.accountAgeAttempts, DEFAULT_ACCOUNT_AGE_ATTEMPTS, 1, 20),
    setRoleAttempts: clampThreshold('setRoleAttempts', raw.setRoleAttempts, DEFAULT_SET_ROLE_ATTEMPTS, 1, 20),
    pageLimit: parsePageLimit(raw.pageLimit),
  };
}

function parsePageLimit(value: unknown): number {
  if (value === undefined || value === null) return DEFAULT_PAGE_LIMIT;
  const n = Number(value);
  if (!ALLOWED_PAGE_LIMITS.includes(n)) {
    process.stderr.write(
      `[rank-sync] Behavior "pageLimit" must be one of ${ALLOWED_PAGE_LIMITS.join(', ')}: ${String(value)}; using default ${DEFAULT_PAGE_LIMIT}\n`
    );
    return DEFAULT_PAGE_LIMIT;
  }
  return n;
}

/** Every year listed under more than one role, as human-readable conflicts */
export function findYearConflicts(roleYearPairs: ReadonlyMap<string, readonly number[]>): string[] {
  const owner = new Map<number, string>();
  const conflicts: string[] = [];
  for (const [role, years] of roleYearPairs) {
    for (const y of years) {
      const existing = owner.get(y);
      if (existing === undefined) {
        owner.set(y, role);
      } else if (existing !== role) {
        conflicts.push(`year ${y} is listed under both "${existing}" and "${role}"`);
      }
    }
  }
  return conflicts;
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validate already-parsed JSON into a frozen SyncConfig. Exported for testing. */
export function parseSyncConfig(raw: unknown, configPath: string, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigLoadError(configPath, formatZodIssues(parsed.error));
  }
  const file: ConfigFile = parsed.data;

  const credential = file.roblosecurity ?? env[CREDENTIAL_ENV_VAR];
  if (!credential) {
    throw new ConfigLoadError(configPath, `missing "roblosecurity" (set it in the file or via ${CREDENTIAL_ENV_VAR})`);
  }

  const roleYearPairs = new Map<string, readonly number[]>(
    Object.entries(file.roleYearPairs).map(([role, years]) => [role, Object.freeze([...years])]),
  );

  const conflicts = findYearConflicts(roleYearPairs);
  if (conflicts.length > 0) {
    throw new ConfigLoadError(configPath, conflicts.join('; '));
  }

  return Object.freeze({
    groupId: file.groupId,
    roblosecurity: new Sensitive(credential),
    scannedRoles: Object.freeze([...file.scannedRoles]),
    roleYearPairs,
    wildcardRole: file.wildcardRole,
    behavior: Object.freeze(parseBehaviorConfig(file.behavior)),
  });
}

/** Read, parse and validate the config file. Every failure becomes a ConfigLoadError. */
export function loadSyncConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(configPath, message);
  }

  const config = parseSyncConfig(raw, configPath, env);
  process.stderr.write(
    `[rank-sync] Loaded config for group ${config.groupId}: ` +
    `${config.scannedRoles.length} scanned role(s), ${config.roleYearPairs.size} year mapping(s)\n`
  );
  return config;
}
