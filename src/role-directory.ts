// Resolves every role name the config mentions to the platform's role id.
//
// One listing call per run. Names are checked in a fixed order (scanned roles,
// mapped roles, wildcard) so the first missing one is reported the same way
// every time. Nothing is mutated on the platform before this succeeds.

import { NonRecoverablePlatformError, RoleNotFoundError } from './errors.js';
import type { GroupApi, GroupRole, RoleId, SyncConfig } from './types.js';

export type RoleDirectory = ReadonlyMap<string, RoleId>;

/** Every role name the run depends on, de-duplicated, in resolution order */
export function requiredRoleNames(config: SyncConfig): readonly string[] {
  const names = new Set<string>();
  for (const name of config.scannedRoles) names.add(name);
  for (const name of config.roleYearPairs.keys()) names.add(name);
  names.add(config.wildcardRole);
  return Array.from(names);
}

export async function resolveRoleDirectory(api: GroupApi, config: SyncConfig): Promise<RoleDirectory> {
  const listed = await api.listGroupRoles(config.groupId);
  if (!listed.ok) {
    throw new NonRecoverablePlatformError(listed.error);
  }

  return buildRoleDirectory(listed.value, requiredRoleNames(config));
}

/** Exact-match each required name against the listed roles */
export function buildRoleDirectory(roles: readonly GroupRole[], names: readonly string[]): RoleDirectory {
  const directory = new Map<string, RoleId>();
  for (const name of names) {
    const role = roles.find(r => r.name === name);
    if (!role) {
      throw new RoleNotFoundError(name);
    }
    directory.set(name, role.id);
  }
  return directory;
}

/** Look up a name that resolveRoleDirectory already validated */
export function roleIdOf(directory: RoleDirectory, name: string): RoleId {
  const id = directory.get(name);
  if (id === undefined) {
    throw new RoleNotFoundError(name);
  }
  return id;
}
