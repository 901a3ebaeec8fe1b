// The end-to-end rank sync.
//
// Strictly sequential: roles in config order, members in page order, and one
// classify-then-assign pair finished before the next member starts. Any fatal
// error propagates out of runRankSync; there is no per-member isolation.

import { classifyAccountYear } from './age-classifier.js';
import { pageMembers } from './member-pager.js';
import { assignRole } from './role-assigner.js';
import { resolveRoleDirectory, roleIdOf } from './role-directory.js';
import { buildYearRoleIndex, roleForYear } from './year-role-index.js';
import type { RunProgress, SyncContext, SyncSummary } from './types.js';

/**
 * Rank every member of every scanned role by account-creation year.
 *
 * `progress` is updated in place as the run advances so the caller can say
 * where a failed run stopped.
 */
export async function runRankSync(
  context: SyncContext,
  progress: RunProgress = { assigned: 0 },
): Promise<SyncSummary> {
  const { config, api, reporter, clock } = context;
  const startedAt = clock.now().getTime();

  const directory = await resolveRoleDirectory(api, config);
  const yearIndex = buildYearRoleIndex(config.roleYearPairs);
  reporter.note(`Resolved ${directory.size} role(s) in group ${config.groupId}`);

  // Keyed by config role names, which may collide with Object.prototype members
  const byTargetRole = new Map<string, number>();
  const byScannedRole = new Map<string, number>();

  for (const scannedRole of config.scannedRoles) {
    progress.scannedRole = scannedRole;
    progress.userId = undefined;
    let scanned = 0;
    reporter.note(`Scanning role "${scannedRole}"`);

    const pages = pageMembers(api, config.groupId, roleIdOf(directory, scannedRole), config.behavior.pageLimit);
    for await (const userIds of pages) {
      for (const userId of userIds) {
        progress.userId = userId;

        const year = await classifyAccountYear(context, userId);
        const roleName = roleForYear(yearIndex, year, config.wildcardRole);
        await assignRole(context, userId, roleIdOf(directory, roleName));

        progress.assigned += 1;
        scanned += 1;
        byTargetRole.set(roleName, (byTargetRole.get(roleName) ?? 0) + 1);
        reporter.assigned({ roleName, userId, year });
      }
    }

    byScannedRole.set(scannedRole, (byScannedRole.get(scannedRole) ?? 0) + scanned);
    reporter.note(`Finished role "${scannedRole}": ${scanned} member(s)`);
  }

  return {
    assigned: progress.assigned,
    byTargetRole: Object.fromEntries(byTargetRole),
    byScannedRole: Object.fromEntries(byScannedRole),
    elapsedMs: clock.now().getTime() - startedAt,
  };
}
