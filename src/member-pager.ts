// Cursor-driven enumeration of the members holding one role.
//
// Termination:
//   - an empty page ends enumeration, even if the platform sent a cursor
//   - a page with members but no next cursor ends enumeration after it is yielded
// Each call starts from the first page; there is no mid-stream resume.

import { NonRecoverablePlatformError } from './errors.js';
import { DEFAULT_PAGE_LIMIT } from './thresholds.js';
import type { GroupApi, GroupId, RoleId, UserId } from './types.js';

export async function* pageMembers(
  api: GroupApi,
  groupId: GroupId,
  roleId: RoleId,
  limit: number = DEFAULT_PAGE_LIMIT,
): AsyncGenerator<readonly UserId[], void, undefined> {
  let cursor: string | undefined;

  for (;;) {
    const page = await api.listRoleMembers(groupId, roleId, limit, cursor);
    if (!page.ok) {
      throw new NonRecoverablePlatformError(page.error);
    }

    const { members, nextCursor } = page.value;
    if (members.length === 0) return;

    yield members.map(m => m.userId);

    if (nextCursor === undefined) return;
    cursor = nextCursor;
  }
}
