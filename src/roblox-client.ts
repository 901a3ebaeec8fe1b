// Roblox web API boundary — the production GroupApi.
//
// Every failure is classified here, once, into a PlatformError; nothing above
// this file looks at HTTP statuses or error bodies. Response bodies are
// validated with zod before they are trusted.
// Inject a fake `fetch` in tests; the global one is used in production.

import { z } from 'zod';
import { ALREADY_HAS_ROLE_ERROR_CODE } from './thresholds.js';
import type { Sensitive } from './secret.js';
import {
  fail, ok,
  type ApiResult, type GroupApi, type GroupId, type GroupRole, type MemberPage,
  type PlatformError, type RoleId, type UserDetails, type UserId,
} from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RobloxClientOptions {
  readonly fetch?: FetchLike;
  readonly groupsBaseUrl?: string;
  readonly usersBaseUrl?: string;
}

export const GROUPS_BASE_URL = 'https://groups.roblox.com';
export const USERS_BASE_URL = 'https://users.roblox.com';
const CSRF_HEADER = 'x-csrf-token';

const ErrorBodySchema = z.object({
  errors: z.array(z.object({
    code: z.number().int(),
    message: z.string().default(''),
  })).min(1),
});

const GroupRolesSchema = z.object({
  roles: z.array(z.object({
    id: z.number().int(),
    name: z.string(),
    rank: z.number().int(),
  })),
});

const RoleMembersSchema = z.object({
  nextPageCursor: z.string().nullable().optional(),
  data: z.array(z.object({ userId: z.number().int() })),
});

const UserDetailsSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  created: z.string(),
});

type Method = 'GET' | 'PATCH';

/** Map a failed HTTP response onto the platform error taxonomy */
export function classifyFailure(status: number, body: unknown): PlatformError {
  if (status === 429) return { kind: 'rate-limited' };
  if (status === 401) return { kind: 'invalid-credential' };

  const parsed = ErrorBodySchema.safeParse(body);
  if (parsed.success) {
    const [first] = parsed.data.errors;
    return { kind: 'platform-code', status, code: first.code, message: first.message };
  }
  return { kind: 'other', status, message: `unexpected HTTP ${status}` };
}

/** Body text as JSON; undefined when empty or not JSON */
async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function malformed(what: string, error: z.ZodError): PlatformError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return { kind: 'other', message: `malformed ${what} response${where}` };
}

export class RobloxGroupApi implements GroupApi {
  private readonly fetchFn: FetchLike;
  private readonly groupsBaseUrl: string;
  private readonly usersBaseUrl: string;
  private csrfToken: string | undefined;

  constructor(private readonly credential: Sensitive<string>, options: RobloxClientOptions = {}) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.groupsBaseUrl = options.groupsBaseUrl ?? GROUPS_BASE_URL;
    this.usersBaseUrl = options.usersBaseUrl ?? USERS_BASE_URL;
  }

  async listGroupRoles(groupId: GroupId): Promise<ApiResult<readonly GroupRole[]>> {
    const result = await this.request('GET', `${this.groupsBaseUrl}/v1/groups/${groupId}/roles`);
    if (!result.ok) return result;

    const parsed = GroupRolesSchema.safeParse(result.value);
    if (!parsed.success) return fail(malformed('group roles', parsed.error));
    return ok(parsed.data.roles);
  }

  async listRoleMembers(groupId: GroupId, roleId: RoleId, limit: number, cursor?: string): Promise<ApiResult<MemberPage>> {
    const params = new URLSearchParams({ limit: String(limit), sortOrder: 'Desc' });
    if (cursor !== undefined) params.set('cursor', cursor);

    const result = await this.request('GET', `${this.groupsBaseUrl}/v1/groups/${groupId}/roles/${roleId}/users?${params}`);
    if (!result.ok) return result;

    const parsed = RoleMembersSchema.safeParse(result.value);
    if (!parsed.success) return fail(malformed('role members', parsed.error));

    const { data, nextPageCursor } = parsed.data;
    const members = data.map(m => ({ userId: m.userId }));
    return ok(nextPageCursor ? { members, nextCursor: nextPageCursor } : { members });
  }

  async getUserDetails(userId: UserId): Promise<ApiResult<UserDetails>> {
    const result = await this.request('GET', `${this.usersBaseUrl}/v1/users/${userId}`);
    if (!result.ok) return result;

    const parsed = UserDetailsSchema.safeParse(result.value);
    if (!parsed.success) return fail(malformed('user details', parsed.error));
    return ok(parsed.data);
  }

  async setMemberRole(groupId: GroupId, userId: UserId, roleId: RoleId): Promise<ApiResult<void>> {
    const result = await this.request('PATCH', `${this.groupsBaseUrl}/v1/groups/${groupId}/users/${userId}`, { roleId });
    if (result.ok) return ok(undefined);

    const { error } = result;
    if (error.kind === 'platform-code' && error.code === ALREADY_HAS_ROLE_ERROR_CODE) {
      return fail({ kind: 'already-has-role', code: error.code });
    }
    return result;
  }

  /**
   * One logical request. Mutating requests that come back 403 with a fresh
   * x-csrf-token are sent once more with that token; the token is kept for
   * later calls.
   */
  private async request(method: Method, url: string, body?: unknown): Promise<ApiResult<unknown>> {
    let response: Response;
    let payload: unknown;
    try {
      response = await this.send(method, url, body);
      if (response.status === 403 && method !== 'GET') {
        const token = response.headers.get(CSRF_HEADER);
        if (token && token !== this.csrfToken) {
          this.csrfToken = token;
          // Release the rejected response's connection before resending
          await response.body?.cancel();
          response = await this.send(method, url, body);
        }
      }
      payload = await readJson(response);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return fail({ kind: 'other', message: `network error: ${message}` });
    }

    if (response.ok) return ok(payload);
    return fail(classifyFailure(response.status, payload));
  }

  private send(method: Method, url: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      cookie: `.ROBLOSECURITY=${this.credential.reveal()}`,
    };
    if (body !== undefined) headers['content-type'] = 'application/json';
    if (method !== 'GET' && this.csrfToken) headers[CSRF_HEADER] = this.csrfToken;

    return this.fetchFn(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }
}
