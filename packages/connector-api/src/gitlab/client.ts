/**
 * GitLab REST API Client
 *
 * Client for the GitLab v4 groups and group-members endpoints,
 * authenticated with a personal, group or project access token.
 */

import { z } from 'zod';
import { GatewayError } from '@groupsync/core';

export interface GitLabClientConfig {
  /** Access token sent as PRIVATE-TOKEN */
  token: string;
  /** Instance URL (default: https://gitlab.com) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Page size for list calls (default: 100) */
  perPage?: number;
  /** Pages read per listing before giving up (default: 1000) */
  maxPages?: number;
  /** Gateway id carried by errors (default: gitlab) */
  gatewayId?: string;
}

const gitlabGroupSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    path: z.string(),
    full_path: z.string(),
  })
  .passthrough();

const samlIdentitySchema = z
  .object({
    extern_uid: z.string(),
    provider: z.string().optional(),
    saml_provider_id: z.number().optional(),
  })
  .passthrough();

const gitlabMemberSchema = z
  .object({
    id: z.number().int(),
    username: z.string(),
    name: z.string().optional(),
    state: z.string().optional(),
    access_level: z.number().int(),
    group_saml_identity: samlIdentitySchema.nullable().optional(),
  })
  .passthrough();

export type GitLabGroup = z.infer<typeof gitlabGroupSchema>;
export type GitLabMember = z.infer<typeof gitlabMemberSchema>;

type RequestKind = 'read' | 'write';

type RawResponse = {
  status: number;
  headers: Headers;
  data: unknown;
};

const MAX_PAGES = 1000;

export class GitLabClient {
  private readonly config: GitLabClientConfig;
  private readonly baseUrl: string;
  private readonly gatewayId: string;

  constructor(config: GitLabClientConfig) {
    this.config = config;
    this.baseUrl = (config.baseUrl ?? 'https://gitlab.com').replace(/\/+$/, '');
    this.gatewayId = config.gatewayId ?? 'gitlab';
  }

  /**
   * Search groups by name or path, every page
   */
  async searchGroups(search: string): Promise<GitLabGroup[]> {
    return this.listAll('/groups', { search }, gitlabGroupSchema, 'group');
  }

  /**
   * List direct and inherited members of a group
   */
  async listAllGroupMembers(groupId: string): Promise<GitLabMember[]> {
    return this.listAll(
      `/groups/${encodeURIComponent(groupId)}/members/all`,
      {},
      gitlabMemberSchema,
      'member'
    );
  }

  /**
   * Follow `x-next-page` until it is empty. A listing still unfinished after
   * `maxPages` is an error, never a partial result.
   */
  private async listAll<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T>,
    label: string
  ): Promise<T[]> {
    const items: T[] = [];
    const perPage = String(Math.min(Math.max(this.config.perPage ?? 100, 1), 100));
    const maxPages = this.config.maxPages ?? MAX_PAGES;
    let page: string | null = '1';

    for (let i = 0; page; i++) {
      if (i >= maxPages) {
        throw new GatewayError({
          code: 'INVALID_RESPONSE',
          message: `GitLab ${label} list exceeds ${maxPages} pages`,
          gatewayId: this.gatewayId,
          suggestion: 'Narrow the group search or raise the page limit.',
          context: { path, nextPage: page },
        });
      }
      const params = new URLSearchParams({ ...query, per_page: perPage, page });
      const response = await this.request('GET', `${path}?${params.toString()}`, 'read');
      items.push(...parseList(response.data, schema, label, this.gatewayId));
      page = response.headers.get('x-next-page') || null;
    }

    return items;
  }

  /**
   * Add a user to a group. Returns false when the user is already a member.
   */
  async addGroupMember(groupId: string, userId: string, accessLevel: number): Promise<boolean> {
    const response = await this.request(
      'POST',
      `/groups/${encodeURIComponent(groupId)}/members`,
      'write',
      { user_id: userId, access_level: accessLevel },
      [409]
    );
    return response.status !== 409;
  }

  /**
   * Remove a user from a group. Returns false when the user is not a direct member.
   */
  async removeGroupMember(groupId: string, userId: string): Promise<boolean> {
    const response = await this.request(
      'DELETE',
      `/groups/${encodeURIComponent(groupId)}/members/${encodeURIComponent(userId)}`,
      'write',
      undefined,
      [404]
    );
    return response.status !== 404;
  }

  /**
   * Make an API request
   *
   * @param tolerated - Non-2xx statuses returned to the caller instead of thrown
   */
  private async request(
    method: string,
    path: string,
    kind: RequestKind,
    body?: unknown,
    tolerated: number[] = []
  ): Promise<RawResponse> {
    const url = `${this.baseUrl}/api/v4${path}`;
    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'PRIVATE-TOKEN': this.config.token,
          'Content-Type': 'application/json',
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new GatewayError({
          code: 'TIMEOUT',
          message: `GitLab request timed out after ${timeoutMs}ms`,
          gatewayId: this.gatewayId,
          suggestion: 'Increase access.timeoutMs or check network connectivity.',
        });
      }

      throw new GatewayError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to GitLab API: ${err instanceof Error ? err.message : String(err)}`,
        gatewayId: this.gatewayId,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (tolerated.includes(response.status)) {
      return { status: response.status, headers: response.headers, data: null };
    }

    if (!response.ok) {
      let errorMessage = `HTTP ${response.status}`;
      const errorBody = await readJson(response);
      const parsed = z
        .object({ message: z.unknown().optional(), error: z.string().optional() })
        .safeParse(errorBody);
      if (parsed.success) {
        const detail = parsed.data.message ?? parsed.data.error;
        if (typeof detail === 'string') errorMessage = detail;
        else if (detail !== undefined) errorMessage = JSON.stringify(detail);
      }

      throw statusError(response.status, errorMessage, kind, this.gatewayId);
    }

    // Handle 204 No Content
    if (response.status === 204) {
      return { status: 204, headers: response.headers, data: null };
    }

    return { status: response.status, headers: response.headers, data: await readJson(response) };
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return (await response.json()) as unknown;
  } catch {
    return null;
  }
}

function parseList<T>(data: unknown, schema: z.ZodType<T>, label: string, gatewayId: string): T[] {
  const parsed = z.array(schema).safeParse(data);
  if (!parsed.success) {
    throw new GatewayError({
      code: 'INVALID_RESPONSE',
      message: `GitLab API returned a malformed ${label} list`,
      gatewayId,
      context: {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      },
    });
  }
  return parsed.data;
}

function statusError(
  status: number,
  errorMessage: string,
  kind: RequestKind,
  gatewayId: string
): GatewayError {
  switch (status) {
    case 401:
      return new GatewayError({
        code: 'AUTHENTICATION_FAILED',
        message: `GitLab authentication failed: ${errorMessage}`,
        gatewayId,
        suggestion: 'Check the GitLab access token.',
      });
    case 403:
      return new GatewayError({
        code: 'PERMISSION_DENIED',
        message: `GitLab denied access: ${errorMessage}`,
        gatewayId,
        suggestion: 'The token needs the api scope and Owner or Maintainer rights on the groups.',
      });
    case 404:
      return new GatewayError({
        code: 'NOT_FOUND',
        message: `GitLab resource not found: ${errorMessage}`,
        gatewayId,
      });
    case 429:
      return new GatewayError({
        code: 'RATE_LIMITED',
        message: 'GitLab API rate limit exceeded',
        gatewayId,
        suggestion: 'Wait and retry, or configure runtime.retries.',
      });
    default:
      return new GatewayError({
        code: kind === 'write' ? 'WRITE_FAILED' : 'READ_FAILED',
        message: `GitLab API error: ${errorMessage}`,
        gatewayId,
        context: { status },
      });
  }
}
