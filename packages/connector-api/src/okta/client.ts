/**
 * Okta Management API Client
 *
 * REST client for the Okta Groups API, authenticated with an API token.
 * Follows `Link: <...>; rel="next"` pagination.
 */

import { z } from 'zod';
import { GatewayError } from '@groupsync/core';

export interface OktaClientConfig {
  /** Organization URL (e.g. https://example.okta.com) */
  orgUrl: string;
  /** API token */
  token: string;
  /** Request timeout in milliseconds (default: 45000) */
  timeoutMs?: number;
  /** Page size for list calls (default: 200) */
  pageSize?: number;
  /** Pages read per listing before giving up (default: 1000) */
  maxPages?: number;
  /** Gateway id carried by errors (default: okta) */
  gatewayId?: string;
}

/** Okta user lifecycle status */
export type OktaUserStatus =
  | 'STAGED'
  | 'PROVISIONED'
  | 'ACTIVE'
  | 'RECOVERY'
  | 'PASSWORD_EXPIRED'
  | 'LOCKED_OUT'
  | 'SUSPENDED'
  | 'DEPROVISIONED';

const oktaGroupSchema = z
  .object({
    id: z.string().min(1),
    profile: z.object({ name: z.string() }).passthrough(),
  })
  .passthrough();

const oktaUserSchema = z
  .object({
    id: z.string().min(1),
    status: z.string(),
    profile: z.object({ login: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type OktaGroup = z.infer<typeof oktaGroupSchema>;
export type OktaUser = z.infer<typeof oktaUserSchema>;

type Page = {
  data: unknown;
  next: string | null;
};

const MAX_PAGES = 1000;

/**
 * Extract the `rel="next"` target from a Link header
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const part of header.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/i);
    if (match?.[1]) return match[1];
  }
  return null;
}

export class OktaClient {
  private readonly config: OktaClientConfig;
  private readonly origin: string;
  private readonly gatewayId: string;

  constructor(config: OktaClientConfig) {
    this.config = config;
    this.origin = new URL(config.orgUrl).origin;
    this.gatewayId = config.gatewayId ?? 'okta';
  }

  /**
   * List groups matching `query` (Okta matches group names by prefix)
   */
  async listGroups(query: string): Promise<OktaGroup[]> {
    const params = new URLSearchParams({
      q: query,
      limit: String(this.pageSize()),
    });
    const items = await this.listAll(`/api/v1/groups?${params.toString()}`);
    return this.parseItems(items, oktaGroupSchema, 'group');
  }

  /**
   * List every user of a group, whatever their status
   */
  async listGroupUsers(groupId: string): Promise<OktaUser[]> {
    const params = new URLSearchParams({ limit: String(this.pageSize()) });
    const items = await this.listAll(
      `/api/v1/groups/${encodeURIComponent(groupId)}/users?${params.toString()}`
    );
    return this.parseItems(items, oktaUserSchema, 'user');
  }

  private pageSize(): number {
    return Math.min(Math.max(this.config.pageSize ?? 200, 1), 200);
  }

  private async listAll(firstPath: string): Promise<unknown[]> {
    const items: unknown[] = [];
    const maxPages = this.config.maxPages ?? MAX_PAGES;
    let url: string | null = `${this.origin}${firstPath}`;

    for (let page = 0; url; page++) {
      if (page >= maxPages) {
        throw new GatewayError({
          code: 'INVALID_RESPONSE',
          message: `Okta listing exceeds ${maxPages} pages`,
          gatewayId: this.gatewayId,
          context: { firstPath, next: url },
        });
      }
      const result: Page = await this.request(url);
      if (!Array.isArray(result.data)) {
        throw new GatewayError({
          code: 'INVALID_RESPONSE',
          message: 'Okta API returned a non-array page',
          gatewayId: this.gatewayId,
          context: { url },
        });
      }
      items.push(...result.data);
      url = result.next;
    }

    return items;
  }

  private parseItems<T>(items: unknown[], schema: z.ZodType<T>, label: string): T[] {
    return items.map((item, index) => {
      const parsed = schema.safeParse(item);
      if (!parsed.success) {
        throw new GatewayError({
          code: 'INVALID_RESPONSE',
          message: `Okta API returned a malformed ${label} at index ${index}`,
          gatewayId: this.gatewayId,
          context: { issues: parsed.error.issues.map((i) => i.message) },
        });
      }
      return parsed.data;
    });
  }

  /**
   * Make a GET request against the org
   */
  private async request(url: string): Promise<Page> {
    if (new URL(url).origin !== this.origin) {
      throw new GatewayError({
        code: 'INVALID_RESPONSE',
        message: `Okta pagination link points outside the org: ${url}`,
        gatewayId: this.gatewayId,
      });
    }

    const timeoutMs = this.config.timeoutMs ?? 45_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Authorization: `SSWS ${this.config.token}`,
          Accept: 'application/json',
        },
        signal: controller.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new GatewayError({
          code: 'TIMEOUT',
          message: `Okta request timed out after ${timeoutMs}ms`,
          gatewayId: this.gatewayId,
          suggestion: 'Increase directory.timeoutMs or check network connectivity.',
        });
      }

      throw new GatewayError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to Okta: ${err instanceof Error ? err.message : String(err)}`,
        gatewayId: this.gatewayId,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      let errorMessage = `HTTP ${response.status}`;
      const errorBody = await readJson(response);
      const summary = z.object({ errorSummary: z.string() }).safeParse(errorBody);
      if (summary.success) {
        errorMessage = summary.data.errorSummary;
      }

      throw statusError(response.status, errorMessage, this.gatewayId);
    }

    return {
      data: await readJson(response),
      next: parseNextLink(response.headers.get('link')),
    };
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return (await response.json()) as unknown;
  } catch {
    return null;
  }
}

function statusError(status: number, errorMessage: string, gatewayId: string): GatewayError {
  switch (status) {
    case 401:
      return new GatewayError({
        code: 'AUTHENTICATION_FAILED',
        message: `Okta authentication failed: ${errorMessage}`,
        gatewayId,
        suggestion: 'Check the Okta API token.',
      });
    case 403:
      return new GatewayError({
        code: 'PERMISSION_DENIED',
        message: `Okta denied access: ${errorMessage}`,
        gatewayId,
        suggestion: 'Grant the token read access to groups and users.',
      });
    case 404:
      return new GatewayError({
        code: 'NOT_FOUND',
        message: `Okta resource not found: ${errorMessage}`,
        gatewayId,
      });
    case 429:
      return new GatewayError({
        code: 'RATE_LIMITED',
        message: 'Okta API rate limit exceeded',
        gatewayId,
        suggestion: 'Wait and retry, or configure runtime.retries.',
      });
    default:
      return new GatewayError({
        code: 'READ_FAILED',
        message: `Okta API error: ${errorMessage}`,
        gatewayId,
        context: { status },
      });
  }
}
