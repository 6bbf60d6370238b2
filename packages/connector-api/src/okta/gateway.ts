/**
 * Okta Directory Gateway
 *
 * Implements IDirectoryGateway on top of the Okta Groups API.
 */

import type {
  GatewayConfig,
  GatewayResult,
  IDirectoryGateway,
  UpstreamGroup,
} from '@groupsync/core';
import { toResult } from '@groupsync/core';
import { OktaClient, type OktaUser } from './client.js';

export interface OktaGatewayConfig extends GatewayConfig {
  type: 'okta';
  /** Organization URL */
  orgUrl: string;
  /** API token */
  token: string;
  /** Page size for list calls (default: 200) */
  pageSize?: number;
}

/** Statuses that take a user out of every downstream grant */
const DEPROVISIONED_STATUSES: ReadonlySet<string> = new Set(['DEPROVISIONED', 'SUSPENDED']);

export function isDeprovisioned(user: Pick<OktaUser, 'status'>): boolean {
  return DEPROVISIONED_STATUSES.has(user.status);
}

export class OktaDirectoryGateway implements IDirectoryGateway {
  readonly config: OktaGatewayConfig;
  private readonly client: OktaClient;

  constructor(config: Omit<OktaGatewayConfig, 'type'> & { type?: 'okta' }, client?: OktaClient) {
    this.config = { ...config, type: 'okta' };
    this.client =
      client ??
      new OktaClient({
        orgUrl: config.orgUrl,
        token: config.token,
        timeoutMs: config.timeoutMs,
        pageSize: config.pageSize,
        gatewayId: config.id,
      });
  }

  async fetchGroupsByPrefix(prefix: string): Promise<GatewayResult<UpstreamGroup[]>> {
    return toResult(
      async () => {
        // Okta's q parameter also matches other name fields; keep true prefix matches only.
        const groups = (await this.client.listGroups(prefix)).filter((g) =>
          g.profile.name.startsWith(prefix)
        );

        const out: UpstreamGroup[] = [];
        for (const group of groups) {
          const users = await this.client.listGroupUsers(group.id);
          const activeMemberIds: string[] = [];
          const deprovisionedMemberIds: string[] = [];
          for (const user of users) {
            if (isDeprovisioned(user)) deprovisionedMemberIds.push(user.id);
            else activeMemberIds.push(user.id);
          }
          out.push({
            id: group.id,
            name: group.profile.name,
            activeMemberIds,
            deprovisionedMemberIds,
          });
        }
        return out;
      },
      this.config.id,
      'READ_FAILED'
    );
  }
}

/**
 * Factory function for Okta directory gateways
 */
export function createOktaDirectoryGateway(
  config: Omit<OktaGatewayConfig, 'type'> & { type?: 'okta' }
): OktaDirectoryGateway {
  return new OktaDirectoryGateway(config);
}
