/**
 * GitLab Access Gateway
 *
 * Implements IAccessGateway for GitLab group membership.
 */

import type {
  AccessGroupSnapshot,
  AccessLevel,
  DownstreamAccount,
  GatewayConfig,
  GatewayResult,
  IAccessGateway,
  MembershipChange,
} from '@groupsync/core';
import { GatewayError, toResult } from '@groupsync/core';
import { GitLabClient, type GitLabGroup, type GitLabMember } from './client.js';

export interface GitLabGatewayConfig extends GatewayConfig {
  type: 'gitlab';
  /** Access token */
  token: string;
  /** Instance URL (default: https://gitlab.com) */
  baseUrl?: string;
}

export function toDownstreamAccount(member: GitLabMember): DownstreamAccount {
  return {
    accountId: String(member.id),
    username: member.username,
    accessLevel: member.access_level,
    federatedId: member.group_saml_identity?.extern_uid ?? null,
  };
}

const GROUP_MATCH_FIELDS = ['full_path', 'path', 'name'] as const;

/**
 * Pick the group whose full path, path or name equals `name`, in that order.
 * Search results are fuzzy, so a single non-exact hit is not accepted.
 * Paths and names repeat across parent groups: several exact hits on the
 * first matching field throw CONFIGURATION_ERROR.
 */
export function selectGroup(
  groups: GitLabGroup[],
  name: string,
  gatewayId = 'gitlab'
): GitLabGroup | null {
  for (const field of GROUP_MATCH_FIELDS) {
    const matches = groups.filter((g) => g[field] === name);
    if (matches.length === 0) continue;
    const [only] = matches;
    if (only && matches.length === 1) return only;

    throw new GatewayError({
      code: 'CONFIGURATION_ERROR',
      message: `GitLab group '${name}' is ambiguous: ${matches.map((g) => g.full_path).join(', ')}`,
      gatewayId,
      suggestion: 'Map the directory group to the full path of one group under mappings.',
      context: { name, field, candidates: matches.map((g) => g.full_path) },
    });
  }
  return null;
}

export class GitLabAccessGateway implements IAccessGateway {
  readonly config: GitLabGatewayConfig;
  private readonly client: GitLabClient;

  constructor(config: Omit<GitLabGatewayConfig, 'type'> & { type?: 'gitlab' }, client?: GitLabClient) {
    this.config = { ...config, type: 'gitlab' };
    this.client =
      client ??
      new GitLabClient({
        token: config.token,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        gatewayId: config.id,
      });
  }

  async fetchGroupMembers(
    name: string,
    maxPrivilege: AccessLevel
  ): Promise<GatewayResult<AccessGroupSnapshot>> {
    return toResult(
      async () => {
        const group = selectGroup(await this.client.searchGroups(name), name, this.config.id);
        if (!group) {
          throw new GatewayError({
            code: 'NOT_FOUND',
            message: `GitLab group '${name}' not found`,
            gatewayId: this.config.id,
            suggestion: 'Create the group or add an explicit entry under mappings.',
            context: { name },
          });
        }

        const members = (await this.client.listAllGroupMembers(String(group.id)))
          .filter((m) => m.access_level < maxPrivilege)
          .map(toDownstreamAccount);

        return { groupId: String(group.id), name: group.full_path, members };
      },
      this.config.id,
      'READ_FAILED'
    );
  }

  async addMember(
    groupId: string,
    accountId: string,
    level: AccessLevel
  ): Promise<GatewayResult<MembershipChange>> {
    return toResult<MembershipChange>(
      async () => {
        const added = await this.client.addGroupMember(groupId, accountId, level);
        return { outcome: added ? 'applied' : 'unchanged' };
      },
      this.config.id,
      'WRITE_FAILED'
    );
  }

  async removeMember(
    groupId: string,
    accountId: string
  ): Promise<GatewayResult<MembershipChange>> {
    return toResult<MembershipChange>(
      async () => {
        const removed = await this.client.removeGroupMember(groupId, accountId);
        return { outcome: removed ? 'applied' : 'unchanged' };
      },
      this.config.id,
      'WRITE_FAILED'
    );
  }
}

/**
 * Factory function for GitLab access gateways
 */
export function createGitLabAccessGateway(
  config: Omit<GitLabGatewayConfig, 'type'> & { type?: 'gitlab' }
): GitLabAccessGateway {
  return new GitLabAccessGateway(config);
}
