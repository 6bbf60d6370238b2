import type {
  AccessGroupSnapshot,
  AccessLevel,
  DownstreamAccount,
  GatewayConfig,
  GatewayResult,
  IAccessGateway,
  IDirectoryGateway,
  MembershipChange,
  UpstreamGroup,
} from '@groupsync/core';
import { GatewayError, fail, ok } from '@groupsync/core';
import { Logger } from '../src/logger.js';

export function silentLogger(lines: string[] = []): Logger {
  return new Logger({ level: 'debug', format: 'json', write: (line) => void lines.push(line) });
}

export class FakeDirectoryGateway implements IDirectoryGateway {
  readonly config: GatewayConfig = { id: 'fake-directory', type: 'memory' };
  failure: GatewayError | null = null;
  readonly prefixes: string[] = [];

  constructor(public groups: UpstreamGroup[]) {}

  async fetchGroupsByPrefix(prefix: string): Promise<GatewayResult<UpstreamGroup[]>> {
    this.prefixes.push(prefix);
    if (this.failure) return fail(this.failure);
    return ok(
      this.groups
        .filter((g) => g.name.startsWith(prefix))
        .map((g) => ({
          ...g,
          activeMemberIds: [...g.activeMemberIds],
          deprovisionedMemberIds: [...g.deprovisionedMemberIds],
        }))
    );
  }
}

type FakeGroup = { groupId: string; name: string; members: DownstreamAccount[] };

/**
 * In-memory access system. Mutations change the stored membership, so a
 * second pass sees the result of the first.
 */
export class FakeAccessGateway implements IAccessGateway {
  readonly config: GatewayConfig = { id: 'fake-access', type: 'memory' };
  readonly calls: string[] = [];
  readonly fetchFailures = new Map<string, GatewayError>();
  /** Keyed by `add:<accountId>` or `remove:<accountId>` */
  readonly mutationFailures = new Map<string, GatewayError>();
  private readonly groups = new Map<string, FakeGroup>();

  addGroup(group: FakeGroup): this {
    this.groups.set(group.name, group);
    return this;
  }

  membersOf(name: string): DownstreamAccount[] {
    return this.groups.get(name)?.members ?? [];
  }

  async fetchGroupMembers(
    name: string,
    maxPrivilege: AccessLevel
  ): Promise<GatewayResult<AccessGroupSnapshot>> {
    this.calls.push(`fetch:${name}`);
    const failure = this.fetchFailures.get(name);
    if (failure) return fail(failure);

    const group = this.groups.get(name);
    if (!group) {
      return fail(
        new GatewayError({ code: 'NOT_FOUND', message: `group '${name}' not found`, gatewayId: this.config.id })
      );
    }
    return ok({
      groupId: group.groupId,
      name: group.name,
      members: group.members.filter((m) => m.accessLevel < maxPrivilege).map((m) => ({ ...m })),
    });
  }

  async addMember(
    groupId: string,
    accountId: string,
    level: AccessLevel
  ): Promise<GatewayResult<MembershipChange>> {
    this.calls.push(`add:${groupId}:${accountId}:${level}`);
    const failure = this.mutationFailures.get(`add:${accountId}`);
    if (failure) return fail(failure);

    const group = this.byId(groupId);
    if (group.members.some((m) => m.accountId === accountId)) return ok<MembershipChange>({ outcome: 'unchanged' });
    group.members.push({ accountId, accessLevel: level });
    return ok<MembershipChange>({ outcome: 'applied' });
  }

  async removeMember(groupId: string, accountId: string): Promise<GatewayResult<MembershipChange>> {
    this.calls.push(`remove:${groupId}:${accountId}`);
    const failure = this.mutationFailures.get(`remove:${accountId}`);
    if (failure) return fail(failure);

    const group = this.byId(groupId);
    const before = group.members.length;
    group.members = group.members.filter((m) => m.accountId !== accountId);
    return ok<MembershipChange>({ outcome: group.members.length < before ? 'applied' : 'unchanged' });
  }

  private byId(groupId: string): FakeGroup {
    for (const group of this.groups.values()) {
      if (group.groupId === groupId) return group;
    }
    throw new Error(`unknown group id ${groupId}`);
  }
}
