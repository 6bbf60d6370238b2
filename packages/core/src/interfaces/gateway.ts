/**
 * Gateway Interfaces
 *
 * The directory and access systems are reached only through these
 * interfaces. Every call returns a GatewayResult instead of throwing, so the
 * orchestrator can isolate failures per group.
 */

import type {
  AccessGroupSnapshot,
  AccessLevel,
  GatewayResult,
  MembershipChange,
  UpstreamGroup,
} from '../types/index.js';

/** Configuration common to all gateways */
export interface GatewayConfig {
  /** Gateway identifier used in logs and errors */
  id: string;
  /** Gateway type (okta, gitlab, memory, ...) */
  type: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Upstream identity directory
 */
export interface IDirectoryGateway {
  readonly config: GatewayConfig;

  /**
   * List the groups whose name starts with `prefix`, with their members
   * partitioned into active and deprovisioned/suspended.
   */
  fetchGroupsByPrefix(prefix: string): Promise<GatewayResult<UpstreamGroup[]>>;
}

/**
 * Downstream access system
 */
export interface IAccessGateway {
  readonly config: GatewayConfig;

  /**
   * Resolve a group by name and list its members whose access level is
   * strictly below `maxPrivilege`.
   */
  fetchGroupMembers(
    name: string,
    maxPrivilege: AccessLevel
  ): Promise<GatewayResult<AccessGroupSnapshot>>;

  /** Grant `accountId` membership of `groupId` at `level` */
  addMember(
    groupId: string,
    accountId: string,
    level: AccessLevel
  ): Promise<GatewayResult<MembershipChange>>;

  /** Remove `accountId` from `groupId` */
  removeMember(
    groupId: string,
    accountId: string
  ): Promise<GatewayResult<MembershipChange>>;
}
