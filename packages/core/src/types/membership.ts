/**
 * Membership types shared by gateways, the reconciliation engine and the
 * sync orchestrator. All values are pass-scoped and never persisted.
 */

/** Access level in the downstream system (e.g. GitLab: 10 guest .. 50 owner) */
export type AccessLevel = number;

/**
 * A group in the upstream identity directory.
 * `activeMemberIds` and `deprovisionedMemberIds` are disjoint.
 */
export interface UpstreamGroup {
  /** Directory-internal group ID */
  id: string;
  /** Group display name, including the naming-convention prefix */
  name: string;
  /** Federated identifiers of members that may hold access */
  activeMemberIds: string[];
  /** Federated identifiers of deprovisioned or suspended members */
  deprovisionedMemberIds: string[];
}

/** An account in the downstream access system */
export interface DownstreamAccount {
  /** Account ID in the downstream system */
  accountId: string;
  /**
   * Identity asserted by the directory federation.
   * Absent for accounts that were not provisioned through federation.
   */
  federatedId?: string | null;
  /** Current access level in the group the account was listed from */
  accessLevel: AccessLevel;
  /** Login name, for reporting only */
  username?: string;
}

/** Current membership of a downstream access group */
export interface AccessGroupSnapshot {
  /** Downstream group ID used by mutation calls */
  groupId: string;
  /** Group name or path as resolved */
  name: string;
  /** Members below the requested privilege ceiling */
  members: DownstreamAccount[];
}

/** An account to insert into the access group */
export interface PlannedGrant {
  account: DownstreamAccount;
  federatedId: string;
  accessLevel: AccessLevel;
}

/** An account to remove from the access group */
export interface PlannedRevocation {
  account: DownstreamAccount;
  federatedId: string;
}

/** Identifiers the engine looked at but left alone */
export interface SkippedIdentities {
  /** Directory-eligible identifiers with no entitlement account */
  notEntitled: string[];
  /** Identifiers listed as both eligible and deprovisioned upstream */
  conflicting: string[];
  /** Accounts without a usable federated identifier */
  unmatchable: DownstreamAccount[];
}

/** Minimal set of changes for one directory-group/access-group pair */
export interface ReconciliationPlan {
  add: PlannedGrant[];
  remove: PlannedRevocation[];
  skipped: SkippedIdentities;
}

/** Result of a membership mutation */
export interface MembershipChange {
  /** `unchanged` when the downstream system already had the requested state */
  outcome: 'applied' | 'unchanged';
}
