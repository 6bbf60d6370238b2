/**
 * Reconciliation Types
 */

import type { AccessLevel, DownstreamAccount } from '@groupsync/core';

/**
 * One snapshot of the four membership views for a
 * directory-group/access-group pair.
 */
export interface ReconciliationInput {
  /** Federated identifiers of active directory-group members */
  upstreamEligible: readonly string[];
  /** Federated identifiers of deprovisioned or suspended directory-group members */
  upstreamDeprovisioned: readonly string[];
  /** Accounts of the entitlement population */
  entitlementSet: readonly DownstreamAccount[];
  /** Current members of the access group, with federated identifiers attached */
  accessGroupMembers: readonly DownstreamAccount[];
}

export interface ReconciliationEngineOptions {
  /** The single access level every grant is made at */
  grantLevel: AccessLevel;
}

/** Counts derived from a plan */
export interface PlanSummary {
  addCount: number;
  removeCount: number;
  notEntitledCount: number;
  conflictingCount: number;
  unmatchableCount: number;
}
