/**
 * Reconciliation Engine
 *
 * Computes access-group grants and revocations from directory membership and
 * the entitlement population.
 */

import type {
  AccessLevel,
  DownstreamAccount,
  PlannedGrant,
  PlannedRevocation,
  ReconciliationPlan,
} from '@groupsync/core';
import { IdentityCorrelator } from '../correlation/index.js';
import { ReconcileError } from '../errors/index.js';
import type { IReconciliationEngine } from '../interfaces/index.js';
import type {
  ReconciliationEngineOptions,
  ReconciliationInput,
} from '../types/index.js';

/**
 * Reconciliation Engine Implementation
 *
 * Policy:
 * - A grant requires directory membership and an entitlement account.
 * - A revocation requires deprovisioned/suspended directory status and current
 *   access, regardless of entitlement.
 * - An identifier listed both as eligible and deprovisioned is deprovisioned.
 * - Existing grants are never upgraded or downgraded.
 */
export class ReconciliationEngine implements IReconciliationEngine {
  private readonly correlator: IdentityCorrelator;
  readonly grantLevel: AccessLevel;

  constructor(options: ReconciliationEngineOptions) {
    if (!Number.isInteger(options.grantLevel) || options.grantLevel <= 0) {
      throw new ReconcileError({
        code: 'INVALID_OPTIONS',
        message: `grantLevel must be a positive integer (got ${options.grantLevel})`,
        context: { grantLevel: options.grantLevel },
      });
    }
    this.grantLevel = options.grantLevel;
    this.correlator = new IdentityCorrelator();
  }

  reconcile(input: ReconciliationInput): ReconciliationPlan {
    const correlator = this.correlator;

    const upstreamEligible = normalizeIds(input.upstreamEligible);
    const deprovisioned = normalizeIds(input.upstreamDeprovisioned);

    const conflicting = correlator.intersect(upstreamEligible, deprovisioned);
    const eligibleUpstream = correlator.difference(upstreamEligible, deprovisioned);

    const entitlementIndex = correlator.indexByFederatedId(input.entitlementSet);
    const accessIndex = correlator.indexByFederatedId(input.accessGroupMembers);

    const eligible = correlator.intersect(eligibleUpstream, entitlementIndex.keys());
    const notEntitled = correlator.difference(eligibleUpstream, entitlementIndex.keys());

    const toAdd = correlator.difference(eligible, accessIndex.keys());
    const toRemove = correlator.intersect(deprovisioned, accessIndex.keys());

    const add: PlannedGrant[] = [];
    for (const federatedId of toAdd) {
      const account = entitlementIndex.get(federatedId);
      if (!account) continue;
      add.push({ account: { ...account }, federatedId, accessLevel: this.grantLevel });
    }

    const remove: PlannedRevocation[] = [];
    for (const federatedId of toRemove) {
      const account = accessIndex.get(federatedId);
      if (!account) continue;
      remove.push({ account: { ...account }, federatedId });
    }

    return {
      add,
      remove,
      skipped: {
        notEntitled,
        conflicting,
        unmatchable: this.collectUnmatchable(input),
      },
    };
  }

  private collectUnmatchable(input: ReconciliationInput): DownstreamAccount[] {
    const seen = new Set<string>();
    const out: DownstreamAccount[] = [];
    for (const account of [...input.entitlementSet, ...input.accessGroupMembers]) {
      if (this.correlator.federatedIdOf(account) !== null) continue;
      if (seen.has(account.accountId)) continue;
      seen.add(account.accountId);
      out.push({ ...account });
    }
    return out;
  }
}

function normalizeIds(ids: readonly string[]): string[] {
  const out: string[] = [];
  for (const id of ids) {
    const trimmed = id.trim();
    if (trimmed) out.push(trimmed);
  }
  return out;
}
