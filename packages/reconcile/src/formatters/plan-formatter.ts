/**
 * Plan Formatter
 *
 * Formats reconciliation plans for operator output.
 */

import type { DownstreamAccount, ReconciliationPlan } from '@groupsync/core';
import type { PlanSummary } from '../types/index.js';

const MAX_LISTED = 10;

export function summarizePlan(plan: ReconciliationPlan): PlanSummary {
  return {
    addCount: plan.add.length,
    removeCount: plan.remove.length,
    notEntitledCount: plan.skipped.notEntitled.length,
    conflictingCount: plan.skipped.conflicting.length,
    unmatchableCount: plan.skipped.unmatchable.length,
  };
}

export function isEmptyPlan(plan: ReconciliationPlan): boolean {
  return plan.add.length === 0 && plan.remove.length === 0;
}

export function describeAccount(account: DownstreamAccount): string {
  return account.username
    ? `${account.username} (#${account.accountId})`
    : `#${account.accountId}`;
}

/**
 * Format a plan as plain text
 */
export function formatPlan(
  plan: ReconciliationPlan,
  labels: { directoryGroup: string; accessGroup: string }
): string {
  const lines: string[] = [];
  const summary = summarizePlan(plan);

  lines.push(`### ${labels.directoryGroup} -> ${labels.accessGroup}`);
  lines.push(`- Add: ${summary.addCount}`);
  lines.push(`- Remove: ${summary.removeCount}`);

  if (summary.notEntitledCount > 0) {
    lines.push(`- Not entitled: ${summary.notEntitledCount}`);
  }
  if (summary.conflictingCount > 0) {
    lines.push(`- Eligible and deprovisioned upstream (treated as deprovisioned): ${summary.conflictingCount}`);
  }
  if (summary.unmatchableCount > 0) {
    lines.push(`- Accounts without federated identity: ${summary.unmatchableCount}`);
  }

  for (const grant of plan.add.slice(0, MAX_LISTED)) {
    lines.push(`  + ${describeAccount(grant.account)} [${grant.federatedId}] at level ${grant.accessLevel}`);
  }
  if (plan.add.length > MAX_LISTED) {
    lines.push(`  ... and ${plan.add.length - MAX_LISTED} more to add`);
  }

  for (const revocation of plan.remove.slice(0, MAX_LISTED)) {
    lines.push(`  - ${describeAccount(revocation.account)} [${revocation.federatedId}]`);
  }
  if (plan.remove.length > MAX_LISTED) {
    lines.push(`  ... and ${plan.remove.length - MAX_LISTED} more to remove`);
  }

  return lines.join('\n');
}
