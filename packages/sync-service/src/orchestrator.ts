import { randomUUID } from 'node:crypto';
import type {
  AccessGroupSnapshot,
  AccessLevel,
  DownstreamAccount,
  GatewayError,
  IAccessGateway,
  IDirectoryGateway,
  PlannedGrant,
  PlannedRevocation,
  ReconciliationPlan,
  UpstreamGroup,
} from '@groupsync/core';
import {
  IdentityCorrelator,
  formatPlan,
  isEmptyPlan,
  summarizePlan,
  type IReconciliationEngine,
  type PlanSummary,
} from '@groupsync/reconcile';
import type { MutationAction, SyncAuditStore } from './audit-store.js';
import { createTraceId, type Logger } from './logger.js';
import { resolveAccessGroupName, type GroupMappings } from './mapping.js';

export type ErrorSummary = {
  code: string;
  message: string;
  suggestion?: string;
};

export type PlannedChange = {
  action: MutationAction;
  accountId: string;
  username?: string;
  federatedId: string;
  accessLevel?: AccessLevel;
};

export type AppliedChange = PlannedChange & {
  outcome: 'applied' | 'unchanged';
};

export type GroupStatus = 'succeeded' | 'failed' | 'skipped';

export type GroupOutcome = {
  directoryGroup: string;
  accessGroup: string | null;
  status: GroupStatus;
  /** Why the group was skipped */
  reason?: string;
  summary?: PlanSummary;
  planned: PlannedChange[];
  applied: AppliedChange[];
  error?: ErrorSummary;
};

export type PassStatus = 'succeeded' | 'partial' | 'failed';

export type PassSummary = {
  groups: number;
  succeeded: number;
  failed: number;
  skipped: number;
  plannedAdds: number;
  plannedRemoves: number;
  appliedAdds: number;
  appliedRemoves: number;
};

export type PassReport = {
  id: string;
  traceId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  status: PassStatus;
  /** Set when the pass could not compute any plan */
  error?: ErrorSummary;
  groups: GroupOutcome[];
  summary: PassSummary;
};

export type SyncOrchestratorOptions = {
  directory: IDirectoryGateway;
  access: IAccessGateway;
  engine: IReconciliationEngine;
  logger: Logger;
  /** Directory naming-convention prefix, e.g. dev_ */
  groupPrefix: string;
  /** Access group whose members may be granted access */
  entitlementGroup: string;
  /** Accounts at or above this level are never considered */
  privilegeCeiling: AccessLevel;
  mappings?: GroupMappings;
  audit?: SyncAuditStore | null;
  correlator?: IdentityCorrelator;
  now?: () => Date;
};

export type RunPassOptions = {
  dryRun?: boolean;
  /** Restrict the pass to these directory group names */
  groups?: readonly string[];
};

type PassContext = {
  id: string;
  traceId: string;
  dryRun: boolean;
  logger: Logger;
};

function summarizeError(error: GatewayError): ErrorSummary {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion ? { suggestion: error.suggestion } : {}),
  };
}

function grantChange(grant: PlannedGrant): PlannedChange {
  return {
    action: 'add',
    accountId: grant.account.accountId,
    ...(grant.account.username ? { username: grant.account.username } : {}),
    federatedId: grant.federatedId,
    accessLevel: grant.accessLevel,
  };
}

function revocationChange(revocation: PlannedRevocation): PlannedChange {
  return {
    action: 'remove',
    accountId: revocation.account.accountId,
    ...(revocation.account.username ? { username: revocation.account.username } : {}),
    federatedId: revocation.federatedId,
  };
}

/** Removes first, then adds */
export function plannedChanges(plan: ReconciliationPlan): PlannedChange[] {
  return [...plan.remove.map(revocationChange), ...plan.add.map(grantChange)];
}

export function summarizePass(groups: readonly GroupOutcome[]): PassSummary {
  const summary: PassSummary = {
    groups: groups.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    plannedAdds: 0,
    plannedRemoves: 0,
    appliedAdds: 0,
    appliedRemoves: 0,
  };

  for (const group of groups) {
    summary[group.status]++;
    for (const change of group.planned) {
      if (change.action === 'add') summary.plannedAdds++;
      else summary.plannedRemoves++;
    }
    for (const change of group.applied) {
      if (change.outcome !== 'applied') continue;
      if (change.action === 'add') summary.appliedAdds++;
      else summary.appliedRemoves++;
    }
  }

  return summary;
}

/**
 * Runs reconciliation passes: one directory read and one entitlement read per
 * pass, then each directory group in turn. A failing group does not stop the
 * groups after it.
 */
export class SyncOrchestrator {
  private readonly correlator: IdentityCorrelator;
  private readonly now: () => Date;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.correlator = options.correlator ?? new IdentityCorrelator();
    this.now = options.now ?? (() => new Date());
  }

  async runPass(runOptions: RunPassOptions = {}): Promise<PassReport> {
    const startedAt = this.now();
    const traceId = createTraceId();
    const ctx: PassContext = {
      id: randomUUID(),
      traceId,
      dryRun: runOptions.dryRun ?? false,
      logger: this.options.logger.child({ traceId }),
    };

    ctx.logger.info('Sync pass started', {
      passId: ctx.id,
      dryRun: ctx.dryRun,
      groupFilter: runOptions.groups,
    });

    const finish = (groups: GroupOutcome[], error?: ErrorSummary): PassReport => {
      const summary = summarizePass(groups);
      const status: PassStatus = error
        ? 'failed'
        : summary.failed > 0
          ? 'partial'
          : 'succeeded';
      const report: PassReport = {
        id: ctx.id,
        traceId,
        startedAt: startedAt.toISOString(),
        finishedAt: this.now().toISOString(),
        dryRun: ctx.dryRun,
        status,
        ...(error ? { error } : {}),
        groups,
        summary,
      };
      const level = status === 'succeeded' ? 'info' : 'error';
      ctx.logger.log(level, 'Sync pass finished', { passId: ctx.id, status, ...summary });
      return report;
    };

    const directory = await this.options.directory.fetchGroupsByPrefix(this.options.groupPrefix);
    if (!directory.ok) {
      ctx.logger.error('Cannot read directory groups', { error: directory.error });
      return finish([], summarizeError(directory.error));
    }

    const entitlement = await this.options.access.fetchGroupMembers(
      this.options.entitlementGroup,
      this.options.privilegeCeiling
    );
    if (!entitlement.ok) {
      ctx.logger.error('Cannot read entitlement group', {
        group: this.options.entitlementGroup,
        error: entitlement.error,
      });
      return finish([], summarizeError(entitlement.error));
    }

    const outcomes: GroupOutcome[] = [];
    for (const group of this.selectGroups(directory.value, runOptions.groups, outcomes, ctx)) {
      outcomes.push(await this.syncGroup(group, entitlement.value, ctx));
    }

    return finish(outcomes);
  }

  private selectGroups(
    groups: UpstreamGroup[],
    filter: readonly string[] | undefined,
    outcomes: GroupOutcome[],
    ctx: PassContext
  ): UpstreamGroup[] {
    if (!filter || filter.length === 0) return groups;

    const wanted = new Set(filter);
    const found = new Set(groups.map((g) => g.name));
    for (const name of wanted) {
      if (found.has(name)) continue;
      ctx.logger.warn('Requested group not found in directory', { group: name });
      outcomes.push({
        directoryGroup: name,
        accessGroup: null,
        status: 'skipped',
        reason: 'not found in directory',
        planned: [],
        applied: [],
      });
    }
    return groups.filter((g) => wanted.has(g.name));
  }

  private async syncGroup(
    group: UpstreamGroup,
    entitlement: AccessGroupSnapshot,
    ctx: PassContext
  ): Promise<GroupOutcome> {
    const accessName = resolveAccessGroupName(
      group.name,
      this.options.groupPrefix,
      this.options.mappings
    );
    const logger = ctx.logger.child({ group: group.name });

    if (accessName === null) {
      logger.warn('Directory group maps to an empty access group name; skipped');
      return {
        directoryGroup: group.name,
        accessGroup: null,
        status: 'skipped',
        reason: 'empty access group name',
        planned: [],
        applied: [],
      };
    }

    const snapshot = await this.options.access.fetchGroupMembers(
      accessName,
      this.options.privilegeCeiling
    );
    if (!snapshot.ok) {
      logger.error('Cannot read access group', { accessGroup: accessName, error: snapshot.error });
      return {
        directoryGroup: group.name,
        accessGroup: accessName,
        status: 'failed',
        planned: [],
        applied: [],
        error: summarizeError(snapshot.error),
      };
    }

    const plan = this.options.engine.reconcile({
      upstreamEligible: group.activeMemberIds,
      upstreamDeprovisioned: group.deprovisionedMemberIds,
      entitlementSet: entitlement.members,
      accessGroupMembers: this.correlator.attachFederatedIds(
        snapshot.value.members,
        entitlement.members
      ),
    });

    const summary = summarizePlan(plan);
    if (isEmptyPlan(plan)) {
      logger.info('Access group already in sync', { accessGroup: snapshot.value.name, ...summary });
    } else {
      logger.info('Plan computed', { accessGroup: snapshot.value.name, ...summary });
      logger.debug(formatPlan(plan, { directoryGroup: group.name, accessGroup: snapshot.value.name }));
    }

    const outcome: GroupOutcome = {
      directoryGroup: group.name,
      accessGroup: snapshot.value.name,
      status: 'succeeded',
      summary,
      planned: plannedChanges(plan),
      applied: [],
    };

    if (ctx.dryRun) return outcome;

    const steps: Array<{ change: PlannedChange; account: DownstreamAccount }> = [
      ...plan.remove.map((r) => ({ change: revocationChange(r), account: r.account })),
      ...plan.add.map((g) => ({ change: grantChange(g), account: g.account })),
    ];

    for (const { change, account } of steps) {
      const result =
        change.action === 'remove'
          ? await this.options.access.removeMember(snapshot.value.groupId, account.accountId)
          : await this.options.access.addMember(
              snapshot.value.groupId,
              account.accountId,
              change.accessLevel ?? account.accessLevel
            );

      if (!result.ok) {
        logger.error('Membership change failed; remaining changes for this group skipped', {
          action: change.action,
          accountId: change.accountId,
          error: result.error,
        });
        await this.audit(ctx, group.name, outcome, change, 'failed', summarizeError(result.error));
        return { ...outcome, status: 'failed', error: summarizeError(result.error) };
      }

      outcome.applied.push({ ...change, outcome: result.value.outcome });
      logger.info('Membership change applied', {
        action: change.action,
        accountId: change.accountId,
        outcome: result.value.outcome,
      });
      await this.audit(ctx, group.name, outcome, change, result.value.outcome);
    }

    return outcome;
  }

  private async audit(
    ctx: PassContext,
    directoryGroup: string,
    outcome: GroupOutcome,
    change: PlannedChange,
    result: 'applied' | 'unchanged' | 'failed',
    error?: ErrorSummary
  ): Promise<void> {
    const store = this.options.audit;
    if (!store) return;

    try {
      await store.append({
        timestamp: this.now(),
        pass_id: ctx.id,
        trace_id: ctx.traceId,
        dry_run: ctx.dryRun,
        directory_group: directoryGroup,
        access_group: outcome.accessGroup ?? '',
        action: change.action,
        account_id: change.accountId,
        ...(change.username ? { username: change.username } : {}),
        federated_id: change.federatedId,
        ...(change.accessLevel !== undefined ? { access_level: change.accessLevel } : {}),
        outcome: result,
        ...(error ? { error: { code: error.code, message: error.message } } : {}),
      });
    } catch (err) {
      // Logged only; the group outcome stands.
      ctx.logger.error('Failed to write audit entry', { error: err, accountId: change.accountId });
    }
  }
}
