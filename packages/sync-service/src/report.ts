/**
 * Pass report rendering for stdout
 */

import type { AppliedChange, GroupOutcome, PassReport, PlannedChange } from './orchestrator.js';

export type OutputFormat = 'text' | 'json';

function describeChange(change: PlannedChange): string {
  const who = change.username ? `${change.username} (#${change.accountId})` : `#${change.accountId}`;
  return change.action === 'add'
    ? `+ ${who} [${change.federatedId}] at level ${change.accessLevel ?? '?'}`
    : `- ${who} [${change.federatedId}]`;
}

function changeState(change: PlannedChange, applied: readonly AppliedChange[]): string {
  const match = applied.find((a) => a.action === change.action && a.accountId === change.accountId);
  if (!match) return ' (not applied)';
  return match.outcome === 'unchanged' ? ' (unchanged)' : '';
}

function formatGroup(group: GroupOutcome, dryRun: boolean): string[] {
  const lines: string[] = [];
  const reason = group.reason ? ` (${group.reason})` : '';
  lines.push(`${group.directoryGroup} -> ${group.accessGroup ?? '(none)'}: ${group.status}${reason}`);

  if (group.error) {
    lines.push(`  Error: [${group.error.code}] ${group.error.message}`);
  }
  if (group.summary && group.summary.unmatchableCount > 0) {
    lines.push(`  Accounts without federated identity: ${group.summary.unmatchableCount}`);
  }

  for (const change of group.planned) {
    lines.push(`  ${describeChange(change)}${dryRun ? '' : changeState(change, group.applied)}`);
  }
  return lines;
}

export function formatPassReport(report: PassReport): string {
  const { summary } = report;
  const lines: string[] = [
    `Sync pass ${report.id}${report.dryRun ? ' (dry run)' : ''}`,
    `Trace: ${report.traceId}`,
    `Status: ${report.status}`,
  ];

  if (report.error) {
    lines.push(`Error: [${report.error.code}] ${report.error.message}`);
    if (report.error.suggestion) lines.push(`Suggestion: ${report.error.suggestion}`);
  }

  lines.push(
    `Groups: ${summary.groups} (succeeded ${summary.succeeded}, failed ${summary.failed}, skipped ${summary.skipped})`
  );
  lines.push(`Planned: ${summary.plannedAdds} to add, ${summary.plannedRemoves} to remove`);
  if (!report.dryRun) {
    lines.push(`Applied: ${summary.appliedAdds} added, ${summary.appliedRemoves} removed`);
  }

  for (const group of report.groups) {
    lines.push('', ...formatGroup(group, report.dryRun));
  }

  return `${lines.join('\n')}\n`;
}

export function renderPassReport(report: PassReport, format: OutputFormat = 'text'): string {
  return format === 'json' ? `${JSON.stringify(report, null, 2)}\n` : formatPassReport(report);
}
