import { describe, expect, it } from 'vitest';
import type { GroupOutcome } from '../src/orchestrator.js';
import { formatPassReport, renderPassReport } from '../src/report.js';
import { makeReport } from './report-fixture.js';

const payments: GroupOutcome = {
  directoryGroup: 'dev_payments',
  accessGroup: 'payments',
  status: 'succeeded',
  summary: { addCount: 3, removeCount: 1, notEntitledCount: 0, conflictingCount: 0, unmatchableCount: 1 },
  planned: [
    { action: 'remove', accountId: 'a2', federatedId: 'u2' },
    { action: 'add', accountId: 'a1', username: 'ana', federatedId: 'u1', accessLevel: 30 },
    { action: 'add', accountId: 'a3', federatedId: 'u3', accessLevel: 30 },
    { action: 'add', accountId: 'a5', federatedId: 'u5', accessLevel: 30 },
  ],
  applied: [
    { action: 'remove', accountId: 'a2', federatedId: 'u2', outcome: 'applied' },
    { action: 'add', accountId: 'a1', username: 'ana', federatedId: 'u1', accessLevel: 30, outcome: 'applied' },
    { action: 'add', accountId: 'a3', federatedId: 'u3', accessLevel: 30, outcome: 'unchanged' },
  ],
};

const search: GroupOutcome = {
  directoryGroup: 'dev_search',
  accessGroup: 'search',
  status: 'failed',
  planned: [],
  applied: [],
  error: { code: 'NOT_FOUND', message: "group 'search' not found" },
};

const missing: GroupOutcome = {
  directoryGroup: 'dev_missing',
  accessGroup: null,
  status: 'skipped',
  reason: 'not found in directory',
  planned: [],
  applied: [],
};

const report = makeReport('partial', {
  groups: [payments, search, missing],
  summary: {
    groups: 3,
    succeeded: 1,
    failed: 1,
    skipped: 1,
    plannedAdds: 3,
    plannedRemoves: 1,
    appliedAdds: 1,
    appliedRemoves: 1,
  },
});

describe('formatPassReport', () => {
  it('renders totals and every group', () => {
    expect(formatPassReport(report)).toBe(
      [
        'Sync pass pass-1',
        'Trace: trace-1',
        'Status: partial',
        'Groups: 3 (succeeded 1, failed 1, skipped 1)',
        'Planned: 3 to add, 1 to remove',
        'Applied: 1 added, 1 removed',
        '',
        'dev_payments -> payments: succeeded',
        '  Accounts without federated identity: 1',
        '  - #a2 [u2]',
        '  + ana (#a1) [u1] at level 30',
        '  + #a3 [u3] at level 30 (unchanged)',
        '  + #a5 [u5] at level 30 (not applied)',
        '',
        "dev_search -> search: failed",
        "  Error: [NOT_FOUND] group 'search' not found",
        '',
        'dev_missing -> (none): skipped (not found in directory)',
        '',
      ].join('\n')
    );
  });

  it('omits applied state in a dry run', () => {
    const dry = makeReport('succeeded', {
      dryRun: true,
      groups: [{ ...payments, applied: [] }],
    });

    const lines = formatPassReport(dry).split('\n');

    expect(lines[0]).toBe('Sync pass pass-1 (dry run)');
    expect(lines.some((l) => l.startsWith('Applied:'))).toBe(false);
    expect(lines).toContain('  + #a5 [u5] at level 30');
  });

  it('shows why a pass failed', () => {
    const failed = makeReport('failed', {
      error: { code: 'AUTHENTICATION_FAILED', message: 'invalid token', suggestion: 'Check the Okta API token.' },
    });

    const lines = formatPassReport(failed).split('\n');

    expect(lines.slice(2, 5)).toEqual([
      'Status: failed',
      'Error: [AUTHENTICATION_FAILED] invalid token',
      'Suggestion: Check the Okta API token.',
    ]);
  });
});

describe('renderPassReport', () => {
  it('renders JSON on request', () => {
    const output = renderPassReport(report, 'json');

    expect(output.endsWith('}\n')).toBe(true);
    expect(JSON.parse(output)).toEqual(report);
  });

  it('defaults to text', () => {
    expect(renderPassReport(report)).toBe(formatPassReport(report));
  });
});
