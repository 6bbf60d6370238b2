export type {
  AccessLevel,
  UpstreamGroup,
  DownstreamAccount,
  AccessGroupSnapshot,
  PlannedGrant,
  PlannedRevocation,
  SkippedIdentities,
  ReconciliationPlan,
  MembershipChange,
} from './membership.js';

export { ok, fail } from './result.js';
export type { GatewayResult } from './result.js';
