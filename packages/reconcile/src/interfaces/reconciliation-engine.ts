/**
 * Reconciliation Engine Interface
 */

import type { ReconciliationPlan } from '@groupsync/core';
import type { ReconciliationInput } from '../types/index.js';

/**
 * Computes the minimal set of membership changes that brings an access
 * group in line with directory and entitlement state.
 */
export interface IReconciliationEngine {
  /**
   * Compute add and remove plans from one snapshot of the four
   * membership views. Never mutates its input.
   */
  reconcile(input: ReconciliationInput): ReconciliationPlan;
}
