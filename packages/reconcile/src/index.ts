/**
 * @groupsync/reconcile
 *
 * Identity correlation and membership reconciliation. Pure, synchronous,
 * no I/O.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Correlation
export { IdentityCorrelator } from './correlation/index.js';

// Reconciliation
import { ReconciliationEngine as _ReconciliationEngine } from './reconciliation/index.js';
export { ReconciliationEngine } from './reconciliation/index.js';

// Formatters
export {
  summarizePlan,
  isEmptyPlan,
  describeAccount,
  formatPlan,
} from './formatters/index.js';

// Errors
export { ReconcileError } from './errors/index.js';
export type { ReconcileErrorCode, ReconcileErrorDetails } from './errors/index.js';

/**
 * Factory function to create a ReconciliationEngine
 */
export function createReconciliationEngine(grantLevel: number): _ReconciliationEngine {
  return new _ReconciliationEngine({ grantLevel });
}
