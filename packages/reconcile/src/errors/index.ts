export { ReconcileError } from './reconcile-error.js';
export type { ReconcileErrorCode, ReconcileErrorDetails } from './reconcile-error.js';
