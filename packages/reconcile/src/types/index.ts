export type {
  ReconciliationInput,
  ReconciliationEngineOptions,
  PlanSummary,
} from './reconciliation.js';
