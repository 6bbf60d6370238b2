export type { IReconciliationEngine } from './reconciliation-engine.js';
