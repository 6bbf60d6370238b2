export { ReconciliationEngine } from './reconciliation-engine.js';
