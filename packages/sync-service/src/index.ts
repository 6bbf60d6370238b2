/**
 * @groupsync/sync-service
 *
 * Configuration, gateway runtime policy, pass orchestration, audit log,
 * report rendering and the HTTP trigger.
 */

export * from './config.js';
export { resolveSecret } from './secrets.js';
export { resolveAccessGroupName, type GroupMappings } from './mapping.js';
export { Logger, createTraceId, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { withRetries, resolveRetryConfig, computeBackoffDelayMs } from './retry.js';
export type { RetryConfig, RetryContext, RetryHooks } from './retry.js';
export { withTimeout } from './timeout.js';
export { CircuitBreaker } from './circuit-breaker.js';
export type { CircuitBreakerConfig, CircuitState } from './circuit-breaker.js';
export {
  GatewayCallRunner,
  instrumentAccessGateway,
  instrumentDirectoryGateway,
  isRetryableGatewayError,
} from './instrument-gateway.js';
export type { GatewayRuntimeConfig, InstrumentGatewayOptions } from './instrument-gateway.js';
export { SyncAuditStore } from './audit-store.js';
export type { SyncAuditEntry, SyncAuditStoreOptions, MutationAction } from './audit-store.js';
export { SyncOrchestrator, plannedChanges, summarizePass } from './orchestrator.js';
export type {
  AppliedChange,
  ErrorSummary,
  GroupOutcome,
  GroupStatus,
  PassReport,
  PassStatus,
  PassSummary,
  PlannedChange,
  RunPassOptions,
  SyncOrchestratorOptions,
} from './orchestrator.js';
export { formatPassReport, renderPassReport, type OutputFormat } from './report.js';
export { createSyncService, type SyncService } from './service.js';
export {
  createSyncTriggerHandler,
  startSyncTriggerServer,
  type SyncTriggerOptions,
  type SyncTriggerServer,
} from './http-trigger.js';
export { parseCliArgs, USAGE, type CliOptions, type CliParseResult } from './args.js';
