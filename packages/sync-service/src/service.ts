/**
 * Wires configuration into gateways, the engine and the orchestrator
 */

import {
  createGitLabAccessGateway,
  createOktaDirectoryGateway,
  resolveAccessLevel,
} from '@groupsync/connector-api';
import { createReconciliationEngine } from '@groupsync/reconcile';
import { SyncAuditStore } from './audit-store.js';
import { ConfigError, type ConfigFile } from './config.js';
import { instrumentAccessGateway, instrumentDirectoryGateway } from './instrument-gateway.js';
import type { Logger } from './logger.js';
import { SyncOrchestrator, type PassReport, type RunPassOptions } from './orchestrator.js';
import { resolveSecret } from './secrets.js';

export type SyncService = {
  orchestrator: SyncOrchestrator;
  /** Run one pass; options left unset fall back to the `sync` config block */
  runPass(overrides?: RunPassOptions): Promise<PassReport>;
};

function accessLevelOf(value: string | number, field: string): number {
  const level = resolveAccessLevel(value);
  if (level === null) {
    throw new ConfigError(`Unknown access level for ${field}: ${String(value)}`);
  }
  return level;
}

export async function createSyncService(config: ConfigFile, logger: Logger): Promise<SyncService> {
  const directoryToken = await resolveSecret(config.directory.token, 'directory.token');
  const accessToken = await resolveSecret(config.access.token, 'access.token');

  const directory = instrumentDirectoryGateway(
    createOktaDirectoryGateway({
      id: config.directory.id,
      orgUrl: config.directory.orgUrl,
      token: directoryToken,
      pageSize: config.directory.pageSize,
      timeoutMs: config.directory.timeoutMs,
    }),
    logger,
    { runtime: config.directory.runtime, defaults: config.runtime }
  );

  const access = instrumentAccessGateway(
    createGitLabAccessGateway({
      id: config.access.id,
      baseUrl: config.access.baseUrl,
      token: accessToken,
      timeoutMs: config.access.timeoutMs,
    }),
    logger,
    { runtime: config.access.runtime, defaults: config.runtime }
  );

  const audit = config.sync?.audit?.enabled
    ? new SyncAuditStore({
        baseDir: config.sync.audit.logDir,
        retentionDays: config.sync.audit.retentionDays,
      })
    : null;

  const orchestrator = new SyncOrchestrator({
    directory,
    access,
    engine: createReconciliationEngine(accessLevelOf(config.access.grantLevel, 'access.grantLevel')),
    logger,
    groupPrefix: config.directory.groupPrefix,
    entitlementGroup: config.access.entitlementGroup,
    privilegeCeiling: accessLevelOf(config.access.privilegeCeiling, 'access.privilegeCeiling'),
    mappings: config.mappings,
    audit,
  });

  return {
    orchestrator,
    runPass: (overrides = {}) =>
      orchestrator.runPass({
        dryRun: overrides.dryRun ?? config.sync?.dryRun ?? false,
        groups: overrides.groups?.length ? overrides.groups : config.sync?.groups,
      }),
  };
}
