#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   groupsync --config ./groupsync.json [--dry-run] [--group dev_payments] [--output json]
 *   groupsync --config ./groupsync.json --serve
 */

import { GatewayError } from '@groupsync/core';
import { ReconcileError } from '@groupsync/reconcile';
import { USAGE, parseCliArgs } from './args.js';
import { ConfigError, loadConfig } from './config.js';
import { startSyncTriggerServer } from './http-trigger.js';
import { Logger } from './logger.js';
import { renderPassReport } from './report.js';
import { createSyncService } from './service.js';

async function main(): Promise<void> {
  let logger = new Logger();
  const parsed = parseCliArgs(process.argv.slice(2));

  if (!parsed.ok) {
    if (parsed.message) console.error(parsed.message);
    console.error(USAGE);
    process.exitCode = parsed.help ? 0 : 1;
    return;
  }

  const args = parsed.options;

  try {
    const config = await loadConfig(args.configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });

    const service = await createSyncService(config, logger);

    if (args.serve || config.trigger?.mode === 'http') {
      const http = config.trigger?.http;
      let bearerToken: string | undefined;
      if (http?.bearerTokenEnv) {
        bearerToken = process.env[http.bearerTokenEnv];
        if (!bearerToken) {
          throw new ConfigError(`Bearer token env var not set: ${http.bearerTokenEnv}`);
        }
      }

      const trigger = await startSyncTriggerServer({
        runPass: () => service.runPass({ dryRun: args.dryRun || undefined, groups: args.groups }),
        logger,
        host: http?.host,
        port: http?.port,
        path: http?.path,
        healthPath: http?.healthPath,
        bearerToken,
      });

      const shutdown = async (signal: string) => {
        try {
          await trigger.close();
          logger.info('Shutdown complete', { signal });
        } finally {
          process.exit(0);
        }
      };
      process.on('SIGINT', () => void shutdown('SIGINT'));
      process.on('SIGTERM', () => void shutdown('SIGTERM'));
      return;
    }

    const report = await service.runPass({
      dryRun: args.dryRun || undefined,
      groups: args.groups,
    });
    process.stdout.write(renderPassReport(report, args.output));
    process.exitCode = report.status === 'succeeded' ? 0 : 1;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else if (error instanceof GatewayError || error instanceof ReconcileError) {
      logger.error(error.toActionableMessage(), { code: error.code });
    } else {
      logger.error('Sync failed', { error });
    }
    process.exitCode = 1;
  }
}

void main();
