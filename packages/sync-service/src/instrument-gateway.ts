import type {
  GatewayResult,
  IAccessGateway,
  IDirectoryGateway,
} from '@groupsync/core';
import { GatewayError, fail, ok, wrapError } from '@groupsync/core';
import type { Logger } from './logger.js';
import { CircuitBreaker, type CircuitBreakerConfig } from './circuit-breaker.js';
import { withRetries, type RetryConfig } from './retry.js';
import { withTimeout } from './timeout.js';

export type GatewayRuntimeConfig = {
  timeoutMs?: number;
  retries?: RetryConfig;
  circuitBreaker?: CircuitBreakerConfig;
};

export type InstrumentGatewayOptions = {
  runtime?: GatewayRuntimeConfig;
  defaults?: GatewayRuntimeConfig;
  /** Backoff sleep override (tests) */
  sleep?: (ms: number) => Promise<void>;
};

/** Failures that indicate the remote system is unavailable rather than wrong */
export function isRetryableGatewayError(err: unknown): boolean {
  return (
    err instanceof GatewayError &&
    (err.code === 'TIMEOUT' ||
      err.code === 'CONNECTION_FAILED' ||
      err.code === 'RATE_LIMITED')
  );
}

type CallKind = 'read' | 'write';

/**
 * Applies timeout, retry and circuit-breaker policy to gateway calls.
 * Reads are retried; writes never are.
 */
export class GatewayCallRunner {
  private readonly timeoutMs: number;
  private readonly retries?: RetryConfig;
  private readonly breaker: CircuitBreaker | null;

  constructor(
    private readonly gatewayId: string,
    private readonly logger: Logger,
    private readonly options: InstrumentGatewayOptions = {}
  ) {
    this.timeoutMs = options.runtime?.timeoutMs ?? options.defaults?.timeoutMs ?? 60_000;
    this.retries = options.runtime?.retries ?? options.defaults?.retries;
    this.breaker = CircuitBreaker.fromConfig(
      options.runtime?.circuitBreaker ?? options.defaults?.circuitBreaker
    );
  }

  async run<T>(
    kind: CallKind,
    operation: string,
    fields: Record<string, unknown>,
    call: () => Promise<GatewayResult<T>>
  ): Promise<GatewayResult<T>> {
    const breaker = this.breaker;
    const context = { gateway: this.gatewayId, operation, ...fields };

    if (breaker && !breaker.allows()) {
      const state = breaker.state();
      const retryInMs = state.phase === 'open' ? state.retryInMs : 0;
      this.logger.warn('Gateway circuit open; call skipped', { ...context, retryInMs });
      return fail(
        new GatewayError({
          code: 'CIRCUIT_OPEN',
          message: `Circuit open for gateway '${this.gatewayId}' after repeated failures`,
          gatewayId: this.gatewayId,
          suggestion: 'Check the availability of the remote system.',
          context: { operation, retryInMs },
        })
      );
    }

    const started = Date.now();
    try {
      const value = await withRetries(
        async () => {
          breaker?.recordStart();
          let result: GatewayResult<T>;
          try {
            result = await withTimeout(
              call(),
              this.timeoutMs,
              () =>
                new GatewayError({
                  code: 'TIMEOUT',
                  message: `${this.gatewayId}.${operation} timed out after ${this.timeoutMs}ms`,
                  gatewayId: this.gatewayId,
                })
            );
          } catch (err) {
            breaker?.recordFailure();
            throw err;
          }

          if (!result.ok) {
            // Only availability failures count against the circuit.
            if (isRetryableGatewayError(result.error)) breaker?.recordFailure();
            else breaker?.recordSuccess();
            throw result.error;
          }

          breaker?.recordSuccess();
          return result.value;
        },
        kind === 'read' ? this.retries : undefined,
        isRetryableGatewayError,
        {
          sleep: this.options.sleep,
          onRetry: (err, next) => {
            this.logger.warn('Retrying gateway call', {
              ...context,
              attempt: next.attempt,
              attempts: next.attempts,
              delayMs: next.delayMs,
              error: err,
            });
          },
        }
      );

      this.logger.debug('Gateway call succeeded', { ...context, durationMs: Date.now() - started });
      return ok(value);
    } catch (err) {
      const error = wrapError(err, this.gatewayId);
      this.logger.debug('Gateway call failed', {
        ...context,
        durationMs: Date.now() - started,
        code: error.code,
      });
      return fail(error);
    }
  }
}

export function instrumentDirectoryGateway(
  gateway: IDirectoryGateway,
  logger: Logger,
  options?: InstrumentGatewayOptions
): IDirectoryGateway {
  const runner = new GatewayCallRunner(gateway.config.id, logger, options);
  return {
    config: gateway.config,
    fetchGroupsByPrefix: (prefix) =>
      runner.run('read', 'fetchGroupsByPrefix', { prefix }, () => gateway.fetchGroupsByPrefix(prefix)),
  };
}

export function instrumentAccessGateway(
  gateway: IAccessGateway,
  logger: Logger,
  options?: InstrumentGatewayOptions
): IAccessGateway {
  const runner = new GatewayCallRunner(gateway.config.id, logger, options);
  return {
    config: gateway.config,
    fetchGroupMembers: (name, maxPrivilege) =>
      runner.run('read', 'fetchGroupMembers', { name, maxPrivilege }, () =>
        gateway.fetchGroupMembers(name, maxPrivilege)
      ),
    addMember: (groupId, accountId, level) =>
      runner.run('write', 'addMember', { groupId, accountId, level }, () =>
        gateway.addMember(groupId, accountId, level)
      ),
    removeMember: (groupId, accountId) =>
      runner.run('write', 'removeMember', { groupId, accountId }, () =>
        gateway.removeMember(groupId, accountId)
      ),
  };
}
