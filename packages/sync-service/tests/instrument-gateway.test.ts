import { describe, expect, it } from 'vitest';
import type {
  AccessGroupSnapshot,
  GatewayResult,
  IAccessGateway,
  IDirectoryGateway,
  MembershipChange,
  UpstreamGroup,
} from '@groupsync/core';
import { GatewayError, fail, ok } from '@groupsync/core';
import { CircuitBreaker } from '../src/circuit-breaker.js';
import {
  GatewayCallRunner,
  instrumentAccessGateway,
  instrumentDirectoryGateway,
  isRetryableGatewayError,
} from '../src/instrument-gateway.js';
import { computeBackoffDelayMs, resolveRetryConfig, withRetries } from '../src/retry.js';
import { withTimeout } from '../src/timeout.js';
import { silentLogger } from './fake-gateways.js';

function gatewayError(code: GatewayError['code']): GatewayError {
  return new GatewayError({ code, message: code.toLowerCase(), gatewayId: 'fake' });
}

/** Directory gateway that replays `results` in order, then repeats the last one */
function scriptedDirectory(results: Array<GatewayResult<UpstreamGroup[]> | 'hang'>) {
  let calls = 0;
  const gateway: IDirectoryGateway = {
    config: { id: 'fake', type: 'memory' },
    fetchGroupsByPrefix: () => {
      const next = results[Math.min(calls, results.length - 1)];
      calls++;
      if (next === undefined || next === 'hang') return new Promise<GatewayResult<UpstreamGroup[]>>(() => {});
      return Promise.resolve(next);
    },
  };
  return { gateway, calls: () => calls };
}

function failingAccess(error: GatewayError) {
  const counts = { fetch: 0, add: 0, remove: 0 };
  const gateway: IAccessGateway = {
    config: { id: 'fake', type: 'memory' },
    fetchGroupMembers: async (): Promise<GatewayResult<AccessGroupSnapshot>> => {
      counts.fetch++;
      return fail(error);
    },
    addMember: async (): Promise<GatewayResult<MembershipChange>> => {
      counts.add++;
      return fail(error);
    },
    removeMember: async (): Promise<GatewayResult<MembershipChange>> => {
      counts.remove++;
      return fail(error);
    },
  };
  return { gateway, counts };
}

describe('instrumentDirectoryGateway', () => {
  it('retries retryable read failures with backoff', async () => {
    const { gateway, calls } = scriptedDirectory([
      fail(gatewayError('TIMEOUT')),
      fail(gatewayError('RATE_LIMITED')),
      ok([]),
    ]);
    const sleeps: number[] = [];
    const lines: string[] = [];
    const wrapped = instrumentDirectoryGateway(gateway, silentLogger(lines), {
      runtime: { retries: { attempts: 3, baseDelayMs: 100, jitter: 0 } },
      sleep: async (ms) => void sleeps.push(ms),
    });

    const result = await wrapped.fetchGroupsByPrefix('dev_');

    expect(result).toEqual({ ok: true, value: [] });
    expect(calls()).toBe(3);
    expect(sleeps).toEqual([100, 200]);
    expect(lines.filter((l) => l.includes('Retrying gateway call'))).toHaveLength(2);
  });

  it('does not retry other failures', async () => {
    const { gateway, calls } = scriptedDirectory([fail(gatewayError('AUTHENTICATION_FAILED'))]);
    const wrapped = instrumentDirectoryGateway(gateway, silentLogger(), {
      runtime: { retries: { attempts: 3 } },
      sleep: async () => {},
    });

    const result = await wrapped.fetchGroupsByPrefix('dev_');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('AUTHENTICATION_FAILED');
    expect(calls()).toBe(1);
  });

  it('fails a call that outlives its timeout', async () => {
    const { gateway } = scriptedDirectory(['hang']);
    const wrapped = instrumentDirectoryGateway(gateway, silentLogger(), { runtime: { timeoutMs: 20 } });

    const result = await wrapped.fetchGroupsByPrefix('dev_');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TIMEOUT');
      expect(result.error.message).toBe('fake.fetchGroupsByPrefix timed out after 20ms');
    }
  });

  it('prefers per-gateway runtime settings over defaults', async () => {
    const { gateway, calls } = scriptedDirectory([fail(gatewayError('CONNECTION_FAILED')), ok([])]);
    const wrapped = instrumentDirectoryGateway(gateway, silentLogger(), {
      runtime: { retries: { attempts: 2 } },
      defaults: { retries: { attempts: 1 } },
      sleep: async () => {},
    });

    const result = await wrapped.fetchGroupsByPrefix('dev_');

    expect(result.ok).toBe(true);
    expect(calls()).toBe(2);
  });
});

describe('instrumentAccessGateway', () => {
  it('never retries membership changes', async () => {
    const { gateway, counts } = failingAccess(gatewayError('TIMEOUT'));
    const wrapped = instrumentAccessGateway(gateway, silentLogger(), {
      runtime: { retries: { attempts: 3 } },
      sleep: async () => {},
    });

    const added = await wrapped.addMember('1', '2', 30);
    const removed = await wrapped.removeMember('1', '2');

    expect(added.ok).toBe(false);
    expect(removed.ok).toBe(false);
    expect(counts).toEqual({ fetch: 0, add: 1, remove: 1 });
  });

  it('opens the circuit after consecutive availability failures', async () => {
    const { gateway, counts } = failingAccess(gatewayError('CONNECTION_FAILED'));
    const wrapped = instrumentAccessGateway(gateway, silentLogger(), {
      runtime: { circuitBreaker: { enabled: true, failureThreshold: 2, openMs: 60_000 } },
    });

    const codes: string[] = [];
    for (let i = 0; i < 3; i++) {
      const result = await wrapped.fetchGroupMembers('payments', 50);
      if (!result.ok) codes.push(result.error.code);
    }

    expect(codes).toEqual(['CONNECTION_FAILED', 'CONNECTION_FAILED', 'CIRCUIT_OPEN']);
    expect(counts.fetch).toBe(2);
  });

  it('does not count answers from a healthy remote against the circuit', async () => {
    const { gateway, counts } = failingAccess(gatewayError('NOT_FOUND'));
    const wrapped = instrumentAccessGateway(gateway, silentLogger(), {
      runtime: { circuitBreaker: { enabled: true, failureThreshold: 2 } },
    });

    for (let i = 0; i < 3; i++) {
      await wrapped.fetchGroupMembers('payments', 50);
    }

    expect(counts.fetch).toBe(3);
  });
});

describe('GatewayCallRunner', () => {
  it('wraps thrown errors as gateway failures', async () => {
    const runner = new GatewayCallRunner('fake', silentLogger());

    const result = await runner.run('read', 'lookup', {}, async () => {
      throw new Error('socket hang up');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('UNKNOWN');
      expect(result.error.message).toBe('socket hang up');
      expect(result.error.gatewayId).toBe('fake');
    }
  });
});

describe('isRetryableGatewayError', () => {
  it('accepts availability failures only', () => {
    expect(isRetryableGatewayError(gatewayError('TIMEOUT'))).toBe(true);
    expect(isRetryableGatewayError(gatewayError('CONNECTION_FAILED'))).toBe(true);
    expect(isRetryableGatewayError(gatewayError('RATE_LIMITED'))).toBe(true);
    expect(isRetryableGatewayError(gatewayError('WRITE_FAILED'))).toBe(false);
    expect(isRetryableGatewayError(new Error('TIMEOUT'))).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  it('is disabled unless explicitly enabled', () => {
    expect(CircuitBreaker.fromConfig()).toBeNull();
    expect(CircuitBreaker.fromConfig({ enabled: false })).toBeNull();
  });

  it('lets one trial call through after the open period', () => {
    const breaker = CircuitBreaker.fromConfig({ enabled: true, failureThreshold: 1, openMs: 1000 });
    expect(breaker).not.toBeNull();
    if (!breaker) return;

    breaker.recordFailure(0);
    expect(breaker.allows(500)).toBe(false);
    expect(breaker.state(500)).toEqual({ phase: 'open', retryInMs: 500 });

    expect(breaker.allows(1000)).toBe(true);
    breaker.recordStart();
    expect(breaker.state(1001)).toEqual({ phase: 'trial' });
    expect(breaker.allows(1001)).toBe(false);

    breaker.recordSuccess();
    expect(breaker.state()).toEqual({ phase: 'closed', failures: 0 });
  });

  it('counts consecutive failures only', () => {
    const breaker = CircuitBreaker.fromConfig({ enabled: true, failureThreshold: 2 });
    if (!breaker) throw new Error('breaker expected');

    breaker.recordFailure(0);
    breaker.recordSuccess();
    breaker.recordFailure(0);
    expect(breaker.state(0)).toEqual({ phase: 'closed', failures: 1 });

    breaker.recordFailure(0);
    expect(breaker.state(0)).toEqual({ phase: 'open', retryInMs: 60_000 });
  });

  it('reopens when the trial call fails', () => {
    const breaker = CircuitBreaker.fromConfig({ enabled: true, failureThreshold: 1, openMs: 1000 });
    if (!breaker) throw new Error('breaker expected');

    breaker.recordFailure(0);
    expect(breaker.allows(1000)).toBe(true);
    breaker.recordStart();
    breaker.recordFailure(1200);

    expect(breaker.allows(1500)).toBe(false);
    expect(breaker.allows(2200)).toBe(true);
  });
});

describe('retry helpers', () => {
  it('grows the delay exponentially up to the cap', () => {
    const cfg = resolveRetryConfig({ attempts: 5, baseDelayMs: 100, maxDelayMs: 250, jitter: 0 });
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelayMs(cfg, attempt))).toEqual([0, 100, 200, 250]);
  });

  it('applies jitter around the delay', () => {
    const cfg = resolveRetryConfig({ baseDelayMs: 100, jitter: 0.5 });
    expect(computeBackoffDelayMs(cfg, 2, () => 1)).toBe(150);
    expect(computeBackoffDelayMs(cfg, 2, () => 0)).toBe(50);
  });

  it('rethrows the last error once attempts run out', async () => {
    let attempts = 0;
    const retries: number[] = [];

    await expect(
      withRetries(
        async () => {
          attempts++;
          throw gatewayError('TIMEOUT');
        },
        { attempts: 3, jitter: 0 },
        isRetryableGatewayError,
        { sleep: async () => {}, onRetry: (_err, next) => void retries.push(next.attempt) }
      )
    ).rejects.toThrow('timeout');

    expect(attempts).toBe(3);
    expect(retries).toEqual([2, 3]);
  });
});

describe('withTimeout', () => {
  it('returns the value of a promise that settles in time', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000)).resolves.toBe('done');
  });

  it('treats a zero timeout as no timeout', async () => {
    await expect(withTimeout(Promise.resolve(1), 0)).resolves.toBe(1);
  });

  it('passes through a rejection that comes first', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 1000)).rejects.toThrow('refused');
  });
});
