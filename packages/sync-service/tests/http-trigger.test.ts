import { afterEach, describe, expect, it } from 'vitest';
import { startSyncTriggerServer, type SyncTriggerServer } from '../src/http-trigger.js';
import type { PassReport } from '../src/orchestrator.js';
import { silentLogger } from './fake-gateways.js';
import { makeReport } from './report-fixture.js';

describe('sync trigger server', () => {
  let trigger: SyncTriggerServer | null = null;

  afterEach(async () => {
    await trigger?.close();
    trigger = null;
  });

  async function start(runPass: () => Promise<PassReport>, bearerToken?: string): Promise<string> {
    trigger = await startSyncTriggerServer({
      runPass,
      logger: silentLogger(),
      host: '127.0.0.1',
      port: 0,
      bearerToken,
    });
    return trigger.url;
  }

  it('answers health checks', async () => {
    const url = await start(async () => makeReport());

    const response = await fetch(new URL('/healthz', url));

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('ok');
  });

  it('runs a pass and returns its report', async () => {
    let runs = 0;
    const url = await start(async () => {
      runs++;
      return makeReport();
    });

    const response = await fetch(url, { method: 'POST' });

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(await response.json()).toEqual(makeReport());
    expect(runs).toBe(1);
  });

  it('answers 500 with the report when the pass did not succeed', async () => {
    const url = await start(async () => makeReport('partial'));

    const response = await fetch(url, { method: 'POST' });

    expect(response.status).toBe(500);
    expect(await response.json()).toMatchObject({ id: 'pass-1', status: 'partial' });
  });

  it('requires the bearer token when one is configured', async () => {
    let runs = 0;
    const url = await start(async () => {
      runs++;
      return makeReport();
    }, 'test-secret');

    const missing = await fetch(url, { method: 'POST' });
    const wrong = await fetch(url, { method: 'POST', headers: { Authorization: 'Bearer not-the-secret' } });
    const right = await fetch(url, { method: 'POST', headers: { Authorization: 'Bearer test-secret' } });

    expect([missing.status, wrong.status, right.status]).toEqual([401, 401, 200]);
    expect(runs).toBe(1);
  });

  it('refuses a second pass while one is running', async () => {
    let markStarted: () => void = () => {};
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    let release: () => void = () => {};
    const url = await start(
      () =>
        new Promise<PassReport>((resolve) => {
          markStarted();
          release = () => resolve(makeReport());
        })
    );

    const first = fetch(url, { method: 'POST' });
    await started;
    const second = await fetch(url, { method: 'POST' });
    release();

    expect(second.status).toBe(409);
    expect((await first).status).toBe(200);
  });

  it('answers 404 to other methods and paths', async () => {
    const url = await start(async () => makeReport());

    const get = await fetch(url);
    const other = await fetch(new URL('/other', url), { method: 'POST' });

    expect([get.status, other.status]).toEqual([404, 404]);
  });

  it('answers 500 when the pass throws', async () => {
    const url = await start(async () => {
      throw new Error('unexpected');
    });

    const response = await fetch(url, { method: 'POST' });

    expect(response.status).toBe(500);
    expect(await response.text()).toBe('Internal error');
  });
});
