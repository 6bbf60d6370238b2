import { timingSafeEqual } from 'node:crypto';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from './logger.js';
import type { PassReport } from './orchestrator.js';

export type SyncTriggerOptions = {
  runPass: () => Promise<PassReport>;
  logger: Logger;
  host?: string;
  port?: number;
  path?: string;
  healthPath?: string;
  /** Required bearer token; no authentication when absent */
  bearerToken?: string;
};

export type SyncTriggerServer = {
  server: Server;
  url: string;
  close(): Promise<void>;
};

function getBearerToken(req: IncomingMessage): string | null {
  const raw = req.headers['authorization'];
  if (typeof raw !== 'string') return null;
  const [scheme, token] = raw.split(' ', 2);
  if (!scheme || !token) return null;
  if (scheme.toLowerCase() !== 'bearer') return null;
  return token.trim();
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Request handler that runs one pass per authorized POST. Overlapping
 * requests are refused while a pass is running.
 */
export function createSyncTriggerHandler(
  options: SyncTriggerOptions
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const path = options.path ?? '/sync';
  const healthPath = options.healthPath ?? '/healthz';
  let running = false;

  return async (req, res) => {
    const sendText = (status: number, body: string) => {
      res.writeHead(status, {
        'Content-Type': 'text/plain; charset=utf-8',
        'X-Content-Type-Options': 'nosniff',
      });
      res.end(body);
    };

    // Request bodies carry nothing.
    req.resume();

    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && url.pathname === healthPath) {
      sendText(200, 'ok');
      return;
    }

    if (req.method !== 'POST' || url.pathname !== path) {
      sendText(404, 'Not found');
      return;
    }

    if (options.bearerToken) {
      const token = getBearerToken(req);
      if (!token || !tokensMatch(token, options.bearerToken)) {
        sendText(401, 'Unauthorized');
        return;
      }
    }

    if (running) {
      sendText(409, 'A sync pass is already running');
      return;
    }

    running = true;
    try {
      const report = await options.runPass();
      res.writeHead(report.status === 'succeeded' ? 200 : 500, {
        'Content-Type': 'application/json; charset=utf-8',
        'X-Content-Type-Options': 'nosniff',
      });
      res.end(`${JSON.stringify(report)}\n`);
    } catch (err) {
      options.logger.error('Triggered sync pass crashed', { error: err });
      sendText(500, 'Internal error');
    } finally {
      running = false;
    }
  };
}

export async function startSyncTriggerServer(options: SyncTriggerOptions): Promise<SyncTriggerServer> {
  const host = options.host ?? '127.0.0.1';
  const handler = createSyncTriggerHandler(options);

  const server = createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      options.logger.error('Trigger request failed', { error: err });
      if (!res.headersSent) {
        res.writeHead(500);
      }
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port ?? 8080, host, () => resolve());
  });

  const address: AddressInfo | string | null = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port ?? 8080;
  const url = `http://${host}:${port}${options.path ?? '/sync'}`;

  options.logger.info('Sync trigger listening', {
    url,
    health: `http://${host}:${port}${options.healthPath ?? '/healthz'}`,
    auth: options.bearerToken ? 'bearer' : 'none',
  });

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
