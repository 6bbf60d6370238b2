import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

export type MutationAction = 'add' | 'remove';

export type SyncAuditEntry = {
  timestamp: Date;
  pass_id: string;
  trace_id: string;
  dry_run: boolean;
  directory_group: string;
  access_group: string;
  action: MutationAction;
  account_id: string;
  username?: string;
  federated_id: string;
  access_level?: number;
  outcome: 'applied' | 'unchanged' | 'failed';
  error?: { code: string; message: string };
};

export type SyncAuditStoreOptions = {
  baseDir?: string;
  retentionDays?: number;
  maxFileBytes?: number;
};

/**
 * Append-only NDJSON log of membership mutations, one file per UTC day.
 * Each line carries the hash of the previous line of its file.
 */
export class SyncAuditStore {
  private static writeQueue = new Map<string, Promise<void>>();
  private readonly options: Required<Pick<SyncAuditStoreOptions, 'baseDir' | 'maxFileBytes'>> &
    SyncAuditStoreOptions;
  private readonly lastHashByFile = new Map<string, string>();

  constructor(options?: SyncAuditStoreOptions) {
    this.options = {
      baseDir: options?.baseDir ?? './.sync-audit',
      retentionDays: options?.retentionDays,
      maxFileBytes: options?.maxFileBytes ?? 10 * 1024 * 1024,
    };
  }

  private async ensureDir(): Promise<void> {
    await fs.mkdir(this.options.baseDir, { recursive: true, mode: 0o700 });
  }

  private async prune(): Promise<void> {
    const retentionDays = this.options.retentionDays;
    if (!retentionDays) return;

    const entries = await fs.readdir(this.options.baseDir, { withFileTypes: true });
    const cutoff = Date.now() - retentionDays * 24 * 60 * 60 * 1000;
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith('.ndjson')) continue;
      const full = path.join(this.options.baseDir, entry.name);
      const stat = await fs.stat(full);
      if (stat.mtimeMs < cutoff) {
        await fs.unlink(full);
      }
    }
  }

  private getBaseName(date: Date): string {
    return date.toISOString().split('T')[0] ?? 'unknown-date';
  }

  private async fileSize(filePath: string): Promise<number | null> {
    try {
      return (await fs.stat(filePath)).size;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  private async resolveWritableFilePath(date: Date): Promise<string> {
    const baseName = this.getBaseName(date);

    // YYYY-MM-DD.ndjson, then YYYY-MM-DD-1.ndjson, ...
    for (let i = 0; i < 10_000; i++) {
      const fileName = i === 0 ? `${baseName}.ndjson` : `${baseName}-${i}.ndjson`;
      const full = path.join(this.options.baseDir, fileName);
      const size = await this.fileSize(full);
      if (size === null || size < this.options.maxFileBytes) return full;
    }

    return path.join(this.options.baseDir, `${baseName}-${Date.now()}.ndjson`);
  }

  private async readLastHash(filePath: string): Promise<string> {
    const cached = this.lastHashByFile.get(filePath);
    if (cached) return cached;

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return '0';
      throw err;
    }

    const last = content.trimEnd().split('\n').at(-1);
    if (!last) return '0';
    const parsed: unknown = JSON.parse(last);
    const hash =
      typeof parsed === 'object' && parsed !== null && 'hash' in parsed && typeof parsed.hash === 'string'
        ? parsed.hash
        : '0';
    this.lastHashByFile.set(filePath, hash);
    return hash;
  }

  private computeHash(prevHash: string, record: unknown): string {
    const payload = `${prevHash}\n${JSON.stringify(record)}`;
    return createHash('sha256').update(payload).digest('hex');
  }

  private enqueueWrite(filePath: string, op: () => Promise<void>): Promise<void> {
    const previous = SyncAuditStore.writeQueue.get(filePath) ?? Promise.resolve();
    const next = previous.then(op, op);
    const wrapped: Promise<void> = next.finally(() => {
      if (SyncAuditStore.writeQueue.get(filePath) === wrapped) {
        SyncAuditStore.writeQueue.delete(filePath);
      }
    });
    SyncAuditStore.writeQueue.set(filePath, wrapped);
    return wrapped;
  }

  async append(entry: SyncAuditEntry): Promise<void> {
    await this.ensureDir();
    await this.prune();

    const filePath = await this.resolveWritableFilePath(entry.timestamp);
    const record = {
      ...entry,
      timestamp: entry.timestamp.toISOString(),
    };

    await this.enqueueWrite(filePath, async () => {
      const prevHash = await this.readLastHash(filePath);
      const hash = this.computeHash(prevHash, record);
      const line = `${JSON.stringify({ ...record, prev_hash: prevHash, hash })}\n`;
      await fs.appendFile(filePath, line, { encoding: 'utf-8', mode: 0o600 });
      this.lastHashByFile.set(filePath, hash);
    });
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
