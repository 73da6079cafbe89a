import * as fs from 'node:fs';
import * as os from 'node:os';
import { z } from 'zod';
import { LockError } from '../errors.js';

/**
 * Advisory lock around the manifest write. A lock file beside the manifest holds
 * the owner's record; a record older than its lease is stale and may be broken.
 */

const LockRecordSchema = z.object({
  pid: z.number().int(),
  hostname: z.string().min(1),
  created_at: z.string().min(1),
  lease_seconds: z.number().int().positive(),
  owner_id: z.string().min(1),
});

export type LockRecord = z.infer<typeof LockRecordSchema>;

export interface ManifestLock {
  readonly lockPath: string;
  readonly record: LockRecord;
  release(): Promise<void>;
}

export function lockPathFor(manifestPath: string): string {
  return `${manifestPath}.lock`;
}

export function createLockRecord(leaseSeconds: number, now: Date = new Date()): LockRecord {
  const createdAt = now.toISOString();
  const hostname = os.hostname();
  return {
    pid: process.pid,
    hostname,
    created_at: createdAt,
    lease_seconds: Math.max(1, Math.trunc(leaseSeconds)),
    owner_id: `${hostname}:${process.pid}:${createdAt}`,
  };
}

export function isLockStale(record: LockRecord, nowMs: number = Date.now()): boolean {
  const createdMs = Date.parse(record.created_at);
  if (!Number.isFinite(createdMs)) return true;
  return nowMs > createdMs + record.lease_seconds * 1000;
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Read the current lock record; null when absent, 'invalid' when unreadable. */
export async function readLockRecord(lockPath: string): Promise<LockRecord | 'invalid' | null> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(lockPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw new LockError(`Failed to read lock file ${lockPath}`, lockPath, { cause: err });
  }
  try {
    const parsed = LockRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : 'invalid';
  } catch {
    return 'invalid';
  }
}

async function invalidLockExpired(lockPath: string, leaseSeconds: number, nowMs: number): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(lockPath);
    return nowMs > stat.mtimeMs + leaseSeconds * 1000;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return true;
    throw new LockError(`Failed to stat lock file ${lockPath}`, lockPath, { cause: err });
  }
}

/**
 * Acquire the manifest lock, breaking a stale one. Fails with LockError when a
 * live owner holds it. An unreadable lock file counts as stale once its mtime is
 * older than the lease.
 */
export async function acquireManifestLock(manifestPath: string, leaseSeconds: number): Promise<ManifestLock> {
  const lockPath = lockPathFor(manifestPath);
  const record = createLockRecord(leaseSeconds);

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await fs.promises.writeFile(lockPath, JSON.stringify(record, null, 2) + '\n', { encoding: 'utf-8', flag: 'wx' });
      return {
        lockPath,
        record,
        release: () => releaseManifestLock(lockPath, record.owner_id),
      };
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        throw new LockError(`Failed to create lock file ${lockPath}`, lockPath, { cause: err });
      }
    }

    const existing = await readLockRecord(lockPath);
    const nowMs = Date.now();
    const stale = existing === null
      || (existing === 'invalid'
        ? await invalidLockExpired(lockPath, record.lease_seconds, nowMs)
        : isLockStale(existing, nowMs));
    if (!stale) {
      const owner = existing === 'invalid' || existing === null ? 'an unknown process' : existing.owner_id;
      throw new LockError(`${manifestPath} is locked by ${owner}`, lockPath);
    }
    await fs.promises.rm(lockPath, { force: true });
  }

  throw new LockError(`Could not acquire lock ${lockPath} after breaking a stale lock`, lockPath);
}

/** Remove the lock file if it still belongs to `ownerId`. */
export async function releaseManifestLock(lockPath: string, ownerId: string): Promise<void> {
  const current = await readLockRecord(lockPath);
  if (current === null || current === 'invalid' || current.owner_id !== ownerId) return;
  await fs.promises.rm(lockPath, { force: true });
}
