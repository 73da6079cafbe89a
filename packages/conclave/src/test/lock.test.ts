import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  acquireManifestLock,
  createLockRecord,
  isLockStale,
  lockPathFor,
  readLockRecord,
  releaseManifestLock,
} from '../manifest/lock.js';
import { LockError } from '../errors.js';

let tmpDir: string;
let manifestPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-lock-test-'));
  manifestPath = path.join(tmpDir, 'pyproject.toml');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('createLockRecord()', () => {
  it('records the owner and lease', () => {
    const record = createLockRecord(30, new Date('2026-01-02T03:04:05.000Z'));
    assert.equal(record.pid, process.pid);
    assert.equal(record.created_at, '2026-01-02T03:04:05.000Z');
    assert.equal(record.lease_seconds, 30);
    assert.equal(record.owner_id, `${os.hostname()}:${process.pid}:2026-01-02T03:04:05.000Z`);
  });
});

describe('isLockStale()', () => {
  const record = createLockRecord(10, new Date('2026-01-01T00:00:00.000Z'));
  const created = Date.parse('2026-01-01T00:00:00.000Z');

  it('is live within the lease', () => {
    assert.equal(isLockStale(record, created + 10_000), false);
  });

  it('is stale after the lease', () => {
    assert.equal(isLockStale(record, created + 10_001), true);
  });

  it('treats an unreadable timestamp as stale', () => {
    assert.equal(isLockStale({ ...record, created_at: 'yesterday' }, created), true);
  });
});

describe('acquireManifestLock()', () => {
  it('creates the lock file and removes it on release', async () => {
    const lock = await acquireManifestLock(manifestPath, 30);
    assert.equal(lock.lockPath, `${manifestPath}.lock`);
    const onDisk = await readLockRecord(lock.lockPath);
    assert.deepEqual(onDisk, lock.record);
    await lock.release();
    assert.equal(fs.existsSync(lock.lockPath), false);
  });

  it('fails while the lock is held', async () => {
    const lock = await acquireManifestLock(manifestPath, 30);
    try {
      await assert.rejects(acquireManifestLock(manifestPath, 30), (err: unknown) =>
        err instanceof LockError && err.message === `${manifestPath} is locked by ${lock.record.owner_id}`);
    } finally {
      await lock.release();
    }
  });

  it('breaks an expired lock', async () => {
    const old = createLockRecord(1, new Date(Date.now() - 60_000));
    fs.writeFileSync(lockPathFor(manifestPath), JSON.stringify(old));
    const lock = await acquireManifestLock(manifestPath, 30);
    assert.notEqual(lock.record.owner_id, old.owner_id);
    await lock.release();
  });

  it('breaks an unreadable lock once its mtime is past the lease', async () => {
    const lockPath = lockPathFor(manifestPath);
    fs.writeFileSync(lockPath, 'garbage');
    const past = new Date(Date.now() - 120_000);
    fs.utimesSync(lockPath, past, past);
    const lock = await acquireManifestLock(manifestPath, 30);
    await lock.release();
    assert.equal(fs.existsSync(lockPath), false);
  });

  it('respects a fresh unreadable lock', async () => {
    fs.writeFileSync(lockPathFor(manifestPath), 'garbage');
    await assert.rejects(acquireManifestLock(manifestPath, 30), /is locked by an unknown process/);
  });
});

describe('releaseManifestLock()', () => {
  it('leaves a lock owned by someone else', async () => {
    const lock = await acquireManifestLock(manifestPath, 30);
    await releaseManifestLock(lock.lockPath, 'someone-else');
    assert.equal(fs.existsSync(lock.lockPath), true);
    await lock.release();
  });
});

describe('readLockRecord()', () => {
  it('returns null when no lock exists', async () => {
    assert.equal(await readLockRecord(lockPathFor(manifestPath)), null);
  });

  it('returns invalid for a malformed record', async () => {
    fs.writeFileSync(lockPathFor(manifestPath), JSON.stringify({ pid: 'x' }));
    assert.equal(await readLockRecord(lockPathFor(manifestPath)), 'invalid');
  });
});
