import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { init } from '../commands/init.js';
import { deps } from '../commands/deps.js';
import { history, parseLimit } from '../commands/history.js';
import { exitCodeFor, parseRunArgs, reportToJson } from '../commands/run.js';
import { AggregateFailure, ConflictError, SyncError, ValidationError } from '../errors.js';
import type { RoundReport } from '../round/types.js';
import { RoundPhase } from '../state/types.js';
import { BASE_MANIFEST } from './fixtures.js';

let tmpDir: string;
let originalCwd: string;

/** Run `fn` with console.log captured; returns what it printed. */
async function captureLog(fn: () => Promise<void>): Promise<string> {
  const original = console.log;
  const lines: string[] = [];
  console.log = (...parts: unknown[]) => { lines.push(parts.map(String).join(' ')); };
  try {
    await fn();
  } finally {
    console.log = original;
  }
  return lines.join('\n');
}

function report(overrides: Partial<RoundReport> = {}): RoundReport {
  return {
    status: 'done',
    mode: 'apply',
    phases: [RoundPhase.COLLECTING],
    failures: [],
    ranked: [],
    winner: null,
    edits: [],
    ambiguities: [],
    diff: '',
    committed: false,
    downgradedToDryRun: false,
    sync: null,
    failedPhase: null,
    error: null,
    ...overrides,
  };
}

beforeEach(() => {
  originalCwd = process.cwd();
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-cli-test-'));
  fs.writeFileSync(path.join(tmpDir, 'pyproject.toml'), BASE_MANIFEST);
  process.chdir(tmpDir);
});

afterEach(() => {
  process.chdir(originalCwd);
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('init', () => {
  it('creates config, specialist definitions and the ledger', async () => {
    await captureLog(() => init(['--sync', 'uv sync --frozen']));
    const config: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, '.conclave', 'config.json'), 'utf-8'));
    assert.deepEqual(config, {
      project: { name: path.basename(tmpDir), manifest: 'pyproject.toml' },
      specialists: ['configuration', 'workflow'],
      models: { specialist: 'sonnet', judge: 'sonnet' },
      round: {
        specialist_timeout_ms: 120_000,
        judge_timeout_ms: 60_000,
        max_retries: 2,
        backoff_base_ms: 1_000,
        backoff_max_ms: 8_000,
      },
      sync: { command: ['uv', 'sync', '--frozen'] },
      lock: { lease_seconds: 30 },
    });
    assert.deepEqual(fs.readdirSync(path.join(tmpDir, '.conclave', 'specialists')).sort(), [
      'configuration.md',
      'security.md',
      'workflow.md',
    ]);
    assert.ok(fs.existsSync(path.join(tmpDir, '.conclave', 'conclave.db')));
  });

  it('keeps an edited definition unless forced', async () => {
    await captureLog(() => init([]));
    const file = path.join(tmpDir, '.conclave', 'specialists', 'workflow.md');
    fs.writeFileSync(file, 'edited');
    await captureLog(() => init([]));
    assert.equal(fs.readFileSync(file, 'utf-8'), 'edited');
    await captureLog(() => init(['--force']));
    assert.notEqual(fs.readFileSync(file, 'utf-8'), 'edited');
  });
});

describe('deps', () => {
  it('prints the dependency lists as JSON', async () => {
    const out = await captureLog(() => deps(true));
    const parsed: unknown = JSON.parse(out);
    assert.deepEqual(parsed, {
      manifest: path.resolve(process.cwd(), 'pyproject.toml'),
      lists: { dependencies: ['requests'] },
    });
  });
});

describe('history', () => {
  it('prints an empty list for a fresh project', async () => {
    await captureLog(() => init([]));
    assert.equal(await captureLog(() => history([], true)), '[]');
  });

  it('requires an initialized project', async () => {
    await assert.rejects(history([], true), /Not in a conclave project/);
  });
});

describe('parseLimit()', () => {
  it('defaults to 20 and validates the value', () => {
    assert.equal(parseLimit([]), 20);
    assert.equal(parseLimit(['--limit', '5']), 5);
    assert.throws(() => parseLimit(['--limit', '0']), /--limit must be a positive integer, got "0"/);
    assert.throws(() => parseLimit(['--limit', 'many']), /positive integer/);
  });
});

describe('parseRunArgs()', () => {
  it('joins the request words and reads the mode', () => {
    assert.deepEqual(parseRunArgs(['add', 'pytest', '--dry-run']), { request: 'add pytest', mode: 'dry-run', diagnosticsPath: null });
    assert.deepEqual(parseRunArgs(['--show-all', 'tidy pins']), { request: 'tidy pins', mode: 'show-all', diagnosticsPath: null });
  });

  it('takes the diagnostics file out of the request', () => {
    assert.deepEqual(parseRunArgs(['fix tests', '--diagnostics', 'diag.json']), {
      request: 'fix tests',
      mode: 'apply',
      diagnosticsPath: 'diag.json',
    });
  });

  it('rejects an empty request and conflicting modes', () => {
    assert.throws(() => parseRunArgs(['--dry-run']), /Usage: conclave run/);
    assert.throws(() => parseRunArgs(['x', '--dry-run', '--show-all']), /cannot be combined/);
  });
});

describe('exitCodeFor()', () => {
  it('is 0 for a finished round', () => {
    assert.equal(exitCodeFor(report()), 0);
  });

  it('is 1 for a failed round', () => {
    assert.equal(exitCodeFor(report({ status: 'failed' })), 1);
  });

  it('is 2 when the edit committed but sync failed', () => {
    const sync = { status: 'failed' as const, exitCode: 1, error: new SyncError(1, '') };
    assert.equal(exitCodeFor(report({ committed: true, sync })), 2);
  });
});

describe('reportToJson()', () => {
  it('reports errors by name and phase', () => {
    const json = reportToJson(report({
      status: 'failed',
      failedPhase: RoundPhase.SYNC_SIGNALED,
      error: new SyncError(null, '', 'spawn uv ENOENT'),
    }));
    assert.deepEqual(json.error, {
      name: 'SyncError',
      message: 'Sync command did not exit normally: spawn uv ENOENT',
      phase: 'sync_signaled',
    });
  });

  it('includes both conflicting edits', () => {
    const a = { kind: 'add' as const, path: 'dependencies' as const, value: 'pytest' };
    const b = { kind: 'remove' as const, path: 'dependencies' as const, value: 'requests' };
    const json = reportToJson(report({ status: 'failed', failedPhase: RoundPhase.APPLYING, error: new ConflictError([[a, b]]) }));
    assert.deepEqual(json.error, {
      name: 'ConflictError',
      message: 'Conflicting edits target the same list: dependencies',
      phase: 'applying',
      conflicts: [[a, b]],
    });
  });

  it('includes the rejected actions', () => {
    const action = { kind: 'add' as const, path: 'build-system.requires', value: 'hatchling' };
    const json = reportToJson(report({
      status: 'failed',
      failedPhase: RoundPhase.EXTRACTING,
      error: new ValidationError('security', [{ action, reason: 'not an allow-listed manifest path' }]),
    }));
    assert.deepEqual(json.error, {
      name: 'ValidationError',
      message: 'Proposal from security has 1 invalid action(s): add build-system.requires: not an allow-listed manifest path',
      phase: 'extracting',
      specialist: 'security',
      rejected: [{ action, reason: 'not an allow-listed manifest path' }],
    });
  });

  it('includes every specialist failure', () => {
    const failures = [{ specialistId: 'workflow', reason: 'timeout' as const, message: 'no response within 5000 ms', attempts: 1 }];
    const json = reportToJson(report({ status: 'failed', failedPhase: RoundPhase.COLLECTING, error: new AggregateFailure(failures) }));
    assert.deepEqual(json.error, {
      name: 'AggregateFailure',
      message: 'All 1 specialist(s) failed: workflow (timeout): no response within 5000 ms',
      phase: 'collecting',
      failures,
    });
  });
});
