import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { runRound } from '../round/orchestrator.js';
import type { RoundDependencies } from '../round/orchestrator.js';
import type { RoundLedger, RoundReport } from '../round/types.js';
import { RoundPhase } from '../state/types.js';
import type { RoundMode } from '../state/types.js';
import type { ProposedAction } from '../agents/types.js';
import type { RubricPoints } from '../round/rubric.js';
import type { Task } from '../types.js';
import {
  AggregateFailure,
  CancelledError,
  ConflictError,
  SyncError,
  ValidationError,
} from '../errors.js';
import {
  BASE_MANIFEST,
  FakeBackend,
  FakeSyncRunner,
  makeConfig,
  makeDescriptor,
  makeTask,
  points,
  proposalBlock,
  verdictBlock,
} from './fixtures.js';

const ADDED = BASE_MANIFEST.replace('["requests"]', '["requests", "pytest"]');

const addPytest: ProposedAction = { kind: 'add', path: 'dependencies', value: 'pytest' };
const addTestGroup: ProposedAction = { kind: 'add', path: 'optional-dependencies.test', value: 'pytest' };

interface Script {
  proposals: Record<string, ProposedAction[] | string>;
  verdicts: Record<string, RubricPoints | string>;
}

const DEFAULT_SCRIPT: Script = {
  proposals: { configuration: [addPytest], workflow: [addTestGroup] },
  verdicts: { configuration: points(28, 22, 18, 12, 9), workflow: points(20, 18, 16, 10, 8) },
};

function scriptedBackend(script: Script = DEFAULT_SCRIPT): FakeBackend {
  return new FakeBackend(async req => {
    if (req.label.startsWith('judge:')) {
      const verdict = script.verdicts[req.label.slice('judge:'.length)];
      return typeof verdict === 'string' ? verdict : verdictBlock(verdict);
    }
    const proposal = script.proposals[req.label];
    return typeof proposal === 'string' ? proposal : proposalBlock(proposal);
  });
}

class MemoryLedger implements RoundLedger {
  readonly reports: RoundReport[] = [];
  record(_task: Task, report: RoundReport): void {
    this.reports.push(report);
  }
}

let tmpDir: string;
let manifestPath: string;
let task: Task;

function deps(overrides: Partial<RoundDependencies> = {}): RoundDependencies {
  return {
    config: makeConfig(),
    descriptors: [makeDescriptor('configuration'), makeDescriptor('workflow', ['optional-dependencies.*'])],
    backend: scriptedBackend(),
    sync: new FakeSyncRunner(),
    ...overrides,
  };
}

function run(mode: RoundMode, overrides: Partial<RoundDependencies> = {}, signal?: AbortSignal): Promise<RoundReport> {
  return runRound(task, deps(overrides), { mode, signal });
}

function onDisk(): string {
  return fs.readFileSync(manifestPath, 'utf-8');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-round-test-'));
  manifestPath = path.join(tmpDir, 'pyproject.toml');
  fs.writeFileSync(manifestPath, BASE_MANIFEST);
  task = makeTask(BASE_MANIFEST, manifestPath);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('runRound() in apply mode', () => {
  it('applies the best proposal and signals sync', async () => {
    const sync = new FakeSyncRunner();
    const ledger = new MemoryLedger();
    const seen: RoundPhase[] = [];
    const report = await runRound(task, deps({ sync, ledger }), { mode: 'apply', onPhase: p => seen.push(p) });

    assert.equal(report.status, 'done');
    assert.deepEqual(report.phases, [
      RoundPhase.COLLECTING,
      RoundPhase.SCORING,
      RoundPhase.SELECTING,
      RoundPhase.EXTRACTING,
      RoundPhase.APPLYING,
      RoundPhase.SYNC_SIGNALED,
      RoundPhase.DONE,
    ]);
    assert.deepEqual(seen, report.phases);
    assert.equal(report.winner?.proposal.specialistId, 'configuration');
    assert.deepEqual(report.ranked.map(r => [r.rank, r.proposal.specialistId, r.score.total]), [
      [1, 'configuration', 89],
      [2, 'workflow', 72],
    ]);
    assert.deepEqual(report.edits, [{ kind: 'add', path: 'dependencies', value: 'pytest' }]);
    assert.equal(report.committed, true);
    assert.equal(onDisk(), ADDED);
    assert.deepEqual(report.sync, { status: 'succeeded', exitCode: 0 });
    assert.deepEqual(sync.runs, [manifestPath]);
    assert.deepEqual(ledger.reports, [report]);
    assert.ok(Object.isFrozen(report));
  });

  it('keeps the commit when sync fails', async () => {
    const report = await run('apply', { sync: new FakeSyncRunner({ exitCode: 3 }) });
    assert.equal(report.status, 'done');
    assert.equal(report.committed, true);
    assert.equal(onDisk(), ADDED);
    assert.equal(report.sync?.status, 'failed');
    if (report.sync?.status === 'failed') {
      assert.ok(report.sync.error instanceof SyncError);
      assert.equal(report.sync.error.message, 'Sync command exited with code 3');
      assert.equal(report.sync.error.diff, report.diff);
    }
  });

  it('skips sync when no runner is configured', async () => {
    const report = await run('apply', { sync: null });
    assert.deepEqual(report.sync, { status: 'skipped' });
    assert.equal(report.phases[report.phases.length - 2], RoundPhase.SYNC_SIGNALED);
  });

  it('ends after extraction when the winner proposes nothing', async () => {
    const backend = scriptedBackend({ ...DEFAULT_SCRIPT, proposals: { configuration: [], workflow: [addTestGroup] } });
    const report = await run('apply', { backend });
    assert.deepEqual(report.phases.slice(-2), [RoundPhase.EXTRACTING, RoundPhase.DONE]);
    assert.equal(report.committed, false);
    assert.equal(report.diff, '');
  });

  it('downgrades to a dry run when an edit is ambiguous', async () => {
    const backend = scriptedBackend({
      ...DEFAULT_SCRIPT,
      proposals: { configuration: [addPytest, { kind: 'remove', path: 'optional-dependencies.dev', value: 'black' }], workflow: [addTestGroup] },
    });
    const sync = new FakeSyncRunner();
    const report = await run('apply', { backend, sync });
    assert.equal(report.status, 'done');
    assert.equal(report.downgradedToDryRun, true);
    assert.equal(report.committed, false);
    assert.deepEqual(report.edits, [{ kind: 'add', path: 'dependencies', value: 'pytest' }]);
    assert.deepEqual(report.ambiguities.map(a => a.reason), ['black is not listed in optional-dependencies.dev']);
    assert.ok(report.diff.includes('+dependencies = ["requests", "pytest"]'));
    assert.deepEqual(report.phases.slice(-2), [RoundPhase.APPLYING, RoundPhase.DONE]);
    assert.equal(onDisk(), BASE_MANIFEST);
    assert.deepEqual(sync.runs, []);
  });

  it('downgrades to a dry run when the winner could not be judged', async () => {
    const backend = scriptedBackend({ ...DEFAULT_SCRIPT, verdicts: { configuration: 'no score', workflow: 'no score' } });
    const report = await run('apply', { backend });
    assert.equal(report.winner?.proposal.specialistId, 'configuration');
    assert.equal(report.winner?.needsManualReview, true);
    assert.equal(report.downgradedToDryRun, true);
    assert.equal(report.committed, false);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('continues with the proposals that survived', async () => {
    const backend = scriptedBackend({ ...DEFAULT_SCRIPT, proposals: { configuration: 'I cannot help.', workflow: [addTestGroup] } });
    const report = await run('apply', { backend });
    assert.equal(report.status, 'done');
    assert.deepEqual(report.failures.map(f => [f.specialistId, f.reason]), [['configuration', 'unparseable']]);
    assert.equal(report.winner?.proposal.specialistId, 'workflow');
    assert.equal(onDisk(), `${BASE_MANIFEST}\n[project.optional-dependencies]\ntest = ["pytest"]\n`);
  });
});

describe('runRound() in other modes', () => {
  it('dry-run shows the diff and writes nothing', async () => {
    const sync = new FakeSyncRunner();
    const report = await run('dry-run', { sync });
    assert.equal(report.status, 'done');
    assert.equal(report.committed, false);
    assert.equal(report.downgradedToDryRun, false);
    assert.ok(report.diff.includes('-dependencies = ["requests"]'));
    assert.equal(report.sync, null);
    assert.deepEqual(sync.runs, []);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('show-all ranks every proposal and stops after selection', async () => {
    const report = await run('show-all');
    assert.deepEqual(report.phases, [RoundPhase.COLLECTING, RoundPhase.SCORING, RoundPhase.SELECTING, RoundPhase.DONE]);
    assert.equal(report.ranked.length, 2);
    assert.deepEqual(report.edits, []);
    assert.equal(report.diff, '');
    assert.equal(onDisk(), BASE_MANIFEST);
  });
});

describe('runRound() failures', () => {
  it('fails in COLLECTING when every specialist fails', async () => {
    const backend = scriptedBackend({ ...DEFAULT_SCRIPT, proposals: { configuration: 'nothing', workflow: 'nothing' } });
    const report = await run('apply', { backend });
    assert.equal(report.status, 'failed');
    assert.equal(report.failedPhase, RoundPhase.COLLECTING);
    assert.ok(report.error instanceof AggregateFailure);
    assert.deepEqual(report.phases, [RoundPhase.COLLECTING, RoundPhase.FAILED]);
  });

  it('fails in EXTRACTING when the winner breaks the allow-list', async () => {
    const backend = scriptedBackend({
      ...DEFAULT_SCRIPT,
      proposals: { configuration: [{ kind: 'add', path: 'build-system.requires', value: 'hatchling' }], workflow: [addTestGroup] },
    });
    const report = await run('apply', { backend });
    assert.equal(report.status, 'failed');
    assert.equal(report.failedPhase, RoundPhase.EXTRACTING);
    assert.ok(report.error instanceof ValidationError);
    assert.equal(report.committed, false);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('fails in APPLYING when edits conflict', async () => {
    const backend = scriptedBackend({
      ...DEFAULT_SCRIPT,
      proposals: { configuration: [addPytest, { kind: 'add', path: 'dependencies', value: 'httpx' }], workflow: [addTestGroup] },
    });
    const report = await run('apply', { backend });
    assert.equal(report.failedPhase, RoundPhase.APPLYING);
    assert.ok(report.error instanceof ConflictError);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('counts ambiguous edits when looking for conflicts', async () => {
    const backend = scriptedBackend({
      ...DEFAULT_SCRIPT,
      proposals: { configuration: [{ kind: 'add', path: 'dependencies', value: 'requests' }, addPytest], workflow: [addTestGroup] },
    });
    const report = await run('dry-run', { backend });
    assert.equal(report.status, 'failed');
    assert.equal(report.failedPhase, RoundPhase.APPLYING);
    assert.ok(report.error instanceof ConflictError);
    if (report.error instanceof ConflictError) {
      assert.deepEqual(report.error.conflicts, [[
        { kind: 'add', path: 'dependencies', value: 'requests' },
        { kind: 'add', path: 'dependencies', value: 'pytest' },
      ]]);
    }
    assert.equal(report.diff, '');
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('reports a conflict even when every conflicting edit is ambiguous', async () => {
    const backend = scriptedBackend({
      ...DEFAULT_SCRIPT,
      proposals: {
        configuration: [{ kind: 'remove', path: 'dependencies', value: 'flask' }, { kind: 'remove', path: 'dependencies', value: 'django' }],
        workflow: [addTestGroup],
      },
    });
    const report = await run('apply', { backend });
    assert.equal(report.failedPhase, RoundPhase.APPLYING);
    assert.ok(report.error instanceof ConflictError);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('is cancelled before any work when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const backend = scriptedBackend();
    const report = await run('apply', { backend }, controller.signal);
    assert.equal(report.status, 'failed');
    assert.ok(report.error instanceof CancelledError);
    assert.equal(report.error?.message, 'Round cancelled during collecting');
    assert.equal(backend.requests.length, 0);
  });

  it('is cancelled when the signal aborts while scoring', async () => {
    const controller = new AbortController();
    const backend = new FakeBackend(async req => {
      if (req.label.startsWith('judge:')) {
        controller.abort();
        return verdictBlock(points(1, 1, 1, 1, 1));
      }
      return proposalBlock([addPytest]);
    });
    const report = await run('apply', { backend }, controller.signal);
    assert.equal(report.failedPhase, RoundPhase.SCORING);
    assert.ok(report.error instanceof CancelledError);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('is cancelled when the signal aborts on entering SELECTING', async () => {
    const controller = new AbortController();
    const report = await runRound(task, deps(), {
      mode: 'apply',
      signal: controller.signal,
      onPhase: p => {
        if (p === RoundPhase.SELECTING) controller.abort();
      },
    });
    assert.equal(report.failedPhase, RoundPhase.SELECTING);
    assert.ok(report.error instanceof CancelledError);
    assert.equal(report.committed, false);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('is cancelled when the signal aborts on entering EXTRACTING', async () => {
    const controller = new AbortController();
    const sync = new FakeSyncRunner();
    const report = await runRound(task, deps({ sync }), {
      mode: 'apply',
      signal: controller.signal,
      onPhase: p => {
        if (p === RoundPhase.EXTRACTING) controller.abort();
      },
    });
    assert.equal(report.status, 'failed');
    assert.equal(report.failedPhase, RoundPhase.EXTRACTING);
    assert.ok(report.error instanceof CancelledError);
    assert.equal(report.committed, false);
    assert.deepEqual(sync.runs, []);
    assert.equal(onDisk(), BASE_MANIFEST);
  });

  it('ignores cancellation once APPLYING has begun', async () => {
    const controller = new AbortController();
    const sync = new FakeSyncRunner();
    const report = await runRound(task, deps({ sync }), {
      mode: 'apply',
      signal: controller.signal,
      onPhase: p => {
        if (p === RoundPhase.APPLYING) controller.abort();
      },
    });
    assert.equal(controller.signal.aborted, true);
    assert.equal(report.status, 'done');
    assert.equal(report.error, null);
    assert.equal(report.committed, true);
    assert.equal(onDisk(), ADDED);
    assert.deepEqual(sync.runs, [manifestPath]);
  });

  it('still reports when the ledger throws', async () => {
    const ledger: RoundLedger = {
      record() {
        throw new Error('disk full');
      },
    };
    const report = await run('apply', { ledger });
    assert.equal(report.status, 'done');
    assert.equal(onDisk(), ADDED);
  });

  it('records failed rounds in the ledger too', async () => {
    const ledger = new MemoryLedger();
    const backend = scriptedBackend({ ...DEFAULT_SCRIPT, proposals: { configuration: 'x', workflow: 'y' } });
    await run('apply', { backend, ledger });
    assert.equal(ledger.reports.length, 1);
    assert.equal(ledger.reports[0].status, 'failed');
    assert.deepEqual(ledger.reports[0].failures.map(f => [f.specialistId, f.reason]), [
      ['configuration', 'unparseable'],
      ['workflow', 'unparseable'],
    ]);
  });
});
