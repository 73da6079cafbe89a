import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { findProjectRoot, openDb, openTestDb, dbPathFor } from '../db/connection.js';
import { SCHEMA_VERSION, runMigrations } from '../db/migrations.js';
import {
  insertRound,
  getRound,
  listRecentRounds,
  insertRoundProposal,
  getRoundProposals,
  insertRoundFailure,
  getRoundFailures,
} from '../db/queries.js';
import type { NewRound } from '../db/queries.js';
import { createSqliteLedger } from '../db/ledger.js';
import { createRubricScore } from '../round/rubric.js';
import type { RoundReport } from '../round/types.js';
import { RoundPhase } from '../state/types.js';
import { makeProposal, makeTask, points } from './fixtures.js';
import type Database from 'better-sqlite3';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

function newRound(overrides: Partial<NewRound> = {}): NewRound {
  return {
    request: 'add pytest',
    manifest_path: '/work/pyproject.toml',
    mode: 'apply',
    status: 'done',
    failed_phase: null,
    winner_specialist: 'configuration',
    winner_total: 89,
    committed: 1,
    downgraded: 0,
    sync_status: 'succeeded',
    diff: '--- a\n+++ b\n',
    error: null,
    ...overrides,
  };
}

describe('Migrations', () => {
  it('creates the round tables', () => {
    const tables = db.prepare<[], { name: string }>(`
      SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'
    `).all();
    assert.deepEqual(tables.map(t => t.name).sort(), ['round_failures', 'round_proposals', 'rounds']);
  });

  it('sets user_version to the schema version', () => {
    assert.equal(SCHEMA_VERSION, 2);
    assert.equal(db.pragma('user_version', { simple: true }), 2);
  });

  it('is idempotent', () => {
    runMigrations(db);
    assert.equal(db.pragma('user_version', { simple: true }), 2);
  });
});

describe('Rounds', () => {
  it('inserts and reads back a round', () => {
    const id = insertRound(db, newRound());
    const row = getRound(db, id);
    assert.equal(row?.request, 'add pytest');
    assert.equal(row?.winner_total, 89);
    assert.equal(row?.committed, 1);
    assert.equal(typeof row?.created_at, 'string');
  });

  it('returns null for a missing round', () => {
    assert.equal(getRound(db, 999), null);
  });

  it('lists the most recent rounds first', () => {
    insertRound(db, newRound({ request: 'first' }));
    insertRound(db, newRound({ request: 'second' }));
    insertRound(db, newRound({ request: 'third' }));
    assert.deepEqual(listRecentRounds(db, 2).map(r => r.request), ['third', 'second']);
  });

  it('enforces valid modes', () => {
    assert.throws(() => insertRound(db, newRound({ mode: 'yolo' })));
  });

  it('stores proposals ordered by rank and failures by insertion', () => {
    const id = insertRound(db, newRound());
    const base = { correctness: 1, completeness: 1, safety: 1, best_practices: 1, clarity: 1, total: 5, needs_manual_review: 0, confidence: 0.5, action_count: 1 };
    insertRoundProposal(db, id, { ...base, specialist_id: 'workflow', rank: 2 });
    insertRoundProposal(db, id, { ...base, specialist_id: 'configuration', rank: 1 });
    insertRoundFailure(db, id, { specialist_id: 'security', reason: 'timeout', message: 'no response within 10 ms', attempts: 1 });
    assert.deepEqual(getRoundProposals(db, id).map(p => p.specialist_id), ['configuration', 'workflow']);
    assert.deepEqual(getRoundFailures(db, id).map(f => [f.specialist_id, f.reason]), [['security', 'timeout']]);
  });

  it('rejects proposals for an unknown round', () => {
    assert.throws(() => insertRoundFailure(db, 42, { specialist_id: 'x', reason: 'error', message: 'm', attempts: 1 }));
  });
});

describe('createSqliteLedger()', () => {
  it('records a round with its ranking and failures', () => {
    const winner = {
      proposal: makeProposal('configuration', [{ kind: 'add', path: 'dependencies', value: 'pytest' }]),
      score: createRubricScore(points(28, 22, 18, 12, 9)),
      notes: '',
      needsManualReview: false,
      attempts: 1,
      rank: 1,
    };
    const report: RoundReport = {
      status: 'done',
      mode: 'dry-run',
      phases: [RoundPhase.COLLECTING, RoundPhase.SCORING, RoundPhase.SELECTING, RoundPhase.EXTRACTING, RoundPhase.APPLYING, RoundPhase.DONE],
      failures: [{ specialistId: 'workflow', reason: 'unparseable', message: 'no payload', attempts: 1 }],
      ranked: [winner],
      winner,
      edits: [{ kind: 'add', path: 'dependencies', value: 'pytest' }],
      ambiguities: [],
      diff: '',
      committed: false,
      downgradedToDryRun: false,
      sync: null,
      failedPhase: null,
      error: null,
    };

    createSqliteLedger(db).record(makeTask(), report);

    const [row] = listRecentRounds(db, 1);
    assert.equal(row.mode, 'dry-run');
    assert.equal(row.winner_specialist, 'configuration');
    assert.equal(row.winner_total, 89);
    assert.equal(row.committed, 0);
    assert.equal(row.sync_status, null);
    assert.equal(row.diff, null);
    const proposals = getRoundProposals(db, row.id);
    assert.deepEqual(proposals.map(p => [p.specialist_id, p.rank, p.total, p.action_count]), [['configuration', 1, 89, 1]]);
    assert.deepEqual(getRoundFailures(db, row.id).map(f => f.reason), ['unparseable']);
  });
});

describe('openDb()', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'conclave-db-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the database under .conclave and finds the project root from below', () => {
    const fileDb = openDb(tmpDir);
    fileDb.close();
    assert.ok(fs.existsSync(dbPathFor(tmpDir)));
    const nested = path.join(tmpDir, 'src', 'pkg');
    fs.mkdirSync(nested, { recursive: true });
    assert.equal(findProjectRoot(nested), tmpDir);
  });
});
