import type Database from 'better-sqlite3';

/**
 * Migration system using user_version pragma; no migration table needed.
 * Each migration is an array index: migration[0] upgrades from version 0 to 1, etc.
 */

type Migration = (db: Database.Database) => void;

const migrations: Migration[] = [
  // Migration 001: v0 → v1: rounds and their ranked proposals
  (db) => {
    db.exec(`
      CREATE TABLE rounds (
        id INTEGER PRIMARY KEY,
        request TEXT NOT NULL,
        manifest_path TEXT NOT NULL,
        mode TEXT NOT NULL CHECK(mode IN ('apply', 'dry-run', 'show-all')),
        status TEXT NOT NULL CHECK(status IN ('done', 'failed')),
        failed_phase TEXT,
        winner_specialist TEXT,
        winner_total INTEGER,
        committed INTEGER NOT NULL DEFAULT 0,
        downgraded INTEGER NOT NULL DEFAULT 0,
        sync_status TEXT CHECK(sync_status IN ('succeeded', 'failed', 'skipped')),
        diff TEXT,
        error TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE round_proposals (
        id INTEGER PRIMARY KEY,
        round_id INTEGER NOT NULL REFERENCES rounds(id) ON DELETE CASCADE,
        specialist_id TEXT NOT NULL,
        rank INTEGER NOT NULL,
        correctness INTEGER NOT NULL,
        completeness INTEGER NOT NULL,
        safety INTEGER NOT NULL,
        best_practices INTEGER NOT NULL,
        clarity INTEGER NOT NULL,
        total INTEGER NOT NULL,
        needs_manual_review INTEGER NOT NULL DEFAULT 0,
        confidence REAL NOT NULL,
        action_count INTEGER NOT NULL
      );

      CREATE INDEX idx_round_proposals_round ON round_proposals(round_id);
    `);
  },

  // Migration 002: v1 → v2: per-specialist failures
  (db) => {
    db.exec(`
      CREATE TABLE round_failures (
        id INTEGER PRIMARY KEY,
        round_id INTEGER NOT NULL REFERENCES rounds(id) ON DELETE CASCADE,
        specialist_id TEXT NOT NULL,
        reason TEXT NOT NULL,
        message TEXT NOT NULL,
        attempts INTEGER NOT NULL
      );

      CREATE INDEX idx_round_failures_round ON round_failures(round_id);
    `);
  },
];

export const SCHEMA_VERSION = migrations.length;

/**
 * Run all pending migrations. Uses user_version pragma for tracking.
 */
export function runMigrations(db: Database.Database): void {
  const currentVersion = Number(db.pragma('user_version', { simple: true }));

  for (let i = currentVersion; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
  }
}
