import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { runMigrations } from './migrations.js';

/**
 * Walk up from startDir looking for a directory containing `.conclave/`.
 */
export function findProjectRoot(startDir?: string): string | null {
  let dir = startDir ?? process.cwd();

  while (true) {
    if (fs.existsSync(path.join(dir, '.conclave'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export function dbPathFor(projectRoot: string): string {
  return path.join(projectRoot, '.conclave', 'conclave.db');
}

/**
 * Open .conclave/conclave.db with WAL mode and foreign keys, running any
 * pending migrations. The caller owns the connection and closes it.
 */
export function openDb(projectRoot: string): Database.Database {
  const conclaveDir = path.join(projectRoot, '.conclave');
  if (!fs.existsSync(conclaveDir)) {
    fs.mkdirSync(conclaveDir, { recursive: true });
  }

  const db = new Database(dbPathFor(projectRoot));
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}

/**
 * Open a fresh in-memory database for testing.
 */
export function openTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}
