import type Database from 'better-sqlite3';
import type { RoundFailureRow, RoundProposalRow, RoundRow } from '../types.js';

/**
 * All database operations as named functions using prepared statements.
 * Each function takes a db instance so we can test with in-memory DBs.
 */

// ── Rounds ───────────────────────────────────────────────────

export type NewRound = Omit<RoundRow, 'id' | 'created_at'>;

export function insertRound(db: Database.Database, round: NewRound): number {
  const result = db.prepare<NewRound>(`
    INSERT INTO rounds (request, manifest_path, mode, status, failed_phase, winner_specialist,
                        winner_total, committed, downgraded, sync_status, diff, error)
    VALUES (@request, @manifest_path, @mode, @status, @failed_phase, @winner_specialist,
            @winner_total, @committed, @downgraded, @sync_status, @diff, @error)
  `).run(round);
  return Number(result.lastInsertRowid);
}

export function getRound(db: Database.Database, id: number): RoundRow | null {
  return db.prepare<[number], RoundRow>('SELECT * FROM rounds WHERE id = ?').get(id) ?? null;
}

export function listRecentRounds(db: Database.Database, limit: number): RoundRow[] {
  return db.prepare<[number], RoundRow>(`
    SELECT * FROM rounds ORDER BY id DESC LIMIT ?
  `).all(limit);
}

// ── Proposals ────────────────────────────────────────────────

export type NewRoundProposal = Omit<RoundProposalRow, 'id' | 'round_id'>;

export function insertRoundProposal(db: Database.Database, roundId: number, p: NewRoundProposal): void {
  db.prepare<NewRoundProposal & { round_id: number }>(`
    INSERT INTO round_proposals (round_id, specialist_id, rank, correctness, completeness, safety,
                                 best_practices, clarity, total, needs_manual_review, confidence, action_count)
    VALUES (@round_id, @specialist_id, @rank, @correctness, @completeness, @safety,
            @best_practices, @clarity, @total, @needs_manual_review, @confidence, @action_count)
  `).run({ ...p, round_id: roundId });
}

export function getRoundProposals(db: Database.Database, roundId: number): RoundProposalRow[] {
  return db.prepare<[number], RoundProposalRow>(`
    SELECT * FROM round_proposals WHERE round_id = ? ORDER BY rank
  `).all(roundId);
}

// ── Failures ─────────────────────────────────────────────────

export type NewRoundFailure = Omit<RoundFailureRow, 'id' | 'round_id'>;

export function insertRoundFailure(db: Database.Database, roundId: number, f: NewRoundFailure): void {
  db.prepare<NewRoundFailure & { round_id: number }>(`
    INSERT INTO round_failures (round_id, specialist_id, reason, message, attempts)
    VALUES (@round_id, @specialist_id, @reason, @message, @attempts)
  `).run({ ...f, round_id: roundId });
}

export function getRoundFailures(db: Database.Database, roundId: number): RoundFailureRow[] {
  return db.prepare<[number], RoundFailureRow>(`
    SELECT * FROM round_failures WHERE round_id = ? ORDER BY id
  `).all(roundId);
}
