import type Database from 'better-sqlite3';
import type { RoundLedger, RoundReport } from '../round/types.js';
import type { Task } from '../types.js';
import { insertRound, insertRoundFailure, insertRoundProposal } from './queries.js';

/** Write-only ledger over the rounds tables. One transaction per round. */
export function createSqliteLedger(db: Database.Database): RoundLedger {
  const record = db.transaction((task: Task, report: RoundReport): number => {
    const roundId = insertRound(db, {
      request: task.request,
      manifest_path: task.manifest.path,
      mode: report.mode,
      status: report.status,
      failed_phase: report.failedPhase,
      winner_specialist: report.winner?.proposal.specialistId ?? null,
      winner_total: report.winner?.score.total ?? null,
      committed: report.committed ? 1 : 0,
      downgraded: report.downgradedToDryRun ? 1 : 0,
      sync_status: report.sync?.status ?? null,
      diff: report.diff || null,
      error: report.error?.message ?? null,
    });

    for (const ranked of report.ranked) {
      insertRoundProposal(db, roundId, {
        specialist_id: ranked.proposal.specialistId,
        rank: ranked.rank,
        correctness: ranked.score.correctness,
        completeness: ranked.score.completeness,
        safety: ranked.score.safety,
        best_practices: ranked.score.best_practices,
        clarity: ranked.score.clarity,
        total: ranked.score.total,
        needs_manual_review: ranked.needsManualReview ? 1 : 0,
        confidence: ranked.proposal.confidence,
        action_count: ranked.proposal.actions.length,
      });
    }

    for (const failure of report.failures) {
      insertRoundFailure(db, roundId, {
        specialist_id: failure.specialistId,
        reason: failure.reason,
        message: failure.message,
        attempts: failure.attempts,
      });
    }
    return roundId;
  });

  return {
    record(task, report) {
      record(task, report);
    },
  };
}
