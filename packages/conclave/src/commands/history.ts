import { getFlagValue } from '../config.js';
import { findProjectRoot, openDb } from '../db/connection.js';
import { getRoundFailures, getRoundProposals, listRecentRounds } from '../db/queries.js';
import * as fmt from '../output/format.js';

const DEFAULT_LIMIT = 20;

export function parseLimit(args: string[]): number {
  const raw = getFlagValue(args, '--limit');
  if (raw === undefined) return DEFAULT_LIMIT;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`--limit must be a positive integer, got "${raw}"`);
  }
  return limit;
}

function shorten(s: string, max: number): string {
  const flat = s.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}

export async function history(args: string[], isJson: boolean): Promise<void> {
  const root = findProjectRoot();
  if (!root) throw new Error('Not in a conclave project. Run `conclave init` first.');
  const limit = parseLimit(args);

  const db = openDb(root);
  try {
    const rounds = listRecentRounds(db, limit);

    if (isJson) {
      const data = rounds.map(r => ({
        ...r,
        committed: r.committed === 1,
        downgraded: r.downgraded === 1,
        proposals: getRoundProposals(db, r.id).map(p => ({ ...p, needs_manual_review: p.needs_manual_review === 1 })),
        failures: getRoundFailures(db, r.id),
      }));
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    fmt.header('Round history');
    if (rounds.length === 0) {
      console.log('  No rounds recorded yet.\n');
      return;
    }
    const rows = rounds.map(r => [
      String(r.id),
      r.created_at,
      r.mode,
      fmt.phaseColor(r.status),
      r.winner_specialist ?? '—',
      r.winner_total === null ? '—' : fmt.scoreColor(r.winner_total),
      r.committed === 1 ? fmt.green('yes') : 'no',
      r.sync_status ?? '—',
      shorten(r.request, 40),
    ]);
    console.log(fmt.table(['ID', 'When', 'Mode', 'Status', 'Winner', 'Total', 'Committed', 'Sync', 'Request'], rows));
    console.log();
  } finally {
    db.close();
  }
}
