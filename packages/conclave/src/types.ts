import type { ManifestDocument } from './manifest/document.js';
import type { Diagnostics } from './diagnostics.js';

export type { Diagnostics };

export interface ConclaveConfig {
  readonly project: {
    readonly name: string;
    /** Manifest path relative to the project root. */
    readonly manifest: string;
  };
  /** Specialist ids, in the order their outcomes are reported. */
  readonly specialists: readonly string[];
  readonly models: {
    readonly specialist: string;
    readonly judge: string;
    /** Per-specialist model overrides, keyed by specialist id. */
    readonly [role: string]: string;
  };
  readonly round: {
    readonly specialist_timeout_ms: number;
    readonly judge_timeout_ms: number;
    readonly max_retries: number;
    readonly backoff_base_ms: number;
    readonly backoff_max_ms: number;
  };
  readonly sync: {
    /** argv of the environment sync command; null disables sync. */
    readonly command: readonly string[] | null;
  };
  readonly lock: {
    readonly lease_seconds: number;
  };
}

/** One user request, immutable once the round starts. */
export interface Task {
  readonly request: string;
  readonly diagnostics: Diagnostics | null;
  readonly manifest: ManifestDocument;
}

// ── Ledger rows ──────────────────────────────────────────────

export interface RoundRow {
  id: number;
  request: string;
  manifest_path: string;
  mode: string;
  status: string;
  failed_phase: string | null;
  winner_specialist: string | null;
  winner_total: number | null;
  committed: number;
  downgraded: number;
  sync_status: string | null;
  diff: string | null;
  error: string | null;
  created_at: string;
}

export interface RoundProposalRow {
  id: number;
  round_id: number;
  specialist_id: string;
  rank: number;
  correctness: number;
  completeness: number;
  safety: number;
  best_practices: number;
  clarity: number;
  total: number;
  needs_manual_review: number;
  confidence: number;
  action_count: number;
}

export interface RoundFailureRow {
  id: number;
  round_id: number;
  specialist_id: string;
  reason: string;
  message: string;
  attempts: number;
}
