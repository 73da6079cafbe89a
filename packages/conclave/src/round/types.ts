import type { RoundError, SpecialistFailure, SyncError } from '../errors.js';
import type { Ambiguity, Edit } from '../manifest/types.js';
import type { RoundMode, RoundPhase } from '../state/types.js';
import type { Task } from '../types.js';
import type { RankedProposal } from './rank.js';

export type SyncOutcome =
  | { readonly status: 'succeeded'; readonly exitCode: 0 }
  | { readonly status: 'failed'; readonly exitCode: number | null; readonly error: SyncError }
  | { readonly status: 'skipped' };

export interface RoundReport {
  readonly status: 'done' | 'failed';
  readonly mode: RoundMode;
  /** Every phase entered, in order, ending in DONE or FAILED. */
  readonly phases: readonly RoundPhase[];
  readonly failures: readonly SpecialistFailure[];
  readonly ranked: readonly RankedProposal[];
  readonly winner: RankedProposal | null;
  readonly edits: readonly Edit[];
  readonly ambiguities: readonly Ambiguity[];
  /** Unified diff of the manifest; empty when no edit applied. */
  readonly diff: string;
  readonly committed: boolean;
  /** An apply-mode round that stopped at a dry run. */
  readonly downgradedToDryRun: boolean;
  readonly sync: SyncOutcome | null;
  readonly failedPhase: RoundPhase | null;
  readonly error: RoundError | null;
}

/** Append-only record of finished rounds. Nothing read back feeds a later round. */
export interface RoundLedger {
  record(task: Task, report: RoundReport): void;
}
