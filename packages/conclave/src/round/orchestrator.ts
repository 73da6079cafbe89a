import * as fmt from '../output/format.js';
import { AggregateFailure, CancelledError, ConflictError, SyncError, errorMessage, toRoundError } from '../errors.js';
import type { RoundError, SpecialistFailure } from '../errors.js';
import type { ModelBackend, SpecialistDescriptor } from '../agents/types.js';
import { applyEdits, detectConflicts } from '../manifest/mutator.js';
import type { Ambiguity, Edit } from '../manifest/types.js';
import { RoundPhase } from '../state/types.js';
import type { RoundMode } from '../state/types.js';
import { determineNextPhase, isCancellable, transition } from '../state/machine.js';
import type { SyncRunner } from '../sync.js';
import type { ConclaveConfig, Task } from '../types.js';
import { extractEdits } from './extract.js';
import { judgeProposals } from './judge.js';
import { runSpecialistPool } from './pool.js';
import { rankProposals, selectWinner } from './rank.js';
import { RUBRIC_MAX_TOTAL } from './rubric.js';
import type { RankedProposal } from './rank.js';
import type { RetryPolicy } from './retry.js';
import type { RoundLedger, RoundReport, SyncOutcome } from './types.js';

export interface RoundDependencies {
  readonly config: ConclaveConfig;
  readonly descriptors: readonly SpecialistDescriptor[];
  readonly backend: ModelBackend;
  /** Null when no sync command is configured. */
  readonly sync: SyncRunner | null;
  readonly ledger?: RoundLedger;
}

export interface RoundOptions {
  mode: RoundMode;
  /** Honoured until the round enters APPLYING. */
  signal?: AbortSignal;
  onPhase?: (phase: RoundPhase) => void;
}

export function retryPolicyOf(config: ConclaveConfig): RetryPolicy {
  return {
    maxRetries: config.round.max_retries,
    baseDelayMs: config.round.backoff_base_ms,
    maxDelayMs: config.round.backoff_max_ms,
  };
}

/** Mutable accumulator; frozen into a RoundReport when the round ends. */
interface RoundDraft {
  phase: RoundPhase;
  phases: RoundPhase[];
  failures: readonly SpecialistFailure[];
  ranked: readonly RankedProposal[];
  winner: RankedProposal | null;
  edits: readonly Edit[];
  ambiguities: readonly Ambiguity[];
  diff: string;
  committed: boolean;
  downgradedToDryRun: boolean;
  sync: SyncOutcome | null;
  failedPhase: RoundPhase | null;
  error: RoundError | null;
}

/**
 * Run one round: collect proposals, score them, pick a winner, extract its
 * edits, apply them, and signal the sync runner after a commit.
 *
 * Never rejects. Every outcome, including failure and cancellation, comes
 * back as a RoundReport.
 */
export async function runRound(task: Task, deps: RoundDependencies, options: RoundOptions): Promise<RoundReport> {
  const { config } = deps;
  const mode = options.mode;
  const signal = options.signal ?? new AbortController().signal;
  const retry = retryPolicyOf(config);

  const draft: RoundDraft = {
    phase: RoundPhase.COLLECTING,
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
  };

  // Read through a call so the compiler does not carry narrowing across advance().
  const currentPhase = (): RoundPhase => draft.phase;
  const enter = (target: RoundPhase) => {
    draft.phase = transition(draft.phase, target);
    draft.phases.push(target);
    options.onPhase?.(target);
  };
  const advance = (ctx: { hasEdits?: boolean; committed?: boolean } = {}) => {
    enter(determineNextPhase(draft.phase, {
      mode,
      hasEdits: ctx.hasEdits ?? false,
      committed: ctx.committed ?? false,
    }));
  };
  const checkCancelled = () => {
    if (signal.aborted && isCancellable(draft.phase)) throw new CancelledError(draft.phase);
  };

  options.onPhase?.(RoundPhase.COLLECTING);

  try {
    checkCancelled();
    const pool = await runSpecialistPool(task, deps.descriptors, deps.backend, {
      timeoutMs: config.round.specialist_timeout_ms,
      retry,
      signal,
    });
    draft.failures = pool.failures;
    checkCancelled();
    advance();

    const judged = await judgeProposals(task, pool.proposals, deps.backend, {
      model: config.models.judge,
      timeoutMs: config.round.judge_timeout_ms,
      retry,
      signal,
    });
    checkCancelled();
    advance();

    draft.ranked = rankProposals(judged);
    draft.winner = selectWinner(draft.ranked);
    checkCancelled();
    advance();
    if (currentPhase() === RoundPhase.DONE) return finish(task, deps, mode, draft);

    const winner = draft.winner;
    if (!winner) throw new Error('No proposal to select');
    const descriptor = deps.descriptors.find(d => d.id === winner.proposal.specialistId);
    if (!descriptor) throw new Error(`Unknown specialist ${winner.proposal.specialistId}`);
    fmt.info(`Winner: ${winner.proposal.specialistId} (${winner.score.total}/${RUBRIC_MAX_TOTAL})`);

    const extraction = extractEdits(winner.proposal, descriptor, task.manifest);
    // Ambiguous edits still count towards conflicts.
    const conflicts = detectConflicts(extraction.edits);
    draft.ambiguities = extraction.ambiguities;
    const ambiguous = new Set(extraction.ambiguities.map(a => a.edit));
    draft.edits = extraction.edits.filter(e => !ambiguous.has(e));
    draft.downgradedToDryRun = mode === 'apply' && (winner.needsManualReview || ambiguous.size > 0);
    if (draft.downgradedToDryRun) {
      const why = winner.needsManualReview ? 'the winning proposal needs manual review' : `${ambiguous.size} edit(s) are ambiguous`;
      fmt.warn(`Nothing will be written: ${why}. Showing a dry run.`);
    }
    // Last point at which cancellation is honoured.
    checkCancelled();
    advance({ hasEdits: draft.edits.length > 0 || conflicts.length > 0 });
    if (currentPhase() === RoundPhase.DONE) return finish(task, deps, mode, draft);
    if (conflicts.length > 0) throw new ConflictError(conflicts);

    const applied = await applyEdits(task.manifest, draft.edits, {
      dryRun: mode !== 'apply' || draft.downgradedToDryRun,
      leaseSeconds: config.lock.lease_seconds,
    });
    draft.diff = applied.diff;
    draft.committed = applied.committed;
    advance({ committed: applied.committed });
    if (currentPhase() === RoundPhase.DONE) return finish(task, deps, mode, draft);

    fmt.success(`Updated ${task.manifest.fileName}`);
    draft.sync = await signalSync(deps.sync, task.manifest.path, draft.diff);
    advance();
    return finish(task, deps, mode, draft);
  } catch (err) {
    if (err instanceof AggregateFailure) draft.failures = err.failures;
    const phase = draft.phase;
    const error = signal.aborted && isCancellable(phase) && !(err instanceof CancelledError)
      ? new CancelledError(phase)
      : toRoundError(err, phase);
    draft.failedPhase = phase;
    draft.error = error;
    enter(RoundPhase.FAILED);
    fmt.error(`Round failed during ${phase}: ${error.message}`);
    return finish(task, deps, mode, draft);
  }
}

async function signalSync(runner: SyncRunner | null, manifestPath: string, diff: string): Promise<SyncOutcome> {
  if (!runner) return { status: 'skipped' };
  const exit = await runner.run(manifestPath);
  if (exit.exitCode === 0) return { status: 'succeeded', exitCode: 0 };
  const error = new SyncError(exit.exitCode, diff, exit.detail);
  fmt.warn(`${error.message}. The manifest edit stays committed.`);
  return { status: 'failed', exitCode: exit.exitCode, error };
}

function finish(task: Task, deps: RoundDependencies, mode: RoundMode, draft: RoundDraft): RoundReport {
  const report: RoundReport = {
    status: draft.phase === RoundPhase.FAILED ? 'failed' : 'done',
    mode,
    phases: Object.freeze([...draft.phases]),
    failures: draft.failures,
    ranked: draft.ranked,
    winner: draft.winner,
    edits: draft.edits,
    ambiguities: draft.ambiguities,
    diff: draft.diff,
    committed: draft.committed,
    downgradedToDryRun: draft.downgradedToDryRun,
    sync: draft.sync,
    failedPhase: draft.failedPhase,
    error: draft.error,
  };
  Object.freeze(report);

  if (deps.ledger) {
    try {
      deps.ledger.record(task, report);
    } catch (err) {
      fmt.warn(`Could not record round in ledger: ${errorMessage(err)}`);
    }
  }
  return report;
}
