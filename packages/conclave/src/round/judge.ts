import * as fmt from '../output/format.js';
import { ProviderError, RubricError, UnparseableOutputError, errorMessage } from '../errors.js';
import { parseJudgeVerdict } from '../agents/parse.js';
import { buildJudgeRequest } from '../agents/prompts.js';
import type { ModelBackend, Proposal } from '../agents/types.js';
import type { Task } from '../types.js';
import { openCallScope, raceAbort, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';
import { MINIMUM_SCORE, createRubricScore } from './rubric.js';
import type { RubricScore } from './rubric.js';

export interface JudgedProposal {
  readonly proposal: Proposal;
  readonly score: RubricScore;
  readonly notes: string;
  /** Judging failed; the score is the synthetic minimum. */
  readonly needsManualReview: boolean;
  readonly attempts: number;
}

export interface JudgeOptions {
  model: string;
  /** Bounds each judge call, retries included. */
  timeoutMs: number;
  retry: RetryPolicy;
  signal: AbortSignal;
}

/** Judge calls also retry on malformed or out-of-range scores. */
function judgeRetryable(err: unknown): boolean {
  return err instanceof ProviderError || err instanceof UnparseableOutputError || err instanceof RubricError;
}

/**
 * Score one proposal in isolation. Never rejects: once retries are exhausted
 * (or the call times out) the proposal gets the minimum score and is flagged
 * for manual review.
 */
export async function scoreProposal(
  task: Task,
  proposal: Proposal,
  backend: ModelBackend,
  opts: JudgeOptions,
): Promise<JudgedProposal> {
  const request = buildJudgeRequest(task, proposal, opts.model);
  const scope = openCallScope(opts.signal, opts.timeoutMs);
  let attempts = 0;

  try {
    const { score, notes } = await withRetry(
      async () => {
        attempts++;
        const text = await raceAbort(backend.complete(request, scope.signal), scope.signal);
        const { data } = parseJudgeVerdict(text, request.label);
        return { score: createRubricScore(data.scores, data.total), notes: data.notes?.trim() ?? '' };
      },
      opts.retry,
      scope.signal,
      {
        retryable: judgeRetryable,
        onRetry: (n, err, delayMs) =>
          fmt.warn(`[${request.label}] Attempt ${n} failed: ${errorMessage(err)}. Retrying in ${delayMs} ms.`),
      },
    );
    return Object.freeze({ proposal, score, notes, needsManualReview: false, attempts });
  } catch (err) {
    const reason = scope.timedOut() ? `no verdict within ${opts.timeoutMs} ms` : errorMessage(err);
    fmt.warn(`[${request.label}] Judging failed: ${reason}. Scored 0 and flagged for manual review.`);
    return Object.freeze({
      proposal,
      score: MINIMUM_SCORE,
      notes: `Judge failed: ${reason}`,
      needsManualReview: true,
      attempts,
    });
  } finally {
    scope.dispose();
  }
}

/** Score every proposal concurrently; each judgement sees only its own proposal. */
export async function judgeProposals(
  task: Task,
  proposals: readonly Proposal[],
  backend: ModelBackend,
  opts: JudgeOptions,
): Promise<JudgedProposal[]> {
  fmt.info(`Scoring ${proposals.length} proposal(s)`);
  return Promise.all(proposals.map(p => scoreProposal(task, p, backend, opts)));
}
