import * as fmt from '../output/format.js';
import { AggregateFailure, ProviderError, RoundError, UnparseableOutputError, errorMessage } from '../errors.js';
import type { FailureReason, SpecialistFailure } from '../errors.js';
import { parseProposalPayload } from '../agents/parse.js';
import { buildSpecialistRequest } from '../agents/prompts.js';
import type { ModelBackend, Proposal, SpecialistDescriptor } from '../agents/types.js';
import type { Task } from '../types.js';
import { openCallScope, raceAbort, withRetry } from './retry.js';
import type { CallScope, RetryPolicy } from './retry.js';

export interface PoolOptions {
  /** Bounds each specialist call, retries included. */
  timeoutMs: number;
  retry: RetryPolicy;
  signal: AbortSignal;
}

export type SpecialistOutcome =
  | { ok: true; specialistId: string; proposal: Proposal }
  | { ok: false; specialistId: string; failure: SpecialistFailure };

export interface PoolResult {
  /** One outcome per descriptor, in descriptor order. */
  outcomes: SpecialistOutcome[];
  proposals: Proposal[];
  failures: SpecialistFailure[];
}

export const DEFAULT_CONFIDENCE = 0.5;

function classifyFailure(err: unknown, scope: CallScope, round: AbortSignal): FailureReason {
  if (scope.timedOut()) return 'timeout';
  if (round.aborted) return 'cancelled';
  if (err instanceof ProviderError) return 'provider';
  if (err instanceof UnparseableOutputError) return 'unparseable';
  return 'error';
}

async function runSpecialist(
  task: Task,
  descriptor: SpecialistDescriptor,
  backend: ModelBackend,
  opts: PoolOptions,
): Promise<SpecialistOutcome> {
  const scope = openCallScope(opts.signal, opts.timeoutMs);
  const request = buildSpecialistRequest(task, descriptor);
  let attempts = 0;

  try {
    const output = await withRetry(
      () => {
        attempts++;
        return raceAbort(backend.complete(request, scope.signal), scope.signal);
      },
      opts.retry,
      scope.signal,
      {
        onRetry: (n, err, delayMs) =>
          fmt.warn(`[${descriptor.id}] Attempt ${n} failed: ${errorMessage(err)}. Retrying in ${delayMs} ms.`),
      },
    );
    const { data, tier, prose } = parseProposalPayload(output, descriptor.id);
    const proposal: Proposal = Object.freeze({
      specialistId: descriptor.id,
      specialistName: descriptor.name,
      rationale: data.rationale?.trim() || prose,
      confidence: data.confidence ?? DEFAULT_CONFIDENCE,
      actions: Object.freeze(data.actions.map(a => Object.freeze({ ...a }))),
      extractionTier: tier,
    });
    return { ok: true, specialistId: descriptor.id, proposal };
  } catch (err) {
    const reason = classifyFailure(err, scope, opts.signal);
    const message = reason === 'timeout' ? `no response within ${opts.timeoutMs} ms` : errorMessage(err);
    fmt.warn(`[${descriptor.id}] Failed (${reason}): ${message}`);
    return {
      ok: false,
      specialistId: descriptor.id,
      failure: Object.freeze({ specialistId: descriptor.id, reason, message, attempts }),
    };
  } finally {
    scope.dispose();
  }
}

/**
 * Fan the task out to every specialist concurrently. One specialist's failure
 * never affects another's. Rejects with AggregateFailure only when no
 * specialist produced a proposal.
 */
export async function runSpecialistPool(
  task: Task,
  descriptors: readonly SpecialistDescriptor[],
  backend: ModelBackend,
  opts: PoolOptions,
): Promise<PoolResult> {
  if (descriptors.length === 0) {
    throw new RoundError('No specialists configured', null);
  }

  fmt.info(`Collecting proposals from ${descriptors.length} specialist(s): ${descriptors.map(d => d.id).join(', ')}`);
  const outcomes = await Promise.all(descriptors.map(d => runSpecialist(task, d, backend, opts)));

  const proposals: Proposal[] = [];
  const failures: SpecialistFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) proposals.push(outcome.proposal);
    else failures.push(outcome.failure);
  }

  if (proposals.length === 0) throw new AggregateFailure(failures);
  return { outcomes, proposals, failures };
}
