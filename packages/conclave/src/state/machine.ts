import { RoundPhase, TRANSITIONS, CANCELLABLE_PHASES } from './types.js';
import type { RoundMode } from './types.js';

/**
 * Validate and execute a state transition.
 * Throws if the transition is invalid.
 */
export function transition(current: RoundPhase, target: RoundPhase): RoundPhase {
  const valid = TRANSITIONS[current];
  if (!valid.includes(target)) {
    throw new Error(
      `Invalid transition: ${current} → ${target}. Valid: [${valid.join(', ')}]`
    );
  }
  return target;
}

/**
 * Return all valid next phases from the current phase.
 */
export function validNext(current: RoundPhase): RoundPhase[] {
  return TRANSITIONS[current];
}

/**
 * Check if a phase is terminal (no further transitions possible).
 */
export function isTerminal(phase: RoundPhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

export function isCancellable(phase: RoundPhase): boolean {
  return CANCELLABLE_PHASES.has(phase);
}

export interface RoutingContext {
  mode: RoundMode;
  /** Edits left to hand to the mutator after extraction. */
  hasEdits: boolean;
  /** Whether the mutator persisted the manifest. */
  committed: boolean;
}

/**
 * Deterministic routing for the success path. Failure is not routed here:
 * the orchestrator moves to FAILED directly from wherever the error surfaced.
 */
export function determineNextPhase(current: RoundPhase, ctx: RoutingContext): RoundPhase {
  switch (current) {
    case RoundPhase.COLLECTING:
      return RoundPhase.SCORING;
    case RoundPhase.SCORING:
      return RoundPhase.SELECTING;
    case RoundPhase.SELECTING:
      return ctx.mode === 'show-all' ? RoundPhase.DONE : RoundPhase.EXTRACTING;
    case RoundPhase.EXTRACTING:
      return ctx.hasEdits ? RoundPhase.APPLYING : RoundPhase.DONE;
    case RoundPhase.APPLYING:
      return ctx.committed ? RoundPhase.SYNC_SIGNALED : RoundPhase.DONE;
    case RoundPhase.SYNC_SIGNALED:
      return RoundPhase.DONE;
    default:
      throw new Error(`No next phase from terminal phase ${current}`);
  }
}
