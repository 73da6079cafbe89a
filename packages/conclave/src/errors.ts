import type { ZodError } from 'zod';
import { RoundPhase } from './state/types.js';
import type { Edit } from './manifest/types.js';
import type { ProposedAction } from './agents/types.js';

/**
 * Base for every error a round can end with. `phase` is the round phase the
 * error belongs to, or null when it is raised outside a round (config, CLI)
 * or by a component that does not know which phase called it.
 */
export class RoundError extends Error {
  readonly phase: RoundPhase | null;

  constructor(message: string, phase: RoundPhase | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoundError';
    this.phase = phase;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A model call failed in a way worth retrying (network, rate limit, backend error). */
export class ProviderError extends RoundError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, null, options);
    this.name = 'ProviderError';
  }
}

/** A response arrived but carried no payload that passed validation. */
export class UnparseableOutputError extends RoundError {
  readonly excerpt: string;

  constructor(message: string, excerpt: string) {
    super(message, null);
    this.name = 'UnparseableOutputError';
    this.excerpt = excerpt;
  }
}

export type FailureReason = 'timeout' | 'cancelled' | 'provider' | 'unparseable' | 'error';

export interface SpecialistFailure {
  readonly specialistId: string;
  readonly reason: FailureReason;
  readonly message: string;
  readonly attempts: number;
}

/** Every specialist in the pool failed. */
export class AggregateFailure extends RoundError {
  readonly failures: readonly SpecialistFailure[];

  constructor(failures: readonly SpecialistFailure[]) {
    const summary = failures.map(f => `${f.specialistId} (${f.reason}): ${f.message}`).join('; ');
    super(`All ${failures.length} specialist(s) failed: ${summary}`, RoundPhase.COLLECTING);
    this.name = 'AggregateFailure';
    this.failures = failures;
  }
}

/** Rubric points outside their ceilings, or a total that is not their sum. */
export class RubricError extends RoundError {
  constructor(message: string) {
    super(message, RoundPhase.SCORING);
    this.name = 'RubricError';
  }
}

export interface RejectedAction {
  readonly action: ProposedAction;
  readonly reason: string;
}

/** The winning proposal names an action outside the allow-list or its own scope. */
export class ValidationError extends RoundError {
  readonly specialistId: string;
  readonly rejected: readonly RejectedAction[];

  constructor(specialistId: string, rejected: readonly RejectedAction[]) {
    const summary = rejected.map(r => `${r.action.kind} ${r.action.path}: ${r.reason}`).join('; ');
    super(`Proposal from ${specialistId} has ${rejected.length} invalid action(s): ${summary}`, RoundPhase.EXTRACTING);
    this.name = 'ValidationError';
    this.specialistId = specialistId;
    this.rejected = rejected;
  }
}

/** Two or more edits target the same list. */
export class ConflictError extends RoundError {
  readonly conflicts: readonly (readonly [Edit, Edit])[];

  constructor(conflicts: readonly (readonly [Edit, Edit])[]) {
    const paths = [...new Set(conflicts.map(([a]) => a.path))];
    super(`Conflicting edits target the same list: ${paths.join(', ')}`, RoundPhase.APPLYING);
    this.name = 'ConflictError';
    this.conflicts = conflicts;
  }
}

/** The sync command exited non-zero. Does not undo the committed edit. */
export class SyncError extends RoundError {
  readonly exitCode: number | null;
  readonly diff: string;

  constructor(exitCode: number | null, diff: string, detail?: string) {
    const status = exitCode === null ? 'did not exit normally' : `exited with code ${exitCode}`;
    super(`Sync command ${status}${detail ? `: ${detail}` : ''}`, RoundPhase.SYNC_SIGNALED);
    this.name = 'SyncError';
    this.exitCode = exitCode;
    this.diff = diff;
  }
}

export class CancelledError extends RoundError {
  constructor(phase: RoundPhase) {
    super(`Round cancelled during ${phase}`, phase);
    this.name = 'CancelledError';
  }
}

/** The manifest cannot be read, parsed, or edited as requested. */
export class ManifestError extends RoundError {
  readonly manifestPath: string;

  constructor(message: string, manifestPath: string, options?: { cause?: unknown }) {
    super(message, null, options);
    this.name = 'ManifestError';
    this.manifestPath = manifestPath;
  }
}

/** The manifest changed on disk after the round loaded it. */
export class StaleManifestError extends RoundError {
  readonly manifestPath: string;

  constructor(manifestPath: string) {
    super(`${manifestPath} changed on disk since the round started; nothing was written`, RoundPhase.APPLYING);
    this.name = 'StaleManifestError';
    this.manifestPath = manifestPath;
  }
}

/** Another process holds the manifest lock. */
export class LockError extends RoundError {
  readonly lockPath: string;

  constructor(message: string, lockPath: string, options?: { cause?: unknown }) {
    super(message, RoundPhase.APPLYING, options);
    this.name = 'LockError';
    this.lockPath = lockPath;
  }
}

export class ConfigError extends RoundError {
  readonly filePath: string;
  readonly issues: ZodError | null;

  constructor(filePath: string, message: string, issues: ZodError | null = null) {
    super(`Invalid config ${filePath}: ${message}`, null);
    this.name = 'ConfigError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap anything thrown inside a round so reports always carry a RoundError. */
export function toRoundError(err: unknown, phase: RoundPhase): RoundError {
  if (err instanceof RoundError) return err;
  return new RoundError(errorMessage(err), phase, { cause: err });
}
