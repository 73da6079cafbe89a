// Round lifecycle: one pass, no loops.
export enum RoundPhase {
  COLLECTING = 'collecting',
  SCORING = 'scoring',
  SELECTING = 'selecting',
  EXTRACTING = 'extracting',
  APPLYING = 'applying',
  SYNC_SIGNALED = 'sync_signaled',
  DONE = 'done',
  FAILED = 'failed',
}

// Valid transitions, enforced by transition()
export const TRANSITIONS: Record<RoundPhase, RoundPhase[]> = {
  [RoundPhase.COLLECTING]:    [RoundPhase.SCORING, RoundPhase.FAILED],
  [RoundPhase.SCORING]:       [RoundPhase.SELECTING, RoundPhase.FAILED],
  [RoundPhase.SELECTING]:     [RoundPhase.EXTRACTING, RoundPhase.DONE, RoundPhase.FAILED],  // done: show-all
  [RoundPhase.EXTRACTING]:    [RoundPhase.APPLYING, RoundPhase.DONE, RoundPhase.FAILED],    // done: nothing to apply
  [RoundPhase.APPLYING]:      [RoundPhase.SYNC_SIGNALED, RoundPhase.DONE, RoundPhase.FAILED], // done: dry run
  [RoundPhase.SYNC_SIGNALED]: [RoundPhase.DONE, RoundPhase.FAILED],
  [RoundPhase.DONE]:          [],
  [RoundPhase.FAILED]:        [],
};

/** Phases in which a cancellation request still stops the round. */
export const CANCELLABLE_PHASES: ReadonlySet<RoundPhase> = new Set([
  RoundPhase.COLLECTING,
  RoundPhase.SCORING,
  RoundPhase.SELECTING,
  RoundPhase.EXTRACTING,
]);

export type RoundMode = 'apply' | 'dry-run' | 'show-all';
