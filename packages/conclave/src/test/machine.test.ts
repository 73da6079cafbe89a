import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { RoundPhase, TRANSITIONS, CANCELLABLE_PHASES } from '../state/types.js';
import { transition, validNext, isTerminal, isCancellable, determineNextPhase } from '../state/machine.js';

describe('RoundPhase enum', () => {
  it('has 8 phases', () => {
    assert.equal(Object.values(RoundPhase).length, 8);
  });

  it('every phase has a transitions entry', () => {
    for (const phase of Object.values(RoundPhase)) {
      assert.ok(Array.isArray(TRANSITIONS[phase]), `missing transitions for ${phase}`);
    }
  });

  it('every non-terminal phase can fail', () => {
    for (const phase of Object.values(RoundPhase)) {
      if (isTerminal(phase)) continue;
      assert.ok(TRANSITIONS[phase].includes(RoundPhase.FAILED), `${phase} cannot fail`);
    }
  });
});

describe('transition()', () => {
  it('allows the happy path', () => {
    let phase = RoundPhase.COLLECTING;
    for (const next of [RoundPhase.SCORING, RoundPhase.SELECTING, RoundPhase.EXTRACTING, RoundPhase.APPLYING, RoundPhase.SYNC_SIGNALED, RoundPhase.DONE]) {
      phase = transition(phase, next);
    }
    assert.equal(phase, RoundPhase.DONE);
  });

  it('rejects skipping a phase', () => {
    assert.throws(
      () => transition(RoundPhase.COLLECTING, RoundPhase.SELECTING),
      /Invalid transition: collecting → selecting\. Valid: \[scoring, failed\]/,
    );
  });

  it('rejects leaving a terminal phase', () => {
    assert.throws(() => transition(RoundPhase.DONE, RoundPhase.FAILED), /Invalid transition/);
    assert.throws(() => transition(RoundPhase.FAILED, RoundPhase.COLLECTING), /Invalid transition/);
  });
});

describe('validNext()', () => {
  it('lists the successors of SELECTING', () => {
    assert.deepEqual(validNext(RoundPhase.SELECTING), [RoundPhase.EXTRACTING, RoundPhase.DONE, RoundPhase.FAILED]);
  });
});

describe('isCancellable()', () => {
  it('is true up to and including EXTRACTING', () => {
    assert.equal(isCancellable(RoundPhase.COLLECTING), true);
    assert.equal(isCancellable(RoundPhase.EXTRACTING), true);
    assert.equal(CANCELLABLE_PHASES.size, 4);
  });

  it('is false once edits are being applied', () => {
    assert.equal(isCancellable(RoundPhase.APPLYING), false);
    assert.equal(isCancellable(RoundPhase.SYNC_SIGNALED), false);
  });
});

describe('determineNextPhase()', () => {
  const base = { mode: 'apply' as const, hasEdits: true, committed: true };

  it('ends show-all rounds after selection', () => {
    assert.equal(determineNextPhase(RoundPhase.SELECTING, { ...base, mode: 'show-all' }), RoundPhase.DONE);
    assert.equal(determineNextPhase(RoundPhase.SELECTING, base), RoundPhase.EXTRACTING);
  });

  it('skips applying when there are no edits', () => {
    assert.equal(determineNextPhase(RoundPhase.EXTRACTING, { ...base, hasEdits: false }), RoundPhase.DONE);
  });

  it('signals sync only after a commit', () => {
    assert.equal(determineNextPhase(RoundPhase.APPLYING, base), RoundPhase.SYNC_SIGNALED);
    assert.equal(determineNextPhase(RoundPhase.APPLYING, { ...base, committed: false }), RoundPhase.DONE);
  });

  it('every routed phase is a valid transition', () => {
    for (const phase of [RoundPhase.COLLECTING, RoundPhase.SCORING, RoundPhase.SELECTING, RoundPhase.EXTRACTING, RoundPhase.APPLYING, RoundPhase.SYNC_SIGNALED]) {
      const next = determineNextPhase(phase, base);
      assert.ok(TRANSITIONS[phase].includes(next), `${phase} → ${next}`);
    }
  });

  it('throws from terminal phases', () => {
    assert.throws(() => determineNextPhase(RoundPhase.DONE, base), /terminal phase done/);
  });
});
