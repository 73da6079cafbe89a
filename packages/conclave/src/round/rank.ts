import type { JudgedProposal } from './judge.js';
import type { RubricDimension } from './rubric.js';

export interface RankedProposal extends JudgedProposal {
  /** 1-based position after sorting. */
  readonly rank: number;
}

/** Dimensions consulted, in order, when totals tie. */
export const TIE_BREAK_ORDER: readonly RubricDimension[] = ['correctness', 'completeness', 'safety'];

/**
 * Total descending, then the tie-break dimensions descending, then specialist
 * id ascending by code unit. Ids are unique, so the order is total.
 */
export function compareJudged(a: JudgedProposal, b: JudgedProposal): number {
  if (a.score.total !== b.score.total) return b.score.total - a.score.total;
  for (const dim of TIE_BREAK_ORDER) {
    if (a.score[dim] !== b.score[dim]) return b.score[dim] - a.score[dim];
  }
  const idA = a.proposal.specialistId;
  const idB = b.proposal.specialistId;
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

export function rankProposals(judged: readonly JudgedProposal[]): RankedProposal[] {
  return [...judged]
    .sort(compareJudged)
    .map((j, i) => Object.freeze({ ...j, rank: i + 1 }));
}

export function selectWinner(ranked: readonly RankedProposal[]): RankedProposal | null {
  return ranked[0] ?? null;
}
