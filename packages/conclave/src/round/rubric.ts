import { RubricError } from '../errors.js';

/** Point ceilings per dimension; they sum to 100. */
export const RUBRIC_CEILINGS = {
  correctness: 30,
  completeness: 25,
  safety: 20,
  best_practices: 15,
  clarity: 10,
} as const;

export type RubricDimension = keyof typeof RUBRIC_CEILINGS;

export const RUBRIC_DIMENSIONS: readonly RubricDimension[] = [
  'correctness',
  'completeness',
  'safety',
  'best_practices',
  'clarity',
];

export const RUBRIC_MAX_TOTAL = 100;

export const RUBRIC_DESCRIPTIONS: Record<RubricDimension, string> = {
  correctness: 'the actions do what the request asks, with valid requirement strings',
  completeness: 'nothing the request needs is missing',
  safety: 'no risky pins, removals or unknown packages',
  best_practices: 'requirements sit in the right list with sensible specifiers',
  clarity: 'the rationale explains the change plainly',
};

export type RubricPoints = Record<RubricDimension, number>;

export interface RubricScore extends Readonly<RubricPoints> {
  readonly total: number;
}

/**
 * Build a score, enforcing each ceiling and that the total is the sum.
 * A claimed `total` that disagrees with the sum is rejected, not corrected.
 */
export function createRubricScore(points: RubricPoints, claimedTotal?: number): RubricScore {
  for (const dim of RUBRIC_DIMENSIONS) {
    const value = points[dim];
    const ceiling = RUBRIC_CEILINGS[dim];
    if (!Number.isInteger(value) || value < 0 || value > ceiling) {
      throw new RubricError(`${dim} must be an integer in 0..${ceiling}, got ${value}`);
    }
  }
  const total = RUBRIC_DIMENSIONS.reduce((sum, dim) => sum + points[dim], 0);
  if (claimedTotal !== undefined && claimedTotal !== total) {
    throw new RubricError(`total ${claimedTotal} does not equal the sum of dimensions (${total})`);
  }
  return Object.freeze({
    correctness: points.correctness,
    completeness: points.completeness,
    safety: points.safety,
    best_practices: points.best_practices,
    clarity: points.clarity,
    total,
  });
}

/** The score given when judging a proposal failed outright. */
export const MINIMUM_SCORE: RubricScore = createRubricScore({
  correctness: 0,
  completeness: 0,
  safety: 0,
  best_practices: 0,
  clarity: 0,
});
