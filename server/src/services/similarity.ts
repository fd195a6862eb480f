import { dot, norm } from 'mathjs';

export const SCORE_WEIGHTS = {
  requirements: 40,
  responsibilities: 30,
  description: 20,
  evaluation: 10,
} as const;

type Vector = readonly number[] | null | undefined;

function requireVectors(a: Vector, b: Vector): [number[], number[]] {
  if (a == null || b == null) {
    throw new Error('Both embeddings must be provided');
  }
  if (a.length !== b.length) {
    throw new Error(`Embedding dimensions differ: ${a.length} vs ${b.length}`);
  }
  return [[...a], [...b]];
}

function magnitude(vector: number[]): number {
  const value = norm(vector);
  if (typeof value !== 'number') {
    throw new Error('Unexpected non-numeric vector norm');
  }
  return value;
}

/**
 * Cosine similarity in [-1, 1]. A zero-magnitude vector has no direction, so
 * its similarity to anything is 0.
 */
export function similarity(a: Vector, b: Vector): number {
  const [left, right] = requireVectors(a, b);
  const denominator = magnitude(left) * magnitude(right);
  if (denominator === 0) return 0;
  return dot(left, right) / denominator;
}

/** Loop-based cosine, clamped to [0, 1]. */
export function similarityArithmetic(a: Vector, b: Vector): number {
  const [left, right] = requireVectors(a, b);
  let product = 0;
  let leftSquares = 0;
  let rightSquares = 0;
  for (let i = 0; i < left.length; i++) {
    product += left[i] * right[i];
    leftSquares += left[i] * left[i];
    rightSquares += right[i] * right[i];
  }
  if (leftSquares === 0 || rightSquares === 0) return 0;
  const cosine = product / (Math.sqrt(leftSquares) * Math.sqrt(rightSquares));
  return Math.max(0, Math.min(1, cosine));
}

/** Weighted overall score; the evaluation score is on the 1–10 scale. */
export function overallScore(
  description: number,
  requirements: number,
  responsibilities: number,
  evaluationScore: number,
  penalty = 0,
): number {
  return (
    requirements * SCORE_WEIGHTS.requirements
    + responsibilities * SCORE_WEIGHTS.responsibilities
    + description * SCORE_WEIGHTS.description
    + evaluationScore * SCORE_WEIGHTS.evaluation
  ) - penalty;
}
