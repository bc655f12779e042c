/**
 * Least-squares affine alignment between two landmark sets.
 *
 * Points are row vectors in homogeneous coordinates, so a fitted matrix A
 * maps [x, y, 1] * A ~ [x', y', 1].
 */

import type { EngineOptions } from './engine-config';
import { createEngineLogger } from './engine-logger';
import { leastSquares, matmul, padHomogeneous, pseudoInverse, unpadHomogeneous } from './linear-algebra';
import { toPointSet, truncateToCommonLength, type PointSet, type PointSetLike } from './point-set';

export type AffineMatrix = number[][];

export interface AffineEstimate {
  /** 3 x 3 matrix fitted on the paired points */
  matrix: AffineMatrix;
  /** Paired source points mapped by the matrix */
  sourceWarped: PointSet;
  /** Paired target points mapped by the pseudo-inverse of the matrix */
  targetWarped: PointSet;
  /** Numerical rank of the homogeneous source matrix (3 for a well-posed fit) */
  rank: number;
}

export function warpPoints(points: PointSet, matrix: AffineMatrix): PointSet {
  return unpadHomogeneous(matmul(padHomogeneous(points), matrix, 3));
}

/**
 * Map points back through the Moore-Penrose pseudo-inverse of the matrix.
 * Only an approximate inverse when the matrix is singular.
 */
export function warpPointsInverse(points: PointSet, matrix: AffineMatrix): PointSet {
  return warpPoints(points, pseudoInverse(matrix));
}

/**
 * Estimate the affine transform taking `source` onto `target` and warp both
 * sets into the other's frame.
 *
 * Only the first min(len(source), len(target)) points of each set are used
 * and warped. Collinear, repeated or fewer than three points give a
 * minimum-norm solution rather than an error.
 */
export function estimateAffine(
  source: PointSetLike,
  target: PointSetLike,
  options: EngineOptions = {}
): AffineEstimate {
  const logger = createEngineLogger(options);
  const [src, tgt] = truncateToCommonLength(
    toPointSet(source, options.coordinateColumns),
    toPointSet(target, options.coordinateColumns)
  );

  // Solve the least squares problem X * A = Y for the transform matrix A
  const { solution: matrix, rank } = leastSquares(padHomogeneous(src), padHomogeneous(tgt), 3);

  if (rank < 3) {
    logger.log(`[Affine] rank-deficient fit: rank ${rank} of 3 from ${src.length} paired points`);
  }
  logger.logDebug(`[Affine] ${src.length} pts, A=[${matrix.map(row => row.map(v => v.toFixed(4)).join(',')).join(' | ')}]`);

  return {
    matrix,
    sourceWarped: warpPoints(src, matrix),
    targetWarped: warpPointsInverse(tgt, matrix),
    rank,
  };
}
