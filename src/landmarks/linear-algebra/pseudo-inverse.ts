/**
 * Moore-Penrose pseudo-inverse and minimum-norm least squares, both built on
 * the SVD so singular and near-singular input stays well defined.
 */

import { PINV_RCOND, lstsqRcond } from '../engine-config';
import { svd, type SvdResult } from './svd';
import { matmul, zeros } from './matrix-utils';

export interface LeastSquaresResult {
  /** n x p minimum-norm solution of X * A = Y */
  solution: number[][];
  /** Number of singular values of X above the cutoff */
  rank: number;
  singularValues: number[];
}

/**
 * V * diag(1/S) * U^T, with singular values at or below rcond * max(S)
 * treated as zero.
 */
function invertDecomposition({ U, S, V }: SvdResult, rows: number, cols: number, rcond: number): {
  inverse: number[][];
  rank: number;
} {
  const cutoff = rcond * (S[0] ?? 0);
  const inverse = zeros(cols, rows);
  let rank = 0;

  for (let k = 0; k < S.length; k++) {
    if (!(S[k] > cutoff)) continue;
    rank++;
    const inv = 1 / S[k];
    for (let i = 0; i < cols; i++) {
      const vik = V[i][k] * inv;
      if (vik === 0) continue;
      for (let j = 0; j < rows; j++) {
        inverse[i][j] += vik * U[j][k];
      }
    }
  }

  return { inverse, rank };
}

/**
 * Pseudo-inverse of an m x n matrix (result is n x m).
 *
 * @param cols column count of A, passed explicitly when A has no rows
 */
export function pseudoInverse(
  A: number[][],
  rcond: number = PINV_RCOND,
  cols: number = A[0]?.length ?? 0
): number[][] {
  return invertDecomposition(svd(A, cols), A.length, cols, rcond).inverse;
}

/**
 * Minimum-norm least-squares solution of X * A = Y for A.
 * Never throws for rank deficiency or for fewer rows than columns.
 *
 * @param X m x n design matrix
 * @param Y m x p targets
 * @param cols n, passed explicitly when X has no rows
 */
export function leastSquares(
  X: number[][],
  Y: number[][],
  cols: number = X[0]?.length ?? 0,
  rcond: number = lstsqRcond(X.length, cols)
): LeastSquaresResult {
  const decomposition = svd(X, cols);
  const { inverse, rank } = invertDecomposition(decomposition, X.length, cols, rcond);
  const targetCols = Y[0]?.length ?? cols;

  return {
    solution: matmul(inverse, Y, targetCols),
    rank,
    singularValues: decomposition.S,
  };
}
