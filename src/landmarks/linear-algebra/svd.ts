/**
 * Singular Value Decomposition by one-sided Jacobi rotations.
 * Used for the least-squares affine fit and its pseudo-inverse.
 */

import { JACOBI_TOLERANCE, MAX_JACOBI_SWEEPS } from '../engine-config';
import { identity, transpose } from './matrix-utils';

export interface SvdResult {
  /** m x k, orthonormal columns (zero columns for zero singular values) */
  U: number[][];
  /** k singular values, descending, k = min(m, n) */
  S: number[];
  /** n x k, orthonormal columns */
  V: number[][];
}

function rotateColumns(M: number[][], p: number, q: number, c: number, s: number): void {
  for (let i = 0; i < M.length; i++) {
    const Mip = M[i][p];
    const Miq = M[i][q];
    M[i][p] = c * Mip - s * Miq;
    M[i][q] = s * Mip + c * Miq;
  }
}

/**
 * Thin SVD of an m x n matrix, A = U * diag(S) * V^T.
 *
 * Columns of a working copy of A are rotated pairwise until mutually
 * orthogonal; the rotations accumulate into V and the column norms are the
 * singular values. Rank-deficient input converges to exact or near-zero
 * columns instead of failing.
 *
 * @param cols column count, passed explicitly when A has no rows
 */
export function svd(A: number[][], cols: number = A[0]?.length ?? 0): SvdResult {
  const m = A.length;
  const n = cols;

  // Rotate the longer side: A^T = V S U^T
  if (m < n) {
    const { U, S, V } = svd(transpose(A, n), m);
    return { U: V, S, V: U };
  }

  const W: number[][] = A.map(row => row.slice(0, n));
  const V = identity(n);

  for (let sweep = 0; sweep < MAX_JACOBI_SWEEPS; sweep++) {
    let rotated = false;

    for (let p = 0; p < n - 1; p++) {
      for (let q = p + 1; q < n; q++) {
        let alpha = 0;
        let beta = 0;
        let gamma = 0;
        for (let i = 0; i < m; i++) {
          alpha += W[i][p] * W[i][p];
          beta += W[i][q] * W[i][q];
          gamma += W[i][p] * W[i][q];
        }

        if (gamma === 0 || Math.abs(gamma) <= JACOBI_TOLERANCE * Math.sqrt(alpha * beta)) {
          continue;
        }

        // Smaller root of t^2 + 2*zeta*t - 1 = 0 zeroes the (p, q) inner product
        const zeta = (beta - alpha) / (2 * gamma);
        const t = (zeta >= 0 ? 1 : -1) / (Math.abs(zeta) + Math.sqrt(1 + zeta * zeta));
        const c = 1 / Math.sqrt(1 + t * t);
        const s = c * t;

        rotateColumns(W, p, q, c, s);
        rotateColumns(V, p, q, c, s);
        rotated = true;
      }
    }

    if (!rotated) break;
  }

  const norms = Array.from({ length: n }, (_, j) => {
    let sum = 0;
    for (let i = 0; i < m; i++) {
      sum += W[i][j] * W[i][j];
    }
    return Math.sqrt(sum);
  });

  // Sort by descending singular values
  const order = norms.map((_, j) => j).sort((a, b) => norms[b] - norms[a]);

  const S = order.map(j => norms[j]);
  const U = W.map(row => order.map(j => (norms[j] > 0 ? row[j] / norms[j] : 0)));
  const Vsorted = V.map(row => order.map(j => row[j]));

  return { U, S, V: Vsorted };
}
