/**
 * Dense matrix helpers. Matrices are row-major number[][].
 */

export function zeros(rows: number, cols: number): number[][] {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

export function identity(n: number): number[][] {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)));
}

/** `cols` is the column count of A, passed explicitly when A has no rows. */
export function transpose(A: number[][], cols: number = A[0]?.length ?? 0): number[][] {
  const result = zeros(cols, A.length);
  for (let i = 0; i < A.length; i++) {
    for (let j = 0; j < cols; j++) {
      result[j][i] = A[i][j];
    }
  }
  return result;
}

/**
 * A (m x k) times B (k x n). `cols` is n, passed explicitly when B has no rows.
 */
export function matmul(A: number[][], B: number[][], cols: number = B[0]?.length ?? 0): number[][] {
  const inner = B.length;
  const result = zeros(A.length, cols);
  for (let i = 0; i < A.length; i++) {
    for (let j = 0; j < cols; j++) {
      let sum = 0;
      for (let k = 0; k < inner; k++) {
        sum += A[i][k] * B[k][j];
      }
      result[i][j] = sum;
    }
  }
  return result;
}

/** Append a constant 1 column so an affine map can carry a translation. */
export function padHomogeneous(points: ReadonlyArray<readonly [number, number]>): number[][] {
  return points.map(([x, y]) => [x, y, 1]);
}

/** Drop the trailing homogeneous column. */
export function unpadHomogeneous(rows: number[][]): [number, number][] {
  return rows.map((row): [number, number] => [row[0], row[1]]);
}
