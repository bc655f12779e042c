export { svd } from './svd';
export type { SvdResult } from './svd';
export { pseudoInverse, leastSquares } from './pseudo-inverse';
export type { LeastSquaresResult } from './pseudo-inverse';
export { identity, matmul, padHomogeneous, transpose, unpadHomogeneous, zeros } from './matrix-utils';
